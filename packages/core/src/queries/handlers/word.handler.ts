import type { QueryHandler } from '../types.js';

export interface RelatedWordAnswer {
  readonly stem: string;
  readonly cat: string;
}

export interface WordAnswer {
  readonly count: number;
  readonly answers: readonly RelatedWordAnswer[];
}

export const wordHandler: QueryHandler = async (_query, ctx, stem) => {
  const count = await ctx.wordStats.articleCount(stem);
  const related = count > 0 ? await ctx.wordStats.relatedWords(stem) : [];
  const answer: WordAnswer = {
    count,
    answers: related.filter((r) => r.stem !== stem).map((r) => ({ stem: r.stem, cat: r.category })),
  };
  return { answer };
};
