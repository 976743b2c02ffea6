import type { RelatedWord, WordStatsRepository } from './word-stats.repository.js';

export interface WordStats {
  readonly stem: string;
  readonly articleCount: number;
  readonly related: readonly RelatedWord[];
}

export function createInMemoryWordStatsRepository(
  stats: readonly WordStats[] = [],
): WordStatsRepository {
  const byStem = new Map(stats.map((s) => [s.stem, s]));

  return {
    articleCount(stem: string): Promise<number> {
      return Promise.resolve(byStem.get(stem)?.articleCount ?? 0);
    },

    relatedWords(stem: string): Promise<readonly RelatedWord[]> {
      const related = [...(byStem.get(stem)?.related ?? [])].sort((a, b) => b.count - a.count);
      return Promise.resolve(related);
    },
  };
}
