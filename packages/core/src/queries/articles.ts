import type { ArticleSummary } from '@spurn/shared/src/types/mention.types.js';
import type { CorpusRepository } from '../repositories/corpus.repository.js';
import { MAX_ANSWERS } from '../answers/answer-ranker.js';

export function toMinuteIso(timestamp: Date): string {
  return timestamp.toISOString().slice(0, 16);
}

/**
 * Newest articles mentioning `name`. Articles sharing a heading collapse
 * into one entry holding the last of them, and articles without a
 * heading are dropped.
 */
export async function listArticles(corpus: CorpusRepository, name: string): Promise<ArticleSummary[]> {
  const rows = await corpus.articlesMentioning(name, MAX_ANSWERS);

  const byHeading = new Map<string, ArticleSummary>();
  for (const row of rows) {
    if (!row.heading) {
      continue;
    }
    byHeading.set(row.heading, {
      uuid: row.articleId,
      heading: row.heading,
      ts: toMinuteIso(row.timestamp),
      domain: row.domain,
      url: row.url,
    });
  }

  return [...byHeading.values()].sort((a, b) => (a.ts < b.ts ? 1 : a.ts > b.ts ? -1 : 0));
}
