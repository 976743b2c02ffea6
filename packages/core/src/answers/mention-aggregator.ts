import type { BucketTable, Mention, MentionRow } from '@spurn/shared/src/types/mention.types.js';
import { correctSpaces } from '@spurn/shared/src/utils/text.js';
import { resolveNameKey } from './name-canonicalizer.js';

export type TextOf = (row: MentionRow) => string;

const rowText: TextOf = (row) => row.text;

export function createBucketTable(): BucketTable {
  return new Map();
}

function toMention(row: MentionRow): Mention {
  return {
    domain: row.domain,
    articleId: row.articleId,
    heading: row.heading,
    timestamp: row.timestamp,
    url: row.url,
  };
}

function insert(table: BucketTable, key: string, row: MentionRow): void {
  const bucket = table.get(key);
  if (bucket) {
    bucket.set(row.articleId, toMention(row));
  } else {
    table.set(key, new Map([[row.articleId, toMention(row)]]));
  }
}

/** Adds each row to the bucket of its whitespace-corrected text. */
export function appendAnswers(
  table: BucketTable,
  rows: readonly MentionRow[],
  textOf: TextOf = rowText,
): void {
  for (const row of rows) {
    const text = correctSpaces(textOf(row));
    if (text) {
      insert(table, text, row);
    }
  }
}

/**
 * Like {@link appendAnswers}, but the text is a person name: spelling
 * variants of one person end up in a single bucket.
 */
export function appendNames(
  table: BucketTable,
  rows: readonly MentionRow[],
  textOf: TextOf = rowText,
): void {
  for (const row of rows) {
    const key = resolveNameKey(table, correctSpaces(textOf(row)));
    if (key) {
      insert(table, key, row);
    }
  }
}
