/** A raw row returned by a corpus lookup: one candidate text seen in one article. */
export interface MentionRow {
  readonly text: string;
  readonly articleId: string;
  readonly timestamp: Date;
  readonly heading: string;
  readonly domain: string;
  readonly url: string;
}

/** One observed occurrence of an answer candidate in one article. */
export interface Mention {
  readonly domain: string;
  readonly articleId: string;
  readonly heading: string;
  readonly timestamp: Date;
  readonly url: string;
}

/** Mentions of one answer text, at most one per article. */
export type AnswerBucket = Map<string, Mention>;

/** Answer text to its bucket. Insertion order is the ranking tie-break order. */
export type BucketTable = Map<string, AnswerBucket>;

export interface AnswerSource {
  readonly domain: string;
  readonly uuid: string;
  readonly heading: string;
  readonly timestamp: Date;
  /** ISO timestamp truncated to minutes, e.g. `2026-10-18T09:30`. */
  readonly ts: string;
  readonly url: string;
}

export interface RankedAnswer {
  readonly answer: string;
  readonly sources: readonly AnswerSource[];
}

export interface ArticleSummary {
  readonly uuid: string;
  readonly heading: string;
  readonly ts: string;
  readonly domain: string;
  readonly url: string;
}
