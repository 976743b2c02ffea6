export const QUERY_TYPES = ['Person', 'Title', 'Entity', 'Company', 'Word', 'Search'] as const;

export type QueryType = (typeof QUERY_TYPES)[number];

/** Query kinds answered from the raw query text rather than a parse result. */
export type PlainTextQueryType = 'Spelling' | 'Declension';

export type QueryStatus = 'unresolved' | 'answered' | 'errored';

export interface SearchTerm {
  readonly stem: string;
  readonly category: string;
}

export interface PersonName {
  readonly name: string;
  readonly gender?: string;
  readonly case?: string;
}

export type QueryToken =
  | { readonly kind: 'person'; readonly text: string; readonly names: readonly PersonName[] }
  | { readonly kind: 'entity'; readonly text: string }
  | { readonly kind: 'word'; readonly text: string; readonly stems?: readonly SearchTerm[] }
  | { readonly kind: 'punctuation'; readonly text: string };

/** The outcome of matching a query against the query grammar. */
export interface ParseResult {
  readonly qtype?: QueryType;
  readonly qkey?: string;
}

export interface QueryRecord {
  readonly text: string;
  readonly status: QueryStatus;
  readonly qtype: string | null;
  readonly key: string | null;
  readonly answer: unknown;
  readonly voiceAnswer: string | null;
  readonly error: string | null;
  readonly expires: Date | null;
}
