export interface RelatedWord {
  readonly stem: string;
  readonly category: string;
  readonly count: number;
}

/** Word co-occurrence statistics gathered from the corpus. */
export interface WordStatsRepository {
  /** Number of articles in which the stem occurs. */
  articleCount(stem: string): Promise<number>;
  /** Stems that co-occur with `stem`, most frequent first. */
  relatedWords(stem: string): Promise<readonly RelatedWord[]>;
}
