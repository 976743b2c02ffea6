export interface DeclensionForms {
  readonly nominative: string;
  readonly accusative: string;
  readonly dative: string;
  readonly genitive: string;
}

export interface MorphologyClient {
  /** Singular case forms of the best matching word, or null when the lexicon has no entry. */
  lookupDeclension(word: string): Promise<DeclensionForms | null>;
}
