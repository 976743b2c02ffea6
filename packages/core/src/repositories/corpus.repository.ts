import type { MentionRow } from '@spurn/shared/src/types/mention.types.js';

export interface ArticleRow {
  readonly articleId: string;
  readonly heading: string;
  readonly timestamp: Date;
  readonly domain: string;
  readonly url: string;
}

/**
 * Read access to the parsed news corpus. Every lookup returns rows from
 * visible sources only, oldest first.
 */
export interface CorpusRepository {
  /** Titles of persons with exactly this name. */
  personTitles(name: string): Promise<readonly MentionRow[]>;
  /** Definitions of entities with exactly this name. */
  entityDefinitions(name: string): Promise<readonly MentionRow[]>;
  /**
   * Names of persons whose lowercase title equals `titleLc` or starts with
   * `titleLc` followed by a space.
   */
  personsByTitle(titleLc: string): Promise<readonly MentionRow[]>;
  /** Names of entities whose definition equals `definition`. */
  entitiesByDefinition(definition: string): Promise<readonly MentionRow[]>;
  /** Definitions of entities whose name starts with `prefix` (case-sensitive). */
  entitiesByNamePrefix(prefix: string): Promise<readonly MentionRow[]>;
  /** Newest articles mentioning the name, at most `limit` of them. */
  articlesMentioning(name: string, limit: number): Promise<readonly ArticleRow[]>;
}
