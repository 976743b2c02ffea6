import type { MentionRow } from '@spurn/shared/src/types/mention.types.js';
import { PersistenceError } from '@spurn/shared/src/utils/errors.js';
import type { ArticleRow, CorpusRepository } from './corpus.repository.js';

export interface CorpusArticle {
  readonly id: string;
  readonly heading: string;
  readonly timestamp: Date;
  readonly domain: string;
  readonly url: string;
  readonly visible: boolean;
  /** Person and entity names occurring in the article. */
  readonly names: readonly string[];
}

export interface CorpusPerson {
  readonly name: string;
  readonly title: string;
  readonly articleId: string;
}

export interface CorpusEntity {
  readonly name: string;
  readonly verb: string;
  readonly definition: string;
  readonly articleId: string;
}

export interface InMemoryCorpusRepository extends CorpusRepository {
  addArticle(article: CorpusArticle): void;
  addPerson(person: CorpusPerson): void;
  addEntity(entity: CorpusEntity): void;
}

export interface CorpusSeedData {
  readonly articles: readonly CorpusArticle[];
  readonly persons: readonly CorpusPerson[];
  readonly entities: readonly CorpusEntity[];
}

export function createInMemoryCorpusRepository(seed?: CorpusSeedData): InMemoryCorpusRepository {
  const articles = new Map<string, CorpusArticle>();
  const persons: CorpusPerson[] = [];
  const entities: CorpusEntity[] = [];

  function visibleArticle(articleId: string): CorpusArticle | undefined {
    const article = articles.get(articleId);
    return article?.visible ? article : undefined;
  }

  function toRows<T extends { readonly articleId: string }>(
    items: readonly T[],
    predicate: (item: T) => boolean,
    textOf: (item: T) => string,
  ): readonly MentionRow[] {
    const rows: MentionRow[] = [];
    for (const item of items) {
      if (!predicate(item)) {
        continue;
      }
      const article = visibleArticle(item.articleId);
      if (!article) {
        continue;
      }
      rows.push({
        text: textOf(item),
        articleId: article.id,
        timestamp: article.timestamp,
        heading: article.heading,
        domain: article.domain,
        url: article.url,
      });
    }
    return rows.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  }

  const repository: InMemoryCorpusRepository = {
    addArticle(article: CorpusArticle): void {
      articles.set(article.id, article);
    },

    addPerson(person: CorpusPerson): void {
      if (!articles.has(person.articleId)) {
        throw new PersistenceError(`Unknown article for person ${person.name}: ${person.articleId}`);
      }
      persons.push(person);
    },

    addEntity(entity: CorpusEntity): void {
      if (!articles.has(entity.articleId)) {
        throw new PersistenceError(`Unknown article for entity ${entity.name}: ${entity.articleId}`);
      }
      entities.push(entity);
    },

    personTitles(name: string): Promise<readonly MentionRow[]> {
      return Promise.resolve(
        toRows(persons, (p) => p.name === name, (p) => p.title),
      );
    },

    entityDefinitions(name: string): Promise<readonly MentionRow[]> {
      return Promise.resolve(
        toRows(entities, (e) => e.name === name, (e) => e.definition),
      );
    },

    personsByTitle(titleLc: string): Promise<readonly MentionRow[]> {
      return Promise.resolve(
        toRows(
          persons,
          (p) => {
            const lc = p.title.toLowerCase();
            return lc === titleLc || lc.startsWith(`${titleLc} `);
          },
          (p) => p.name,
        ),
      );
    },

    entitiesByDefinition(definition: string): Promise<readonly MentionRow[]> {
      return Promise.resolve(
        toRows(entities, (e) => e.definition === definition, (e) => e.name),
      );
    },

    entitiesByNamePrefix(prefix: string): Promise<readonly MentionRow[]> {
      return Promise.resolve(
        toRows(entities, (e) => e.name.startsWith(prefix), (e) => e.definition),
      );
    },

    articlesMentioning(name: string, limit: number): Promise<readonly ArticleRow[]> {
      const rows = [...articles.values()]
        .filter((a) => a.visible && a.names.includes(name))
        .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime())
        .slice(0, limit)
        .map((a) => ({
          articleId: a.id,
          heading: a.heading,
          timestamp: a.timestamp,
          domain: a.domain,
          url: a.url,
        }));
      return Promise.resolve(rows);
    },
  };

  if (seed) {
    seed.articles.forEach((a) => repository.addArticle(a));
    seed.persons.forEach((p) => repository.addPerson(p));
    seed.entities.forEach((e) => repository.addEntity(e));
  }

  return repository;
}
