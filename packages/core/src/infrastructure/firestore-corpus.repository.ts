import type { Firestore, Query } from '@google-cloud/firestore';
import { Timestamp } from '@google-cloud/firestore';
import type { MentionRow } from '@spurn/shared/src/types/mention.types.js';
import { PersistenceError } from '@spurn/shared/src/utils/errors.js';
import { createChildLogger } from '@spurn/shared/src/logger.js';
import type { ArticleRow, CorpusRepository } from '../repositories/corpus.repository.js';
import type { CorpusArticle, CorpusSeedData } from '../repositories/in-memory-corpus.repository.js';
import { commitInBatches, readOrFail, type PendingWrite } from './firestore-helpers.js';

const log = createChildLogger('firestore:corpus');

const ARTICLES = 'articles';
const PERSONS = 'persons';
const ENTITIES = 'entities';
// Upper bound for prefix range queries
const PREFIX_END = '\uf8ff';

interface ArticleDocument {
  heading: string;
  timestamp: Timestamp;
  domain: string;
  url: string;
  visible: boolean;
  names: string[];
}

/** Article fields are copied onto each mention so that lookups need no join. */
interface MentionFields {
  articleId: string;
  heading: string;
  timestamp: Timestamp;
  domain: string;
  url: string;
  visible: boolean;
}

interface PersonDocument extends MentionFields {
  name: string;
  title: string;
  titleLc: string;
}

interface EntityDocument extends MentionFields {
  name: string;
  verb: string;
  definition: string;
}

export interface FirestoreCorpusRepository extends CorpusRepository {
  importSeed(seed: CorpusSeedData): Promise<void>;
}

function mentionFields(article: CorpusArticle): MentionFields {
  return {
    articleId: article.id,
    heading: article.heading,
    timestamp: Timestamp.fromDate(article.timestamp),
    domain: article.domain,
    url: article.url,
    visible: article.visible,
  };
}

function toRow(data: MentionFields, text: string): MentionRow {
  return {
    text,
    articleId: data.articleId,
    timestamp: data.timestamp.toDate(),
    heading: data.heading,
    domain: data.domain,
    url: data.url,
  };
}

function oldestFirst(rows: MentionRow[]): MentionRow[] {
  return rows.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
}

async function fetchRows<T extends MentionFields>(
  query: Query,
  textOf: (data: T) => string,
): Promise<MentionRow[]> {
  const snapshot = await readOrFail('Corpus lookup', () => query.get());
  return snapshot.docs.map((doc) => {
    const data = doc.data() as T;
    return toRow(data, textOf(data));
  });
}

export function createFirestoreCorpusRepository(db: Firestore): FirestoreCorpusRepository {
  const articlesRef = db.collection(ARTICLES);
  const personsRef = db.collection(PERSONS);
  const entitiesRef = db.collection(ENTITIES);

  const visiblePersons = personsRef.where('visible', '==', true);
  const visibleEntities = entitiesRef.where('visible', '==', true);

  return {
    async personTitles(name: string): Promise<readonly MentionRow[]> {
      return fetchRows<PersonDocument>(
        visiblePersons.where('name', '==', name).orderBy('timestamp', 'asc'),
        (p) => p.title,
      );
    },

    async entityDefinitions(name: string): Promise<readonly MentionRow[]> {
      return fetchRows<EntityDocument>(
        visibleEntities.where('name', '==', name).orderBy('timestamp', 'asc'),
        (e) => e.definition,
      );
    },

    async personsByTitle(titleLc: string): Promise<readonly MentionRow[]> {
      const exact = await fetchRows<PersonDocument>(
        visiblePersons.where('titleLc', '==', titleLc),
        (p) => p.name,
      );
      const prefix = `${titleLc} `;
      const longer = await fetchRows<PersonDocument>(
        visiblePersons.where('titleLc', '>=', prefix).where('titleLc', '<', `${prefix}${PREFIX_END}`),
        (p) => p.name,
      );
      return oldestFirst([...exact, ...longer]);
    },

    async entitiesByDefinition(definition: string): Promise<readonly MentionRow[]> {
      return fetchRows<EntityDocument>(
        visibleEntities.where('definition', '==', definition).orderBy('timestamp', 'asc'),
        (e) => e.name,
      );
    },

    async entitiesByNamePrefix(prefix: string): Promise<readonly MentionRow[]> {
      const rows = await fetchRows<EntityDocument>(
        visibleEntities.where('name', '>=', prefix).where('name', '<', `${prefix}${PREFIX_END}`),
        (e) => e.definition,
      );
      return oldestFirst(rows);
    },

    async articlesMentioning(name: string, limit: number): Promise<readonly ArticleRow[]> {
      const snapshot = await readOrFail('Article lookup', () =>
        articlesRef
          .where('names', 'array-contains', name)
          .where('visible', '==', true)
          .orderBy('timestamp', 'desc')
          .limit(limit)
          .get(),
      );

      return snapshot.docs.map((doc) => {
        const data = doc.data() as ArticleDocument;
        return {
          articleId: doc.id,
          heading: data.heading,
          timestamp: data.timestamp.toDate(),
          domain: data.domain,
          url: data.url,
        };
      });
    },

    async importSeed(seed: CorpusSeedData): Promise<void> {
      const articles = new Map(seed.articles.map((a) => [a.id, a]));
      const articleOf = (articleId: string, owner: string): CorpusArticle => {
        const article = articles.get(articleId);
        if (!article) {
          throw new PersistenceError(`Unknown article for ${owner}: ${articleId}`);
        }
        return article;
      };

      const writes: PendingWrite[] = [];
      for (const article of seed.articles) {
        const doc: ArticleDocument = {
          heading: article.heading,
          timestamp: Timestamp.fromDate(article.timestamp),
          domain: article.domain,
          url: article.url,
          visible: article.visible,
          names: [...article.names],
        };
        writes.push({ ref: articlesRef.doc(article.id), data: doc });
      }
      for (const person of seed.persons) {
        const doc: PersonDocument = {
          ...mentionFields(articleOf(person.articleId, person.name)),
          name: person.name,
          title: person.title,
          titleLc: person.title.toLowerCase(),
        };
        writes.push({ ref: personsRef.doc(), data: doc });
      }
      for (const entity of seed.entities) {
        const doc: EntityDocument = {
          ...mentionFields(articleOf(entity.articleId, entity.name)),
          name: entity.name,
          verb: entity.verb,
          definition: entity.definition,
        };
        writes.push({ ref: entitiesRef.doc(), data: doc });
      }

      const commits = await commitInBatches(db, writes);

      log.info(
        {
          articles: seed.articles.length,
          persons: seed.persons.length,
          entities: seed.entities.length,
          commits,
        },
        'Corpus seed imported',
      );
    },
  };
}
