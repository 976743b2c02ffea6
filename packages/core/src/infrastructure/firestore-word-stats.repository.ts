import type { Firestore } from '@google-cloud/firestore';
import type { RelatedWord, WordStatsRepository } from '../repositories/word-stats.repository.js';
import type { WordStats } from '../repositories/in-memory-word-stats.repository.js';
import { createChildLogger } from '@spurn/shared/src/logger.js';
import { commitInBatches, readOrFail, type PendingWrite } from './firestore-helpers.js';

const log = createChildLogger('firestore:word-stats');

const COLLECTION = 'wordStats';

interface WordStatsDocument {
  articleCount: number;
  related: RelatedWord[];
}

export interface FirestoreWordStatsRepository extends WordStatsRepository {
  importStats(stats: readonly WordStats[]): Promise<void>;
}

/** One document per stem, keyed by the stem itself. */
export function createFirestoreWordStatsRepository(db: Firestore): FirestoreWordStatsRepository {
  const collectionRef = db.collection(COLLECTION);

  async function load(stem: string): Promise<WordStatsDocument | undefined> {
    const doc = await readOrFail('Word stats lookup', () => collectionRef.doc(stem).get());
    if (!doc.exists) {
      return undefined;
    }
    return doc.data() as WordStatsDocument;
  }

  return {
    async articleCount(stem: string): Promise<number> {
      return (await load(stem))?.articleCount ?? 0;
    },

    async relatedWords(stem: string): Promise<readonly RelatedWord[]> {
      const related = (await load(stem))?.related ?? [];
      return [...related].sort((a, b) => b.count - a.count);
    },

    async importStats(stats: readonly WordStats[]): Promise<void> {
      const writes: PendingWrite[] = stats.map((s) => {
        const doc: WordStatsDocument = { articleCount: s.articleCount, related: [...s.related] };
        return { ref: collectionRef.doc(s.stem), data: doc };
      });
      const commits = await commitInBatches(db, writes);
      log.info({ stems: stats.length, commits }, 'Word stats imported');
    },
  };
}
