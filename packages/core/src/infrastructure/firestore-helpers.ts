import type { DocumentData, DocumentReference, Firestore } from '@google-cloud/firestore';
import { PersistenceError } from '@spurn/shared/src/utils/errors.js';

/** Firestore rejects commits of more than 500 writes. */
export const BATCH_SIZE = 400;

export interface PendingWrite {
  readonly ref: DocumentReference;
  readonly data: DocumentData;
}

/** Commits `writes` in sequential batches of {@link BATCH_SIZE}; returns the number of commits. */
export async function commitInBatches(db: Firestore, writes: readonly PendingWrite[]): Promise<number> {
  let commits = 0;
  for (let i = 0; i < writes.length; i += BATCH_SIZE) {
    const batch = db.batch();
    for (const { ref, data } of writes.slice(i, i + BATCH_SIZE)) {
      batch.set(ref, data);
    }
    await batch.commit();
    commits++;
  }
  return commits;
}

/** Runs a Firestore read, turning any failure into a {@link PersistenceError}. */
export async function readOrFail<T>(what: string, read: () => Promise<T>): Promise<T> {
  try {
    return await read();
  } catch (error) {
    throw new PersistenceError(
      `${what} failed: ${error instanceof Error ? error.message : String(error)}`,
      error instanceof Error ? error : undefined,
    );
  }
}
