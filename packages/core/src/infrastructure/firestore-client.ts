import { Firestore } from '@google-cloud/firestore';

export function createFirestoreClient(projectId = process.env['SPURN_GCP_PROJECT_ID']): Firestore {
  return new Firestore({
    projectId,
    ignoreUndefinedProperties: true,
  });
}
