import { resolve } from 'node:path';
import { loadConfig, loadCorpusSeed } from '@spurn/schemas/src/config-loader.js';
import { createFirestoreClient } from '@spurn/core/src/infrastructure/firestore-client.js';
import { createFirestoreCorpusRepository } from '@spurn/core/src/infrastructure/firestore-corpus.repository.js';
import { createFirestoreWordStatsRepository } from '@spurn/core/src/infrastructure/firestore-word-stats.repository.js';

async function main(): Promise<void> {
  const positionalArgs = process.argv.slice(2).filter((a) => !a.startsWith('--'));
  const configDir = positionalArgs.length > 0 ? resolve(positionalArgs[0]) : resolve(process.cwd(), 'config');

  console.log('=== Spurn Corpus Seeder ===\n');
  console.log(`Config directory: ${configDir}`);
  console.log(`Firestore emulator: ${process.env['FIRESTORE_EMULATOR_HOST'] ?? 'not set (using real Firestore)'}\n`);

  const config = await loadConfig(configDir);
  if (!config.corpus.seedFile) {
    console.log('No corpus.seedFile configured. Nothing to seed.');
    return;
  }

  const seed = await loadCorpusSeed(resolve(configDir, config.corpus.seedFile));
  const db = createFirestoreClient(config.corpus.gcpProjectId);

  await createFirestoreCorpusRepository(db).importSeed(seed);
  console.log(
    `Corpus saved: ${String(seed.articles.length)} articles, ` +
      `${String(seed.persons.length)} persons, ${String(seed.entities.length)} entities`,
  );

  await createFirestoreWordStatsRepository(db).importStats(seed.words);
  console.log(`Word stats saved: ${String(seed.words.length)} stems`);

  console.log('\nSeeding complete.');
}

main().catch((error: unknown) => {
  console.error('Seeding failed:', error);
  process.exit(1);
});
