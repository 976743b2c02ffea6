import { resolve } from 'node:path';
import { loadConfig, readJsonFile } from '@spurn/schemas/src/config-loader.js';
import { validateQueryInput } from '@spurn/schemas/src/validators.js';
import { createServiceDeps } from '@spurn/core/src/infrastructure/service-deps.js';

async function main(): Promise<void> {
  const requestFile = process.argv[2];
  if (!requestFile) {
    console.error('Usage: run-query <request.json> [config-dir]');
    process.exit(2);
  }
  const configDir = resolve(process.argv[3] ?? resolve(process.cwd(), 'config'));

  console.log('=== Spurn Query Runner ===\n');
  console.log(`Config directory: ${configDir}`);
  console.log(`Request: ${requestFile}\n`);

  const config = await loadConfig(configDir);
  const deps = await createServiceDeps(config, { baseDir: configDir });
  const input = validateQueryInput(await readJsonFile(resolve(requestFile)));

  console.log(`Query: ${input.text}`);
  const startTime = Date.now();
  const record = await deps.queryProcessor.process(input);
  const elapsed = Date.now() - startTime;

  console.log(`\n--- ${record.status} ---`);
  if (record.qtype) {
    console.log(`  Type: ${record.qtype}`);
    console.log(`  Key: ${record.key ?? ''}`);
  }
  if (record.voiceAnswer) {
    console.log(`  Voice: ${record.voiceAnswer}`);
  }
  if (record.error) {
    console.log(`  Error: ${record.error}`);
  }
  console.log('\n--- Record ---');
  console.log(JSON.stringify(record, null, 2));

  console.log(`\n=== Query completed in ${String(elapsed)}ms ===`);
}

main().catch((error: unknown) => {
  console.error('Query failed:', error);
  process.exit(1);
});
