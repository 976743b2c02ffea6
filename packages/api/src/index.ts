import { resolve } from 'node:path';
import { serve } from '@hono/node-server';
import { loadConfig } from '@spurn/schemas/src/config-loader.js';
import { createServiceDeps } from '@spurn/core/src/infrastructure/service-deps.js';
import { createChildLogger } from '@spurn/shared/src/logger.js';
import { createApp } from './app.js';

const log = createChildLogger('api:main');

async function main(): Promise<void> {
  const configDir = resolve(process.env['SPURN_CONFIG_DIR'] ?? 'config');
  const config = await loadConfig(configDir);
  const deps = await createServiceDeps(config, { baseDir: configDir });

  const app = createApp({
    version: config.version,
    queryProcessor: deps.queryProcessor,
    descriptionLookup: deps.descriptionLookup,
  });

  const { port } = config.server;
  log.info({ port, backend: config.corpus.backend }, 'Starting Spurn API server');

  serve({ fetch: app.fetch, port }, (info) => {
    log.info({ port: info.port }, 'Spurn API server running');
  });
}

main().catch((error: unknown) => {
  log.error(
    { error: error instanceof Error ? error.message : String(error) },
    'Failed to start API server',
  );
  process.exit(1);
});
