import type { OpenAPIHono } from '@hono/zod-openapi';
import { cors } from 'hono/cors';
import type { QueryProcessor } from '@spurn/core/src/queries/query-processor.js';
import type { DescriptionLookup } from '@spurn/core/src/registry/description-lookup.js';
import { createChildLogger } from '@spurn/shared/src/logger.js';
import { createRouter, type AppEnv } from './types.js';
import { requestId } from './middleware/request-id.js';
import { errorHandler } from './middleware/error-handler.js';
import { createHealthRoutes } from './routes/health.js';
import { createQueryRoutes } from './routes/queries.js';
import { createRegistryRoutes } from './routes/registry.js';

const log = createChildLogger('api:server');

export interface AppConfig {
  readonly version: string;
  readonly queryProcessor: QueryProcessor;
  readonly descriptionLookup: DescriptionLookup;
}

export function createApp(config: AppConfig): OpenAPIHono<AppEnv> {
  const app = createRouter();

  app.use('*', cors());
  app.use('*', requestId);

  // Request logging
  app.use('*', async (c, next) => {
    await next();
    const duration = Date.now() - c.get('receivedAt');
    log.info(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        duration,
        requestId: c.get('requestId'),
      },
      'Request completed',
    );
  });

  app.onError(errorHandler);

  app.route('/health', createHealthRoutes(config.version));

  app.get('/openapi.json', (c) => {
    const doc = app.getOpenAPI31Document({
      openapi: '3.1.0',
      info: {
        title: 'Spurn API',
        version: config.version,
        description: 'Question answering over a corpus of parsed Icelandic news articles',
      },
    });
    return c.json(doc);
  });

  app.route('/queries', createQueryRoutes(config.queryProcessor));
  app.route('/registry', createRegistryRoutes(config.descriptionLookup));

  return app;
}
