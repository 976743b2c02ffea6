import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { QueryRecord } from '@spurn/shared/src/types/query.types.js';
import type { QueryProcessor } from '@spurn/core/src/queries/query-processor.js';
import { createRouter, type AppEnv } from '../types.js';
import { QueryRequestSchema } from '../schemas/requests.js';
import { ErrorResponseSchema, QueryResponseSchema, type QueryResponse } from '../schemas/responses.js';

const answerQueryRoute = createRoute({
  method: 'post',
  path: '/',
  tags: ['Queries'],
  summary: 'Answer a query',
  description:
    'Answers a parsed question about a person, title, entity, company, word or search, ' +
    'or a plain-text spelling or declension question.',
  request: {
    body: {
      required: true,
      content: {
        'application/json': {
          schema: QueryRequestSchema,
        },
      },
    },
  },
  responses: {
    200: {
      description: 'The query record, answered or errored',
      content: {
        'application/json': {
          schema: QueryResponseSchema,
        },
      },
    },
    400: {
      description: 'Invalid request body',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
  },
});

export function toQueryResponse(record: QueryRecord): QueryResponse {
  return {
    ...record,
    expires: record.expires ? record.expires.toISOString() : null,
  };
}

export function createQueryRoutes(queryProcessor: QueryProcessor): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(answerQueryRoute, async (c) => {
    const body = c.req.valid('json');
    const record = await queryProcessor.process(body);
    return c.json(toQueryResponse(record), 200);
  });

  return routes;
}
