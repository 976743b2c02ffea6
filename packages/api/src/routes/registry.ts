import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { DescriptionLookup } from '@spurn/core/src/registry/description-lookup.js';
import { buildNameRegistry } from '@spurn/core/src/registry/name-registry.js';
import { createRouter, type AppEnv } from '../types.js';
import { RegistryRequestSchema } from '../schemas/requests.js';
import { ErrorResponseSchema, RegistryResponseSchema } from '../schemas/responses.js';

const buildRegistryRoute = createRoute({
  method: 'post',
  path: '/',
  tags: ['Registry'],
  summary: 'Build a name registry',
  description: 'Collects the persons and entities in a token stream with their best known titles.',
  request: {
    body: {
      required: true,
      content: {
        'application/json': {
          schema: RegistryRequestSchema,
        },
      },
    },
  },
  responses: {
    200: {
      description: 'Registry entries keyed by name',
      content: {
        'application/json': {
          schema: RegistryResponseSchema,
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

export function createRegistryRoutes(lookup: DescriptionLookup): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(buildRegistryRoute, async (c) => {
    const { tokens, allNames } = c.req.valid('json');
    const registry = await buildNameRegistry(tokens, lookup, { allNames });
    return c.json({ entries: Object.fromEntries(registry) }, 200);
  });

  return routes;
}
