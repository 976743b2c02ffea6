import { z } from '@hono/zod-openapi';
import { QueryInputSchema, QueryTokenSchema } from '@spurn/schemas/src/query.schema.js';

// Reuse the canonical query schema from @spurn/schemas to avoid drift
export const QueryRequestSchema = QueryInputSchema.openapi('QueryRequest');

export type QueryRequest = z.infer<typeof QueryRequestSchema>;

export const RegistryRequestSchema = z
  .object({
    tokens: z.array(QueryTokenSchema),
    allNames: z.boolean().optional().default(false),
  })
  .openapi('RegistryRequest');

export type RegistryRequest = z.infer<typeof RegistryRequestSchema>;
