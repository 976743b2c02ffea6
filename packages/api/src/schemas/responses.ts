import { z } from '@hono/zod-openapi';

export const ErrorResponseSchema = z
  .object({
    error: z.string(),
    code: z.string(),
    requestId: z.string(),
    details: z.array(z.string()).optional(),
  })
  .openapi('ErrorResponse');

// Health
export const HealthResponseSchema = z
  .object({
    status: z.string(),
    version: z.string(),
  })
  .openapi('HealthResponse');

// Queries
export const QueryResponseSchema = z
  .object({
    text: z.string(),
    status: z.enum(['unresolved', 'answered', 'errored']),
    qtype: z.string().nullable(),
    key: z.string().nullable(),
    answer: z.unknown(),
    voiceAnswer: z.string().nullable(),
    error: z.string().nullable(),
    expires: z.string().nullable(),
  })
  .openapi('QueryResponse');

export type QueryResponse = z.infer<typeof QueryResponseSchema>;

// Registry
const RegistryEntrySchema = z.union([
  z.object({ kind: z.enum(['name', 'entity']), title: z.string().nullable() }),
  z.object({ kind: z.literal('ref'), fullname: z.string() }),
]);

export const RegistryResponseSchema = z
  .object({
    entries: z.record(RegistryEntrySchema),
  })
  .openapi('RegistryResponse');
