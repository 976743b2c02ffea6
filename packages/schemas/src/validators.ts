import type { ZodError } from 'zod';
import { SchemaValidationError } from '@spurn/shared/src/utils/errors.js';
import { ServiceConfigSchema } from './service-config.schema.js';
import type { ServiceConfig } from './service-config.schema.js';
import { CorpusSeedSchema, QueryInputSchema } from './query.schema.js';
import type { CorpusSeed, QueryInput } from './query.schema.js';

function formatZodErrors(error: ZodError): readonly string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

export function validateServiceConfig(data: unknown): ServiceConfig {
  const result = ServiceConfigSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid service configuration', formatZodErrors(result.error));
  }

  return result.data;
}

export function validateQueryInput(data: unknown): QueryInput {
  const result = QueryInputSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid query input', formatZodErrors(result.error));
  }

  return result.data;
}

export function validateCorpusSeed(data: unknown): CorpusSeed {
  const result = CorpusSeedSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid corpus seed', formatZodErrors(result.error));
  }

  return result.data;
}
