import axios, { isAxiosError } from 'axios';
import { z } from 'zod';
import { createChildLogger } from '@spurn/shared/src/logger.js';
import { ConfigurationError, ServiceUnavailableError } from '@spurn/shared/src/utils/errors.js';
import type { SearchTerm } from '@spurn/shared/src/types/query.types.js';
import type { SimilarityClient, SimilarityResult } from './types.js';

const log = createChildLogger('similarity:client');

export interface SimilarityClientConfig {
  readonly baseUrl?: string;
  readonly timeoutMs: number;
}

const SimilarityResponseSchema = z.object({
  weights: z.array(z.number()).optional(),
  articles: z
    .array(
      z.object({
        uuid: z.string(),
        heading: z.string(),
        ts: z.string(),
        domain: z.string(),
        url: z.string(),
        similarity: z.number(),
      }),
    )
    .default([]),
});

export function createSimilarityClient(config: SimilarityClientConfig): SimilarityClient {
  const { baseUrl, timeoutMs } = config;

  if (!baseUrl) {
    throw new ConfigurationError('Similarity service URL is required for SimilarityClient');
  }

  log.info({ baseUrl, timeoutMs }, 'Creating similarity client');

  const http = axios.create({ baseURL: baseUrl, timeout: timeoutMs });

  return {
    async listSimilarToTerms(terms: readonly SearchTerm[], limit: number): Promise<SimilarityResult> {
      log.debug({ termCount: terms.length, limit }, 'Querying similarity service');

      try {
        const response = await http.post<unknown>('/similar', {
          terms: terms.map((t) => [t.stem, t.category]),
          limit,
        });
        const parsed = SimilarityResponseSchema.safeParse(response.data);
        if (!parsed.success) {
          log.warn({ issues: parsed.error.errors.length }, 'Malformed similarity response');
          return { articles: [] };
        }
        return parsed.data;
      } catch (error) {
        if (isAxiosError(error)) {
          throw new ServiceUnavailableError(
            `Unable to connect to the similarity server: ${error.message}`,
            'similarity',
            error,
          );
        }
        throw error;
      }
    },
  };
}
