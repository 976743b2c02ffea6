import axios, { isAxiosError } from 'axios';
import { z } from 'zod';
import { createChildLogger } from '@spurn/shared/src/logger.js';
import { ConfigurationError, ServiceUnavailableError } from '@spurn/shared/src/utils/errors.js';
import type { DeclensionForms, MorphologyClient } from './types.js';

const log = createChildLogger('morphology:client');

export interface MorphologyClientConfig {
  readonly baseUrl?: string;
  readonly timeoutMs: number;
}

const DeclensionResponseSchema = z.object({
  found: z.boolean(),
  forms: z
    .object({
      nominative: z.string(),
      accusative: z.string(),
      dative: z.string(),
      genitive: z.string(),
    })
    .optional(),
});

export function createMorphologyClient(config: MorphologyClientConfig): MorphologyClient {
  const { baseUrl, timeoutMs } = config;

  if (!baseUrl) {
    throw new ConfigurationError('Morphology service URL is required for MorphologyClient');
  }

  log.info({ baseUrl, timeoutMs }, 'Creating morphology client');

  const http = axios.create({ baseURL: baseUrl, timeout: timeoutMs });

  return {
    async lookupDeclension(word: string): Promise<DeclensionForms | null> {
      log.debug({ word }, 'Looking up declension');

      let data: unknown;
      try {
        const response = await http.get<unknown>('/declension', { params: { word } });
        data = response.data;
      } catch (error) {
        if (isAxiosError(error)) {
          throw new ServiceUnavailableError(
            `Unable to connect to the morphology server: ${error.message}`,
            'morphology',
            error,
          );
        }
        throw error;
      }

      const parsed = DeclensionResponseSchema.safeParse(data);
      if (!parsed.success) {
        throw new ServiceUnavailableError('Malformed morphology response', 'morphology');
      }
      if (!parsed.data.found || !parsed.data.forms) {
        return null;
      }
      return parsed.data.forms;
    },
  };
}
