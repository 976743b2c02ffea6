import { z } from 'zod';

const ServerConfigSchema = z.object({
  port: z.number().int().min(1).max(65535),
});

const CorpusConfigSchema = z.object({
  backend: z.enum(['memory', 'firestore']),
  gcpProjectId: z.string().min(1).optional(),
  /** JSON fixture loaded into the in-memory corpus at startup. */
  seedFile: z.string().min(1).optional(),
});

const SimilarityConfigSchema = z.object({
  baseUrl: z.string().url().optional(),
  timeoutMs: z.number().int().positive().default(5000),
});

const MorphologyConfigSchema = z.object({
  baseUrl: z.string().url().optional(),
  timeoutMs: z.number().int().positive().default(5000),
});

const AnswersConfigSchema = z.object({
  plainTextTtlHours: z.number().positive().default(24),
});

export const ServiceConfigSchema = z.object({
  $schema: z.string().optional(),
  name: z.string().min(1),
  version: z.string().regex(/^\d+\.\d+\.\d+$/),
  server: ServerConfigSchema,
  corpus: CorpusConfigSchema,
  similarity: SimilarityConfigSchema,
  morphology: MorphologyConfigSchema,
  answers: AnswersConfigSchema,
});

export type ServiceConfig = z.infer<typeof ServiceConfigSchema>;
export type CorpusConfig = z.infer<typeof CorpusConfigSchema>;
export type SimilarityConfig = z.infer<typeof SimilarityConfigSchema>;
export type MorphologyConfig = z.infer<typeof MorphologyConfigSchema>;
