import { z } from 'zod';
import { QUERY_TYPES } from '@spurn/shared/src/types/query.types.js';

export const SearchTermSchema = z.object({
  stem: z.string().min(1),
  category: z.string().min(1),
});

export const QueryTokenSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('person'),
    text: z.string(),
    names: z.array(
      z.object({
        name: z.string().min(1),
        gender: z.string().optional(),
        case: z.string().optional(),
      }),
    ),
  }),
  z.object({ kind: z.literal('entity'), text: z.string().min(1) }),
  z.object({ kind: z.literal('word'), text: z.string(), stems: z.array(SearchTermSchema).optional() }),
  z.object({ kind: z.literal('punctuation'), text: z.string() }),
]);

export const ParseResultSchema = z.object({
  qtype: z.enum(QUERY_TYPES).optional(),
  qkey: z.string().optional(),
});

export const QueryInputSchema = z.object({
  text: z.string().min(1),
  parse: ParseResultSchema.optional(),
  tokens: z.array(QueryTokenSchema).default([]),
});

export type QueryInput = z.infer<typeof QueryInputSchema>;

const CorpusArticleSchema = z.object({
  id: z.string().min(1),
  heading: z.string(),
  timestamp: z.coerce.date(),
  domain: z.string().min(1),
  url: z.string(),
  visible: z.boolean().default(true),
  names: z.array(z.string()).default([]),
});

export const CorpusSeedSchema = z.object({
  articles: z.array(CorpusArticleSchema),
  persons: z.array(
    z.object({ name: z.string().min(1), title: z.string(), articleId: z.string().min(1) }),
  ),
  entities: z.array(
    z.object({
      name: z.string().min(1),
      verb: z.string().default('er'),
      definition: z.string(),
      articleId: z.string().min(1),
    }),
  ),
  words: z
    .array(
      z.object({
        stem: z.string().min(1),
        articleCount: z.number().int().min(0),
        related: z.array(
          z.object({ stem: z.string().min(1), category: z.string().min(1), count: z.number().int() }),
        ),
      }),
    )
    .default([]),
  /** Declension entries for the in-memory morphology lookup. */
  lexicon: z
    .array(
      z.object({
        nominative: z.string().min(1),
        accusative: z.string().min(1),
        dative: z.string().min(1),
        genitive: z.string().min(1),
      }),
    )
    .default([]),
});

export type CorpusSeed = z.infer<typeof CorpusSeedSchema>;
