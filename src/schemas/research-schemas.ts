import { z } from 'zod';

/*
 * Research bundles come from an upstream generation pipeline and are only
 * loosely structured. Every field degrades to an empty value instead of
 * failing, so a malformed bundle behaves like a bundle without evidence.
 */

const STRING_LIST_SCHEMA = z
  .array(z.unknown())
  .catch([])
  .transform((items) =>
    items.filter((item): item is string => typeof item === 'string' && item.trim().length > 0)
  );

const RESEARCH_RESULT_SCHEMA = z.object({
  query: z.string().catch(''),
  answer: z.string().optional().catch(undefined),
  sources: STRING_LIST_SCHEMA,
});

const RESEARCH_RESULT_LIST_SCHEMA = z
  .array(z.unknown())
  .catch([])
  .transform((items) =>
    items.flatMap((item) => {
      const parsed = RESEARCH_RESULT_SCHEMA.safeParse(item);
      return parsed.success ? [parsed.data] : [];
    })
  );

export const RESEARCH_DATA_SCHEMA = z.preprocess(
  (data: unknown) => {
    if (typeof data !== 'object' || data === null || Array.isArray(data)) {
      return {};
    }
    // The research stage writes snake_case keys
    if (!('expertQuotes' in data) && 'expert_quotes' in data) {
      return { ...data, expertQuotes: data.expert_quotes };
    }
    return data;
  },
  z.object({
    statistics: STRING_LIST_SCHEMA,
    expertQuotes: STRING_LIST_SCHEMA,
    results: RESEARCH_RESULT_LIST_SCHEMA,
    sources: STRING_LIST_SCHEMA,
  })
);

// Inferred types
export type ResearchData = z.infer<typeof RESEARCH_DATA_SCHEMA>;
export type ResearchResult = z.infer<typeof RESEARCH_RESULT_SCHEMA>;
