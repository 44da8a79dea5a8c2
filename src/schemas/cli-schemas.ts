import { z } from 'zod';
import { CitationStyle } from '../citations/types';
import { OutputFormat } from '../cli/types';

// Options shared by every command
const COMMON_OPTIONS_SCHEMA = z.object({
  verbose: z.boolean().default(false),
  output: z.nativeEnum(OutputFormat).default(OutputFormat.Line),
  config: z.string().optional(),
  research: z.string().min(1, 'a research data file is required (--research <file>)'),
});

export const CITE_OPTIONS_SCHEMA = COMMON_OPTIONS_SCHEMA.extend({
  style: z
    .enum([CitationStyle.APA, CitationStyle.MLA, CitationStyle.CHICAGO])
    .default(CitationStyle.APA),
  out: z.string().optional(),
});

export const VERIFY_OPTIONS_SCHEMA = COMMON_OPTIONS_SCHEMA.extend({
  failUnder: z.coerce.number().min(0).max(1).optional(),
});

// Inferred types
export type CiteOptions = z.infer<typeof CITE_OPTIONS_SCHEMA>;
export type VerifyOptions = z.infer<typeof VERIFY_OPTIONS_SCHEMA>;
