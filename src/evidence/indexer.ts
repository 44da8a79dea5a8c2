import { GENERIC_SOURCE_LABEL } from '../config/constants';
import { deriveTokens } from '../claims/tokens';
import { RESEARCH_DATA_SCHEMA, type ResearchData } from '../schemas/research-schemas';
import { debug } from '../output/logger';
import { EvidenceType, type EvidenceItem, type EvidenceTypeName } from './types';

export interface IndexOptions {
  maxKeywords?: number;
}

/**
 * Normalizes an unknown research bundle. Missing or malformed fields become
 * empty lists; it never throws.
 */
export function normalizeResearchData(raw: unknown): ResearchData {
  return RESEARCH_DATA_SCHEMA.parse(raw);
}

/*
 * Source of a freestanding statistic or quote: the first source of the first
 * answer quoting it, then the bundle's own first source.
 */
function resolveSnippetSource(text: string, research: ResearchData): string {
  const origin = research.results.find(
    (r) => r.answer !== undefined && r.answer.includes(text) && r.sources.length > 0
  );
  return origin?.sources[0] ?? research.sources[0] ?? GENERIC_SOURCE_LABEL;
}

function resolveResultSource(result: ResearchData['results'][number], research: ResearchData): string {
  return result.sources[0] ?? research.sources[0] ?? (result.query || GENERIC_SOURCE_LABEL);
}

/**
 * Builds the evidence pool for one invocation: one item per statistic, per
 * expert quote and per answered query, in that order. Items carry the same
 * token profile as claims. No deduplication happens here; matching picks the
 * single best item anyway.
 */
export function indexEvidence(research: ResearchData, options: IndexOptions = {}): EvidenceItem[] {
  const item = (text: string, type: EvidenceTypeName, source: string): EvidenceItem => ({
    text,
    type,
    source,
    ...deriveTokens(text, options.maxKeywords),
  });

  const pool: EvidenceItem[] = [
    ...research.statistics.map((s) =>
      item(s, EvidenceType.STATISTIC, resolveSnippetSource(s, research))
    ),
    ...research.expertQuotes.map((q) =>
      item(q, EvidenceType.EXPERT_OPINION, resolveSnippetSource(q, research))
    ),
  ];

  for (const result of research.results) {
    if (result.answer === undefined || !result.answer.trim()) continue;
    pool.push({
      ...item(result.answer, EvidenceType.RESEARCH_FINDING, resolveResultSource(result, research)),
      ...(result.query ? { query: result.query } : {}),
    });
  }

  debug(`Indexed ${pool.length} evidence item(s)`);
  return pool;
}
