import { REFERENCES_HEADING } from '../config/constants';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../schemas/config-schemas';
import { extractClaims } from '../claims/extractor';
import { ExtractionMode } from '../claims/types';
import { indexEvidence, normalizeResearchData } from '../evidence/indexer';
import { bestMatch } from '../scoring/matcher';
import { handleUnknownError } from '../errors/index';
import { debug, warn, error as logError } from '../output/logger';
import { formatCitation } from './styles';
import {
  CitationStyle,
  UncitedReason,
  type CitationEntry,
  type CitationMetadata,
  type CitationResult,
  type CitationStyleName,
  type UncitedClaim,
} from './types';

export interface CitationOptions {
  config?: EngineConfig;
  // Clock for access dates
  now?: () => Date;
}

export interface MarkerInsertion {
  position: number;
  marker: string;
}

/**
 * Where a marker for a claim ending at `end` goes: before the sentence
 * terminator that follows it on the same line, or at `end` when the line
 * ends first.
 */
export function findInsertionPoint(content: string, end: number): number {
  for (let i = end; i < content.length; i++) {
    const ch = content[i];
    if (ch === '\n') return end;
    if (ch === '.' || ch === '!' || ch === '?') return i;
  }
  return end;
}

/**
 * Inserts markers without mutating offsets of the ones still pending: the
 * insertions are applied right to left, each producing a new string. Markers
 * sharing a position keep their given order; an identical marker at the same
 * position is inserted once.
 */
export function insertMarkers(content: string, insertions: MarkerInsertion[]): string {
  const seen = new Set<string>();
  const unique = insertions.filter((ins) => {
    const key = `${ins.position}:${ins.marker}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
  const ordered = [...unique].sort((a, b) => a.position - b.position);
  return ordered.reduceRight(
    (text, ins) => text.slice(0, ins.position) + ins.marker + text.slice(ins.position),
    content
  );
}

export function formatReferencesSection(bibliography: CitationEntry[]): string {
  if (bibliography.length === 0) return '';
  const lines = [...bibliography]
    .sort((a, b) => a.id - b.id)
    .map((entry) => `${entry.id}. ${entry.formatted}\n`);
  return `\n\n${REFERENCES_HEADING}\n\n${lines.join('')}`;
}

function emptyResult(
  content: string,
  style: CitationStyleName,
  startedAt: number,
  extra: Pick<CitationMetadata, 'noResearchData'> | Pick<CitationMetadata, 'error'>
): CitationResult {
  return {
    citedContent: content,
    bibliography: [],
    citationCount: 0,
    uncitedClaims: [],
    metadata: {
      processingTimeSeconds: (Date.now() - startedAt) / 1000,
      totalClaimsIdentified: 0,
      claimsWithSources: 0,
      citationStyle: style,
      successRate: 0,
      ...extra,
    },
  };
}

/**
 * Adds inline citation markers and a references section to an article.
 *
 * Claims whose best evidence clears the citation confidence threshold get the
 * number of that evidence's source key; claims sharing a source share its
 * number. Numbers are handed out in document order starting at 1. Never
 * throws: an empty research bundle or an internal failure returns the
 * content unchanged with a flag or an error in the metadata.
 */
export function addCitations(
  content: string,
  researchData: unknown,
  style: CitationStyleName = CitationStyle.APA,
  options: CitationOptions = {}
): CitationResult {
  const startedAt = Date.now();
  const config = options.config ?? DEFAULT_ENGINE_CONFIG;
  const now = options.now ?? ((): Date => new Date());

  try {
    const research = normalizeResearchData(researchData);
    const pool = indexEvidence(research, { maxKeywords: config.extraction.maxKeywords });
    if (pool.length === 0) {
      warn('No research data available for citations');
      return emptyResult(content, style, startedAt, { noResearchData: true });
    }

    const claims = extractClaims(content, {
      mode: ExtractionMode.CITATION,
      settings: config.extraction,
    });
    debug(`Identified ${claims.length} potential claim(s) for citation`);

    const accessed = now();
    const citationIds = new Map<string, number>();
    const bibliography: CitationEntry[] = [];
    const insertions: MarkerInsertion[] = [];
    const uncitedClaims: UncitedClaim[] = [];
    let claimsWithSources = 0;

    for (const claim of claims) {
      const match = bestMatch(claim, pool, {
        weights: config.weights,
        floor: config.thresholds.citationMatchFloor,
      });
      if (match) claimsWithSources++;

      if (!match || match.confidence <= config.thresholds.citationConfidence) {
        uncitedClaims.push({
          text: claim.text,
          type: claim.type,
          reason: match ? UncitedReason.LOW_CONFIDENCE : UncitedReason.NO_MATCH,
        });
        continue;
      }

      const key = match.evidence.source;
      let id = citationIds.get(key);
      if (id === undefined) {
        id = bibliography.length + 1;
        citationIds.set(key, id);
        bibliography.push(formatCitation(key, id, style, accessed));
      }
      insertions.push({ position: findInsertionPoint(content, claim.end), marker: ` [${id}]` });
    }

    const citedContent = insertMarkers(content, insertions) + formatReferencesSection(bibliography);
    debug(
      `Citation process completed: ${bibliography.length} source(s) cited, ${uncitedClaims.length} uncited claim(s)`
    );

    return {
      citedContent,
      bibliography,
      citationCount: bibliography.length,
      uncitedClaims,
      metadata: {
        processingTimeSeconds: (Date.now() - startedAt) / 1000,
        totalClaimsIdentified: claims.length,
        claimsWithSources,
        citationStyle: style,
        successRate: claims.length > 0 ? claimsWithSources / claims.length : 0,
      },
    };
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Adding citations');
    logError(`Error in citation process: ${err.message}`);
    return emptyResult(content, style, startedAt, { error: err.message });
  }
}
