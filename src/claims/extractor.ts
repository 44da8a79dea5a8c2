import { DEFAULT_ENGINE_CONFIG, type ExtractionSettings } from '../schemas/config-schemas';
import { debug } from '../output/logger';
import { CLAIM_RULES, ruleMatches, splitFragments } from './patterns';
import { deriveTokens } from './tokens';
import { isHeadingLine, sectionAt } from './location';
import {
  ExtractionMode,
  type Claim,
  type ClaimRule,
  type ExtractionModeName,
} from './types';

export interface ExtractOptions {
  mode?: ExtractionModeName;
  settings?: ExtractionSettings;
  rules?: readonly ClaimRule[];
}

interface Span {
  text: string;
  start: number;
  end: number;
}

interface Candidate extends Span {
  rule: ClaimRule;
}

// Fragments that carry no claim on their own
const BOILERPLATE_PATTERNS = [
  /^\d+\.\s*$/, // numbered list marker
  /^[•\-*]\s*$/, // bullet
  /^\([^)]*\)$/, // parenthetical
  /^\[[^\]]*\]$/, // bracketed
];

const EVIDENTIARY_WORDS = ['study', 'research', 'report', 'analysis', 'found', 'shows', 'indicates'];

// Markdown markers that may lead a fragment: quote, bullet, emphasis, heading
const LEADING_MARKERS = /^[\s>#*•\-]+/;

/*
 * Narrows a fragment to its content: drops leading markdown markers and
 * surrounding whitespace while keeping offsets in document coordinates.
 */
function trimFragment(raw: string, offset: number): Span | null {
  const lead = raw.match(LEADING_MARKERS)?.[0].length ?? 0;
  const body = raw.slice(lead).trimEnd();
  if (!body) return null;
  const start = offset + lead;
  return { text: body, start, end: start + body.length };
}

export function isValidClaim(
  text: string,
  bounds: { minLength: number; maxLength: number },
  minWords: number
): boolean {
  if (text.length < bounds.minLength || text.length > bounds.maxLength) return false;
  if (BOILERPLATE_PATTERNS.some((p) => p.test(text))) return false;
  if (text.split(/\s+/).filter(Boolean).length < minWords) return false;

  const hasNumber = /\d/.test(text);
  const lower = text.toLowerCase();
  const hasKeyword = EVIDENTIARY_WORDS.some((w) => lower.includes(w));
  return hasNumber || hasKeyword;
}

/**
 * Extracts verifiable claims from a document.
 *
 * The document is split into sentence fragments once, and every rule is
 * tested against each fragment; a hit makes the whole fragment a candidate.
 * Candidates are validated, then deduplicated by position: a candidate
 * starting within `dedupWindow` characters of an accepted claim is dropped,
 * so the rule registered first keeps the position. The result is ordered by
 * offset, then priority, and ids are assigned in that order starting at 1.
 * Fragments outside the length bounds never reach the rules.
 */
export function extractClaims(document: string, options: ExtractOptions = {}): Claim[] {
  if (!document.trim()) return [];

  const mode = options.mode ?? ExtractionMode.FACT_CHECK;
  const settings = options.settings ?? DEFAULT_ENGINE_CONFIG.extraction;
  const rules = options.rules ?? CLAIM_RULES;
  const bounds = mode === ExtractionMode.CITATION ? settings.citation : settings.factCheck;

  const spans: Span[] = [];
  for (const fragment of splitFragments(document)) {
    const span = trimFragment(fragment.text, fragment.start);
    if (!span) continue;
    if (span.text.length < bounds.minLength || span.text.length > bounds.maxLength) continue;
    if (isHeadingLine(document, span.start)) continue;
    spans.push(span);
  }

  const accepted: Candidate[] = [];
  for (const rule of rules) {
    for (const span of spans) {
      if (!ruleMatches(rule, span.text)) continue;
      if (accepted.some((a) => Math.abs(a.start - span.start) < settings.dedupWindow)) continue;
      if (!isValidClaim(span.text, bounds, settings.minWords)) continue;
      accepted.push({ ...span, rule });
    }
  }

  const ordered = [...accepted].sort(
    (a, b) => a.start - b.start || a.rule.priority - b.rule.priority
  );

  const claims = ordered.map((c, index): Claim => ({
    id: index + 1,
    text: c.text,
    type: c.rule.type,
    rule: c.rule.name,
    priority: c.rule.priority,
    start: c.start,
    end: c.end,
    location: sectionAt(document, c.start),
    ...deriveTokens(c.text, settings.maxKeywords),
  }));

  debug(`Extracted ${claims.length} ${mode} claim(s)`);
  return claims;
}
