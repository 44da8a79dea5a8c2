import type { TokenProfile } from './types';

const STOP_WORDS = new Set([
  'the', 'and', 'but', 'for', 'with', 'from', 'about', 'into', 'through', 'during',
  'are', 'was', 'were', 'been', 'being', 'have', 'has', 'had', 'does', 'did',
  'will', 'would', 'could', 'should', 'may', 'might', 'this', 'that', 'these',
  'those', 'there', 'their', 'they', 'them', 'its', 'than', 'then', 'also',
  'which', 'who',
]);

const MONTHS = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
];

const SCALE_FACTORS: Record<string, number> = {
  k: 1e3,
  thousand: 1e3,
  million: 1e6,
  bn: 1e9,
  billion: 1e9,
};

// $ sign, integer part, fraction, then one of: scale word, percent, multiplier
const NUMBER_PATTERN =
  /(\$)?\b(\d{1,3}(?:,\d{3})+|\d+)(?:\.(\d+))?(?:\s*(billion|million|thousand|bn|k)\b|\s*(%|percent\b)|(x)\b)?/gi;
const YEAR_PATTERN = /\b(?:19|20)\d{2}\b/g;
const MONTH_YEAR_PATTERN = new RegExp(`\\b(?:${MONTHS.join('|')})\\s+(?:19|20)\\d{2}\\b`, 'gi');
const KEYWORD_PATTERN = /\b[a-z]{3,}\b/g;

function distinct(values: string[]): string[] {
  return Array.from(new Set(values));
}

/**
 * Extracts numeric tokens in a normalized form: thousands separators are
 * dropped, scale words are lower-cased and "percent" becomes "%".
 * "$1,200.50 Million" -> "$1200.50 million", "25 percent" -> "25%".
 */
export function extractNumbers(text: string): string[] {
  const found: string[] = [];
  for (const m of text.matchAll(NUMBER_PATTERN)) {
    const [, currency, integer, fraction, scale, percent, multiplier] = m;
    if (integer === undefined) continue;
    let token = `${currency ?? ''}${integer.replace(/,/g, '')}`;
    if (fraction !== undefined) token += `.${fraction}`;
    if (scale !== undefined) token += ` ${scale.toLowerCase()}`;
    else if (percent !== undefined) token += '%';
    else if (multiplier !== undefined) token += 'x';
    found.push(token);
  }
  return distinct(found);
}

/**
 * Numeric value of a normalized token with its scale word applied.
 * Units (% and x) are ignored. Returns null for anything unparseable.
 */
export function numericValue(token: string): number | null {
  const m = token.match(/^\$?(\d+(?:\.\d+)?)(?:\s+(billion|million|thousand|bn|k))?[%x]?$/i);
  if (!m || m[1] === undefined) return null;
  const base = Number(m[1]);
  if (!Number.isFinite(base)) return null;
  const factor = m[2] !== undefined ? SCALE_FACTORS[m[2].toLowerCase()] ?? 1 : 1;
  return base * factor;
}

/**
 * Years and "Month YYYY" phrases, in order of appearance.
 */
export function extractDates(text: string): string[] {
  const years = Array.from(text.matchAll(YEAR_PATTERN), (m) => m[0]);
  const monthYears = Array.from(text.matchAll(MONTH_YEAR_PATTERN), (m) =>
    m[0].replace(/\s+/g, ' ')
  );
  return distinct([...years, ...monthYears]);
}

/**
 * Distinct lower-case words of 3+ letters that are not stop words,
 * capped at maxKeywords in order of appearance.
 */
export function extractKeywords(text: string, maxKeywords: number = 10): string[] {
  const words = text.toLowerCase().match(KEYWORD_PATTERN) ?? [];
  return distinct(words.filter((w) => !STOP_WORDS.has(w))).slice(0, maxKeywords);
}

export function deriveTokens(text: string, maxKeywords?: number): TokenProfile {
  return {
    numbers: extractNumbers(text),
    dates: extractDates(text),
    keywords: extractKeywords(text, maxKeywords),
  };
}
