import { CitationStyle, type CitationEntry, type CitationStyleName } from './types';

const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

function monthName(date: Date): string {
  return MONTH_NAMES[date.getUTCMonth()] ?? '';
}

// "October 05, 2026"
function longDate(date: Date): string {
  return `${monthName(date)} ${pad2(date.getUTCDate())}, ${date.getUTCFullYear()}`;
}

// "05 Oct 2026"
function shortDate(date: Date): string {
  return `${pad2(date.getUTCDate())} ${monthName(date).slice(0, 3)} ${date.getUTCFullYear()}`;
}

export function isoDate(date: Date): string {
  return `${date.getUTCFullYear()}-${pad2(date.getUTCMonth() + 1)}-${pad2(date.getUTCDate())}`;
}

export function isUrl(source: string): boolean {
  return /^https?:\/\//i.test(source);
}

/**
 * Host of a URL without "www.", each alphabetic run capitalized:
 * "https://www.example.co.uk/a" -> "Example.Co.Uk".
 */
export function displayDomain(url: string): string {
  let host: string;
  try {
    host = new URL(url).hostname;
  } catch {
    host = url.replace(/^https?:\/\//i, '').split('/')[0] ?? url;
  }
  return host
    .replace(/^www\./i, '')
    .replace(/[a-z]+/gi, (w) => w.charAt(0).toUpperCase() + w.slice(1).toLowerCase());
}

type Formatter = (source: string, accessed: Date) => string;

const URL_FORMATTERS: Record<CitationStyleName, Formatter> = {
  [CitationStyle.APA]: (url, d) => `${displayDomain(url)}. Retrieved ${longDate(d)}, from ${url}`,
  [CitationStyle.MLA]: (url, d) => `"${displayDomain(url)}." Web. ${shortDate(d)}.`,
  [CitationStyle.CHICAGO]: (url, d) => `${displayDomain(url)}, accessed ${longDate(d)}, ${url}.`,
};

const LABEL_FORMATTERS: Record<CitationStyleName, Formatter> = {
  [CitationStyle.APA]: (label, d) => `${label}. (${d.getUTCFullYear()}). Research data.`,
  [CitationStyle.MLA]: (label, d) => `"${label}." Research Data, ${d.getUTCFullYear()}.`,
  [CitationStyle.CHICAGO]: (label, d) => `${label}, Research Data (${d.getUTCFullYear()}).`,
};

/**
 * Bibliography entry for one source key in the given style.
 */
export function formatCitation(
  source: string,
  id: number,
  style: CitationStyleName,
  accessed: Date
): CitationEntry {
  const url = isUrl(source) ? source : null;
  const formatter = url ? URL_FORMATTERS[style] : LABEL_FORMATTERS[style];
  return {
    id,
    source,
    formatted: formatter(source, accessed),
    url,
    accessed: isoDate(accessed),
    style,
  };
}

export function isCitationStyle(value: string): value is CitationStyleName {
  return Object.values<string>(CitationStyle).includes(value);
}
