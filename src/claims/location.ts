export interface Location {
  line: number; // 1-based
  column: number; // 1-based
}

export const DEFAULT_SECTION = 'introduction';

const HEADING_PATTERN = /^#{1,6}\s+(.+?)\s*#*\s*$/gm;

export function computeLineCol(text: string, index: number): Location {
  let line = 1;
  let lastBreak = -1;
  for (let i = 0; i < index; i++) {
    // check for new line character \n
    if (text.charCodeAt(i) === 10) {
      line++;
      lastBreak = i;
    }
  }
  const column = index - lastBreak;
  return { line, column };
}

/**
 * Name of the section a position falls in: the nearest heading before it,
 * lower-cased. Text before the first heading belongs to "introduction".
 */
export function sectionAt(text: string, position: number): string {
  let section = DEFAULT_SECTION;
  for (const m of text.matchAll(HEADING_PATTERN)) {
    if (m.index === undefined || m.index > position) break;
    if (m[1]) section = m[1].trim().toLowerCase();
  }
  return section;
}

/**
 * True when the position sits on a markdown heading line.
 */
export function isHeadingLine(text: string, position: number): boolean {
  const lineStart = text.lastIndexOf('\n', position - 1) + 1;
  return /^\s{0,3}#{1,6}\s/.test(text.slice(lineStart, lineStart + 10));
}
