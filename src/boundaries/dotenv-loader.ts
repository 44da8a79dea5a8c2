import { readFileSync, existsSync } from 'fs';
import * as path from 'path';
import { handleUnknownError } from '../errors/index';
import { warn } from '../output/logger';

// Most specific first
const DOTENV_FILES = ['.env.local', '.env'];

const ASSIGNMENT = /^([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/;

function unquote(value: string): string {
  const quoted = /^(["'])(.*)\1$/.exec(value);
  if (quoted) return quoted[2] ?? '';
  const comment = value.indexOf(' #');
  return comment === -1 ? value : value.slice(0, comment).trim();
}

/** Parses `KEY=value` lines; blank lines, comments and empty values are skipped. */
export function parseDotEnv(content: string): Map<string, string> {
  const entries = new Map<string, string>();
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;
    const match = ASSIGNMENT.exec(line);
    if (!match?.[1] || !match[2]) continue;
    entries.set(match[1], unquote(match[2]));
  }
  return entries;
}

/*
 * Best-effort: `.env.local` overrides `.env`, and variables already set in
 * the environment override both. Unreadable files are reported and skipped.
 */
export function loadDotEnv(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): void {
  for (const filename of DOTENV_FILES) {
    const full = path.resolve(cwd, filename);
    if (!existsSync(full)) continue;
    try {
      for (const [key, value] of parseDotEnv(readFileSync(full, 'utf-8'))) {
        if (env[key] === undefined) env[key] = value;
      }
    } catch (e: unknown) {
      const err = handleUnknownError(e, `Loading ${filename}`);
      warn(err.message);
    }
  }
}
