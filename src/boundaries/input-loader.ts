import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { ALLOWED_EXTS } from '../config/constants';
import { ProcessingError, ValidationError, handleUnknownError } from '../errors/index';

function readText(filePath: string, stage: string): string {
  if (!existsSync(filePath)) {
    throw new ProcessingError(`File not found: ${filePath}`, stage);
  }
  try {
    return readFileSync(filePath, 'utf-8');
  } catch (e: unknown) {
    const err = handleUnknownError(e, `Reading ${filePath}`);
    throw new ProcessingError(`Failed to read ${filePath}: ${err.message}`, stage);
  }
}

export function loadDocument(filePath: string): string {
  const ext = path.extname(filePath).toLowerCase();
  if (!ALLOWED_EXTS.has(ext)) {
    throw new ValidationError(
      `Unsupported document type "${ext || filePath}". Expected one of: ${[...ALLOWED_EXTS].join(', ')}`
    );
  }
  return readText(filePath, 'document');
}

/**
 * Reads a research bundle. The payload stays `unknown`; the engine
 * normalizes whatever shape it finds.
 */
export function loadResearchData(filePath: string): unknown {
  const raw = readText(filePath, 'research');
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Parsing research data');
    throw new ValidationError(`Research data in ${filePath} is not valid JSON: ${err.message}`);
  }
}
