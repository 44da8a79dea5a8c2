import * as path from 'path';
import { loadEngineConfig } from '../boundaries/config-loader';
import { applyEnvironmentOverrides, parseEnvironment } from '../boundaries/env-parser';
import { loadDocument, loadResearchData } from '../boundaries/input-loader';
import type { EngineConfig } from '../schemas/config-schemas';
import { setSilentMode, setVerboseMode } from '../output/logger';
import { OutputFormat } from './types';

export interface SharedOptions {
  verbose: boolean;
  output: OutputFormat;
  config?: string | undefined;
  research: string;
}

export interface RunContext {
  config: EngineConfig;
  content: string;
  research: unknown;
  relFile: string;
}

/**
 * Everything a command needs before running the engine: logger modes,
 * merged configuration, the document and the research bundle.
 * Throws on the first boundary failure.
 */
export function prepareRun(file: string, options: SharedOptions, cwd: string = process.cwd()): RunContext {
  // JSON output must stay machine-readable
  setSilentMode(options.output === OutputFormat.Json);
  setVerboseMode(options.verbose);

  const fileConfig = loadEngineConfig(cwd, options.config);
  const config = applyEnvironmentOverrides(fileConfig, parseEnvironment(process.env));

  const absFile = path.resolve(cwd, file);
  return {
    config,
    content: loadDocument(absFile),
    research: loadResearchData(path.resolve(cwd, options.research)),
    relFile: path.relative(cwd, absFile) || file,
  };
}
