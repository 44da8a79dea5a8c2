import type { Command } from 'commander';
import { writeFileSync } from 'fs';
import * as path from 'path';
import { parseCiteOptions } from '../boundaries/cli-parser';
import { addCitations } from '../citations/citation-renderer';
import type { CitationResult } from '../citations/types';
import { handleUnknownError } from '../errors/index';
import { JsonFormatter } from '../output/json-formatter';
import { debug } from '../output/logger';
import { printCitationReport, printFileHeader } from '../output/reporter';
import { prepareRun } from './run-context';
import { CommandName, OutputFormat } from './types';

/*
 * Registers the 'cite' command with Commander.
 * Adds citation markers and a references section to a document.
 *
 * Note: process.exit is intentional in CLI commands to set proper exit codes.
 */
export function registerCiteCommand(program: Command): void {
  program
    .command(CommandName.Cite)
    .description('Insert inline citations and a references section')
    .argument('<file>', 'markdown or text document to cite')
    .requiredOption('-r, --research <path>', 'research data JSON file')
    .option('-s, --style <style>', 'citation style: apa (default), mla, or chicago', 'apa')
    .option('--out <path>', 'write the cited document to this file')
    .option('--output <format>', 'output format: line (default) or json', 'line')
    .option('--config <path>', 'path to a custom .claimcite.yaml config file')
    .option('-v, --verbose', 'enable verbose logging')
    .action((file: string, rawOpts: unknown) => {
      let options;
      try {
        options = parseCiteOptions(rawOpts);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Parsing cite command options');
        console.error(`Error: ${err.message}`);
        process.exit(1);
      }

      let context;
      try {
        context = prepareRun(file, options);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Preparing citation run');
        console.error(`Error: ${err.message}`);
        process.exit(1);
      }

      const result = addCitations(context.content, context.research, options.style, {
        config: context.config,
      });

      if (options.out) {
        const outPath = path.resolve(process.cwd(), options.out);
        try {
          writeFileSync(outPath, result.citedContent, 'utf-8');
          debug(`Wrote cited document to ${outPath}`);
        } catch (e: unknown) {
          const err = handleUnknownError(e, 'Writing cited document');
          console.error(`Error: failed to write ${outPath}: ${err.message}`);
          process.exit(1);
        }
      }

      if (options.output === OutputFormat.Json) {
        const formatter = new JsonFormatter<CitationResult>(CommandName.Cite, context.relFile);
        console.log(formatter.toJson(result));
      } else {
        if (!options.out) {
          console.log(result.citedContent);
          console.log('');
        }
        printFileHeader(context.relFile);
        printCitationReport(result);
      }

      process.exit(result.metadata.error ? 1 : 0);
    });
}
