import type { Command } from 'commander';
import chalk from 'chalk';
import { parseVerifyOptions } from '../boundaries/cli-parser';
import { verifyFacts } from '../verification/fact-check-reporter';
import type { VerificationReport } from '../verification/types';
import { handleUnknownError } from '../errors/index';
import { JsonFormatter } from '../output/json-formatter';
import { printFileHeader, printVerificationReport, formatPercent } from '../output/reporter';
import { prepareRun } from './run-context';
import { CommandName, OutputFormat } from './types';

// Exit status for a finished run: 1 on an internal error or a score under the gate
export function verifyExitCode(report: VerificationReport, failUnder?: number): number {
  if (report.metadata.error) return 1;
  if (failUnder !== undefined && report.accuracyScore < failUnder) return 1;
  return 0;
}

/*
 * Registers the 'verify' command with Commander.
 * Fact-checks a document against research data and reports an accuracy score.
 *
 * Note: process.exit is intentional in CLI commands to set proper exit codes.
 */
export function registerVerifyCommand(program: Command): void {
  program
    .command(CommandName.Verify)
    .description('Fact-check claims against research data')
    .argument('<file>', 'markdown or text document to verify')
    .requiredOption('-r, --research <path>', 'research data JSON file')
    .option('--fail-under <score>', 'exit with status 1 when accuracy is below this value (0-1)')
    .option('--output <format>', 'output format: line (default) or json', 'line')
    .option('--config <path>', 'path to a custom .claimcite.yaml config file')
    .option('-v, --verbose', 'enable verbose logging')
    .action((file: string, rawOpts: unknown) => {
      let options;
      try {
        options = parseVerifyOptions(rawOpts);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Parsing verify command options');
        console.error(`Error: ${err.message}`);
        process.exit(1);
      }

      let context;
      try {
        context = prepareRun(file, options);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Preparing verification run');
        console.error(`Error: ${err.message}`);
        process.exit(1);
      }

      const report = verifyFacts(context.content, context.research, { config: context.config });

      if (options.output === OutputFormat.Json) {
        const formatter = new JsonFormatter<VerificationReport>(CommandName.Verify, context.relFile);
        console.log(formatter.toJson(report));
      } else {
        printFileHeader(context.relFile);
        printVerificationReport(report, context.content);
        if (options.failUnder !== undefined && report.accuracyScore < options.failUnder) {
          console.log(
            chalk.red(
              `\n✖ Accuracy ${formatPercent(report.accuracyScore)} is below the required ${formatPercent(options.failUnder)}`
            )
          );
        }
      }

      process.exit(verifyExitCode(report, options.failUnder));
    });
}
