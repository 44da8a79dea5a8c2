import chalk from 'chalk';
import stripAnsi from 'strip-ansi';
import path from 'path';
import { ClaimStatus, type ClaimStatusName } from '../scoring/types';
import { computeLineCol } from '../claims/location';
import type { CitationResult } from '../citations/types';
import type { VerificationReport } from '../verification/types';
import { log } from './logger';

export type RowStatus = ClaimStatusName | 'uncited';

function statusLabel(status: RowStatus): string {
  switch (status) {
    case ClaimStatus.VERIFIED:
      return chalk.green('verified');
    case ClaimStatus.NEEDS_REVIEW:
      return chalk.yellow('review');
    case ClaimStatus.UNSUPPORTED:
      return chalk.red('unsupported');
    case 'uncited':
      return chalk.yellow('uncited');
  }
}

export function formatPercent(value: number): string {
  return `${Math.round(value * 1000) / 10}%`;
}

// Greedy word wrap; an empty input yields one empty line
export function wrapWords(text: string, width: number): string[] {
  const words = text.split(/\s+/).filter(Boolean);
  const lines: string[] = [];
  let current = '';
  for (const w of words) {
    if (stripAnsi(current).length + (current ? 1 : 0) + w.length > width) {
      if (current) lines.push(current);
      current = w;
    } else {
      current = current ? `${current} ${w}` : w;
    }
  }
  if (current) lines.push(current);
  if (lines.length === 0) lines.push('');
  return lines;
}

export function printFileHeader(fileRelPath: string): void {
  const absPath = path.resolve(process.cwd(), fileRelPath);
  // OSC 8 hyperlink
  const link = `\u001B]8;;file://${absPath}\u0007${fileRelPath}\u001B]8;;\u0007`;
  log(chalk.underline(link));
}

export function printClaimRow(
  loc: string,
  status: RowStatus,
  summary: string,
  label: string,
  opts: { locWidth?: number; statusWidth?: number; messageWidth?: number; note?: string } = {}
): void {
  const locWidth = opts.locWidth ?? 7;
  const statusWidth = opts.statusWidth ?? 12;

  // Keep the label column on the same row on narrow terminals
  const termCols = process.stdout.columns || 100;
  const prefixOverhead = locWidth + statusWidth + 4;
  const labelColumnBuffer = 25;
  const messageWidth =
    opts.messageWidth ?? Math.max(40, termCols - prefixOverhead - labelColumnBuffer);

  const locCell = loc.padEnd(locWidth, ' ');
  const colored = statusLabel(status);
  const pad = Math.max(0, statusWidth - stripAnsi(colored).length);
  const prefix = `  ${locCell} ${colored}${' '.repeat(pad)}  `;
  const contPrefix = ' '.repeat(stripAnsi(prefix).length);

  const [first = '', ...rest] = wrapWords(summary, messageWidth);
  log(`${prefix}${first.padEnd(messageWidth, ' ')}  ${chalk.dim(label)}`);
  for (const line of rest) {
    log(`${contPrefix}${line}`);
  }
  if (opts.note) {
    for (const line of wrapWords(opts.note, messageWidth)) {
      log(`${contPrefix}${chalk.dim(line)}`);
    }
  }
}

export function printCitationReport(result: CitationResult): void {
  const { metadata } = result;
  for (const claim of result.uncitedClaims) {
    printClaimRow('—:—', 'uncited', claim.text, claim.type, { note: claim.reason });
  }
  if (result.uncitedClaims.length > 0) log('');

  const okMark = metadata.error ? chalk.red('✖') : chalk.green('✓');
  const citeTxt = result.citationCount === 1 ? '1 citation' : `${result.citationCount} citations`;
  const sourceTxt =
    result.bibliography.length === 1 ? '1 source' : `${result.bibliography.length} sources`;
  log(
    `${okMark} ${chalk.bold(citeTxt)} from ${sourceTxt} (${metadata.citationStyle}); ` +
      `${metadata.claimsWithSources}/${metadata.totalClaimsIdentified} claims matched, ` +
      `success rate ${formatPercent(metadata.successRate)}`
  );
  if (metadata.noResearchData) {
    log(chalk.yellow('  No research data provided; content left unchanged.'));
  }
  if (metadata.error) {
    log(chalk.red(`  ${metadata.error}`));
  }
}

function colorScore(score: number, threshold: number): string {
  const text = formatPercent(score);
  if (score >= threshold) return chalk.green(text);
  if (score >= threshold / 2) return chalk.yellow(text);
  return chalk.red(text);
}

export function printVerificationReport(report: VerificationReport, content: string): void {
  for (const claim of report.verifiedClaims) {
    const { line, column } = computeLineCol(content, claim.start);
    const loc = `${line}:${column}`;
    const label = `${claim.type} ${claim.confidence.toFixed(2)}`;
    const opts = claim.supportingSource ? { note: `source: ${claim.supportingSource}` } : {};
    printClaimRow(loc, claim.status, claim.text, label, opts);
  }
  if (report.verifiedClaims.length > 0) log('');

  const { statistics, metadata } = report;
  const okMark = statistics.unsupported === 0 && !metadata.error ? chalk.green('✓') : chalk.red('✖');
  log(
    `${okMark} ${chalk.green(`${statistics.verified} verified`)}, ` +
      `${chalk.yellow(`${statistics.needsReview} needs review`)}, ` +
      `${chalk.red(`${statistics.unsupported} unsupported`)} of ${statistics.totalClaims} claims`
  );
  log(
    `  Accuracy: ${chalk.bold(colorScore(report.accuracyScore, metadata.confidenceThreshold))}`
  );

  if (report.recommendations.length > 0) {
    log(chalk.bold('\nRecommendations:'));
    for (const rec of report.recommendations) {
      log(`  - ${rec}`);
    }
  }
}
