/**
 * Output Formatter
 *
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';
import type { StatsSnapshot } from '@hiresdl/acquisition';
import { formatElapsed, formatMebibytes } from '@hiresdl/utils';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${value}`);
}

export interface SessionSummary {
  title: string;
  rows: Array<[label: string, value: string]>;
}

/**
 * Summary of a finished session, or null when no track was processed
 */
export function buildSummary(
  stats: StatsSnapshot,
  elapsedMs: number,
  dryRun: boolean
): SessionSummary | null {
  const processed = stats.downloaded + stats.skippedArchive + stats.skippedExists + stats.failed;
  if (processed === 0) {
    return null;
  }

  return {
    title: dryRun ? 'Dry Run Summary' : 'Download Session Summary',
    rows: [
      ['Albums/playlists processed', String(stats.albumsProcessed.length)],
      [dryRun ? 'Would download' : 'Downloaded', String(stats.downloaded)],
      ['Skipped (archive)', String(stats.skippedArchive)],
      ['Skipped (exists)', String(stats.skippedExists)],
      ['Failed', String(stats.failed)],
      ['Total size', formatMebibytes(stats.bytes)],
      ['Elapsed', formatElapsed(elapsedMs)],
    ],
  };
}

export function printSummary(stats: StatsSnapshot, elapsedMs: number, dryRun: boolean): void {
  const summary = buildSummary(stats, elapsedMs, dryRun);
  if (!summary) {
    printInfo('No tracks were processed');
    return;
  }

  printHeader(summary.title);
  for (const [label, value] of summary.rows) {
    const highlighted = label === 'Failed' && stats.failed > 0 ? chalk.red(value) : value;
    printKeyValue(label, highlighted);
  }
  console.log();
}
