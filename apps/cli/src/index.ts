#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Command-line interface for hires-dl.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { QUALITIES, QUALITY_IDS } from '@hiresdl/core';
import { downloadCommand } from './commands/download.js';
import { searchCommand } from './commands/search.js';

const program = new Command();

const qualityHelp = `Quality id (${QUALITY_IDS.map(id => QUALITIES[id]).join(', ')})`;

program
  .name('hires-dl')
  .description('Download albums, tracks, artists, labels and playlists from the catalog')
  .version('1.0.0');

/**
 * Options shared by every command that downloads
 */
function withDownloadOptions(command: Command): Command {
  return command
    .option('-q, --quality <id>', qualityHelp)
    .option('-w, --workers <count>', 'Maximum concurrent track downloads')
    .option('-d, --directory <path>', 'Output directory')
    .option('-t, --template <template>', 'Output path template')
    .option('--download-archive', 'Record downloaded track ids and skip them next time')
    .option('--no-fallback', 'Skip releases that are not available in the requested quality')
    .option('--albums-only', 'Skip singles, EPs and various artists releases')
    .option('--smart-discography', 'Keep one edition per album when downloading an artist')
    .option('--embed-art', 'Embed cover art into each file')
    .option('--no-cover', 'Do not download cover art')
    .option('--og-cover', 'Download cover art in its original resolution')
    .option('--dry-run', 'Resolve everything but write no files');
}

// ============================================
// DOWNLOAD COMMANDS
// ============================================

withDownloadOptions(
  program
    .command('download <sources...>')
    .alias('dl')
    .description('Download URLs, or text files listing one URL per line')
).action(downloadCommand);

withDownloadOptions(
  program
    .command('search <query...>')
    .description('Search tracks by title, artist or album')
    .option('-n, --limit <count>', 'Number of results', '10')
    .option('--download', 'Download the first result')
).action(searchCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('hires-dl --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red('✗'), error instanceof Error ? error.message : String(error));
  process.exit(1);
});
