/**
 * Search Command
 *
 * Lists matching tracks with their URLs; `--download` fetches the first hit.
 */

import ora from 'ora';
import chalk from 'chalk';
import { errorMessage, type TrackMeta } from '@hiresdl/core';
import { displayTitle } from '@hiresdl/acquisition';
import { loadConfig, type CliFlags } from '../config/index.js';
import { ConfigCredentialProvider } from '../lib/credentials.js';
import { printError, printHeader, printInfo } from '../lib/output.js';
import { openSession, trackUrl } from '../lib/session.js';
import { runSession } from './download.js';

export interface SearchOptions extends CliFlags {
  limit: string;
  download?: boolean;
}

export function describeTrack(track: TrackMeta): string {
  const artist = track.performer?.name ?? track.album?.artist?.name ?? 'Unknown Artist';
  return `${artist} - ${displayTitle(track)}`;
}

export async function searchCommand(terms: string[], options: SearchOptions): Promise<void> {
  const query = terms.join(' ').trim();
  const limit = Number.parseInt(options.limit, 10);
  if (!query || !Number.isInteger(limit) || limit < 1) {
    printError('A query and a positive limit are required');
    process.exit(1);
  }

  const config = loadConfig(options);
  const spinner = ora(`Searching for "${query}"...`).start();

  let tracks: TrackMeta[];
  try {
    const session = await openSession(config, new ConfigCredentialProvider(config));
    try {
      const response = await session.searchTracks(query, limit);
      tracks = response.tracks?.items ?? [];
    } finally {
      await session.close();
    }
    spinner.stop();
  } catch (error) {
    spinner.fail('Search failed');
    printError(errorMessage(error));
    process.exit(1);
  }

  if (tracks.length === 0) {
    printInfo(`No tracks found for "${query}"`);
    return;
  }

  printHeader(`Results for "${query}"`);
  for (const track of tracks) {
    console.log(`${chalk.gray(String(track.id))}  ${describeTrack(track)}`);
    console.log(`    ${chalk.cyan(trackUrl(track.id))}`);
  }
  console.log();

  const [first] = tracks;
  if (options.download && first) {
    const exitCode = await runSession(config, [trackUrl(first.id)]);
    if (exitCode !== 0) {
      process.exit(exitCode);
    }
  }
}
