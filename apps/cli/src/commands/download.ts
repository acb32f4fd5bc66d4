/**
 * Download Command
 *
 * Downloads every URL given directly or listed in text files, then
 * prints the session summary.
 */

import ora from 'ora';
import { DownloadArchive, DownloadOrchestrator } from '@hiresdl/acquisition';
import type { CatalogSession } from '@hiresdl/api';
import { CancelledError, errorMessage } from '@hiresdl/core';
import { createLogger } from '@hiresdl/utils';
import { loadConfig, type CliConfig, type CliFlags } from '../config/index.js';
import { ConfigCredentialProvider } from '../lib/credentials.js';
import { sweepLeftovers } from '../lib/leftovers.js';
import { printError, printWarning, printSummary } from '../lib/output.js';
import { SpinnerProgress } from '../lib/progress.js';
import { createTagger, openSession } from '../lib/session.js';
import { expandSources } from '../lib/sources.js';

export const EXIT_INTERRUPTED = 130;

const log = createLogger({ component: 'cli' });

async function authenticate(config: CliConfig): Promise<CatalogSession | null> {
  const spinner = ora('Authenticating...').start();
  try {
    const session = await openSession(config, new ConfigCredentialProvider(config));
    spinner.succeed('Authenticated');
    return session;
  } catch (error) {
    spinner.fail('Authentication failed');
    printError(errorMessage(error));
    return null;
  }
}

/**
 * Run one download session over the given URLs and return the exit code
 */
export async function runSession(config: CliConfig, urls: readonly string[]): Promise<number> {
  const startedAt = Date.now();
  const { settings } = config;

  const archive = config.archiveFile ? await DownloadArchive.load(config.archiveFile) : null;
  const session = await authenticate(config);
  if (!session) {
    return 1;
  }

  const orchestrator = new DownloadOrchestrator({
    catalog: session,
    transfer: session,
    tagger: createTagger(config),
    archive,
    settings,
    progress: new SpinnerProgress(),
  });

  let interrupted = false;
  const onInterrupt = () => {
    interrupted = true;
    printWarning('Interrupted, stopping downloads...');
    session.abort();
    orchestrator.cancel();
  };
  process.once('SIGINT', onInterrupt);

  let exitCode = 0;
  try {
    await orchestrator.downloadUrls(urls);
  } catch (error) {
    if (interrupted || error instanceof CancelledError) {
      exitCode = EXIT_INTERRUPTED;
    } else {
      printError(errorMessage(error));
      exitCode = 1;
    }
  } finally {
    process.off('SIGINT', onInterrupt);
    await session.close();
  }

  if (!settings.dryRun) {
    await sweepLeftovers(orchestrator.outputDirs, log);
  }

  printSummary(orchestrator.stats.snapshot(), Date.now() - startedAt, settings.dryRun);
  return exitCode;
}

export async function downloadCommand(sources: string[], options: CliFlags): Promise<void> {
  const config = loadConfig(options);
  const urls = await expandSources(sources);

  if (urls.length === 0) {
    printError('No URLs to download');
    process.exit(1);
  }

  const exitCode = await runSession(config, urls);
  if (exitCode !== 0) {
    process.exit(exitCode);
  }
}
