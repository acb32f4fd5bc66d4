/**
 * Leftover sweep
 *
 * Hidden `.<trackId>.tmp` files stay behind when tagging fails or the
 * session is interrupted; remove them from every directory touched.
 */

import { errorMessage } from '@hiresdl/core';
import { createLogger, findFiles, removeFile, type Logger } from '@hiresdl/utils';

export const LEFTOVER_PATTERN = /^\.\w+\.tmp(\.tagged)?$/;

export async function sweepLeftovers(
  dirs: Iterable<string>,
  logger: Logger = createLogger({ component: 'leftovers' })
): Promise<string[]> {
  const removed: string[] = [];

  for (const dir of dirs) {
    for (const file of await findFiles(dir, LEFTOVER_PATTERN)) {
      try {
        await removeFile(file);
        removed.push(file);
      } catch (error) {
        logger.warn({ file, error: errorMessage(error) }, 'Could not remove leftover file');
      }
    }
  }

  if (removed.length > 0) {
    logger.info({ count: removed.length }, 'Removed leftover temporary files');
  }
  return removed;
}
