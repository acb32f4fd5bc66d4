/**
 * Download archive
 *
 * Append-only set of track ids persisted one per line.
 */

import { appendLine, createLogger, safeReadFile, type Logger } from '@hiresdl/utils';

export class DownloadArchive {
  private readonly ids: Set<string>;
  private readonly log: Logger;

  private constructor(
    readonly filePath: string,
    ids: Iterable<string>,
    logger?: Logger
  ) {
    this.ids = new Set(ids);
    this.log = logger ?? createLogger({ component: 'archive' });
  }

  /**
   * Load the archive, starting empty when the file does not exist yet
   */
  static async load(filePath: string, logger?: Logger): Promise<DownloadArchive> {
    const content = await safeReadFile(filePath);
    const ids = (content ?? '')
      .split(/\r?\n/)
      .map(line => line.trim())
      .filter(line => line.length > 0);

    const archive = new DownloadArchive(filePath, ids, logger);
    if (content === null) {
      archive.log.info({ filePath }, 'Download archive not found, a new one will be created');
    } else {
      archive.log.info({ filePath, count: archive.size }, 'Loaded download archive');
    }
    return archive;
  }

  get size(): number {
    return this.ids.size;
  }

  has(trackId: string | number): boolean {
    return this.ids.has(String(trackId));
  }

  /**
   * Record a track id. The in-memory set is updated before the file append,
   * so the id is visible to later checks immediately.
   */
  async add(trackId: string | number): Promise<void> {
    const id = String(trackId);
    if (this.ids.has(id)) {
      return;
    }
    this.ids.add(id);
    await appendLine(this.filePath, id);
  }
}
