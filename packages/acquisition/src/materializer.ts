/**
 * File Materializer
 *
 * Turns one track job into a tagged file at its templated path:
 * fetch to a hidden temp file, hand it to the tagger, then rename.
 */

import { dirname, isAbsolute, join } from 'node:path';
import type { ByteTransfer } from '@hiresdl/api';
import {
  TrackStateMachine,
  TransferError,
  errorMessage,
  isFatalError,
  type AlbumMeta,
  type ProgressSink,
  type TagResult,
  type Tagger,
  type TrackJob,
} from '@hiresdl/core';
import {
  createLogger,
  ensureDir,
  isFile,
  moveFile,
  removeFile,
  sanitizePath,
  type Logger,
} from '@hiresdl/utils';
import type { DownloadArchive } from './archive.js';
import type { DownloadSettings } from './settings.js';
import type { TrackOutcome } from './stats.js';
import { buildTemplateVars, displayTitle, renderTemplate } from './template.js';

export interface MaterializerDeps {
  transfer: ByteTransfer;
  tagger: Tagger;
  archive: DownloadArchive | null;
  settings: DownloadSettings;
  logger?: Logger;
}

export interface MaterializeContext {
  /** Directory rendered paths are placed under */
  baseDir: string;
  progress?: ProgressSink;
  taskId?: string;
  /** Forward written byte counts to the progress sink */
  reportBytes?: boolean;
}

export function tempFileName(trackId: string): string {
  return `.${trackId}.tmp`;
}

export function coverUrl(url: string, original: boolean): string {
  return original ? url.replace('_600.', '_org.') : url;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class FileMaterializer {
  private readonly transfer: ByteTransfer;
  private readonly tagger: Tagger;
  private readonly archive: DownloadArchive | null;
  private readonly settings: DownloadSettings;
  private readonly log: Logger;

  /** Cover and booklet fetches, one per directory */
  private readonly directoryAssets = new Map<string, Promise<void>>();

  /** Every directory a track was placed in during this session */
  readonly outputDirs = new Set<string>();

  constructor(deps: MaterializerDeps) {
    this.transfer = deps.transfer;
    this.tagger = deps.tagger;
    this.archive = deps.archive;
    this.settings = deps.settings;
    this.log = deps.logger ?? createLogger({ component: 'materializer' });
  }

  /**
   * Final path of a job under `baseDir`
   */
  computePath(job: TrackJob, baseDir: string): string {
    const vars = buildTemplateVars(job.track, job.album, job.file, this.settings.quality);
    const rendered = sanitizePath(renderTemplate(this.settings.outputTemplate, vars));
    return isAbsolute(rendered) ? rendered : join(baseDir, rendered);
  }

  /**
   * Materialize one job. Recoverable failures become a `failed` outcome;
   * fatal errors such as cancellation propagate.
   */
  async materialize(job: TrackJob, context: MaterializeContext): Promise<TrackOutcome> {
    const trackId = String(job.track.id);
    const title = displayTitle(job.track);
    const machine = new TrackStateMachine(trackId);

    try {
      // the same id may have been written earlier in this session
      if (this.archive?.has(trackId)) {
        machine.transitionTo('skipped', 'archive');
        this.log.info({ trackId, title }, 'Skipping track already in archive');
        return { status: 'skipped', trackId, reason: 'archive' };
      }

      const finalPath = this.computePath(job, context.baseDir);
      const finalDir = dirname(finalPath);
      this.outputDirs.add(finalDir);

      if (this.settings.dryRun) {
        this.log.info({ trackId, path: finalPath }, 'Dry run: would save track');
        return { status: 'done', trackId, path: finalPath, bytes: 0 };
      }

      if (await isFile(finalPath)) {
        machine.transitionTo('skipped', 'exists');
        this.log.info({ trackId, path: finalPath }, 'Track already exists');
        await this.record(trackId);
        return { status: 'skipped', trackId, reason: 'exists', path: finalPath };
      }

      const url = job.file.url;
      if (!url) {
        throw new TransferError('', `Track "${title}" has no stream URL`);
      }

      machine.transitionTo('fetching');
      await ensureDir(finalDir);
      await this.fetchDirectoryAssets(job.album, finalDir);

      machine.transitionTo('writing');
      const tempPath = join(finalDir, tempFileName(trackId));
      const { progress, taskId } = context;
      const onProgress = context.reportBytes && progress && taskId
        ? (bytes: number) => progress.advance(taskId, bytes)
        : undefined;

      let bytes: number;
      try {
        bytes = await this.transfer.download(url, tempPath, onProgress);
      } catch (error) {
        if (!isFatalError(error)) {
          await removeFile(tempPath);
        }
        throw error;
      }

      machine.transitionTo('tagging');
      const tagged = await this.tag(tempPath, job);
      if (!tagged.ok) {
        // temp file stays for the leftover sweep
        throw tagged.error;
      }

      await moveFile(tempPath, finalPath);
      await this.record(trackId);
      machine.transitionTo('done');

      this.log.debug({ trackId, path: finalPath, bytes }, 'Track saved');
      return { status: 'done', trackId, path: finalPath, bytes };
    } catch (error) {
      if (isFatalError(error)) {
        throw error;
      }
      if (!machine.isTerminal()) {
        machine.fail(errorMessage(error));
      }
      this.log.error({ trackId, title, error: errorMessage(error) }, 'Track failed');
      return { status: 'failed', trackId, error: toError(error) };
    }
  }

  /**
   * Append to the archive. The file on disk is already final, so a failed
   * append is logged and does not change the outcome.
   */
  private async record(trackId: string): Promise<void> {
    try {
      await this.archive?.add(trackId);
    } catch (error) {
      this.log.warn({ trackId, error: errorMessage(error) }, 'Could not append to download archive');
    }
  }

  private async tag(path: string, job: TrackJob): Promise<TagResult> {
    try {
      return await this.tagger.tag(path, job.track, job.album, job.isTrack, this.settings.embedArt);
    } catch (error) {
      return { ok: false, error: toError(error) };
    }
  }

  private fetchDirectoryAssets(album: AlbumMeta, dir: string): Promise<void> {
    let pending = this.directoryAssets.get(dir);
    if (!pending) {
      pending = this.fetchAssets(album, dir);
      this.directoryAssets.set(dir, pending);
    }
    return pending;
  }

  private async fetchAssets(album: AlbumMeta, dir: string): Promise<void> {
    const cover = album.image?.large;
    if (!this.settings.noCover && cover) {
      await this.fetchAsset(coverUrl(cover, this.settings.ogCover), join(dir, 'cover.jpg'), 'cover art');
    }

    const booklet = album.goodies?.find(goodie => goodie.url?.endsWith('.pdf'))?.url;
    if (booklet) {
      await this.fetchAsset(booklet, join(dir, 'booklet.pdf'), 'booklet');
    }
  }

  /**
   * Best effort: a failed asset never fails the track
   */
  private async fetchAsset(url: string, path: string, label: string): Promise<void> {
    if (await isFile(path)) {
      return;
    }
    try {
      await this.transfer.download(url, path);
    } catch (error) {
      if (isFatalError(error)) {
        throw error;
      }
      this.log.warn({ url, error: errorMessage(error) }, `Could not download ${label}`);
      await removeFile(path);
    }
  }
}
