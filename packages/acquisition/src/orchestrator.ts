/**
 * Download Orchestrator
 *
 * Expands content references into track jobs, drops archived tracks,
 * and runs the jobs under a bounded number of workers.
 *
 * Events:
 * - item:started / item:completed (ref)
 * - item:failed (ref, error)
 * - item:invalid (url, error)
 * - track:finished (outcome)
 * - cancelled
 */

import { EventEmitter } from 'node:events';
import { join } from 'node:path';
import type { ByteTransfer, CatalogApi } from '@hiresdl/api';
import {
  CancelledError,
  ContentType,
  InvalidUrlError,
  NonStreamableError,
  albumOfTrack,
  assertNever,
  createTrackJob,
  errorMessage,
  isFatalError,
  noopProgress,
  type AlbumMeta,
  type CollectionType,
  type ContentRef,
  type FileDescriptor,
  type ProgressSink,
  type Tagger,
  type TrackJob,
  type TrackMeta,
} from '@hiresdl/core';
import {
  Semaphore,
  SemaphoreClosedError,
  createLogger,
  sanitizeFilename,
  type Logger,
} from '@hiresdl/utils';
import type { DownloadArchive } from './archive.js';
import { FileMaterializer } from './materializer.js';
import { planProgress, type ProgressPlan } from './progress.js';
import { negotiate, rejectsDowngrade } from './quality.js';
import { ContentResolver } from './resolver.js';
import type { DownloadSettings } from './settings.js';
import { SessionStats, type TrackOutcome } from './stats.js';
import { displayTitle } from './template.js';

const VARIOUS_ARTISTS = 'Various Artists';

export interface OrchestratorDeps {
  catalog: CatalogApi;
  transfer: ByteTransfer;
  tagger: Tagger;
  archive?: DownloadArchive | null;
  settings: DownloadSettings;
  progress?: ProgressSink;
  logger?: Logger;
}

interface ResolvedTrack {
  track: TrackMeta;
  file: FileDescriptor;
}

function isFatalRejection(result: PromiseSettledResult<unknown>): result is PromiseRejectedResult {
  return result.status === 'rejected' && isFatalError(result.reason);
}

function uniqueTracks(tracks: readonly TrackMeta[]): TrackMeta[] {
  const seen = new Set<string>();
  return tracks.filter(track => {
    const id = String(track.id);
    if (seen.has(id)) return false;
    seen.add(id);
    return true;
  });
}

export class DownloadOrchestrator extends EventEmitter {
  readonly stats = new SessionStats();
  readonly resolver: ContentResolver;
  readonly materializer: FileMaterializer;

  private readonly catalog: CatalogApi;
  private readonly transfer: ByteTransfer;
  private readonly archive: DownloadArchive | null;
  private readonly settings: DownloadSettings;
  private readonly progress: ProgressSink;
  private readonly log: Logger;

  private readonly queues = new Set<Semaphore>();
  private cancelled = false;

  constructor(deps: OrchestratorDeps) {
    super();
    this.catalog = deps.catalog;
    this.transfer = deps.transfer;
    this.archive = deps.archive ?? null;
    this.settings = deps.settings;
    this.progress = deps.progress ?? noopProgress;
    this.log = deps.logger ?? createLogger({ component: 'orchestrator' });
    this.resolver = new ContentResolver(deps.catalog, this.log.child({ component: 'resolver' }));
    this.materializer = new FileMaterializer({
      transfer: deps.transfer,
      tagger: deps.tagger,
      archive: this.archive,
      settings: deps.settings,
      logger: this.log.child({ component: 'materializer' }),
    });
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  /** Directories tracks were placed in during this session */
  get outputDirs(): ReadonlySet<string> {
    return this.materializer.outputDirs;
  }

  // ==========================================================================
  // Entry points
  // ==========================================================================

  /**
   * Process URLs one after another. Invalid URLs and per-item failures are
   * logged and skipped; fatal errors propagate.
   */
  async downloadUrls(urls: readonly string[]): Promise<void> {
    if (urls.length === 0) {
      this.log.info('Nothing to download');
      return;
    }
    if (this.settings.dryRun) {
      this.log.info('Dry run mode is enabled, no files will be written');
    }

    for (const url of urls) {
      this.throwIfCancelled();
      await this.downloadUrl(url);
    }
  }

  async downloadUrl(url: string): Promise<void> {
    let ref: ContentRef;
    try {
      ref = this.resolver.resolve(url);
    } catch (error) {
      if (error instanceof InvalidUrlError) {
        this.log.warn({ url }, error.message);
        this.emit('item:invalid', url, error);
        return;
      }
      throw error;
    }

    await this.download(ref);
  }

  async download(ref: ContentRef): Promise<void> {
    this.emit('item:started', ref);
    try {
      await this.dispatch(ref);
      this.emit('item:completed', ref);
    } catch (error) {
      if (isFatalError(error)) {
        throw error;
      }
      this.log.warn({ type: ref.type, id: ref.id, error: errorMessage(error) }, 'Item failed');
      this.emit('item:failed', ref, error);
    }
  }

  /**
   * Stop scheduling: queued tasks are rejected, in-flight ones settle,
   * then the current item ends with CancelledError.
   */
  cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    for (const queue of this.queues) {
      queue.close();
    }
    this.log.warn('Cancelling download session');
    this.emit('cancelled');
  }

  private dispatch(ref: ContentRef): Promise<void> {
    switch (ref.type) {
      case ContentType.ALBUM:
        return this.downloadAlbum(ref.id, this.settings.outputDir);
      case ContentType.TRACK:
        return this.downloadTrack(ref.id, this.settings.outputDir);
      case ContentType.ARTIST:
      case ContentType.LABEL:
      case ContentType.PLAYLIST:
        return this.downloadCollection(ref.type, ref.id);
      default:
        return assertNever(ref.type);
    }
  }

  // ==========================================================================
  // Expansion
  // ==========================================================================

  private async downloadCollection(type: CollectionType, id: string): Promise<void> {
    const discography = type === ContentType.ARTIST && this.settings.smartDiscography
      ? { saveSpace: this.settings.saveSpace, skipExtras: this.settings.skipExtras }
      : undefined;

    const collection = await this.resolver.expand(type, id, { discography });
    const members = collection.type === ContentType.PLAYLIST
      ? collection.tracks.length
      : collection.albums.length;

    if (members === 0) {
      this.log.warn({ type, id }, 'No content found');
      return;
    }

    const name = collection.name || `${type} ${id}`;
    this.log.info({ type, name, members }, 'Downloading all music from collection');
    this.stats.addProcessed(name);

    const baseDir = join(this.settings.outputDir, sanitizeFilename(name));

    if (collection.type === ContentType.PLAYLIST) {
      await this.downloadTracks(collection.tracks, baseDir, `playlist:${id}`, name);
      return;
    }

    for (const album of collection.albums) {
      this.throwIfCancelled();
      const ref: ContentRef = { type: ContentType.ALBUM, id: String(album.id) };
      try {
        await this.downloadAlbum(ref.id, baseDir);
      } catch (error) {
        if (isFatalError(error)) {
          throw error;
        }
        this.log.warn({ albumId: ref.id, error: errorMessage(error) }, 'Album failed');
        this.emit('item:failed', ref, error);
      }
    }
  }

  private async downloadAlbum(albumId: string, baseDir: string): Promise<void> {
    const album = await this.catalog.getAlbum(albumId);
    const title = displayTitle(album);

    if (!album.streamable) {
      throw new NonStreamableError('Album', albumId);
    }

    if (this.settings.albumsOnly && !this.isFullAlbum(album)) {
      this.log.info({ albumId, title }, 'Skipping non-album release');
      return;
    }

    const pending = this.dropArchived(uniqueTracks(album.tracks?.items ?? []));
    if (pending.length === 0) {
      return;
    }

    const resolved = await this.resolveFiles(pending);
    const downgraded = resolved.some(({ file }) =>
      rejectsDowngrade(negotiate(this.settings.quality, file), this.settings.qualityFallback)
    );
    if (downgraded) {
      this.log.info({ albumId, title }, 'Skipping album that does not meet the quality requirement');
      return;
    }

    const jobs = this.buildJobs(resolved, () => album, false);
    const [first] = jobs;
    if (!first) {
      return;
    }

    this.stats.addProcessed(title);
    this.log.info({
      album: title,
      format: negotiate(this.settings.quality, first.file).format,
      bitDepth: first.file.bitDepth,
      samplingRate: first.file.samplingRate,
    }, 'Downloading album');

    await this.runJobs(jobs, `album:${albumId}`, `Downloading ${title}`, baseDir);
  }

  private async downloadTrack(trackId: string, baseDir: string): Promise<void> {
    if (this.archive?.has(trackId)) {
      this.stats.addSkippedArchive(1);
      this.log.info({ trackId }, 'Skipping track already in archive');
      return;
    }

    const track = await this.catalog.getTrack(trackId);
    this.log.info({ trackId, title: displayTitle(track) }, 'Downloading track');

    await this.downloadTracks([track], baseDir, `track:${trackId}`, displayTitle(track));
  }

  /**
   * Standalone tracks: each job carries the track's own album
   */
  private async downloadTracks(
    tracks: readonly TrackMeta[],
    baseDir: string,
    taskId: string,
    label: string
  ): Promise<void> {
    const pending = this.dropArchived(uniqueTracks(tracks));
    if (pending.length === 0) {
      return;
    }

    const resolved = (await this.resolveFiles(pending)).filter(({ track, file }) => {
      if (rejectsDowngrade(negotiate(this.settings.quality, file), this.settings.qualityFallback)) {
        this.log.info({ trackId: track.id, title: displayTitle(track) }, 'Skipping track that does not meet the quality requirement');
        return false;
      }
      return true;
    });

    const jobs = this.buildJobs(resolved, albumOfTrack, true);
    await this.runJobs(jobs, taskId, `Downloading ${label}`, baseDir);
  }

  private isFullAlbum(album: AlbumMeta): boolean {
    return album.release_type === 'album' && album.artist?.name !== VARIOUS_ARTISTS;
  }

  /**
   * Remove archived ids before any per-track request, counting them
   */
  private dropArchived(tracks: TrackMeta[]): TrackMeta[] {
    const archive = this.archive;
    if (!archive) {
      return tracks;
    }

    const pending = tracks.filter(track => !archive.has(track.id));
    const skipped = tracks.length - pending.length;
    if (skipped > 0) {
      this.stats.addSkippedArchive(skipped);
      this.log.info({ count: skipped }, 'Skipping tracks already in archive');
    }
    return pending;
  }

  /**
   * Resolve stream descriptors with bounded concurrency. Failed lookups
   * count as failed tracks; fatal errors propagate after all settle.
   */
  private async resolveFiles(tracks: readonly TrackMeta[]): Promise<ResolvedTrack[]> {
    const queue = this.openQueue();
    try {
      const settled = await Promise.allSettled(
        tracks.map(track => queue.run(async (): Promise<ResolvedTrack> => ({
          track,
          file: await this.catalog.getFileDescriptor(String(track.id), this.settings.quality),
        })))
      );
      this.throwIfCancelled();

      const fatal = settled.find(isFatalRejection);
      if (fatal) {
        throw fatal.reason;
      }

      const resolved: ResolvedTrack[] = [];
      let failures = 0;
      for (const result of settled) {
        if (result.status === 'fulfilled') {
          resolved.push(result.value);
        } else if (!(result.reason instanceof SemaphoreClosedError)) {
          failures += 1;
          this.log.error({ error: errorMessage(result.reason) }, 'Could not resolve track stream');
        }
      }
      this.stats.addFailed(failures);
      return resolved;
    } finally {
      this.closeQueue(queue);
    }
  }

  /**
   * Samples and descriptors without a sampling rate never become jobs
   */
  private buildJobs(
    resolved: readonly ResolvedTrack[],
    albumFor: (track: TrackMeta) => AlbumMeta,
    isTrack: boolean
  ): TrackJob[] {
    const jobs: TrackJob[] = [];
    for (const { track, file } of resolved) {
      const job = createTrackJob(track, albumFor(track), file, isTrack);
      if (job) {
        jobs.push(job);
      } else {
        this.log.info({ trackId: track.id }, 'Demo or sample track detected, skipping');
      }
    }
    return jobs;
  }

  // ==========================================================================
  // Scheduling
  // ==========================================================================

  /**
   * Run every job, waiting for all of them to settle before returning
   */
  private async runJobs(
    jobs: readonly TrackJob[],
    taskId: string,
    description: string,
    baseDir: string
  ): Promise<void> {
    if (jobs.length === 0) {
      return;
    }

    const plan: ProgressPlan = this.settings.dryRun
      ? { unit: 'files', total: jobs.length }
      : await planProgress(jobs, this.transfer);

    this.progress.start?.(taskId, description, plan.total, plan.unit);
    const queue = this.openQueue();

    try {
      const settled = await Promise.allSettled(
        jobs.map(job => queue.run(() => this.runJob(job, taskId, baseDir, plan)))
      );
      this.throwIfCancelled();

      const fatal = settled.find(isFatalRejection);
      if (fatal) {
        throw fatal.reason;
      }
    } finally {
      this.closeQueue(queue);
      this.progress.stop?.(taskId);
    }

    this.log.info({ taskId }, `Completed: ${description}`);
  }

  private async runJob(
    job: TrackJob,
    taskId: string,
    baseDir: string,
    plan: ProgressPlan
  ): Promise<TrackOutcome> {
    try {
      const outcome = await this.materializer.materialize(job, {
        baseDir,
        progress: this.progress,
        taskId,
        reportBytes: plan.unit === 'bytes',
      });
      this.stats.record(outcome);
      this.emit('track:finished', outcome);
      return outcome;
    } finally {
      if (plan.unit === 'files') {
        this.progress.advance(taskId, 1);
      }
    }
  }

  private openQueue(): Semaphore {
    this.throwIfCancelled();
    const queue = new Semaphore(this.settings.maxWorkers);
    this.queues.add(queue);
    return queue;
  }

  private closeQueue(queue: Semaphore): void {
    queue.close();
    this.queues.delete(queue);
  }

  private throwIfCancelled(): void {
    if (this.cancelled) {
      throw new CancelledError();
    }
  }
}
