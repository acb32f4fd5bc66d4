import { mkdtemp, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  CancelledError,
  ContentType,
  NonStreamableError,
  type ContentRef,
} from '@hiresdl/core';
import { isFile } from '@hiresdl/utils';
import { DownloadArchive } from '../archive.js';
import { DownloadOrchestrator } from '../orchestrator.js';
import { QUALITY_DOWNGRADE_CODE } from '../quality.js';
import { createSettings, type DownloadSettings } from '../settings.js';
import {
  FakeCatalog,
  FakeTransfer,
  RecordingTagger,
  delay,
  makeAlbum,
  makeDescriptor,
  makeTrack,
} from './fakes.js';

const TEMPLATE = '{albumartist}/{album}/{tracknumber} - {tracktitle}.{ext}';

const albumUrl = (id: string) => `https://www.qobuz.com/us-en/album/some-title/${id}`;
const trackUrl = (id: number) => `https://open.qobuz.com/track/${id}`;

function tracks(count: number): ReturnType<typeof makeTrack>[] {
  return Array.from({ length: count }, (_, i) => makeTrack(i + 1));
}

describe('DownloadOrchestrator', () => {
  let dir: string;
  let catalog: FakeCatalog;
  let transfer: FakeTransfer;
  let tagger: RecordingTagger;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'hiresdl-orchestrator-'));
    catalog = new FakeCatalog();
    transfer = new FakeTransfer();
    tagger = new RecordingTagger();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function createOrchestrator(
    overrides: Partial<DownloadSettings> = {},
    archive: DownloadArchive | null = null
  ): DownloadOrchestrator {
    return new DownloadOrchestrator({
      catalog,
      transfer,
      tagger,
      archive,
      settings: createSettings({ outputDir: dir, outputTemplate: TEMPLATE, quality: 6, ...overrides }),
    });
  }

  const loadArchive = () => DownloadArchive.load(join(dir, 'archive.txt'));

  describe('playlists', () => {
    it('drops archived tracks before requesting their streams', async () => {
      catalog.playlists.set('p1', [{ id: 'p1', name: 'Road Mix', tracks: { items: tracks(3) } }]);
      const archive = await loadArchive();
      await archive.add(2);

      const orchestrator = createOrchestrator({}, archive);
      await orchestrator.downloadUrl('https://open.qobuz.com/playlist/p1');

      expect(catalog.fileRequests).toEqual(['1', '3']);
      expect([...transfer.downloads].sort()).toEqual(['https://cdn.test/1.flac', 'https://cdn.test/3.flac']);
      expect(orchestrator.stats.snapshot()).toEqual({
        downloaded: 2,
        skippedArchive: 1,
        skippedExists: 0,
        failed: 0,
        bytes: 22,
        albumsProcessed: ['Road Mix'],
      });
      expect(await isFile(join(dir, 'Road Mix', 'Test Artist', 'Track 1', '01 - Track 1.flac'))).toBe(true);
      expect(tagger.calls.every(call => call.isTrack)).toBe(true);
    });

    it('skips only the downgraded tracks when fallback is disallowed', async () => {
      catalog.playlists.set('p1', [{ id: 'p1', name: 'Road Mix', tracks: { items: tracks(2) } }]);
      catalog.files.set('1', makeDescriptor(1, { restrictions: [QUALITY_DOWNGRADE_CODE] }));

      await createOrchestrator({ qualityFallback: false }).downloadUrl('https://open.qobuz.com/playlist/p1');

      expect(transfer.downloads).toEqual(['https://cdn.test/2.flac']);
    });

    it('warns and returns on an empty collection', async () => {
      catalog.playlists.set('p1', [{ id: 'p1', name: 'Empty', tracks: { items: [] } }]);
      const orchestrator = createOrchestrator();

      await orchestrator.downloadUrl('https://open.qobuz.com/playlist/p1');

      expect(orchestrator.stats.snapshot().albumsProcessed).toEqual([]);
      expect(transfer.downloads).toEqual([]);
    });
  });

  describe('albums', () => {
    it('bounds concurrent transfers by maxWorkers', async () => {
      catalog.addAlbum(makeAlbum('a1', tracks(10)));
      transfer.delayMs = 5;

      const orchestrator = createOrchestrator({ maxWorkers: 2 });
      await orchestrator.downloadUrl(albumUrl('a1'));

      expect(transfer.downloads).toHaveLength(10);
      expect(transfer.peak).toBe(2);
      expect(orchestrator.stats.snapshot().downloaded).toBe(10);
    });

    it('skips the whole album when a track is downgraded and fallback is disallowed', async () => {
      catalog.addAlbum(makeAlbum('a1', tracks(2)));
      catalog.files.set('1', makeDescriptor(1, { restrictions: [QUALITY_DOWNGRADE_CODE] }));

      const orchestrator = createOrchestrator({ qualityFallback: false });
      await orchestrator.downloadUrl(albumUrl('a1'));

      expect(transfer.downloads).toEqual([]);
      expect(orchestrator.stats.snapshot().albumsProcessed).toEqual([]);
    });

    it('downloads a downgraded album when fallback is allowed', async () => {
      catalog.addAlbum(makeAlbum('a1', tracks(2)));
      catalog.files.set('1', makeDescriptor(1, { restrictions: [QUALITY_DOWNGRADE_CODE] }));

      await createOrchestrator({ qualityFallback: true }).downloadUrl(albumUrl('a1'));

      expect(transfer.downloads).toHaveLength(2);
    });

    it('isolates a failed transfer from its siblings', async () => {
      catalog.addAlbum(makeAlbum('a1', tracks(3)));
      transfer.failingUrls.add('https://cdn.test/2.flac');
      const completed: ContentRef[] = [];

      const orchestrator = createOrchestrator();
      orchestrator.on('item:completed', (ref: ContentRef) => completed.push(ref));
      await orchestrator.downloadUrl(albumUrl('a1'));

      const snapshot = orchestrator.stats.snapshot();
      expect(snapshot.downloaded).toBe(2);
      expect(snapshot.failed).toBe(1);
      expect(snapshot.albumsProcessed).toEqual(['Album a1']);
      expect(completed).toEqual([{ type: ContentType.ALBUM, id: 'a1' }]);
    });

    it('counts tracks whose stream lookup failed', async () => {
      catalog.addAlbum(makeAlbum('a1', tracks(2)));
      catalog.failingFiles.add('2');

      const orchestrator = createOrchestrator();
      await orchestrator.downloadUrl(albumUrl('a1'));

      expect(transfer.downloads).toEqual(['https://cdn.test/1.flac']);
      expect(orchestrator.stats.snapshot().failed).toBe(1);
    });

    it('never turns samples into jobs', async () => {
      catalog.addAlbum(makeAlbum('a1', tracks(2)));
      catalog.files.set('2', makeDescriptor(2, { isSample: true }));

      const orchestrator = createOrchestrator();
      await orchestrator.downloadUrl(albumUrl('a1'));

      expect(transfer.downloads).toEqual(['https://cdn.test/1.flac']);
      expect(orchestrator.stats.snapshot().failed).toBe(0);
    });

    it('reports a non-streamable album as a failed item', async () => {
      catalog.addAlbum(makeAlbum('a1', tracks(1), { streamable: false }));
      const failures: unknown[] = [];

      const orchestrator = createOrchestrator();
      orchestrator.on('item:failed', (_ref: ContentRef, error: unknown) => failures.push(error));
      await orchestrator.downloadUrl(albumUrl('a1'));

      expect(failures).toHaveLength(1);
      expect(failures[0]).toBeInstanceOf(NonStreamableError);
      expect(catalog.fileRequests).toEqual([]);
    });

    it('skips singles when only albums are wanted', async () => {
      catalog.addAlbum(makeAlbum('a1', tracks(1), { release_type: 'single' }));

      await createOrchestrator({ albumsOnly: true }).downloadUrl(albumUrl('a1'));

      expect(catalog.fileRequests).toEqual([]);
      expect(transfer.downloads).toEqual([]);
    });

    it('writes nothing in a dry run', async () => {
      catalog.addAlbum(makeAlbum('a1', tracks(2)));

      const orchestrator = createOrchestrator({ dryRun: true });
      await orchestrator.downloadUrl(albumUrl('a1'));

      expect(transfer.downloads).toEqual([]);
      expect(transfer.probes).toEqual([]);
      expect(await readdir(dir)).toEqual([]);
      expect(orchestrator.stats.snapshot()).toMatchObject({ downloaded: 2, bytes: 0 });
    });
  });

  describe('archive', () => {
    it('skips tracks archived by an earlier session', async () => {
      catalog.addAlbum(makeAlbum('a1', tracks(2)));
      await createOrchestrator({}, await loadArchive()).downloadUrl(albumUrl('a1'));
      transfer.downloads.length = 0;

      const second = createOrchestrator({}, await loadArchive());
      await second.downloadUrl(albumUrl('a1'));

      expect(transfer.downloads).toEqual([]);
      expect(catalog.fileRequests).toEqual(['1', '2']);
      expect(second.stats.snapshot().skippedArchive).toBe(2);
    });

    it('downloads the same track only once per session', async () => {
      catalog.addAlbum(makeAlbum('a1', tracks(1)));

      const orchestrator = createOrchestrator({}, await loadArchive());
      await orchestrator.downloadUrls([trackUrl(1), trackUrl(1)]);

      expect(transfer.downloads).toEqual(['https://cdn.test/1.flac']);
      expect(orchestrator.stats.snapshot()).toMatchObject({ downloaded: 1, skippedArchive: 1 });
      expect(await isFile(join(dir, 'Test Artist', 'Album a1', '01 - Track 1.flac'))).toBe(true);
    });
  });

  describe('artists', () => {
    it('downloads only the selected discography entries', async () => {
      const quality = { maximum_bit_depth: 24, maximum_sampling_rate: 96 };
      catalog.artists.set('ar1', [{
        id: 'ar1',
        name: 'Test Artist',
        albums: {
          items: [
            makeAlbum('a1', [], { title: 'First Light', ...quality }),
            makeAlbum('a2', [], { title: 'First Light (Remastered)', ...quality }),
            makeAlbum('a3', [], { title: 'First Light (Deluxe)', ...quality }),
            makeAlbum('a4', [], { artist: { name: 'Someone Else' }, ...quality }),
          ],
        },
      }]);
      catalog.addAlbum(makeAlbum('a2', tracks(1), { title: 'First Light (Remastered)' }));
      const failures: unknown[] = [];

      const orchestrator = createOrchestrator({ smartDiscography: true });
      orchestrator.on('item:failed', (_ref: ContentRef, error: unknown) => failures.push(error));
      await orchestrator.downloadUrl('https://www.qobuz.com/us-en/artist/test-artist/ar1');

      expect(failures).toEqual([]);
      expect(transfer.downloads).toEqual(['https://cdn.test/1.flac']);
      expect(
        await isFile(join(dir, 'Test Artist', 'Test Artist', 'First Light (Remastered)', '01 - Track 1.flac'))
      ).toBe(true);
    });
  });

  describe('urls', () => {
    it('reports invalid URLs and moves on', async () => {
      catalog.addAlbum(makeAlbum('a1', tracks(1)));
      const invalid: string[] = [];

      const orchestrator = createOrchestrator();
      orchestrator.on('item:invalid', (url: string) => invalid.push(url));
      await orchestrator.downloadUrls(['https://example.com/nothing', albumUrl('a1')]);

      expect(invalid).toEqual(['https://example.com/nothing']);
      expect(transfer.downloads).toEqual(['https://cdn.test/1.flac']);
    });
  });

  describe('cancel', () => {
    it('stops scheduling and ends the session with CancelledError', async () => {
      catalog.addAlbum(makeAlbum('a1', tracks(3)));
      catalog.addAlbum(makeAlbum('a2', [makeTrack(4)]));
      transfer.delayMs = 5;

      const orchestrator = createOrchestrator({ maxWorkers: 1 });
      let cancelled = 0;
      orchestrator.on('cancelled', () => { cancelled += 1; });
      transfer.onDownload = () => orchestrator.cancel();

      await expect(orchestrator.downloadUrls([albumUrl('a1'), albumUrl('a2')])).rejects.toBeInstanceOf(CancelledError);
      await delay(10);

      expect(transfer.downloads).toEqual(['https://cdn.test/1.flac']);
      expect(orchestrator.isCancelled).toBe(true);
      expect(cancelled).toBe(1);
      expect(orchestrator.stats.snapshot().downloaded).toBe(1);
    });
  });
});
