import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { AlbumMeta, TrackMeta } from '@hiresdl/core';
import { FfmpegTagger, NoopTagger, buildFfmpegArgs } from '../tagger.js';

const track: TrackMeta = { id: 7, title: 'Song', track_number: 1 };
const album: AlbumMeta = { id: 'a1', title: 'Album', artist: { name: 'Test Artist' } };

describe('buildFfmpegArgs', () => {
  it('copies the audio stream with the given tags', () => {
    expect(buildFfmpegArgs('in.tmp', 'out.tmp', [['title', 'Song']], 'flac')).toEqual([
      '-hide_banner', '-loglevel', 'error',
      '-i', 'in.tmp',
      '-map', '0:a',
      '-c', 'copy', '-map_metadata', '-1',
      '-metadata', 'title=Song',
      '-f', 'flac', '-y', 'out.tmp',
    ]);
  });

  it('attaches the cover and pins the id3 version for mp3', () => {
    expect(buildFfmpegArgs('in.tmp', 'out.tmp', [], 'mp3', 'cover.jpg')).toEqual([
      '-hide_banner', '-loglevel', 'error',
      '-i', 'in.tmp',
      '-i', 'cover.jpg', '-map', '0:a', '-map', '1:v', '-disposition:v', 'attached_pic',
      '-metadata:s:v', 'title=Album cover', '-metadata:s:v', 'comment=Cover (front)',
      '-c', 'copy', '-map_metadata', '-1',
      '-id3v2_version', '3',
      '-f', 'mp3', '-y', 'out.tmp',
    ]);
  });
});

describe('FfmpegTagger', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'hiresdl-tagger-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reports a failure and leaves the input untouched when ffmpeg cannot run', async () => {
    const input = join(dir, '.7.tmp');
    await writeFile(input, 'audio-bytes');
    const tagger = new FfmpegTagger({ format: 'flac', binary: join(dir, 'missing-ffmpeg') });

    const result = await tagger.tag(input, track, album, false, true);

    expect(result.ok).toBe(false);
    expect(await readFile(input, 'utf8')).toBe('audio-bytes');
    expect(await readdir(dir)).toEqual(['.7.tmp']);
  });
});

describe('NoopTagger', () => {
  it('accepts every file', async () => {
    await expect(new NoopTagger().tag()).resolves.toEqual({ ok: true });
  });
});
