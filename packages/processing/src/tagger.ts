/**
 * Taggers
 *
 * FfmpegTagger rewrites the stream with `-c copy` into a sibling file,
 * adding metadata and optionally the directory's cover.jpg, then moves
 * the result back over the original.
 */

import { rename } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import {
  errorMessage,
  type AlbumMeta,
  type TagResult,
  type Tagger,
  type TrackMeta,
} from '@hiresdl/core';
import {
  createLogger,
  execFFmpeg,
  isFile,
  removeFile,
  type Logger,
} from '@hiresdl/utils';
import { buildTags, type TagEntry, type TagFormat } from './tags.js';

export const COVER_FILE = 'cover.jpg';

export interface FfmpegTaggerOptions {
  format: TagFormat;
  /** ffmpeg executable, defaults to `ffmpeg` on PATH */
  binary?: string;
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Arguments that copy `input` to `output` with the given tags, and the
 * cover as an attached picture when one is given
 */
export function buildFfmpegArgs(
  input: string,
  output: string,
  tags: readonly TagEntry[],
  format: TagFormat,
  cover?: string
): string[] {
  const args = ['-hide_banner', '-loglevel', 'error', '-i', input];

  if (cover) {
    args.push('-i', cover, '-map', '0:a', '-map', '1:v', '-disposition:v', 'attached_pic');
    args.push('-metadata:s:v', 'title=Album cover', '-metadata:s:v', 'comment=Cover (front)');
  } else {
    args.push('-map', '0:a');
  }

  args.push('-c', 'copy', '-map_metadata', '-1');
  for (const [name, value] of tags) {
    args.push('-metadata', `${name}=${value}`);
  }

  if (format === 'mp3') {
    args.push('-id3v2_version', '3');
  }

  args.push('-f', format, '-y', output);
  return args;
}

export class FfmpegTagger implements Tagger {
  private readonly format: TagFormat;
  private readonly binary: string;
  private readonly timeoutMs: number;
  private readonly log: Logger;

  constructor(options: FfmpegTaggerOptions) {
    this.format = options.format;
    this.binary = options.binary ?? 'ffmpeg';
    this.timeoutMs = options.timeoutMs ?? 120000;
    this.log = options.logger ?? createLogger({ component: 'tagger' });
  }

  async tag(
    path: string,
    track: TrackMeta,
    album: AlbumMeta,
    isTrack: boolean,
    embedArt: boolean
  ): Promise<TagResult> {
    const output = `${path}.tagged`;
    const tags = buildTags(track, album, isTrack, this.format);

    let cover: string | undefined;
    if (embedArt) {
      const candidate = join(dirname(path), COVER_FILE);
      cover = (await isFile(candidate)) ? candidate : undefined;
    }

    try {
      await execFFmpeg(buildFfmpegArgs(path, output, tags, this.format, cover), {
        binary: this.binary,
        timeout: this.timeoutMs,
      });
      await rename(output, path);
      this.log.debug({ path, tags: tags.length, cover: Boolean(cover) }, 'Tagged file');
      return { ok: true };
    } catch (error) {
      await removeFile(output);
      this.log.warn({ path, error: errorMessage(error) }, 'Tagging failed');
      return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
    }
  }
}

/**
 * Leaves files untouched
 */
export class NoopTagger implements Tagger {
  async tag(): Promise<TagResult> {
    return { ok: true };
  }
}
