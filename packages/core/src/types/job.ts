/**
 * Track jobs: one track's metadata plus its resolved stream descriptor
 */

import type { AlbumMeta, FileUrlResponse, TrackMeta } from './catalog.js';

export interface FileDescriptor {
  readonly trackId: string;
  readonly url?: string;
  /** Declared byte size, 0 or absent when the API omitted it */
  readonly size?: number;
  readonly bitDepth?: number;
  /** kHz, as reported by the API */
  readonly samplingRate?: number;
  readonly restrictions: readonly string[];
  readonly mimeType?: string;
  readonly isSample: boolean;
}

export interface TrackJob {
  readonly track: TrackMeta;
  readonly album: AlbumMeta;
  readonly file: FileDescriptor;
  readonly isTrack: boolean;
}

export function toFileDescriptor(response: FileUrlResponse): FileDescriptor {
  return {
    trackId: String(response.track_id),
    url: response.url,
    size: response.size || response.url_size || undefined,
    bitDepth: response.bit_depth,
    samplingRate: response.sampling_rate,
    restrictions: (response.restrictions ?? []).map(r => r.code),
    mimeType: response.mime_type,
    isSample: Boolean(response.sample),
  };
}

/**
 * Samples and descriptors without a sampling rate never become jobs
 */
export function isDownloadable(file: FileDescriptor): boolean {
  return !file.isSample && Boolean(file.samplingRate);
}

export function createTrackJob(
  track: TrackMeta,
  album: AlbumMeta,
  file: FileDescriptor,
  isTrack: boolean
): TrackJob | null {
  if (!isDownloadable(file)) {
    return null;
  }
  return { track, album, file, isTrack };
}

/**
 * Album a standalone track belongs to, or a stand-in built from the track itself
 */
export function albumOfTrack(track: TrackMeta): AlbumMeta {
  return track.album ?? {
    id: String(track.id),
    title: track.title,
    artist: track.performer,
    copyright: track.copyright,
  };
}
