/**
 * Interfaces of the external collaborators the engine depends on
 */

import type { AlbumMeta, TrackMeta } from './catalog.js';

export interface Credentials {
  appId: string;
  /** Candidate app secrets, tried in order */
  secrets: readonly string[];
}

export interface CredentialProvider {
  getCredentials(): Promise<Credentials>;
}

export type TagResult = { ok: true } | { ok: false; error: Error };

export interface Tagger {
  tag(
    path: string,
    track: TrackMeta,
    album: AlbumMeta,
    isTrack: boolean,
    embedArt: boolean
  ): Promise<TagResult>;
}

export type ProgressUnit = 'bytes' | 'files';

export interface ProgressSink {
  start?(taskId: string, description: string, total: number, unit: ProgressUnit): void;
  advance(taskId: string, advanceBy: number): void;
  stop?(taskId: string): void;
}

export const noopProgress: ProgressSink = {
  advance: () => undefined,
};
