/**
 * Download settings
 *
 * One immutable record passed by value into the orchestrator and materializer.
 */

import type { QualityId } from '@hiresdl/core';

export const DEFAULT_OUTPUT_TEMPLATE =
  '{albumartist}/{album} ({year})/%{?is_multidisc,Disc {media_number}/|}{tracknumber} - {tracktitle}.{ext}';

export interface DownloadSettings {
  readonly quality: QualityId;
  readonly maxWorkers: number;
  /** Root every rendered path is placed under */
  readonly outputDir: string;
  readonly outputTemplate: string;
  /** Accept a lower tier when the requested one is unavailable */
  readonly qualityFallback: boolean;
  /** Skip singles, EPs and compilations when expanding albums */
  readonly albumsOnly: boolean;
  readonly smartDiscography: boolean;
  /** Prefer the lowest sampling rate at the best bit depth */
  readonly saveSpace: boolean;
  /** Drop deluxe, live, remix and similar editions */
  readonly skipExtras: boolean;
  readonly embedArt: boolean;
  readonly noCover: boolean;
  /** Fetch covers in their original resolution */
  readonly ogCover: boolean;
  readonly dryRun: boolean;
}

export const DEFAULT_SETTINGS: DownloadSettings = Object.freeze({
  quality: 6,
  maxWorkers: 8,
  outputDir: '.',
  outputTemplate: DEFAULT_OUTPUT_TEMPLATE,
  qualityFallback: true,
  albumsOnly: false,
  smartDiscography: false,
  saveSpace: true,
  skipExtras: true,
  embedArt: false,
  noCover: false,
  ogCover: false,
  dryRun: false,
});

export function createSettings(overrides: Partial<DownloadSettings> = {}): DownloadSettings {
  return Object.freeze({ ...DEFAULT_SETTINGS, ...overrides });
}
