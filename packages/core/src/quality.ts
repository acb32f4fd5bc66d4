/**
 * Quality tiers
 */

import { InvalidQualityError } from './errors/index.js';

export type QualityId = 5 | 6 | 7 | 27;

export const QUALITY_IDS: readonly QualityId[] = [5, 6, 7, 27];

export const QUALITIES: Readonly<Record<QualityId, string>> = {
  5: '5 - MP3 (320 kbps)',
  6: '6 - CD-Lossless (16-bit / 44.1kHz)',
  7: '7 - Hi-Res (24-bit / up to 96kHz)',
  27: '27 - Hi-Res (24-bit / up to 192kHz)',
};

export function isQualityId(value: unknown): value is QualityId {
  return QUALITY_IDS.some(id => id === value);
}

export function assertQuality(value: unknown): QualityId {
  if (!isQualityId(value)) {
    throw new InvalidQualityError(value);
  }
  return value;
}

export function isLossy(quality: QualityId): boolean {
  return quality === 5;
}

export function extensionFor(quality: QualityId): 'mp3' | 'flac' {
  return isLossy(quality) ? 'mp3' : 'flac';
}
