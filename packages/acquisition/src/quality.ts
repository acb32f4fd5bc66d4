/**
 * Quality negotiation
 */

import { isLossy, type FileDescriptor, type QualityId } from '@hiresdl/core';

/** Restriction code the API sets when it served a lower tier than requested */
export const QUALITY_DOWNGRADE_CODE = 'FormatRestrictedByFormatAvailability';

export type AchievedFormat = 'MP3' | 'FLAC';

export interface Negotiation {
  format: AchievedFormat;
  qualityMet: boolean;
}

/**
 * Classify a descriptor against the requested tier. Never mutates it.
 */
export function negotiate(requested: QualityId, file: FileDescriptor): Negotiation {
  if (isLossy(requested)) {
    return { format: 'MP3', qualityMet: true };
  }
  return {
    format: 'FLAC',
    qualityMet: !file.restrictions.includes(QUALITY_DOWNGRADE_CODE),
  };
}

/**
 * True when the item must be skipped because the tier was not honored
 * and fallback is disallowed
 */
export function rejectsDowngrade(negotiation: Negotiation, fallbackAllowed: boolean): boolean {
  return !negotiation.qualityMet && !fallbackAllowed;
}
