/**
 * Progress planning
 *
 * Picks a byte-based or count-based progress unit for a batch of jobs.
 */

import type { ByteTransfer } from '@hiresdl/api';
import type { ProgressUnit, TrackJob } from '@hiresdl/core';

export interface ProgressPlan {
  unit: ProgressUnit;
  total: number;
}

/**
 * Sum declared sizes; when none were declared, probe each stream URL.
 * Falls back to counting files when sizes stay unknown.
 */
export async function planProgress(
  jobs: readonly TrackJob[],
  transfer: Pick<ByteTransfer, 'probeSize'>
): Promise<ProgressPlan> {
  let total = jobs.reduce((sum, job) => sum + (job.file.size ?? 0), 0);

  if (total === 0) {
    const sizes = await Promise.all(
      jobs.map(job => (job.file.url ? transfer.probeSize(job.file.url) : Promise.resolve(0)))
    );
    total = sizes.reduce((sum, size) => sum + size, 0);
  }

  return total > 0
    ? { unit: 'bytes', total }
    : { unit: 'files', total: jobs.length };
}
