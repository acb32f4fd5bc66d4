import { describe, expect, it } from 'vitest';
import { formatBytes, formatElapsed, formatMebibytes } from '../time.js';

describe('formatting', () => {
  it('formats elapsed time as HH:MM:SS', () => {
    expect(formatElapsed(3_723_000)).toBe('01:02:03');
    expect(formatElapsed(999)).toBe('00:00:00');
  });

  it('formats sizes', () => {
    expect(formatMebibytes(1_572_864)).toBe('1.50 MiB');
    expect(formatBytes(1536)).toBe('1.5 KiB');
    expect(formatBytes(12)).toBe('12 B');
  });
});
