import { sep } from 'node:path';
import { describe, expect, it } from 'vitest';
import { sanitizeFilename, sanitizePath } from '../path.js';

describe('sanitizeFilename', () => {
  it('replaces reserved characters', () => {
    expect(sanitizeFilename('AC/DC: Live?')).toBe('AC_DC_ Live_');
  });

  it('strips control characters and surrounding dots', () => {
    expect(sanitizeFilename('..\u0007hidden.')).toBe('hidden');
  });
});

describe('sanitizePath', () => {
  it('sanitizes each segment and keeps separators', () => {
    expect(sanitizePath('Artist/Album: Live/01 - Song.flac'))
      .toBe(['Artist', 'Album_ Live', '01 - Song.flac'].join(sep));
  });

  it('drops traversal segments', () => {
    expect(sanitizePath('../x/./y')).toBe(['x', 'y'].join(sep));
  });

  it('keeps an absolute root', () => {
    expect(sanitizePath('/music/a')).toBe(`/music${sep}a`);
  });
});
