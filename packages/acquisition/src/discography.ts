/**
 * Discography filter
 *
 * Collapses an artist's release list to one representative per base title.
 */

import type { AlbumMeta } from '@hiresdl/core';

export interface DiscographyOptions {
  /** Prefer the lowest sampling rate among the best bit depth */
  saveSpace: boolean;
  /** Drop deluxe, live, remix and similar editions */
  skipExtras: boolean;
}

const REMASTER = /(re)?master(ed)?/i;
const EXTRA = /(anniversary|deluxe|live|collector|demo|expanded|remix|acoustic|instrumental)/i;

function describe(album: AlbumMeta): string {
  return `${album.title} ${album.version ?? ''}`;
}

export function isRemaster(album: AlbumMeta): boolean {
  return REMASTER.test(describe(album));
}

export function isExtra(album: AlbumMeta): boolean {
  return EXTRA.test(describe(album));
}

/**
 * Title with any trailing parenthetical or bracketed suffix removed, lowercased
 */
export function baseTitle(title: string): string {
  const cut = title.search(/[([]/);
  const base = (cut === -1 ? title : title.slice(0, cut)).trim();
  return (base || title.trim()).toLowerCase();
}

export function filterDiscography(
  albums: readonly AlbumMeta[],
  artistName: string,
  options: DiscographyOptions
): AlbumMeta[] {
  const groups = new Map<string, AlbumMeta[]>();

  for (const album of albums) {
    // guest appearances and compilations credited to someone else
    if (album.artist?.name !== artistName) {
      continue;
    }
    const key = baseTitle(album.title);
    const group = groups.get(key);
    if (group) {
      group.push(album);
    } else {
      groups.set(key, [album]);
    }
  }

  const selected: AlbumMeta[] = [];

  for (const group of groups.values()) {
    const bitDepth = (album: AlbumMeta) => album.maximum_bit_depth ?? 0;
    const samplingRate = (album: AlbumMeta) => album.maximum_sampling_rate ?? 0;

    const bestBitDepth = Math.max(...group.map(bitDepth));
    const rates = group.filter(a => bitDepth(a) === bestBitDepth).map(samplingRate);
    const bestRate = options.saveSpace ? Math.min(...rates) : Math.max(...rates);
    const remasterExists = group.some(isRemaster);

    const candidate = group.find(album =>
      bitDepth(album) === bestBitDepth &&
      samplingRate(album) === bestRate &&
      (!remasterExists || isRemaster(album)) &&
      !(options.skipExtras && isExtra(album))
    );

    if (candidate) {
      selected.push(candidate);
    }
  }

  return selected;
}
