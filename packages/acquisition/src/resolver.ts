/**
 * Content Resolver
 *
 * Maps catalog URLs to content references and drains collection pages
 * into flat member lists.
 */

import type { CatalogApi } from '@hiresdl/api';
import {
  ContentType,
  InvalidUrlError,
  assertNever,
  type AlbumMeta,
  type ContentRef,
  type TrackMeta,
} from '@hiresdl/core';
import { createLogger, type Logger } from '@hiresdl/utils';
import { filterDiscography, type DiscographyOptions } from './discography.js';

const CONTENT_TYPES = 'album|artist|track|playlist|label';

/** `/{type}/{slug}/{id}` as used on store pages */
const SLUGGED_URL = new RegExp(`/(${CONTENT_TYPES})/[^/]+/(\\w+)`);
/** `/{type}/{id}` as used by the web player */
const SHORT_URL = new RegExp(`/(${CONTENT_TYPES})/(\\w+)(?:[/?#]|$)`);

function toContentType(value: string): ContentType | null {
  switch (value) {
    case 'album':
      return ContentType.ALBUM;
    case 'track':
      return ContentType.TRACK;
    case 'artist':
      return ContentType.ARTIST;
    case 'label':
      return ContentType.LABEL;
    case 'playlist':
      return ContentType.PLAYLIST;
    default:
      return null;
  }
}

/**
 * Parse a catalog URL. The first matching pattern wins.
 */
export function resolveUrl(url: string): ContentRef {
  const trimmed = url.trim();

  for (const pattern of [SLUGGED_URL, SHORT_URL]) {
    const match = pattern.exec(trimmed);
    const type = match?.[1] ? toContentType(match[1]) : null;
    const id = match?.[2];
    if (type && id) {
      return { type, id };
    }
  }

  throw new InvalidUrlError(url);
}

export type ExpandedCollection =
  | {
      readonly type: ContentType.ARTIST | ContentType.LABEL;
      readonly id: string;
      readonly name: string;
      readonly albums: AlbumMeta[];
    }
  | {
      readonly type: ContentType.PLAYLIST;
      readonly id: string;
      readonly name: string;
      readonly tracks: TrackMeta[];
    };

export interface ExpandOptions {
  /** Discography filter, applied to artist collections only */
  discography?: DiscographyOptions;
}

export class ContentResolver {
  private readonly log: Logger;

  constructor(
    private readonly catalog: CatalogApi,
    logger?: Logger
  ) {
    this.log = logger ?? createLogger({ component: 'resolver' });
  }

  resolve(url: string): ContentRef {
    return resolveUrl(url);
  }

  /**
   * Drain every page of a collection
   */
  async expand(
    type: ContentType.ARTIST | ContentType.LABEL | ContentType.PLAYLIST,
    id: string,
    options: ExpandOptions = {}
  ): Promise<ExpandedCollection> {
    switch (type) {
      case ContentType.ARTIST: {
        let name = '';
        const albums: AlbumMeta[] = [];
        for await (const page of this.catalog.artistPages(id)) {
          name ||= page.name;
          albums.push(...(page.albums?.items ?? []));
        }
        const selected = options.discography
          ? filterDiscography(albums, name, options.discography)
          : albums;
        this.log.debug({ id, total: albums.length, selected: selected.length }, 'Expanded artist');
        return { type, id, name, albums: selected };
      }

      case ContentType.LABEL: {
        let name = '';
        const albums: AlbumMeta[] = [];
        for await (const page of this.catalog.labelPages(id)) {
          name ||= page.name;
          albums.push(...(page.albums?.items ?? []));
        }
        this.log.debug({ id, total: albums.length }, 'Expanded label');
        return { type, id, name, albums };
      }

      case ContentType.PLAYLIST: {
        let name = '';
        const tracks: TrackMeta[] = [];
        for await (const page of this.catalog.playlistPages(id)) {
          name ||= page.name;
          tracks.push(...(page.tracks?.items ?? []));
        }
        this.log.debug({ id, total: tracks.length }, 'Expanded playlist');
        return { type, id, name, tracks };
      }

      default:
        return assertNever(type);
    }
  }
}
