/**
 * Tag builder
 *
 * Maps catalog metadata onto container tag names. Values are plain strings,
 * ready to pass as `-metadata key=value`.
 */

import type { AlbumMeta, TrackMeta } from '@hiresdl/core';

export type TagFormat = 'flac' | 'mp3';

export type TagEntry = readonly [name: string, value: string];

const COPYRIGHT = '©';
const PHONOGRAPHIC_COPYRIGHT = '℗';

const VARIOUS_ARTISTS = 'various artists';

/**
 * Full title: `work: title (version)`
 */
export function fullTitle(track: TrackMeta): string {
  let title = track.title;
  if (track.version) {
    title = `${title} (${track.version})`;
  }
  if (track.work) {
    title = `${track.work}: ${title}`;
  }
  return title;
}

export function formatCopyright(value: string): string {
  return value.replaceAll('(P)', PHONOGRAPHIC_COPYRIGHT).replaceAll('(C)', COPYRIGHT);
}

/**
 * Distinct genres from entries such as `Pop/Rock→Indie Rock`
 */
export function parseGenres(genresList: readonly string[] | undefined): string[] {
  const names = (genresList ?? [])
    .join('/')
    .split(/[→/]/)
    .map(name => name.trim())
    .filter(name => name.length > 0);
  return [...new Set(names)];
}

/**
 * Tags for one track. Standalone tracks prefer the album embedded in
 * the track itself.
 */
export function buildTags(
  track: TrackMeta,
  album: AlbumMeta,
  isTrack: boolean,
  format: TagFormat
): TagEntry[] {
  const source = isTrack ? track.album ?? album : album;
  const albumArtist = source.artist?.name ?? '';
  const trackNumber = String(track.track_number ?? '');
  const trackTotal = source.tracks_count === undefined ? '' : String(source.tracks_count);
  const mediaNumber = track.media_number ?? 1;
  const releaseDate = source.release_date_original;
  const copyright = track.copyright ?? source.copyright;
  const genres = parseGenres(source.genres_list);

  const tags: Array<[string, string | undefined]> = [
    ['title', fullTitle(track)],
    ['artist', track.performer?.name || albumArtist],
    ['album_artist', albumArtist],
    ['album', source.title],
    ['composer', track.composer?.name],
    ['genre', genres.length > 0 ? genres.join(', ') : undefined],
    ['date', releaseDate],
    ['copyright', copyright ? formatCopyright(copyright) : undefined],
  ];

  if (format === 'flac') {
    tags.push(
      ['TRACKNUMBER', trackNumber],
      ['TRACKTOTAL', trackTotal],
      ['ISRC', track.isrc],
      ['ORGANIZATION', source.label?.name],
      ['BARCODE', source.upc]
    );
    if (mediaNumber > 1) {
      tags.push(
        ['DISCNUMBER', String(mediaNumber)],
        ['DISCTOTAL', source.media_count === undefined ? undefined : String(source.media_count)]
      );
    }
  } else {
    tags.push(
      ['track', trackTotal ? `${trackNumber}/${trackTotal}` : trackNumber],
      ['year', releaseDate?.slice(0, 4)],
      ['TSRC', track.isrc],
      ['publisher', source.label?.name],
      ['BARCODE', source.upc]
    );
    if (mediaNumber > 1) {
      tags.push(['disc', `${mediaNumber}/${source.media_count ?? ''}`]);
    }
  }

  if (albumArtist.toLowerCase() === VARIOUS_ARTISTS) {
    tags.push(['compilation', '1']);
  }

  return tags.filter((entry): entry is [string, string] => Boolean(entry[1]));
}
