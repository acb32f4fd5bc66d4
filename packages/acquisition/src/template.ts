/**
 * Path templates
 *
 * `{name}` placeholders plus `%{?flag,whenTrue|whenFalse}` conditionals
 * (a closing `|%}` is accepted as well).
 */

import {
  TemplateError,
  extensionFor,
  type AlbumMeta,
  type FileDescriptor,
  type QualityId,
  type TrackMeta,
} from '@hiresdl/core';
import { sanitizeFilename } from '@hiresdl/utils';

export type TemplateValue = string | number;
export type TemplateVars = Record<string, TemplateValue>;

const CONDITIONAL = /%\{\?(\w+),([^|]*?)\|([^}]*?)%?\}/g;
const PLACEHOLDER = /\{(\w+)\}/g;

/**
 * Title with its version appended unless the title already carries it
 */
export function displayTitle(item: { title: string; version?: string | null }): string {
  const { title, version } = item;
  if (version && !title.toLowerCase().includes(version.toLowerCase())) {
    return `${title} (${version})`;
  }
  return title;
}

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * Variables available to path templates. String values are filename-safe.
 */
export function buildTemplateVars(
  track: TrackMeta,
  album: AlbumMeta,
  file: FileDescriptor,
  quality: QualityId
): TemplateVars {
  const albumArtist = album.artist?.name ?? '';
  const mediaCount = album.media_count ?? 1;
  const releaseDate = album.release_date_original ?? '';

  const strings: Record<string, string> = {
    tracktitle: displayTitle(track),
    artist: track.performer?.name ?? albumArtist,
    albumartist: albumArtist,
    album: album.title,
    year: releaseDate.split('-')[0] || '0',
    release_date: releaseDate,
    label: album.label?.name ?? '',
    upc: album.upc ?? '',
    isrc: track.isrc ?? '',
    composer: track.composer?.name ?? '',
    release_type: album.release_type ?? 'album',
    work: track.work ?? '',
    version: album.version ?? '',
    copyright: album.copyright ?? '',
    genre: album.genre?.name ?? '',
  };

  const vars: TemplateVars = {};
  for (const [key, value] of Object.entries(strings)) {
    vars[key] = sanitizeFilename(value);
  }

  return {
    ...vars,
    tracknumber: pad(track.track_number ?? 0),
    media_number: pad(track.media_number ?? 1),
    media_count: mediaCount,
    bit_depth: file.bitDepth ?? 0,
    sampling_rate: file.samplingRate ?? 0,
    ext: extensionFor(quality),
    is_multidisc: mediaCount > 1 ? 1 : 0,
  };
}

function isTruthy(value: TemplateValue | undefined): boolean {
  return value !== undefined && value !== 0 && value !== '';
}

/**
 * Render a template. Unknown placeholders throw TemplateError.
 */
export function renderTemplate(template: string, vars: TemplateVars): string {
  const resolved = template.replace(
    CONDITIONAL,
    (_match, flag: string, whenTrue: string, whenFalse: string) =>
      isTruthy(vars[flag]) ? whenTrue : whenFalse
  );

  return resolved.replace(PLACEHOLDER, (_match, name: string) => {
    const value = vars[name];
    if (value === undefined) {
      throw new TemplateError(`Unknown template variable "{${name}}"`, template);
    }
    return String(value);
  });
}
