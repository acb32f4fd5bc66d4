/**
 * Content references produced by URL resolution
 */

export enum ContentType {
  ALBUM = 'album',
  TRACK = 'track',
  ARTIST = 'artist',
  LABEL = 'label',
  PLAYLIST = 'playlist',
}

export type CollectionType = ContentType.ARTIST | ContentType.LABEL | ContentType.PLAYLIST;

export interface ContentRef {
  readonly type: ContentType;
  readonly id: string;
}

export function isCollectionType(type: ContentType): type is CollectionType {
  return type === ContentType.ARTIST || type === ContentType.LABEL || type === ContentType.PLAYLIST;
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled content type: ${String(value)}`);
}
