import type {
  AlbumMeta,
  ArtistPage,
  FileDescriptor,
  LabelPage,
  PlaylistPage,
  QualityId,
  TrackMeta,
  TrackSearchResponse,
} from '@hiresdl/core';

export type QueryValue = string | number | undefined;
export type QueryParams = Record<string, QueryValue>;

/**
 * Catalog calls the acquisition engine depends on
 */
export interface CatalogApi {
  getAlbum(albumId: string): Promise<AlbumMeta>;
  getTrack(trackId: string): Promise<TrackMeta>;
  getFileDescriptor(trackId: string, quality: QualityId): Promise<FileDescriptor>;
  searchTracks(query: string, limit?: number): Promise<TrackSearchResponse>;
  artistPages(artistId: string): AsyncIterable<ArtistPage>;
  labelPages(labelId: string): AsyncIterable<LabelPage>;
  playlistPages(playlistId: string): AsyncIterable<PlaylistPage>;
}

/**
 * Raw byte transfer bound to a session
 */
export interface ByteTransfer {
  download(url: string, destination: string, onProgress?: (bytes: number) => void): Promise<number>;
  probeSize(url: string): Promise<number>;
}
