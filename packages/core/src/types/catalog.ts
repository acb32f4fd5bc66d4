/**
 * Catalog payloads as returned by the streaming API (JSON, snake_case).
 * Only the fields the engine reads are declared.
 */

export interface NamedRef {
  id?: number | string;
  name: string;
}

export interface ImageSet {
  small?: string;
  thumbnail?: string;
  large?: string;
}

export interface Goodie {
  url?: string;
  name?: string;
}

export interface Page<T> {
  items: T[];
  total?: number;
  offset?: number;
  limit?: number;
}

export interface TrackMeta {
  id: number;
  title: string;
  version?: string | null;
  work?: string | null;
  track_number?: number;
  media_number?: number;
  duration?: number;
  isrc?: string;
  copyright?: string;
  streamable?: boolean;
  performer?: NamedRef;
  composer?: NamedRef;
  album?: AlbumMeta;
}

export interface AlbumMeta {
  id: string;
  title: string;
  version?: string | null;
  streamable?: boolean;
  release_type?: string;
  artist?: NamedRef;
  label?: NamedRef;
  genre?: NamedRef;
  genres_list?: string[];
  media_count?: number;
  tracks_count?: number;
  release_date_original?: string;
  upc?: string;
  copyright?: string;
  image?: ImageSet;
  goodies?: Goodie[];
  maximum_bit_depth?: number;
  maximum_sampling_rate?: number;
  tracks?: Page<TrackMeta>;
}

export interface Restriction {
  code: string;
}

export interface FileUrlResponse {
  track_id: number;
  format_id?: number;
  url?: string;
  mime_type?: string;
  bit_depth?: number;
  sampling_rate?: number;
  size?: number;
  url_size?: number;
  sample?: boolean;
  restrictions?: Restriction[];
}

export interface ArtistPage {
  id: number | string;
  name: string;
  albums_count?: number;
  albums?: Page<AlbumMeta>;
}

export interface LabelPage {
  id: number | string;
  name: string;
  albums_count?: number;
  albums?: Page<AlbumMeta>;
}

export interface PlaylistPage {
  id: number | string;
  name: string;
  tracks_count?: number;
  tracks?: Page<TrackMeta>;
}

export interface UserCredential {
  label?: string;
  parameters?: Record<string, unknown> | null;
}

export interface UserInfo {
  id?: number;
  email?: string;
  display_name?: string;
  credential?: UserCredential;
}

export interface LoginResponse {
  user_auth_token: string;
  user: UserInfo;
}

export interface TrackSearchResponse {
  query?: string;
  tracks?: Page<TrackMeta>;
}
