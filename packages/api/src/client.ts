/**
 * Catalog Session
 *
 * One authenticated session against the signed catalog API.
 * Owns the HTTP agent, the abort controller, the user token and the
 * validated app secret.
 */

import { Agent, request, type Dispatcher } from 'undici';
import {
  AuthenticationError,
  CancelledError,
  IneligibleError,
  InvalidAppIdError,
  InvalidAppSecretError,
  RemoteError,
  assertQuality,
  errorMessage,
  isFatalError,
  toFileDescriptor,
  type AlbumMeta,
  type ArtistPage,
  type FileDescriptor,
  type FileUrlResponse,
  type LabelPage,
  type LoginResponse,
  type PlaylistPage,
  type QualityId,
  type TrackMeta,
  type TrackSearchResponse,
  type UserInfo,
} from '@hiresdl/core';
import { createLogger, isObject, isString, type Logger } from '@hiresdl/utils';
import { PAGE_LIMIT, paginate } from './pagination.js';
import { signFileUrlRequest, unixTimestamp } from './signature.js';
import { downloadToFile, probeSize } from './transfer.js';
import type { ByteTransfer, CatalogApi, QueryParams } from './types.js';

export const DEFAULT_BASE_URL = 'https://www.qobuz.com/api.json/0.2/';
export const DEFAULT_TIMEOUT_MS = 30_000;

const USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:83.0) Gecko/20100101 Firefox/83.0';

/** Known streamable track used to probe candidate secrets */
const PROBE_TRACK_ID = '5966783';
const PROBE_QUALITY: QualityId = 5;

export interface SessionOptions {
  appId: string;
  /** Candidate app secrets, tried in order */
  secrets: readonly string[];
  baseUrl?: string;
  timeoutMs?: number;
  /** Replaces the session's own agent; not closed by the session */
  dispatcher?: Dispatcher;
  /** Unix seconds used for request signatures */
  clock?: () => number;
  logger?: Logger;
}

export class CatalogSession implements CatalogApi, ByteTransfer {
  private readonly appId: string;
  private readonly secrets: readonly string[];
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private readonly clock: () => number;
  private readonly log: Logger;
  private readonly controller = new AbortController();

  private userAuthToken: string | null = null;
  private secretPromise: Promise<string> | null = null;

  constructor(options: SessionOptions) {
    this.appId = options.appId;
    this.secrets = options.secrets;
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.ownsDispatcher = options.dispatcher === undefined;
    this.dispatcher = options.dispatcher ?? new Agent({
      headersTimeout: this.timeoutMs,
      bodyTimeout: this.timeoutMs,
    });
    this.clock = options.clock ?? unixTimestamp;
    this.log = options.logger ?? createLogger({ component: 'catalog-session' });
  }

  get isAuthenticated(): boolean {
    return this.userAuthToken !== null;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  // ==========================================================================
  // Transport
  // ==========================================================================

  private get defaultHeaders(): Record<string, string> {
    return {
      'User-Agent': USER_AGENT,
      'X-App-Id': this.appId,
    };
  }

  /**
   * GET an endpoint and decode its JSON body.
   * Known status codes map to the fatal credential errors.
   */
  async call<T>(endpoint: string, params: QueryParams = {}): Promise<T> {
    if (this.controller.signal.aborted) {
      throw new CancelledError();
    }

    const url = new URL(endpoint, this.baseUrl);
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    if (this.userAuthToken) {
      url.searchParams.set('user_auth_token', this.userAuthToken);
    }

    let response: Dispatcher.ResponseData;
    try {
      response = await request(url, {
        method: 'GET',
        headers: this.defaultHeaders,
        dispatcher: this.dispatcher,
        signal: this.controller.signal,
        headersTimeout: this.timeoutMs,
        bodyTimeout: this.timeoutMs,
      });
    } catch (error) {
      if (this.controller.signal.aborted) {
        throw new CancelledError();
      }
      throw error;
    }

    const { statusCode, body } = response;

    if (statusCode >= 400) {
      const text = await body.text();
      this.raiseForStatus(endpoint, statusCode, text);
    }

    return await body.json() as T;
  }

  private raiseForStatus(endpoint: string, status: number, text: string): never {
    if (endpoint === 'user/login') {
      if (status === 401) throw new AuthenticationError('Invalid email or password');
      if (status === 400) throw new InvalidAppIdError();
    }
    if (endpoint === 'user/get' && status === 401) {
      throw new AuthenticationError('The provided token is invalid or has expired');
    }
    if (endpoint === 'track/getFileUrl' && status === 400) {
      throw new InvalidAppSecretError();
    }
    throw new RemoteError(endpoint, status, remoteMessage(endpoint, status, text));
  }

  // ==========================================================================
  // Secrets
  // ==========================================================================

  /**
   * First candidate secret that passes a signed probe, memoized for the
   * session. Concurrent callers share one probe sequence; a failed search
   * is not cached.
   */
  validatedSecret(): Promise<string> {
    if (!this.secretPromise) {
      this.secretPromise = this.findValidSecret().catch((error: unknown) => {
        this.secretPromise = null;
        throw error;
      });
    }
    return this.secretPromise;
  }

  private async findValidSecret(): Promise<string> {
    for (const secret of this.secrets) {
      if (!secret) {
        continue;
      }
      try {
        await this.requestFileUrl(PROBE_TRACK_ID, PROBE_QUALITY, secret);
        this.log.debug({ secret: `${secret.slice(0, 4)}...` }, 'Found valid app secret');
        return secret;
      } catch (error) {
        if (error instanceof InvalidAppSecretError || !isFatalError(error)) {
          this.log.debug({ error: errorMessage(error) }, 'App secret rejected');
          continue;
        }
        throw error;
      }
    }

    throw new InvalidAppSecretError('None of the provided app secrets are valid');
  }

  private requestFileUrl(trackId: string, quality: QualityId, secret: string): Promise<FileUrlResponse> {
    const timestamp = this.clock();
    return this.call<FileUrlResponse>('track/getFileUrl', {
      request_ts: timestamp,
      request_sig: signFileUrlRequest(quality, trackId, timestamp, secret),
      track_id: trackId,
      format_id: quality,
      intent: 'stream',
    });
  }

  // ==========================================================================
  // Authentication
  // ==========================================================================

  async authViaToken(token: string): Promise<UserInfo> {
    this.log.info('Logging in with authentication token');
    this.userAuthToken = token;

    const user = await this.call<UserInfo>('user/get');
    assertEligible(user);
    this.log.info({ email: user.email }, 'Authenticated');
    return user;
  }

  /**
   * Log in with an email and an already md5-hashed password
   */
  async login(email: string, passwordMd5: string): Promise<UserInfo> {
    this.log.info('Logging in with email and password');

    const response = await this.call<LoginResponse>('user/login', {
      email,
      password: passwordMd5,
      app_id: this.appId,
    });
    assertEligible(response.user);
    this.userAuthToken = response.user_auth_token;

    const label = response.user.credential?.parameters?.['short_label'];
    this.log.info({ membership: isString(label) ? label : undefined }, 'Authenticated');
    return response.user;
  }

  // ==========================================================================
  // Catalog
  // ==========================================================================

  getAlbum(albumId: string): Promise<AlbumMeta> {
    return this.call<AlbumMeta>('album/get', { album_id: albumId });
  }

  getTrack(trackId: string): Promise<TrackMeta> {
    return this.call<TrackMeta>('track/get', { track_id: trackId });
  }

  /**
   * Signed stream URL of a track. The quality is checked before any request.
   */
  async getFileUrl(trackId: string, quality: number): Promise<FileUrlResponse> {
    const format = assertQuality(quality);
    const secret = await this.validatedSecret();
    return this.requestFileUrl(trackId, format, secret);
  }

  async getFileDescriptor(trackId: string, quality: QualityId): Promise<FileDescriptor> {
    return toFileDescriptor(await this.getFileUrl(trackId, quality));
  }

  searchTracks(query: string, limit = 10): Promise<TrackSearchResponse> {
    return this.call<TrackSearchResponse>('track/search', { query, limit });
  }

  artistPages(artistId: string): AsyncGenerator<ArtistPage, void, undefined> {
    return paginate(
      (offset, limit) => this.call<ArtistPage>('artist/get', {
        artist_id: artistId,
        extra: 'albums',
        offset,
        limit,
      }),
      page => ({ count: page.albums?.items.length ?? 0, total: page.albums_count }),
      PAGE_LIMIT
    );
  }

  labelPages(labelId: string): AsyncGenerator<LabelPage, void, undefined> {
    return paginate(
      (offset, limit) => this.call<LabelPage>('label/get', {
        label_id: labelId,
        extra: 'albums',
        offset,
        limit,
      }),
      page => ({ count: page.albums?.items.length ?? 0, total: page.albums_count }),
      PAGE_LIMIT
    );
  }

  playlistPages(playlistId: string): AsyncGenerator<PlaylistPage, void, undefined> {
    return paginate(
      (offset, limit) => this.call<PlaylistPage>('playlist/get', {
        playlist_id: playlistId,
        extra: 'tracks',
        offset,
        limit,
      }),
      page => ({ count: page.tracks?.items.length ?? 0, total: page.tracks_count }),
      PAGE_LIMIT
    );
  }

  // ==========================================================================
  // Bytes
  // ==========================================================================

  download(url: string, destination: string, onProgress?: (bytes: number) => void): Promise<number> {
    return downloadToFile(url, destination, {
      dispatcher: this.dispatcher,
      signal: this.controller.signal,
      headers: { 'User-Agent': USER_AGENT },
      onProgress,
    });
  }

  probeSize(url: string): Promise<number> {
    return probeSize(url, {
      dispatcher: this.dispatcher,
      signal: this.controller.signal,
      headers: { 'User-Agent': USER_AGENT },
    });
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Cancel every in-flight request and transfer
   */
  abort(): void {
    this.controller.abort();
  }

  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }
}

function assertEligible(user: UserInfo): void {
  const parameters = user.credential?.parameters;
  if (!parameters || Object.keys(parameters).length === 0) {
    throw new IneligibleError();
  }
}

function remoteMessage(endpoint: string, status: number, text: string): string {
  const base = `${endpoint} failed with status ${status}`;
  const message = parseMessage(text);
  return message ? `${base}: ${message}` : base;
}

function parseMessage(text: string): string | undefined {
  try {
    const parsed: unknown = JSON.parse(text);
    return isObject(parsed) && isString(parsed['message']) ? parsed['message'] : undefined;
  } catch {
    return undefined;
  }
}
