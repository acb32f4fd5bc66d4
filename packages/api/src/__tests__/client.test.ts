import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MockAgent, type Interceptable } from 'undici';
import {
  AuthenticationError,
  IneligibleError,
  InvalidAppIdError,
  InvalidAppSecretError,
  InvalidQualityError,
  RemoteError,
} from '@hiresdl/core';
import { CatalogSession } from '../client.js';
import { signFileUrlRequest } from '../signature.js';

const ORIGIN = 'https://api.test';
const BASE_URL = `${ORIGIN}/api.json/0.2/`;
const NOW = 1700000000;

function endpoint(name: string) {
  return (path: string) => path.startsWith(`/api.json/0.2/${name}`);
}

function query(path: string): URLSearchParams {
  return new URL(path, ORIGIN).searchParams;
}

describe('CatalogSession', () => {
  let agent: MockAgent;
  let pool: Interceptable;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    pool = agent.get(ORIGIN);
  });

  afterEach(async () => {
    await agent.close();
  });

  function createSession(secrets: string[] = ['good']): CatalogSession {
    return new CatalogSession({
      appId: 'test-app',
      secrets,
      baseUrl: BASE_URL,
      dispatcher: agent,
      clock: () => NOW,
    });
  }

  /**
   * Accept signatures made with `validSecret`, reject everything else with 400
   */
  function interceptFileUrl(validSecret: string, probed: string[]): void {
    pool
      .intercept({ path: endpoint('track/getFileUrl'), method: 'GET' })
      .reply<object>(opts => {
        const params = query(opts.path);
        const trackId = params.get('track_id') ?? '';
        const format = Number(params.get('format_id'));
        const signature = params.get('request_sig') ?? '';
        probed.push(signature);

        if (signature !== signFileUrlRequest(format, trackId, NOW, validSecret)) {
          return { statusCode: 400, data: { message: 'Invalid Request Signature parameter (request_sig)' } };
        }
        return {
          statusCode: 200,
          data: { track_id: Number(trackId), format_id: format, url: 'https://cdn.test/a.flac', bit_depth: 24, sampling_rate: 96 },
        };
      })
      .persist();
  }

  describe('secret validation', () => {
    it('caches the first valid secret and never probes later ones', async () => {
      const probed: string[] = [];
      interceptFileUrl('good', probed);
      const session = createSession(['bad1', 'bad2', 'good', 'good2']);

      await expect(session.validatedSecret()).resolves.toBe('good');
      await expect(session.validatedSecret()).resolves.toBe('good');

      expect(probed).toEqual([
        signFileUrlRequest(5, '5966783', NOW, 'bad1'),
        signFileUrlRequest(5, '5966783', NOW, 'bad2'),
        signFileUrlRequest(5, '5966783', NOW, 'good'),
      ]);
      expect(probed).not.toContain(signFileUrlRequest(5, '5966783', NOW, 'good2'));
    });

    it('shares one probe sequence between concurrent callers', async () => {
      const probed: string[] = [];
      interceptFileUrl('good', probed);
      const session = createSession(['bad1', 'good']);

      const [first, second] = await Promise.all([
        session.validatedSecret(),
        session.validatedSecret(),
      ]);

      expect(first).toBe('good');
      expect(second).toBe('good');
      expect(probed).toHaveLength(2);
    });

    it('skips empty candidates', async () => {
      const probed: string[] = [];
      interceptFileUrl('good', probed);
      const session = createSession(['', 'good']);

      await expect(session.validatedSecret()).resolves.toBe('good');
      expect(probed).toHaveLength(1);
    });

    it('fails with InvalidAppSecretError when no candidate validates and retries later', async () => {
      const probed: string[] = [];
      interceptFileUrl('good', probed);
      const session = createSession(['bad1', 'bad2']);

      await expect(session.validatedSecret()).rejects.toBeInstanceOf(InvalidAppSecretError);
      await expect(session.validatedSecret()).rejects.toBeInstanceOf(InvalidAppSecretError);
      expect(probed).toHaveLength(4);
    });

    it('signs file url requests with the validated secret', async () => {
      const probed: string[] = [];
      interceptFileUrl('good', probed);
      const session = createSession(['bad1', 'good']);

      const descriptor = await session.getFileDescriptor('12345', 27);

      expect(descriptor).toMatchObject({
        trackId: '12345',
        url: 'https://cdn.test/a.flac',
        bitDepth: 24,
        samplingRate: 96,
        restrictions: [],
        isSample: false,
      });
      expect(probed.at(-1)).toBe(signFileUrlRequest(27, '12345', NOW, 'good'));
    });
  });

  it('rejects an unknown quality before any request', async () => {
    const probed: string[] = [];
    interceptFileUrl('good', probed);
    const session = createSession();

    await expect(session.getFileUrl('12345', 4)).rejects.toBeInstanceOf(InvalidQualityError);
    expect(probed).toHaveLength(0);
  });

  describe('authentication', () => {
    it('maps a 401 login to AuthenticationError', async () => {
      pool.intercept({ path: endpoint('user/login'), method: 'GET' }).reply(401, { message: 'Invalid credentials' });

      await expect(createSession().login('user@example.com', 'test-hash')).rejects.toBeInstanceOf(AuthenticationError);
    });

    it('maps a 400 login to InvalidAppIdError', async () => {
      pool.intercept({ path: endpoint('user/login'), method: 'GET' }).reply(400, { message: 'Invalid app_id' });

      await expect(createSession().login('user@example.com', 'test-hash')).rejects.toBeInstanceOf(InvalidAppIdError);
    });

    it('rejects accounts without streaming parameters', async () => {
      pool.intercept({ path: endpoint('user/login'), method: 'GET' }).reply(200, {
        user_auth_token: 'test-token',
        user: { email: 'user@example.com', credential: { parameters: null } },
      });
      const session = createSession();

      await expect(session.login('user@example.com', 'test-hash')).rejects.toBeInstanceOf(IneligibleError);
      expect(session.isAuthenticated).toBe(false);
    });

    it('attaches the user token and app id to later calls', async () => {
      pool.intercept({ path: endpoint('user/login'), method: 'GET' }).reply(200, {
        user_auth_token: 'test-token',
        user: { email: 'user@example.com', credential: { parameters: { short_label: 'Studio' } } },
      });

      const tokens: Array<string | null> = [];
      pool
        .intercept({ path: endpoint('album/get'), method: 'GET', headers: { 'X-App-Id': 'test-app' } })
        .reply(opts => {
          tokens.push(query(opts.path).get('user_auth_token'));
          return { statusCode: 200, data: { id: 'abc', title: 'Album' } };
        });

      const session = createSession();
      await session.login('user@example.com', 'test-hash');
      const album = await session.getAlbum('abc');

      expect(session.isAuthenticated).toBe(true);
      expect(album.title).toBe('Album');
      expect(tokens).toEqual(['test-token']);
    });

    it('maps a 401 profile call during token auth to AuthenticationError', async () => {
      pool.intercept({ path: endpoint('user/get'), method: 'GET' }).reply(401, { message: 'Expired' });

      await expect(createSession().authViaToken('test-token')).rejects.toBeInstanceOf(AuthenticationError);
    });

    it('accepts an eligible token', async () => {
      pool.intercept({ path: endpoint('user/get'), method: 'GET' }).reply(200, {
        email: 'user@example.com',
        credential: { parameters: { short_label: 'Studio' } },
      });

      const user = await createSession().authViaToken('test-token');
      expect(user.email).toBe('user@example.com');
    });
  });

  it('raises RemoteError with the endpoint and status', async () => {
    pool.intercept({ path: endpoint('album/get'), method: 'GET' }).reply(404, { message: 'No result matching given argument' });

    const error = await createSession().getAlbum('missing').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RemoteError);
    expect(error).toMatchObject({
      endpoint: 'album/get',
      status: 404,
      message: 'album/get failed with status 404: No result matching given argument',
    });
  });

  it('drains artist pages until the declared album count', async () => {
    const offsets: string[] = [];
    pool
      .intercept({ path: endpoint('artist/get'), method: 'GET' })
      .reply(opts => {
        const params = query(opts.path);
        offsets.push(params.get('offset') ?? '');
        const items = params.get('offset') === '0'
          ? [{ id: 'a1', title: 'One' }, { id: 'a2', title: 'Two' }]
          : [{ id: 'a3', title: 'Three' }];
        return { statusCode: 200, data: { id: 7, name: 'Artist', albums_count: 3, albums: { items } } };
      })
      .persist();

    const titles: string[] = [];
    for await (const page of createSession().artistPages('7')) {
      titles.push(...(page.albums?.items ?? []).map(a => a.title));
    }

    expect(titles).toEqual(['One', 'Two', 'Three']);
    expect(offsets).toEqual(['0', '2']);
  });

  it('sends the search query and limit', async () => {
    const seen: URLSearchParams[] = [];
    pool
      .intercept({ path: endpoint('track/search'), method: 'GET' })
      .reply(opts => {
        seen.push(query(opts.path));
        return { statusCode: 200, data: { query: 'blue', tracks: { items: [] } } };
      });

    await createSession().searchTracks('blue', 3);

    expect(seen).toHaveLength(1);
    expect(seen[0]?.get('query')).toBe('blue');
    expect(seen[0]?.get('limit')).toBe('3');
  });
});
