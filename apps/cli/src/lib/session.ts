/**
 * Authenticated session setup
 */

import { CatalogSession } from '@hiresdl/api';
import { extensionFor, type CredentialProvider, type Tagger } from '@hiresdl/core';
import { FfmpegTagger, NoopTagger } from '@hiresdl/processing';
import { createLogger } from '@hiresdl/utils';
import type { CliConfig } from '../config/index.js';

export const TRACK_URL_BASE = 'https://open.qobuz.com/track/';

export function trackUrl(trackId: number | string): string {
  return `${TRACK_URL_BASE}${trackId}`;
}

/**
 * Validate a secret and authenticate. The session is closed again when
 * either step fails.
 */
export async function openSession(config: CliConfig, credentials: CredentialProvider): Promise<CatalogSession> {
  const { appId, secrets } = await credentials.getCredentials();
  const session = new CatalogSession({
    appId,
    secrets,
    baseUrl: config.api.baseUrl,
    timeoutMs: config.api.timeoutMs,
    logger: createLogger({ component: 'catalog-session' }),
  });

  try {
    await session.validatedSecret();
    if (config.auth.kind === 'token') {
      await session.authViaToken(config.auth.token);
    } else {
      await session.login(config.auth.email, config.auth.passwordMd5);
    }
    return session;
  } catch (error) {
    await session.close();
    throw error;
  }
}

export function createTagger(config: CliConfig): Tagger {
  if (config.tagger === 'none') {
    return new NoopTagger();
  }
  return new FfmpegTagger({
    format: extensionFor(config.settings.quality),
    binary: config.ffmpegPath,
  });
}
