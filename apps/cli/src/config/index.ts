/**
 * CLI Configuration
 *
 * Environment (optionally from `.env`) validated with zod. Command line
 * flags take precedence over the matching variables.
 */

import { config as dotenvConfig } from 'dotenv';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { z } from 'zod';
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from '@hiresdl/api';
import {
  DEFAULT_OUTPUT_TEMPLATE,
  createSettings,
  type DownloadSettings,
} from '@hiresdl/acquisition';
import { QUALITY_IDS, isQualityId } from '@hiresdl/core';
import { isNonEmptyString } from '@hiresdl/utils';

export const DEFAULT_ARCHIVE_FILE = join(homedir(), '.config', 'hires-dl', 'download_archive.txt');

const envSchema = z.object({
  HIRESDL_APP_ID: z.string().min(1, 'App id is required'),
  HIRESDL_SECRETS: z
    .string()
    .transform(value => value.split(',').map(secret => secret.trim()).filter(Boolean))
    .refine(secrets => secrets.length > 0, 'At least one app secret is required'),
  HIRESDL_TOKEN: z.string().min(1).optional(),
  HIRESDL_EMAIL: z.string().min(1).optional(),
  HIRESDL_PASSWORD_MD5: z.string().regex(/^[a-f0-9]{32}$/i, 'Expected an md5 hex digest').optional(),

  HIRESDL_QUALITY: z.coerce
    .number()
    .default(6)
    .refine(isQualityId, `Quality must be one of ${QUALITY_IDS.join(', ')}`),
  HIRESDL_MAX_WORKERS: z.coerce.number().int().min(1).default(8),
  HIRESDL_OUTPUT_DIR: z.string().min(1).default('.'),
  HIRESDL_OUTPUT_TEMPLATE: z.string().min(1).default(DEFAULT_OUTPUT_TEMPLATE),
  HIRESDL_ARCHIVE_FILE: z.string().min(1).default(DEFAULT_ARCHIVE_FILE),

  HIRESDL_API_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  HIRESDL_HTTP_TIMEOUT_MS: z.coerce.number().int().min(1).default(DEFAULT_TIMEOUT_MS),

  HIRESDL_TAGGER: z.enum(['ffmpeg', 'none']).default('ffmpeg'),
  FFMPEG_PATH: z.string().min(1).default('ffmpeg'),
}).superRefine((env, ctx) => {
  if (!env.HIRESDL_TOKEN && !(env.HIRESDL_EMAIL && env.HIRESDL_PASSWORD_MD5)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['HIRESDL_TOKEN'],
      message: 'Set HIRESDL_TOKEN, or HIRESDL_EMAIL and HIRESDL_PASSWORD_MD5',
    });
  }
});

type Env = z.infer<typeof envSchema>;

/** Flags shared by the commands that download */
export interface CliFlags {
  quality?: string;
  workers?: string;
  directory?: string;
  template?: string;
  downloadArchive?: boolean;
  fallback?: boolean;
  albumsOnly?: boolean;
  smartDiscography?: boolean;
  embedArt?: boolean;
  cover?: boolean;
  ogCover?: boolean;
  dryRun?: boolean;
}

export type AuthConfig =
  | { kind: 'token'; token: string }
  | { kind: 'password'; email: string; passwordMd5: string };

export interface CliConfig {
  appId: string;
  secrets: readonly string[];
  auth: AuthConfig;
  api: {
    baseUrl: string;
    timeoutMs: number;
  };
  /** Null unless the archive was requested */
  archiveFile: string | null;
  tagger: 'ffmpeg' | 'none';
  ffmpegPath: string;
  settings: DownloadSettings;
}

export type ConfigResult =
  | { ok: true; config: CliConfig }
  | { ok: false; error: z.ZodError };

type RawEnv = Record<string, string | undefined>;

function flagEnv(flags: CliFlags): RawEnv {
  return {
    HIRESDL_QUALITY: flags.quality,
    HIRESDL_MAX_WORKERS: flags.workers,
    HIRESDL_OUTPUT_DIR: flags.directory,
    HIRESDL_OUTPUT_TEMPLATE: flags.template,
  };
}

function authFrom(env: Env): AuthConfig {
  if (env.HIRESDL_TOKEN) {
    return { kind: 'token', token: env.HIRESDL_TOKEN };
  }
  // superRefine guarantees the pair when no token is set
  return {
    kind: 'password',
    email: env.HIRESDL_EMAIL ?? '',
    passwordMd5: env.HIRESDL_PASSWORD_MD5 ?? '',
  };
}

/**
 * Empty variables, as written by a blank `KEY=` line, count as unset
 */
function definedValues(values: RawEnv): RawEnv {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => isNonEmptyString(value)));
}

export function parseConfig(env: RawEnv, flags: CliFlags = {}): ConfigResult {
  const parsed = envSchema.safeParse({ ...definedValues(env), ...definedValues(flagEnv(flags)) });
  if (!parsed.success) {
    return { ok: false, error: parsed.error };
  }

  const data = parsed.data;

  const settings = createSettings({
    quality: data.HIRESDL_QUALITY,
    maxWorkers: data.HIRESDL_MAX_WORKERS,
    outputDir: resolve(data.HIRESDL_OUTPUT_DIR),
    outputTemplate: data.HIRESDL_OUTPUT_TEMPLATE,
    qualityFallback: flags.fallback ?? true,
    albumsOnly: flags.albumsOnly ?? false,
    smartDiscography: flags.smartDiscography ?? false,
    embedArt: flags.embedArt ?? false,
    noCover: flags.cover === false,
    ogCover: flags.ogCover ?? false,
    dryRun: flags.dryRun ?? false,
  });

  return {
    ok: true,
    config: {
      appId: data.HIRESDL_APP_ID,
      secrets: data.HIRESDL_SECRETS,
      auth: authFrom(data),
      api: {
        baseUrl: data.HIRESDL_API_BASE_URL,
        timeoutMs: data.HIRESDL_HTTP_TIMEOUT_MS,
      },
      archiveFile: flags.downloadArchive ? data.HIRESDL_ARCHIVE_FILE : null,
      tagger: data.HIRESDL_TAGGER,
      ffmpegPath: data.FFMPEG_PATH,
      settings,
    },
  };
}

/**
 * Load `.env` from the working directory and parse the environment,
 * exiting on invalid configuration
 */
export function loadConfig(flags: CliFlags = {}): CliConfig {
  dotenvConfig({ path: resolve(process.cwd(), '.env') });

  const result = parseConfig(process.env, flags);
  if (!result.ok) {
    console.error('Invalid environment configuration:');
    console.error(result.error.format());
    process.exit(1);
  }
  return result.config;
}
