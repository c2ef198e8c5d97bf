import { createLogger } from './logger';
import type { DedupPolicy } from '../types/voice';

const log = createLogger('CONFIG');

// Cache the config so we only load/log once
let cachedConfig: AppConfig | null = null;

export interface AppConfig {
  // Bot configuration
  token: string | undefined;

  // Server configuration
  port: number;
  host: string;

  // Resolver configuration
  resolverMaxAttempts: number;
  resolverBackoffMs: number;
  resolveTimeoutMs: number;
  maxPlaylistTracks: number;

  // Session configuration
  voiceJoinTimeoutMs: number;
  idleTimeoutMs: number;
  queueDedup: DedupPolicy;
  defaultVolume: number;

  // Media credentials (for play-dl)
  youtubeCookie: string | undefined;
  spotifyClientId: string | undefined;
  spotifyClientSecret: string | undefined;
  spotifyRefreshToken: string | undefined;
  spotifyMarket: string;
}

const DEDUP_POLICIES: readonly DedupPolicy[] = ['off', 'reject', 'relocate'];

function isDedupPolicy(value: string): value is DedupPolicy {
  return DEDUP_POLICIES.some((policy) => policy === value);
}

interface IntOptions {
  min?: number;
  max?: number;
}

function readInt(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
  { min = 0, max = Number.MAX_SAFE_INTEGER }: IntOptions = {}
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    log.warn(`Invalid ${key}="${raw}", using default ${fallback}`);
    return fallback;
  }
  return value;
}

function maskValue(key: string, value: string): string {
  const shouldMask = key.includes('SECRET') || key.includes('TOKEN') || key.includes('COOKIE');
  if (!shouldMask) return value;
  if (value.length <= 8) return '****';
  return `${value.substring(0, 4)}...${value.substring(value.length - 4)}`;
}

/**
 * Load configuration from environment variables (.env file or env).
 * dotenv is loaded by the entry point before this module is called.
 * Results are cached to avoid duplicate logging.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const relevantEnvVars = Object.keys(env).filter(
    (key) =>
      key.startsWith('DISCORD_') ||
      key.startsWith('RESOLVE') ||
      key.startsWith('SPOTIFY_') ||
      key.startsWith('VOICE_') ||
      key.startsWith('YOUTUBE_') ||
      key === 'PORT' ||
      key === 'HOST' ||
      key === 'LOG_LEVEL' ||
      key === 'IDLE_TIMEOUT_MS' ||
      key === 'QUEUE_DEDUP' ||
      key === 'MAX_PLAYLIST_TRACKS' ||
      key === 'DEFAULT_VOLUME'
  );

  if (relevantEnvVars.length > 0) {
    log.info(
      `Found ${relevantEnvVars.length} relevant environment variables: ${relevantEnvVars.join(', ')}`
    );
    relevantEnvVars.forEach((key) => {
      const value = env[key];
      if (value) {
        log.debug(`  ${key}=${maskValue(key, value)}`);
      }
    });
  } else {
    log.warn('No relevant environment variables found!');
  }

  let queueDedup: DedupPolicy = 'off';
  const rawDedup = env['QUEUE_DEDUP']?.trim().toLowerCase();
  if (rawDedup) {
    if (isDedupPolicy(rawDedup)) {
      queueDedup = rawDedup;
    } else {
      log.warn(`Unknown QUEUE_DEDUP="${rawDedup}", dedup disabled`);
    }
  }

  const config: AppConfig = {
    token: env['DISCORD_TOKEN'] || env['DISCORD_BOT_TOKEN'],

    port: readInt(env, 'PORT', 3000, { min: 0, max: 65535 }),
    host: env['HOST'] || '0.0.0.0',

    resolverMaxAttempts: readInt(env, 'RESOLVER_MAX_ATTEMPTS', 3, { min: 1 }),
    resolverBackoffMs: readInt(env, 'RESOLVER_BACKOFF_MS', 500),
    resolveTimeoutMs: readInt(env, 'RESOLVE_TIMEOUT_MS', 15000, { min: 1 }),
    maxPlaylistTracks: readInt(env, 'MAX_PLAYLIST_TRACKS', 50, { min: 1 }),

    voiceJoinTimeoutMs: readInt(env, 'VOICE_JOIN_TIMEOUT_MS', 10000, { min: 1 }),
    idleTimeoutMs: readInt(env, 'IDLE_TIMEOUT_MS', 300000),
    queueDedup,
    defaultVolume: readInt(env, 'DEFAULT_VOLUME', 100, { min: 0, max: 150 }),

    youtubeCookie: env['YOUTUBE_COOKIE'],
    spotifyClientId: env['SPOTIFY_CLIENT_ID'],
    spotifyClientSecret: env['SPOTIFY_CLIENT_SECRET'],
    spotifyRefreshToken: env['SPOTIFY_REFRESH_TOKEN'],
    spotifyMarket: env['SPOTIFY_MARKET'] || 'US',
  };

  if (!config.token) {
    log.warn('DISCORD_TOKEN is not set; the gateway client will not log in');
  }

  cachedConfig = config;
  return config;
}

/**
 * Drop the cached config (tests load different environments)
 */
export function resetConfigCache(): void {
  cachedConfig = null;
}
