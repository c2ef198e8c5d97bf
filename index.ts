// Load .env before anything reads process.env
import 'dotenv/config';
import type { Server } from 'http';
import { loadConfig } from './utils/config';
import { createLogger } from './utils/logger';
import { logErrorWithStack, setupProcessErrorHandlers } from './utils/errors';
import {
  createDiscordClient,
  loginDiscordClient,
  setupDiscordClientHandlers,
} from './utils/discordClient';
import {
  Broadcaster,
  DiscordVoiceTransport,
  MediaResolver,
  PlayDlBackend,
  SessionRegistry,
} from './utils/voice';
import { createApp, startServer } from './server';

const log = createLogger('MAIN');

async function main(): Promise<void> {
  setupProcessErrorHandlers(log);
  const config = loadConfig();

  const { spotifyClientId, spotifyClientSecret, spotifyRefreshToken } = config;
  const backend = new PlayDlBackend({
    youtubeCookie: config.youtubeCookie,
    spotify:
      spotifyClientId && spotifyClientSecret && spotifyRefreshToken
        ? {
            clientId: spotifyClientId,
            clientSecret: spotifyClientSecret,
            refreshToken: spotifyRefreshToken,
            market: config.spotifyMarket,
          }
        : undefined,
  });
  try {
    await backend.init();
  } catch (err) {
    // Searches and plain URLs still work without credentials
    logErrorWithStack(log, 'Failed to configure play-dl credentials', err);
  }

  const client = createDiscordClient();
  const broadcaster = new Broadcaster();
  const registry = new SessionRegistry({
    resolver: new MediaResolver({
      backend,
      maxAttempts: config.resolverMaxAttempts,
      backoffMs: config.resolverBackoffMs,
      attemptTimeoutMs: config.resolveTimeoutMs,
      maxPlaylistTracks: config.maxPlaylistTracks,
    }),
    transport: new DiscordVoiceTransport(client),
    broadcaster,
    dedup: config.queueDedup,
    defaultVolume: config.defaultVolume,
    voiceJoinTimeoutMs: config.voiceJoinTimeoutMs,
    playbackStartTimeoutMs: config.resolveTimeoutMs,
    idleTimeoutMs: config.idleTimeoutMs,
  });

  setupDiscordClientHandlers(client, registry);

  const app = createApp({ registry, broadcaster, isReady: () => client.isReady() });
  const server = await startServer(app, config.port, config.host);

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`${signal} received, shutting down`);
    await registry.shutdown();
    await closeServer(server);
    await client.destroy();
    log.info('Shutdown complete');
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logErrorWithStack(log, 'Shutdown failed', err);
        process.exitCode = 1;
      });
    });
  }

  await loginDiscordClient(client, config.token);
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

main().catch((err: unknown) => {
  logErrorWithStack(log, 'Fatal startup error', err);
  process.exit(1);
});
