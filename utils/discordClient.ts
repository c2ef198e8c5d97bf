import { Client, Events, GatewayIntentBits, type VoiceState } from 'discord.js';
import { createLogger, type Logger } from './logger';
import { logErrorWithStack } from './errors';
import type { SessionRegistry } from './voice/SessionRegistry';

const log = createLogger('CLIENT');

/**
 * Discord client with the intents voice playback needs
 */
export function createDiscordClient(): Client {
  return new Client({
    intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildVoiceStates],
  });
}

export function setupDiscordClientHandlers(
  client: Client,
  registry: SessionRegistry,
  options: { onReady?: () => void; logger?: Logger } = {}
): void {
  const { onReady, logger = log } = options;

  client.on(Events.Error, (error) => {
    logErrorWithStack(logger, 'Client error', error);
  });

  client.once(Events.ClientReady, (ready) => {
    logger.info(`Ready as ${ready.user.tag} in ${ready.guilds.cache.size} guilds`);
    onReady?.();
  });

  // Listeners coming and going drive the idle timeout
  client.on(Events.VoiceStateUpdate, (oldState: VoiceState, newState: VoiceState) => {
    if (oldState.channelId === newState.channelId) return;
    registry.get(newState.guild.id)?.refreshOccupancy();
  });

  client.on(Events.GuildDelete, (guild) => {
    logger.info(`Removed from guild ${guild.id}; dropping its session`);
    registry.remove(guild.id).catch((err: unknown) => {
      logErrorWithStack(logger, `Failed to drop session for ${guild.id}`, err);
    });
  });
}

/**
 * Log in, or stay in degraded mode (HTTP only) without a token
 */
export async function loginDiscordClient(
  client: Client,
  token: string | undefined,
  options: { onDegraded?: () => void; logger?: Logger } = {}
): Promise<void> {
  const { onDegraded, logger = log } = options;

  if (token) {
    await client.login(token);
  } else {
    logger.warn('Bot token missing; running in degraded mode (HTTP only)');
    onDegraded?.();
  }
}
