/**
 * @discordjs/voice implementation of the voice transport
 */
import {
  joinVoiceChannel,
  createAudioPlayer,
  createAudioResource,
  entersState,
  AudioPlayerStatus,
  NoSubscriberBehavior,
  StreamType,
  VoiceConnectionStatus,
  type AudioPlayer,
  type AudioResource,
  type VoiceConnection,
} from '@discordjs/voice';
import type { Client, Guild, VoiceBasedChannel } from 'discord.js';
import play from 'play-dl';
import { Readable } from 'stream';
import type { TenantInfo, Track, VoiceChannelInfo } from '../../../types/voice';
import { createLogger } from '../../logger';
import { throwIfAborted, withTimeout } from '../../async';
import { CancelledError, InputError, TransportError, formatError } from '../../errors';
import { detectSourceType } from '../../sourceType';
import { FETCH_TIMEOUT_MS, RECONNECT_GRACE_MS } from '../constants';
import type {
  JoinOptions,
  TransportSignal,
  TransportSignalListener,
  VoiceConnectionHandle,
  VoiceTransport,
} from './types';

const log = createLogger('VOICE');

interface PlaybackMetadata {
  playbackId: number;
  trackId: string;
}

function isPlaybackMetadata(value: unknown): value is PlaybackMetadata {
  return (
    typeof value === 'object' &&
    value !== null &&
    'playbackId' in value &&
    typeof value.playbackId === 'number'
  );
}

function toVoiceStreamType(type: string): StreamType {
  switch (type) {
    case 'ogg/opus':
      return StreamType.OggOpus;
    case 'webm/opus':
      return StreamType.WebmOpus;
    case 'opus':
      return StreamType.Opus;
    case 'raw':
      return StreamType.Raw;
    default:
      return StreamType.Arbitrary;
  }
}

async function fetchStream(url: string, signal: AbortSignal): Promise<Readable> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), FETCH_TIMEOUT_MS);
  const onAbort = () => controller.abort();
  signal.addEventListener('abort', onAbort, { once: true });

  try {
    const response = await fetch(url, {
      signal: controller.signal,
      headers: { Accept: '*/*', 'Accept-Encoding': 'identity' },
    });

    if (!response.ok || !response.body) {
      throw new Error(`Stream fetch failed: ${response.status}`);
    }

    const nodeStream = Readable.fromWeb(response.body as Parameters<typeof Readable.fromWeb>[0]);
    nodeStream.on('error', (err) => {
      log.debug(`Readable stream error: ${err.message}`);
    });
    return nodeStream;
  } finally {
    clearTimeout(timeoutId);
    signal.removeEventListener('abort', onAbort);
  }
}

async function openStream(
  track: Track,
  signal: AbortSignal
): Promise<{ stream: Readable; type: StreamType }> {
  const sourceType = detectSourceType(track.resolvedStreamUri);
  if (sourceType === 'youtube' || sourceType === 'soundcloud') {
    const info = await play.stream(track.resolvedStreamUri, { quality: 2 });
    return { stream: info.stream, type: toVoiceStreamType(info.type) };
  }
  return { stream: await fetchStream(track.resolvedStreamUri, signal), type: StreamType.Arbitrary };
}

function countListeners(channel: VoiceBasedChannel): number {
  return channel.members.filter((member) => !member.user.bot).size;
}

class DiscordVoiceHandle implements VoiceConnectionHandle {
  private readonly player: AudioPlayer;
  private resource: AudioResource<PlaybackMetadata> | null = null;
  private readonly listeners = new Set<TransportSignalListener>();
  private closed = false;
  /** Latest requested volume and pause, applied once a stream finishes opening */
  private volume = 100;
  private paused = false;

  constructor(
    private readonly connection: VoiceConnection,
    private readonly guild: Guild,
    readonly channelId: string
  ) {
    this.player = createAudioPlayer({
      behaviors: { noSubscriber: NoSubscriberBehavior.Pause },
    });
    connection.subscribe(this.player);

    this.player.on('stateChange', (oldState, newState) => {
      // A pause requested while buffering lands once audio flows
      if (newState.status === AudioPlayerStatus.Playing && this.paused) {
        this.player.pause();
        return;
      }
      if (newState.status !== AudioPlayerStatus.Idle || oldState.status === AudioPlayerStatus.Idle) {
        return;
      }
      const metadata = 'resource' in oldState ? oldState.resource.metadata : undefined;
      if (isPlaybackMetadata(metadata)) {
        this.emit({ kind: 'finished', playbackId: metadata.playbackId });
      }
    });

    this.player.on('error', (error) => {
      const metadata = error.resource.metadata;
      log.warn(`Player error in guild ${guild.id}: ${error.message}`);
      if (isPlaybackMetadata(metadata)) {
        this.emit({ kind: 'error', playbackId: metadata.playbackId, error });
      }
    });

    connection.on(VoiceConnectionStatus.Disconnected, async () => {
      try {
        await Promise.race([
          entersState(connection, VoiceConnectionStatus.Signalling, RECONNECT_GRACE_MS),
          entersState(connection, VoiceConnectionStatus.Connecting, RECONNECT_GRACE_MS),
        ]);
        log.debug(`Reconnecting to voice in guild ${guild.id}`);
      } catch {
        log.info(`Disconnected from voice in guild ${guild.id}`);
        this.close('Voice connection lost');
      }
    });

    connection.on(VoiceConnectionStatus.Destroyed, () => {
      this.close('Voice connection destroyed');
    });
  }

  async play(track: Track, volume: number, playbackId: number, signal: AbortSignal): Promise<void> {
    throwIfAborted(signal);
    this.volume = volume;
    this.paused = false;
    const { stream, type } = await openStream(track, signal);

    if (signal.aborted) {
      stream.destroy();
      throw new CancelledError();
    }

    const resource = createAudioResource(stream, {
      inputType: type,
      inlineVolume: true,
      metadata: { playbackId, trackId: track.id },
    });
    resource.volume?.setVolume(this.volume / 100);
    this.resource = resource;
    this.player.play(resource);
    if (this.paused) {
      this.player.pause();
    }
    log.debug(`Playing "${track.title}" in guild ${this.guild.id} (playback ${playbackId})`);
  }

  setVolume(volume: number): void {
    this.volume = volume;
    this.resource?.volume?.setVolume(volume / 100);
  }

  /**
   * False when no audio is flowing yet; the pause still applies as soon as
   * the current stream starts.
   */
  pause(): boolean {
    this.paused = true;
    return this.player.pause();
  }

  resume(): boolean {
    this.paused = false;
    return this.player.unpause();
  }

  stopPlayback(): void {
    this.paused = false;
    this.player.stop(true);
    this.resource = null;
  }

  async leave(): Promise<void> {
    this.closed = true;
    this.listeners.clear();
    this.player.stop(true);
    if (this.connection.state.status === VoiceConnectionStatus.Destroyed) return;
    try {
      this.connection.destroy();
      log.info(`Left voice channel in guild ${this.guild.id}`);
    } catch (err) {
      throw new TransportError(`Failed to leave voice: ${formatError(err).message}`, {
        cause: err,
      });
    }
  }

  memberCount(): number {
    const channel = this.guild.channels.cache.get(this.channelId);
    if (!channel?.isVoiceBased()) return 0;
    return countListeners(channel);
  }

  onSignal(listener: TransportSignalListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private close(reason: string): void {
    if (this.closed) return;
    this.emit({ kind: 'disconnected', reason });
    this.closed = true;
    this.player.stop(true);
    if (this.connection.state.status !== VoiceConnectionStatus.Destroyed) {
      this.connection.destroy();
    }
  }

  private emit(signal: TransportSignal): void {
    if (this.closed) return;
    for (const listener of [...this.listeners]) {
      listener(signal);
    }
  }
}

export class DiscordVoiceTransport implements VoiceTransport {
  constructor(private readonly client: Client) {}

  tenantName(tenantId: string): string | null {
    return this.client.guilds.cache.get(tenantId)?.name ?? null;
  }

  listTenants(): TenantInfo[] {
    return [...this.client.guilds.cache.values()].map((guild) => ({
      id: guild.id,
      name: guild.name,
    }));
  }

  voiceChannels(tenantId: string): VoiceChannelInfo[] {
    const guild = this.client.guilds.cache.get(tenantId);
    if (!guild) return [];
    const channels: VoiceChannelInfo[] = [];
    for (const channel of guild.channels.cache.values()) {
      if (!channel.isVoiceBased()) continue;
      channels.push({ id: channel.id, name: channel.name, memberCount: countListeners(channel) });
    }
    return channels;
  }

  async join(
    tenantId: string,
    channelId: string,
    options: JoinOptions
  ): Promise<VoiceConnectionHandle> {
    const guild = this.client.guilds.cache.get(tenantId);
    if (!guild) {
      throw new TransportError(`Guild ${tenantId} is not available to the bot`);
    }
    const channel = guild.channels.cache.get(channelId);
    if (!channel?.isVoiceBased()) {
      throw new InputError(`Channel ${channelId} is not a voice channel`, { channelId });
    }

    const connection = joinVoiceChannel({
      channelId,
      guildId: guild.id,
      adapterCreator: guild.voiceAdapterCreator,
      selfDeaf: true,
    });

    try {
      await withTimeout(
        (signal) => entersState(connection, VoiceConnectionStatus.Ready, signal),
        options.timeoutMs,
        () => new TransportError(`Timed out joining voice after ${options.timeoutMs}ms`),
        options.signal
      );
    } catch (err) {
      if (connection.state.status !== VoiceConnectionStatus.Destroyed) {
        connection.destroy();
      }
      if (err instanceof CancelledError || err instanceof TransportError) throw err;
      throw new TransportError(`Failed to join voice: ${formatError(err).message}`, {
        cause: err,
      });
    }

    log.info(`Joined voice channel: ${channel.name} (${guild.name})`);
    return new DiscordVoiceHandle(connection, guild, channelId);
  }
}
