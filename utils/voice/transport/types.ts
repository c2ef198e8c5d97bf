import type { TenantInfo, Track, VoiceChannelInfo } from '../../../types/voice';

/**
 * Signals a voice handle reports back to its session. `playbackId` is the
 * id passed to `play()`, so signals for superseded playbacks can be told apart.
 */
export type TransportSignal =
  | { kind: 'finished'; playbackId: number }
  | { kind: 'error'; playbackId: number; error: Error }
  | { kind: 'disconnected'; reason: string };

export type TransportSignalListener = (signal: TransportSignal) => void;

export interface VoiceConnectionHandle {
  readonly channelId: string;
  /**
   * Start streaming `track`. Resolves once audio has been handed to the
   * player; must not start audio if `signal` is already aborted.
   */
  play(track: Track, volume: number, playbackId: number, signal: AbortSignal): Promise<void>;
  setVolume(volume: number): void;
  pause(): boolean;
  resume(): boolean;
  stopPlayback(): void;
  leave(): Promise<void>;
  /** Listeners in the channel, bots excluded */
  memberCount(): number;
  onSignal(listener: TransportSignalListener): () => void;
}

export interface JoinOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface VoiceTransport {
  join(tenantId: string, channelId: string, options: JoinOptions): Promise<VoiceConnectionHandle>;
  /** Display name of the tenant, when known */
  tenantName(tenantId: string): string | null;
  /** Every tenant the bot can currently reach */
  listTenants(): TenantInfo[];
  /** Voice channels of a tenant; empty when the tenant is unknown */
  voiceChannels(tenantId: string): VoiceChannelInfo[];
}
