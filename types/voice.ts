/**
 * Voice session type definitions
 * Shared by the session core, the dashboard API and the voice transport.
 */

export type SourceType = 'youtube' | 'spotify' | 'soundcloud' | 'other';

/**
 * A resolved, playable media item. Built by `createTrack` with every field
 * defaulted, then frozen.
 */
export interface Track {
  readonly id: string;
  readonly sourceUrl: string;
  readonly title: string;
  readonly thumbnailUrl: string;
  /** Seconds; 0 when unknown (live streams, direct files) */
  readonly duration: number;
  readonly requestedBy: string | null;
  /** What the voice transport streams from */
  readonly resolvedStreamUri: string;
  readonly sourceType: SourceType;
  /** Per-track volume override in [0, 150] */
  readonly volume?: number;
}

export type PlaybackState = 'disconnected' | 'connecting' | 'idle' | 'playing' | 'paused';

export type DedupPolicy = 'off' | 'reject' | 'relocate';

/**
 * Full session state as read by dashboards. Pulling this is always
 * authoritative; push events are only a latency optimization.
 */
export interface SessionSnapshot {
  id: string;
  name: string | null;
  state: PlaybackState;
  isPlaying: boolean;
  isPaused: boolean;
  voiceConnected: boolean;
  channelId: string | null;
  currentSong: Track | null;
  queue: Track[];
  queueLength: number;
  memberCount: number;
  volume: number;
  lastActivity: number;
  /** Channels a join can target, for the dashboard's channel picker */
  voiceChannels: VoiceChannelInfo[];
}

export interface VoiceChannelInfo {
  id: string;
  name: string;
  /** Listeners in the channel, bots excluded */
  memberCount: number;
}

export interface TenantInfo {
  id: string;
  name: string;
}

/**
 * One row of the guild directory: every guild the bot is in, plus any
 * session whose guild is no longer visible
 */
export interface TenantSummary {
  id: string;
  name: string | null;
  state: PlaybackState;
  isPlaying: boolean;
  isPaused: boolean;
  hasSession: boolean;
}

export type SessionEventKind = 'song_update' | 'queue_update';

export interface SongUpdatePayload {
  currentTrack: Track | null;
  isPlaying: boolean;
  isPaused: boolean;
}

export interface QueueUpdatePayload {
  queue: Track[];
  queueLength: number;
}

export type SessionEvent =
  | { tenantId: string; kind: 'song_update'; payload: SongUpdatePayload }
  | { tenantId: string; kind: 'queue_update'; payload: QueueUpdatePayload };

export interface PlayResult {
  /** Tracks applied by this call (for playlists: the first one, the rest follow in the background) */
  tracks: Track[];
  /** True when the first track started playing instead of being queued */
  started: boolean;
  /** Queue index of the first queued track, or null when it started playing */
  position: number | null;
  /** Playlist ingestion continuing in the background */
  pending: boolean;
}

export interface SkipResult {
  skipped: Track | null;
  next: Track | null;
}

export interface StopResult {
  cleared: number;
}
