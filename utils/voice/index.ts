export { Broadcaster, ALL_EVENT_KINDS, type SessionEventListener } from './Broadcaster';
export { AdvanceLoop, type AdvanceHandlers } from './AdvanceLoop';
export { PlaybackStateMachine, type PlaybackTrigger } from './PlaybackStateMachine';
export { Session, emptySnapshot, type PlayOptions, type SessionOptions } from './Session';
export { SessionRegistry, type SessionRegistryOptions } from './SessionRegistry';
export { TrackQueue, dedupKey } from './TrackQueue';
export { createTrack, assertVolume, type TrackInit } from './track';
export {
  MediaResolver,
  type MediaResolverOptions,
  type PlaylistItem,
  type ResolveOptions,
} from './resolver/MediaResolver';
export { PlayDlBackend, classifyExtractionError, buildSpotifyQuery } from './resolver/PlayDlBackend';
export type { ExtractionBackend, ExtractionResult, PlaylistEntry } from './resolver/types';
export { DiscordVoiceTransport } from './transport/DiscordVoiceTransport';
export type {
  TransportSignal,
  VoiceConnectionHandle,
  VoiceTransport,
} from './transport/types';
