/**
 * Session - one tenant's queue, playback state and voice handle.
 *
 * Every mutation runs inside `mutex.runExclusive`, including the advance
 * loop's reactions to transport signals. Resolution happens outside the lock
 * so a slow backend never blocks skip/stop, but results are applied in the
 * order the play commands arrived.
 *
 * Push events go out after each applied mutation. `snapshot()` reads the
 * live state directly and is always current.
 */
import { Mutex } from 'async-mutex';
import type {
  DedupPolicy,
  PlaybackState,
  PlayResult,
  SessionEventKind,
  SessionSnapshot,
  SkipResult,
  StopResult,
  Track,
  VoiceChannelInfo,
} from '../../types/voice';
import { createLogger } from '../logger';
import { throwIfAborted, withTimeout } from '../async';
import {
  CancelledError,
  InputError,
  InternalError,
  ResolutionError,
  StateError,
  TransportError,
  TunedeckError,
  formatError,
  logErrorWithStack,
} from '../errors';
import { AdvanceLoop } from './AdvanceLoop';
import { ALL_EVENT_KINDS, type Broadcaster } from './Broadcaster';
import { DEFAULT_VOLUME } from './constants';
import { PlaybackStateMachine, type PlaybackTrigger } from './PlaybackStateMachine';
import type { MediaResolver, PlaylistItem } from './resolver/MediaResolver';
import { assertVolume } from './track';
import { TrackQueue } from './TrackQueue';
import type { VoiceConnectionHandle, VoiceTransport } from './transport/types';

const log = createLogger('SESSION');

export interface SessionOptions {
  tenantId: string;
  resolver: MediaResolver;
  transport: VoiceTransport;
  broadcaster: Broadcaster;
  dedup?: DedupPolicy;
  defaultVolume?: number;
  voiceJoinTimeoutMs?: number;
  /** Bound on handing a track to the transport */
  playbackStartTimeoutMs?: number;
  /** 0 disables the idle timeout */
  idleTimeoutMs?: number;
  /** Called after an idle timeout has left voice */
  onIdleTimeout?: (session: Session) => void;
  now?: () => number;
}

export interface PlayOptions {
  requestedBy?: string | null;
}

interface Turn {
  /** Settles when every earlier play has applied its result */
  ready: Promise<void>;
  release: () => void;
}

export function emptySnapshot(
  tenantId: string,
  name: string | null,
  volume = DEFAULT_VOLUME,
  voiceChannels: VoiceChannelInfo[] = []
): SessionSnapshot {
  return {
    id: tenantId,
    name,
    state: 'disconnected',
    isPlaying: false,
    isPaused: false,
    voiceConnected: false,
    channelId: null,
    currentSong: null,
    queue: [],
    queueLength: 0,
    memberCount: 0,
    volume,
    lastActivity: 0,
    voiceChannels,
  };
}

export class Session {
  readonly tenantId: string;

  private readonly resolver: MediaResolver;
  private readonly transport: VoiceTransport;
  private readonly broadcaster: Broadcaster;
  private readonly voiceJoinTimeoutMs: number;
  private readonly playbackStartTimeoutMs: number;
  private readonly idleTimeoutMs: number;
  private readonly onIdleTimeout: ((session: Session) => void) | undefined;
  private readonly now: () => number;

  private readonly mutex = new Mutex();
  private readonly machine = new PlaybackStateMachine();
  private readonly queue: TrackQueue;
  private current: Track | null = null;
  private volume: number;
  private handle: VoiceConnectionHandle | null = null;
  private loop: AdvanceLoop | null = null;
  private lastActivity: number;

  /** Resolutions and playlist ingestions that stop() cancels */
  private readonly pending = new Set<AbortController>();
  private playbackStart: AbortController | null = null;
  /** Incremented for every playback start; transport signals carry it back */
  private playbackId = 0;
  /** playbackId whose audio actually started */
  private startedPlaybackId: number | null = null;
  private lastTurn: Promise<void> = Promise.resolve();
  private pendingJoins = 0;
  private readonly joinController = new AbortController();
  private readonly background = new Set<Promise<void>>();
  private idleTimer: NodeJS.Timeout | null = null;
  private disposed = false;

  constructor(options: SessionOptions) {
    this.tenantId = options.tenantId;
    this.resolver = options.resolver;
    this.transport = options.transport;
    this.broadcaster = options.broadcaster;
    this.queue = new TrackQueue(options.dedup ?? 'off');
    this.volume = options.defaultVolume ?? DEFAULT_VOLUME;
    this.voiceJoinTimeoutMs = options.voiceJoinTimeoutMs ?? 10000;
    this.playbackStartTimeoutMs = options.playbackStartTimeoutMs ?? 15000;
    this.idleTimeoutMs = options.idleTimeoutMs ?? 0;
    this.onIdleTimeout = options.onIdleTimeout;
    this.now = options.now ?? Date.now;
    this.lastActivity = this.now();

    this.machine.onChange((from, to, trigger) => {
      log.debug(`[${this.tenantId}] ${from} -> ${to} (${trigger})`);
    });
  }

  get state(): PlaybackState {
    return this.machine.state;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Current state, read without the lock. Always reflects the latest
   * applied mutation.
   */
  snapshot(): SessionSnapshot {
    const state = this.machine.state;
    return {
      id: this.tenantId,
      name: this.transport.tenantName(this.tenantId),
      state,
      isPlaying: state === 'playing',
      isPaused: state === 'paused',
      voiceConnected: this.handle !== null && this.machine.isConnected,
      channelId: this.handle?.channelId ?? null,
      currentSong: this.current,
      queue: this.queue.toArray(),
      queueLength: this.queue.length,
      memberCount: this.handle?.memberCount() ?? 0,
      volume: this.volume,
      lastActivity: this.lastActivity,
      voiceChannels: this.transport.voiceChannels(this.tenantId),
    };
  }

  async join(channelId: string): Promise<SessionSnapshot> {
    this.assertOpen();
    if (!channelId.trim()) {
      throw new InputError('channelId is required');
    }

    this.pendingJoins++;
    try {
      return await this.mutex.runExclusive(async () => {
        this.assertOpen();
        if (this.machine.state !== 'disconnected') {
          if (this.handle?.channelId === channelId) return this.snapshot();
          throw new StateError('Already connected to another voice channel', {
            channelId: this.handle?.channelId ?? null,
          });
        }

        this.machine.transition('join');
        let handle: VoiceConnectionHandle;
        try {
          handle = await this.transport.join(this.tenantId, channelId, {
            timeoutMs: this.voiceJoinTimeoutMs,
            signal: this.joinController.signal,
          });
        } catch (err) {
          this.machine.transition('connectFailed');
          this.changed(['song_update']);
          if (err instanceof TunedeckError) throw err;
          throw new TransportError(`Failed to join voice: ${formatError(err).message}`, {
            cause: err,
          });
        }

        this.attach(handle);
        this.machine.transition('connected');
        log.info(`[${this.tenantId}] Joined channel ${channelId}`);

        // Tracks kept from an earlier connection resume here
        const next = this.queue.shift();
        if (next) {
          this.beginTrack(next, 'play');
        }
        this.changed();
        return this.snapshot();
      });
    } finally {
      this.pendingJoins--;
    }
  }

  /**
   * Resolve `input` and play it, or queue it behind the current track.
   * Playlists return after their first playable entry; the rest keep
   * arriving in the background (`pending: true`).
   */
  async play(input: string, options: PlayOptions = {}): Promise<PlayResult> {
    this.assertOpen();
    if (!input.trim()) {
      throw new InputError('Input must not be empty');
    }
    if (this.machine.state === 'disconnected' && this.pendingJoins === 0) {
      throw new StateError('Not connected to a voice channel');
    }

    const isPlaylist = this.resolver.isPlaylist(input);
    const controller = new AbortController();
    this.pending.add(controller);
    const turn = this.takeTurn();
    const finish = () => {
      turn.release();
      this.pending.delete(controller);
    };

    if (!isPlaylist) {
      try {
        return await this.playSingle(input, options, controller.signal, turn.ready);
      } finally {
        finish();
      }
    }

    let iterator: AsyncIterator<PlaylistItem>;
    let first: PlayResult;
    try {
      const items = this.resolver.resolvePlaylist(input, {
        requestedBy: options.requestedBy,
        signal: controller.signal,
      });
      iterator = items[Symbol.asyncIterator]();
      first = await this.ingestFirst(iterator, controller.signal, turn.ready);
    } catch (err) {
      finish();
      throw err;
    }

    this.runInBackground(this.ingestRest(iterator, controller.signal).finally(finish));
    return first;
  }

  async skip(): Promise<SkipResult> {
    this.assertOpen();
    return this.mutex.runExclusive(() => {
      this.assertOpen();
      this.machine.assert('advance');
      const result = this.advance();
      log.info(
        `[${this.tenantId}] Skipped "${result.skipped?.title ?? 'nothing'}", next: ${result.next?.title ?? 'none'}`
      );
      return result;
    });
  }

  async pause(): Promise<SessionSnapshot> {
    return this.toggle('pause');
  }

  async resume(): Promise<SessionSnapshot> {
    return this.toggle('resume');
  }

  /**
   * Clear the queue and the current track. Pending resolutions and playlist
   * ingestion are cancelled first so nothing lands after the stop.
   */
  async stop(): Promise<StopResult> {
    this.assertOpen();
    this.cancelPending();

    return this.mutex.runExclusive(() => {
      this.assertOpen();
      const cleared = this.queue.clear();
      this.invalidatePlayback();
      this.current = null;
      this.handle?.stopPlayback();
      // Disconnected sessions keep their state; only the queue goes
      if (this.machine.can('stop')) {
        this.machine.transition('stop');
      }
      log.info(`[${this.tenantId}] Stopped, cleared ${cleared} queued track(s)`);
      this.changed();
      return { cleared };
    });
  }

  async setVolume(volume: number): Promise<SessionSnapshot> {
    this.assertOpen();
    assertVolume(volume);

    return this.mutex.runExclusive(() => {
      this.volume = volume;
      // A per-track override keeps priority while that track plays
      if (this.current?.volume === undefined) {
        this.handle?.setVolume(volume);
      }
      this.changed(['song_update']);
      return this.snapshot();
    });
  }

  async removeFromQueue(index: number): Promise<Track> {
    this.assertOpen();
    return this.mutex.runExclusive(() => {
      const removed = this.queue.remove(index);
      log.info(`[${this.tenantId}] Removed "${removed.title}" from queue at index ${index}`);
      this.changed(['queue_update']);
      return removed;
    });
  }

  async clearQueue(): Promise<StopResult> {
    this.assertOpen();
    return this.mutex.runExclusive(() => {
      const cleared = this.queue.clear();
      this.changed(['queue_update']);
      return { cleared };
    });
  }

  /**
   * Drop duplicates (and copies of the current track) from the queue
   */
  async pruneQueue(): Promise<number> {
    this.assertOpen();
    return this.mutex.runExclusive(() => {
      const removed = this.queue.prune(this.current?.sourceUrl ?? null);
      if (removed > 0) {
        this.changed(['queue_update']);
      }
      return removed;
    });
  }

  /**
   * Start the queued track at `index` now. The current track, if any, is
   * dropped rather than requeued.
   */
  async playNow(index: number): Promise<Track> {
    this.assertOpen();
    return this.mutex.runExclusive(() => {
      if (!this.machine.isConnected) {
        throw new StateError('Not connected to a voice channel');
      }
      const track = this.queue.take(index);
      if (this.machine.isActive) {
        this.handle?.stopPlayback();
        this.beginTrack(track, 'advance');
      } else {
        this.beginTrack(track, 'play');
      }
      log.info(`[${this.tenantId}] Playing "${track.title}" now (from index ${index})`);
      this.changed();
      return track;
    });
  }

  /**
   * Re-evaluate the idle timeout after listeners joined or left the channel
   */
  refreshOccupancy(): void {
    if (this.disposed) return;
    this.syncIdleTimer();
  }

  /**
   * Wait for background work (playback starts, playlist ingestion, advance
   * loop reactions) to finish.
   */
  async settled(): Promise<void> {
    while (this.background.size > 0) {
      await Promise.allSettled([...this.background]);
    }
  }

  /**
   * Cancel everything, leave voice and discard the queue. Used on explicit
   * leave and registry removal. A failed leave is reported after cleanup.
   */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    this.clearIdleTimer();
    this.cancelPending();
    this.joinController.abort();

    let leaveError: unknown = null;
    await this.mutex.runExclusive(async () => {
      this.queue.clear();
      this.invalidatePlayback();
      this.current = null;
      const handle = this.detach();
      if (this.machine.can('disconnect')) {
        this.machine.transition('disconnect');
      }
      this.emit();
      if (handle) {
        try {
          await handle.leave();
        } catch (err) {
          leaveError = err;
        }
      }
    });

    await this.settled();
    log.info(`[${this.tenantId}] Session closed`);

    if (leaveError !== null) {
      if (leaveError instanceof TransportError) throw leaveError;
      throw new TransportError(`Failed to leave voice: ${formatError(leaveError).message}`, {
        cause: leaveError,
      });
    }
  }

  private async playSingle(
    input: string,
    options: PlayOptions,
    signal: AbortSignal,
    ready: Promise<void>
  ): Promise<PlayResult> {
    let track: Track;
    try {
      track = await this.resolver.resolve(input, {
        requestedBy: options.requestedBy,
        signal,
      });
    } finally {
      // Keep arrival order even when this resolution failed
      await ready;
    }

    return this.mutex.runExclusive(() => {
      this.assertApplicable(signal);
      const applied = this.applyTrack(track);
      this.changed(applied.started ? ALL_EVENT_KINDS : ['queue_update']);
      return { tracks: [track], ...applied, pending: false };
    });
  }

  private async ingestFirst(
    iterator: AsyncIterator<PlaylistItem>,
    signal: AbortSignal,
    ready: Promise<void>
  ): Promise<PlayResult> {
    try {
      return await this.takeFirstPlaylistTrack(iterator, signal, ready);
    } catch (err) {
      await iterator.return?.();
      throw err;
    }
  }

  private async takeFirstPlaylistTrack(
    iterator: AsyncIterator<PlaylistItem>,
    signal: AbortSignal,
    ready: Promise<void>
  ): Promise<PlayResult> {
    let failed = 0;
    let duplicates = 0;
    let lastError: TunedeckError | null = null;

    for (;;) {
      let next: IteratorResult<PlaylistItem>;
      try {
        next = await iterator.next();
      } catch (err) {
        await ready;
        throw err;
      }

      if (next.done) {
        await ready;
        if (duplicates > 0) {
          throw new InputError(
            `Every playlist entry was rejected: ${duplicates} already queued, ${failed} unresolvable`
          );
        }
        const detail = lastError ? `: ${lastError.message}` : '';
        throw new ResolutionError(
          'NotFound',
          `None of the ${failed} playlist entries could be resolved${detail}`,
          { cause: lastError }
        );
      }

      const item = next.value;
      if (!item.ok) {
        failed++;
        lastError = item.error;
        continue;
      }

      await ready;
      const result = await this.mutex.runExclusive((): PlayResult | null => {
        this.assertApplicable(signal);
        const applied = this.tryApplyPlaylistTrack(item.track);
        if (!applied) return null;
        this.changed(applied.started ? ALL_EVENT_KINDS : ['queue_update']);
        return { tracks: [item.track], ...applied, pending: true };
      });
      if (result) return result;
      duplicates++;
    }
  }

  private async ingestRest(
    iterator: AsyncIterator<PlaylistItem>,
    signal: AbortSignal
  ): Promise<void> {
    let added = 1;
    let failed = 0;
    try {
      for (;;) {
        const next = await iterator.next();
        if (next.done) break;

        const item = next.value;
        if (!item.ok) {
          failed++;
          continue;
        }

        await this.mutex.runExclusive(() => {
          this.assertApplicable(signal);
          const applied = this.tryApplyPlaylistTrack(item.track);
          if (!applied) return;
          added++;
          this.changed(applied.started ? ALL_EVENT_KINDS : ['queue_update']);
        });
      }
      log.info(`[${this.tenantId}] Playlist finished: ${added} added, ${failed} failed`);
    } catch (err) {
      if (err instanceof CancelledError) {
        log.debug(`[${this.tenantId}] Playlist ingestion cancelled after ${added} track(s)`);
        return;
      }
      logErrorWithStack(log, `[${this.tenantId}] Playlist ingestion stopped`, err);
    } finally {
      await iterator.return?.();
    }
  }

  /**
   * Playlist entries rejected by the dedup policy are skipped, not fatal
   */
  private tryApplyPlaylistTrack(
    track: Track
  ): { started: boolean; position: number | null } | null {
    try {
      return this.applyTrack(track);
    } catch (err) {
      if (err instanceof InputError) {
        log.debug(`[${this.tenantId}] Skipping playlist entry: ${err.message}`);
        return null;
      }
      throw err;
    }
  }

  /**
   * Start `track` when idle, otherwise queue it. Caller holds the lock.
   */
  private applyTrack(track: Track): { started: boolean; position: number | null } {
    if (this.machine.state === 'idle') {
      this.beginTrack(track, 'play');
      log.info(`[${this.tenantId}] Now playing "${track.title}"`);
      return { started: true, position: null };
    }
    const position = this.queue.enqueue(track, this.current?.sourceUrl ?? null);
    log.info(`[${this.tenantId}] Queued "${track.title}" at position ${position}`);
    return { started: false, position };
  }

  /**
   * Make the next queued track current, or go idle when the queue is empty.
   * Caller holds the lock and has checked the machine allows advancing.
   */
  private advance(): SkipResult {
    const skipped = this.current;
    this.handle?.stopPlayback();

    const next = this.queue.shift();
    if (next) {
      this.beginTrack(next, 'advance');
    } else {
      this.invalidatePlayback();
      this.current = null;
      this.machine.transition('finish');
    }
    this.changed();
    return { skipped, next: next ?? null };
  }

  private beginTrack(track: Track, trigger: Extract<PlaybackTrigger, 'play' | 'advance'>): void {
    const handle = this.handle;
    if (!handle) {
      throw new InternalError('No voice handle for a connected session');
    }

    this.machine.transition(trigger);
    this.current = track;
    this.invalidatePlayback();

    const controller = new AbortController();
    this.playbackStart = controller;
    const playbackId = this.playbackId;
    const volume = track.volume ?? this.volume;
    this.runInBackground(this.startPlayback(handle, track, volume, playbackId, controller));
  }

  private async startPlayback(
    handle: VoiceConnectionHandle,
    track: Track,
    volume: number,
    playbackId: number,
    controller: AbortController
  ): Promise<void> {
    try {
      await withTimeout(
        (signal) => handle.play(track, volume, playbackId, signal),
        this.playbackStartTimeoutMs,
        () => new ResolutionError('Timeout', `Starting "${track.title}" timed out`),
        controller.signal
      );
      if (playbackId === this.playbackId) {
        this.startedPlaybackId = playbackId;
      }
    } catch (err) {
      if (err instanceof CancelledError || controller.signal.aborted) {
        log.debug(`[${this.tenantId}] Start of "${track.title}" superseded`);
        return;
      }
      logErrorWithStack(log, `[${this.tenantId}] Failed to start "${track.title}"`, err);
      await this.mutex.runExclusive(() => {
        if (this.disposed || playbackId !== this.playbackId || !this.machine.isActive) return;
        this.advance();
      });
    } finally {
      if (this.playbackStart === controller) {
        this.playbackStart = null;
      }
    }
  }

  private async onPlaybackEnded(playbackId: number, error: Error | null): Promise<void> {
    await this.mutex.runExclusive(() => {
      if (this.disposed) return;
      if (playbackId !== this.playbackId || !this.machine.isActive) {
        log.debug(`[${this.tenantId}] Ignoring signal for superseded playback ${playbackId}`);
        return;
      }
      if (error) {
        log.warn(`[${this.tenantId}] "${this.current?.title ?? 'track'}" failed mid-stream, advancing`);
      }
      this.advance();
    });
  }

  private async onDisconnected(reason: string): Promise<void> {
    await this.mutex.runExclusive(() => {
      if (this.disposed || !this.machine.can('disconnect')) return;

      const current = this.current;
      const started = this.startedPlaybackId === this.playbackId;
      this.invalidatePlayback();
      // A track that never produced audio is retried on the next join
      if (current && !started) {
        this.queue.requeueFront(current);
      }
      this.current = null;
      this.detach();
      this.machine.transition('disconnect');
      log.warn(`[${this.tenantId}] Voice disconnected (${reason}); ${this.queue.length} queued`);
      this.changed();
    });
  }

  private async toggle(trigger: 'pause' | 'resume'): Promise<SessionSnapshot> {
    this.assertOpen();
    return this.mutex.runExclusive(() => {
      this.machine.assert(trigger);
      if (trigger === 'pause') {
        this.handle?.pause();
      } else {
        this.handle?.resume();
      }
      this.machine.transition(trigger);
      this.changed(['song_update']);
      return this.snapshot();
    });
  }

  private async onIdleTimer(): Promise<void> {
    this.idleTimer = null;
    const timedOut = await this.mutex.runExclusive(async () => {
      if (this.disposed || !this.machine.can('idleTimeout')) return false;
      if ((this.handle?.memberCount() ?? 0) > 0) return false;

      const handle = this.detach();
      this.machine.transition('idleTimeout');
      log.info(`[${this.tenantId}] Idle timeout, leaving voice`);
      this.changed(['song_update']);
      if (handle) {
        try {
          await handle.leave();
        } catch (err) {
          logErrorWithStack(log, `[${this.tenantId}] Failed to leave voice after idle timeout`, err);
        }
      }
      return true;
    });
    if (timedOut) {
      this.onIdleTimeout?.(this);
    }
  }

  private attach(handle: VoiceConnectionHandle): void {
    this.handle = handle;
    this.loop = new AdvanceLoop(
      this.tenantId,
      handle,
      {
        onFinished: (playbackId) => this.onPlaybackEnded(playbackId, null),
        onError: (playbackId, error) => this.onPlaybackEnded(playbackId, error),
        onDisconnected: (reason) => this.onDisconnected(reason),
      },
      (task) => this.runInBackground(task)
    );
    this.loop.start();
  }

  private detach(): VoiceConnectionHandle | null {
    const handle = this.handle;
    this.loop?.stop();
    this.loop = null;
    this.handle = null;
    return handle;
  }

  /**
   * Abort the pending playback start and make outstanding transport
   * signals stale
   */
  private invalidatePlayback(): void {
    this.playbackStart?.abort();
    this.playbackStart = null;
    this.playbackId++;
  }

  private cancelPending(): void {
    for (const controller of this.pending) {
      controller.abort();
    }
    this.pending.clear();
  }

  private takeTurn(): Turn {
    const ready = this.lastTurn;
    let release: () => void = () => undefined;
    const mine = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.lastTurn = ready.then(() => mine);
    return { ready, release };
  }

  private runInBackground(task: Promise<void>): void {
    const tracked: Promise<void> = task
      .catch((err: unknown) => {
        logErrorWithStack(log, `[${this.tenantId}] Background task failed`, err);
      })
      .finally(() => {
        this.background.delete(tracked);
      });
    this.background.add(tracked);
  }

  private changed(kinds: readonly SessionEventKind[] = ALL_EVENT_KINDS): void {
    this.lastActivity = this.now();
    this.syncIdleTimer();
    this.emit(kinds);
  }

  private emit(kinds: readonly SessionEventKind[] = ALL_EVENT_KINDS): void {
    this.broadcaster.publishState(this.snapshot(), kinds);
  }

  private syncIdleTimer(): void {
    const shouldArm =
      this.idleTimeoutMs > 0 &&
      this.machine.state === 'idle' &&
      (this.handle?.memberCount() ?? 0) === 0;

    if (!shouldArm) {
      this.clearIdleTimer();
      return;
    }
    if (this.idleTimer) return;

    this.idleTimer = setTimeout(() => {
      this.runInBackground(this.onIdleTimer());
    }, this.idleTimeoutMs);
    this.idleTimer.unref();
  }

  private clearIdleTimer(): void {
    if (this.idleTimer) {
      clearTimeout(this.idleTimer);
      this.idleTimer = null;
    }
  }

  private assertOpen(): void {
    if (this.disposed) {
      throw new StateError('Session has been closed');
    }
  }

  /**
   * Checks before a resolved track is applied: the play was not cancelled
   * and the session can still take tracks
   */
  private assertApplicable(signal: AbortSignal): void {
    throwIfAborted(signal);
    this.assertOpen();
    if (!this.machine.isConnected) {
      throw new StateError('Not connected to a voice channel');
    }
  }
}
