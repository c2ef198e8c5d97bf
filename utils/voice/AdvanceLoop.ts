/**
 * Per-session listener for transport signals. One loop exists per voice
 * handle; it is stopped when the handle is detached (stop, leave, disconnect).
 */
import { createLogger } from '../logger';
import type { TransportSignal, VoiceConnectionHandle } from './transport/types';

const log = createLogger('ADVANCE');

export interface AdvanceHandlers {
  /** Playback `playbackId` ended normally */
  onFinished(playbackId: number): Promise<void>;
  /** Playback `playbackId` failed mid-stream */
  onError(playbackId: number, error: Error): Promise<void>;
  onDisconnected(reason: string): Promise<void>;
}

export class AdvanceLoop {
  private unsubscribe: (() => void) | null = null;
  private handled = 0;

  constructor(
    private readonly tenantId: string,
    private readonly handle: VoiceConnectionHandle,
    private readonly handlers: AdvanceHandlers,
    /** Receives each handler promise so the owner can track and await it */
    private readonly schedule: (task: Promise<void>) => void
  ) {}

  get active(): boolean {
    return this.unsubscribe !== null;
  }

  get signalsHandled(): number {
    return this.handled;
  }

  start(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.handle.onSignal((signal) => {
      if (!this.active) return;
      this.handled++;
      this.schedule(this.dispatch(signal));
    });
    log.debug(`Advance loop started for ${this.tenantId} (channel ${this.handle.channelId})`);
  }

  stop(): void {
    if (!this.unsubscribe) return;
    this.unsubscribe();
    this.unsubscribe = null;
    log.debug(`Advance loop stopped for ${this.tenantId}`);
  }

  private dispatch(signal: TransportSignal): Promise<void> {
    switch (signal.kind) {
      case 'finished':
        return this.handlers.onFinished(signal.playbackId);
      case 'error':
        log.warn(
          `Playback ${signal.playbackId} failed for ${this.tenantId}: ${signal.error.message}`
        );
        return this.handlers.onError(signal.playbackId, signal.error);
      case 'disconnected':
        log.info(`Voice disconnected for ${this.tenantId}: ${signal.reason}`);
        // Nothing arrives after a disconnect
        this.stop();
        return this.handlers.onDisconnected(signal.reason);
    }
  }
}
