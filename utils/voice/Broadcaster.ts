/**
 * Tenant-scoped event bus for session state changes.
 *
 * Push is best-effort and at-most-once: nothing is retried or acknowledged.
 * Observers reconcile by pulling `Session.snapshot()`, which is authoritative.
 */
import type { SessionEvent, SessionEventKind, SessionSnapshot } from '../../types/voice';
import { createLogger } from '../logger';
import { formatError } from '../errors';

const log = createLogger('BROADCAST');

export type SessionEventListener = (event: SessionEvent) => void;

export const ALL_EVENT_KINDS: readonly SessionEventKind[] = ['song_update', 'queue_update'];

export class Broadcaster {
  /** tenantId -> listeners */
  private readonly channels = new Map<string, Set<SessionEventListener>>();

  subscribe(tenantId: string, listener: SessionEventListener): () => void {
    let set = this.channels.get(tenantId);
    if (!set) {
      set = new Set();
      this.channels.set(tenantId, set);
    }
    set.add(listener);
    log.debug(`Subscriber added for ${tenantId} (${set.size} total)`);

    return () => this.unsubscribe(tenantId, listener);
  }

  unsubscribe(tenantId: string, listener: SessionEventListener): boolean {
    const set = this.channels.get(tenantId);
    if (!set) return false;

    const removed = set.delete(listener);
    if (set.size === 0) {
      this.channels.delete(tenantId);
    }
    return removed;
  }

  subscriberCount(tenantId: string): number {
    return this.channels.get(tenantId)?.size ?? 0;
  }

  /**
   * Deliver one event to every subscriber of its tenant. A throwing listener
   * is logged; the remaining listeners still receive the event.
   */
  publish(event: SessionEvent): number {
    const set = this.channels.get(event.tenantId);
    if (!set || set.size === 0) return 0;

    let delivered = 0;
    // Copy: listeners may unsubscribe while we iterate
    for (const listener of [...set]) {
      try {
        listener(event);
        delivered++;
      } catch (err) {
        log.warn(
          `Listener for ${event.tenantId} failed on ${event.kind}: ${formatError(err).message}`
        );
      }
    }
    return delivered;
  }

  /**
   * Emit song_update and/or queue_update built from a snapshot
   */
  publishState(
    snapshot: SessionSnapshot,
    kinds: readonly SessionEventKind[] = ALL_EVENT_KINDS
  ): void {
    for (const kind of kinds) {
      if (kind === 'song_update') {
        this.publish({
          tenantId: snapshot.id,
          kind,
          payload: {
            currentTrack: snapshot.currentSong,
            isPlaying: snapshot.isPlaying,
            isPaused: snapshot.isPaused,
          },
        });
      } else {
        this.publish({
          tenantId: snapshot.id,
          kind,
          payload: { queue: snapshot.queue, queueLength: snapshot.queueLength },
        });
      }
    }
  }
}
