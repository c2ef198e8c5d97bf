/**
 * SSE stream of song/queue updates for one tenant.
 * The first message is always the full snapshot; later messages carry the
 * event payloads as the session publishes them. No heartbeats.
 */
import type { SessionSnapshot } from '../../types/voice';
import { createLogger } from '../../utils/logger';
import type { Broadcaster } from '../../utils/voice/Broadcaster';

const log = createLogger('SSE-SESSION');

/** The part of an express Response an event stream writes to */
export interface EventStreamTarget {
  readonly writableEnded: boolean;
  setHeader(name: string, value: string): unknown;
  flushHeaders(): void;
  write(chunk: string): boolean;
  on(event: 'close', listener: () => void): unknown;
}

/**
 * Write one `data:` message; false once the client has gone away
 */
export function sendEvent(res: EventStreamTarget, event: string, data: unknown): boolean {
  if (res.writableEnded) return false;
  res.write(`data: ${JSON.stringify({ event, data })}\n\n`);
  return true;
}

/**
 * Open an event stream on `res` and keep it subscribed until the client
 * closes it. Returns the cleanup function, which is also run on close.
 */
export function openSessionStream(
  res: EventStreamTarget,
  tenantId: string,
  broadcaster: Broadcaster,
  snapshot: SessionSnapshot
): () => void {
  res.setHeader('Content-Type', 'text/event-stream');
  res.setHeader('Cache-Control', 'no-cache');
  res.setHeader('Connection', 'keep-alive');
  res.setHeader('X-Accel-Buffering', 'no');
  res.flushHeaders();

  sendEvent(res, 'snapshot', snapshot);

  let closed = false;
  const unsubscribe = broadcaster.subscribe(tenantId, (event) => {
    if (!sendEvent(res, event.kind, event.payload)) {
      cleanup();
    }
  });

  function cleanup(): void {
    if (closed) return;
    closed = true;
    unsubscribe();
    log.debug(`Event stream closed for ${tenantId}`);
  }

  res.on('close', cleanup);
  log.debug(`Event stream opened for ${tenantId}`);
  return cleanup;
}
