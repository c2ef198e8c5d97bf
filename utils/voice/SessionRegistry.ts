/**
 * Tenant id -> Session. The map is the only state shared across tenants.
 *
 * Creation is synchronous, so concurrent first commands for one tenant on the
 * event loop always see the same Session.
 */
import type { DedupPolicy, SessionSnapshot, TenantSummary } from '../../types/voice';
import { createLogger } from '../logger';
import { logErrorWithStack } from '../errors';
import type { Broadcaster } from './Broadcaster';
import type { MediaResolver } from './resolver/MediaResolver';
import { Session, emptySnapshot } from './Session';
import type { VoiceTransport } from './transport/types';

const log = createLogger('REGISTRY');

export interface SessionRegistryOptions {
  resolver: MediaResolver;
  transport: VoiceTransport;
  broadcaster: Broadcaster;
  dedup?: DedupPolicy;
  defaultVolume?: number;
  voiceJoinTimeoutMs?: number;
  playbackStartTimeoutMs?: number;
  idleTimeoutMs?: number;
}

export class SessionRegistry {
  private readonly sessions = new Map<string, Session>();

  constructor(private readonly options: SessionRegistryOptions) {}

  get size(): number {
    return this.sessions.size;
  }

  get(tenantId: string): Session | undefined {
    return this.sessions.get(tenantId);
  }

  getOrCreate(tenantId: string): Session {
    const existing = this.sessions.get(tenantId);
    if (existing) return existing;

    const session = new Session({
      ...this.options,
      tenantId,
      onIdleTimeout: (idle) => this.handleIdleTimeout(idle),
    });
    this.sessions.set(tenantId, session);
    log.debug(`Created session for ${tenantId} (${this.sessions.size} active)`);
    return session;
  }

  list(): Session[] {
    return [...this.sessions.values()];
  }

  /**
   * Pulled state for a tenant; a disconnected placeholder when it has no session
   */
  describe(tenantId: string): SessionSnapshot {
    const session = this.sessions.get(tenantId);
    if (session) return session.snapshot();
    const { transport, defaultVolume } = this.options;
    return emptySnapshot(
      tenantId,
      transport.tenantName(tenantId),
      defaultVolume,
      transport.voiceChannels(tenantId)
    );
  }

  /**
   * Every reachable tenant with its playback state, followed by sessions
   * whose tenant the transport no longer lists
   */
  directory(): TenantSummary[] {
    const rows: TenantSummary[] = this.options.transport.listTenants().map((tenant) =>
      this.summarize(tenant.id, tenant.name)
    );
    const listed = new Set(rows.map((row) => row.id));
    for (const session of this.sessions.values()) {
      if (!listed.has(session.tenantId)) {
        rows.push(this.summarize(session.tenantId, null));
      }
    }
    return rows;
  }

  /**
   * Detach the tenant's session, then dispose it (cancels pending work and
   * leaves voice). False when there was nothing to remove.
   */
  async remove(tenantId: string): Promise<boolean> {
    const session = this.sessions.get(tenantId);
    if (!session) return false;

    this.sessions.delete(tenantId);
    log.debug(`Removed session for ${tenantId} (${this.sessions.size} active)`);
    await session.dispose();
    return true;
  }

  async shutdown(): Promise<void> {
    const tenantIds = [...this.sessions.keys()];
    const results = await Promise.allSettled(tenantIds.map((id) => this.remove(id)));
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        logErrorWithStack(log, `Failed to close session ${tenantIds[i]}`, result.reason);
      }
    });
    log.info(`Closed ${tenantIds.length} session(s)`);
  }

  private summarize(tenantId: string, name: string | null): TenantSummary {
    const session = this.sessions.get(tenantId);
    const state = session?.state ?? 'disconnected';
    return {
      id: tenantId,
      name: name ?? this.options.transport.tenantName(tenantId),
      state,
      isPlaying: state === 'playing',
      isPaused: state === 'paused',
      hasSession: session !== undefined,
    };
  }

  private handleIdleTimeout(session: Session): void {
    // A newer session may already own the id
    if (this.sessions.get(session.tenantId) !== session) return;
    this.remove(session.tenantId).catch((err: unknown) => {
      logErrorWithStack(log, `Failed to remove idle session ${session.tenantId}`, err);
    });
  }
}
