import type { Env } from '../env';
import { log } from '../log';
import { buildSessionConfig } from '../model/sessionConfig';
import type { ModelConnector } from '../model/types';
import type { ToolRegistry } from '../tools/toolRegistry';
import type { DuplexTransport } from '../transport/types';
import { DuplexSession, duplexSessionConfigFromEnv, type DuplexSessionSummary } from './duplexSession';

export type SessionFactory = (transport: DuplexTransport) => DuplexSession;

export function createDuplexSessionFactory(deps: {
  config: Env;
  connector: ModelConnector;
  tools: ToolRegistry;
}): SessionFactory {
  const declarations = deps.tools.declarations();
  return (transport) =>
    new DuplexSession({
      transport,
      connector: deps.connector,
      tools: deps.tools,
      config: duplexSessionConfigFromEnv(
        deps.config,
        buildSessionConfig(transport.kind, deps.config, declarations),
      ),
    });
}

/** Tracks live sessions by id. One DuplexSession per connection; no shared agent. */
export class SessionManager {
  private readonly sessions = new Map<string, DuplexSession>();
  private readonly runs = new Map<string, Promise<DuplexSessionSummary | null>>();
  private readonly createSession: SessionFactory;
  private readonly maxSessions: number;

  constructor(options: { createSession: SessionFactory; maxSessions?: number }) {
    this.createSession = options.createSession;
    this.maxSessions = Math.max(1, options.maxSessions ?? Number.POSITIVE_INFINITY);
  }

  /** Starts relaying for `transport`; returns null when the transport was turned away. */
  public startSession(transport: DuplexTransport): DuplexSession | null {
    if (this.sessions.has(transport.id)) {
      log.warn({ event: 'session_exists', ...transport.logContext }, 'session id already active');
      transport.close('duplicate_session');
      return null;
    }

    if (this.sessions.size >= this.maxSessions) {
      log.warn(
        { event: 'session_capacity_reached', active: this.sessions.size, max: this.maxSessions, ...transport.logContext },
        'session capacity reached',
      );
      transport.sendError('capacity_reached');
      transport.close('capacity_reached');
      return null;
    }

    const session = this.createSession(transport);
    this.sessions.set(session.id, session);

    const run = session
      .run()
      .catch((error: unknown): null => {
        log.error({ err: error, event: 'session_run_failed', ...transport.logContext }, 'session run failed');
        return null;
      })
      .finally(() => {
        this.sessions.delete(session.id);
        this.runs.delete(session.id);
      });
    this.runs.set(session.id, run);

    log.info({ event: 'session_registered', active: this.sessions.size, ...transport.logContext }, 'session registered');
    return session;
  }

  public activeCount(): number {
    return this.sessions.size;
  }

  /** Resolves with the session's summary once it has been torn down. */
  public async waitForSession(id: string): Promise<DuplexSessionSummary | null> {
    const run = this.runs.get(id);
    return run ? run : null;
  }

  public stopSession(id: string, reason = 'stopped'): boolean {
    const session = this.sessions.get(id);
    if (!session) return false;
    session.stop(reason);
    return true;
  }

  public async shutdown(reason = 'shutdown'): Promise<void> {
    const pending = Array.from(this.runs.values());
    for (const session of this.sessions.values()) {
      session.stop(reason);
    }
    await Promise.allSettled(pending);
    log.info({ event: 'sessions_shutdown', count: pending.length }, 'all sessions stopped');
  }
}
