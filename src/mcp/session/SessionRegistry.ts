/**
 * Session Registry: in-memory sessions for the MCP server.
 *
 * Sessions are ephemeral: nothing is written outside each session's temp
 * directory, and every session is destroyed when it is finished or when
 * the server shuts down. The most recently created session is "active" and
 * is used when a tool call names no session.
 */

import { Session } from '../../session/Session.js';
import { PipelineError, type PipelineStage } from '../../shared/errors.js';
import { createLogger } from '../../utils/Logger.js';

const log = createLogger('SessionRegistry');

export class SessionNotFoundError extends PipelineError {
  constructor(stage: PipelineStage, id?: string) {
    super(
      id ? `Session not found: ${id}` : 'No active session',
      'SESSION_NOT_FOUND',
      stage,
      'Call create_session first, or pass the sessionId it returned.',
      { severity: 'user' }
    );
    this.name = 'SessionNotFoundError';
  }
}

export class SessionRegistry {
  private sessions = new Map<string, Session>();
  private activeId: string | null = null;

  constructor(private baseDir: string) {}

  async create(): Promise<Session> {
    const session = await Session.create({ baseDir: this.baseDir });
    this.sessions.set(session.id, session);
    this.activeId = session.id;
    return session;
  }

  /**
   * Session by id, or the active session when no id is given.
   */
  get(stage: PipelineStage, id?: string): Session {
    const key = id ?? this.activeId;
    const session = key ? this.sessions.get(key) : undefined;
    if (!session) {
      throw new SessionNotFoundError(stage, id);
    }
    return session;
  }

  find(id?: string): Session | undefined {
    const key = id ?? this.activeId;
    return key ? this.sessions.get(key) : undefined;
  }

  list(): Session[] {
    return [...this.sessions.values()];
  }

  async finish(id?: string): Promise<Session> {
    const session = this.get('export', id);
    this.sessions.delete(session.id);
    if (this.activeId === session.id) {
      this.activeId = null;
    }
    await session.destroy('Session finished');
    return session;
  }

  /**
   * Destroy every session (server shutdown).
   */
  async closeAll(): Promise<void> {
    const sessions = this.list();
    this.sessions.clear();
    this.activeId = null;
    const results = await Promise.allSettled(sessions.map((s) => s.destroy('Server shutting down')));
    for (const result of results) {
      if (result.status === 'rejected') {
        log.error(`Session cleanup failed: ${String(result.reason)}`);
      }
    }
  }
}
