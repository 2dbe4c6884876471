/**
 * Session Registry
 * Tracks live sessions for status reporting and process shutdown
 */
import { SessionStatus } from '../types/index.js';
import { ModuleLogger } from '../utils/logger.js';

const logger = new ModuleLogger('SessionRegistry');

/**
 * What the registry needs from a session
 */
export interface RegisteredSession {
  readonly id: string;
  getStatus(): SessionStatus;
  close(): Promise<void>;
}

export class SessionRegistry<T extends RegisteredSession = RegisteredSession> {
  private sessions = new Map<string, T>();

  /**
   * @param sharedIngestPort Fixed UDP port every session binds, or 0 when
   * each session takes an ephemeral one
   */
  constructor(private readonly sharedIngestPort: number = 0) {}

  add(session: T): void {
    this.sessions.set(session.id, session);

    if (this.sharedIngestPort !== 0 && this.sessions.size > 1) {
      logger.log(
        'warn',
        `⚠️ ${this.sessions.size} sessions share RTP ingest port ${this.sharedIngestPort}; only the first will receive media`
      );
    }

    logger.log('info', `Session ${session.id} registered (${this.sessions.size} active)`);
  }

  remove(id: string): boolean {
    const removed = this.sessions.delete(id);
    if (removed) {
      logger.log('info', `Session ${id} removed (${this.sessions.size} active)`);
    }
    return removed;
  }

  get(id: string): T | undefined {
    return this.sessions.get(id);
  }

  get size(): number {
    return this.sessions.size;
  }

  list(): SessionStatus[] {
    return Array.from(this.sessions.values()).map(session => session.getStatus());
  }

  /**
   * Close and forget every session
   */
  async closeAll(): Promise<void> {
    const sessions = Array.from(this.sessions.values());
    this.sessions.clear();

    if (sessions.length === 0) {
      return;
    }

    logger.log('info', `Closing ${sessions.length} session(s)`);
    const results = await Promise.allSettled(sessions.map(session => session.close()));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        logger.log('error', `Failed to close session ${sessions[index]?.id}:`, result.reason);
      }
    });
  }
}
