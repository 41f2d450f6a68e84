import { Injectable, Logger } from '@nestjs/common';
import { SessionMetadata } from '../interfaces/session-metadata.interface';
import { SessionStore } from '../interfaces/session-store.interface';

function copyOf(metadata: SessionMetadata): SessionMetadata {
  return {
    ...metadata,
    userIdentity: metadata.userIdentity ? { ...metadata.userIdentity } : undefined,
  };
}

/**
 * Session metadata held in a Map owned by this process. Each operation is a
 * single synchronous step, so request handlers and the reaper can interleave
 * freely between awaits without seeing a half-applied change.
 */
@Injectable()
export class InMemorySessionStore implements SessionStore {
  private readonly logger = new Logger(InMemorySessionStore.name);
  private readonly sessions = new Map<string, SessionMetadata>();

  async save(metadata: SessionMetadata): Promise<void> {
    this.sessions.set(metadata.sessionId, copyOf(metadata));
  }

  async get(sessionId: string): Promise<SessionMetadata | null> {
    const stored = this.sessions.get(sessionId);
    return stored ? copyOf(stored) : null;
  }

  async updateActivity(sessionId: string, timestamp: number): Promise<void> {
    const stored = this.sessions.get(sessionId);
    if (stored && timestamp > stored.lastActivityAt) {
      stored.lastActivityAt = timestamp;
    }
  }

  async remove(sessionId: string): Promise<boolean> {
    return this.sessions.delete(sessionId);
  }

  async pruneIdle(idleTimeoutMs: number, now: number): Promise<number> {
    let removed = 0;

    for (const [sessionId, metadata] of this.sessions) {
      if (now - metadata.lastActivityAt > idleTimeoutMs) {
        this.sessions.delete(sessionId);
        removed++;
      }
    }

    if (removed > 0) {
      this.logger.debug(`Pruned ${removed} idle sessions`);
    }
    return removed;
  }

  async clear(): Promise<void> {
    this.sessions.clear();
  }

  async count(): Promise<number> {
    return this.sessions.size;
  }

  async isHealthy(): Promise<boolean> {
    return true;
  }

  getType(): string {
    return 'in-memory';
  }
}
