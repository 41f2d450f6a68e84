import { SessionMetadata } from './session-metadata.interface';

export const SESSION_STORE = Symbol('SESSION_STORE');

export interface SessionStore {
  /**
   * Upsert by sessionId. Last writer wins; fields are never merged.
   */
  save(metadata: SessionMetadata): Promise<void>;

  get(sessionId: string): Promise<SessionMetadata | null>;

  /**
   * Raise lastActivityAt to `timestamp` if it is later than the stored value.
   * Missing sessions are ignored.
   */
  updateActivity(sessionId: string, timestamp: number): Promise<void>;

  /**
   * @returns true if the session existed
   */
  remove(sessionId: string): Promise<boolean>;

  /**
   * Remove every session with `now - lastActivityAt > idleTimeoutMs`.
   * @returns number of sessions removed
   */
  pruneIdle(idleTimeoutMs: number, now: number): Promise<number>;

  clear(): Promise<void>;

  count(): Promise<number>;

  isHealthy(): Promise<boolean>;

  getType(): string;
}
