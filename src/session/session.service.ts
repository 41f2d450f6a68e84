import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { v4 as uuidv4 } from 'uuid';
import { CLOCK, Clock } from '../common/clock/clock';
import { SESSION_DEFAULTS, SESSION_EVENTS } from './constants/session.constants';
import { SessionMetadata, UserIdentity } from './interfaces/session-metadata.interface';
import { SESSION_STORE, SessionStore } from './interfaces/session-store.interface';

export interface CreateSessionOptions {
  userIdentity?: UserIdentity;
  customData?: string;
}

@Injectable()
export class SessionService {
  private readonly logger = new Logger(SessionService.name);
  private readonly idleTimeoutMs: number;

  constructor(
    @Inject(SESSION_STORE) private readonly store: SessionStore,
    @Inject(CLOCK) private readonly clock: Clock,
    @Optional() configService?: ConfigService,
    @Optional() private readonly eventEmitter?: EventEmitter2,
  ) {
    this.idleTimeoutMs =
      configService?.get<number>('SESSION_IDLE_TIMEOUT_MS') ??
      SESSION_DEFAULTS.IDLE_TIMEOUT_MS;
  }

  async createSession(options: CreateSessionOptions = {}): Promise<SessionMetadata> {
    const now = this.clock.now();
    const metadata: SessionMetadata = {
      sessionId: uuidv4(),
      userIdentity: options.userIdentity,
      createdAt: now,
      lastActivityAt: now,
      customData: options.customData,
    };

    await this.store.save(metadata);
    this.eventEmitter?.emit(SESSION_EVENTS.SESSION_CREATED, {
      sessionId: metadata.sessionId,
      anonymous: metadata.userIdentity === undefined,
    });

    this.logger.log(`Session created: ${metadata.sessionId}`);
    return metadata;
  }

  async getSession(sessionId: string): Promise<SessionMetadata | null> {
    return this.store.get(sessionId);
  }

  /**
   * Record activity for a request attributed to the session. A session that
   * expired in the meantime is left alone.
   */
  async touch(sessionId: string): Promise<void> {
    await this.store.updateActivity(sessionId, this.clock.now());
  }

  async closeSession(sessionId: string): Promise<boolean> {
    const removed = await this.store.remove(sessionId);
    if (removed) {
      this.eventEmitter?.emit(SESSION_EVENTS.SESSION_CLOSED, { sessionId });
      this.logger.log(`Session closed: ${sessionId}`);
    }
    return removed;
  }

  async pruneIdleSessions(now: number = this.clock.now()): Promise<number> {
    const removed = await this.store.pruneIdle(this.idleTimeoutMs, now);
    if (removed > 0) {
      this.eventEmitter?.emit(SESSION_EVENTS.SESSIONS_PRUNED, { count: removed });
    }
    return removed;
  }

  getIdleTimeoutMs(): number {
    return this.idleTimeoutMs;
  }
}
