import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
  Optional,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CLOCK, Clock } from '../common/clock/clock';
import {
  EVENT_STREAM_STORE,
  EventStreamStore,
} from '../event-stream/interfaces/event-stream-store.interface';
import { SessionService } from '../session/session.service';
import { TransportService } from '../transport/transport.service';

export const REAPER_DEFAULTS = {
  INTERVAL_MS: 5000,
} as const;

export interface ReapResult {
  activeSessions: number;
  prunedSessions: number;
  orphanedSessions: number;
  expiredEvents: number;
}

/**
 * Periodic sweep that prunes idle sessions, releases per-session state left
 * behind by them, and expires retained stream events. A session with a
 * connected stream or a request still running is never idle.
 */
@Injectable()
export class IdleReaperService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(IdleReaperService.name);
  private readonly intervalMs: number;
  private timer?: NodeJS.Timeout;
  private running = false;

  constructor(
    private readonly sessionService: SessionService,
    private readonly transport: TransportService,
    @Inject(EVENT_STREAM_STORE) private readonly eventStore: EventStreamStore,
    @Inject(CLOCK) private readonly clock: Clock,
    @Optional() configService?: ConfigService,
  ) {
    this.intervalMs =
      configService?.get<number>('REAPER_INTERVAL_MS') ?? REAPER_DEFAULTS.INTERVAL_MS;
  }

  onApplicationBootstrap(): void {
    this.start();
  }

  onModuleDestroy(): void {
    this.stop();
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      this.tick().catch((error: unknown) => {
        this.logger.error(
          `Reaper pass failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
        );
      });
    }, this.intervalMs);
    this.timer.unref();
    this.logger.log(`Idle reaper started (every ${this.intervalMs}ms)`);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
      this.logger.log('Idle reaper stopped');
    }
  }

  isRunning(): boolean {
    return this.timer !== undefined;
  }

  /**
   * Run one pass. Resolves to null when a previous pass is still in progress.
   * Backend failures propagate to the caller.
   */
  async runOnce(): Promise<ReapResult | null> {
    if (this.running) {
      return null;
    }

    this.running = true;
    try {
      const now = this.clock.now();
      const active = this.transport.activeSessions();
      for (const sessionId of active) {
        await this.sessionService.touch(sessionId);
      }
      const prunedSessions = await this.sessionService.pruneIdleSessions(now);
      const orphanedSessions = await this.releaseOrphans();
      const expiredEvents = await this.eventStore.cleanExpired(now);
      return { activeSessions: active.length, prunedSessions, orphanedSessions, expiredEvents };
    } finally {
      this.running = false;
    }
  }

  private async tick(): Promise<void> {
    const result = await this.runOnce();
    if (
      result &&
      (result.prunedSessions > 0 || result.orphanedSessions > 0 || result.expiredEvents > 0)
    ) {
      this.logger.debug(
        `Pruned ${result.prunedSessions} sessions, released ${result.orphanedSessions}, expired ${result.expiredEvents} events`,
      );
    }
  }

  /**
   * Streams and in-flight requests outlive their session when it is removed
   * elsewhere; end whatever still refers to a session the store no longer has.
   */
  private async releaseOrphans(): Promise<number> {
    let released = 0;
    for (const sessionId of this.transport.trackedSessions()) {
      if (await this.sessionService.getSession(sessionId)) {
        continue;
      }
      await this.transport.releaseSession(sessionId, 'Session expired');
      released++;
    }
    return released;
  }
}
