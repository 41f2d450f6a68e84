import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CLOCK, Clock } from '../../common/clock/clock';
import { retentionFor } from '../../protocol/message-kind';
import {
  EVENT_STREAM_DEFAULTS,
  EventExpiryOptions,
} from '../constants/event-stream.constants';
import { compareEventIds, formatEventId, parseEventId, streamKeyPrefix } from '../event-id';
import { EventStreamStore } from '../interfaces/event-stream-store.interface';
import {
  ReplayDelivery,
  ReplayTarget,
  ReplayedEvent,
  StoredStreamEvent,
  StreamEvent,
  StreamMode,
} from '../interfaces/stream-event.interface';

interface StreamMeta {
  sessionId: string;
  streamId: string;
  lastSequence: number;
  mode: StreamMode;
}

async function* iterate(events: ReplayedEvent[]): AsyncGenerator<ReplayedEvent> {
  for (const event of events) {
    yield event;
  }
}

@Injectable()
export class InMemoryEventStreamStore implements EventStreamStore {
  private readonly logger = new Logger(InMemoryEventStreamStore.name);
  // Retained events per stream; an entry exists only while it holds events
  private readonly logs = new Map<string, StoredStreamEvent[]>();
  // Sequence counters and mode outlive expired events so ids never restart
  private readonly meta = new Map<string, StreamMeta>();
  private readonly expiry: EventExpiryOptions;

  constructor(
    @Inject(CLOCK) private readonly clock: Clock,
    @Optional() configService?: ConfigService,
  ) {
    this.expiry = {
      slidingExpirationMs:
        configService?.get<number>('EVENT_SLIDING_EXPIRATION_MS') ??
        EVENT_STREAM_DEFAULTS.SLIDING_EXPIRATION_MS,
      absoluteExpirationMs:
        configService?.get<number>('EVENT_ABSOLUTE_EXPIRATION_MS') ??
        EVENT_STREAM_DEFAULTS.ABSOLUTE_EXPIRATION_MS,
    };
  }

  async getEventId(sessionId: string, streamId: string): Promise<string> {
    const meta = this.getOrCreateMeta(sessionId, streamId);
    meta.lastSequence += 1;
    return formatEventId(sessionId, streamId, meta.lastSequence);
  }

  async storeEvent(
    sessionId: string,
    streamId: string,
    event: StreamEvent,
  ): Promise<boolean> {
    const key = streamKeyPrefix(sessionId, streamId);
    const retention = retentionFor(event.kind);

    let log = this.logs.get(key);
    if (retention === 'never' || (retention === 'when-stream-open' && !log)) {
      return false;
    }

    if (!log) {
      log = [];
      this.logs.set(key, log);
      this.getOrCreateMeta(sessionId, streamId);
    }

    const now = this.clock.now();
    log.push({ ...event, storedAt: now, lastAccessedAt: now });
    return true;
  }

  async replayAfter(
    lastEventId: string,
    deliver: ReplayDelivery,
  ): Promise<ReplayTarget | null> {
    const parsed = parseEventId(lastEventId);
    const key = parsed ? streamKeyPrefix(parsed.sessionId, parsed.streamId) : null;
    const meta = key ? this.meta.get(key) : undefined;

    if (!parsed || !key || !meta) {
      this.logger.debug(`No retained stream for event ${lastEventId}`);
      await deliver(iterate([]));
      return null;
    }

    const now = this.clock.now();
    const pending: ReplayedEvent[] = [];
    const retained = (this.logs.get(key) ?? [])
      .filter(
        (event): event is StoredStreamEvent & { payload: string } =>
          Boolean(event.eventId) && event.payload !== null,
      )
      .sort((a, b) => compareEventIds(a.eventId, b.eventId));

    for (const event of retained) {
      if (compareEventIds(event.eventId, lastEventId) <= 0) {
        continue;
      }
      event.lastAccessedAt = now;
      pending.push({
        eventId: event.eventId,
        payload: event.payload,
        eventType: event.eventType,
        retryMs: event.retryMs,
      });
    }

    const target: ReplayTarget = {
      sessionId: parsed.sessionId,
      streamId: parsed.streamId,
      mode: meta.mode,
    };

    // Bookkeeping is done; the consumer may now be as slow as its client
    await deliver(iterate(pending));
    return target;
  }

  async cleanExpired(now: number): Promise<number> {
    let removed = 0;

    for (const [key, log] of this.logs) {
      const kept = log.filter((event) => !this.isExpired(event, now));
      removed += log.length - kept.length;

      if (kept.length === 0) {
        this.logs.delete(key);
        this.logger.debug(`Removed empty event stream ${key}`);
      } else if (kept.length !== log.length) {
        this.logs.set(key, kept);
      }
    }

    return removed;
  }

  async setStreamMode(sessionId: string, streamId: string, mode: StreamMode): Promise<void> {
    this.getOrCreateMeta(sessionId, streamId).mode = mode;
  }

  async getStreamMode(sessionId: string, streamId: string): Promise<StreamMode | null> {
    return this.meta.get(streamKeyPrefix(sessionId, streamId))?.mode ?? null;
  }

  async removeSession(sessionId: string): Promise<number> {
    let removed = 0;
    for (const [key, meta] of this.meta) {
      if (meta.sessionId === sessionId) {
        this.meta.delete(key);
        this.logs.delete(key);
        removed++;
      }
    }
    return removed;
  }

  getType(): string {
    return 'in-memory';
  }

  /** Number of streams currently holding events */
  streamCount(): number {
    return this.logs.size;
  }

  private isExpired(event: StoredStreamEvent, now: number): boolean {
    return (
      now - event.lastAccessedAt > this.expiry.slidingExpirationMs ||
      now - event.storedAt > this.expiry.absoluteExpirationMs
    );
  }

  private getOrCreateMeta(sessionId: string, streamId: string): StreamMeta {
    const key = streamKeyPrefix(sessionId, streamId);
    let meta = this.meta.get(key);
    if (!meta) {
      meta = { sessionId, streamId, lastSequence: 0, mode: 'streaming' };
      this.meta.set(key, meta);
    }
    return meta;
  }
}
