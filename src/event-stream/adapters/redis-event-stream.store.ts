import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { CLOCK, Clock } from '../../common/clock/clock';
import { StoreBackendError } from '../../common/errors/store-backend.error';
import { retentionFor } from '../../protocol/message-kind';
import { checkReplies } from '../../redis/exec-replies';
import { RedisPoolService } from '../../redis/redis-pool.service';
import { SESSION_DEFAULTS } from '../../session/constants/session.constants';
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
  StreamEvent,
  StreamMode,
} from '../interfaces/stream-event.interface';
import {
  CLEAN_EXPIRED_SCRIPT,
  REPLAY_EVENTS_SCRIPT,
  STORE_EVENT_SCRIPT,
} from './redis-event-stream.scripts';

interface StreamKeys {
  streamKey: string;
  sequence: string;
  events: string;
  data: string;
  access: string;
  mode: string;
}

const STREAM_MODES: readonly StreamMode[] = ['streaming', 'polling', 'closed'];

function isStreamMode(value: unknown): value is StreamMode {
  return typeof value === 'string' && (STREAM_MODES as readonly string[]).includes(value);
}

function toReplayedEvent(raw: unknown): ReplayedEvent | null {
  if (typeof raw !== 'string') {
    return null;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (
    typeof parsed !== 'object' ||
    parsed === null ||
    !('eventId' in parsed) ||
    !('payload' in parsed) ||
    typeof parsed.eventId !== 'string' ||
    typeof parsed.payload !== 'string'
  ) {
    return null;
  }
  const eventType = 'eventType' in parsed ? parsed.eventType : undefined;
  const retryMs = 'retryMs' in parsed ? parsed.retryMs : undefined;
  return {
    eventId: parsed.eventId,
    payload: parsed.payload,
    eventType: typeof eventType === 'string' ? eventType : undefined,
    retryMs: typeof retryMs === 'number' ? retryMs : undefined,
  };
}

async function* iterate(events: ReplayedEvent[]): AsyncGenerator<ReplayedEvent> {
  for (const event of events) {
    yield event;
  }
}

@Injectable()
export class RedisEventStreamStore implements EventStreamStore {
  private readonly logger = new Logger(RedisEventStreamStore.name);
  private readonly expiry: EventExpiryOptions;
  // Counters, modes and session indexes outlive a session's idle timeout plus the event lifetime
  private readonly metadataTtlMs: number;

  constructor(
    private readonly pool: RedisPoolService,
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
    this.metadataTtlMs =
      this.expiry.absoluteExpirationMs +
      (configService?.get<number>('SESSION_IDLE_TIMEOUT_MS') ?? SESSION_DEFAULTS.IDLE_TIMEOUT_MS);
  }

  async getEventId(sessionId: string, streamId: string): Promise<string> {
    const keys = this.keysFor(sessionId, streamId);
    const sessionIndex = this.sessionIndexKey(sessionId);
    const replies = await this.run('getEventId', (client) =>
      client
        .multi()
        .incr(keys.sequence)
        .pexpire(keys.sequence, this.metadataTtlMs)
        .sadd(sessionIndex, keys.streamKey)
        .pexpire(sessionIndex, this.metadataTtlMs)
        .exec()
        .then(checkReplies),
    );
    const sequence = replies[0]?.[1];
    if (typeof sequence !== 'number') {
      throw new StoreBackendError('redis', 'getEventId', `unexpected INCR reply ${String(sequence)}`);
    }
    return formatEventId(sessionId, streamId, sequence);
  }

  async storeEvent(
    sessionId: string,
    streamId: string,
    event: StreamEvent,
  ): Promise<boolean> {
    const retention = retentionFor(event.kind);
    if (retention === 'never') {
      return false;
    }

    const parsed = parseEventId(event.eventId);
    if (!parsed) {
      throw new RangeError(`Malformed event id: ${event.eventId}`);
    }

    const keys = this.keysFor(sessionId, streamId);
    const now = this.clock.now();
    const serialized = JSON.stringify({ ...event, storedAt: now });

    const result = await this.run('storeEvent', (client) =>
      client.eval(
        STORE_EVENT_SCRIPT,
        5,
        keys.events,
        keys.data,
        keys.access,
        this.streamIndexKey(),
        this.sessionIndexKey(sessionId),
        event.eventId,
        parsed.sequence,
        serialized,
        retention === 'when-stream-open' ? '1' : '0',
        keys.streamKey,
        now,
      ),
    );

    return result === 1;
  }

  async replayAfter(
    lastEventId: string,
    deliver: ReplayDelivery,
  ): Promise<ReplayTarget | null> {
    const parsed = parseEventId(lastEventId);
    if (!parsed) {
      await deliver(iterate([]));
      return null;
    }

    const keys = this.keysFor(parsed.sessionId, parsed.streamId);
    const [mode, sequence] = await this.run('replayAfter', (client) =>
      client.mget(keys.mode, keys.sequence),
    );

    if (mode === null && sequence === null) {
      this.logger.debug(`No retained stream for event ${lastEventId}`);
      await deliver(iterate([]));
      return null;
    }

    const sessionIndex = this.sessionIndexKey(parsed.sessionId);
    await this.run('replayAfter', (client) =>
      client
        .multi()
        .pexpire(keys.sequence, this.metadataTtlMs)
        .pexpire(keys.mode, this.metadataTtlMs)
        .pexpire(sessionIndex, this.metadataTtlMs)
        .exec()
        .then(checkReplies),
    );

    const raw = await this.run('replayAfter', (client) =>
      client.eval(
        REPLAY_EVENTS_SCRIPT,
        3,
        keys.events,
        keys.data,
        keys.access,
        parsed.sequence,
        this.clock.now(),
      ),
    );

    const pending = (Array.isArray(raw) ? raw : [])
      .map(toReplayedEvent)
      .filter((event): event is ReplayedEvent => event !== null)
      .filter((event) => compareEventIds(event.eventId, lastEventId) > 0)
      .sort((a, b) => compareEventIds(a.eventId, b.eventId));

    const target: ReplayTarget = {
      sessionId: parsed.sessionId,
      streamId: parsed.streamId,
      mode: isStreamMode(mode) ? mode : 'streaming',
    };

    await deliver(iterate(pending));
    return target;
  }

  async cleanExpired(now: number): Promise<number> {
    const streamKeys = await this.run('cleanExpired', (client) =>
      client.smembers(this.streamIndexKey()),
    );

    let removed = 0;
    for (const streamKey of streamKeys) {
      const keys = this.keysForStreamKey(streamKey);
      const count = await this.run('cleanExpired', (client) =>
        client.eval(
          CLEAN_EXPIRED_SCRIPT,
          4,
          keys.events,
          keys.data,
          keys.access,
          this.streamIndexKey(),
          now,
          this.expiry.slidingExpirationMs,
          this.expiry.absoluteExpirationMs,
          streamKey,
        ),
      );
      removed += typeof count === 'number' ? count : 0;
    }

    return removed;
  }

  async setStreamMode(sessionId: string, streamId: string, mode: StreamMode): Promise<void> {
    const keys = this.keysFor(sessionId, streamId);
    const sessionIndex = this.sessionIndexKey(sessionId);
    await this.run('setStreamMode', (client) =>
      client
        .multi()
        .set(keys.mode, mode, 'PX', this.metadataTtlMs)
        .sadd(sessionIndex, keys.streamKey)
        .pexpire(sessionIndex, this.metadataTtlMs)
        .exec()
        .then(checkReplies),
    );
  }

  async getStreamMode(sessionId: string, streamId: string): Promise<StreamMode | null> {
    const keys = this.keysFor(sessionId, streamId);
    const mode = await this.run('getStreamMode', (client) => client.get(keys.mode));
    return isStreamMode(mode) ? mode : null;
  }

  async removeSession(sessionId: string): Promise<number> {
    const sessionIndex = this.sessionIndexKey(sessionId);
    const streamKeys = await this.run('removeSession', (client) =>
      client.smembers(sessionIndex),
    );

    await this.run('removeSession', async (client) => {
      const multi = client.multi();
      for (const streamKey of streamKeys) {
        const keys = this.keysForStreamKey(streamKey);
        multi.del(keys.sequence, keys.events, keys.data, keys.access, keys.mode);
        multi.srem(this.streamIndexKey(), streamKey);
      }
      multi.del(sessionIndex);
      return multi.exec().then(checkReplies);
    });

    return streamKeys.length;
  }

  getType(): string {
    return 'redis';
  }

  private async run<T>(
    operation: string,
    command: (client: Redis) => Promise<T>,
  ): Promise<T> {
    const client = this.pool.requireClient(operation);
    try {
      return await command(client);
    } catch (error) {
      this.logger.error(
        `Redis ${operation} error: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      throw new StoreBackendError('redis', operation, error);
    }
  }

  private streamIndexKey(): string {
    return `${this.pool.getKeyPrefix()}es:streams`;
  }

  private sessionIndexKey(sessionId: string): string {
    return `${this.pool.getKeyPrefix()}es:session:${Buffer.from(sessionId, 'utf8').toString('base64url')}`;
  }

  private keysFor(sessionId: string, streamId: string): StreamKeys {
    return this.keysForStreamKey(streamKeyPrefix(sessionId, streamId));
  }

  private keysForStreamKey(streamKey: string): StreamKeys {
    const prefix = `${this.pool.getKeyPrefix()}es:`;
    return {
      streamKey,
      sequence: `${prefix}seq:${streamKey}`,
      events: `${prefix}events:${streamKey}`,
      data: `${prefix}data:${streamKey}`,
      access: `${prefix}access:${streamKey}`,
      mode: `${prefix}mode:${streamKey}`,
    };
  }
}
