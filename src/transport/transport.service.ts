import {
  HttpStatus,
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  Optional,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CancellationRegistry } from '../boundary/cancellation/cancellation.registry';
import { StoreBackendError } from '../common/errors/store-backend.error';
import { JsonRpcException } from '../common/exceptions/json-rpc.exception';
import { parseEventId, sessionKeyPrefix, streamKeyPrefix } from '../event-stream/event-id';
import {
  EVENT_STREAM_STORE,
  EventStreamStore,
} from '../event-stream/interfaces/event-stream-store.interface';
import {
  ReplayTarget,
  StreamEvent,
} from '../event-stream/interfaces/stream-event.interface';
import { ErrorCodes } from '../protocol/error-codes';
import {
  JsonRpcErrorResponse,
  JsonRpcMessage,
  JsonRpcRequest,
  JsonRpcResultResponse,
} from '../protocol/json-rpc.types';
import { classifyMessage } from '../protocol/message-kind';
import { SessionService } from '../session/session.service';
import { StreamModeService } from '../stream-mode/stream-mode.service';
import { MethodContext, MethodRegistry } from './method-registry';
import { SseEvent, SseWriter } from './sse-writer';
import {
  SSE_MESSAGE_EVENT,
  STANDALONE_STREAM_ID,
  TRANSPORT_DEFAULTS,
} from './transport.constants';

interface LiveStream {
  sessionId: string;
  streamId: string;
  writer: SseWriter;
}

type NewEvent = Omit<StreamEvent, 'eventId'>;

export type DispatchExtras = Pick<MethodContext, 'send' | 'enablePolling'>;

function toSseEvent(event: StreamEvent): SseEvent {
  return {
    id: event.eventId,
    event: event.eventType,
    retry: event.retryMs,
    data: event.payload ?? '',
  };
}

/**
 * Owns the SSE connections of this process. Every outbound message gets an
 * event id and passes through the event store before it is written, so a
 * client can resume any stream with Last-Event-ID. Writes to one stream are
 * serialized; ids on the wire are always increasing.
 */
@Injectable()
export class TransportService implements OnModuleDestroy {
  private readonly logger = new Logger(TransportService.name);
  private readonly live = new Map<string, LiveStream>();
  private readonly queues = new Map<string, Promise<void>>();
  // Events that could not be stored, counted per stream key
  private readonly failedWrites = new Map<string, number>();
  private readonly streamRetryMs: number;

  constructor(
    @Inject(EVENT_STREAM_STORE) private readonly eventStore: EventStreamStore,
    private readonly streamModes: StreamModeService,
    private readonly sessionService: SessionService,
    private readonly cancellations: CancellationRegistry,
    private readonly methods: MethodRegistry,
    @Optional() configService?: ConfigService,
  ) {
    this.streamRetryMs =
      configService?.get<number>('STREAM_RETRY_INTERVAL_MS') ??
      TRANSPORT_DEFAULTS.STREAM_RETRY_INTERVAL_MS;
  }

  onModuleDestroy(): void {
    for (const stream of this.live.values()) {
      stream.writer.end();
    }
    this.live.clear();
  }

  /**
   * Run one client request with a cancellable signal.
   */
  async dispatch(
    sessionId: string,
    request: JsonRpcRequest,
    extras: DispatchExtras = {},
  ): Promise<JsonRpcResultResponse | JsonRpcErrorResponse | null> {
    const signal = this.cancellations.register(sessionId, request.id);
    try {
      return await this.methods.dispatch(request, {
        sessionId,
        requestId: request.id,
        signal,
        ...extras,
      });
    } finally {
      this.cancellations.complete(sessionId, request.id);
    }
  }

  /**
   * Start a stream on `writer` and send its priming event.
   */
  async openStream(sessionId: string, streamId: string, writer: SseWriter): Promise<void> {
    await this.streamModes.open(sessionId, streamId);
    const key = streamKeyPrefix(sessionId, streamId);
    await this.enqueue(key, async () => {
      this.attach(sessionId, streamId, writer);
      const priming = await this.record(sessionId, streamId, {
        kind: 'priming',
        payload: null,
        retryMs: this.streamRetryMs,
      });
      writer.write(toSseEvent(priming));
    });
  }

  /**
   * The session's GET stream. Only one may be connected at a time.
   */
  async openStandaloneStream(sessionId: string, writer: SseWriter): Promise<void> {
    if (this.isLive(sessionId, STANDALONE_STREAM_ID)) {
      throw new JsonRpcException(
        ErrorCodes.SERVER_ERROR,
        'Conflict: Only one SSE stream is allowed per session',
        HttpStatus.CONFLICT,
      );
    }
    await this.openStream(sessionId, STANDALONE_STREAM_ID, writer);
  }

  /**
   * Store a server-to-client message and write it if the stream is
   * connected and still streaming.
   * @returns the event id assigned to the message
   */
  send(sessionId: string, streamId: string, message: JsonRpcMessage): Promise<string> {
    const key = streamKeyPrefix(sessionId, streamId);
    return this.enqueue(key, async () => {
      const event = await this.record(sessionId, streamId, {
        kind: classifyMessage(message),
        payload: JSON.stringify(message),
        eventType: SSE_MESSAGE_EVENT,
      });

      const stream = this.live.get(key);
      if (stream && this.streamModes.get(sessionId, streamId)?.mode === 'streaming') {
        stream.writer.write(toSseEvent(event));
      }
      return event.eventId;
    });
  }

  /**
   * Switch a live stream to polling: everything queued before the switch is
   * stored first, then a priming event carrying the polling interval is
   * written and the HTTP response ends. Later messages are only stored and
   * reach the client when it reconnects with Last-Event-ID. If anything
   * queued before the switch failed to store, the stream stays streaming and
   * the call rejects with StoreBackendError.
   *
   * @returns the advertised reconnection interval in milliseconds
   */
  async enablePolling(sessionId: string, streamId: string): Promise<number> {
    const key = streamKeyPrefix(sessionId, streamId);
    const failedBefore = this.failedWriteCount(key);
    const pending = this.flush(key);

    return this.enqueue(key, async () => {
      const retryMs = await this.streamModes.switchToPolling(sessionId, streamId, async () => {
        await pending;
        const lost = this.failedWriteCount(key) - failedBefore;
        if (lost > 0) {
          throw new StoreBackendError(
            this.eventStore.getType(),
            'flush',
            `${lost} queued event(s) on stream ${streamId} were not stored`,
          );
        }
      });
      const priming = await this.record(sessionId, streamId, {
        kind: 'priming',
        payload: null,
        retryMs,
      });

      const stream = this.live.get(key);
      if (stream) {
        this.live.delete(key);
        stream.writer.write(toSseEvent(priming));
        stream.writer.end();
      }
      this.logger.debug(`Stream ${streamId} switched to polling (retry ${retryMs}ms)`);
      return retryMs;
    });
  }

  /**
   * Finish a stream once every queued message is written.
   */
  async closeStream(sessionId: string, streamId: string): Promise<void> {
    const key = streamKeyPrefix(sessionId, streamId);
    await this.enqueue(key, async () => {
      const stream = this.live.get(key);
      if (stream) {
        this.live.delete(key);
        stream.writer.end();
      }
      this.failedWrites.delete(key);
      await this.streamModes.close(sessionId, streamId);
    });
  }

  /**
   * Replay everything after `lastEventId` onto `writer`. A stream that is
   * still streaming in this process stays attached to the new connection;
   * otherwise the response ends after the replay.
   */
  async resume(lastEventId: string, writer: SseWriter): Promise<ReplayTarget | null> {
    const parsed = parseEventId(lastEventId);
    if (!parsed) {
      return this.replayOnto(lastEventId, writer);
    }

    const { sessionId, streamId } = parsed;
    return this.enqueue(streamKeyPrefix(sessionId, streamId), async () => {
      const target = await this.replayOnto(lastEventId, writer);
      if (
        target?.mode === 'streaming' &&
        this.streamModes.get(sessionId, streamId)?.mode === 'streaming'
      ) {
        this.attach(sessionId, streamId, writer);
      } else {
        writer.end();
      }
      return target;
    });
  }

  /**
   * Tear down everything held for a session.
   * @returns false when the session was already gone from the store
   */
  async terminateSession(sessionId: string): Promise<boolean> {
    await this.releaseSession(sessionId);
    return this.sessionService.closeSession(sessionId);
  }

  /**
   * End the session's connected responses and drop its streams, in-flight
   * requests and retained events. Events already queued are written to the
   * store before it is cleared. The session store entry is left alone.
   */
  async releaseSession(sessionId: string, reason = 'Session closed'): Promise<void> {
    const prefix = sessionKeyPrefix(sessionId);
    for (const [key, stream] of this.live) {
      if (stream.sessionId === sessionId) {
        this.live.delete(key);
        stream.writer.end();
      }
    }

    await this.streamModes.closeSession(sessionId);
    this.cancellations.cancelSession(sessionId, reason);

    const queued = [...this.queues].filter(([key]) => key.startsWith(prefix));
    await Promise.all(queued.map(([, settled]) => settled));
    for (const key of this.failedWrites.keys()) {
      if (key.startsWith(prefix)) {
        this.failedWrites.delete(key);
      }
    }
    await this.eventStore.removeSession(sessionId);
  }

  /** Sessions with a connected stream or a request still running */
  activeSessions(): string[] {
    const sessions = new Set(this.cancellations.trackedSessions());
    for (const stream of this.live.values()) {
      sessions.add(stream.sessionId);
    }
    return [...sessions];
  }

  /** Sessions this process still holds any stream or request state for */
  trackedSessions(): string[] {
    return [...new Set([...this.activeSessions(), ...this.streamModes.trackedSessions()])];
  }

  isLive(sessionId: string, streamId: string): boolean {
    return this.live.has(streamKeyPrefix(sessionId, streamId));
  }

  liveStreamCount(): number {
    return this.live.size;
  }

  private async replayOnto(lastEventId: string, writer: SseWriter): Promise<ReplayTarget | null> {
    const target = await this.eventStore.replayAfter(lastEventId, async (events) => {
      writer.open();
      for await (const event of events) {
        writer.write({
          id: event.eventId,
          event: event.eventType,
          retry: event.retryMs,
          data: event.payload,
        });
      }
    });
    if (!target) {
      writer.end();
    }
    return target;
  }

  private attach(sessionId: string, streamId: string, writer: SseWriter): void {
    const key = streamKeyPrefix(sessionId, streamId);
    const previous = this.live.get(key);
    if (previous && previous.writer !== writer) {
      previous.writer.end();
    }

    this.live.set(key, { sessionId, streamId, writer });
    writer.onClose(() => {
      if (this.live.get(key)?.writer === writer) {
        this.live.delete(key);
      }
    });
  }

  private async record(sessionId: string, streamId: string, event: NewEvent): Promise<StreamEvent> {
    try {
      const eventId = await this.eventStore.getEventId(sessionId, streamId);
      const stored: StreamEvent = { ...event, eventId };
      await this.eventStore.storeEvent(sessionId, streamId, stored);
      this.streamModes.recordEvent(sessionId, streamId, eventId);
      return stored;
    } catch (error) {
      const key = streamKeyPrefix(sessionId, streamId);
      this.failedWrites.set(key, this.failedWriteCount(key) + 1);
      throw error;
    }
  }

  private failedWriteCount(key: string): number {
    return this.failedWrites.get(key) ?? 0;
  }

  private flush(key: string): Promise<void> {
    return this.queues.get(key) ?? Promise.resolve();
  }

  /**
   * Chain `task` behind earlier work on the same stream. A failure rejects
   * the task's own caller and does not block later tasks.
   */
  private enqueue<T>(key: string, task: () => Promise<T>): Promise<T> {
    const run = this.flush(key).then(task);
    const settled: Promise<void> = run.then(
      () => this.release(key, settled),
      () => this.release(key, settled),
    );
    this.queues.set(key, settled);
    return run;
  }

  private release(key: string, settled: Promise<void>): void {
    if (this.queues.get(key) === settled) {
      this.queues.delete(key);
    }
  }
}
