import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { parseEventId, streamKeyPrefix } from '../event-stream/event-id';
import {
  EVENT_STREAM_STORE,
  EventStreamStore,
} from '../event-stream/interfaces/event-stream-store.interface';
import { StreamMode } from '../event-stream/interfaces/stream-event.interface';
import {
  STREAM_EVENTS,
  STREAM_MODE_DEFAULTS,
  StreamState,
  StreamTransitionError,
} from './stream-mode.types';

/**
 * Tracks whether each live stream is held open (streaming), handed over to
 * client polling, or closed. Modes only move forward:
 *
 *   streaming -> polling -> closed
 *   streaming ------------> closed
 *
 * A client that polls reconnects with Last-Event-ID and is served by replay;
 * the stream it left behind is never streamed again.
 */
@Injectable()
export class StreamModeService {
  private readonly logger = new Logger(StreamModeService.name);
  private readonly streams = new Map<string, StreamState>();
  // Settles when the switch in progress for a stream key does
  private readonly switching = new Map<string, Promise<void>>();
  private readonly pollingRetryMs: number;

  constructor(
    @Inject(EVENT_STREAM_STORE) private readonly eventStore: EventStreamStore,
    @Optional() configService?: ConfigService,
    @Optional() private readonly eventEmitter?: EventEmitter2,
  ) {
    this.pollingRetryMs =
      configService?.get<number>('POLLING_RETRY_INTERVAL_MS') ??
      STREAM_MODE_DEFAULTS.POLLING_RETRY_INTERVAL_MS;
  }

  /**
   * Start tracking a stream in streaming mode. Reopening a closed stream id
   * starts a new instance; reopening a polling one is refused.
   */
  async open(sessionId: string, streamId: string): Promise<StreamState> {
    const key = streamKeyPrefix(sessionId, streamId);
    const existing = this.streams.get(key);

    if (existing?.mode === 'streaming') {
      return { ...existing };
    }
    if (existing?.mode === 'polling') {
      throw new StreamTransitionError(streamId, 'polling', 'streaming');
    }

    const state: StreamState = { sessionId, streamId, mode: 'streaming', lastSequence: 0 };
    this.streams.set(key, state);
    await this.eventStore.setStreamMode(sessionId, streamId, 'streaming');
    return { ...state };
  }

  get(sessionId: string, streamId: string): StreamState | null {
    const state = this.streams.get(streamKeyPrefix(sessionId, streamId));
    return state ? { ...state } : null;
  }

  recordEvent(sessionId: string, streamId: string, eventId: string): void {
    const state = this.streams.get(streamKeyPrefix(sessionId, streamId));
    const parsed = parseEventId(eventId);
    if (state && parsed && parsed.sequence > state.lastSequence) {
      state.lastSequence = parsed.sequence;
    }
  }

  /**
   * Hand a streaming stream over to polling. `flush` must durably store every
   * event the client still needs; the mode only changes once it resolves, and
   * a failed flush leaves the stream streaming. A close requested meanwhile
   * waits for the switch to settle.
   *
   * @returns the reconnection interval to advertise to the client
   */
  async switchToPolling(
    sessionId: string,
    streamId: string,
    flush: () => Promise<void>,
  ): Promise<number> {
    const key = streamKeyPrefix(sessionId, streamId);
    const state = this.streams.get(key);

    if (this.switching.has(key)) {
      throw new StreamTransitionError(streamId, 'switching', 'polling');
    }
    if (!state || state.mode !== 'streaming') {
      throw new StreamTransitionError(streamId, state?.mode ?? 'closed', 'polling');
    }

    const switched = this.completeSwitch(key, state, flush);
    this.switching.set(
      key,
      switched.then(
        () => undefined,
        () => undefined,
      ),
    );
    try {
      await switched;
    } finally {
      this.switching.delete(key);
    }

    return this.pollingRetryMs;
  }

  /**
   * @returns false when the stream was unknown or already closed
   */
  async close(sessionId: string, streamId: string): Promise<boolean> {
    const key = streamKeyPrefix(sessionId, streamId);
    await this.switching.get(key);

    const state = this.streams.get(key);
    if (!state || state.mode === 'closed') {
      return false;
    }

    this.transition(state, 'closed');
    await this.eventStore.setStreamMode(sessionId, streamId, 'closed');
    return true;
  }

  /**
   * Close and forget every stream of a session.
   * @returns number of streams that were still open
   */
  async closeSession(sessionId: string): Promise<number> {
    let closed = 0;
    for (const [key, state] of this.streams) {
      if (state.sessionId !== sessionId) {
        continue;
      }
      if (await this.close(sessionId, state.streamId)) {
        closed++;
      }
      this.streams.delete(key);
    }
    return closed;
  }

  /** Session ids that still have tracked streams */
  trackedSessions(): string[] {
    return [...new Set([...this.streams.values()].map((state) => state.sessionId))];
  }

  private async completeSwitch(
    key: string,
    state: StreamState,
    flush: () => Promise<void>,
  ): Promise<void> {
    await flush();
    if (this.streams.get(key) !== state || state.mode !== 'streaming') {
      throw new StreamTransitionError(state.streamId, state.mode, 'polling');
    }
    await this.eventStore.setStreamMode(state.sessionId, state.streamId, 'polling');
    this.transition(state, 'polling');
  }

  private transition(state: StreamState, to: StreamMode): void {
    const from = state.mode;
    state.mode = to;
    this.eventEmitter?.emit(STREAM_EVENTS.MODE_CHANGED, {
      sessionId: state.sessionId,
      streamId: state.streamId,
      from,
      to,
    });
    this.logger.debug(`Stream ${state.streamId} moved from ${from} to ${to}`);
  }
}
