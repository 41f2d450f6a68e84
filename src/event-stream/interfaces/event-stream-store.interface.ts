import {
  ReplayDelivery,
  ReplayTarget,
  StreamEvent,
  StreamMode,
} from './stream-event.interface';

export const EVENT_STREAM_STORE = Symbol('EVENT_STREAM_STORE');

export interface EventStreamStore {
  /**
   * Allocate the next event id for a stream. Ids sort after every id
   * previously allocated for the same (session, stream).
   */
  getEventId(sessionId: string, streamId: string): Promise<string>;

  /**
   * Append an event subject to the retention policy.
   * @returns true when the event was retained
   */
  storeEvent(sessionId: string, streamId: string, event: StreamEvent): Promise<boolean>;

  /**
   * Deliver every retained event sorting strictly after `lastEventId`.
   * Unknown or unparseable ids deliver an empty sequence and resolve to null.
   */
  replayAfter(lastEventId: string, deliver: ReplayDelivery): Promise<ReplayTarget | null>;

  /**
   * Remove events whose sliding or absolute expiry has elapsed.
   * @returns number of events removed
   */
  cleanExpired(now: number): Promise<number>;

  setStreamMode(sessionId: string, streamId: string, mode: StreamMode): Promise<void>;

  getStreamMode(sessionId: string, streamId: string): Promise<StreamMode | null>;

  /** Drop every stream belonging to a session */
  removeSession(sessionId: string): Promise<number>;

  getType(): string;
}
