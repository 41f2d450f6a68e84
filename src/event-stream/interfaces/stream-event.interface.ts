import { MessageKind } from '../../protocol/message-kind';

export type StreamMode = 'streaming' | 'polling' | 'closed';

/**
 * One outbound SSE event on a logical stream.
 */
export interface StreamEvent {
  eventId: string;
  kind: MessageKind;
  /** Serialized message text, replayed byte-for-byte. Empty for priming events. */
  payload: string | null;
  /** SSE `event:` field */
  eventType?: string;
  /** SSE `retry:` field in milliseconds */
  retryMs?: number;
}

export interface StoredStreamEvent extends StreamEvent {
  storedAt: number;
  lastAccessedAt: number;
}

export interface ReplayedEvent {
  eventId: string;
  payload: string;
  eventType?: string;
  retryMs?: number;
}

export interface ReplayTarget {
  sessionId: string;
  streamId: string;
  mode: StreamMode;
}

export type ReplayDelivery = (events: AsyncIterable<ReplayedEvent>) => Promise<void>;
