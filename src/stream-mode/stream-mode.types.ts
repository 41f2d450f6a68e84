import { StreamMode } from '../event-stream/interfaces/stream-event.interface';

export interface StreamState {
  sessionId: string;
  streamId: string;
  mode: StreamMode;
  lastSequence: number;
}

export const STREAM_MODE_DEFAULTS = {
  POLLING_RETRY_INTERVAL_MS: 1000,
} as const;

export const STREAM_EVENTS = {
  MODE_CHANGED: 'stream.mode_changed',
} as const;

export class StreamTransitionError extends Error {
  constructor(
    readonly streamId: string,
    readonly from: StreamMode | 'switching',
    readonly to: StreamMode,
  ) {
    super(`Stream ${streamId} cannot move from ${from} to ${to}`);
    this.name = 'StreamTransitionError';
  }
}
