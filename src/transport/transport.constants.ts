export const TRANSPORT_DEFAULTS = {
  STREAM_RETRY_INTERVAL_MS: 3000,
  RESPONSE_MODE: 'sse',
  PAGE_SIZE: 50,
} as const;

export type ResponseMode = 'sse' | 'json';

export const SERVER_INFO = {
  name: 'mcp-session-transport',
  version: '1.0.0',
} as const;

/** Stream id of the session's GET stream; POST streams use random ids */
export const STANDALONE_STREAM_ID = '_GET_stream';

export const LAST_EVENT_ID_HEADER = 'last-event-id';

export const SSE_MESSAGE_EVENT = 'message';
