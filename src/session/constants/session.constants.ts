export const SESSION_DEFAULTS = {
  IDLE_TIMEOUT_MS: 7200000, // 2 hours
} as const;

export const SESSION_EVENTS = {
  SESSION_CREATED: 'session.created',
  SESSION_CLOSED: 'session.closed',
  SESSIONS_PRUNED: 'sessions.pruned',
} as const;

export const SESSION_ID_HEADER = 'mcp-session-id';
