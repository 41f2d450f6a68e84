export const RequestMethods = {
  INITIALIZE: 'initialize',
  PING: 'ping',
  ELICITATION_CREATE: 'elicitation/create',
  SAMPLING_CREATE_MESSAGE: 'sampling/createMessage',
  ROOTS_LIST: 'roots/list',
} as const;

export const NotificationMethods = {
  INITIALIZED: 'notifications/initialized',
  CANCELLED: 'notifications/cancelled',
  PROGRESS: 'notifications/progress',
} as const;

export const SUPPORTED_PROTOCOL_VERSIONS = [
  '2025-06-18',
  '2025-03-26',
  '2024-11-05',
] as const;

export const LATEST_PROTOCOL_VERSION = SUPPORTED_PROTOCOL_VERSIONS[0];
