export const EVENT_STREAM_DEFAULTS = {
  SLIDING_EXPIRATION_MS: 1800000, // 30 minutes
  ABSOLUTE_EXPIRATION_MS: 7200000, // 2 hours
} as const;

export interface EventExpiryOptions {
  slidingExpirationMs: number;
  absoluteExpirationMs: number;
}
