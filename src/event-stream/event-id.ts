/**
 * Event ids are `base64url(sessionId):base64url(streamId):sequence`.
 *
 * Session ids may contain any visible ASCII character, so both ids are
 * encoded; `:` is not in the base64url alphabet and always splits cleanly.
 * The sequence is zero-padded to a fixed width so that ordinal string
 * comparison of two ids from the same stream matches numeric order.
 */
const SEPARATOR = ':';
const SEQUENCE_WIDTH = 16;
const SEQUENCE_PATTERN = /^\d{16}$/;

export interface ParsedEventId {
  sessionId: string;
  streamId: string;
  sequence: number;
}

function encodePart(value: string): string {
  return Buffer.from(value, 'utf8').toString('base64url');
}

function decodePart(value: string): string | null {
  if (value.length === 0 || !/^[A-Za-z0-9_-]+$/.test(value)) {
    return null;
  }
  const decoded = Buffer.from(value, 'base64url').toString('utf8');
  // Reject input that does not round-trip (padding junk, invalid UTF-8)
  return encodePart(decoded) === value ? decoded : null;
}

export function formatSequence(sequence: number): string {
  if (!Number.isSafeInteger(sequence) || sequence < 0) {
    throw new RangeError(`Invalid event sequence: ${sequence}`);
  }
  return sequence.toString().padStart(SEQUENCE_WIDTH, '0');
}

/** Common prefix of every stream key and event id of a session */
export function sessionKeyPrefix(sessionId: string): string {
  return `${encodePart(sessionId)}${SEPARATOR}`;
}

export function streamKeyPrefix(sessionId: string, streamId: string): string {
  return `${sessionKeyPrefix(sessionId)}${encodePart(streamId)}${SEPARATOR}`;
}

export function formatEventId(
  sessionId: string,
  streamId: string,
  sequence: number,
): string {
  return `${streamKeyPrefix(sessionId, streamId)}${formatSequence(sequence)}`;
}

export function parseEventId(eventId: string): ParsedEventId | null {
  const parts = eventId.split(SEPARATOR);
  if (parts.length !== 3 || !SEQUENCE_PATTERN.test(parts[2])) {
    return null;
  }

  const sessionId = decodePart(parts[0]);
  const streamId = decodePart(parts[1]);
  if (sessionId === null || streamId === null) {
    return null;
  }

  return { sessionId, streamId, sequence: Number(parts[2]) };
}

/**
 * Ordinal comparison, matching the order ids were allocated in.
 */
export function compareEventIds(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}
