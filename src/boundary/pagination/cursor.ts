/**
 * Pagination cursors are opaque to clients. The only contract a client may
 * rely on: a present `nextCursor` (even an empty string) means another page
 * may exist; an absent one means the listing is complete.
 */

export interface Page<T> {
  items: T[];
  nextCursor?: string;
}

export class InvalidCursorError extends Error {
  constructor(readonly cursor: string) {
    super(`Invalid pagination cursor: ${cursor}`);
    this.name = 'InvalidCursorError';
  }
}

interface CursorState {
  o: number;
}

export function encodeCursor(offset: number): string {
  const state: CursorState = { o: offset };
  return Buffer.from(JSON.stringify(state), 'utf8').toString('base64url');
}

export function decodeCursor(cursor: string): number {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(cursor, 'base64url').toString('utf8'));
  } catch {
    throw new InvalidCursorError(cursor);
  }

  if (
    typeof parsed !== 'object' ||
    parsed === null ||
    !('o' in parsed) ||
    typeof parsed.o !== 'number' ||
    !Number.isSafeInteger(parsed.o) ||
    parsed.o < 0
  ) {
    throw new InvalidCursorError(cursor);
  }
  return parsed.o;
}

/**
 * Slice one page out of a stable, ordered listing. The final page never
 * carries a cursor.
 */
export function paginate<T>(
  items: readonly T[],
  cursor: string | undefined,
  pageSize: number,
): Page<T> {
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new RangeError(`Page size must be a positive integer, got ${pageSize}`);
  }

  const offset = cursor === undefined ? 0 : decodeCursor(cursor);
  const end = offset + pageSize;
  const page: Page<T> = { items: items.slice(offset, end) };

  if (end < items.length) {
    page.nextCursor = encodeCursor(end);
  }
  return page;
}

export function hasMorePages(nextCursor: string | null | undefined): nextCursor is string {
  return nextCursor !== undefined && nextCursor !== null;
}

/**
 * Client-side helper: follow cursors until the server stops returning one.
 */
export async function* collectAllPages<T>(
  fetchPage: (cursor: string | undefined) => Promise<{ items: T[]; nextCursor?: string | null }>,
): AsyncGenerator<T> {
  let cursor: string | undefined;
  for (;;) {
    const page = await fetchPage(cursor);
    yield* page.items;
    if (!hasMorePages(page.nextCursor)) {
      return;
    }
    cursor = page.nextCursor;
  }
}
