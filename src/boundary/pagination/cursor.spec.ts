import {
  InvalidCursorError,
  collectAllPages,
  decodeCursor,
  encodeCursor,
  hasMorePages,
  paginate,
} from './cursor';

describe('cursor pagination', () => {
  const items = Array.from({ length: 7 }, (_, i) => `item-${i}`);

  describe('paginate', () => {
    it('should return the first page with a cursor when more remain', () => {
      const page = paginate(items, undefined, 3);

      expect(page.items).toEqual(['item-0', 'item-1', 'item-2']);
      expect(page.nextCursor).toBe(encodeCursor(3));
    });

    it('should follow cursors to the last page, which has no cursor', () => {
      const second = paginate(items, encodeCursor(3), 3);
      const last = paginate(items, second.nextCursor, 3);

      expect(second.items).toEqual(['item-3', 'item-4', 'item-5']);
      expect(last.items).toEqual(['item-6']);
      expect(last).not.toHaveProperty('nextCursor');
    });

    it('should not emit a cursor when the listing ends exactly on a page boundary', () => {
      expect(paginate(items.slice(0, 6), encodeCursor(3), 3).nextCursor).toBeUndefined();
    });

    it('should return an empty page for an empty listing', () => {
      expect(paginate([], undefined, 3)).toEqual({ items: [] });
    });

    it('should reject a non-positive page size', () => {
      expect(() => paginate(items, undefined, 0)).toThrow(RangeError);
    });
  });

  describe('decodeCursor', () => {
    it('should decode what encodeCursor produces', () => {
      expect(decodeCursor(encodeCursor(42))).toBe(42);
    });

    it.each([
      ['garbage', 'not a cursor'],
      ['a JSON string', Buffer.from('"x"').toString('base64url')],
      ['a negative offset', Buffer.from('{"o":-1}').toString('base64url')],
      ['a fractional offset', Buffer.from('{"o":1.5}').toString('base64url')],
      ['a missing offset', Buffer.from('{}').toString('base64url')],
    ])('should reject %s', (_label, cursor) => {
      expect(() => decodeCursor(cursor)).toThrow(InvalidCursorError);
    });
  });

  describe('hasMorePages', () => {
    it('should treat any present cursor, even an empty one, as more pages', () => {
      expect(hasMorePages('')).toBe(true);
      expect(hasMorePages('abc')).toBe(true);
      expect(hasMorePages(undefined)).toBe(false);
      expect(hasMorePages(null)).toBe(false);
    });
  });

  describe('collectAllPages', () => {
    it('should gather every item across pages', async () => {
      const fetchPage = jest.fn(async (cursor: string | undefined) => paginate(items, cursor, 3));

      const collected: string[] = [];
      for await (const item of collectAllPages(fetchPage)) {
        collected.push(item);
      }

      expect(collected).toEqual(items);
      expect(fetchPage).toHaveBeenCalledTimes(3);
    });

    it('should keep going when a server returns an empty cursor', async () => {
      const pages = [
        { items: [1], nextCursor: '' },
        { items: [2], nextCursor: null },
      ];
      const fetchPage = jest.fn(async () => pages.shift() ?? { items: [] });

      const collected: number[] = [];
      for await (const item of collectAllPages(fetchPage)) {
        collected.push(item);
      }

      expect(collected).toEqual([1, 2]);
      expect(fetchPage).toHaveBeenNthCalledWith(2, '');
    });
  });
});
