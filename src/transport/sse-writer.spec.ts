import { createWriter } from '../../test/support/fake-sse-response';
import { formatSseEvent } from './sse-writer';

describe('SSE writer', () => {
  describe('formatSseEvent', () => {
    it('should format a message event', () => {
      expect(formatSseEvent({ event: 'message', id: 'e1', data: '{"a":1}' })).toBe(
        'event: message\nid: e1\ndata: {"a":1}\n\n',
      );
    });

    it('should format a priming event with an empty data line', () => {
      expect(formatSseEvent({ id: 'e0', retry: 3000, data: '' })).toBe(
        'id: e0\nretry: 3000\ndata: \n\n',
      );
    });

    it('should split multi-line data into several data lines', () => {
      expect(formatSseEvent({ data: 'one\ntwo\r\nthree' })).toBe(
        'data: one\ndata: two\ndata: three\n\n',
      );
    });
  });

  describe('SseWriter', () => {
    it('should send event-stream headers with the first write', () => {
      const { res, writer } = createWriter();

      writer.write({ id: 'e1', data: 'x' });

      expect(res.statusCode).toBe(200);
      expect(res.headers['content-type']).toBe('text/event-stream');
      expect(res.headers['cache-control']).toBe('no-cache, no-transform');
      expect(res.chunks).toEqual(['id: e1\ndata: x\n\n']);
    });

    it('should drop writes after the client disconnects', () => {
      const { res, writer } = createWriter();
      const onClose = jest.fn();
      writer.onClose(onClose);

      res.disconnect();

      expect(writer.write({ data: 'late' })).toBe(false);
      expect(res.chunks).toEqual([]);
      expect(writer.isClosed()).toBe(true);
      expect(onClose).toHaveBeenCalledTimes(1);
    });

    it('should end once and notify listeners registered after close immediately', () => {
      const { res, writer } = createWriter();

      writer.end();
      writer.end();
      const late = jest.fn();
      writer.onClose(late);

      expect(res.ended).toBe(true);
      expect(res.statusCode).toBe(200);
      expect(late).toHaveBeenCalledTimes(1);
    });
  });
});
