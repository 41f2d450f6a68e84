import { classifyMessage, retentionFor } from './message-kind';

describe('message kinds', () => {
  describe('classifyMessage', () => {
    it('should classify a request with an id as a server request', () => {
      expect(classifyMessage({ jsonrpc: '2.0', id: 1, method: 'sampling/createMessage' })).toBe(
        'server-request',
      );
    });

    it('should classify a message without an id as a notification', () => {
      expect(classifyMessage({ jsonrpc: '2.0', method: 'notifications/progress' })).toBe(
        'notification',
      );
    });

    it('should classify results and errors', () => {
      expect(classifyMessage({ jsonrpc: '2.0', id: 'a', result: {} })).toBe('response');
      expect(
        classifyMessage({ jsonrpc: '2.0', id: null, error: { code: -32603, message: 'boom' } }),
      ).toBe('error');
    });
  });

  describe('retentionFor', () => {
    it('should always retain server requests and priming events', () => {
      expect(retentionFor('server-request')).toBe('always');
      expect(retentionFor('priming')).toBe('always');
    });

    it('should retain replies only on streams that already hold events', () => {
      expect(retentionFor('response')).toBe('when-stream-open');
      expect(retentionFor('error')).toBe('when-stream-open');
    });

    it('should never retain notifications', () => {
      expect(retentionFor('notification')).toBe('never');
    });
  });
});
