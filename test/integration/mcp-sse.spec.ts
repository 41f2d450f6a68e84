import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { LATEST_PROTOCOL_VERSION } from '@/protocol/methods';
import { SESSION_ID_HEADER } from '@/session/constants/session.constants';
import { createTestApp } from '../support/create-test-app';
import { parseSse } from '../support/fake-sse-response';

describe('MCP endpoint (SSE responses)', () => {
  let app: INestApplication;

  async function openSession(): Promise<string> {
    const response = await request(app.getHttpServer())
      .post('/mcp')
      .send({
        jsonrpc: '2.0',
        id: 1,
        method: 'initialize',
        params: { protocolVersion: LATEST_PROTOCOL_VERSION, capabilities: {} },
      })
      .expect(200);
    return response.headers[SESSION_ID_HEADER];
  }

  beforeEach(async () => {
    app = await createTestApp({ RESPONSE_MODE: 'sse', STREAM_RETRY_INTERVAL_MS: 3000 });
  });

  afterEach(async () => {
    await app.close();
  });

  it('should open a resumable stream and answer on it', async () => {
    const sessionId = await openSession();

    const response = await request(app.getHttpServer())
      .post('/mcp')
      .set(SESSION_ID_HEADER, sessionId)
      .send({ jsonrpc: '2.0', id: 7, method: 'ping' })
      .expect(200);

    expect(response.headers['content-type']).toBe('text/event-stream');
    const [priming, message] = parseSse(response.text);
    expect(priming).toEqual({ id: expect.stringMatching(/:0{15}1$/), retry: 3000, data: '' });
    expect(message).toEqual({
      id: expect.stringMatching(/:0{15}2$/),
      event: 'message',
      data: JSON.stringify({ jsonrpc: '2.0', id: 7, result: {} }),
    });
  });

  it('should replay what followed Last-Event-ID and end', async () => {
    const sessionId = await openSession();
    const post = await request(app.getHttpServer())
      .post('/mcp')
      .set(SESSION_ID_HEADER, sessionId)
      .send({ jsonrpc: '2.0', id: 8, method: 'ping' })
      .expect(200);
    const [priming, message] = parseSse(post.text);

    const replay = await request(app.getHttpServer())
      .get('/mcp')
      .set(SESSION_ID_HEADER, sessionId)
      .set('Last-Event-ID', priming.id ?? '')
      .expect(200);

    expect(parseSse(replay.text)).toEqual([message]);
  });

  it('should not replay another session\'s stream', async () => {
    const owner = await openSession();
    const other = await openSession();
    const post = await request(app.getHttpServer())
      .post('/mcp')
      .set(SESSION_ID_HEADER, owner)
      .send({ jsonrpc: '2.0', id: 9, method: 'ping' })
      .expect(200);
    const [priming] = parseSse(post.text);

    const response = await request(app.getHttpServer())
      .get('/mcp')
      .set(SESSION_ID_HEADER, other)
      .set('Last-Event-ID', priming.id ?? '')
      .expect(404);

    expect(response.body.error).toEqual({
      code: -32000,
      message: 'Not Found: Event stream belongs to another session',
    });
  });
});
