import { ConfigService } from '@nestjs/config';
import { ManualClock } from '../../common/clock/manual-clock';
import { MessageKind } from '../../protocol/message-kind';
import { formatEventId, parseEventId } from '../event-id';
import { ReplayedEvent } from '../interfaces/stream-event.interface';
import { InMemoryEventStreamStore } from './in-memory-event-stream.store';

const MINUTE = 60_000;

async function replay(
  store: InMemoryEventStreamStore,
  lastEventId: string,
): Promise<{ target: Awaited<ReturnType<InMemoryEventStreamStore['replayAfter']>>; events: ReplayedEvent[] }> {
  const events: ReplayedEvent[] = [];
  const target = await store.replayAfter(lastEventId, async (stream) => {
    for await (const event of stream) {
      events.push(event);
    }
  });
  return { target, events };
}

describe('InMemoryEventStreamStore', () => {
  let clock: ManualClock;
  let store: InMemoryEventStreamStore;

  async function append(
    sessionId: string,
    streamId: string,
    kind: MessageKind,
    payload: string | null = `{"n":"${kind}"}`,
  ): Promise<{ eventId: string; stored: boolean }> {
    const eventId = await store.getEventId(sessionId, streamId);
    const stored = await store.storeEvent(sessionId, streamId, {
      eventId,
      kind,
      payload,
      eventType: payload === null ? undefined : 'message',
    });
    return { eventId, stored };
  }

  beforeEach(() => {
    clock = new ManualClock(1_000_000);
    store = new InMemoryEventStreamStore(clock);
  });

  describe('getEventId', () => {
    it('should allocate increasing ids per stream', async () => {
      const first = await store.getEventId('s1', 'a');
      const second = await store.getEventId('s1', 'a');
      const other = await store.getEventId('s1', 'b');

      expect(first).toBe(formatEventId('s1', 'a', 1));
      expect(second).toBe(formatEventId('s1', 'a', 2));
      expect(other).toBe(formatEventId('s1', 'b', 1));
    });

    it('should hand out unique ids under concurrency', async () => {
      const ids = await Promise.all(Array.from({ length: 50 }, () => store.getEventId('s1', 'a')));
      expect(new Set(ids).size).toBe(50);
    });
  });

  describe('retention', () => {
    it('should never retain notifications', async () => {
      const { stored } = await append('s1', 'a', 'notification');
      expect(stored).toBe(false);
      expect(store.streamCount()).toBe(0);
    });

    it('should drop a response on a stream with no retained events', async () => {
      const { stored } = await append('s1', 'a', 'response');
      expect(stored).toBe(false);
    });

    it('should retain a response once the stream holds a priming event', async () => {
      await append('s1', 'a', 'priming', null);
      const { stored } = await append('s1', 'a', 'response');
      expect(stored).toBe(true);
    });

    it('should always retain server requests', async () => {
      const { stored } = await append('s1', 'a', 'server-request');
      expect(stored).toBe(true);
      expect(store.streamCount()).toBe(1);
    });
  });

  describe('replayAfter', () => {
    it('should deliver exactly the events after the given id, in order', async () => {
      const ids: string[] = [];
      await append('s1', 'a', 'priming', null);
      for (let i = 0; i < 5; i++) {
        ids.push((await append('s1', 'a', 'server-request', `{"i":${i}}`)).eventId);
      }

      const { target, events } = await replay(store, ids[1]);

      expect(target).toEqual({ sessionId: 's1', streamId: 'a', mode: 'streaming' });
      expect(events.map((event) => event.eventId)).toEqual(ids.slice(2));
      expect(events.map((event) => event.payload)).toEqual(['{"i":2}', '{"i":3}', '{"i":4}']);
    });

    it('should deliver nothing after the newest id', async () => {
      const { eventId } = await append('s1', 'a', 'server-request');

      const { target, events } = await replay(store, eventId);

      expect(target?.streamId).toBe('a');
      expect(events).toEqual([]);
    });

    it('should not deliver priming events', async () => {
      const priming = await append('s1', 'a', 'priming', null);
      const request = await append('s1', 'a', 'server-request');

      const { events } = await replay(store, formatEventId('s1', 'a', 0));

      expect(events.map((event) => event.eventId)).toEqual([request.eventId]);
      expect(priming.stored).toBe(true);
    });

    it('should replay payloads byte for byte', async () => {
      const payload = '{"text":"line one\\nline two","emoji":"é☺"}';
      const { eventId } = await append('s1', 'a', 'server-request', payload);

      const { events } = await replay(store, formatEventId('s1', 'a', 0));

      expect(events).toEqual([{ eventId, payload, eventType: 'message', retryMs: undefined }]);
    });

    it('should keep streams apart', async () => {
      await append('s1', 'a', 'server-request', '{"stream":"a"}');
      await append('s1', 'b', 'server-request', '{"stream":"b"}');

      const { events } = await replay(store, formatEventId('s1', 'b', 0));

      expect(events.map((event) => event.payload)).toEqual(['{"stream":"b"}']);
    });

    it('should return null and deliver nothing for an unknown stream', async () => {
      const deliver = jest.fn(async (stream: AsyncIterable<ReplayedEvent>) => {
        for await (const event of stream) {
          throw new Error(`unexpected ${event.eventId}`);
        }
      });

      const target = await store.replayAfter(formatEventId('nobody', 'a', 3), deliver);

      expect(target).toBeNull();
      expect(deliver).toHaveBeenCalledTimes(1);
    });

    it('should return null for an unparseable id', async () => {
      await append('s1', 'a', 'server-request');

      const { target, events } = await replay(store, 'not-an-event-id');

      expect(target).toBeNull();
      expect(events).toEqual([]);
    });

    it('should report the stored stream mode', async () => {
      const { eventId } = await append('s1', 'a', 'server-request');
      await store.setStreamMode('s1', 'a', 'polling');

      const { target } = await replay(store, eventId);

      expect(target?.mode).toBe('polling');
    });

    it('should finish bookkeeping before delivery starts', async () => {
      const first = await append('s1', 'a', 'server-request');
      const second = await append('s1', 'a', 'server-request');
      let storedDuringDelivery = false;

      await store.replayAfter(first.eventId, async (stream) => {
        // A write racing the consumer must not change what is being delivered
        storedDuringDelivery = (await append('s1', 'a', 'server-request')).stored;
        const delivered: string[] = [];
        for await (const event of stream) {
          delivered.push(event.eventId);
        }
        expect(delivered).toEqual([second.eventId]);
      });

      expect(storedDuringDelivery).toBe(true);
    });
  });

  describe('cleanExpired', () => {
    it('should expire events idle past the sliding window', async () => {
      await append('s1', 'a', 'server-request');
      clock.advance(30 * MINUTE + 1);

      expect(await store.cleanExpired(clock.now())).toBe(1);
      expect(store.streamCount()).toBe(0);
    });

    it('should keep an event idle for exactly the sliding window', async () => {
      await append('s1', 'a', 'server-request');
      clock.advance(30 * MINUTE);

      expect(await store.cleanExpired(clock.now())).toBe(0);
    });

    it('should extend the sliding window on replay', async () => {
      const first = await append('s1', 'a', 'server-request');
      await append('s1', 'a', 'server-request');
      clock.advance(20 * MINUTE);
      await replay(store, first.eventId);
      clock.advance(20 * MINUTE);

      // The replayed event was touched; the one before the cursor was not
      expect(await store.cleanExpired(clock.now())).toBe(1);
      const { events } = await replay(store, formatEventId('s1', 'a', 0));
      expect(events).toHaveLength(1);
    });

    it('should expire events past the absolute lifetime even when read', async () => {
      await append('s1', 'a', 'server-request');
      for (let i = 0; i < 5; i++) {
        clock.advance(25 * MINUTE);
        await replay(store, formatEventId('s1', 'a', 0));
      }

      expect(await store.cleanExpired(clock.now())).toBe(1);
    });

    it('should honour configured windows', async () => {
      const config = {
        get: jest.fn((key: string) =>
          key === 'EVENT_SLIDING_EXPIRATION_MS' ? MINUTE : undefined,
        ),
      } as unknown as ConfigService;
      store = new InMemoryEventStreamStore(clock, config);
      await append('s1', 'a', 'server-request');
      clock.advance(MINUTE + 1);

      expect(await store.cleanExpired(clock.now())).toBe(1);
    });

    it('should keep allocating after expiry without reusing ids', async () => {
      await append('s1', 'a', 'server-request');
      clock.advance(3 * 60 * MINUTE);
      await store.cleanExpired(clock.now());

      expect(parseEventId(await store.getEventId('s1', 'a'))?.sequence).toBe(2);
    });
  });

  describe('stream mode', () => {
    it('should return null for an unknown stream', async () => {
      expect(await store.getStreamMode('s1', 'a')).toBeNull();
    });

    it('should store the last mode set', async () => {
      await store.setStreamMode('s1', 'a', 'streaming');
      await store.setStreamMode('s1', 'a', 'closed');

      expect(await store.getStreamMode('s1', 'a')).toBe('closed');
    });
  });

  describe('removeSession', () => {
    it('should drop every stream of the session and nothing else', async () => {
      await append('s1', 'a', 'server-request');
      await append('s1', 'b', 'server-request');
      await append('s2', 'a', 'server-request');

      expect(await store.removeSession('s1')).toBe(2);
      expect(store.streamCount()).toBe(1);
      expect(await store.getStreamMode('s1', 'a')).toBeNull();
      expect((await replay(store, formatEventId('s2', 'a', 0))).events).toHaveLength(1);
    });
  });
});
