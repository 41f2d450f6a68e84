import { SessionMetadata } from '../interfaces/session-metadata.interface';
import { InMemorySessionStore } from './in-memory-session.store';

const MINUTE = 60_000;
const T0 = 1_700_000_000_000;

function session(sessionId: string, lastActivityAt: number): SessionMetadata {
  return { sessionId, createdAt: lastActivityAt, lastActivityAt };
}

describe('InMemorySessionStore', () => {
  let store: InMemorySessionStore;

  beforeEach(() => {
    store = new InMemorySessionStore();
  });

  describe('save and get', () => {
    it('should return what was saved', async () => {
      const metadata: SessionMetadata = {
        sessionId: 'abc',
        createdAt: T0,
        lastActivityAt: T0,
        userIdentity: { claimType: 'sub', claimValue: 'user-1', claimIssuer: 'test-issuer' },
        customData: 'payload',
      };

      await store.save(metadata);

      expect(await store.get('abc')).toEqual(metadata);
    });

    it('should return null for an unknown session', async () => {
      expect(await store.get('missing')).toBeNull();
    });

    it('should replace an existing record on save', async () => {
      await store.save(session('abc', T0));
      await store.save({ ...session('abc', T0), customData: 'second' });

      expect((await store.get('abc'))?.customData).toBe('second');
      expect(await store.count()).toBe(1);
    });

    it('should hand out copies so callers cannot mutate stored state', async () => {
      await store.save(session('abc', T0));

      const copy = await store.get('abc');
      if (copy) {
        copy.lastActivityAt = T0 + 999;
      }

      expect((await store.get('abc'))?.lastActivityAt).toBe(T0);
    });

    it('should survive many concurrent saves and gets', async () => {
      const ids = Array.from({ length: 100 }, (_, i) => `session-${i}`);

      await Promise.all(ids.map((id, i) => store.save(session(id, T0 + i))));
      const results = await Promise.all(ids.map((id) => store.get(id)));

      expect(await store.count()).toBe(100);
      results.forEach((result, i) => {
        expect(result?.sessionId).toBe(ids[i]);
        expect(result?.lastActivityAt).toBe(T0 + i);
      });
    });
  });

  describe('updateActivity', () => {
    it('should move activity forward', async () => {
      await store.save(session('abc', T0));

      await store.updateActivity('abc', T0 + MINUTE);

      expect((await store.get('abc'))?.lastActivityAt).toBe(T0 + MINUTE);
    });

    it('should keep the maximum when updates arrive out of order', async () => {
      await store.save(session('abc', T0));

      await Promise.all([
        store.updateActivity('abc', T0 + 3 * MINUTE),
        store.updateActivity('abc', T0 + MINUTE),
        store.updateActivity('abc', T0 + 2 * MINUTE),
      ]);

      expect((await store.get('abc'))?.lastActivityAt).toBe(T0 + 3 * MINUTE);
    });

    it('should do nothing for a missing session', async () => {
      await expect(store.updateActivity('missing', T0)).resolves.toBeUndefined();
      expect(await store.get('missing')).toBeNull();
    });
  });

  describe('remove', () => {
    it('should report whether a session was removed', async () => {
      await store.save(session('abc', T0));

      expect(await store.remove('abc')).toBe(true);
      expect(await store.remove('abc')).toBe(false);
      expect(await store.get('abc')).toBeNull();
    });
  });

  describe('pruneIdle', () => {
    it('should remove only sessions idle for longer than the timeout', async () => {
      await store.save(session('A', T0));
      await store.save(session('B', T0 + 59 * MINUTE));

      const removed = await store.pruneIdle(60 * MINUTE, T0 + 61 * MINUTE);

      expect(removed).toBe(1);
      expect(await store.get('A')).toBeNull();
      expect(await store.get('B')).not.toBeNull();
    });

    it('should keep a session idle for exactly the timeout', async () => {
      await store.save(session('A', T0));

      expect(await store.pruneIdle(60 * MINUTE, T0 + 60 * MINUTE)).toBe(0);
      expect(await store.count()).toBe(1);
    });

    it('should honour activity recorded before the prune', async () => {
      await store.save(session('A', T0));
      await store.updateActivity('A', T0 + 30 * MINUTE);

      expect(await store.pruneIdle(60 * MINUTE, T0 + 61 * MINUTE)).toBe(0);
    });
  });

  describe('clear and count', () => {
    it('should remove everything', async () => {
      await store.save(session('A', T0));
      await store.save(session('B', T0));

      await store.clear();

      expect(await store.count()).toBe(0);
    });
  });

  it('should describe itself', async () => {
    expect(store.getType()).toBe('in-memory');
    expect(await store.isHealthy()).toBe(true);
  });
});
