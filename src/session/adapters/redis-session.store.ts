import { Injectable, Logger } from '@nestjs/common';
import Redis from 'ioredis';
import { StoreBackendError } from '../../common/errors/store-backend.error';
import { checkReplies } from '../../redis/exec-replies';
import { RedisPoolService } from '../../redis/redis-pool.service';
import { SessionMetadata, UserIdentity } from '../interfaces/session-metadata.interface';
import { SessionStore } from '../interfaces/session-store.interface';

// KEYS: activity; ARGV: sessionId, timestamp
const UPDATE_ACTIVITY_SCRIPT = `
local current = redis.call('ZSCORE', KEYS[1], ARGV[1])
if not current then
  return 0
end
if tonumber(ARGV[2]) <= tonumber(current) then
  return 0
end
redis.call('ZADD', KEYS[1], ARGV[2], ARGV[1])
return 1
`;

// KEYS: activity; ARGV: cutoff, sessionKeyPrefix
// Scores are re-read inside the script, so an update that lands first keeps
// its session and one that lands after finds nothing to update.
const PRUNE_IDLE_SCRIPT = `
local ids = redis.call('ZRANGEBYSCORE', KEYS[1], '-inf', '(' .. ARGV[1])
for _, id in ipairs(ids) do
  redis.call('ZREM', KEYS[1], id)
  redis.call('DEL', ARGV[2] .. id)
end
return #ids
`;

function parseIdentity(value: unknown): UserIdentity | undefined {
  if (
    typeof value === 'object' &&
    value !== null &&
    'claimType' in value &&
    'claimValue' in value &&
    'claimIssuer' in value &&
    typeof value.claimType === 'string' &&
    typeof value.claimValue === 'string' &&
    typeof value.claimIssuer === 'string'
  ) {
    return {
      claimType: value.claimType,
      claimValue: value.claimValue,
      claimIssuer: value.claimIssuer,
    };
  }
  return undefined;
}

/**
 * Session metadata in Redis: one JSON document per session plus a sorted set
 * of session ids scored by last activity. The sorted set is authoritative for
 * activity so that updates never rewrite the document.
 */
@Injectable()
export class RedisSessionStore implements SessionStore {
  private readonly logger = new Logger(RedisSessionStore.name);

  constructor(private readonly pool: RedisPoolService) {}

  async save(metadata: SessionMetadata): Promise<void> {
    await this.run('save', (client) =>
      client
        .multi()
        .set(this.sessionKey(metadata.sessionId), this.serialize(metadata))
        .zadd(this.activityKey(), metadata.lastActivityAt, metadata.sessionId)
        .exec()
        .then(checkReplies),
    );
  }

  async get(sessionId: string): Promise<SessionMetadata | null> {
    const result = await this.run('get', (client) =>
      client
        .multi()
        .get(this.sessionKey(sessionId))
        .zscore(this.activityKey(), sessionId)
        .exec()
        .then(checkReplies),
    );

    const [documentReply, scoreReply] = result;
    const document = documentReply?.[1];
    if (typeof document !== 'string') {
      return null;
    }

    const metadata = this.deserialize(document);
    if (!metadata) {
      this.logger.warn(`Discarding unreadable session document for ${sessionId}`);
      return null;
    }

    const score = scoreReply?.[1];
    if (typeof score === 'string' && Number(score) > metadata.lastActivityAt) {
      metadata.lastActivityAt = Number(score);
    }
    return metadata;
  }

  async updateActivity(sessionId: string, timestamp: number): Promise<void> {
    await this.run('updateActivity', (client) =>
      client.eval(UPDATE_ACTIVITY_SCRIPT, 1, this.activityKey(), sessionId, timestamp),
    );
  }

  async remove(sessionId: string): Promise<boolean> {
    const result = await this.run('remove', (client) =>
      client
        .multi()
        .del(this.sessionKey(sessionId))
        .zrem(this.activityKey(), sessionId)
        .exec()
        .then(checkReplies),
    );
    const deleted = result[0]?.[1];
    return typeof deleted === 'number' && deleted > 0;
  }

  async pruneIdle(idleTimeoutMs: number, now: number): Promise<number> {
    const removed = await this.run('pruneIdle', (client) =>
      client.eval(
        PRUNE_IDLE_SCRIPT,
        1,
        this.activityKey(),
        now - idleTimeoutMs,
        this.sessionKey(''),
      ),
    );
    return typeof removed === 'number' ? removed : 0;
  }

  async clear(): Promise<void> {
    const ids = await this.run('clear', (client) =>
      client.zrange(this.activityKey(), 0, -1),
    );
    await this.run('clear', (client) => {
      const multi = client.multi();
      for (const id of ids) {
        multi.del(this.sessionKey(id));
      }
      multi.del(this.activityKey());
      return multi.exec().then(checkReplies);
    });
    this.logger.debug(`Cleared ${ids.length} sessions from Redis`);
  }

  async count(): Promise<number> {
    return this.run('count', (client) => client.zcard(this.activityKey()));
  }

  async isHealthy(): Promise<boolean> {
    return this.pool.isHealthy();
  }

  getType(): string {
    return 'redis';
  }

  private async run<T>(operation: string, command: (client: Redis) => Promise<T>): Promise<T> {
    const client = this.pool.requireClient(operation);
    try {
      return await command(client);
    } catch (error) {
      this.logger.error(
        `Redis ${operation} error: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      throw new StoreBackendError('redis', operation, error);
    }
  }

  private sessionKey(sessionId: string): string {
    return `${this.pool.getKeyPrefix()}session:${sessionId}`;
  }

  private activityKey(): string {
    return `${this.pool.getKeyPrefix()}sessions:activity`;
  }

  private serialize(metadata: SessionMetadata): string {
    return JSON.stringify(metadata);
  }

  private deserialize(document: string): SessionMetadata | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(document);
    } catch {
      return null;
    }
    if (
      typeof parsed !== 'object' ||
      parsed === null ||
      !('sessionId' in parsed) ||
      !('createdAt' in parsed) ||
      !('lastActivityAt' in parsed) ||
      typeof parsed.sessionId !== 'string' ||
      typeof parsed.createdAt !== 'number' ||
      typeof parsed.lastActivityAt !== 'number'
    ) {
      return null;
    }

    const customData = 'customData' in parsed ? parsed.customData : undefined;
    return {
      sessionId: parsed.sessionId,
      userIdentity: parseIdentity('userIdentity' in parsed ? parsed.userIdentity : undefined),
      createdAt: parsed.createdAt,
      lastActivityAt: parsed.lastActivityAt,
      customData: typeof customData === 'string' ? customData : undefined,
    };
  }
}
