/**
 * Lua scripts run server-side so that append, read-and-touch and expiry
 * sweeps stay atomic when several processes share one Redis.
 *
 * Per stream: a sorted set of event ids scored by sequence, a hash of
 * event id -> serialized event, and a hash of event id -> "storedAt|lastAccessedAt".
 */

// KEYS: events, data, access, streamIndex, sessionIndex
// ARGV: eventId, sequence, serializedEvent, conditional, streamKey, now
export const STORE_EVENT_SCRIPT = `
if ARGV[4] == '1' and redis.call('EXISTS', KEYS[1]) == 0 then
  return 0
end
redis.call('ZADD', KEYS[1], ARGV[2], ARGV[1])
redis.call('HSET', KEYS[2], ARGV[1], ARGV[3])
redis.call('HSET', KEYS[3], ARGV[1], ARGV[6] .. '|' .. ARGV[6])
redis.call('SADD', KEYS[4], ARGV[5])
redis.call('SADD', KEYS[5], ARGV[5])
return 1
`;

// KEYS: events, data, access
// ARGV: afterSequence, now
export const REPLAY_EVENTS_SCRIPT = `
local ids = redis.call('ZRANGEBYSCORE', KEYS[1], '(' .. ARGV[1], '+inf')
local out = {}
for _, id in ipairs(ids) do
  local raw = redis.call('HGET', KEYS[2], id)
  if raw then
    local stamps = redis.call('HGET', KEYS[3], id) or ''
    local storedAt = string.match(stamps, '^(%d+)|') or ARGV[2]
    redis.call('HSET', KEYS[3], id, storedAt .. '|' .. ARGV[2])
    table.insert(out, raw)
  end
end
return out
`;

// KEYS: events, data, access, streamIndex
// ARGV: now, slidingMs, absoluteMs, streamKey
export const CLEAN_EXPIRED_SCRIPT = `
local now = tonumber(ARGV[1])
local sliding = tonumber(ARGV[2])
local absolute = tonumber(ARGV[3])
local removed = 0
local ids = redis.call('ZRANGE', KEYS[1], 0, -1)
for _, id in ipairs(ids) do
  local stamps = redis.call('HGET', KEYS[3], id)
  local storedAt, lastAccessed
  if stamps then
    storedAt, lastAccessed = string.match(stamps, '^(%d+)|(%d+)$')
  end
  if not storedAt
    or now - tonumber(lastAccessed) > sliding
    or now - tonumber(storedAt) > absolute then
    redis.call('ZREM', KEYS[1], id)
    redis.call('HDEL', KEYS[2], id)
    redis.call('HDEL', KEYS[3], id)
    removed = removed + 1
  end
end
if redis.call('ZCARD', KEYS[1]) == 0 then
  redis.call('DEL', KEYS[1], KEYS[2], KEYS[3])
  redis.call('SREM', KEYS[4], ARGV[4])
end
return removed
`;
