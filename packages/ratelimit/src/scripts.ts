/**
 * Lua scripts executed atomically by Redis.
 *
 * Numbers that may be fractional are returned as strings: Redis truncates
 * Lua numbers to integers on the way out.
 */

/** KEYS[1] bucket key; ARGV[1] window ms */
export const FIXED_WINDOW_SCRIPT = `
local count = redis.call('INCR', KEYS[1])
if count == 1 then
  redis.call('PEXPIRE', KEYS[1], ARGV[1])
end
return count
`;

/** KEYS[1] set key; ARGV limit, window ms, now ms, member */
export const SLIDING_WINDOW_SCRIPT = `
local key = KEYS[1]
local limit = tonumber(ARGV[1])
local window = tonumber(ARGV[2])
local now = tonumber(ARGV[3])

redis.call('ZREMRANGEBYSCORE', key, '-inf', now - window)
local count = redis.call('ZCARD', key)
local allowed = 0
if count < limit then
  redis.call('ZADD', key, now, ARGV[4])
  count = count + 1
  allowed = 1
end
redis.call('PEXPIRE', key, window)

local oldest = redis.call('ZRANGE', key, 0, 0, 'WITHSCORES')
return {allowed, count, oldest[2] or '-1'}
`;

/** KEYS[1] hash key; ARGV capacity, refill per window, window ms, now ms */
export const TOKEN_BUCKET_SCRIPT = `
local key = KEYS[1]
local capacity = tonumber(ARGV[1])
local refill_rate = tonumber(ARGV[2])
local window = tonumber(ARGV[3])
local now = tonumber(ARGV[4])

local bucket = redis.call('HMGET', key, 'tokens', 'last_refill')
local tokens = tonumber(bucket[1]) or capacity
local last_refill = tonumber(bucket[2]) or now

local elapsed = math.max(0, now - last_refill)
tokens = math.min(capacity, tokens + elapsed * refill_rate / window)

local allowed = 0
if tokens >= 1 then
  tokens = tokens - 1
  allowed = 1
end

redis.call('HSET', key, 'tokens', tostring(tokens), 'last_refill', tostring(now))
redis.call('PEXPIRE', key, window * 2)
return {allowed, tostring(tokens)}
`;

export const SCRIPTS = {
  fixedWindow: FIXED_WINDOW_SCRIPT,
  slidingWindow: SLIDING_WINDOW_SCRIPT,
  tokenBucket: TOKEN_BUCKET_SCRIPT,
} as const;

export type ScriptName = keyof typeof SCRIPTS;
