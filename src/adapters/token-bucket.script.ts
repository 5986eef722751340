/**
 * Lua script running the token bucket transition atomically inside Redis.
 *
 * KEYS[1] bucket key
 * ARGV[1] rate in tokens per second
 * ARGV[2] capacity
 * ARGV[3] caller's clock in milliseconds
 * ARGV[4] key TTL in seconds
 *
 * The bucket is a hash with fields `tokens` and `last_update`.
 * Returns 1 when a token was consumed, 0 otherwise.
 */
export const TOKEN_BUCKET_SCRIPT = `
local key = KEYS[1]
local rate = tonumber(ARGV[1])
local capacity = tonumber(ARGV[2])
local now = tonumber(ARGV[3])
local ttl = tonumber(ARGV[4])

local data = redis.call('HMGET', key, 'tokens', 'last_update')
local tokens = tonumber(data[1])
local last_update = tonumber(data[2])

if tokens == nil or last_update == nil then
  tokens = capacity
  last_update = now
end

local elapsed = now - last_update
if elapsed < 0 then
  elapsed = 0
  now = last_update
end

tokens = math.min(capacity, tokens + (elapsed / 1000) * rate)

local allowed = 0
if tokens >= 1 then
  tokens = tokens - 1
  allowed = 1
end

redis.call('HSET', key, 'tokens', tostring(tokens), 'last_update', tostring(now))
redis.call('EXPIRE', key, ttl)

return allowed
`;
