/**
 * Server-side scripts for the conversation record. Each mutation of the
 * record, its context list and the follow-up candidate index runs as one
 * script, so concurrent writers never interleave inside an update.
 *
 * `lastMessageAt` is assigned as max(now, previous + 1).
 * Missing hash fields read as nil or false depending on the server, so every
 * read goes through `or`.
 */

/**
 * KEYS: record, context, candidates
 * ARGV: tenantId, chatId, role, now, contextEntry, maxEntries, member
 * Returns the assigned lastMessageAt.
 */
export const RECORD_TURN = `
local prev = tonumber(redis.call('HGET', KEYS[1], 'lastMessageAt') or '0') or 0
local at = tonumber(ARGV[4])
if at <= prev then at = prev + 1 end
redis.call('HSET', KEYS[1], 'tenantId', ARGV[1], 'chatId', ARGV[2],
  'lastRole', ARGV[3], 'status', 'active', 'lastMessageAt', at)
if ARGV[3] == 'user' then
  redis.call('HSET', KEYS[1], 'followupStage', 0, 'lastUserMessageAt', at)
  redis.call('ZREM', KEYS[3], ARGV[7])
else
  redis.call('HSETNX', KEYS[1], 'followupStage', 0)
  redis.call('ZADD', KEYS[3], at, ARGV[7])
end
if ARGV[5] ~= '' then
  redis.call('RPUSH', KEYS[2], ARGV[5])
  redis.call('LTRIM', KEYS[2], -tonumber(ARGV[6]), -1)
end
return at
`;

/**
 * KEYS: record, context, candidates
 * ARGV: newStage, now, observedAt ('' for none), member, contextEntry, maxEntries
 * Returns the new lastMessageAt, or -1 when the preconditions no longer hold.
 */
export const ADVANCE_STAGE = `
local rec = redis.call('HMGET', KEYS[1], 'lastRole', 'status', 'followupStage', 'lastMessageAt')
if rec[1] ~= 'assistant' or rec[2] ~= 'active' then return -1 end
if (tonumber(rec[3] or '0') or 0) ~= tonumber(ARGV[1]) - 1 then return -1 end
local prev = tonumber(rec[4] or '0') or 0
if ARGV[3] ~= '' and prev ~= tonumber(ARGV[3]) then return -1 end
local at = tonumber(ARGV[2])
if at <= prev then at = prev + 1 end
redis.call('HSET', KEYS[1], 'followupStage', ARGV[1], 'lastMessageAt', at)
redis.call('ZADD', KEYS[3], at, ARGV[4])
if ARGV[5] ~= '' then
  redis.call('RPUSH', KEYS[2], ARGV[5])
  redis.call('LTRIM', KEYS[2], -tonumber(ARGV[6]), -1)
end
return at
`;

/**
 * KEYS: record, candidates
 * ARGV: observedAt ('' for none), member
 * Returns 1 when the record was finished, 0 otherwise.
 */
export const MARK_FINISHED = `
if redis.call('EXISTS', KEYS[1]) == 0 then return 0 end
if ARGV[1] ~= '' then
  local prev = tonumber(redis.call('HGET', KEYS[1], 'lastMessageAt') or '0') or 0
  if prev ~= tonumber(ARGV[1]) then return 0 end
end
redis.call('HSET', KEYS[1], 'status', 'finished')
redis.call('ZREM', KEYS[2], ARGV[2])
return 1
`;
