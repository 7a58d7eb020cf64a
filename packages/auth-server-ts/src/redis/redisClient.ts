import Redis from 'ioredis'
import type { AuthServerConfig } from '@passcode-auth/shared-types'
import { logger as defaultLogger, type Logger } from '../logger'
import type { RedisLike } from './types'
import { withKeyPrefix } from './withKeyPrefix'

export interface CreateRedisClientOptions {
  url?: string
  keyPrefix?: string
  logger?: Logger
}

/**
 * Default Redis URL for local development.
 */
export const getDefaultRedisUrl = (): string => 'redis://localhost:6379'

// KEYS[1] = key, ARGV[1] = ttl seconds, ARGV[2..] = field/value pairs
const CREATE_HASH_IF_ABSENT = `
if redis.call('EXISTS', KEYS[1]) == 1 then
  return 0
end
redis.call('HSET', KEYS[1], unpack(ARGV, 2))
redis.call('EXPIRE', KEYS[1], ARGV[1])
return 1
`

// KEYS[1] = key, ARGV[1] = field, ARGV[2] = increment, ARGV[3] = limit
const HINCRBY_UP_TO = `
if redis.call('EXISTS', KEYS[1]) == 0 then
  return false
end
local current = tonumber(redis.call('HGET', KEYS[1], ARGV[1]) or '0')
if current == nil then
  return redis.error_reply('ERR hash value is not an integer')
end
if current + tonumber(ARGV[2]) > tonumber(ARGV[3]) then
  return -1
end
return redis.call('HINCRBY', KEYS[1], ARGV[1], ARGV[2])
`

// KEYS[1] = key, ARGV[1] = ttl seconds
const INCR_WITH_TTL = `
local count = redis.call('INCR', KEYS[1])
if redis.call('TTL', KEYS[1]) == -1 then
  redis.call('EXPIRE', KEYS[1], ARGV[1])
end
return count
`

const toInteger = (reply: unknown, command: string): number => {
  if (typeof reply === 'number') return reply
  throw new Error(`Unexpected ${command} reply: ${String(reply)}`)
}

export const createRedisClient = (options: CreateRedisClientOptions = {}): RedisLike => {
  const url = options.url ?? process.env.REDIS_URL ?? getDefaultRedisUrl()
  const log = (options.logger ?? defaultLogger).child('redis')

  const client = new Redis(url, {
    retryStrategy: (times) => {
      if (times > 10) {
        log.error('Redis max reconnection attempts exceeded')
        return null
      }
      return Math.min(times * 100, 3000)
    },
    lazyConnect: false,
  })

  client.on('error', (err: Error) => {
    log.error('Redis connection error', err)
  })
  client.on('ready', () => {
    log.info('Redis ready')
  })

  const redis: RedisLike = {
    exists: (key) => client.exists(key),
    unlink: (key) => client.unlink(key),
    hget: (key, field) => client.hget(key, field),
    createHashIfAbsent: async (key, fields, ttlSeconds) => {
      const pairs = Object.entries(fields).flatMap(([field, value]) => [field, String(value)])
      const reply = await client.eval(CREATE_HASH_IF_ABSENT, 1, key, ttlSeconds, ...pairs)
      return toInteger(reply, 'createHashIfAbsent')
    },
    hincrbyUpTo: async (key, field, increment, limit) => {
      const reply = await client.eval(HINCRBY_UP_TO, 1, key, field, increment, limit)
      return reply === null ? null : toInteger(reply, 'hincrbyUpTo')
    },
    incrWithTtl: async (key, ttlSeconds) => {
      const reply = await client.eval(INCR_WITH_TTL, 1, key, ttlSeconds)
      return toInteger(reply, 'incrWithTtl')
    },
    ttl: (key) => client.ttl(key),
    ping: () => client.ping(),
    quit: () => client.quit(),
  }

  return options.keyPrefix ? withKeyPrefix(redis, options.keyPrefix) : redis
}

export const createRedisClientFromConfig = (config: AuthServerConfig, logger?: Logger): RedisLike =>
  createRedisClient({
    url: config.redis.url,
    keyPrefix: config.redis.keyPrefix,
    logger,
  })
