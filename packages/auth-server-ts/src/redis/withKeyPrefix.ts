import type { RedisLike } from './types'

export const withKeyPrefix = (redis: RedisLike, keyPrefix: string): RedisLike => {
  const prefix = keyPrefix.endsWith(':') ? keyPrefix : `${keyPrefix}:`

  return {
    exists: (key) => redis.exists(`${prefix}${key}`),
    unlink: (key) => redis.unlink(`${prefix}${key}`),
    hget: (key, field) => redis.hget(`${prefix}${key}`, field),
    createHashIfAbsent: (key, fields, ttlSeconds) => redis.createHashIfAbsent(`${prefix}${key}`, fields, ttlSeconds),
    hincrbyUpTo: (key, field, increment, limit) => redis.hincrbyUpTo(`${prefix}${key}`, field, increment, limit),
    incrWithTtl: (key, ttlSeconds) => redis.incrWithTtl(`${prefix}${key}`, ttlSeconds),
    ttl: (key) => redis.ttl(`${prefix}${key}`),
    ping: () => redis.ping(),
    quit: () => redis.quit(),
  }
}
