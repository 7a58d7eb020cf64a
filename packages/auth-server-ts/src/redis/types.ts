/**
 * The slice of the Redis command set the server relies on. `createHashIfAbsent`,
 * `hincrbyUpTo` and `incrWithTtl` are single-round-trip scripts on a real server.
 */
export type RedisLike = {
  exists: (key: string) => Promise<number>
  unlink: (key: string) => Promise<number>
  hget: (key: string, field: string) => Promise<string | null>
  /** Writes every field and the TTL only when the key is absent. Resolves 1 when written, 0 when the key existed. */
  createHashIfAbsent: (key: string, fields: Record<string, string | number>, ttlSeconds: number) => Promise<number>
  /**
   * Resolves the new value, null when the key does not exist, or -1 when the
   * increment would take the field past `limit` (the field is left unchanged).
   * Never creates the key.
   */
  hincrbyUpTo: (key: string, field: string, increment: number, limit: number) => Promise<number | null>
  /** INCR that also sets the TTL whenever the counter has none. */
  incrWithTtl: (key: string, ttlSeconds: number) => Promise<number>
  ttl: (key: string) => Promise<number>
  ping: () => Promise<string>
  quit: () => Promise<unknown>
}
