import express, { type Router } from 'express'
import type { HealthCheckError, HealthCheckResponse } from '@passcode-auth/shared-types'
import type { Queryable } from '../db/client'
import { logger as defaultLogger, type Logger } from '../logger'
import type { RedisLike } from '../redis/types'
import type { HttpReply } from './authHandlers'

export interface HealthCheckDeps {
  redis: RedisLike
  db: Queryable
  logger?: Logger
}

/**
 * Probes Postgres and Redis together. 200 when both answer, 503 naming the
 * first one that does not.
 */
export const createHealthCheck = (deps: HealthCheckDeps): (() => Promise<HttpReply>) => {
  const log = (deps.logger ?? defaultLogger).child('health')

  const reachable = async (name: string, check: () => Promise<unknown>): Promise<boolean> => {
    try {
      await check()
      return true
    } catch (err) {
      log.warn(`${name} health check failed`, { reason: err instanceof Error ? err.message : String(err) })
      return false
    }
  }

  return async () => {
    const [database, redis] = await Promise.all([
      reachable('database', () => deps.db.query('SELECT 1')),
      reachable('redis', () => deps.redis.ping()),
    ])

    if (database && redis) {
      const body: HealthCheckResponse = { database, redis, message: 'Everything is fine.' }
      return { status: 200, body }
    }

    const body: HealthCheckError = {
      error: 'SERVICE_UNAVAILABLE',
      message: database ? 'Redis not available' : 'Database not available',
      database,
      redis,
    }
    return { status: 503, body }
  }
}

export const createHealthRouter = (deps: HealthCheckDeps): Router => {
  const check = createHealthCheck(deps)
  const router = express.Router()

  router.get('/health-check', (_req, res, next) => {
    void check()
      .then((reply) => {
        res.status(reply.status).json(reply.body)
      })
      .catch(next)
  })

  return router
}
