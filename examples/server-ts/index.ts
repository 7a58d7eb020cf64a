import express from 'express'

import {
  AccessTokenService,
  AccountService,
  BcryptHasher,
  OtpLifecycle,
  OtpMailer,
  OtpService,
  OtpStore,
  PgAccountRepository,
  createAuthRouter,
  createHealthRouter,
  createLogger,
  createMailTransport,
  createPool,
  createRedisClientFromConfig,
  loadConfig,
  poolQueryable,
  type Logger,
  type OtpDelivery,
} from '../../packages/auth-server-ts/src'

const config = loadConfig()
const log = createLogger({ level: config.logLevel, format: config.env === 'production' ? 'json' : 'pretty' })

/**
 * Development stand-in for email: writes the code to the log.
 * DO NOT USE IN PRODUCTION: codes in logs are as good as leaked.
 */
class LogDelivery implements OtpDelivery {
  constructor(private readonly log: Logger) {}

  deliver(destination: string, code: string): void {
    this.log.warn('Passcode (dev only, not emailed)', { destination, code })
  }
}

if (!config.mail && config.env === 'production') {
  throw new Error('SMTP_HOST and EMAIL_FROM must be set in production')
}

const redis = createRedisClientFromConfig(config, log)
const pool = createPool({ url: config.database.url })
const db = poolQueryable(pool)
const repository = new PgAccountRepository(db)

const hasher = new BcryptHasher({ rounds: config.hashing.rounds })
const store = new OtpStore(redis, { ttlSeconds: config.otp.ttlSeconds, logger: log })
const lifecycle = new OtpLifecycle(store, hasher, { maxAttempts: config.otp.maxAttempts, logger: log })

const delivery: OtpDelivery = config.mail
  ? new OtpMailer(createMailTransport(config.mail), {
      from: config.mail.from,
      ttlSeconds: config.otp.ttlSeconds,
      retries: config.mail.retries,
      backoffMs: config.mail.backoffMs,
      logger: log,
    })
  : new LogDelivery(log.child('dev-delivery'))

const otp = new OtpService(
  { redis, lifecycle, hasher, delivery },
  {
    env: config.env,
    bypassCode: config.otp.bypassCode,
    ttlSeconds: config.otp.ttlSeconds,
    digits: config.otp.digits,
    rateLimit: config.otp.rateLimit,
    logger: log,
  }
)
const accounts = new AccountService({ accounts: repository, otp, hasher }, { logger: log })
const tokens = new AccessTokenService(config.jwt)

const app = express()
app.disable('x-powered-by')
app.use(createHealthRouter({ redis, db, logger: log }))
app.use(createAuthRouter({ otp, accounts, tokens, logger: log }))

const start = async (): Promise<void> => {
  await repository.ensureSchema()
  await redis.ping()

  const server = app.listen(config.http.port, () => {
    log.info(`passcode-auth example server running on http://localhost:${config.http.port}`)
  })

  const shutdown = (signal: string): void => {
    log.info(`Received ${signal}, shutting down`)
    server.close()
    Promise.all([redis.quit(), pool.end()])
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error('Shutdown failed', err)
        process.exit(1)
      })
  }
  process.once('SIGINT', shutdown)
  process.once('SIGTERM', shutdown)
}

start().catch((err: unknown) => {
  log.error('Startup failed', err)
  process.exit(1)
})
