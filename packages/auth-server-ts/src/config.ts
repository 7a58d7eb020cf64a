import { AuthServerConfigSchema, type AuthServerConfig } from '@passcode-auth/shared-types'

export type Env = Record<string, string | undefined>

export class ConfigError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`)
    this.name = 'ConfigError'
    this.issues = issues
  }
}

const str = (value: string | undefined): string | undefined => (value === undefined || value === '' ? undefined : value)

// Values that fail to convert are passed on and rejected by the schema under
// their own path.
const num = (value: string | undefined): number | undefined => {
  const raw = str(value)
  return raw === undefined ? undefined : Number(raw)
}

const bool = (value: string | undefined): boolean | string | undefined => {
  const raw = str(value)
  if (raw === undefined) return undefined
  const lowered = raw.toLowerCase()
  if (lowered === 'true' || lowered === '1') return true
  if (lowered === 'false' || lowered === '0') return false
  return raw
}

/**
 * Maps environment variables onto the config schema's shape, unvalidated.
 * Mail is configured only when SMTP_HOST is set.
 */
export const configFromEnv = (env: Env) => {
  const smtpHost = str(env.SMTP_HOST)

  return {
    env: str(env.APP_ENV),
    logLevel: str(env.LOG_LEVEL),
    http: { port: num(env.PORT) },
    redis: { url: str(env.REDIS_URL), keyPrefix: str(env.REDIS_KEY_PREFIX) },
    database: { url: str(env.DATABASE_URL) },
    otp: {
      ttlSeconds: num(env.OTP_TTL_SECONDS),
      digits: num(env.OTP_DIGITS),
      maxAttempts: num(env.OTP_MAX_ATTEMPTS),
      rateLimit: {
        windowSeconds: num(env.OTP_RATE_LIMIT_WINDOW_SECONDS),
        maxRequests: num(env.OTP_RATE_LIMIT_MAX_REQUESTS),
      },
      bypassCode: str(env.AUTH_BYPASS_CODE),
    },
    hashing: { rounds: num(env.BCRYPT_ROUNDS) },
    mail: smtpHost
      ? {
          host: smtpHost,
          port: num(env.SMTP_PORT),
          secure: bool(env.SMTP_SECURE),
          user: str(env.SMTP_USER),
          password: str(env.SMTP_PASSWORD),
          from: str(env.EMAIL_FROM),
          retries: num(env.MAIL_RETRIES),
          backoffMs: num(env.MAIL_BACKOFF_MS),
        }
      : undefined,
    jwt: {
      secret: str(env.JWT_SECRET),
      expiresInSeconds: num(env.JWT_EXPIRES_IN_SECONDS),
      issuer: str(env.JWT_ISSUER),
    },
  }
}

export const loadConfig = (env: Env = process.env): AuthServerConfig => {
  const parsed = AuthServerConfigSchema.safeParse(configFromEnv(env))
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.map(String).join('.') || '(root)'}: ${issue.message}`)
    )
  }
  return parsed.data
}
