export { AccountService, AccountMessages } from './account/accountService'
export type { AccountServiceDeps, AccountServiceOptions } from './account/accountService'
export { PgAccountRepository, USERS_TABLE_DDL } from './account/pgAccountRepository'
export { DuplicateEmailError, toAccountView } from './account/types'
export type {
  Account,
  AccountError,
  AccountErrorCode,
  AccountRepository,
  AccountResult,
  LoginStarted,
  NewAccount,
  Registered,
  RegistrationConfirmed,
} from './account/types'

export { ConfigError, configFromEnv, loadConfig } from './config'
export type { Env } from './config'

export { createPool, poolQueryable } from './db/client'
export type { Queryable } from './db/client'

export { BcryptHasher, DEFAULT_BCRYPT_ROUNDS } from './hashing/hasher'
export type { Hasher } from './hashing/hasher'

export { createAuthHandlers, errorReply, STATUS_BY_CODE } from './http/authHandlers'
export type { AuthHandlers, HttpReply } from './http/authHandlers'
export { createAuthRouter } from './http/authRouter'
export { createHealthCheck, createHealthRouter } from './http/healthCheck'
export type { HealthCheckDeps } from './http/healthCheck'
export type { AuthRouterDeps } from './http/authRouter'

export { createLogger, formatLogEntry, logger, silentLogger } from './logger'
export type { Logger, LogLevel, LogSink } from './logger'

export { OtpMailer, createMailTransport } from './mail/otpMailer'
export type { MailTransport, OtpMailerOptions } from './mail/otpMailer'
export { renderOtpEmail } from './mail/templates'

export { TotpCodeGenerator } from './otp/codeGenerator'
export type { CodeGenerator } from './otp/codeGenerator'
export type { OtpDelivery } from './otp/delivery'
export * from './otp/errors'
export { OtpLifecycle, DEFAULT_MAX_ATTEMPTS } from './otp/otpLifecycle'
export { OtpService, OtpMessages } from './otp/otpService'
export type { OtpServiceDeps } from './otp/otpService'
export { OtpStore, DEFAULT_OTP_KEY_PREFIX } from './otp/otpStore'
export type {
  OtpConfirmed,
  OtpError,
  OtpErrorCode,
  OtpIssued,
  OtpResult,
  OtpServiceOptions,
  RequestCodeOptions,
} from './otp/types'

export { createRedisClient, createRedisClientFromConfig, getDefaultRedisUrl } from './redis/redisClient'
export type { RedisLike } from './redis/types'
export { withKeyPrefix } from './redis/withKeyPrefix'

export { AccessTokenService } from './token/accessTokenService'
export type { AccessTokenClaims, AccessTokenServiceOptions } from './token/accessTokenService'
