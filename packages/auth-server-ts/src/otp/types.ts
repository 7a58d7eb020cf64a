import type { AppEnv } from '@passcode-auth/shared-types'
import type { Logger } from '../logger'

export type OtpResult<T> =
  | { success: true; data: T }
  | { success: false; error: OtpError }

export type OtpError =
  | { code: 'VALIDATION_ERROR'; message: string; details: unknown }
  | { code: 'RATE_LIMITED'; message: string; retryAfterSeconds: number }
  | { code: 'OTP_ALREADY_ACTIVE'; message: string }
  | { code: 'OTP_EXPIRED'; message: string }
  | { code: 'INVALID_CODE'; message: string; attemptsRemaining: number }
  | { code: 'MAX_ATTEMPTS'; message: string }
  | { code: 'INTERNAL_ERROR'; message: string }

export type OtpErrorCode = OtpError['code']

export interface OtpIssued {
  message: string
  expiresInSeconds: number
}

export interface OtpConfirmed {
  message: string
}

export interface RequestCodeOptions {
  /** Revoke a pending code before issuing, instead of failing with OTP_ALREADY_ACTIVE. */
  reissue?: boolean
}

export interface OtpServiceOptions {
  env: AppEnv
  /** Fixed code used outside production instead of a generated one. */
  bypassCode?: string
  ttlSeconds?: number
  digits?: number
  rateLimit?: {
    windowSeconds?: number
    maxRequests?: number
  }
  keyPrefix?: {
    rateLimit?: string
  }
  logger?: Logger
}
