import { z } from 'zod'
import {
  AuthErrorMessages,
  OTP_CODE_LENGTH,
  OtpRequestSchema,
  makeOtpVerifySchema,
} from '@passcode-auth/shared-types'
import type { Hasher } from '../hashing/hasher'
import { logger as defaultLogger, type Logger } from '../logger'
import type { RedisLike } from '../redis/types'
import { TotpCodeGenerator, type CodeGenerator } from './codeGenerator'
import type { OtpDelivery } from './delivery'
import { OtpStoreError } from './errors'
import type { OtpLifecycle } from './otpLifecycle'
import type {
  OtpConfirmed,
  OtpError,
  OtpIssued,
  OtpResult,
  OtpServiceOptions,
  RequestCodeOptions,
} from './types'

const DEFAULTS = {
  ttlSeconds: 300,
  digits: OTP_CODE_LENGTH,
  rateLimitWindowSeconds: 60,
  rateLimitMaxRequests: 3,
  prefixes: {
    rateLimit: 'rate:otp:email:',
  },
} as const

export const OtpMessages = {
  SENT: 'Code sent successfully.',
  VERIFIED: 'Code verified successfully.',
} as const

const shouldBypass = (env: OtpServiceOptions['env'], bypassCode?: string): bypassCode is string => {
  return env !== 'production' && Boolean(bypassCode)
}

const checkRateLimit = async (
  redis: RedisLike,
  key: string,
  windowSeconds: number,
  maxRequests: number
): Promise<{ allowed: boolean; retryAfterSeconds?: number }> => {
  const count = await redis.incrWithTtl(key, windowSeconds)

  if (count > maxRequests) {
    const ttl = await redis.ttl(key)
    return { allowed: false, retryAfterSeconds: Math.max(ttl, 1) }
  }

  return { allowed: true }
}

export const validationError = (error: z.ZodError): OtpError => ({
  code: 'VALIDATION_ERROR',
  message: error.issues[0]?.message ?? 'Invalid request',
  details: z.treeifyError(error),
})

export interface OtpServiceDeps {
  redis: RedisLike
  lifecycle: OtpLifecycle
  hasher: Hasher
  delivery: OtpDelivery
  generator?: CodeGenerator
}

/**
 * Public passcode operations: validate, generate, hash, issue, deliver on the
 * way out; validate and verify on the way back. Everything the lifecycle
 * throws comes back as a tagged error.
 */
export class OtpService {
  private readonly ttlSeconds: number
  private readonly digits: number
  private readonly generator: CodeGenerator
  private readonly verifySchema: ReturnType<typeof makeOtpVerifySchema>
  private readonly log: Logger

  constructor(
    private readonly deps: OtpServiceDeps,
    private readonly options: OtpServiceOptions
  ) {
    this.ttlSeconds = options.ttlSeconds ?? DEFAULTS.ttlSeconds
    this.digits = options.digits ?? DEFAULTS.digits
    this.generator =
      deps.generator ?? new TotpCodeGenerator({ digits: this.digits, intervalSeconds: this.ttlSeconds })
    this.verifySchema = makeOtpVerifySchema(this.digits)
    this.log = (options.logger ?? defaultLogger).child('otp-service')

    if (shouldBypass(options.env, options.bypassCode) && options.bypassCode.length !== this.digits) {
      throw new Error(`Bypass code must be ${this.digits} digits long`)
    }
  }

  get expiresInSeconds(): number {
    return this.ttlSeconds
  }

  async requestCode(email: string, requestOptions: RequestCodeOptions = {}): Promise<OtpResult<OtpIssued>> {
    const parsed = OtpRequestSchema.safeParse({ email })
    if (!parsed.success) {
      return { success: false, error: validationError(parsed.error) }
    }
    const identity = parsed.data.email

    try {
      const windowSeconds = this.options.rateLimit?.windowSeconds ?? DEFAULTS.rateLimitWindowSeconds
      const maxRequests = this.options.rateLimit?.maxRequests ?? DEFAULTS.rateLimitMaxRequests
      const rateKey = `${this.options.keyPrefix?.rateLimit ?? DEFAULTS.prefixes.rateLimit}${identity}`

      const rateCheck = await checkRateLimit(this.deps.redis, rateKey, windowSeconds, maxRequests)
      if (!rateCheck.allowed) {
        this.log.warn('Passcode request throttled', { identity })
        return {
          success: false,
          error: {
            code: 'RATE_LIMITED',
            message: AuthErrorMessages.RATE_LIMITED,
            retryAfterSeconds: rateCheck.retryAfterSeconds ?? windowSeconds,
          },
        }
      }

      const code = shouldBypass(this.options.env, this.options.bypassCode)
        ? this.options.bypassCode
        : this.generator.generate(identity)
      const hashedCode = await this.deps.hasher.hash(code)

      if (requestOptions.reissue && (await this.deps.lifecycle.revoke(identity))) {
        this.log.info('Pending passcode revoked for reissue', { identity })
      }
      await this.deps.lifecycle.issue(identity, hashedCode)

      // A failed delivery leaves the record in place; its TTL cleans it up.
      this.deps.delivery.deliver(identity, code)

      this.log.info('Passcode issued', { identity })
      return { success: true, data: { message: OtpMessages.SENT, expiresInSeconds: this.ttlSeconds } }
    } catch (err) {
      return { success: false, error: this.toOtpError(err) }
    }
  }

  /**
   * Normalizes the email and checks the code format without touching Redis.
   */
  validateCode(email: string, candidateCode: string): OtpResult<{ email: string; code: string }> {
    const parsed = this.verifySchema.safeParse({ email, code: candidateCode })
    if (!parsed.success) {
      return { success: false, error: validationError(parsed.error) }
    }
    return { success: true, data: parsed.data }
  }

  async confirmCode(email: string, candidateCode: string): Promise<OtpResult<OtpConfirmed>> {
    const validated = this.validateCode(email, candidateCode)
    if (!validated.success) return validated
    const { email: identity, code } = validated.data

    try {
      const matched = await this.deps.lifecycle.verify(identity, code)
      if (!matched) {
        const attemptsRemaining = await this.deps.lifecycle.attemptsRemaining(identity)
        return {
          success: false,
          error: { code: 'INVALID_CODE', message: AuthErrorMessages.INVALID_CODE, attemptsRemaining },
        }
      }

      this.log.info('Passcode verified', { identity })
      return { success: true, data: { message: OtpMessages.VERIFIED } }
    } catch (err) {
      return { success: false, error: this.toOtpError(err) }
    }
  }

  private toOtpError(err: unknown): OtpError {
    if (err instanceof OtpStoreError) {
      switch (err.kind) {
        case 'ALREADY_ACTIVE':
          return { code: 'OTP_ALREADY_ACTIVE', message: AuthErrorMessages.OTP_ALREADY_ACTIVE }
        case 'VERIFICATION_FAILED':
          return { code: 'OTP_EXPIRED', message: AuthErrorMessages.OTP_EXPIRED }
        case 'ATTEMPTS_EXCEEDED':
          return { code: 'MAX_ATTEMPTS', message: AuthErrorMessages.MAX_ATTEMPTS }
        case 'CREATION_FAILED':
        case 'REMOVAL_FAILED':
        case 'ATTEMPT_TRACKING_FAILED':
          break
      }
    }

    this.log.error('Passcode operation failed', err)
    return { code: 'INTERNAL_ERROR', message: AuthErrorMessages.INTERNAL_ERROR }
  }
}
