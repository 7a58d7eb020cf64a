import type { RedisLike } from '../redis/types'
import { logger as defaultLogger, type Logger } from '../logger'
import {
  OtpAttemptsExceededError,
  OtpAttemptTrackingFailedError,
  OtpCreationFailedError,
  OtpRemovalFailedError,
  OtpVerificationFailedError,
} from './errors'

export const DEFAULT_OTP_KEY_PREFIX = 'otp:email:'

const FIELDS = {
  hashedCode: 'hashed_code',
  attempts: 'attempts',
} as const

export interface OtpStoreOptions {
  ttlSeconds: number
  keyPrefix?: string
  logger?: Logger
}

/**
 * Redis access for passcode records. One hash per identity holding the
 * hashed code and the attempt counter; expiry is left to Redis.
 */
export class OtpStore {
  private readonly keyPrefix: string
  private readonly log: Logger

  constructor(
    private readonly redis: RedisLike,
    private readonly options: OtpStoreOptions
  ) {
    this.keyPrefix = options.keyPrefix ?? DEFAULT_OTP_KEY_PREFIX
    this.log = (options.logger ?? defaultLogger).child('otp-store')
  }

  get ttlSeconds(): number {
    return this.options.ttlSeconds
  }

  keyFor(identity: string): string {
    return `${this.keyPrefix}${identity}`
  }

  /**
   * Creates the record with a zeroed counter and its TTL in one round trip.
   * Resolves false when a live record already holds the key.
   */
  async setRecord(identity: string, hashedCode: string): Promise<boolean> {
    const key = this.keyFor(identity)
    this.log.debug('Setting passcode record', { key })

    let written: number
    try {
      written = await this.redis.createHashIfAbsent(
        key,
        { [FIELDS.hashedCode]: hashedCode, [FIELDS.attempts]: 0 },
        this.options.ttlSeconds
      )
    } catch (err) {
      this.log.error('Failed to create passcode record', err)
      throw new OtpCreationFailedError({ cause: err })
    }

    if (written === 0) return false
    if (written !== 1) {
      this.log.error('Unexpected reply while creating passcode record', { key, written })
      throw new OtpCreationFailedError()
    }
    return true
  }

  async getCode(identity: string): Promise<string> {
    const key = this.keyFor(identity)
    const hashedCode = await this.redis.hget(key, FIELDS.hashedCode)
    if (!hashedCode) {
      this.log.debug('No live passcode record', { key })
      throw new OtpVerificationFailedError()
    }
    return hashedCode
  }

  async deleteRecord(identity: string): Promise<boolean> {
    const key = this.keyFor(identity)
    const deleted = await this.redis.unlink(key)
    if (deleted === 0) {
      this.log.debug('Passcode record already gone', { key })
      throw new OtpRemovalFailedError()
    }
    return true
  }

  async exists(identity: string): Promise<boolean> {
    return (await this.redis.exists(this.keyFor(identity))) > 0
  }

  /**
   * Spends one attempt, atomically refusing to go past `maxAttempts`. The
   * returned count is the caller's claim on that attempt.
   */
  async incrementAttempts(identity: string, maxAttempts: number): Promise<number> {
    const key = this.keyFor(identity)

    let attempts: number | null
    try {
      attempts = await this.redis.hincrbyUpTo(key, FIELDS.attempts, 1, maxAttempts)
    } catch (err) {
      this.log.error('Failed to increment passcode attempts', err)
      throw new OtpAttemptTrackingFailedError({ cause: err })
    }

    // Expired between the code lookup and the increment.
    if (attempts === null) throw new OtpVerificationFailedError()
    if (attempts < 0) throw new OtpAttemptsExceededError(maxAttempts)
    return attempts
  }

  /**
   * -1 when there is no record, so "no record" never reads as "zero attempts".
   */
  async getAttempts(identity: string): Promise<number> {
    const raw = await this.redis.hget(this.keyFor(identity), FIELDS.attempts)
    if (raw === null) return -1

    const attempts = Number.parseInt(raw, 10)
    if (Number.isNaN(attempts)) {
      this.log.error('Corrupted passcode attempt counter', { key: this.keyFor(identity) })
      throw new OtpAttemptTrackingFailedError()
    }
    return attempts
  }
}
