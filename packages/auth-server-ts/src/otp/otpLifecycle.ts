import type { Hasher } from '../hashing/hasher'
import { logger as defaultLogger, type Logger } from '../logger'
import {
  OtpAlreadyActiveError,
  OtpAttemptsExceededError,
  OtpRemovalFailedError,
  OtpVerificationFailedError,
} from './errors'
import type { OtpStore } from './otpStore'

export const DEFAULT_MAX_ATTEMPTS = 5

export interface OtpLifecycleOptions {
  maxAttempts?: number
  logger?: Logger
}

/**
 * Owns the per-identity passcode state: absent, pending(attempts), and
 * consumed (absent again, reached through a successful verify).
 *
 * Only ever sees hashed codes on the way in and plaintext candidates on the
 * way to comparison; how codes are produced or delivered is not its concern.
 */
export class OtpLifecycle {
  readonly maxAttempts: number
  private readonly log: Logger

  constructor(
    private readonly store: OtpStore,
    private readonly hasher: Hasher,
    options: OtpLifecycleOptions = {}
  ) {
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS
    this.log = (options.logger ?? defaultLogger).child('otp-lifecycle')
  }

  /**
   * absent -> pending(0). Never replaces a live record: that would hand a
   * second valid code to the identity and reset its attempt budget.
   */
  async issue(identity: string, hashedCode: string): Promise<boolean> {
    if (await this.store.exists(identity)) {
      this.log.debug('Passcode already active', { identity })
      throw new OtpAlreadyActiveError()
    }

    // The existence check above is the common case; a concurrent issue that slipped
    // between check and write loses on the conditional create.
    const created = await this.store.setRecord(identity, hashedCode)
    if (!created) {
      this.log.debug('Passcode created concurrently', { identity })
      throw new OtpAlreadyActiveError()
    }

    this.log.debug('Passcode issued', { identity })
    return true
  }

  /**
   * Resolves true (and consumes the record) on a match, false on a mismatch.
   * Every call that finds a live record spends one attempt, the matching one
   * included. A comparison only runs after its attempt was granted by the
   * capped increment, so concurrent guesses never get past the budget.
   */
  async verify(identity: string, candidateCode: string): Promise<boolean> {
    // Reports exhaustion ahead of expiry when the budget is already gone.
    const attempts = await this.store.getAttempts(identity)
    if (attempts >= this.maxAttempts) {
      this.log.warn('Passcode attempt budget exhausted', { identity, attempts })
      throw new OtpAttemptsExceededError(this.maxAttempts)
    }

    const hashedCode = await this.store.getCode(identity)
    await this.store.incrementAttempts(identity, this.maxAttempts)

    const matches = await this.hasher.compare(candidateCode, hashedCode)
    if (!matches) {
      this.log.debug('Passcode mismatch', { identity })
      return false
    }

    try {
      await this.store.deleteRecord(identity)
    } catch (err) {
      // A concurrent verify consumed it first: the code is spent.
      if (err instanceof OtpRemovalFailedError) throw new OtpVerificationFailedError()
      throw err
    }
    this.log.debug('Passcode consumed', { identity })
    return true
  }

  /**
   * Explicit removal of a pending record. Resolves false when there was none.
   */
  async revoke(identity: string): Promise<boolean> {
    if (!(await this.store.exists(identity))) return false
    try {
      return await this.store.deleteRecord(identity)
    } catch (err) {
      // Expired between the check and the delete.
      if (err instanceof OtpRemovalFailedError) return false
      throw err
    }
  }

  async attemptsRemaining(identity: string): Promise<number> {
    const attempts = await this.store.getAttempts(identity)
    if (attempts < 0) return 0
    return Math.max(this.maxAttempts - attempts, 0)
  }
}
