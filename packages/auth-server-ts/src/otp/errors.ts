export type OtpFailureKind =
  | 'ALREADY_ACTIVE'
  | 'VERIFICATION_FAILED'
  | 'ATTEMPTS_EXCEEDED'
  | 'CREATION_FAILED'
  | 'REMOVAL_FAILED'
  | 'ATTEMPT_TRACKING_FAILED'

/**
 * Base class for every failure raised by the passcode store and lifecycle.
 * A mismatched code is not one of them: `verify` resolves `false` for that.
 */
export abstract class OtpStoreError extends Error {
  abstract readonly kind: OtpFailureKind
}

export class OtpAlreadyActiveError extends OtpStoreError {
  readonly kind = 'ALREADY_ACTIVE'

  constructor() {
    super('An active passcode already exists for this identity')
    this.name = 'OtpAlreadyActiveError'
  }
}

/**
 * No live record. Raised identically for "never issued" and "expired".
 */
export class OtpVerificationFailedError extends OtpStoreError {
  readonly kind = 'VERIFICATION_FAILED'

  constructor() {
    super('Passcode verification failed: expired or not issued')
    this.name = 'OtpVerificationFailedError'
  }
}

export class OtpAttemptsExceededError extends OtpStoreError {
  readonly kind = 'ATTEMPTS_EXCEEDED'
  readonly maxAttempts: number

  constructor(maxAttempts: number) {
    super(`Passcode verification attempts exhausted (max ${maxAttempts})`)
    this.name = 'OtpAttemptsExceededError'
    this.maxAttempts = maxAttempts
  }
}

export class OtpCreationFailedError extends OtpStoreError {
  readonly kind = 'CREATION_FAILED'

  constructor(options: { cause?: unknown } = {}) {
    super('Passcode record was not written', { cause: options.cause })
    this.name = 'OtpCreationFailedError'
  }
}

export class OtpRemovalFailedError extends OtpStoreError {
  readonly kind = 'REMOVAL_FAILED'

  constructor() {
    super('Passcode record was not removed')
    this.name = 'OtpRemovalFailedError'
  }
}

export class OtpAttemptTrackingFailedError extends OtpStoreError {
  readonly kind = 'ATTEMPT_TRACKING_FAILED'

  constructor(options: { cause?: unknown } = {}) {
    super('Passcode attempt counter could not be updated', { cause: options.cause })
    this.name = 'OtpAttemptTrackingFailedError'
  }
}
