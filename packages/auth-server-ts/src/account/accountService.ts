import {
  AuthErrorMessages,
  LoginRequestSchema,
  RegisterRequestSchema,
  type LoginRequest,
  type RegisterRequest,
} from '@passcode-auth/shared-types'
import type { Hasher } from '../hashing/hasher'
import { logger as defaultLogger, type Logger } from '../logger'
import { validationError, type OtpService } from '../otp/otpService'
import {
  DuplicateEmailError,
  toAccountView,
  type Account,
  type AccountError,
  type AccountRepository,
  type AccountResult,
  type LoginStarted,
  type Registered,
  type RegistrationConfirmed,
} from './types'

export const AccountMessages = {
  REGISTERED: 'Registration successful. A code has been sent to your email for verification.',
  VERIFIED: 'Account verified successfully.',
  LOGIN_CODE_SENT: 'Credentials accepted. A code has been sent to your email.',
} as const

const INVALID_CREDENTIALS: AccountError = {
  code: 'INVALID_CREDENTIALS',
  message: AuthErrorMessages.INVALID_CREDENTIALS,
}

export interface AccountServiceDeps {
  accounts: AccountRepository
  otp: OtpService
  hasher: Hasher
}

export interface AccountServiceOptions {
  logger?: Logger
}

/**
 * Binds passcodes to account state: registration issues a code for an
 * unverified account, confirming it verifies the account; login issues a code
 * after a password check, confirming it hands the account to token issuance.
 */
export class AccountService {
  private readonly log: Logger

  constructor(
    private readonly deps: AccountServiceDeps,
    options: AccountServiceOptions = {}
  ) {
    this.log = (options.logger ?? defaultLogger).child('account-service')
  }

  async register(input: RegisterRequest): Promise<AccountResult<Registered>> {
    const parsed = RegisterRequestSchema.safeParse(input)
    if (!parsed.success) return { success: false, error: validationError(parsed.error) }
    const { email, password } = parsed.data

    let account: Account
    try {
      account = (await this.deps.accounts.findByEmail(email)) ?? (await this.createPending(email, password))
    } catch (err) {
      return { success: false, error: this.internalError('Registration lookup failed', err) }
    }

    if (account.isVerified) {
      return {
        success: false,
        error: { code: 'DUPLICATE_ACCOUNT', message: AuthErrorMessages.DUPLICATE_ACCOUNT },
      }
    }

    // A second registration must not leave the first code usable.
    const issued = await this.deps.otp.requestCode(email, { reissue: true })
    if (!issued.success) return issued

    this.log.info('Account registered, verification pending', { accountId: account.id })
    return {
      success: true,
      data: {
        message: AccountMessages.REGISTERED,
        user: toAccountView(account),
        expiresInSeconds: issued.data.expiresInSeconds,
      },
    }
  }

  async confirmRegistration(email: string, code: string): Promise<AccountResult<RegistrationConfirmed>> {
    const validated = this.deps.otp.validateCode(email, code)
    if (!validated.success) return validated
    const identity = validated.data.email

    let account: Account | null
    try {
      account = await this.deps.accounts.findByEmail(identity)
    } catch (err) {
      return { success: false, error: this.internalError('Verification lookup failed', err) }
    }

    // Same answer as a missing code: no hint about which emails registered.
    if (!account) {
      return { success: false, error: { code: 'OTP_EXPIRED', message: AuthErrorMessages.OTP_EXPIRED } }
    }
    if (account.isVerified) {
      return { success: false, error: { code: 'ALREADY_VERIFIED', message: AuthErrorMessages.ALREADY_VERIFIED } }
    }

    const confirmed = await this.deps.otp.confirmCode(identity, validated.data.code)
    if (!confirmed.success) return confirmed

    let flipped: boolean
    try {
      flipped = await this.deps.accounts.markVerified(identity)
    } catch (err) {
      return { success: false, error: this.internalError('Marking account verified failed', err) }
    }

    if (!flipped) {
      return { success: false, error: { code: 'ALREADY_VERIFIED', message: AuthErrorMessages.ALREADY_VERIFIED } }
    }

    this.log.info('Account verified', { accountId: account.id })
    return {
      success: true,
      data: { message: AccountMessages.VERIFIED, user: toAccountView({ ...account, isVerified: true }) },
    }
  }

  /**
   * Unknown email, unverified or inactive account and wrong password all cost
   * one bcrypt comparison and produce the same error.
   */
  async login(input: LoginRequest): Promise<AccountResult<LoginStarted>> {
    const parsed = LoginRequestSchema.safeParse(input)
    if (!parsed.success) return { success: false, error: validationError(parsed.error) }
    const { email, password } = parsed.data

    let passwordMatches: boolean
    let account: Account | null
    try {
      account = await this.deps.accounts.findByEmail(email)
      const hashedPassword = account?.hashedPassword ?? (await this.deps.hasher.placeholderHash())
      passwordMatches = await this.deps.hasher.compare(password, hashedPassword)
    } catch (err) {
      return { success: false, error: this.internalError('Login lookup failed', err) }
    }

    if (!account || !passwordMatches || !this.canSignIn(account)) {
      this.log.info('Login rejected', { email })
      return { success: false, error: INVALID_CREDENTIALS }
    }

    const issued = await this.deps.otp.requestCode(email)
    if (!issued.success) return issued

    return {
      success: true,
      data: { message: AccountMessages.LOGIN_CODE_SENT, expiresInSeconds: issued.data.expiresInSeconds },
    }
  }

  /**
   * Resolves the account to exchange for an access token.
   */
  async confirmLogin(email: string, code: string): Promise<AccountResult<Account>> {
    const validated = this.deps.otp.validateCode(email, code)
    if (!validated.success) return validated
    const identity = validated.data.email

    let account: Account | null
    try {
      account = await this.deps.accounts.findByEmail(identity)
    } catch (err) {
      return { success: false, error: this.internalError('Login verification lookup failed', err) }
    }

    if (!account || !this.canSignIn(account)) {
      return { success: false, error: INVALID_CREDENTIALS }
    }

    const confirmed = await this.deps.otp.confirmCode(identity, validated.data.code)
    if (!confirmed.success) return confirmed

    this.log.info('Login confirmed', { accountId: account.id })
    return { success: true, data: account }
  }

  private canSignIn(account: Account): boolean {
    return account.isActive && account.isVerified
  }

  private async createPending(email: string, password: string): Promise<Account> {
    const hashedPassword = await this.deps.hasher.hash(password)
    try {
      return await this.deps.accounts.create({ email, hashedPassword })
    } catch (err) {
      // Lost a race with a concurrent registration of the same email.
      if (!(err instanceof DuplicateEmailError)) throw err
      const existing = await this.deps.accounts.findByEmail(email)
      if (!existing) throw err
      return existing
    }
  }

  private internalError(message: string, err: unknown): AccountError {
    this.log.error(message, err)
    return { code: 'INTERNAL_ERROR', message: AuthErrorMessages.INTERNAL_ERROR }
  }
}
