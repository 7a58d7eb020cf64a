import type { AccountView } from '@passcode-auth/shared-types'
import type { OtpError } from '../otp/types'

export interface Account {
  id: string
  email: string
  hashedPassword: string
  isActive: boolean
  isVerified: boolean
  createdAt: Date
}

export interface NewAccount {
  email: string
  hashedPassword: string
}

export interface AccountRepository {
  findByEmail(email: string): Promise<Account | null>
  /** Creates an active, unverified account. Rejects with DuplicateEmailError when the email is taken. */
  create(input: NewAccount): Promise<Account>
  /** Flips is_verified in one conditional update. Resolves false when no unverified row matched. */
  markVerified(email: string): Promise<boolean>
}

export class DuplicateEmailError extends Error {
  constructor(email: string, options: { cause?: unknown } = {}) {
    super(`An account already exists for ${email}`, { cause: options.cause })
    this.name = 'DuplicateEmailError'
  }
}

export type AccountError =
  | OtpError
  | { code: 'DUPLICATE_ACCOUNT'; message: string }
  | { code: 'ALREADY_VERIFIED'; message: string }
  | { code: 'INVALID_CREDENTIALS'; message: string }

export type AccountErrorCode = AccountError['code']

export type AccountResult<T> =
  | { success: true; data: T }
  | { success: false; error: AccountError }

export interface Registered {
  message: string
  user: AccountView
  expiresInSeconds: number
}

export interface RegistrationConfirmed {
  message: string
  user: AccountView
}

export interface LoginStarted {
  message: string
  expiresInSeconds: number
}

export const toAccountView = (account: Account): AccountView => ({
  id: account.id,
  email: account.email,
  isActive: account.isActive,
  isVerified: account.isVerified,
})
