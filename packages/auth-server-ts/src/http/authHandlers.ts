import { z } from 'zod'
import type { LoginVerifyResponse } from '@passcode-auth/shared-types'
import type { AccountService } from '../account/accountService'
import { toAccountView, type AccountError, type AccountErrorCode } from '../account/types'
import { validationError, type OtpService } from '../otp/otpService'
import type { AccessTokenService } from '../token/accessTokenService'

export interface HttpReply {
  status: number
  body: unknown
  headers?: Record<string, string>
}

export const STATUS_BY_CODE: Record<AccountErrorCode, number> = {
  VALIDATION_ERROR: 400,
  RATE_LIMITED: 429,
  OTP_ALREADY_ACTIVE: 409,
  OTP_EXPIRED: 400,
  INVALID_CODE: 400,
  MAX_ATTEMPTS: 429,
  DUPLICATE_ACCOUNT: 409,
  ALREADY_VERIFIED: 409,
  INVALID_CREDENTIALS: 401,
  INTERNAL_ERROR: 500,
}

export const errorReply = (error: AccountError): HttpReply => {
  const status = STATUS_BY_CODE[error.code]
  const base = { error: error.code, message: error.message }

  switch (error.code) {
    case 'VALIDATION_ERROR':
      return { status, body: { ...base, details: error.details } }
    case 'RATE_LIMITED':
      return {
        status,
        body: { ...base, retryAfterSeconds: error.retryAfterSeconds },
        headers: { 'Retry-After': String(error.retryAfterSeconds) },
      }
    case 'INVALID_CODE':
      return { status, body: { ...base, attemptsRemaining: error.attemptsRemaining } }
    default:
      return { status, body: base }
  }
}

// Shape only; the services own the actual validation.
const EmailBodySchema = z.object({ email: z.string() })
const CodeBodySchema = z.object({ email: z.string(), code: z.string() })
const PasswordBodySchema = z.object({ email: z.string(), password: z.string() })

export interface AuthHandlerDeps {
  otp: OtpService
  accounts: AccountService
  tokens: AccessTokenService
}

export type AuthHandler = (body: unknown) => Promise<HttpReply>

export interface AuthHandlers {
  requestOtp: AuthHandler
  verifyOtp: AuthHandler
  register: AuthHandler
  verifyRegistration: AuthHandler
  login: AuthHandler
  verifyLogin: AuthHandler
}

/**
 * Framework-free request handling: parsed JSON body in, status and payload out.
 */
export const createAuthHandlers = ({ otp, accounts, tokens }: AuthHandlerDeps): AuthHandlers => ({
  requestOtp: async (body) => {
    const parsed = EmailBodySchema.safeParse(body)
    if (!parsed.success) return errorReply(validationError(parsed.error))

    const result = await otp.requestCode(parsed.data.email)
    if (!result.success) return errorReply(result.error)
    return { status: 200, body: { success: true, ...result.data } }
  },

  verifyOtp: async (body) => {
    const parsed = CodeBodySchema.safeParse(body)
    if (!parsed.success) return errorReply(validationError(parsed.error))

    const result = await otp.confirmCode(parsed.data.email, parsed.data.code)
    if (!result.success) return errorReply(result.error)
    return { status: 200, body: { success: true, ...result.data } }
  },

  register: async (body) => {
    const parsed = PasswordBodySchema.safeParse(body)
    if (!parsed.success) return errorReply(validationError(parsed.error))

    const result = await accounts.register(parsed.data)
    if (!result.success) return errorReply(result.error)
    return { status: 201, body: { success: true, ...result.data } }
  },

  verifyRegistration: async (body) => {
    const parsed = CodeBodySchema.safeParse(body)
    if (!parsed.success) return errorReply(validationError(parsed.error))

    const result = await accounts.confirmRegistration(parsed.data.email, parsed.data.code)
    if (!result.success) return errorReply(result.error)
    return { status: 200, body: { success: true, ...result.data } }
  },

  login: async (body) => {
    const parsed = PasswordBodySchema.safeParse(body)
    if (!parsed.success) return errorReply(validationError(parsed.error))

    const result = await accounts.login(parsed.data)
    if (!result.success) return errorReply(result.error)
    return { status: 200, body: { success: true, ...result.data } }
  },

  verifyLogin: async (body) => {
    const parsed = CodeBodySchema.safeParse(body)
    if (!parsed.success) return errorReply(validationError(parsed.error))

    const result = await accounts.confirmLogin(parsed.data.email, parsed.data.code)
    if (!result.success) return errorReply(result.error)

    const response: LoginVerifyResponse = {
      user: toAccountView(result.data),
      tokens: tokens.issue(result.data),
    }
    return { status: 200, body: response }
  },
})
