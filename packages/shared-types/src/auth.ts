import { z } from 'zod'

import { AuthErrorMessages, AuthErrorSchemas } from './auth-errors'

// ============================================
// Common Auth Schemas
// ============================================

export const OTP_CODE_LENGTH = 6 as const

/**
 * bcrypt only reads the first 72 bytes of its input.
 */
export const PASSWORD_MAX_LENGTH = 72 as const

/**
 * Email identity. Trimmed and lowercased before the format check so that the
 * same mailbox always maps to the same passcode record.
 */
export const EmailSchema = z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.email(AuthErrorMessages.INVALID_EMAIL))

export const PasswordSchema = z
    .string()
    .min(1, AuthErrorMessages.PASSWORD_REQUIRED)
    .max(PASSWORD_MAX_LENGTH, `Password must be at most ${PASSWORD_MAX_LENGTH} characters`)

/**
 * Fixed-width decimal passcode. The width is configuration, so the schema is
 * built per server instance.
 */
export const makeOtpCodeSchema = (digits: number = OTP_CODE_LENGTH) =>
    z
        .string()
        .regex(/^\d+$/, AuthErrorMessages.CODE_ONLY_DIGITS)
        .length(digits, AuthErrorMessages.CODE_FIXED_LENGTH(digits))

/**
 * Public account view. Never includes the password hash.
 */
export const AccountViewSchema = z.object({
    id: z.string(),
    email: z.email(),
    isActive: z.boolean(),
    isVerified: z.boolean(),
})
export type AccountView = z.infer<typeof AccountViewSchema>

/**
 * Access token returned once a login passcode is confirmed
 */
export const AuthTokensSchema = z.object({
    accessToken: z.string(),
    tokenType: z.literal('Bearer'),
    expiresIn: z.number(),
})
export type AuthTokens = z.infer<typeof AuthTokensSchema>

// ============================================
// Passcode request / verify
// ============================================

export const OtpRequestSchema = z.object({
    email: EmailSchema,
})
export type OtpRequest = z.infer<typeof OtpRequestSchema>

export const OtpRequestResponseSchema = z.object({
    success: z.literal(true),
    message: z.string(),
    expiresInSeconds: z.number(),
})
export type OtpRequestResponse = z.infer<typeof OtpRequestResponseSchema>

export const OtpRequestErrorSchema = z.discriminatedUnion('error', [
    AuthErrorSchemas.VALIDATION_ERROR,
    AuthErrorSchemas.RATE_LIMITED,
    AuthErrorSchemas.OTP_ALREADY_ACTIVE,
    AuthErrorSchemas.INTERNAL_ERROR,
])
export type OtpRequestError = z.infer<typeof OtpRequestErrorSchema>

export const makeOtpVerifySchema = (digits: number = OTP_CODE_LENGTH) =>
    z.object({
        email: EmailSchema,
        code: makeOtpCodeSchema(digits),
    })
export type OtpVerify = z.infer<ReturnType<typeof makeOtpVerifySchema>>

export const OtpVerifyResponseSchema = z.object({
    success: z.literal(true),
    message: z.string(),
})
export type OtpVerifyResponse = z.infer<typeof OtpVerifyResponseSchema>

export const OtpVerifyErrorSchema = z.discriminatedUnion('error', [
    AuthErrorSchemas.VALIDATION_ERROR,
    AuthErrorSchemas.OTP_EXPIRED,
    AuthErrorSchemas.INVALID_CODE,
    AuthErrorSchemas.MAX_ATTEMPTS,
    AuthErrorSchemas.INTERNAL_ERROR,
])
export type OtpVerifyError = z.infer<typeof OtpVerifyErrorSchema>

// ============================================
// Registration
// ============================================

export const RegisterRequestSchema = z.object({
    email: EmailSchema,
    password: PasswordSchema,
})
export type RegisterRequest = z.infer<typeof RegisterRequestSchema>

export const RegisterResponseSchema = z.object({
    success: z.literal(true),
    message: z.string(),
    user: AccountViewSchema,
    expiresInSeconds: z.number(),
})
export type RegisterResponse = z.infer<typeof RegisterResponseSchema>

export const RegisterErrorSchema = z.discriminatedUnion('error', [
    AuthErrorSchemas.VALIDATION_ERROR,
    AuthErrorSchemas.DUPLICATE_ACCOUNT,
    AuthErrorSchemas.RATE_LIMITED,
    AuthErrorSchemas.OTP_ALREADY_ACTIVE,
    AuthErrorSchemas.INTERNAL_ERROR,
])
export type RegisterError = z.infer<typeof RegisterErrorSchema>

export const RegisterVerifyResponseSchema = z.object({
    success: z.literal(true),
    message: z.string(),
    user: AccountViewSchema,
})
export type RegisterVerifyResponse = z.infer<typeof RegisterVerifyResponseSchema>

export const RegisterVerifyErrorSchema = z.discriminatedUnion('error', [
    AuthErrorSchemas.VALIDATION_ERROR,
    AuthErrorSchemas.ALREADY_VERIFIED,
    AuthErrorSchemas.OTP_EXPIRED,
    AuthErrorSchemas.INVALID_CODE,
    AuthErrorSchemas.MAX_ATTEMPTS,
    AuthErrorSchemas.INTERNAL_ERROR,
])
export type RegisterVerifyError = z.infer<typeof RegisterVerifyErrorSchema>

// ============================================
// Login
// ============================================

export const LoginRequestSchema = z.object({
    email: EmailSchema,
    password: PasswordSchema,
})
export type LoginRequest = z.infer<typeof LoginRequestSchema>

export const LoginResponseSchema = z.object({
    success: z.literal(true),
    message: z.string(),
    expiresInSeconds: z.number(),
})
export type LoginResponse = z.infer<typeof LoginResponseSchema>

export const LoginErrorSchema = z.discriminatedUnion('error', [
    AuthErrorSchemas.VALIDATION_ERROR,
    AuthErrorSchemas.INVALID_CREDENTIALS,
    AuthErrorSchemas.RATE_LIMITED,
    AuthErrorSchemas.OTP_ALREADY_ACTIVE,
    AuthErrorSchemas.INTERNAL_ERROR,
])
export type LoginError = z.infer<typeof LoginErrorSchema>

/**
 * Login verify response (completes auth)
 */
export const LoginVerifyResponseSchema = z.object({
    user: AccountViewSchema,
    tokens: AuthTokensSchema,
})
export type LoginVerifyResponse = z.infer<typeof LoginVerifyResponseSchema>

export const LoginVerifyErrorSchema = z.discriminatedUnion('error', [
    AuthErrorSchemas.VALIDATION_ERROR,
    AuthErrorSchemas.INVALID_CREDENTIALS,
    AuthErrorSchemas.OTP_EXPIRED,
    AuthErrorSchemas.INVALID_CODE,
    AuthErrorSchemas.MAX_ATTEMPTS,
    AuthErrorSchemas.INTERNAL_ERROR,
])
export type LoginVerifyError = z.infer<typeof LoginVerifyErrorSchema>
