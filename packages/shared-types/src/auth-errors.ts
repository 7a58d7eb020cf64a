import { z } from 'zod'

import { CommonErrorSchemas, makeError } from './common-errors'

/**
 * Central registry of passcode and account error schemas.
 * Each error is defined once here and referenced by endpoint error unions.
 */
export const AuthErrorSchemas = {
    VALIDATION_ERROR: CommonErrorSchemas.VALIDATION_ERROR,
    RATE_LIMITED: CommonErrorSchemas.RATE_LIMITED,
    INTERNAL_ERROR: CommonErrorSchemas.INTERNAL_ERROR,

    // Passcode errors
    OTP_ALREADY_ACTIVE: makeError('OTP_ALREADY_ACTIVE', {
        message: z.string(),
    }),

    OTP_EXPIRED: makeError('OTP_EXPIRED', {
        message: z.string(),
    }),

    INVALID_CODE: makeError('INVALID_CODE', {
        message: z.string(),
        attemptsRemaining: z.number().optional(),
    }),

    MAX_ATTEMPTS: makeError('MAX_ATTEMPTS', {
        message: z.string(),
    }),

    // Account errors
    DUPLICATE_ACCOUNT: makeError('DUPLICATE_ACCOUNT', {
        message: z.string(),
    }),

    ALREADY_VERIFIED: makeError('ALREADY_VERIFIED', {
        message: z.string(),
    }),

    INVALID_CREDENTIALS: makeError('INVALID_CREDENTIALS', {
        message: z.string(),
    }),
} as const

/**
 * Union of all auth error value types.
 */
export type AnyAuthError = z.infer<
    (typeof AuthErrorSchemas)[keyof typeof AuthErrorSchemas]
>

/**
 * Union of all auth error codes, for exhaustive switches.
 */
export type AuthErrorCode = AnyAuthError['error']

/**
 * User-facing messages. Stable: clients and tests match on them.
 */
export const AuthErrorMessages = {
    INVALID_EMAIL: 'Invalid email format',
    CODE_ONLY_DIGITS: 'Code must contain only digits',
    CODE_FIXED_LENGTH: (digits: number) => `Code must be ${digits} digits long`,
    PASSWORD_REQUIRED: 'Password is required',
    RATE_LIMITED: 'Too many code requests. Please wait before trying again.',
    OTP_ALREADY_ACTIVE: 'A code is already pending for this email. Use it or wait for it to expire.',
    OTP_EXPIRED: 'Code expired or was not requested.',
    INVALID_CODE: 'Incorrect code.',
    MAX_ATTEMPTS: 'Too many verification attempts. Please wait for the code to expire.',
    DUPLICATE_ACCOUNT: 'An account with this email already exists.',
    ALREADY_VERIFIED: 'This account is already verified.',
    INVALID_CREDENTIALS: 'Invalid email or password.',
    INTERNAL_ERROR: 'Something went wrong. Please try again later.',
} as const
