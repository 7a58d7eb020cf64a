import { z } from 'zod'

/**
 * Helper to define an error schema with a literal error code.
 * Used by every error registry in this package.
 *
 * @example
 * const AccountErrors = {
 *   DUPLICATE_ACCOUNT: makeError('DUPLICATE_ACCOUNT', { message: z.string() }),
 * }
 */
export const makeError = <Code extends string, Shape extends z.ZodRawShape>(
    code: Code,
    shape: Shape,
) =>
    z.object({
        error: z.literal(code),
        ...shape,
    })

/**
 * Error schemas that are not specific to passcodes or accounts.
 */
export const CommonErrorSchemas = {
    /**
     * Request body failed schema validation.
     * Returned with HTTP 400.
     */
    VALIDATION_ERROR: makeError('VALIDATION_ERROR', {
        message: z.string(),
        details: z.unknown(),
    }),

    /**
     * Too many requests in the current window.
     * Returned with HTTP 429.
     */
    RATE_LIMITED: makeError('RATE_LIMITED', {
        message: z.string(),
        retryAfterSeconds: z.number(),
    }),

    /**
     * Store or database failure. Never carries detail about the backend.
     * Returned with HTTP 500.
     */
    INTERNAL_ERROR: makeError('INTERNAL_ERROR', {
        message: z.string(),
        requestId: z.string().optional(),
    }),

    /**
     * A backing service (database, Redis) is unreachable.
     * Returned with HTTP 503.
     */
    SERVICE_UNAVAILABLE: makeError('SERVICE_UNAVAILABLE', {
        message: z.string(),
        database: z.boolean(),
        redis: z.boolean(),
    }),
} as const

export type AnyCommonError = z.infer<
    (typeof CommonErrorSchemas)[keyof typeof CommonErrorSchemas]
>

export type CommonErrorCode = AnyCommonError['error']
