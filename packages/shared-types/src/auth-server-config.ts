import { z } from 'zod'

import { OTP_CODE_LENGTH } from './auth'

/**
 * Configuration schema for the passcode-auth server.
 *
 * Framework-agnostic: the server reads env vars, validates them into this
 * schema, then wires the services. Defaults live here so that every consumer
 * sees the same values.
 */

export const AppEnvSchema = z.enum(['production', 'development', 'test'])
export type AppEnv = z.infer<typeof AppEnvSchema>

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error'])
export type LogLevel = z.infer<typeof LogLevelSchema>

export const OtpConfigSchema = z
    .object({
        ttlSeconds: z.number().int().positive().default(300),
        digits: z.number().int().min(4).max(10).default(OTP_CODE_LENGTH),
        maxAttempts: z.number().int().positive().default(5),
        rateLimit: z
            .object({
                windowSeconds: z.number().int().positive().default(60),
                maxRequests: z.number().int().positive().default(3),
            })
            .strict()
            .default({ windowSeconds: 60, maxRequests: 3 }),
        bypassCode: z.string().regex(/^\d+$/).optional(),
    })
    .strict()

export type OtpConfig = z.infer<typeof OtpConfigSchema>

export const MailConfigSchema = z
    .object({
        host: z.string().min(1),
        port: z.number().int().positive().default(587),
        secure: z.boolean().default(false),
        user: z.string().min(1).optional(),
        password: z.string().min(1).optional(),
        from: z.string().min(1),
        retries: z.number().int().min(0).default(2),
        backoffMs: z.number().int().min(0).default(1000),
    })
    .strict()

export type MailConfig = z.infer<typeof MailConfigSchema>

export const AuthServerConfigSchema = z
    .object({
        env: AppEnvSchema.default('development'),
        logLevel: LogLevelSchema.default('info'),

        http: z
            .object({
                port: z.number().int().min(0).max(65535).default(3005),
            })
            .strict()
            .default({ port: 3005 }),

        redis: z
            .object({
                url: z.string().min(1).default('redis://localhost:6379'),
                keyPrefix: z.string().min(1).optional(),
            })
            .strict(),

        database: z
            .object({
                url: z.string().min(1),
            })
            .strict(),

        otp: OtpConfigSchema,

        hashing: z
            .object({
                rounds: z.number().int().min(4).max(15).default(10),
            })
            .strict()
            .default({ rounds: 10 }),

        mail: MailConfigSchema.optional(),

        jwt: z
            .object({
                secret: z.string().min(16),
                expiresInSeconds: z.number().int().positive().default(900),
                issuer: z.string().min(1).default('passcode-auth'),
            })
            .strict(),
    })
    .strict()

export type AuthServerConfigInput = z.input<typeof AuthServerConfigSchema>
export type AuthServerConfig = z.infer<typeof AuthServerConfigSchema>
