import { z } from 'zod'

import { CommonErrorSchemas } from './common-errors'

// ============================================
// Health check
// ============================================

export const HealthCheckResponseSchema = z.object({
    database: z.literal(true),
    redis: z.literal(true),
    message: z.string(),
})
export type HealthCheckResponse = z.infer<typeof HealthCheckResponseSchema>

export const HealthCheckErrorSchema = CommonErrorSchemas.SERVICE_UNAVAILABLE
export type HealthCheckError = z.infer<typeof HealthCheckErrorSchema>
