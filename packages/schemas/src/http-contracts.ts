import {z} from 'zod'

export const ErrorResponseSchema = z
  .object({
    error: z.string().min(1),
    message: z.string().min(1),
    correlation_id: z.string().min(1).max(128)
  })
  .strict()

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>

export const HealthResponseSchema = z
  .object({
    status: z.literal('ok')
  })
  .strict()

export type HealthResponse = z.infer<typeof HealthResponseSchema>
