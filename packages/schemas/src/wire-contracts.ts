import {z} from 'zod'

export const HeaderMappingSchema = z.record(z.string(), z.string())

export type HeaderMapping = z.infer<typeof HeaderMappingSchema>

export const AuthorizationRequestSchema = z
  .object({
    method: z.string(),
    path: z.string(),
    scheme: z.string(),
    headers: HeaderMappingSchema
  })
  .strict()

export type AuthorizationRequest = z.infer<typeof AuthorizationRequestSchema>

export const AuthorizationReplySchema = z
  .object({
    allow: z.boolean(),
    user: z.string(),
    message: z.string(),
    headers: HeaderMappingSchema.default({})
  })
  .strict()

export type AuthorizationReply = z.infer<typeof AuthorizationReplySchema>
