export {
  ErrorResponseSchema,
  HealthResponseSchema,
  type ErrorResponse,
  type HealthResponse
} from './http-contracts'
export {LogEventSchema, type LogEvent} from './log-contracts'
export {
  AuthorizationReplySchema,
  AuthorizationRequestSchema,
  HeaderMappingSchema,
  type AuthorizationReply,
  type AuthorizationRequest,
  type HeaderMapping
} from './wire-contracts'

export const packageName = 'schemas'
