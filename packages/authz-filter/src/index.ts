export {
  AUTHORIZATION_PROTO_PATH,
  createProtobufAuthorizationCodec,
  loadAuthorizationSchema,
  type AuthorizationCodec,
  type AuthorizationSchema
} from './codec';
export {
  ACCESS_DENIED_BODY,
  AUTHORIZATION_FAILED_BODY,
  AUTHORIZATION_METHOD,
  AUTHORIZATION_SERVICE,
  AuthorizationFilterConfigSchema,
  DEFAULT_AUTHORIZATION_TIMEOUT_MS,
  MESSAGE_HEADER_NAME,
  USER_HEADER_NAME,
  WWW_AUTHENTICATE_HEADER_NAME,
  type AuthorizationCompletion,
  type AuthorizationFilterConfig,
  type FilterAction,
  type FilterHost,
  type HeaderPair,
  type HostDispatchResult,
  type LocalResponse,
  type RpcDispatchInput
} from './contracts';
export {
  evaluateAuthorizationReply,
  GRPC_STATUS_OK,
  toUserHeaderValue,
  type AllowDecision,
  type AuthorizationDecision,
  type DenyDecision,
  type FailDecision
} from './decision';
export {dispatchAuthorizationCall, type PendingCall} from './dispatcher';
export {
  authzFilterErrorCodes,
  describeError,
  err,
  ok,
  type AuthzFilterError,
  type AuthzFilterErrorCode,
  type AuthzFilterFailure,
  type AuthzFilterResult,
  type AuthzFilterSuccess
} from './errors';
export {AuthorizationFilter, type AuthorizationFilterDependencies, type FilterState} from './filter';
export {
  buildHeaderMapping,
  encodeGrpcMessage,
  estimateHeaderMappingBytes,
  FORWARDED_HEADER_ALLOWLIST,
  HOP_BY_HOP_HEADER_NAMES,
  isForwardableReplyHeader,
  isPseudoHeader,
  isValidHeaderName,
  isWritableHeaderValue,
  ORIGINAL_REQUEST_HEADER_PREFIX,
  readPseudoHeader,
  renamePseudoHeader,
  type PseudoHeaderName
} from './headers';
export {
  createLoggingRequestObserver,
  createNoopRequestObserver,
  DEFAULT_RETAINED_BYTES_WARNING_THRESHOLD,
  type RequestCheckpoint,
  type RequestCheckpointSample,
  type RequestObserver
} from './observability';
export {buildAuthorizationRequest, serializeAuthorizationRequest} from './request';
export {
  AUTHORIZATION_PORT,
  buildTargetEndpoint,
  DEFAULT_INSTANCE_ID,
  parseOutboundCluster,
  resolveFilterConfig,
  type OutboundCluster
} from './target';

export const packageName = 'authz-filter';
