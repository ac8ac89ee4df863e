import {z} from 'zod';

export const AUTHORIZATION_SERVICE = 'authengine.UIPBDIAuthZProcessor';
export const AUTHORIZATION_METHOD = 'processReq';
export const DEFAULT_AUTHORIZATION_TIMEOUT_MS = 5_000;

export const USER_HEADER_NAME = 'x-uip-user';
export const MESSAGE_HEADER_NAME = 'grpc-message';
export const WWW_AUTHENTICATE_HEADER_NAME = 'www-authenticate';

export const ACCESS_DENIED_BODY = 'Access denied';
export const AUTHORIZATION_FAILED_BODY = 'Authorization service error';

export const AuthorizationFilterConfigSchema = z
  .object({
    target: z.string().trim().min(1),
    timeout_ms: z.number().int().min(100).max(60_000).default(DEFAULT_AUTHORIZATION_TIMEOUT_MS),
    forward_reply_headers: z.boolean().default(false)
  })
  .strict();

export type AuthorizationFilterConfig = Readonly<z.infer<typeof AuthorizationFilterConfigSchema>>;

export type HeaderPair = readonly [name: string, value: string];

export type FilterAction = 'continue' | 'pause';

export type LocalResponse = {
  status_code: number;
  headers: HeaderPair[];
  body: string;
};

export type RpcDispatchInput = {
  target: string;
  service: string;
  method: string;
  payload: Uint8Array;
  timeout_ms: number;
};

export type HostDispatchResult = {ok: true; token: number} | {ok: false; reason: string};

/**
 * What the request-processing host exposes to one filter instance.
 *
 * Request headers include the pseudo-headers (`:method`, `:scheme`,
 * `:authority`, `:path`) as entries whose name starts with a colon.
 * `dispatchRpc` must not block; the host later calls
 * `AuthorizationFilter#onAuthorizationReply` with the returned token.
 */
export type FilterHost = {
  getRequestHeaders: () => readonly HeaderPair[];
  setRequestHeader: (name: string, value: string) => void;
  setResponseHeader: (name: string, value: string) => void;
  resumeRequest: () => void;
  sendLocalResponse: (response: LocalResponse) => void;
  dispatchRpc: (input: RpcDispatchInput) => HostDispatchResult;
  getRpcResponseBody: (start: number, length: number) => Uint8Array | undefined;
};

export type AuthorizationCompletion = {
  token: number;
  /** gRPC status code; 0 is OK. */
  status_code: number;
  response_size: number;
};
