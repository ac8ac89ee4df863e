import type {AuthorizationReply, AuthorizationRequest} from '@authz-gateway/schemas';

import {loadAuthorizationSchema} from '../codec';
import type {FilterHost, HeaderPair, HostDispatchResult, LocalResponse, RpcDispatchInput} from '../contracts';

export const encodeReply = (reply: Partial<AuthorizationReply>): Uint8Array => {
  const schema = loadAuthorizationSchema();
  return schema.reply.encode(schema.reply.create(reply)).finish();
};

export const decodeRequestPayload = (payload: Uint8Array): Record<string, unknown> => {
  const schema = loadAuthorizationSchema();
  return schema.request.toObject(schema.request.decode(payload), {defaults: true, objects: true});
};

export const encodeRequest = (request: AuthorizationRequest): Uint8Array => {
  const schema = loadAuthorizationSchema();
  return schema.request.encode(schema.request.fromObject(request)).finish();
};

export const defaultRequestHeaders: HeaderPair[] = [
  [':method', 'GET'],
  [':scheme', 'https'],
  [':authority', 'api.test'],
  [':path', '/orders?limit=5'],
  ['authorization', 'Bearer test-token'],
  ['x-request-id', 'req-1'],
  ['cookie', 'session=test-session'],
  ['accept', 'application/json']
];

export const createFakeHost = ({
  headers = defaultRequestHeaders,
  dispatch = () => ({ok: true, token: 7})
}: {
  headers?: HeaderPair[];
  dispatch?: (input: RpcDispatchInput) => HostDispatchResult;
} = {}) => {
  const requestHeaders = new Map<string, string>();
  const responseHeaders = new Map<string, string>();
  const dispatched: RpcDispatchInput[] = [];
  const localResponses: LocalResponse[] = [];
  const counters = {resumed: 0};
  let replyBody: Uint8Array | undefined;
  let replyBodyError: Error | undefined;

  const host: FilterHost = {
    getRequestHeaders: () => headers,
    setRequestHeader: (name, value) => {
      requestHeaders.set(name, value);
    },
    setResponseHeader: (name, value) => {
      responseHeaders.set(name, value);
    },
    resumeRequest: () => {
      counters.resumed += 1;
    },
    sendLocalResponse: response => {
      localResponses.push(response);
    },
    dispatchRpc: input => {
      dispatched.push(input);
      return dispatch(input);
    },
    getRpcResponseBody: (start, length) => {
      if (replyBodyError) {
        throw replyBodyError;
      }

      return replyBody?.subarray(start, start + length);
    }
  };

  return {
    host,
    requestHeaders,
    responseHeaders,
    dispatched,
    localResponses,
    counters,
    setReplyBody: (body: Uint8Array | undefined) => {
      replyBody = body;
    },
    failReplyBody: (error: Error) => {
      replyBodyError = error;
    }
  };
};
