import type {HeaderMapping} from '@authz-gateway/schemas';

import type {AuthorizationCodec} from './codec';
import {err, type AuthzFilterError} from './errors';
import {isWritableHeaderValue} from './headers';

export const GRPC_STATUS_OK = 0;

export type AllowDecision = {
  kind: 'allow';
  user_header_value: string;
  message: string;
  reply_headers: HeaderMapping;
};

export type DenyDecision = {
  kind: 'deny';
  status_code: 401;
  message: string;
};

export type FailDecision = {
  kind: 'fail';
  status_code: 500;
  error: AuthzFilterError;
  /** Best-effort UTF-8 rendering of an undecodable reply. */
  raw_reply?: string;
};

export type AuthorizationDecision = AllowDecision | DenyDecision | FailDecision;

const utf8Lossy = new TextDecoder('utf-8', {fatal: false});

/** An empty header value would read as "absent" upstream, so blank users become a single space. */
export const toUserHeaderValue = (user: string) => (user.trim().length === 0 ? ' ' : user);

const fail = ({error, raw_reply}: {error: AuthzFilterError; raw_reply?: string}): FailDecision => ({
  kind: 'fail',
  status_code: 500,
  error,
  ...(raw_reply !== undefined ? {raw_reply} : {})
});

export const evaluateAuthorizationReply = ({
  status_code,
  response_body,
  codec
}: {
  status_code: number;
  response_body: Uint8Array | undefined;
  codec: AuthorizationCodec;
}): AuthorizationDecision => {
  if (status_code !== GRPC_STATUS_OK) {
    return fail(err('reply_status_failed', `Authorization call completed with status ${status_code}`));
  }

  if (!response_body || response_body.byteLength === 0) {
    return fail(err('reply_missing', 'Authorization call returned no response body'));
  }

  const reply = codec.decodeReply(response_body);
  if (!reply.ok) {
    return fail({error: reply.error, raw_reply: utf8Lossy.decode(response_body)});
  }

  if (!reply.value.allow) {
    return {kind: 'deny', status_code: 401, message: reply.value.message};
  }

  const userHeaderValue = toUserHeaderValue(reply.value.user);
  // The identity is forwarded verbatim or not at all.
  if (!isWritableHeaderValue(userHeaderValue)) {
    return fail(err('reply_user_invalid', 'Authorization reply user cannot be carried in a header value'));
  }

  return {
    kind: 'allow',
    user_header_value: userHeaderValue,
    message: reply.value.message,
    reply_headers: reply.value.headers
  };
};
