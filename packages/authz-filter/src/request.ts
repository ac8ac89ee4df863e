import type {AuthorizationRequest, HeaderMapping} from '@authz-gateway/schemas';

import type {AuthorizationCodec} from './codec';
import type {AuthzFilterResult} from './errors';

/** `:authority` travels only inside the header mapping, never as a top-level field. */
export const buildAuthorizationRequest = ({
  mapping,
  method,
  path,
  scheme
}: {
  mapping: HeaderMapping;
  method?: string;
  path?: string;
  scheme?: string;
}): AuthorizationRequest => ({
  method: method ?? '',
  path: path ?? '',
  scheme: scheme ?? '',
  headers: mapping
});

export const serializeAuthorizationRequest = ({
  request,
  codec
}: {
  request: AuthorizationRequest;
  codec: AuthorizationCodec;
}): AuthzFilterResult<Uint8Array> => codec.encodeRequest(request);
