import {fileURLToPath} from 'node:url';

import {AuthorizationReplySchema, type AuthorizationReply, type AuthorizationRequest} from '@authz-gateway/schemas';
import protobuf from 'protobufjs';
import type {Root, Type} from 'protobufjs';

import {describeError, err, ok, type AuthzFilterResult} from './errors';

export const AUTHORIZATION_PROTO_PATH = fileURLToPath(new URL('../proto/authengine.proto', import.meta.url));

const REQUEST_TYPE_NAME = 'authengine.FilterRequest';
const REPLY_TYPE_NAME = 'authengine.FilterResponse';

export type AuthorizationSchema = {
  root: Root;
  request: Type;
  reply: Type;
};

export type AuthorizationCodec = {
  encodeRequest: (request: AuthorizationRequest) => AuthzFilterResult<Uint8Array>;
  decodeReply: (bytes: Uint8Array) => AuthzFilterResult<AuthorizationReply>;
};

let cachedSchema: AuthorizationSchema | null = null;

/** Loads `authengine.proto` once per process. */
export const loadAuthorizationSchema = (): AuthorizationSchema => {
  if (cachedSchema) {
    return cachedSchema;
  }

  const root = protobuf.loadSync(AUTHORIZATION_PROTO_PATH);
  cachedSchema = {
    root,
    request: root.lookupType(REQUEST_TYPE_NAME),
    reply: root.lookupType(REPLY_TYPE_NAME)
  };
  return cachedSchema;
};

export const createProtobufAuthorizationCodec = (
  schema: AuthorizationSchema = loadAuthorizationSchema()
): AuthorizationCodec => ({
  encodeRequest: request => {
    try {
      const problem = schema.request.verify(request);
      if (problem) {
        return err('request_encode_failed', problem);
      }

      return ok(schema.request.encode(schema.request.fromObject(request)).finish());
    } catch (error) {
      return err('request_encode_failed', describeError(error));
    }
  },
  decodeReply: bytes => {
    let plain: Record<string, unknown>;
    try {
      plain = schema.reply.toObject(schema.reply.decode(bytes), {defaults: true, objects: true});
    } catch (error) {
      return err('reply_decode_failed', describeError(error));
    }

    const parsed = AuthorizationReplySchema.safeParse(plain);
    if (!parsed.success) {
      return err('reply_invalid', parsed.error.message);
    }

    return ok(parsed.data);
  }
});
