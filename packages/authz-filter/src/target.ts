import {
  AuthorizationFilterConfigSchema,
  type AuthorizationFilterConfig
} from './contracts';

export const AUTHORIZATION_PORT = 50051;
export const DEFAULT_INSTANCE_ID = 'localhost';
const TARGET_HOST_SUFFIX = '.localhost.for.grpc.call';

export const buildTargetEndpoint = (instanceId?: string) => {
  const trimmed = instanceId?.trim();
  const resolvedId = trimmed && trimmed.length > 0 ? trimmed : DEFAULT_INSTANCE_ID;
  return `outbound|${AUTHORIZATION_PORT}||${resolvedId}${TARGET_HOST_SUFFIX}`;
};

export type OutboundCluster = {
  port: number;
  subset: string;
  host: string;
};

/** Parses an `outbound|<port>|<subset>|<host>` cluster name. */
export const parseOutboundCluster = (target: string): OutboundCluster | null => {
  const parts = target.split('|');
  if (parts.length !== 4 || parts[0] !== 'outbound') {
    return null;
  }

  const [, portText = '', subset = '', host = ''] = parts;
  if (!/^\d+$/u.test(portText) || host.length === 0) {
    return null;
  }

  const port = Number.parseInt(portText, 10);
  if (port < 1 || port > 65_535) {
    return null;
  }

  return {port, subset, host};
};

/**
 * Resolves the per-process filter configuration. The result is frozen and
 * shared by every request's filter instance.
 */
export const resolveFilterConfig = ({
  instance_id,
  timeout_ms,
  forward_reply_headers
}: {
  instance_id?: string;
  timeout_ms?: number;
  forward_reply_headers?: boolean;
}): AuthorizationFilterConfig =>
  Object.freeze(
    AuthorizationFilterConfigSchema.parse({
      target: buildTargetEndpoint(instance_id),
      ...(timeout_ms !== undefined ? {timeout_ms} : {}),
      ...(forward_reply_headers !== undefined ? {forward_reply_headers} : {})
    })
  );
