import {
  AUTHORIZATION_METHOD,
  AUTHORIZATION_SERVICE,
  type FilterHost
} from './contracts';
import {describeError, err, ok, type AuthzFilterResult} from './errors';

export type PendingCall = {
  token: number;
  dispatched_at_ms: number;
};

export const dispatchAuthorizationCall = ({
  host,
  target,
  payload,
  timeout_ms,
  now = Date.now
}: {
  host: Pick<FilterHost, 'dispatchRpc'>;
  target: string;
  payload: Uint8Array;
  timeout_ms: number;
  now?: () => number;
}): AuthzFilterResult<PendingCall> => {
  try {
    const dispatched = host.dispatchRpc({
      target,
      service: AUTHORIZATION_SERVICE,
      method: AUTHORIZATION_METHOD,
      payload,
      timeout_ms
    });
    if (!dispatched.ok) {
      return err('dispatch_failed', dispatched.reason);
    }

    return ok({token: dispatched.token, dispatched_at_ms: now()});
  } catch (error) {
    return err('dispatch_failed', describeError(error));
  }
};
