export const authzFilterErrorCodes = [
  'request_encode_failed',
  'dispatch_failed',
  'reply_missing',
  'reply_status_failed',
  'reply_decode_failed',
  'reply_invalid',
  'reply_user_invalid'
] as const;

export type AuthzFilterErrorCode = (typeof authzFilterErrorCodes)[number];

export type AuthzFilterError = {
  code: AuthzFilterErrorCode;
  message: string;
};

export type AuthzFilterSuccess<T> = {ok: true; value: T};
export type AuthzFilterFailure = {ok: false; error: AuthzFilterError};
export type AuthzFilterResult<T> = AuthzFilterSuccess<T> | AuthzFilterFailure;

export const ok = <T>(value: T): AuthzFilterSuccess<T> => ({ok: true, value});

export const err = (code: AuthzFilterErrorCode, message: string): AuthzFilterFailure => ({
  ok: false,
  error: {code, message}
});

export const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error));
