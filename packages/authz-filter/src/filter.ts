import {createNoopLogger, forComponent, type ComponentLogger} from '@authz-gateway/logging';

import {createProtobufAuthorizationCodec, type AuthorizationCodec} from './codec';
import {
  ACCESS_DENIED_BODY,
  AUTHORIZATION_FAILED_BODY,
  MESSAGE_HEADER_NAME,
  USER_HEADER_NAME,
  WWW_AUTHENTICATE_HEADER_NAME,
  type AuthorizationCompletion,
  type AuthorizationFilterConfig,
  type FilterAction,
  type FilterHost,
  type HeaderPair
} from './contracts';
import {
  evaluateAuthorizationReply,
  type AllowDecision,
  type DenyDecision,
  type FailDecision
} from './decision';
import {dispatchAuthorizationCall, type PendingCall} from './dispatcher';
import {describeError, type AuthzFilterError} from './errors';
import {
  buildHeaderMapping,
  encodeGrpcMessage,
  estimateHeaderMappingBytes,
  isForwardableReplyHeader,
  isWritableHeaderValue,
  readPseudoHeader
} from './headers';
import {createNoopRequestObserver, type RequestCheckpoint, type RequestObserver} from './observability';
import {buildAuthorizationRequest, serializeAuthorizationRequest} from './request';

export type FilterState = 'idle' | 'awaiting_authorization' | 'resumed' | 'rejected' | 'passed_through';

const ALLOWED_TRANSITIONS: Readonly<Record<FilterState, readonly FilterState[]>> = {
  idle: ['awaiting_authorization', 'passed_through'],
  awaiting_authorization: ['resumed', 'rejected', 'passed_through'],
  resumed: [],
  rejected: [],
  passed_through: []
};

export type AuthorizationFilterDependencies = {
  host: FilterHost;
  config: AuthorizationFilterConfig;
  logger?: ComponentLogger;
  codec?: AuthorizationCodec;
  observer?: RequestObserver;
  now?: () => number;
};

let sharedCodec: AuthorizationCodec | null = null;
const defaultCodec = () => {
  if (!sharedCodec) {
    sharedCodec = createProtobufAuthorizationCodec();
  }

  return sharedCodec;
};

/**
 * Per-request authorization state machine.
 *
 * The host creates one instance per HTTP request and routes its events to
 * `onRequestHeaders`, `onAuthorizationReply` and `onResponseHeaders`. Each
 * instance dispatches at most one authorization call and performs exactly one
 * terminal action: resume (annotated), reject, or pass through when the call
 * could not be issued.
 */
export class AuthorizationFilter {
  private readonly host: FilterHost;
  private readonly config: AuthorizationFilterConfig;
  private readonly logger: ComponentLogger;
  private readonly codec: AuthorizationCodec;
  private readonly observer: RequestObserver;
  private readonly now: () => number;

  private state: FilterState = 'idle';
  private pendingCall: PendingCall | null = null;
  private earlyCompletion: AuthorizationCompletion | null = null;
  private retainedMessage: string | null = null;
  private transientBytes = 0;

  public constructor(dependencies: AuthorizationFilterDependencies) {
    this.host = dependencies.host;
    this.config = dependencies.config;
    this.logger = dependencies.logger ?? forComponent(createNoopLogger(), 'authz.filter');
    this.codec = dependencies.codec ?? defaultCodec();
    this.observer = dependencies.observer ?? createNoopRequestObserver();
    this.now = dependencies.now ?? Date.now;
  }

  public get currentState(): FilterState {
    return this.state;
  }

  public get pendingToken(): number | null {
    return this.pendingCall?.token ?? null;
  }

  public onRequestHeaders(): FilterAction {
    if (this.state !== 'idle') {
      this.logger.warn({
        event: 'authz.request_headers.repeated',
        reason_code: 'unexpected_hook',
        metadata: {state: this.state}
      });
      return 'continue';
    }

    this.checkpoint('request_start');

    const headers: readonly HeaderPair[] = this.host.getRequestHeaders();
    const mapping = buildHeaderMapping(headers);
    this.transientBytes += estimateHeaderMappingBytes(mapping);
    this.checkpoint('headers_built');

    const request = buildAuthorizationRequest({
      mapping,
      method: readPseudoHeader(headers, 'method'),
      path: readPseudoHeader(headers, 'path'),
      scheme: readPseudoHeader(headers, 'scheme')
    });
    const payload = serializeAuthorizationRequest({request, codec: this.codec});
    if (!payload.ok) {
      return this.passThrough(payload.error);
    }

    this.transientBytes += payload.value.byteLength;
    this.checkpoint('request_serialized');

    // Entered before dispatching: a host may complete the call before dispatchRpc returns.
    this.transition('awaiting_authorization');
    const call = dispatchAuthorizationCall({
      host: this.host,
      target: this.config.target,
      payload: payload.value,
      timeout_ms: this.config.timeout_ms,
      now: this.now
    });
    if (!call.ok) {
      this.earlyCompletion = null;
      return this.passThrough(call.error);
    }

    this.pendingCall = call.value;
    this.logger.debug({
      event: 'authz.call.dispatched',
      metadata: {call_id: call.value.token, target: this.config.target, payload_bytes: payload.value.byteLength}
    });

    const earlyCompletion = this.earlyCompletion;
    if (earlyCompletion) {
      this.earlyCompletion = null;
      this.onAuthorizationReply(earlyCompletion);
    }

    // After a synchronous completion the host already holds the terminal action.
    return 'pause';
  }

  public onAuthorizationReply(completion: AuthorizationCompletion): void {
    const pendingCall = this.pendingCall;
    if (this.state === 'awaiting_authorization' && !pendingCall && !this.earlyCompletion) {
      this.earlyCompletion = completion;
      return;
    }

    if (this.state !== 'awaiting_authorization' || !pendingCall || pendingCall.token !== completion.token) {
      this.logger.warn({
        event: 'authz.reply.ignored',
        reason_code: 'unexpected_completion',
        metadata: {state: this.state, call_id: completion.token, pending_call_id: pendingCall?.token ?? null}
      });
      return;
    }

    this.pendingCall = null;
    const durationMs = Math.max(0, Math.round(this.now() - pendingCall.dispatched_at_ms));
    const decision = evaluateAuthorizationReply({
      status_code: completion.status_code,
      response_body: this.readReplyBody(completion.response_size),
      codec: this.codec
    });

    switch (decision.kind) {
      case 'allow':
        this.allow(decision, durationMs);
        return;
      case 'deny':
        this.deny(decision, durationMs);
        return;
      case 'fail':
        this.fail(decision, durationMs);
        return;
    }
  }

  public onResponseHeaders(): FilterAction {
    if (this.state === 'resumed' && this.retainedMessage) {
      this.host.setResponseHeader(MESSAGE_HEADER_NAME, this.retainedMessage);
    }

    return 'continue';
  }

  private readReplyBody(responseSize: number): Uint8Array | undefined {
    if (responseSize <= 0) {
      return undefined;
    }

    try {
      return this.host.getRpcResponseBody(0, responseSize);
    } catch (error) {
      this.logger.warn({
        event: 'authz.reply.body_unavailable',
        reason_code: 'reply_missing',
        message: describeError(error)
      });
      return undefined;
    }
  }

  private allow(decision: AllowDecision, durationMs: number) {
    this.transition('resumed');
    const forwarded: string[] = [];
    if (this.config.forward_reply_headers) {
      const skipped: string[] = [];
      for (const [name, value] of Object.entries(decision.reply_headers)) {
        const normalizedName = name.trim().toLowerCase();
        if (normalizedName === USER_HEADER_NAME) {
          continue;
        }

        if (!isForwardableReplyHeader(normalizedName, value)) {
          skipped.push(name);
          continue;
        }

        this.host.setRequestHeader(normalizedName, value);
        forwarded.push(normalizedName);
      }

      if (skipped.length > 0) {
        this.logger.warn({
          event: 'authz.reply_headers.skipped',
          reason_code: 'reply_header_rejected',
          message: 'Reply headers with invalid or reserved names or values were not forwarded',
          metadata: {skipped_headers: skipped}
        });
      }
    }
    // Replaces any client-supplied value.
    this.host.setRequestHeader(USER_HEADER_NAME, decision.user_header_value);
    this.retainedMessage = decision.message.length > 0 ? encodeGrpcMessage(decision.message) : null;
    this.logger.info({
      event: 'authz.request.allowed',
      duration_ms: durationMs,
      metadata: {forwarded_reply_headers: forwarded}
    });
    this.checkpoint('request_end');
    this.host.resumeRequest();
  }

  private deny(decision: DenyDecision, durationMs: number) {
    this.transition('rejected');
    const challengeWritable = isWritableHeaderValue(decision.message);
    if (!challengeWritable) {
      this.logger.warn({
        event: 'authz.challenge.dropped',
        reason_code: 'reply_header_rejected',
        message: 'Denial message cannot be written as a WWW-Authenticate value'
      });
    }
    this.host.sendLocalResponse({
      status_code: decision.status_code,
      headers:
        decision.message.length > 0 && challengeWritable ? [[WWW_AUTHENTICATE_HEADER_NAME, decision.message]] : [],
      body: ACCESS_DENIED_BODY
    });
    this.logger.info({
      event: 'authz.request.denied',
      reason_code: 'policy_denied',
      status_code: decision.status_code,
      duration_ms: durationMs
    });
    this.checkpoint('request_end');
  }

  private fail(decision: FailDecision, durationMs: number) {
    this.transition('rejected');
    this.host.sendLocalResponse({
      status_code: decision.status_code,
      headers: [],
      body: AUTHORIZATION_FAILED_BODY
    });
    this.logger.error({
      event: 'authz.reply.failed',
      reason_code: decision.error.code,
      message: decision.error.message,
      status_code: decision.status_code,
      duration_ms: durationMs,
      metadata: decision.raw_reply !== undefined ? {raw_reply: decision.raw_reply} : {}
    });
    this.checkpoint('request_end');
  }

  private passThrough(error: AuthzFilterError): FilterAction {
    this.transition('passed_through');
    this.logger.warn({
      event: 'authz.request.passed_through',
      reason_code: error.code,
      message: error.message
    });
    this.checkpoint('request_end');
    return 'continue';
  }

  private transition(next: FilterState) {
    if (!ALLOWED_TRANSITIONS[this.state].includes(next)) {
      throw new Error(`Invalid authorization filter transition ${this.state} -> ${next}`);
    }

    this.state = next;
  }

  private checkpoint(checkpoint: RequestCheckpoint) {
    this.observer.onCheckpoint({
      checkpoint,
      transient_bytes: this.transientBytes,
      retained_bytes: this.retainedMessage ? Buffer.byteLength(this.retainedMessage, 'utf8') : 0
    });

    if (checkpoint === 'request_end') {
      this.transientBytes = 0;
    }
  }
}
