import {createServer as createHttpServer, type IncomingMessage, type Server, type ServerResponse} from 'node:http';

import {
  AuthorizationFilter,
  createLoggingRequestObserver,
  createNoopRequestObserver,
  type AuthorizationCodec
} from '@authz-gateway/authz-filter';
import {createNoopLogger, forComponent, runWithLogContext, type StructuredLogger} from '@authz-gateway/logging';

import type {ServiceConfig} from './config';
import {isAppError} from './errors';
import {createHttpExchange, type ExchangeOutcome, type HttpExchange} from './exchange';
import type {AuthorizationTransport} from './grpcTransport';
import {extractCorrelationId, extractRequestId, readBodyBuffer, sendError, sendHealth, sendText} from './http';
import {forwardToUpstream, type FetchLike, type UpstreamResponse} from './upstream';

export type CreateAuthzProxyServerInput = {
  config: ServiceConfig;
  transport: AuthorizationTransport;
  logger?: StructuredLogger;
  fetchImpl?: FetchLike;
  codec?: AuthorizationCodec;
  now?: () => Date;
};

const routeOf = (request: IncomingMessage) => {
  const [pathname = ''] = (request.url ?? '/').split('?');
  return pathname.length > 0 ? pathname : '/';
};

const writeUpstreamResponse = ({
  response,
  method,
  upstream,
  exchange
}: {
  response: ServerResponse;
  method: string;
  upstream: UpstreamResponse;
  exchange: HttpExchange;
}) => {
  response.writeHead(upstream.status, {
    ...Object.fromEntries(exchange.responseHeaders),
    ...(method === 'HEAD' ? {} : {'content-length': String(upstream.body.length)})
  });
  response.end(method === 'HEAD' ? undefined : upstream.body);
};

export const createAuthzProxyRequestHandler = ({
  config,
  transport,
  logger = createNoopLogger(),
  fetchImpl,
  codec,
  now = () => new Date()
}: CreateAuthzProxyServerInput) => {
  const upstreamFetch: FetchLike = fetchImpl ?? globalThis.fetch;
  const serverLogger = forComponent(logger, 'http.server');
  const filterLogger = forComponent(logger, 'authz.filter');
  const observer = config.memoryTrace
    ? createLoggingRequestObserver({logger: forComponent(logger, 'authz.memory')})
    : createNoopRequestObserver();

  const authorize = async (exchange: HttpExchange) => {
    const filter = new AuthorizationFilter({
      host: exchange.host,
      config: config.filter,
      logger: filterLogger,
      observer,
      now: () => now().getTime(),
      ...(codec ? {codec} : {})
    });
    exchange.onCompletion(completion => filter.onAuthorizationReply(completion));

    const action = filter.onRequestHeaders();
    const outcome: ExchangeOutcome = action === 'pause' ? await exchange.outcome : {kind: 'forward'};
    return {filter, outcome};
  };

  const handleRequest = async (request: IncomingMessage, response: ServerResponse) => {
    const correlationId = extractCorrelationId(request);
    const requestId = extractRequestId(request);
    const startedAtMs = now().getTime();
    const method = request.method ?? 'GET';
    const route = routeOf(request);

    return runWithLogContext(
      {
        correlation_id: correlationId,
        request_id: requestId,
        route,
        method
      },
      async () => {
        let responseReasonCode: string | undefined;

        serverLogger.info({
          event: 'request.received',
          message: 'Request received'
        });

        try {
          if (method === 'GET' && route === config.healthPath) {
            sendHealth({response, correlationId});
            return;
          }

          const body = await readBodyBuffer({request, maxBodyBytes: config.maxBodyBytes});
          const exchange = createHttpExchange({request, transport});
          const {filter, outcome} = await authorize(exchange);

          if (outcome.kind === 'failed') {
            throw outcome.error;
          }

          if (outcome.kind === 'local') {
            responseReasonCode = outcome.response.status_code === 401 ? 'authorization_denied' : 'authorization_failed';
            sendText({
              response,
              status: outcome.response.status_code,
              body: outcome.response.body,
              headers: Object.fromEntries(outcome.response.headers)
            });
            return;
          }

          const upstream = await forwardToUpstream({
            fetchImpl: upstreamFetch,
            upstreamUrl: config.upstreamUrl,
            method,
            path: request.url ?? '/',
            headers: exchange.requestHeaders(),
            body,
            timeoutMs: config.upstreamTimeoutMs
          });

          for (const [name, value] of upstream.headers) {
            exchange.responseHeaders.set(name, value);
          }
          filter.onResponseHeaders();

          writeUpstreamResponse({response, method, upstream, exchange});
        } catch (error) {
          if (response.headersSent) {
            responseReasonCode = 'response_aborted';
            serverLogger.error({
              event: 'request.aborted',
              message: 'Response failed after headers were sent',
              reason_code: responseReasonCode,
              metadata: {error}
            });
            response.destroy();
            return;
          }

          if (isAppError(error)) {
            responseReasonCode = error.code;
            sendError({
              response,
              status: error.status,
              error: error.code,
              message: error.message,
              correlationId
            });
            return;
          }

          responseReasonCode = 'internal_error';
          serverLogger.error({
            event: 'request.failed',
            message: 'Unexpected internal error',
            reason_code: 'internal_error',
            metadata: {
              error
            }
          });

          sendError({
            response,
            status: 500,
            error: 'internal_error',
            message: 'Unexpected internal error',
            correlationId
          });
        } finally {
          const durationMs = Math.max(0, now().getTime() - startedAtMs);
          const statusCode = response.statusCode;
          const baseLog = {
            event: 'request.completed',
            message: 'Request completed',
            status_code: statusCode,
            duration_ms: durationMs,
            ...(responseReasonCode ? {reason_code: responseReasonCode} : {})
          };

          if (statusCode >= 500) {
            serverLogger.error(baseLog);
          } else if (statusCode >= 400) {
            serverLogger.warn(baseLog);
          } else {
            serverLogger.info(baseLog);
          }
        }
      }
    );
  };

  return handleRequest;
};

export const createAuthzProxyServer = (input: CreateAuthzProxyServerInput): Server => {
  const handler = createAuthzProxyRequestHandler(input);
  return createHttpServer((request, response) => {
    void handler(request, response);
  });
};
