import type {IncomingMessage} from 'node:http'

import type {
  AuthorizationCompletion,
  FilterHost,
  HeaderPair,
  LocalResponse
} from '@authz-gateway/authz-filter'
import {getLogContext, runWithLogContext} from '@authz-gateway/logging'

import type {AuthorizationTransport} from './grpcTransport'
import {collectInboundHeaders, type ResponseHeaderMap} from './headers'

export type ExchangeOutcome =
  | {kind: 'forward'}
  | {kind: 'local'; response: LocalResponse}
  | {kind: 'failed'; error: unknown}

export type CompletionListener = (completion: AuthorizationCompletion) => void

/**
 * One proxied request as seen by its filter. Request header mutations and
 * response header overrides accumulate here until the server forwards or
 * answers the request; `outcome` settles on the first terminal host call.
 */
export type HttpExchange = {
  host: FilterHost
  outcome: Promise<ExchangeOutcome>
  requestHeaders: () => readonly HeaderPair[]
  responseHeaders: ResponseHeaderMap
  onCompletion: (listener: CompletionListener) => void
}

export const createHttpExchange = ({
  request,
  transport
}: {
  request: IncomingMessage
  transport: AuthorizationTransport
}): HttpExchange => {
  let requestHeaders = collectInboundHeaders(request)
  const responseHeaders: ResponseHeaderMap = new Map()
  let replyBody: Uint8Array | undefined
  let completionListener: CompletionListener | null = null

  let settled = false
  let resolveOutcome: (outcome: ExchangeOutcome) => void = () => undefined
  const outcome = new Promise<ExchangeOutcome>(resolve => {
    resolveOutcome = resolve
  })
  const settle = (next: ExchangeOutcome) => {
    if (settled) {
      return
    }

    settled = true
    resolveOutcome(next)
  }

  const deliver = (completion: AuthorizationCompletion) => {
    try {
      completionListener?.(completion)
    } catch (error) {
      settle({kind: 'failed', error})
    }
  }

  const host: FilterHost = {
    getRequestHeaders: () => requestHeaders,
    setRequestHeader: (name, value) => {
      const normalized = name.toLowerCase()
      requestHeaders = [...requestHeaders.filter(([existing]) => existing !== normalized), [normalized, value]]
    },
    setResponseHeader: (name, value) => {
      responseHeaders.set(name.toLowerCase(), value)
    },
    resumeRequest: () => {
      settle({kind: 'forward'})
    },
    sendLocalResponse: response => {
      settle({kind: 'local', response})
    },
    dispatchRpc: input => {
      // The transport calls back outside the request's async context.
      const logContext = getLogContext()
      return transport.dispatch(input, completion => {
        replyBody = completion.body
        const toDeliver: AuthorizationCompletion = {
          token: completion.token,
          status_code: completion.status_code,
          response_size: completion.body?.byteLength ?? 0
        }

        if (logContext) {
          runWithLogContext(logContext, () => deliver(toDeliver))
        } else {
          deliver(toDeliver)
        }
      })
    },
    getRpcResponseBody: (start, length) => {
      if (!replyBody || start < 0 || start + length > replyBody.byteLength) {
        return undefined
      }

      return replyBody.subarray(start, start + length)
    }
  }

  return {
    host,
    outcome,
    requestHeaders: () => requestHeaders,
    responseHeaders,
    onCompletion: listener => {
      completionListener = listener
    }
  }
}
