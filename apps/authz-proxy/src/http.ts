import {randomUUID} from 'node:crypto'
import type {IncomingMessage, ServerResponse} from 'node:http'

import {ErrorResponseSchema, HealthResponseSchema} from '@authz-gateway/schemas'

import {badRequest, payloadTooLarge} from './errors'

const DEFAULT_SECURITY_HEADERS: Record<string, string> = {
  'x-content-type-options': 'nosniff',
  'cache-control': 'no-store'
}

const readIdentifierHeader = (request: IncomingMessage, name: string) => {
  const header = request.headers[name]
  const value = Array.isArray(header) ? header[0] : header
  if (typeof value !== 'string') {
    return randomUUID()
  }

  const trimmed = value.trim()
  if (trimmed.length === 0 || trimmed.length > 128) {
    return randomUUID()
  }

  return trimmed
}

export const extractCorrelationId = (request: IncomingMessage) => readIdentifierHeader(request, 'x-correlation-id')

export const extractRequestId = (request: IncomingMessage) => readIdentifierHeader(request, 'x-request-id')

export const readBodyBuffer = async ({
  request,
  maxBodyBytes
}: {
  request: IncomingMessage
  maxBodyBytes: number
}) => {
  const declaredLength = Number.parseInt(request.headers['content-length'] ?? '', 10)
  if (!Number.isNaN(declaredLength) && declaredLength > maxBodyBytes) {
    throw payloadTooLarge('request_body_too_large', `Request body exceeds ${maxBodyBytes} bytes`)
  }

  const chunks: Buffer[] = []
  let size = 0

  for await (const chunk of request) {
    let bufferChunk: Buffer
    if (typeof chunk === 'string') {
      bufferChunk = Buffer.from(chunk, 'utf8')
    } else if (chunk instanceof Uint8Array) {
      bufferChunk = Buffer.from(chunk)
    } else {
      throw badRequest('request_body_invalid', 'Request body contains an invalid chunk type')
    }

    size += bufferChunk.length
    if (size > maxBodyBytes) {
      throw payloadTooLarge('request_body_too_large', `Request body exceeds ${maxBodyBytes} bytes`)
    }

    chunks.push(bufferChunk)
  }

  return Buffer.concat(chunks)
}

export const sendJson = ({
  response,
  status,
  correlationId,
  payload
}: {
  response: ServerResponse
  status: number
  correlationId: string
  payload: unknown
}) => {
  const body = Buffer.from(JSON.stringify(payload), 'utf8')

  response.writeHead(status, {
    ...DEFAULT_SECURITY_HEADERS,
    'content-type': 'application/json; charset=utf-8',
    'content-length': String(body.length),
    'x-correlation-id': correlationId
  })

  response.end(body)
}

export const sendText = ({
  response,
  status,
  body,
  headers
}: {
  response: ServerResponse
  status: number
  body: string
  headers?: Record<string, string>
}) => {
  const encoded = Buffer.from(body, 'utf8')

  response.writeHead(status, {
    ...DEFAULT_SECURITY_HEADERS,
    ...(headers ?? {}),
    'content-type': 'text/plain; charset=utf-8',
    'content-length': String(encoded.length)
  })

  response.end(encoded)
}

export const sendError = ({
  response,
  status,
  error,
  message,
  correlationId
}: {
  response: ServerResponse
  status: number
  error: string
  message: string
  correlationId: string
}) => {
  const payload = ErrorResponseSchema.parse({
    error,
    message,
    correlation_id: correlationId
  })

  sendJson({
    response,
    status,
    correlationId,
    payload
  })
}

export const sendHealth = ({response, correlationId}: {response: ServerResponse; correlationId: string}) => {
  sendJson({
    response,
    status: 200,
    correlationId,
    payload: HealthResponseSchema.parse({status: 'ok'})
  })
}
