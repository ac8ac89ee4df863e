import type {IncomingMessage} from 'node:http'
import {TLSSocket} from 'node:tls'

import {HOP_BY_HOP_HEADER_NAMES, isPseudoHeader, type HeaderPair} from '@authz-gateway/authz-filter'

const CONNECTION_TOKEN_SPLIT_REGEX = /\s*,\s*/u

// Recomputed by fetch for the upstream hop, or invalid once fetch has decoded the body.
const UPSTREAM_REQUEST_EXCLUDED_HEADERS = new Set(['host', 'content-length'])
const DOWNSTREAM_RESPONSE_EXCLUDED_HEADERS = new Set(['content-length', 'content-encoding', 'set-cookie'])

export type ResponseHeaderMap = Map<string, string | string[]>

const requestScheme = (request: IncomingMessage) => (request.socket instanceof TLSSocket ? 'https' : 'http')

/**
 * Header list handed to the filter: pseudo-headers derived from the request
 * line first, then the raw headers with lower-cased names. `host` is carried
 * as `:authority` only.
 */
export const collectInboundHeaders = (request: IncomingMessage): HeaderPair[] => {
  const headers: HeaderPair[] = [
    [':method', request.method ?? 'GET'],
    [':scheme', requestScheme(request)]
  ]

  const authority = request.headers.host
  if (authority !== undefined) {
    headers.push([':authority', authority])
  }
  headers.push([':path', request.url ?? '/'])

  const raw = request.rawHeaders
  for (let index = 0; index + 1 < raw.length; index += 2) {
    const name = raw[index].toLowerCase()
    if (name !== 'host') {
      headers.push([name, raw[index + 1]])
    }
  }

  return headers
}

const connectionNominatedHeaders = (headers: readonly HeaderPair[]) => {
  const nominated = new Set<string>()
  for (const [name, value] of headers) {
    if (name !== 'connection') {
      continue
    }

    for (const token of value.split(CONNECTION_TOKEN_SPLIT_REGEX)) {
      const normalized = token.trim().toLowerCase()
      if (normalized.length > 0) {
        nominated.add(normalized)
      }
    }
  }

  return nominated
}

export const stripHopByHopHeaders = (headers: readonly HeaderPair[]): HeaderPair[] => {
  const headersToStrip = new Set<string>([...HOP_BY_HOP_HEADER_NAMES, ...connectionNominatedHeaders(headers)])
  return headers.filter(([name]) => !headersToStrip.has(name))
}

export const toUpstreamRequestHeaders = (headers: readonly HeaderPair[]): [string, string][] =>
  stripHopByHopHeaders(headers)
    .filter(([name]) => !isPseudoHeader(name) && !UPSTREAM_REQUEST_EXCLUDED_HEADERS.has(name))
    .map(([name, value]): [string, string] => [name, value])

export const collectUpstreamResponseHeaders = (response: Response): ResponseHeaderMap => {
  const collected: HeaderPair[] = []
  response.headers.forEach((value, name) => {
    collected.push([name.toLowerCase(), value])
  })

  const headers: ResponseHeaderMap = new Map()
  for (const [name, value] of stripHopByHopHeaders(collected)) {
    if (!DOWNSTREAM_RESPONSE_EXCLUDED_HEADERS.has(name)) {
      headers.set(name, value)
    }
  }

  const cookies = response.headers.getSetCookie()
  if (cookies.length > 0) {
    headers.set('set-cookie', cookies)
  }

  return headers
}
