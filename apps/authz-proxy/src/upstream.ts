import type {HeaderPair} from '@authz-gateway/authz-filter'

import {badGateway, badRequest, gatewayTimeout} from './errors'
import {collectUpstreamResponseHeaders, toUpstreamRequestHeaders, type ResponseHeaderMap} from './headers'

export type FetchLike = (...args: Parameters<typeof fetch>) => ReturnType<typeof fetch>

export type UpstreamResponse = {
  status: number
  headers: ResponseHeaderMap
  body: Buffer
}

const BODYLESS_METHODS = new Set(['GET', 'HEAD'])

const mapFetchError = (unknownError: unknown) => {
  if (unknownError instanceof Error) {
    if (unknownError.name === 'AbortError' || unknownError.name === 'TimeoutError') {
      return gatewayTimeout('upstream_timeout', 'Upstream request timed out')
    }

    return badGateway('upstream_network_error', unknownError.message)
  }

  return badGateway('upstream_network_error', 'Upstream request failed')
}

export const buildUpstreamUrl = ({upstreamUrl, path}: {upstreamUrl: string; path: string}) => {
  if (!path.startsWith('/')) {
    throw badRequest('request_target_invalid', 'Only origin-form request targets are proxied')
  }

  // Concatenated rather than resolved so a `//host` path cannot change the origin.
  return new URL(`${upstreamUrl}${path}`)
}

export const forwardToUpstream = async ({
  fetchImpl,
  upstreamUrl,
  method,
  path,
  headers,
  body,
  timeoutMs
}: {
  fetchImpl: FetchLike
  upstreamUrl: string
  method: string
  path: string
  headers: readonly HeaderPair[]
  body: Buffer
  timeoutMs: number
}): Promise<UpstreamResponse> => {
  const url = buildUpstreamUrl({upstreamUrl, path})
  const sendsBody = body.length > 0 && !BODYLESS_METHODS.has(method.toUpperCase())

  let upstreamResponse: Response
  try {
    upstreamResponse = await fetchImpl(url, {
      method,
      headers: toUpstreamRequestHeaders(headers),
      ...(sendsBody ? {body} : {}),
      redirect: 'manual',
      signal: AbortSignal.timeout(timeoutMs)
    })
  } catch (unknownError) {
    throw mapFetchError(unknownError)
  }

  let responseBody: Buffer
  try {
    responseBody = Buffer.from(await upstreamResponse.arrayBuffer())
  } catch (unknownError) {
    throw mapFetchError(unknownError)
  }

  return {
    status: upstreamResponse.status,
    headers: collectUpstreamResponseHeaders(upstreamResponse),
    body: responseBody
  }
}
