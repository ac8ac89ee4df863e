import {Client, credentials, Metadata, status, type ChannelCredentials} from '@grpc/grpc-js'

import {
  describeError,
  parseOutboundCluster,
  type HostDispatchResult,
  type RpcDispatchInput
} from '@authz-gateway/authz-filter'

export type AuthorizationTransportCompletion = {
  token: number
  status_code: number
  body?: Uint8Array
}

export type AuthorizationTransport = {
  dispatch: (
    input: RpcDispatchInput,
    onComplete: (completion: AuthorizationTransportCompletion) => void
  ) => HostDispatchResult
  close: () => void
}

const passThrough = (value: Buffer) => value

/**
 * Resolves an outbound cluster name to the `host:port` the channel dials.
 * A configured address always wins.
 */
export const resolveTransportAddress = ({
  target,
  addressOverride
}: {
  target: string
  addressOverride?: string
}) => {
  if (addressOverride) {
    return addressOverride
  }

  const cluster = parseOutboundCluster(target)
  return cluster ? `${cluster.host}:${cluster.port}` : null
}

export const createGrpcAuthorizationTransport = ({
  addressOverride,
  channelCredentials = credentials.createInsecure(),
  now = Date.now
}: {
  addressOverride?: string
  channelCredentials?: ChannelCredentials
  now?: () => number
} = {}): AuthorizationTransport => {
  const clients = new Map<string, Client>()
  let nextToken = 1

  const clientFor = (address: string) => {
    const existing = clients.get(address)
    if (existing) {
      return existing
    }

    const client = new Client(address, channelCredentials)
    clients.set(address, client)
    return client
  }

  const dispatch: AuthorizationTransport['dispatch'] = (input, onComplete) => {
    const address = resolveTransportAddress({
      target: input.target,
      ...(addressOverride ? {addressOverride} : {})
    })
    if (!address) {
      return {ok: false, reason: `Authorization target is not an outbound cluster: ${input.target}`}
    }

    const token = nextToken
    nextToken += 1

    try {
      clientFor(address).makeUnaryRequest<Buffer, Buffer>(
        `/${input.service}/${input.method}`,
        passThrough,
        passThrough,
        Buffer.from(input.payload),
        new Metadata(),
        {deadline: new Date(now() + input.timeout_ms)},
        (error, value) => {
          if (error) {
            onComplete({token, status_code: error.code})
            return
          }

          onComplete({
            token,
            status_code: status.OK,
            ...(value ? {body: new Uint8Array(value)} : {})
          })
        }
      )
    } catch (error) {
      return {ok: false, reason: describeError(error)}
    }

    return {ok: true, token}
  }

  return {
    dispatch,
    close: () => {
      for (const client of clients.values()) {
        client.close()
      }
      clients.clear()
    }
  }
}
