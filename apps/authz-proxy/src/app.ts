import {createStructuredLogger, type StructuredLogger} from '@authz-gateway/logging'

import type {ServiceConfig} from './config'
import {createGrpcAuthorizationTransport, type AuthorizationTransport} from './grpcTransport'
import {createAuthzProxyServer} from './server'
import type {FetchLike} from './upstream'

export const serviceName = 'authz-proxy'

export const createAuthzProxyApp = ({
  config,
  fetchImpl,
  transport,
  logger,
  now
}: {
  config: ServiceConfig
  fetchImpl?: FetchLike
  transport?: AuthorizationTransport
  logger?: StructuredLogger
  now?: () => Date
}) => {
  const appLogger =
    logger ??
    createStructuredLogger({
      service: serviceName,
      env: config.nodeEnv,
      level: config.logging.level,
      extraSensitiveKeys: config.logging.redactExtraKeys
    })
  const authorizationTransport =
    transport ??
    createGrpcAuthorizationTransport({
      ...(config.grpc.address ? {addressOverride: config.grpc.address} : {})
    })

  const server = createAuthzProxyServer({
    config,
    transport: authorizationTransport,
    logger: appLogger,
    ...(fetchImpl ? {fetchImpl} : {}),
    ...(now ? {now} : {})
  })

  const start = async () => {
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject)
      server.listen(config.port, config.host, () => {
        server.off('error', reject)
        resolve()
      })
    })

    const address = server.address()
    const port = typeof address === 'object' && address !== null ? address.port : config.port
    appLogger.info({
      event: 'process.started',
      component: 'process.entrypoint',
      message: `Listening on ${config.host}:${port}`,
      metadata: {
        upstream_url: config.upstreamUrl,
        authorization_target: config.filter.target,
        grpc_address: config.grpc.address ?? null
      }
    })

    return {host: config.host, port}
  }

  const stop = async () => {
    await new Promise<void>((resolve, reject) => {
      server.close(error => {
        if (error) {
          reject(error)
          return
        }

        resolve()
      })
      server.closeIdleConnections()
    })
    authorizationTransport.close()
  }

  return {
    server,
    start,
    stop
  }
}

export type AuthzProxyApp = ReturnType<typeof createAuthzProxyApp>
