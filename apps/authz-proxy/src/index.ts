import {fileURLToPath} from 'node:url'

import {createStructuredLogger} from '@authz-gateway/logging'

import {createAuthzProxyApp, serviceName} from './app'
import {loadConfig} from './config'

export const appName = serviceName

export * from './app'
export * from './config'
export * from './errors'
export * from './exchange'
export * from './grpcTransport'
export * from './headers'
export * from './http'
export * from './server'
export * from './upstream'

const main = async () => {
  const config = loadConfig(process.env)
  const logger = createStructuredLogger({
    service: appName,
    env: config.nodeEnv,
    level: config.logging.level,
    extraSensitiveKeys: config.logging.redactExtraKeys
  })
  const app = createAuthzProxyApp({config, logger})

  await app.start()

  const shutdown = async () => {
    try {
      await app.stop()
      process.exit(0)
    } catch (error) {
      logger.error({
        event: 'process.shutdown.failed',
        component: 'process.entrypoint',
        reason_code: 'shutdown_failed',
        metadata: {error}
      })
      process.exit(1)
    }
  }

  process.on('SIGINT', () => {
    void shutdown()
  })
  process.on('SIGTERM', () => {
    void shutdown()
  })
}

const isMainModule = (() => {
  const currentFile = fileURLToPath(import.meta.url)
  const entryFile = process.argv[1]
  if (!entryFile) {
    return false
  }

  return currentFile === entryFile
})()

if (isMainModule) {
  void main().catch(error => {
    const env = process.env.NODE_ENV === 'production' ? 'production' : process.env.NODE_ENV === 'test' ? 'test' : 'development'
    const startupLogger = createStructuredLogger({
      service: appName,
      env,
      level: 'error'
    })
    startupLogger.fatal({
      event: 'process.startup.failed',
      component: 'process.entrypoint',
      message: 'Authorization proxy startup failed',
      reason_code: 'startup_failed',
      metadata: {
        error
      }
    })
    process.exit(1)
  })
}
