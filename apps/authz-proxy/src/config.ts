import {LogLevelSchema, type LogLevel} from '@authz-gateway/logging'
import {resolveFilterConfig, type AuthorizationFilterConfig} from '@authz-gateway/authz-filter'
import {z} from 'zod'

const numberFromEnv = z.preprocess(value => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return value
  }

  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) ? value : parsed
}, z.number().int().positive())

const booleanFromEnv = z.preprocess(value => {
  if (typeof value !== 'string') {
    return value
  }

  const normalized = value.trim().toLowerCase()
  if (normalized === 'true' || normalized === '1') {
    return true
  }
  if (normalized === 'false' || normalized === '0') {
    return false
  }

  return value
}, z.boolean())

const optionalString = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined
  }

  const trimmed = value.trim()
  return trimmed.length === 0 ? undefined : trimmed
}, z.string().optional())

const parseCommaSeparatedKeys = (raw: string | undefined) => {
  if (!raw) {
    return []
  }

  return raw
    .split(',')
    .map(value => value.trim())
    .filter(value => value.length > 0)
}

const parseUpstreamUrl = (raw: string) => {
  const parsed = new URL(raw)
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new Error(`AUTHZ_PROXY_UPSTREAM_URL has an unsupported protocol: ${parsed.protocol}`)
  }

  return parsed.origin
}

const grpcAddressPattern = /^[^\s|]+:\d{1,5}$/u

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    AUTHZ_PROXY_HOST: z.string().default('0.0.0.0'),
    AUTHZ_PROXY_PORT: numberFromEnv.default(10_000),
    AUTHZ_PROXY_UPSTREAM_URL: z.string().url().default('http://127.0.0.1:8080'),
    AUTHZ_PROXY_UPSTREAM_TIMEOUT_MS: numberFromEnv.default(30_000),
    AUTHZ_PROXY_MAX_BODY_BYTES: numberFromEnv.default(1024 * 1024),
    AUTHZ_PROXY_HEALTH_PATH: z.string().regex(/^\/[^\s?#]*$/u).default('/healthz'),
    INSTANCE_ID: optionalString,
    AUTHZ_GRPC_ADDRESS: optionalString,
    AUTHZ_GRPC_TIMEOUT_MS: numberFromEnv.default(5_000),
    AUTHZ_FORWARD_REPLY_HEADERS: booleanFromEnv.default(false),
    AUTHZ_MEMORY_TRACE: booleanFromEnv.default(false),
    AUTHZ_PROXY_LOG_LEVEL: LogLevelSchema.optional(),
    AUTHZ_PROXY_LOG_REDACT_EXTRA_KEYS: optionalString
  })
  .strict()

export type ServiceConfig = {
  nodeEnv: 'development' | 'test' | 'production'
  host: string
  port: number
  upstreamUrl: string
  upstreamTimeoutMs: number
  maxBodyBytes: number
  healthPath: string
  filter: AuthorizationFilterConfig
  grpc: {
    address?: string
  }
  memoryTrace: boolean
  logging: {
    level: LogLevel
    redactExtraKeys: string[]
  }
}

const toEnvInput = (env: NodeJS.ProcessEnv) => ({
  NODE_ENV: env.NODE_ENV,
  AUTHZ_PROXY_HOST: env.AUTHZ_PROXY_HOST,
  AUTHZ_PROXY_PORT: env.AUTHZ_PROXY_PORT,
  AUTHZ_PROXY_UPSTREAM_URL: env.AUTHZ_PROXY_UPSTREAM_URL,
  AUTHZ_PROXY_UPSTREAM_TIMEOUT_MS: env.AUTHZ_PROXY_UPSTREAM_TIMEOUT_MS,
  AUTHZ_PROXY_MAX_BODY_BYTES: env.AUTHZ_PROXY_MAX_BODY_BYTES,
  AUTHZ_PROXY_HEALTH_PATH: env.AUTHZ_PROXY_HEALTH_PATH,
  INSTANCE_ID: env.INSTANCE_ID,
  AUTHZ_GRPC_ADDRESS: env.AUTHZ_GRPC_ADDRESS,
  AUTHZ_GRPC_TIMEOUT_MS: env.AUTHZ_GRPC_TIMEOUT_MS,
  AUTHZ_FORWARD_REPLY_HEADERS: env.AUTHZ_FORWARD_REPLY_HEADERS,
  AUTHZ_MEMORY_TRACE: env.AUTHZ_MEMORY_TRACE,
  AUTHZ_PROXY_LOG_LEVEL: env.AUTHZ_PROXY_LOG_LEVEL,
  AUTHZ_PROXY_LOG_REDACT_EXTRA_KEYS: env.AUTHZ_PROXY_LOG_REDACT_EXTRA_KEYS
})

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServiceConfig => {
  const parsed = envSchema.parse(toEnvInput(env))

  const grpcAddress = parsed.AUTHZ_GRPC_ADDRESS
  if (grpcAddress && !grpcAddressPattern.test(grpcAddress)) {
    throw new Error('AUTHZ_GRPC_ADDRESS must be in host:port form')
  }

  const loggingLevel = parsed.AUTHZ_PROXY_LOG_LEVEL ?? (parsed.NODE_ENV === 'test' ? 'silent' : 'info')

  return {
    nodeEnv: parsed.NODE_ENV,
    host: parsed.AUTHZ_PROXY_HOST,
    port: parsed.AUTHZ_PROXY_PORT,
    upstreamUrl: parseUpstreamUrl(parsed.AUTHZ_PROXY_UPSTREAM_URL),
    upstreamTimeoutMs: parsed.AUTHZ_PROXY_UPSTREAM_TIMEOUT_MS,
    maxBodyBytes: parsed.AUTHZ_PROXY_MAX_BODY_BYTES,
    healthPath: parsed.AUTHZ_PROXY_HEALTH_PATH,
    filter: resolveFilterConfig({
      ...(parsed.INSTANCE_ID ? {instance_id: parsed.INSTANCE_ID} : {}),
      timeout_ms: parsed.AUTHZ_GRPC_TIMEOUT_MS,
      forward_reply_headers: parsed.AUTHZ_FORWARD_REPLY_HEADERS
    }),
    grpc: {
      ...(grpcAddress ? {address: grpcAddress} : {})
    },
    memoryTrace: parsed.AUTHZ_MEMORY_TRACE,
    logging: {
      level: loggingLevel,
      redactExtraKeys: parseCommaSeparatedKeys(parsed.AUTHZ_PROXY_LOG_REDACT_EXTRA_KEYS)
    }
  }
}
