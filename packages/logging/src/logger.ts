import type {Writable} from 'node:stream';

import {LogEventSchema, type LogEvent} from '@authz-gateway/schemas';
import {z} from 'zod';

import {getLogContext, type LogContext} from './context';
import {sanitizeMetadataForLog} from './redaction';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const EmittableLogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal']);
type EmittableLogLevel = z.infer<typeof EmittableLogLevelSchema>;

export const LogEventInputSchema = z
  .object({
    level: EmittableLogLevelSchema,
    event: z.string().min(1),
    component: z.string().min(1),
    message: z.string().min(1).optional(),
    correlation_id: z.string().min(1).max(128).optional(),
    request_id: z.string().min(1).max(128).optional(),
    reason_code: z.string().min(1).optional(),
    duration_ms: z.number().int().gte(0).optional(),
    status_code: z.number().int().gte(100).lte(599).optional(),
    route: z.string().min(1).optional(),
    method: z.string().min(1).optional(),
    metadata: z.record(z.string(), z.unknown()).optional()
  })
  .strict();

export type LogEventInput = z.infer<typeof LogEventInputSchema>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
  silent: 90
};

export type StructuredLogWriter = {
  stdout: Pick<Writable, 'write'>;
  stderr: Pick<Writable, 'write'>;
};

export type StructuredLoggerOptions = {
  service: string;
  env: string;
  level: LogLevel;
  now?: () => Date;
  writer?: StructuredLogWriter;
  extraSensitiveKeys?: string[];
};

type LevelMethod<TInput> = (input: TInput) => void;

export type StructuredLogger = {
  log: (input: LogEventInput) => void;
  debug: LevelMethod<Omit<LogEventInput, 'level'>>;
  info: LevelMethod<Omit<LogEventInput, 'level'>>;
  warn: LevelMethod<Omit<LogEventInput, 'level'>>;
  error: LevelMethod<Omit<LogEventInput, 'level'>>;
  fatal: LevelMethod<Omit<LogEventInput, 'level'>>;
};

/**
 * Logger with the `component` field bound, handed to code that always logs
 * from the same place (the per-request filter, the transport, the server).
 */
export type ComponentLogger = {
  debug: LevelMethod<Omit<LogEventInput, 'level' | 'component'>>;
  info: LevelMethod<Omit<LogEventInput, 'level' | 'component'>>;
  warn: LevelMethod<Omit<LogEventInput, 'level' | 'component'>>;
  error: LevelMethod<Omit<LogEventInput, 'level' | 'component'>>;
  fatal: LevelMethod<Omit<LogEventInput, 'level' | 'component'>>;
};

const defaultWriter: StructuredLogWriter = {
  stdout: process.stdout,
  stderr: process.stderr
};

const shouldEmit = ({configuredLevel, eventLevel}: {configuredLevel: LogLevel; eventLevel: EmittableLogLevel}) =>
  LEVEL_ORDER[eventLevel] >= LEVEL_ORDER[configuredLevel];

const chooseStream = ({level, writer}: {level: EmittableLogLevel; writer: StructuredLogWriter}) =>
  level === 'error' || level === 'fatal' ? writer.stderr : writer.stdout;

const createEnvelope = ({
  input,
  options,
  context
}: {
  input: LogEventInput;
  options: Required<Pick<StructuredLoggerOptions, 'service' | 'env' | 'extraSensitiveKeys'>> & {now: () => Date};
  context: LogContext | undefined;
}): LogEvent => {
  const route = input.route ?? context?.route;
  const method = input.method ?? context?.method;

  return LogEventSchema.parse({
    ts: options.now().toISOString(),
    level: input.level,
    service: options.service,
    env: options.env,
    event: input.event,
    component: input.component,
    correlation_id: input.correlation_id ?? context?.correlation_id ?? 'n/a',
    request_id: input.request_id ?? context?.request_id ?? 'n/a',
    ...(input.message ? {message: input.message} : {}),
    ...(input.reason_code ? {reason_code: input.reason_code} : {}),
    ...(input.duration_ms !== undefined ? {duration_ms: input.duration_ms} : {}),
    ...(input.status_code !== undefined ? {status_code: input.status_code} : {}),
    ...(route ? {route} : {}),
    ...(method ? {method} : {}),
    metadata: sanitizeMetadataForLog({
      metadata: input.metadata ?? {},
      extraSensitiveKeys: options.extraSensitiveKeys
    })
  });
};

export const createStructuredLogger = (options: StructuredLoggerOptions): StructuredLogger => {
  const level = LogLevelSchema.parse(options.level);
  const writer = options.writer ?? defaultWriter;
  const envelopeOptions = {
    service: z.string().min(1).parse(options.service),
    env: z.string().min(1).parse(options.env),
    extraSensitiveKeys: options.extraSensitiveKeys ?? [],
    now: options.now ?? (() => new Date())
  };

  const log = (rawInput: LogEventInput) => {
    try {
      const input = LogEventInputSchema.parse(rawInput);
      if (!shouldEmit({configuredLevel: level, eventLevel: input.level})) {
        return;
      }

      const envelope = createEnvelope({input, options: envelopeOptions, context: getLogContext()});
      chooseStream({level: input.level, writer}).write(`${JSON.stringify(envelope)}\n`);
    } catch {
      // Logging failures must never break request handling.
    }
  };

  return {
    log,
    debug: input => log({...input, level: 'debug'}),
    info: input => log({...input, level: 'info'}),
    warn: input => log({...input, level: 'warn'}),
    error: input => log({...input, level: 'error'}),
    fatal: input => log({...input, level: 'fatal'})
  };
};

export const forComponent = (logger: StructuredLogger, component: string): ComponentLogger => ({
  debug: input => logger.debug({...input, component}),
  info: input => logger.info({...input, component}),
  warn: input => logger.warn({...input, component}),
  error: input => logger.error({...input, component}),
  fatal: input => logger.fatal({...input, component})
});

export const createNoopLogger = (): StructuredLogger => ({
  log: () => undefined,
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  fatal: () => undefined
});
