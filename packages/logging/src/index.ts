export {
  getLogContext,
  LogContextSchema,
  runWithLogContext,
  type LogContext
} from './context';
export {
  createNoopLogger,
  createStructuredLogger,
  forComponent,
  LogEventInputSchema,
  LogLevelSchema,
  type ComponentLogger,
  type LogEventInput,
  type LogLevel,
  type StructuredLogger,
  type StructuredLoggerOptions,
  type StructuredLogWriter
} from './logger';
export {sanitizeForLog, sanitizeMetadataForLog} from './redaction';
