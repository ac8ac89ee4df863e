import {describe, expect, it} from 'vitest';

import {
  createNoopLogger,
  createStructuredLogger,
  forComponent,
  getLogContext,
  runWithLogContext,
  sanitizeForLog,
  sanitizeMetadataForLog,
  type StructuredLogWriter
} from '../index';

const createBufferedWriter = () => {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const writer: StructuredLogWriter = {
    stdout: {
      write: (chunk: string | Uint8Array) => {
        stdout.push(String(chunk).trim());
        return true;
      }
    },
    stderr: {
      write: (chunk: string | Uint8Array) => {
        stderr.push(String(chunk).trim());
        return true;
      }
    }
  };

  return {stdout, stderr, writer};
};

const parseLine = (line: string | undefined): Record<string, unknown> => {
  const parsed: unknown = JSON.parse(line ?? 'null');
  if (typeof parsed !== 'object' || parsed === null) {
    throw new Error('log line is not an object');
  }

  return Object.fromEntries(Object.entries(parsed));
};

describe('@authz-gateway/logging', () => {
  it('redacts credential-bearing header names recursively', () => {
    const sanitized = sanitizeMetadataForLog({
      metadata: {
        authorization: 'Bearer test-token',
        headers: {
          'x-forwarded-client-cert': 'By=spiffe://test',
          'x-request-id': 'req-1'
        },
        www_authenticate: 'denied'
      }
    });

    expect(sanitized).toEqual({
      authorization: '[REDACTED]',
      headers: {
        'x-forwarded-client-cert': '[REDACTED]',
        'x-request-id': 'req-1'
      },
      www_authenticate: '[REDACTED]'
    });
  });

  it('isolates async context across concurrent requests', async () => {
    const seen: string[] = [];

    await Promise.all([
      runWithLogContext({correlation_id: 'corr_a', request_id: 'req_a'}, async () => {
        await new Promise(resolve => setTimeout(resolve, 5));
        seen.push(getLogContext()?.correlation_id ?? 'missing');
      }),
      runWithLogContext({correlation_id: 'corr_b', request_id: 'req_b'}, async () => {
        await new Promise(resolve => setTimeout(resolve, 1));
        seen.push(getLogContext()?.correlation_id ?? 'missing');
      })
    ]);

    expect(new Set(seen)).toEqual(new Set(['corr_a', 'corr_b']));
  });

  it('emits a JSON envelope enriched with the request context', () => {
    const buffer = createBufferedWriter();
    const logger = createStructuredLogger({
      service: 'authz-proxy',
      env: 'test',
      level: 'debug',
      writer: buffer.writer,
      now: () => new Date('2026-01-01T00:00:00.000Z')
    });

    runWithLogContext({correlation_id: 'corr_2', request_id: 'req_2', route: '/healthz', method: 'GET'}, () => {
      logger.info({
        event: 'request.received',
        component: 'http.server',
        message: 'request received',
        metadata: {authorization: 'Bearer test'}
      });
    });

    expect(buffer.stdout).toHaveLength(1);
    expect(parseLine(buffer.stdout[0])).toEqual({
      ts: '2026-01-01T00:00:00.000Z',
      level: 'info',
      service: 'authz-proxy',
      env: 'test',
      event: 'request.received',
      component: 'http.server',
      correlation_id: 'corr_2',
      request_id: 'req_2',
      message: 'request received',
      route: '/healthz',
      method: 'GET',
      metadata: {authorization: '[REDACTED]'}
    });
  });

  it('fills default correlation identifiers outside a request context', () => {
    const buffer = createBufferedWriter();
    const logger = createStructuredLogger({service: 'authz-proxy', env: 'test', level: 'debug', writer: buffer.writer});

    logger.info({event: 'process.started', component: 'process.entrypoint'});

    const payload = parseLine(buffer.stdout[0]);
    expect(payload.correlation_id).toBe('n/a');
    expect(payload.request_id).toBe('n/a');
  });

  it('binds the component for component loggers', () => {
    const buffer = createBufferedWriter();
    const logger = forComponent(
      createStructuredLogger({service: 'authz-proxy', env: 'test', level: 'debug', writer: buffer.writer}),
      'authz.filter'
    );

    logger.warn({event: 'authz.dispatch.failed', reason_code: 'dispatch_failed'});

    const payload = parseLine(buffer.stdout[0]);
    expect(payload.component).toBe('authz.filter');
    expect(payload.level).toBe('warn');
    expect(payload.reason_code).toBe('dispatch_failed');
  });

  it('filters by level and routes errors to stderr', () => {
    const buffer = createBufferedWriter();
    const logger = createStructuredLogger({service: 'authz-proxy', env: 'test', level: 'warn', writer: buffer.writer});

    logger.debug({event: 'debug.event', component: 'test'});
    logger.info({event: 'info.event', component: 'test'});
    logger.warn({event: 'warn.event', component: 'test'});
    logger.error({event: 'error.event', component: 'test'});
    logger.fatal({event: 'fatal.event', component: 'test'});

    expect(buffer.stdout).toHaveLength(1);
    expect(buffer.stderr).toHaveLength(2);
    expect(parseLine(buffer.stdout[0]).event).toBe('warn.event');
    expect(parseLine(buffer.stderr[0]).event).toBe('error.event');
    expect(parseLine(buffer.stderr[1]).event).toBe('fatal.event');
  });

  it('does not emit when the level is silent', () => {
    const buffer = createBufferedWriter();
    const logger = createStructuredLogger({service: 'authz-proxy', env: 'test', level: 'silent', writer: buffer.writer});

    logger.fatal({event: 'fatal.event', component: 'test'});

    expect(buffer.stdout).toHaveLength(0);
    expect(buffer.stderr).toHaveLength(0);
  });

  it('never throws when the writer fails', () => {
    const failing = {
      write: () => {
        throw new Error('write failed');
      }
    };
    const logger = createStructuredLogger({
      service: 'authz-proxy',
      env: 'test',
      level: 'debug',
      writer: {stdout: failing, stderr: failing}
    });

    expect(() => logger.error({event: 'grpc.client.error', component: 'grpc.transport'})).not.toThrow();
  });

  it('drops invalid events without throwing', () => {
    const buffer = createBufferedWriter();
    const logger = createStructuredLogger({service: 'authz-proxy', env: 'test', level: 'debug', writer: buffer.writer});

    expect(() => logger.info({event: '', component: 'test'})).not.toThrow();
    expect(buffer.stdout).toHaveLength(0);
  });

  it('sanitizes complex values', () => {
    const circular: Record<string, unknown> = {
      created_at: new Date('2026-01-01T00:00:00.000Z'),
      invalid_created_at: new Date('invalid'),
      symbol: Symbol('s'),
      usage_count: BigInt(7),
      raw_reply: Uint8Array.of(1, 2, 3),
      maybe_error: new Error('failure'),
      execute: () => 'result'
    };
    circular.self = circular;

    let tooDeep: unknown = {value: 'stop'};
    for (let depth = 0; depth < 15; depth += 1) {
      tooDeep = [tooDeep];
    }

    const sanitized = sanitizeMetadataForLog({
      metadata: {customLabel: 'sensitive', circular, tooDeep},
      extraSensitiveKeys: ['custom-label']
    });

    expect(sanitized.customLabel).toBe('[REDACTED]');
    expect(sanitized.circular).toMatchObject({
      created_at: '2026-01-01T00:00:00.000Z',
      invalid_created_at: '[INVALID_DATE]',
      symbol: 'Symbol(s)',
      usage_count: '7',
      raw_reply: '[BYTES 3]',
      maybe_error: {name: 'Error', message: 'failure'},
      execute: '[FUNCTION]',
      self: '[CIRCULAR]'
    });
    expect(JSON.stringify(sanitized.tooDeep)).toContain('[TRUNCATED]');
  });

  it('passes primitives through sanitizeForLog', () => {
    expect(sanitizeForLog({value: 'plain'})).toBe('plain');
    expect(sanitizeForLog({value: null})).toBeNull();
  });

  it('provides a no-op logger', () => {
    const noop = createNoopLogger();
    expect(() => {
      noop.log({level: 'info', event: 'test.event', component: 'test'});
      noop.error({event: 'test.event', component: 'test'});
    }).not.toThrow();
  });
});
