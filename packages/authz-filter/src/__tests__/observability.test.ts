import {createStructuredLogger, forComponent, type StructuredLogWriter} from '@authz-gateway/logging';
import {describe, expect, it} from 'vitest';

import {createLoggingRequestObserver, createNoopRequestObserver} from '../index';

const createCapture = () => {
  const lines: Record<string, unknown>[] = [];
  const sink = {
    write: (chunk: string | Uint8Array) => {
      const parsed: unknown = JSON.parse(String(chunk));
      if (typeof parsed === 'object' && parsed !== null) {
        lines.push(Object.fromEntries(Object.entries(parsed)));
      }
      return true;
    }
  };
  const writer: StructuredLogWriter = {stdout: sink, stderr: sink};
  const logger = forComponent(
    createStructuredLogger({service: 'authz-proxy', env: 'test', level: 'debug', writer}),
    'authz.memory'
  );

  return {lines, logger};
};

describe('createLoggingRequestObserver', () => {
  it('logs each checkpoint at debug level', () => {
    const capture = createCapture();
    const observer = createLoggingRequestObserver({logger: capture.logger});

    observer.onCheckpoint({checkpoint: 'headers_built', transient_bytes: 120, retained_bytes: 0});

    expect(capture.lines).toHaveLength(1);
    expect(capture.lines[0]).toMatchObject({
      level: 'debug',
      event: 'authz.memory.checkpoint',
      metadata: {checkpoint: 'headers_built', transient_bytes: 120, retained_bytes: 0}
    });
  });

  it('warns when a finished request retains more than the threshold', () => {
    const capture = createCapture();
    const observer = createLoggingRequestObserver({logger: capture.logger, retainedBytesWarningThreshold: 8});

    observer.onCheckpoint({checkpoint: 'request_end', transient_bytes: 0, retained_bytes: 9});

    expect(capture.lines.map(line => line.event)).toEqual([
      'authz.memory.checkpoint',
      'authz.memory.retained_state_large'
    ]);
    expect(capture.lines[1]).toMatchObject({
      level: 'warn',
      reason_code: 'retained_state_large',
      metadata: {retained_bytes: 9, threshold: 8}
    });
  });

  it('does not warn at the threshold', () => {
    const capture = createCapture();
    const observer = createLoggingRequestObserver({logger: capture.logger, retainedBytesWarningThreshold: 8});

    observer.onCheckpoint({checkpoint: 'request_end', transient_bytes: 0, retained_bytes: 8});

    expect(capture.lines).toHaveLength(1);
  });
});

describe('createNoopRequestObserver', () => {
  it('accepts samples without side effects', () => {
    expect(() =>
      createNoopRequestObserver().onCheckpoint({checkpoint: 'request_start', transient_bytes: 0, retained_bytes: 0})
    ).not.toThrow();
  });
});
