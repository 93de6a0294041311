/**
 * Unit Tests: Logger formatting and secret redaction
 */

import { describe, it, expect } from 'vitest';
import {
  createLogger,
  parseLogLevel,
  redactPatterns,
  redactString,
  redactValue,
  type LogLevel,
} from '../../src/api/logger.js';

function capture(): { lines: Array<[LogLevel, string]>; sink: (level: LogLevel, line: string) => void } {
  const lines: Array<[LogLevel, string]> = [];
  return { lines, sink: (level, line) => lines.push([level, line]) };
}

describe('redaction', () => {
  it('keeps the ends of long values only', () => {
    expect(redactString('abcd1234wxyz9876')).toBe('abcd...9876');
    expect(redactString('short')).toBe('[REDACTED]');
  });

  it('redacts bearer tokens inside text', () => {
    expect(redactPatterns('Authorization: Bearer abcdef123456')).toBe('Authorization: Bear...3456');
  });

  it('redacts sensitive keys at any depth', () => {
    expect(
      redactValue({ users: [{ name: 'admin', token: 'abcd1234wxyz9876' }], password: 42, clientKeyData: null })
    ).toEqual({
      users: [{ name: 'admin', token: 'abcd...9876' }],
      password: '[REDACTED]',
      clientKeyData: null,
    });
  });
});

describe('ApiLogger', () => {
  it('writes human-readable lines with context', () => {
    const { lines, sink } = capture();
    const log = createLogger({ level: 'info', timestamps: false }, sink);

    log.info('hello', { token: 'abcd1234wxyz9876', tier: 2 });

    expect(lines).toEqual([['info', '[INFO] hello {"token":"abcd...9876","tier":2}']]);
  });

  it('drops entries below the configured level', () => {
    const { lines, sink } = capture();
    const log = createLogger({ level: 'warn', timestamps: false }, sink);

    log.debug('hidden');
    log.info('hidden');
    log.warn('shown');

    expect(lines).toEqual([['warn', '[WARN] shown']]);
  });

  it('carries bound context into child loggers', () => {
    const { lines, sink } = capture();
    const log = createLogger({ timestamps: false }, sink).child({ command: 'update' }).child({ tier: 0 });

    log.info('tier started', { steps: 1 });

    expect(lines[0][1]).toBe('[INFO] tier started {"command":"update","tier":0,"steps":1}');
  });

  it('appends error details', () => {
    const { lines, sink } = capture();
    const log = createLogger({ timestamps: false }, sink);

    log.error('apply failed', new Error('forbidden'));

    expect(lines[0]).toEqual(['error', '[ERROR] apply failed \n  Error: Error: forbidden']);
  });

  it('writes JSON entries when configured', () => {
    const { lines, sink } = capture();
    const log = createLogger({ json: true }, sink);

    log.warn('slow', { durationMs: 900 });

    const entry: unknown = JSON.parse(lines[0][1]);
    expect(entry).toMatchObject({ level: 'warn', message: 'slow', context: { durationMs: 900 } });
  });

  it('logs failed responses as warnings and others at debug', () => {
    const { lines, sink } = capture();
    const log = createLogger({ level: 'info', timestamps: false }, sink);

    log.response(200, 'ConfigMap/web/settings', 12);
    log.response(409, 'ConfigMap/web/settings', 15);

    expect(lines).toEqual([['warn', '[WARN] API response 409: ConfigMap/web/settings {"status":409,"durationMs":15}']]);
  });

  it('omits an absent request body', () => {
    const { lines, sink } = capture();
    const log = createLogger({ level: 'debug', timestamps: false }, sink);

    log.request('DELETE', 'Secret/web/credentials');

    expect(lines[0][1]).toBe('[DEBUG] API request {"method":"DELETE","target":"Secret/web/credentials"}');
  });
});

describe('parseLogLevel', () => {
  it('accepts known levels in any case', () => {
    expect(parseLogLevel('DEBUG')).toBe('debug');
    expect(parseLogLevel('verbose')).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});
