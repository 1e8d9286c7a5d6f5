import { afterEach, describe, expect, test, vi } from 'vitest';
import { Hono } from 'hono';
import {
  Logger,
  errorMessage,
  redactObject,
  redactValue,
  requestLoggingMiddleware,
  type LogLevel,
} from '../../../src/monitoring/logger.js';

function capture(): { lines: Array<{ level: LogLevel; entry: unknown }>; logger: Logger } {
  const lines: Array<{ level: LogLevel; entry: unknown }> = [];
  const logger = new Logger({
    level: 'debug',
    service: 'test',
    sink: (line, level) => lines.push({ level, entry: JSON.parse(line) }),
  });
  return { lines, logger };
}

describe('redaction', () => {
  test('sensitive keys are redacted whole', () => {
    expect(redactValue('apiKey', 'test-secret')).toBe('[REDACTED]');
    expect(redactValue('DATABASE_URL', 'anything')).toBe('[REDACTED]');
  });

  test('sensitive patterns are redacted inside values', () => {
    expect(redactValue('note', 'contact jane@example.com today')).toBe('contact [REDACTED] today');
    expect(redactValue('dsn', 'postgres://user:pw@db.internal/app')).toBe('[REDACTED]');
  });

  test('anthropic keys inside free text are redacted', () => {
    expect(redactValue('error', 'bad key sk-ant-REDACTED rejected')).toBe('bad key [REDACTED] rejected');
  });

  test('resume and posting text is logged by size', () => {
    expect(redactValue('content', 'Jane Doe, engineer')).toBe('[18 chars]');
    expect(redactValue('postingText', 'abc')).toBe('[3 chars]');
  });

  test('non-strings pass through', () => {
    expect(redactValue('password', 42)).toBe(42);
  });

  test('redactObject walks nested objects and arrays', () => {
    expect(
      redactObject({
        user: { password: 'test-secret', name: 'Jane' },
        tags: ['jane@example.com', 1],
      }),
    ).toEqual({
      user: { password: '[REDACTED]', name: 'Jane' },
      tags: ['[REDACTED]', 1],
    });
  });
});

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('drops entries below the configured level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    new Logger({ level: 'warn' }).info('ignored');
    expect(log).not.toHaveBeenCalled();
  });

  test('writes one JSON line with context and redacted data', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new Logger({ level: 'debug', service: 'test' }).child({ applicationId: 'app-1' });

    logger.error('Stage failed', { authorization: 'Bearer test-secret', attempt: 2 });

    expect(error).toHaveBeenCalledTimes(1);
    const entry: unknown = JSON.parse(String(error.mock.calls[0]?.[0]));
    expect(entry).toMatchObject({
      level: 'error',
      msg: 'Stage failed',
      service: 'test',
      applicationId: 'app-1',
      authorization: '[REDACTED]',
      attempt: 2,
    });
  });

  test('children keep the sink and stack their bindings', () => {
    const { lines, logger } = capture();
    logger.child({ applicationId: 'app-1' }).child({ stage: 'tailoring' }).warn('Slow stage');

    expect(lines).toHaveLength(1);
    expect(lines[0]?.level).toBe('warn');
    expect(lines[0]?.entry).toMatchObject({ msg: 'Slow stage', applicationId: 'app-1', stage: 'tailoring' });
  });

  test('workerId is bound on every entry', () => {
    const lines: unknown[] = [];
    const logger = new Logger({ level: 'info', workerId: 'worker-1', sink: (line) => lines.push(JSON.parse(line)) });
    logger.child({ component: 'scheduler' }).info('Started');
    expect(lines[0]).toMatchObject({ workerId: 'worker-1', component: 'scheduler' });
  });

  test('request logging tags the response and logs server errors at error level', async () => {
    const { lines, logger } = capture();
    const app = new Hono();
    app.use('*', requestLoggingMiddleware(logger));
    app.get('/ok', (c) => c.text('ok'));
    app.get('/broken', (c) => c.text('no', 503));

    const ok = await app.request('/ok', { headers: { 'x-request-id': 'req-1' } });
    await app.request('/broken');

    expect(ok.headers.get('X-Request-Id')).toBe('req-1');
    expect(lines.map((l) => l.level)).toEqual(['info', 'error']);
    expect(lines[0]?.entry).toMatchObject({ msg: 'request_completed', requestId: 'req-1', path: '/ok', status: 200 });
    expect(lines[1]?.entry).toMatchObject({ msg: 'request_failed', path: '/broken', status: 503 });
  });

  test('errorMessage', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });
});
