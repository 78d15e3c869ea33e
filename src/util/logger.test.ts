import { afterEach, describe, expect, test, vi } from 'vitest';

import { createLogger, errorFields, parseLogLevel, withLogContext } from './logger.js';

const captureStderr = () => {
  const spy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  return {
    lines: (): Record<string, unknown>[] =>
      spy.mock.calls.map((call) => JSON.parse(String(call[0])) as Record<string, unknown>),
  };
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe('createLogger', () => {
  test('redacts secret keys and token-shaped strings', () => {
    const out = captureStderr();
    const logger = createLogger({ app: 'test' }, 'debug');
    logger.info('hello', {
      api_key: 'test-secret',
      telegram_bot_token: 'test-secret',
      note: 'Bearer test-secret',
      url: 'https://api.telegram.org/bot123:test-secret/getMe',
    });

    const entry = out.lines().at(-1);
    expect(entry?.['api_key']).toBe('[REDACTED]');
    expect(entry?.['telegram_bot_token']).toBe('[REDACTED]');
    expect(entry?.['note']).toBe('Bearer [REDACTED]');
    expect(entry?.['url']).toBe('https://api.telegram.org/bot[REDACTED]/getMe');
  });

  test('drops lines below the threshold', () => {
    const out = captureStderr();
    const logger = createLogger({}, 'warn');
    logger.info('quiet');
    logger.warn('loud');
    expect(out.lines().map((l) => l['msg'])).toEqual(['loud']);
  });

  test('child bindings and async context land on every line', () => {
    const out = captureStderr();
    const logger = createLogger({ app: 'test' }, 'debug').child({ component: 'scheduler' });
    withLogContext({ groupId: 'tg:-100' }, () => {
      logger.debug('timer.armed', { token: 3 });
    });
    const entry = out.lines().at(-1);
    expect(entry?.['app']).toBe('test');
    expect(entry?.['component']).toBe('scheduler');
    expect(entry?.['groupId']).toBe('tg:-100');
    expect(entry?.['token']).toBe(3);
  });

  test('marks circular references instead of throwing', () => {
    const out = captureStderr();
    const logger = createLogger({}, 'debug');
    const obj: { a: number; self?: unknown } = { a: 1 };
    obj.self = obj;
    logger.info('circular', { obj });
    expect(out.lines().at(-1)?.['obj']).toEqual({ a: 1, self: '[Circular]' });
  });
});

describe('errorFields', () => {
  test('includes the cause when present', () => {
    const err = new Error('outer', { cause: new Error('inner') });
    expect(errorFields(err)).toEqual({
      errName: 'Error',
      errMsg: 'outer',
      errCause: 'Error: inner',
    });
  });

  test('stringifies non-errors', () => {
    expect(errorFields('boom')).toEqual({ errMsg: 'boom' });
  });
});

describe('parseLogLevel', () => {
  test('accepts known levels case-insensitively', () => {
    expect(parseLogLevel(' INFO ')).toBe('info');
    expect(parseLogLevel('verbose')).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});
