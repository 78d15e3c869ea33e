import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const LEVEL_VALUE: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(msg: string, ctx?: LogFields): void;
  info(msg: string, ctx?: LogFields): void;
  warn(msg: string, ctx?: LogFields): void;
  error(msg: string, ctx?: LogFields): void;
  fatal(msg: string, ctx?: LogFields): void;
  child(bindings: LogFields): Logger;
}

const logContext = new AsyncLocalStorage<LogFields>();

/** Runs `fn` with extra fields merged into every log line emitted inside it. */
export function withLogContext<T>(ctx: LogFields, fn: () => T): T {
  return logContext.run({ ...(logContext.getStore() ?? {}), ...ctx }, fn);
}

export function newCorrelationId(): string {
  return randomUUID();
}

const SENSITIVE_KEYS = new Set([
  'api_key',
  'apikey',
  'authorization',
  'anthropic_api_key',
  'openai_api_key',
  'openrouter_api_key',
  'telegram_bot_token',
  'token',
]);

const isSensitiveKey = (key: string): boolean => {
  const lower = key.toLowerCase();
  return SENSITIVE_KEYS.has(lower) || lower.endsWith('_token') || lower.endsWith('_secret');
};

export const redactString = (input: string): string =>
  input
    .replace(/Bearer\s+[A-Za-z0-9._-]+/gu, 'Bearer [REDACTED]')
    .replace(/bot\d+:[A-Za-z0-9_-]+/gu, 'bot[REDACTED]')
    .replace(/\bsk-[A-Za-z0-9_-]{20,}\b/gu, 'sk-[REDACTED]');

const redactValue = (value: unknown, seen: WeakSet<object>): unknown => {
  if (typeof value === 'string') return redactString(value);
  if (typeof value === 'number' || typeof value === 'boolean' || value == null) return value;
  if (Array.isArray(value)) return value.map((v) => redactValue(v, seen));
  if (typeof value !== 'object') return String(value);

  if (seen.has(value)) return '[Circular]';
  seen.add(value);

  const out: LogFields = {};
  for (const [k, v] of Object.entries(value)) {
    out[k] = isSensitiveKey(k) ? '[REDACTED]' : redactValue(v, seen);
  }
  return out;
};

export function errorFields(err: unknown): LogFields {
  if (err instanceof Error) {
    return {
      errName: err.name,
      errMsg: redactString(err.message),
      ...(err.cause !== undefined ? { errCause: redactString(String(err.cause)) } : {}),
    };
  }
  return { errMsg: redactString(String(err)) };
}

export const parseLogLevel = (raw: string | undefined): LogLevel | undefined => {
  const v = raw?.trim().toLowerCase();
  if (v === 'debug' || v === 'info' || v === 'warn' || v === 'error' || v === 'fatal') return v;
  return undefined;
};

// Production runs opt into info; tests and CLI stay quiet otherwise.
const envLevel = (): LogLevel => parseLogLevel(process.env['CHIMEIN_LOG_LEVEL']) ?? 'warn';

export function createLogger(base: LogFields = {}, threshold: LogLevel = envLevel()): Logger {
  const minLevel = LEVEL_VALUE[threshold];

  const emit = (level: LogLevel, msg: string, ctx?: LogFields): void => {
    if (LEVEL_VALUE[level] < minLevel) return;
    const entry = redactValue(
      {
        level,
        ts: new Date().toISOString(),
        msg,
        ...base,
        ...(logContext.getStore() ?? {}),
        ...(ctx ?? {}),
      },
      new WeakSet<object>(),
    );
    let line: string;
    try {
      line = JSON.stringify(entry);
    } catch (err) {
      line = JSON.stringify({
        level,
        ts: new Date().toISOString(),
        msg: 'logger.stringify_failed',
        originalMsg: msg,
        ...errorFields(err),
      });
    }
    process.stderr.write(`${line}\n`);
  };

  return {
    debug: (msg, ctx) => emit('debug', msg, ctx),
    info: (msg, ctx) => emit('info', msg, ctx),
    warn: (msg, ctx) => emit('warn', msg, ctx),
    error: (msg, ctx) => emit('error', msg, ctx),
    fatal: (msg, ctx) => emit('fatal', msg, ctx),
    child: (bindings) => createLogger({ ...base, ...bindings }, threshold),
  };
}

export const log: Logger = createLogger({ app: 'chimein' });
