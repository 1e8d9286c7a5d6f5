import { randomUUID } from 'node:crypto';
import type { MiddlewareHandler } from 'hono';
import { getEnv } from '../config/env.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  msg: string;
  timestamp: string;
  service: string;
  [key: string]: unknown;
}

/** Receives each serialized entry; defaults to the console method matching the level. */
export type LogSink = (line: string, level: LogLevel) => void;

export interface LoggerOptions {
  level?: LogLevel;
  service?: string;
  workerId?: string;
  sink?: LogSink;
}

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// --- Redaction ---

// Matched as substrings of the lower-cased key
const SECRET_KEYS = [
  'password',
  'secret',
  'api_key',
  'apikey',
  'authorization',
  'cookie',
  'credential',
  'database_url',
  'redis_url',
  'access_token',
  'accesstoken',
  'refresh_token',
  'refreshtoken',
];

// Candidate and posting text is logged by size only
const TEXT_KEYS = new Set(['content', 'postingtext', 'resumetext', 'coverletter']);

const SECRET_PATTERNS = [
  /sk-ant-[a-zA-Z0-9_-]{16,}/g, // Anthropic keys
  /(?:sk|key|token|secret|password)[_-]?[a-zA-Z0-9]{16,}/g,
  /eyJ[a-zA-Z0-9._-]{20,}/g, // JWTs
  /(?:postgres|postgresql|redis|rediss):\/\/[^\s"']+/g,
  /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, // candidate emails
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function redactValue(key: string, value: unknown): unknown {
  if (typeof value !== 'string') return value;

  const lowerKey = key.toLowerCase();
  if (SECRET_KEYS.some((k) => lowerKey.includes(k))) return '[REDACTED]';
  if (TEXT_KEYS.has(lowerKey)) return `[${value.length} chars]`;

  return SECRET_PATTERNS.reduce((text, pattern) => text.replace(pattern, '[REDACTED]'), value);
}

export function redactObject(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isRecord(value)) {
      result[key] = redactObject(value);
    } else if (Array.isArray(value)) {
      result[key] = value.map((item) => (isRecord(item) ? redactObject(item) : redactValue(key, item)));
    } else {
      result[key] = redactValue(key, value);
    }
  }
  return result;
}

const consoleSink: LogSink = (line, level) => {
  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'debug':
      console.debug(line);
      break;
    default:
      console.log(line);
  }
};

// --- Logger ---

/**
 * JSON-lines logger. Children carry bindings such as applicationId, stage or
 * requestId into every entry they write.
 */
export class Logger {
  private readonly level: LogLevel;
  private readonly service: string;
  private readonly sink: LogSink;
  private readonly bindings: Record<string, unknown>;

  constructor(opts: LoggerOptions = {}, bindings: Record<string, unknown> = {}) {
    const env = getEnv();
    this.level = opts.level ?? env.APPLYFLOW_LOG_LEVEL ?? (env.NODE_ENV === 'production' ? 'info' : 'debug');
    this.service = opts.service ?? 'applyflow';
    this.sink = opts.sink ?? consoleSink;
    this.bindings = opts.workerId ? { workerId: opts.workerId, ...bindings } : bindings;
  }

  child(bindings: Record<string, unknown>): Logger {
    return new Logger(
      { level: this.level, service: this.service, sink: this.sink },
      { ...this.bindings, ...bindings },
    );
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.log('debug', msg, data);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.log('info', msg, data);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.log('warn', msg, data);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.log('error', msg, data);
  }

  private log(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
    if (LOG_LEVEL_ORDER[level] < LOG_LEVEL_ORDER[this.level]) return;

    const entry: LogEntry = {
      level,
      msg,
      timestamp: new Date().toISOString(),
      service: this.service,
      ...this.bindings,
      ...(data ? redactObject(data) : {}),
    };
    this.sink(JSON.stringify(entry), level);
  }
}

let defaultLogger: Logger | null = null;

export function getLogger(opts?: LoggerOptions): Logger {
  if (opts) return new Logger(opts);
  if (!defaultLogger) defaultLogger = new Logger();
  return defaultLogger;
}

/** Message of an unknown thrown value, for log payloads. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// --- Request logging ---

export function requestLoggingMiddleware(logger: Logger = getLogger()): MiddlewareHandler {
  return async (c, next) => {
    const requestId = c.req.header('x-request-id') ?? randomUUID();
    const start = Date.now();
    const log = logger.child({ requestId });

    c.header('X-Request-Id', requestId);
    await next();

    const status = c.res.status;
    const data = { method: c.req.method, path: c.req.path, status, durationMs: Date.now() - start };
    if (status >= 500) log.error('request_failed', data);
    else log.info('request_completed', data);
  };
}
