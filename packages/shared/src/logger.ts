import pino from 'pino';

const REDACTED_KEYS = new Set([
  'password',
  'passwordhash',
  'token',
  'accesstoken',
  'refreshtoken',
  'secret',
  'jwtsecret',
  'authorization',
  'cookie',
]);

const REDACTED = '[REDACTED]';

function redact(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(redact);
  }
  if (value !== null && typeof value === 'object' && !(value instanceof Date)) {
    const result: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      result[key] = REDACTED_KEYS.has(key.toLowerCase()) ? REDACTED : redact(inner);
    }
    return result;
  }
  return value;
}

function redactMeta(meta: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    result[key] = REDACTED_KEYS.has(key.toLowerCase()) ? REDACTED : redact(value);
  }
  return result;
}

type LogMethod = (meta: Record<string, unknown>, msg: string) => void;

export interface SafeLogger {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  fatal: LogMethod;
  child(bindings: Record<string, unknown>): SafeLogger;
}

function wrap(logger: pino.Logger): SafeLogger {
  return {
    debug: (meta, msg) => logger.debug(redactMeta(meta), msg),
    info: (meta, msg) => logger.info(redactMeta(meta), msg),
    warn: (meta, msg) => logger.warn(redactMeta(meta), msg),
    error: (meta, msg) => logger.error(redactMeta(meta), msg),
    fatal: (meta, msg) => logger.fatal(redactMeta(meta), msg),
    child: (bindings) => wrap(logger.child(redactMeta(bindings))),
  };
}

export function createLogger(opts: {
  name: string;
  level?: string;
  destination?: pino.DestinationStream;
}): SafeLogger {
  const options: pino.LoggerOptions = {
    name: opts.name,
    level: opts.level ?? process.env.LOG_LEVEL ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  return wrap(opts.destination ? pino(options, opts.destination) : pino(options));
}

export { redactMeta };
