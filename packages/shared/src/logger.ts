import pino from 'pino';

const PII_PATTERNS = new Set([
  'password',
  'passwordhash',
  'password_hash',
  'token',
  'accesstoken',
  'access_token',
  'secret',
  'email',
  'username',
  'ip',
  'ipaddress',
  'remoteaddress',
  'authorization',
  'cookie',
  'body',
]);

function isPiiKey(key: string): boolean {
  return PII_PATTERNS.has(key.toLowerCase());
}

function sanitizeValue(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (value instanceof Date) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(sanitizeValue);
  }
  if (value !== null && typeof value === 'object') {
    return sanitize(Object.fromEntries(Object.entries(value)));
  }
  return value;
}

export function sanitize(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    result[key] = isPiiKey(key) ? '[REDACTED]' : sanitizeValue(value);
  }
  return result;
}

export interface SafeLogger {
  info(meta: Record<string, unknown>, msg: string): void;
  warn(meta: Record<string, unknown>, msg: string): void;
  error(meta: Record<string, unknown>, msg: string): void;
  debug(meta: Record<string, unknown>, msg: string): void;
  fatal(meta: Record<string, unknown>, msg: string): void;
  child(bindings: Record<string, unknown>): SafeLogger;
}

function wrapPino(logger: pino.Logger): SafeLogger {
  return {
    info(meta, msg) {
      logger.info(sanitize(meta), msg);
    },
    warn(meta, msg) {
      logger.warn(sanitize(meta), msg);
    },
    error(meta, msg) {
      logger.error(sanitize(meta), msg);
    },
    debug(meta, msg) {
      logger.debug(sanitize(meta), msg);
    },
    fatal(meta, msg) {
      logger.fatal(sanitize(meta), msg);
    },
    child(bindings) {
      return wrapPino(logger.child(sanitize(bindings)));
    },
  };
}

export function createLogger(opts: { name: string; level?: string }): SafeLogger {
  const pinoInstance = pino({
    name: opts.name,
    level: opts.level ?? process.env.LOG_LEVEL ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
  });
  return wrapPino(pinoInstance);
}
