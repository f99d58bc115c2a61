/**
 * Structured console logger: one JSON line per entry.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  /** Logger that adds `bindings` to every entry. */
  child(bindings: LogMeta): Logger;
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function write(level: LogLevel, message: string, meta: LogMeta): void {
  const entry = {
    level,
    message,
    ...meta,
    timestamp: new Date().toISOString(),
  };
  const line = JSON.stringify(entry);
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function createLogger(minLevel: LogLevel = 'info', bindings: LogMeta = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(minLevel);
  const log = (level: LogLevel, message: string, meta?: LogMeta): void => {
    if (LOG_LEVELS.indexOf(level) < threshold) return;
    write(level, message, meta && Object.keys(meta).length > 0 ? { ...bindings, ...meta } : bindings);
  };
  return {
    debug: (message, meta) => log('debug', message, meta),
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, meta) => log('error', message, meta),
    child: (extra) => createLogger(minLevel, { ...bindings, ...extra }),
  };
}

/** Serialises an unknown thrown value for log metadata. */
export function errorMeta(e: unknown): LogMeta {
  if (e instanceof Error) return { error: e.message, stack: e.stack };
  return { error: String(e) };
}
