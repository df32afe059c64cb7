// Structured JSON-line logger. Respects LOG_LEVEL (debug | info | warn | error).

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(fields: LogFields): Logger;
}

export function parseLogLevel(raw: string | undefined): LogLevel {
  const value = String(raw ?? '').trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === value) ?? 'info';
}

export function formatLine(level: LogLevel, message: string, fields?: LogFields): string {
  return JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    message,
    ...fields,
  });
}

export function createLogger(level: LogLevel = 'info', bound: LogFields = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(level);

  const log = (at: LogLevel, message: string, fields?: LogFields) => {
    if (LOG_LEVELS.indexOf(at) < threshold) return;
    const line = formatLine(at, message, { ...bound, ...fields });
    if (at === 'error') {
      console.error(line);
    } else if (at === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message, fields) => log('debug', message, fields),
    info: (message, fields) => log('info', message, fields),
    warn: (message, fields) => log('warn', message, fields),
    error: (message, fields) => log('error', message, fields),
    child: (fields) => createLogger(level, { ...bound, ...fields }),
  };
}

/** Discards everything; handy for tests and embedded use. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};

export function errorFields(error: unknown): LogFields {
  return {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  };
}
