import type { LogLevel } from '../../config.js';

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(bindings: LogFields): Logger;
}

export type LogWriter = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  level: LogLevel;
  format: 'pretty' | 'json';
  bindings?: LogFields;
  write?: LogWriter;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const MASK = '***MASKED***';

const SENSITIVE_KEYS = ['password', 'token', 'secret', 'authorization', 'credential', 'cookie'];

function isSensitiveKey(key: string): boolean {
  const lower = key.toLowerCase();
  return SENSITIVE_KEYS.some((word) => lower.includes(word));
}

/**
 * Replace values under sensitive keys, recursing into plain objects and arrays.
 */
export function maskSensitive(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(maskSensitive);
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value !== null && typeof value === 'object') {
    return maskFields(value);
  }
  return value;
}

export function maskFields(fields: object): LogFields {
  const masked: LogFields = {};
  for (const [key, inner] of Object.entries(fields)) {
    masked[key] = isSensitiveKey(key) ? MASK : maskSensitive(inner);
  }
  return masked;
}

const consoleWriter: LogWriter = (level, line) => {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
};

class ConsoleLogger implements Logger {
  constructor(
    private readonly options: LoggerOptions,
    private readonly bindings: LogFields
  ) {}

  debug(message: string, fields?: LogFields): void {
    this.emit('debug', message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.emit('info', message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.emit('warn', message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.emit('error', message, fields);
  }

  child(bindings: LogFields): Logger {
    return new ConsoleLogger(this.options, { ...this.bindings, ...bindings });
  }

  private emit(level: LogLevel, message: string, fields?: LogFields): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.options.level]) {
      return;
    }

    const payload = maskFields({ ...this.bindings, ...fields });
    const write = this.options.write ?? consoleWriter;
    const timestamp = new Date().toISOString();

    if (this.options.format === 'json') {
      write(level, JSON.stringify({ timestamp, level, message, ...payload }));
      return;
    }

    const extra = Object.keys(payload).length > 0 ? ` ${JSON.stringify(payload)}` : '';
    write(level, `${timestamp} | ${level.toUpperCase().padEnd(5)} | ${message}${extra}`);
  }
}

export function createLogger(options: LoggerOptions): Logger {
  return new ConsoleLogger(options, options.bindings ?? {});
}

/**
 * Logger that drops everything. Handy for scripts and tests that don't assert on logs.
 */
export const silentLogger: Logger = createLogger({
  level: 'error',
  format: 'json',
  write: () => undefined,
});
