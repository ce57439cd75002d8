import type { Writable } from 'node:stream';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  component?: string;
  scope?: string;
  destination?: Writable;
  sink?: (record: LogRecord) => void;
}

export interface LogMeta {
  [key: string]: unknown;
}

export interface LogRecord extends LogMeta {
  timestamp: string;
  level: LogLevel;
  message: string;
  component?: string;
  scope?: string;
}

/**
 * Leveled logger writing to stderr by default, so that command output on
 * stdout (JSON sections, class strings) stays machine-readable.
 *
 * Text lines read `<timestamp> <LEVEL> [component:scope] - message {meta}`;
 * with `json` each record is one JSON line.
 */
export class Logger {
  private readonly options: Required<Pick<LoggerOptions, 'level' | 'json' | 'destination'>> &
    LoggerOptions;

  constructor(options: LoggerOptions = {}) {
    this.options = {
      ...options,
      level: options.level ?? 'info',
      json: options.json ?? false,
      destination: options.destination ?? process.stderr,
    };
  }

  /**
   * Same settings, with the given ones replaced
   */
  child(overrides: LoggerOptions): Logger {
    return new Logger({
      level: overrides.level ?? this.options.level,
      json: overrides.json ?? this.options.json,
      component: overrides.component ?? this.options.component,
      scope: overrides.scope ?? this.options.scope,
      destination: overrides.destination ?? this.options.destination,
      sink: overrides.sink ?? this.options.sink,
    });
  }

  log(level: LogLevel, message: string, meta?: LogMeta) {
    if (LOG_LEVELS.indexOf(level) > LOG_LEVELS.indexOf(this.options.level)) {
      return;
    }

    const { component, scope, sink } = this.options;
    const record: LogRecord = {
      timestamp: new Date().toISOString(),
      level,
      message,
      component,
      scope,
      ...meta,
    };

    this.options.destination.write(this.format(record, meta) + '\n');
    sink?.({ ...record });
  }

  info(message: string, meta?: LogMeta) {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: LogMeta) {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: LogMeta) {
    this.log('error', message, meta);
  }

  debug(message: string, meta?: LogMeta) {
    this.log('debug', message, meta);
  }

  private format(record: LogRecord, meta?: LogMeta): string {
    if (this.options.json) {
      return JSON.stringify(record);
    }

    const label = [this.options.component, this.options.scope].filter(Boolean).join(':');
    return [
      record.timestamp,
      record.level.toUpperCase(),
      label ? `[${label}]` : undefined,
      '-',
      record.message,
      meta && Object.keys(meta).length > 0 ? JSON.stringify(meta) : undefined,
    ]
      .filter((part) => part !== undefined)
      .join(' ');
  }
}

export function createLogger(options?: LoggerOptions): Logger {
  return new Logger({ component: 'uidocs', ...options });
}

export function isLogLevel(input: string): input is LogLevel {
  return LOG_LEVELS.some((level) => level === input);
}

export function normalizeLogLevel(input?: string | null): LogLevel {
  if (!input) {
    return 'info';
  }
  const normalized = input.toLowerCase();
  if (isLogLevel(normalized)) {
    return normalized;
  }
  throw new Error(`Invalid log level: ${input}. Use ${LOG_LEVELS.join(' | ')}.`);
}
