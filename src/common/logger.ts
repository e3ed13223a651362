import { Writable } from 'node:stream';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';
export type LogFormat = 'text' | 'json';
export type LogFields = Record<string, unknown>;

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  destination?: Writable;
  scope?: string;
  fields?: LogFields;
}

const LEVEL_VALUES: Record<LogLevel, number> = {
  silent: 100,
  error: 40,
  warn: 30,
  info: 20,
  debug: 10,
};

const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

const DEFAULT_OPTIONS: Required<Pick<LoggerOptions, 'level' | 'format' | 'destination'>> = {
  level: 'info',
  format: 'text',
  destination: process.stderr,
};

function formatScope(scope?: string): string {
  if (!scope) {
    return '';
  }
  return `[${scope}] `;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function parseLogLevel(value?: string): LogLevel | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  if (isLogLevel(normalized)) {
    return normalized;
  }
  throw new Error(`Unsupported log level "${value}". Use one of ${LOG_LEVELS.join(',')}.`);
}

export function parseLogFormat(value?: string): LogFormat | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  if (normalized === 'json' || normalized === 'text') {
    return normalized;
  }
  throw new Error(`Unsupported log format "${value}". Use text or json.`);
}

/**
 * Line-oriented logger. Children share the parent's sink and settings at creation
 * time and prepend their scope; bound fields are merged into every entry.
 *
 * Callers log entity types and counts, never matched values.
 */
export class Logger {
  private level: LogLevel;
  private format: LogFormat;
  private destination: Writable;
  private scope?: string;
  private fields: LogFields;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? DEFAULT_OPTIONS.level;
    this.format = options.format ?? DEFAULT_OPTIONS.format;
    this.destination = options.destination ?? DEFAULT_OPTIONS.destination;
    this.scope = options.scope;
    this.fields = options.fields ?? {};
  }

  child(scope: string, fields: LogFields = {}): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      destination: this.destination,
      scope: this.scope ? `${this.scope}:${scope}` : scope,
      fields: { ...this.fields, ...fields },
    });
  }

  configure(options: LoggerOptions): void {
    if (options.level) {
      this.level = options.level;
    }
    if (options.format) {
      this.format = options.format;
    }
    if (options.destination) {
      this.destination = options.destination;
    }
    if (options.scope !== undefined) {
      this.scope = options.scope;
    }
    if (options.fields) {
      this.fields = { ...this.fields, ...options.fields };
    }
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_VALUES[this.level] <= LEVEL_VALUES[level];
  }

  debug(message: string, metadata: LogFields = {}): void {
    this.write('debug', message, metadata);
  }

  info(message: string, metadata: LogFields = {}): void {
    this.write('info', message, metadata);
  }

  warn(message: string, metadata: LogFields = {}): void {
    this.write('warn', message, metadata);
  }

  error(message: string, metadata: LogFields = {}): void {
    this.write('error', message, metadata);
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, metadata: LogFields) {
    if (!this.isEnabled(level)) {
      return;
    }

    const timestamp = new Date().toISOString();
    const merged = { ...this.fields, ...metadata };
    if (this.format === 'json') {
      const payload = {
        level,
        time: timestamp,
        message,
        scope: this.scope,
        ...merged,
      };
      this.destination.write(`${JSON.stringify(payload)}\n`);
      return;
    }

    const prefix = `${timestamp} ${level.toUpperCase()} `;
    const strMetadata = Object.keys(merged).length > 0 ? ` ${JSON.stringify(merged)}` : '';
    this.destination.write(`${prefix}${formatScope(this.scope)}${message}${strMetadata}\n`);
  }
}

const ignoredEnv: string[] = [];

// bad environment values are reported once and ignored
function fromEnv<T>(name: string, parse: (value?: string) => T | undefined): T | undefined {
  try {
    return parse(process.env[name]);
  } catch (error) {
    ignoredEnv.push(`Ignoring ${name}: ${error instanceof Error ? error.message : String(error)}`);
    return undefined;
  }
}

const globalLogger = new Logger({
  level: fromEnv('PII_VEIL_LOG_LEVEL', parseLogLevel),
  format: fromEnv('PII_VEIL_LOG_FORMAT', parseLogFormat),
});
ignoredEnv.forEach((message) => globalLogger.warn(message));

export function getLogger(scope?: string): Logger {
  return scope ? globalLogger.child(scope) : globalLogger;
}

export function configureLogger(options: LoggerOptions): void {
  globalLogger.configure(options);
}
