/**
 * Shared logger for AppForge services.
 *
 * Every level goes to stderr: stdout belongs to the MCP JSON-RPC stream.
 * LOG_LEVEL picks the threshold, LOG_FORMAT=json switches to one JSON object per line.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * JSON replacer for Error objects, whose own properties are non-enumerable.
 */
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    const obj: Record<string, unknown> = { name: value.name, message: value.message };
    if ('code' in value && value.code !== undefined) obj.code = value.code;
    if (value.stack) obj.stack = value.stack;
    return obj;
  }
  return value;
}

export class Logger {
  private level: LogLevel;
  private format: LogFormat;
  private readonly context: string;

  constructor(context: string = 'appforge') {
    this.context = context;
    const envLevel = process.env.LOG_LEVEL;
    this.level = isLogLevel(envLevel) ? envLevel : 'info';
    this.format = process.env.LOG_FORMAT === 'json' ? 'json' : 'text';
  }

  debug(message: string, data?: unknown): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.write('error', message, data);
  }

  /**
   * Child logger whose context is `parent:context`. Inherits level and format.
   */
  child(context: string): Logger {
    const child = new Logger(`${this.context}:${context}`);
    child.level = this.level;
    child.format = this.format;
    return child;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setFormat(format: LogFormat): void {
    this.format = format;
  }

  private write(level: LogLevel, message: string, data?: unknown): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.level]) return;
    console.error(this.render(level, message, data));
  }

  private render(level: LogLevel, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();
    if (this.format === 'json') {
      const record: Record<string, unknown> = { ts: timestamp, level, context: this.context, msg: message };
      if (data !== undefined) record.data = data;
      return JSON.stringify(record, errorReplacer);
    }
    const base = `[${timestamp}] [${level.toUpperCase()}] [${this.context}] ${message}`;
    return data === undefined ? base : `${base} ${JSON.stringify(data, errorReplacer)}`;
  }
}

/** Default logger instance */
export const logger = new Logger();
