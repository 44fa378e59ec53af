export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export interface LogContext {
  documentId?: string;
  backend?: string;
  event?: string;
  [key: string]: unknown;
}

function parseLevel(raw: string | undefined): LogLevel {
  switch ((raw ?? 'info').toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Console-backed logger. Level comes from `LOG_LEVEL`, JSON lines output from `LOG_STRUCTURED=true`.
 */
export class Logger {
  private static instance: Logger | undefined;
  private logLevel: LogLevel;
  private structured: boolean;

  private constructor(private readonly namespace?: string) {
    this.logLevel = parseLevel(process.env['LOG_LEVEL']);
    this.structured = (process.env['LOG_STRUCTURED'] ?? 'false').toLowerCase() === 'true';
  }

  static getInstance(namespace?: string): Logger {
    if (namespace) return new Logger(namespace);
    if (!Logger.instance) Logger.instance = new Logger();
    return Logger.instance;
  }

  child(namespace: string): Logger {
    return new Logger(this.namespace ? `${this.namespace}:${namespace}` : namespace);
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  setStructured(enabled: boolean): void {
    this.structured = enabled;
  }

  debug(message: string, context?: LogContext): void {
    if (this.shouldLog(LogLevel.DEBUG)) console.log(this.formatMessage('DEBUG', message, context));
  }

  info(message: string, context?: LogContext): void {
    if (this.shouldLog(LogLevel.INFO)) console.log(this.formatMessage('INFO', message, context));
  }

  warn(message: string, context?: LogContext): void {
    if (this.shouldLog(LogLevel.WARN)) console.warn(this.formatMessage('WARN', message, context));
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    if (!this.shouldLog(LogLevel.ERROR)) return;
    const errorContext: LogContext = {
      ...context,
      error: error instanceof Error ? { name: error.name, message: error.message, stack: error.stack } : error,
    };
    console.error(this.formatMessage('ERROR', message, errorContext));
  }

  private shouldLog(level: LogLevel): boolean {
    return level >= this.logLevel;
  }

  private formatMessage(level: string, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    if (this.structured) {
      return JSON.stringify({
        timestamp,
        level,
        message,
        ...(this.namespace ? { namespace: this.namespace } : {}),
        ...(context ? { context } : {}),
      });
    }
    const prefix = this.namespace ? ` [${this.namespace}]` : '';
    const contextStr = context ? ` ${JSON.stringify(context)}` : '';
    return `${timestamp} ${level}${prefix} ${message}${contextStr}`;
  }
}

export const logger = Logger.getInstance();
