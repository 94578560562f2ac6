/**
 * Logging Service
 *
 * Centralized logging with:
 * - Log levels (debug, info, warn, error)
 * - Contextual prefixes
 * - LOG_LEVEL / NODE_ENV aware defaults
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export interface LogEntry {
  level: LogLevel;
  timestamp: string;
  context: string;
  message: string;
  data?: unknown;
}

export type LogCallback = (entry: LogEntry) => void;

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

/** Resolve the level from LOG_LEVEL, falling back to NODE_ENV. */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const explicit = env.LOG_LEVEL?.trim().toLowerCase();
  if (explicit && explicit in LEVEL_NAMES) {
    return LEVEL_NAMES[explicit] ?? LogLevel.INFO;
  }
  switch (env.NODE_ENV) {
    case 'production':
      return LogLevel.WARN;
    case 'test':
      return LogLevel.ERROR;
    default:
      return LogLevel.DEBUG;
  }
}

export class Logger {
  private level: LogLevel;
  private readonly context: string;
  private readonly callbacks: LogCallback[];

  constructor(context: string = 'App', level?: LogLevel, callbacks: LogCallback[] = []) {
    this.context = context;
    this.level = level ?? resolveLogLevel();
    this.callbacks = callbacks;
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    const entry: LogEntry = {
      level,
      timestamp: new Date().toISOString(),
      context: this.context,
      message,
      data,
    };

    // Callbacks see every entry, the console only what passes the level
    this.callbacks.forEach(cb => cb(entry));

    if (level < this.level) return;

    const prefix = `[${this.context}]`;
    const args = data !== undefined ? [prefix, message, data] : [prefix, message];

    switch (level) {
      case LogLevel.DEBUG:
        console.debug(...args);
        break;
      case LogLevel.INFO:
        console.info(...args);
        break;
      case LogLevel.WARN:
        console.warn(...args);
        break;
      case LogLevel.ERROR:
        console.error(...args);
        break;
    }
  }

  debug(message: string, data?: unknown): void {
    this.log(LogLevel.DEBUG, message, data);
  }

  info(message: string, data?: unknown): void {
    this.log(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log(LogLevel.WARN, message, data);
  }

  error(message: string, data?: unknown): void {
    this.log(LogLevel.ERROR, message, data);
  }

  /** Create a child logger with a sub-context. Callbacks are shared with the parent. */
  child(subContext: string): Logger {
    return new Logger(`${this.context}:${subContext}`, this.level, this.callbacks);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /** Add a callback for external sinks (task event streams, tests) */
  addCallback(callback: LogCallback): void {
    this.callbacks.push(callback);
  }

  removeCallback(callback: LogCallback): void {
    const index = this.callbacks.indexOf(callback);
    if (index > -1) {
      this.callbacks.splice(index, 1);
    }
  }
}

export function createLogger(context: string): Logger {
  return new Logger(context);
}

export const logger = new Logger('Dubbing');

// Pre-configured loggers for common contexts
export const serverLogger = new Logger('Server');
export const timingLogger = new Logger('Timing');
export const synthesisLogger = new Logger('Synthesis');
export const mergeLogger = new Logger('Merge');
export const ffmpegLogger = new Logger('FFmpeg');
export const geminiLogger = new Logger('Gemini');

export default logger;
