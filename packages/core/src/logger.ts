/**
 * Structured JSON-line logger
 */

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

export type LogSink = (line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  context?: Record<string, unknown>;
  sink?: LogSink;
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const upper = value?.toUpperCase();
  if (upper === 'DEBUG' || upper === 'INFO' || upper === 'WARN' || upper === 'ERROR') {
    return upper;
  }
  return 'INFO';
}

/**
 * Logger with structured output
 */
export class Logger {
  private readonly level: LogLevel;
  private readonly context: Record<string, unknown>;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? parseLogLevel(process.env.LOG_LEVEL);
    this.context = options.context ?? {};
    this.sink = options.sink ?? ((line) => console.log(line));
  }

  /**
   * Logger that merges extra context into every line
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      context: { ...this.context, ...context },
      sink: this.sink,
    });
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('DEBUG', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('INFO', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('WARN', message, data);
  }

  error(message: string, error?: Error, data?: Record<string, unknown>): void {
    this.log('ERROR', message, {
      ...data,
      error: error?.message,
      stack: error?.stack,
    });
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }
    this.sink(
      JSON.stringify({
        level,
        message,
        ...this.context,
        ...data,
        timestamp: new Date().toISOString(),
      })
    );
  }
}

export const logger = new Logger();

/** Logger that drops everything (tests, scripts) */
export const silentLogger = new Logger({ sink: () => undefined });
