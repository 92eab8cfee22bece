export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const levelWeight: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(bindings: LogContext): Logger;
}

export interface LogSink {
  write(line: string): unknown;
}

/**
 * Line-delimited JSON logger. Child loggers share the sink and level and
 * prepend their bindings to every entry.
 */
export class JsonLogger implements Logger {
  constructor(
    private readonly minLevel: LogLevel = 'info',
    private readonly sink: LogSink = process.stdout,
    private readonly bindings: LogContext = {}
  ) {}

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (levelWeight[level] < levelWeight[this.minLevel]) return;
    const entry = {
      ts: new Date().toISOString(),
      level,
      message,
      ...this.bindings,
      ...context
    };
    // SMTP passwords and webhook URLs are never put in context by callers.
    this.sink.write(`${JSON.stringify(entry)}\n`);
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  child(bindings: LogContext): Logger {
    return new JsonLogger(this.minLevel, this.sink, { ...this.bindings, ...bindings });
  }
}

export const errorContext = (err: unknown): LogContext => ({
  err: err instanceof Error ? err.message : String(err),
  stack: err instanceof Error ? err.stack : undefined
});
