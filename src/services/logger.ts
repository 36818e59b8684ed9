export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(context: LogContext): Logger;
}

function formatContext(context: LogContext): string {
  const parts = Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`);
  return parts.length > 0 ? ` ${parts.join(' ')}` : '';
}

export class ConsoleLogger implements Logger {
  constructor(
    private debugEnabled: boolean = false,
    private baseContext: LogContext = {}
  ) {}

  debug(message: string, context?: LogContext): void {
    if (this.debugEnabled) {
      this.write('debug', message, context);
    }
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

  child(context: LogContext): Logger {
    return new ConsoleLogger(this.debugEnabled, { ...this.baseContext, ...context });
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    const line = `[${level.toUpperCase()}] ${message}${formatContext({ ...this.baseContext, ...context })}`;
    if (level === 'warn' || level === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}
