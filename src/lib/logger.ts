/**
 * Structured JSON-lines logging on top of the console, so Lambda and the
 * worker process both ship one parseable object per line.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(scope: string): Logger;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

type EmitLevel = Exclude<LogLevel, "silent">;

// Error instances serialize to {} with JSON.stringify.
function serializeContext(context: LogContext): LogContext {
  const out: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    out[key] = value instanceof Error ? value.message : value;
  }
  return out;
}

class ConsoleLogger implements Logger {
  constructor(
    private readonly service: string,
    private readonly minLevel: LogLevel,
    private readonly scope?: string,
  ) {}

  debug(message: string, context?: LogContext): void {
    this.log("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log("warn", message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log("error", message, context);
  }

  child(scope: string): Logger {
    const nested = this.scope ? `${this.scope}.${scope}` : scope;
    return new ConsoleLogger(this.service, this.minLevel, nested);
  }

  private log(level: EmitLevel, message: string, context?: LogContext): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.minLevel]) return;

    const line = JSON.stringify({
      level,
      message,
      timestamp: new Date().toISOString(),
      service: this.service,
      scope: this.scope,
      context: context ? serializeContext(context) : undefined,
    });

    switch (level) {
      case "debug":
        console.debug(line);
        break;
      case "info":
        console.info(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line);
        break;
    }
  }
}

export function createLogger(service: string, minLevel: LogLevel = "info"): Logger {
  return new ConsoleLogger(service, minLevel);
}
