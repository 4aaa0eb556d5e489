/**
 * Minimal logging contract used by every component.
 * Any logging library (pino, winston, ...) can be adapted to it.
 */
export interface Logger {
  debug(message: string, context?: object): void;
  info(message: string, context?: object): void;
  warn(message: string, context?: object): void;
  error(message: string, context?: object): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

const levelPriorities: Record<LogLevel, number> = {
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/**
 * Logger that discards everything
 */
export class NullLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

/**
 * Writes to the console, dropping messages below the minimum level.
 */
export class ConsoleLogger implements Logger {
  private minLevel: LogLevel;

  constructor(options: { level?: LogLevel } = {}) {
    this.minLevel = options.level ?? "info";
  }

  private log(level: LogLevel, message: string, context?: object): void {
    if (levelPriorities[level] < levelPriorities[this.minLevel]) {
      return;
    }

    const fullMessage = `[${level.toUpperCase()}] ${message}`;
    if (context && Object.keys(context).length > 0) {
      console[level](fullMessage, context);
    } else {
      console[level](fullMessage);
    }
  }

  debug(message: string, context?: object): void {
    this.log("debug", message, context);
  }

  info(message: string, context?: object): void {
    this.log("info", message, context);
  }

  warn(message: string, context?: object): void {
    this.log("warn", message, context);
  }

  error(message: string, context?: object): void {
    this.log("error", message, context);
  }
}

/**
 * Default logger for a component: warnings and errors only, everything in debug mode.
 */
export function defaultLogger(debug = false): Logger {
  return new ConsoleLogger({ level: debug ? "debug" : "warn" });
}
