/**
 * Leveled console logger with per-component child loggers
 *
 * Quiet by default (`warn`); validation failures are reported at `debug`
 * since they are also thrown to the caller.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "off";

const LEVEL_ORDER: readonly LogLevel[] = ["debug", "info", "warn", "error", "off"];

export interface ComponentLogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export class Logger {
  private static instance: Logger | undefined;
  private level: LogLevel = "warn";

  static getInstance(): Logger {
    if (Logger.instance === undefined) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  configure(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  createLogger(component: string): ComponentLogger {
    return {
      debug: (message, ...args) => this.log("debug", component, message, args),
      info: (message, ...args) => this.log("info", component, message, args),
      warn: (message, ...args) => this.log("warn", component, message, args),
      error: (message, ...args) => this.log("error", component, message, args),
    };
  }

  private log(level: Exclude<LogLevel, "off">, component: string, message: string, args: unknown[]): void {
    if (LEVEL_ORDER.indexOf(level) < LEVEL_ORDER.indexOf(this.level)) return;

    const prefix = `[${new Date().toISOString()}] [${level.toUpperCase()}] [${component}]`;
    switch (level) {
      case "debug":
        console.debug(prefix, message, ...args);
        break;
      case "info":
        console.info(prefix, message, ...args);
        break;
      case "warn":
        console.warn(prefix, message, ...args);
        break;
      case "error":
        console.error(prefix, message, ...args);
        break;
    }
  }
}

export const logger = Logger.getInstance();

/**
 * Set the library-wide log level
 */
export function configureLogging(level: LogLevel): void {
  logger.configure(level);
}

export function createLogger(component: string): ComponentLogger {
  return logger.createLogger(component);
}
