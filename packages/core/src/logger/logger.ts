export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export class ConsoleLogger implements Logger {
  private level: LogLevel;
  private prefix: string;

  constructor(prefix: string = "", level: LogLevel = "info") {
    this.prefix = prefix;
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    const currentLevelIndex = LEVELS.indexOf(this.level);
    const messageLevelIndex = LEVELS.indexOf(level);

    return currentLevelIndex <= messageLevelIndex && this.level !== "silent";
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog("debug")) {
      console.log(`${this.prefix}${message}`, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog("info")) {
      console.log(`${this.prefix}${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog("warn")) {
      console.warn(`${this.prefix}${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog("error")) {
      console.error(`${this.prefix}${message}`, ...args);
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && (LEVELS as readonly string[]).includes(value);
}

/**
 * Creates a prefixed console logger.
 *
 * Level resolution: explicit argument, then `silent` under NODE_ENV=test,
 * then LOG_LEVEL when it names a known level, then `info`.
 */
export function createLogger(prefix: string = "", level?: LogLevel): Logger {
  if (level) {
    return new ConsoleLogger(prefix, level);
  }
  if (process.env['NODE_ENV'] === "test") {
    return new ConsoleLogger(prefix, "silent");
  }
  const fromEnv = process.env['LOG_LEVEL'];
  return new ConsoleLogger(prefix, isLogLevel(fromEnv) ? fromEnv : "info");
}

export const logger = createLogger("[k7] ");
