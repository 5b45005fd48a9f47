export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

class ConsoleLogger implements Logger {
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
}

/**
 * Resolves the effective level: explicit argument, then silent under tests,
 * then LOG_LEVEL, then info.
 */
export function resolveLogLevel(level?: LogLevel): LogLevel {
  if (level) return level;
  if (process.env['NODE_ENV'] === "test") return "silent";
  const fromEnv = process.env['LOG_LEVEL'];
  return isLogLevel(fromEnv) ? fromEnv : "info";
}

const registry = new Set<ConsoleLogger>();

export function createLogger(prefix: string = "", level?: LogLevel): Logger {
  const created = new ConsoleLogger(prefix, resolveLogLevel(level));
  registry.add(created);
  return created;
}

/**
 * Changes the level of every logger created so far, e.g. from a CLI flag.
 */
export function setLogLevel(level: LogLevel): void {
  for (const created of registry) {
    created.setLevel(level);
  }
}

export const logger = createLogger("[rootsign] ");
