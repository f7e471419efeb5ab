import chalk from "chalk";

export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";

const levelRank: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

const LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug", "trace"];

/**
 * Valide un nom de niveau (insensible à la casse). Retourne null si inconnu.
 */
export function parseLogLevel(value: string | undefined): LogLevel | null {
  const v = (value ?? "").trim().toLowerCase();
  return LEVELS.find((level) => level === v) ?? null;
}

let currentLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL) ?? "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return levelRank[level] <= levelRank[currentLevel];
}

function format(level: LogLevel, scope: string | null, message: unknown, args: unknown[]): string {
  const ts = new Date().toISOString();
  const tag = scope ? ` [${scope}]` : "";
  const base = `[${ts}] [${level.toUpperCase()}]${tag}`;
  const text = [message, ...args].map(String).join(" ");
  switch (level) {
    case "error":
      return chalk.red.bold(`${base} ${text}`);
    case "warn":
      return chalk.yellow(`${base} ${text}`);
    case "info":
      return chalk.cyan(`${base} ${text}`);
    case "debug":
      return chalk.gray(`${base} ${text}`);
    case "trace":
      return chalk.magenta(`${base} ${text}`);
  }
}

export interface Logger {
  error(message: unknown, ...args: unknown[]): void;
  warn(message: unknown, ...args: unknown[]): void;
  info(message: unknown, ...args: unknown[]): void;
  debug(message: unknown, ...args: unknown[]): void;
  trace(message: unknown, ...args: unknown[]): void;
}

function makeLogger(scope: string | null): Logger {
  return {
    error: (message, ...args) => {
      if (shouldLog("error")) console.error(format("error", scope, message, args));
    },
    warn: (message, ...args) => {
      if (shouldLog("warn")) console.warn(format("warn", scope, message, args));
    },
    info: (message, ...args) => {
      if (shouldLog("info")) console.log(format("info", scope, message, args));
    },
    debug: (message, ...args) => {
      if (shouldLog("debug")) console.log(format("debug", scope, message, args));
    },
    trace: (message, ...args) => {
      if (shouldLog("trace")) console.log(format("trace", scope, message, args));
    },
  };
}

export const logger: Logger = makeLogger(null);

/**
 * Logger préfixé par un domaine (ex: "midi-out", "follower"). Partage le niveau global.
 */
export function scopedLogger(scope: string): Logger {
  return makeLogger(scope);
}
