import chalk from "chalk";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerConfig {
  level: LogLevel;
  quiet: boolean;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

let config: LoggerConfig = {
  level: "info",
  quiet: false,
};

/**
 * Merge `options` into the global logger settings and return the settings
 * that were in effect before, so callers can put them back.
 */
export function configureLogger(options: Partial<LoggerConfig>): LoggerConfig {
  const previous = config;
  config = { ...config, ...options };
  return previous;
}

function shouldLog(level: LogLevel): boolean {
  if (config.quiet && level !== "error") {
    return false;
  }
  return LEVEL_RANK[level] >= LEVEL_RANK[config.level];
}

export function formatMessage(
  level: LogLevel,
  message: string,
  now: Date = new Date(),
): string {
  return `[${now.toISOString()}] [${level.toUpperCase()}] ${message}`;
}

function write(level: LogLevel, message: string, args: unknown[]): void {
  if (!shouldLog(level)) {
    return;
  }
  const extra = args.map((arg) => formatArg(arg)).join(" ");
  const line = extra ? `${message} ${extra}` : message;
  // stderr only; stdout is left to the embedding program
  process.stderr.write(LEVEL_COLORS[level](formatMessage(level, line)) + "\n");
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.message;
  }
  if (typeof arg === "string") {
    return arg;
  }
  return JSON.stringify(arg);
}

export function debug(message: string, ...args: unknown[]): void {
  write("debug", message, args);
}

export function info(message: string, ...args: unknown[]): void {
  write("info", message, args);
}

export function warn(message: string, ...args: unknown[]): void {
  write("warn", message, args);
}

export function error(message: string, ...args: unknown[]): void {
  write("error", message, args);
}

export interface Logger {
  debug: (message: string, ...args: unknown[]) => void;
  info: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
  error: (message: string, ...args: unknown[]) => void;
}

/**
 * Create a logger whose messages carry a `[name]` prefix.
 */
export function createLogger(name: string): Logger {
  const prefix = (message: string): string => `[${name}] ${message}`;
  return {
    debug: (message, ...args) => debug(prefix(message), ...args),
    info: (message, ...args) => info(prefix(message), ...args),
    warn: (message, ...args) => warn(prefix(message), ...args),
    error: (message, ...args) => error(prefix(message), ...args),
  };
}
