/**
 * Levelled logger used by the dispatcher, the scheduler and the CLI.
 * Console output is coloured with chalk and goes to stderr so that
 * `--json` reports on stdout stay machine-readable.
 */

import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  /** Lowest level written. Defaults to "info". */
  level?: LogLevel;
  /** Where lines go. Defaults to process.stderr. */
  write?: (line: string) => void;
  /** Prefix timestamps to each line. Defaults to true. */
  timestamps?: boolean;
}

const LEVEL_STYLE: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_RANK, value);
}

function makeLogger(minLevel: LogLevel, emit: (level: LogLevel, message: string) => void): Logger {
  const log = (level: LogLevel) => (message: string) => {
    if (LEVEL_RANK[level] >= LEVEL_RANK[minLevel]) {
      emit(level, message);
    }
  };
  return {
    debug: log("debug"),
    info: log("info"),
    warn: log("warn"),
    error: log("error"),
  };
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  const timestamps = options.timestamps ?? true;

  return makeLogger(options.level ?? "info", (level, message) => {
    const tag = LEVEL_STYLE[level](`[${level.toUpperCase()}]`);
    write(timestamps ? `${chalk.dim(new Date().toISOString())} ${tag} ${message}` : `${tag} ${message}`);
  });
}

export interface MemoryLogger extends Logger {
  /** Every line logged so far, formatted as "[LEVEL] message" */
  readonly lines: string[];
}

/** Logger that keeps its lines in memory */
export function createMemoryLogger(level: LogLevel = "debug"): MemoryLogger {
  const lines: string[] = [];
  const logger = makeLogger(level, (lvl, message) => {
    lines.push(`[${lvl.toUpperCase()}] ${message}`);
  });
  return { ...logger, lines };
}

/** Send every line to each of the given loggers */
export function teeLogger(...loggers: Logger[]): Logger {
  return {
    debug: (m) => loggers.forEach((l) => l.debug(m)),
    info: (m) => loggers.forEach((l) => l.info(m)),
    warn: (m) => loggers.forEach((l) => l.warn(m)),
    error: (m) => loggers.forEach((l) => l.error(m)),
  };
}
