import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
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

export interface LogSink {
  out: (line: string) => void;
  err: (line: string) => void;
}

const consoleSink: LogSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/**
 * Leveled console logger. Info goes to stdout; warnings and errors to stderr.
 */
export function createLogger(level: LogLevel = "info", sink: LogSink = consoleSink): Logger {
  const enabled = (l: LogLevel) => LEVEL_ORDER[l] >= LEVEL_ORDER[level];

  return {
    debug(message) {
      if (enabled("debug")) sink.out(chalk.gray(message));
    },
    info(message) {
      if (enabled("info")) sink.out(message);
    },
    warn(message) {
      if (enabled("warn")) sink.err(chalk.yellow(`warning: ${message}`));
    },
    error(message) {
      if (enabled("error")) sink.err(chalk.red(`error: ${message}`));
    },
  };
}

/** Collects lines instead of printing them. */
export function createMemoryLogger(level: LogLevel = "debug"): Logger & { lines: Array<{ level: LogLevel; message: string }> } {
  const lines: Array<{ level: LogLevel; message: string }> = [];
  const record = (l: LogLevel) => (message: string) => {
    if (LEVEL_ORDER[l] >= LEVEL_ORDER[level]) lines.push({ level: l, message });
  };
  return {
    lines,
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
  };
}
