import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 99 };

// Everything goes to stderr so stdout stays reserved for rendered results.
export function createConsoleLogger(level: LogLevel = "info", scope?: string): Logger {
  const prefix = scope ? `${chalk.gray(`[${scope}]`)} ` : "";
  const enabled = (l: LogLevel) => RANK[l] >= RANK[level];

  return {
    debug: (message) => {
      if (enabled("debug")) console.error(prefix + chalk.gray(message));
    },
    info: (message) => {
      if (enabled("info")) console.error(prefix + chalk.blue(message));
    },
    warn: (message) => {
      if (enabled("warn")) console.error(prefix + chalk.yellow(`Warning: ${message}`));
    },
    error: (message) => {
      if (enabled("error")) console.error(prefix + chalk.red(`Error: ${message}`));
    },
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
