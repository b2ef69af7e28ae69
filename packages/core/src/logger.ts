// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import chalk from "chalk";

export const LOG_LEVELS = ["DEBUG", "INFO", "WARNING", "ERROR"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

export function isLogLevel(value: string): value is LogLevel {
  const known: readonly string[] = LOG_LEVELS;
  return known.includes(value);
}

/** Scoped console logger: `[scope] message`, coloured by level. */
export function createLogger(scope: string, level: LogLevel = "INFO"): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const enabled = (l: LogLevel) => LOG_LEVELS.indexOf(l) >= threshold;
  const prefix = `[${scope}]`;

  return {
    debug(message) {
      if (enabled("DEBUG")) console.log(chalk.gray(`${prefix} ${message}`));
    },
    info(message) {
      if (enabled("INFO")) console.log(`${chalk.cyan(prefix)} ${message}`);
    },
    warn(message) {
      if (enabled("WARNING")) console.warn(chalk.yellow(`${prefix} ${message}`));
    },
    error(message, err) {
      if (!enabled("ERROR")) return;
      const detail = err instanceof Error ? `: ${err.message}` : err !== undefined ? `: ${String(err)}` : "";
      console.error(chalk.red(`${prefix} ${message}${detail}`));
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
