/**
 * Console logger for setup commands.
 *
 * Level tags: green info, yellow warnings, red errors, blue echoed commands.
 * Section banners carry the time elapsed since the process started.
 */

import chalk from "chalk";
import type { LogLevel } from "./config.js";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Echo a command line before running it */
  cmd(command: string): void;
  success(message: string): void;
  section(title: string): void;
}

const LEVEL_WEIGHTS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

const RULE = "====================================";

// Process start, for elapsed-time display only
const startedAt = Date.now();

export function formatElapsed(ms: number): string {
  const totalSeconds = Math.max(0, ms) / 1000;
  if (totalSeconds < 60) {
    return `${totalSeconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = Math.floor(totalSeconds % 60);
  return `${minutes}m ${String(seconds).padStart(2, "0")}s`;
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  /** Clock override, used by tests */
  now?: () => number;
  out?: (line: string) => void;
  err?: (line: string) => void;
}

export class ConsoleLogger implements Logger {
  private threshold: number;
  private now: () => number;
  private out: (line: string) => void;
  private err: (line: string) => void;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.threshold = LEVEL_WEIGHTS[options.level ?? "info"];
    this.now = options.now ?? Date.now;
    this.out = options.out ?? ((line) => console.log(line));
    this.err = options.err ?? ((line) => console.error(line));
  }

  setLevel(level: LogLevel): void {
    this.threshold = LEVEL_WEIGHTS[level];
  }

  debug(message: string): void {
    if (this.enabled("debug")) this.out(`${chalk.gray("[DEBUG]")} ${message}`);
  }

  info(message: string): void {
    if (this.enabled("info")) this.out(`${chalk.green("[INFO]")} ${message}`);
  }

  warn(message: string): void {
    if (this.enabled("warn")) this.err(`${chalk.yellow("[WARN]")} ${message}`);
  }

  error(message: string): void {
    if (this.enabled("error")) this.err(`${chalk.red("[ERROR]")} ${message}`);
  }

  cmd(command: string): void {
    if (this.enabled("info")) this.out(`${chalk.blue("[CMD]")} ${command}`);
  }

  success(message: string): void {
    if (this.enabled("info")) this.out(`${chalk.green("[OK]")} ${message}`);
  }

  section(title: string): void {
    if (!this.enabled("info")) return;
    const elapsed = formatElapsed(this.now() - startedAt);
    this.out("");
    this.out(chalk.magenta(RULE));
    this.out(chalk.magenta(` ${title} `) + chalk.dim(`(+${elapsed})`));
    this.out(chalk.magenta(RULE));
    this.out("");
  }

  private enabled(level: Exclude<LogLevel, "silent">): boolean {
    return LEVEL_WEIGHTS[level] >= this.threshold;
  }
}
