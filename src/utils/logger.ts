/**
 * Logger Utility
 * Handles console output with different log levels and mirrors every line into the run log file
 */

import { appendFileSync } from "node:fs";
import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "critical";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  critical: 50,
};

export interface LoggerOptions {
  level?: Exclude<LogLevel, "critical">;
  // Receives every line, regardless of the console level
  file?: string | null;
  scope?: string;
  // Silences the console, the log file still gets every line
  quiet?: boolean;
}

export class Logger {
  private level: Exclude<LogLevel, "critical">;
  private file: string | null;
  private scope: string | undefined;
  private quiet: boolean;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.file = options.file ?? null;
    this.scope = options.scope;
    this.quiet = options.quiet ?? false;
  }

  /**
   * Logger for a named collaborator (e.g. a tool), sharing level and log file
   */
  child(scope: string): Logger {
    return new Logger({
      level: this.level,
      file: this.file,
      scope,
      quiet: this.quiet,
    });
  }

  /**
   * Start mirroring into a log file (the file is created on first write)
   */
  setFile(file: string | null): void {
    this.file = file;
  }

  getFile(): string | null {
    return this.file;
  }

  /**
   * Mute or unmute the console (e.g. while a spinner owns the terminal)
   */
  setQuiet(quiet: boolean): void {
    this.quiet = quiet;
  }

  setLevel(level: Exclude<LogLevel, "critical">): void {
    this.level = level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string): void {
    this.write("debug", message);
  }

  info(message: string): void {
    this.write("info", message);
  }

  warn(message: string): void {
    this.write("warn", message);
  }

  error(message: string, error?: unknown): void {
    this.write("error", message);
    if (error !== undefined) {
      this.write("error", error instanceof Error ? (error.stack ?? error.message) : String(error));
    }
  }

  critical(message: string): void {
    this.write("critical", message);
  }

  private write(level: LogLevel, message: string): void {
    const name = this.scope ?? "ocr-trainer";

    if (this.file) {
      const timestamp = new Date().toISOString();
      appendFileSync(
        this.file,
        `${timestamp} - ${level.toUpperCase()} - ${name} - ${message}\n`,
        "utf-8",
      );
    }

    if (this.quiet || !this.isLevelEnabled(level)) {
      return;
    }

    const prefix = this.scope ? chalk.dim(`[${this.scope}] `) : "";
    switch (level) {
      case "debug":
        console.log(`${chalk.dim("[DEBUG]")} ${prefix}${message}`);
        break;
      case "info":
        console.log(`${chalk.cyan("[INFO]")} ${prefix}${message}`);
        break;
      case "warn":
        console.warn(`${chalk.yellow("[WARN]")} ${prefix}${message}`);
        break;
      case "error":
        console.error(`${chalk.red("[ERROR]")} ${prefix}${message}`);
        break;
      case "critical":
        console.error(`${chalk.bgRed.white("[CRITICAL]")} ${prefix}${message}`);
        break;
    }
  }
}
