/**
 * Logger Utility
 *
 * Structured, levelled logging to a pluggable sink.
 * Supports log levels: DEBUG, INFO, WARN, ERROR.
 *
 * The CLI writes to <dataDir>/sql-coach.log so log lines never
 * interleave with the REPL output.
 */

import * as fs from "fs";
import * as path from "path";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LOG_LEVEL_LABELS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "DEBUG",
  [LogLevel.INFO]: "INFO",
  [LogLevel.WARN]: "WARN",
  [LogLevel.ERROR]: "ERROR",
};

const LEVEL_BY_NAME: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

export function parseLogLevel(name: string): LogLevel | undefined {
  return LEVEL_BY_NAME[name.toLowerCase()];
}

export interface LogSink {
  appendLine(line: string): void;
}

/**
 * Appends to a file, creating its directory on first write.
 * The first failed write turns file logging off for the rest of the run.
 */
export class FileLogSink implements LogSink {
  private _dirReady = false;
  private _disabled = false;

  constructor(private readonly _filePath: string) {}

  get disabled(): boolean {
    return this._disabled;
  }

  appendLine(line: string): void {
    if (this._disabled) { return; }
    try {
      if (!this._dirReady) {
        fs.mkdirSync(path.dirname(this._filePath), { recursive: true });
        this._dirReady = true;
      }
      fs.appendFileSync(this._filePath, line + "\n", "utf-8");
    } catch (err) {
      this._disabled = true;
      const reason = err instanceof Error ? err.message : String(err);
      console.warn(`[sql-coach] Cannot write log file ${this._filePath}, file logging is off: ${reason}`);
    }
  }
}

export class MemoryLogSink implements LogSink {
  readonly lines: string[] = [];

  appendLine(line: string): void {
    this.lines.push(line);
  }
}

export class Logger {
  constructor(
    private readonly _sink: LogSink,
    private readonly _minLevel: LogLevel = LogLevel.INFO,
  ) {}

  private format(level: LogLevel, message: string, ...args: unknown[]): string {
    const timestamp = new Date().toISOString();
    const levelLabel = LOG_LEVEL_LABELS[level];
    const argsStr = args.length > 0 ? " " + args.map((a) => JSON.stringify(a)).join(" ") : "";
    return `[${timestamp}] [${levelLabel}] ${message}${argsStr}`;
  }

  private log(level: LogLevel, message: string, ...args: unknown[]): void {
    if (level < this._minLevel) { return; }
    this._sink.appendLine(this.format(level, message, ...args));
  }

  debug(message: string, ...args: unknown[]): void {
    this.log(LogLevel.DEBUG, message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log(LogLevel.INFO, message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log(LogLevel.WARN, message, ...args);
  }

  error(message: string, error?: Error, ...args: unknown[]): void {
    const allArgs = error ? [error.message, ...args] : args;
    this.log(LogLevel.ERROR, message, ...allArgs);
    if (error?.stack && LogLevel.ERROR >= this._minLevel) {
      this._sink.appendLine(error.stack);
    }
  }
}
