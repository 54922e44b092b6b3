/**
 * Level-filtered logging to the console, an optional log file, and an
 * optional sink that replaces the console while the dashboard owns the screen.
 */

import fs from "fs";
import { format } from "util";

export enum LogLevel {
  Verbose = 0,
  Debug = 1,
  Log = 2,
  Error = 3,
  Silent = 4,
}

export const LOG_LEVEL_NAMES = ["verbose", "debug", "log", "error", "silent"] as const;

export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number];

export type LogSink = (level: LogLevel, message: string) => void;

let consoleLevel: LogLevel = LogLevel.Log;
let logFile: fs.WriteStream | undefined;
let sink: LogSink | undefined;

export function parseLogLevel(name: LogLevelName): LogLevel {
  switch (name) {
    case "verbose":
      return LogLevel.Verbose;
    case "debug":
      return LogLevel.Debug;
    case "log":
      return LogLevel.Log;
    case "error":
      return LogLevel.Error;
    case "silent":
      return LogLevel.Silent;
  }
}

export function isLogLevelName(value: string): value is LogLevelName {
  return LOG_LEVEL_NAMES.some((name) => name === value);
}

export function setConsoleLevel(level: LogLevel): void {
  consoleLevel = level;
}

export function getConsoleLevel(): LogLevel {
  return consoleLevel;
}

export function setLogFile(filePath: string | null): void {
  if (logFile) {
    logFile.end();
    logFile = undefined;
  }
  if (filePath) {
    const stream = fs.createWriteStream(filePath, { flags: "a" });
    stream.on("error", (err: Error) => {
      if (logFile === stream) logFile = undefined;
      error(`Failed to open log file ${filePath}: ${err.message}`);
    });
    logFile = stream;
  }
}

export function setLogSink(next: LogSink | undefined): void {
  sink = next;
}

function formatLine(levelName: string, message: string): string {
  return `[${new Date().toISOString()}] [${levelName}] ${message}`;
}

function doLog(
  level: LogLevel,
  levelName: string,
  consoleMethod: (...args: unknown[]) => void,
  args: unknown[]
): void {
  const message = format(...args);

  if (logFile) {
    logFile.write(formatLine(levelName, message) + "\n");
  }

  if (level < consoleLevel) return;

  if (sink) {
    sink(level, message);
  } else {
    consoleMethod(message);
  }
}

export function verbose(...args: unknown[]): void {
  doLog(LogLevel.Verbose, "VERBOSE", console.log, args);
}

export function debug(...args: unknown[]): void {
  doLog(LogLevel.Debug, "DEBUG", console.log, args);
}

export function log(...args: unknown[]): void {
  doLog(LogLevel.Log, "INFO", console.log, args);
}

export function error(...args: unknown[]): void {
  doLog(LogLevel.Error, "ERROR", console.error, args);
}

/** Closes the log file; resolves once its pending lines are written. */
export function closeLogger(): Promise<void> {
  const stream = logFile;
  logFile = undefined;
  if (!stream) return Promise.resolve();
  return new Promise((resolve) => {
    stream.end(() => resolve());
  });
}
