import { mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import path from "path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import {
  LogLevel,
  closeLogger,
  debug,
  error,
  getConsoleLevel,
  isLogLevelName,
  log,
  parseLogLevel,
  setConsoleLevel,
  setLogFile,
  setLogSink,
  verbose,
} from "../log.js";

afterEach(() => {
  setLogSink(undefined);
  setConsoleLevel(LogLevel.Log);
  vi.restoreAllMocks();
});

describe("log levels", () => {
  it("parses level names", () => {
    expect(parseLogLevel("verbose")).toBe(LogLevel.Verbose);
    expect(parseLogLevel("error")).toBe(LogLevel.Error);
    expect(parseLogLevel("silent")).toBe(LogLevel.Silent);
  });

  it("recognizes level names", () => {
    expect(isLogLevelName("debug")).toBe(true);
    expect(isLogLevelName("warn")).toBe(false);
  });

  it("starts at the log level", () => {
    expect(getConsoleLevel()).toBe(LogLevel.Log);
  });
});

describe("log sink", () => {
  it("receives formatted messages at or above the console level", () => {
    const sink = vi.fn();
    setLogSink(sink);
    setConsoleLevel(LogLevel.Debug);

    verbose("hidden");
    debug("found %d lights", 2);
    error("lost", "Desk Light");

    expect(sink.mock.calls).toEqual([
      [LogLevel.Debug, "found 2 lights"],
      [LogLevel.Error, "lost Desk Light"],
    ]);
  });

  it("receives nothing when silent", () => {
    const sink = vi.fn();
    setLogSink(sink);
    setConsoleLevel(LogLevel.Silent);

    error("boom");

    expect(sink).not.toHaveBeenCalled();
  });
});

describe("console output", () => {
  it("writes errors to stderr and the rest to stdout", () => {
    const out = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const err = vi.spyOn(console, "error").mockImplementation(() => undefined);

    log("ready");
    debug("not shown");
    error("failed");

    expect(out.mock.calls).toEqual([["ready"]]);
    expect(err.mock.calls).toEqual([["failed"]]);
  });
});

describe("log file", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), "keylight-log-"));
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await closeLogger();
    rmSync(dir, { recursive: true, force: true });
  });

  it("has every line on disk once closed", async () => {
    const file = path.join(dir, "keylight.log");
    setLogFile(file);

    debug("below the console level");
    log("hello");
    await closeLogger();

    const lines = readFileSync(file, "utf8").split("\n");
    expect(lines).toHaveLength(3);
    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[DEBUG\] below the console level$/);
    expect(lines[1]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[INFO\] hello$/);
    expect(lines[2]).toBe("");
  });

  it("reports a file that can't be opened and keeps logging", async () => {
    const err = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const file = path.join(dir, "missing", "keylight.log");
    setLogFile(file);

    log("hello");
    await vi.waitFor(() => {
      expect(err).toHaveBeenCalledWith(
        `Failed to open log file ${file}: ENOENT: no such file or directory, open '${file}'`
      );
    });

    log("still here");
    expect(console.log).toHaveBeenLastCalledWith("still here");
    await expect(closeLogger()).resolves.toBeUndefined();
  });
});
