/**
 * Key light discovery through avahi-browse.
 * Browses for _elg._tcp services and turns the resolved entries into devices,
 * either once (a snapshot) or continuously (the daemon).
 */

import { execFile, spawn } from "child_process";
import { EventEmitter } from "events";
import { createInterface, type Interface } from "readline";
import type { Readable } from "stream";
import { promisify } from "util";
import { parseAnnouncement, safeParseAnnouncement } from "./announcement.js";
import { type Device, DeviceUrlError, resolveDevice, uniqueDevices } from "./device.js";
import { debug, error, log, verbose } from "./log.js";
import { DeviceRegistry } from "./registry.js";

export const DEFAULT_DISCOVERY_COMMAND = "avahi-browse";
export const KEYLIGHT_SERVICE_TYPE = "_elg._tcp";

/** Runs a command to completion and resolves with its stdout. */
export type ExecTool = (
  command: string,
  args: readonly string[],
  signal?: AbortSignal
) => Promise<Buffer>;

export interface ToolProcess {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  once(event: "error", listener: (err: Error) => void): unknown;
  once(event: "close", listener: (code: number | null) => void): unknown;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnTool = (command: string, args: readonly string[]) => ToolProcess;

export interface DiscoveryOptions {
  command?: string;
  service?: string;
  signal?: AbortSignal;
  exec?: ExecTool;
  spawn?: SpawnTool;
}

export class DiscoveryToolNotFoundError extends Error {
  readonly command: string;

  constructor(command: string, options?: { cause?: unknown }) {
    super(`${command} not installed`, options);
    this.name = "DiscoveryToolNotFoundError";
    this.command = command;
  }
}

export class DiscoveryProcessError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DiscoveryProcessError";
  }
}

export function browseArgs(service: string, terminate: boolean): string[] {
  const args = [service, "--parsable", "--resolve"];
  if (terminate) args.push("--terminate");
  return args;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function stderrOf(err: Error): string {
  if ("stderr" in err && Buffer.isBuffer(err.stderr)) {
    return err.stderr.toString("utf8").trim();
  }
  return "";
}

const execFileAsync = promisify(execFile);

const execTool: ExecTool = async (command, args, signal) => {
  const { stdout } = await execFileAsync(command, args, {
    encoding: "buffer",
    maxBuffer: 16 * 1024 * 1024,
    signal,
  });
  return stdout;
};

const spawnTool: SpawnTool = (command, args) =>
  spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });

const STDERR_LIMIT = 4096;

function splitLines(output: string): string[] {
  const lines = output.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/**
 * Runs the discovery command once and returns every resolved device, unique
 * by name in first-seen order.
 *
 * Any line that fails to decode fails the whole call: a partial snapshot is
 * never returned.
 */
export async function discoverDevices(options: DiscoveryOptions = {}): Promise<Device[]> {
  const command = options.command ?? DEFAULT_DISCOVERY_COMMAND;
  const service = options.service ?? KEYLIGHT_SERVICE_TYPE;
  const exec = options.exec ?? execTool;

  let stdout: Buffer;
  try {
    stdout = await exec(command, browseArgs(service, true), options.signal);
  } catch (err: unknown) {
    if (isNotFound(err)) throw new DiscoveryToolNotFoundError(command, { cause: err });
    const detail = err instanceof Error ? stderrOf(err) || err.message : String(err);
    throw new DiscoveryProcessError(`${command} failed: ${detail}`, { cause: err });
  }

  let output: string;
  try {
    output = new TextDecoder("utf-8", { fatal: true }).decode(stdout);
  } catch (err: unknown) {
    throw new DiscoveryProcessError(`${command} output is not valid UTF-8`, { cause: err });
  }

  const devices: Device[] = [];
  for (const line of splitLines(output)) {
    const device = resolveDevice(parseAnnouncement(line));
    if (device) devices.push(device);
  }
  return uniqueDevices(devices);
}

/**
 * Keeps a {@link DeviceRegistry} current from a long-running avahi-browse.
 *
 * Events:
 * - `deviceUp` (device), `deviceDown` (device)
 * - `change` (devices): the new snapshot, after every added or removed device
 * - `exit` (error?): the command is gone; `error` is set when it failed,
 *   including a non-zero exit status
 */
export class DiscoveryDaemon extends EventEmitter {
  #command: string;
  #service: string;
  #spawn: SpawnTool;
  #registry: DeviceRegistry;
  #child: ToolProcess | undefined;
  #lines: Interface | undefined;
  #failure: Error | undefined;
  #stderr = "";
  #exitCode: number | null | undefined;
  #outputDone = false;
  #stopping = false;
  #settle: ((failure: Error | undefined) => void) | undefined;

  /** Settles with the fatal error, if any, once the daemon has stopped. */
  readonly closed: Promise<Error | undefined>;

  constructor(options: Omit<DiscoveryOptions, "exec" | "signal"> & { seed?: Iterable<Device> } = {}) {
    super();
    this.#command = options.command ?? DEFAULT_DISCOVERY_COMMAND;
    this.#service = options.service ?? KEYLIGHT_SERVICE_TYPE;
    this.#spawn = options.spawn ?? spawnTool;
    this.#registry = new DeviceRegistry(options.seed);
    this.closed = new Promise((resolve) => {
      this.#settle = resolve;
    });
  }

  get devices(): readonly Device[] {
    return this.#registry.devices;
  }

  get running(): boolean {
    return this.#child !== undefined && this.#settle !== undefined;
  }

  start(): void {
    if (this.#child) {
      throw new Error("Discovery daemon already started");
    }

    debug(`Starting ${this.#command} for ${this.#service}`);
    const child = this.#spawn(this.#command, browseArgs(this.#service, false));
    this.#child = child;

    child.once("error", (err: Error) => {
      this.#failure ??= isNotFound(err)
        ? new DiscoveryToolNotFoundError(this.#command, { cause: err })
        : new DiscoveryProcessError(`${this.#command} failed: ${err.message}`, { cause: err });
      this.#lines?.close();
    });
    child.once("close", (code: number | null) => {
      this.#exitCode = code;
      this.#maybeFinish();
    });

    const stderr = child.stderr;
    if (stderr) {
      stderr.setEncoding("utf8");
      stderr.on("data", (chunk: string) => {
        this.#stderr = (this.#stderr + chunk).slice(-STDERR_LIMIT);
      });
    }

    const stdout = child.stdout;
    if (!stdout) {
      this.#failure = new DiscoveryProcessError(`${this.#command} has no output stream`);
      this.#finish();
      return;
    }

    const onStreamError = (err: Error): void => {
      this.#failure ??= new DiscoveryProcessError(`Lost ${this.#command} output: ${err.message}`, {
        cause: err,
      });
      this.#lines?.close();
    };
    stdout.once("error", onStreamError);

    const lines = createInterface({ input: stdout, crlfDelay: Infinity });
    this.#lines = lines;
    lines.on("error", onStreamError);
    lines.on("line", (line: string) => this.#handleLine(line));
    lines.once("close", () => {
      this.#lines = undefined;
      this.#outputDone = true;
      this.#maybeFinish();
    });
  }

  /** Kills the discovery process; the daemon then exits without error. */
  stop(): void {
    if (!this.#child) return;
    debug(`Stopping ${this.#command}`);
    this.#stopping = true;
    this.#child.kill("SIGTERM");
    this.#lines?.close();
  }

  #handleLine(line: string): void {
    const parsed = safeParseAnnouncement(line);
    if (!parsed.success) {
      error(`Failed to parse announcement: ${parsed.error.message} (${JSON.stringify(line)})`);
      return;
    }

    verbose("Announcement received:", parsed.data);

    try {
      const change = this.#registry.apply(parsed.data);
      if (change.type === "unchanged") return;
      this.emit(change.type === "added" ? "deviceUp" : "deviceDown", change.device);
      this.emit("change", this.#registry.devices);
    } catch (err: unknown) {
      if (!(err instanceof DeviceUrlError)) throw err;
      error(`Skipping ${parsed.data.base.hostname}: ${err.message}`);
    }
  }

  /** Settles once the output has ended and the exit status is known. */
  #maybeFinish(): void {
    if (!this.#outputDone) return;
    if (this.#failure || this.#stopping || this.#exitCode !== undefined) {
      this.#finish();
    }
  }

  #finish(): void {
    if (!this.#settle) return;
    const settle = this.#settle;
    this.#settle = undefined;
    this.#lines = undefined;

    const code = this.#exitCode;
    if (!this.#failure && !this.#stopping && code !== undefined && code !== null && code !== 0) {
      const detail = this.#stderr.trim();
      this.#failure = new DiscoveryProcessError(
        `${this.#command} exited with status ${code}${detail ? `: ${detail}` : ""}`
      );
    }

    if (this.#failure) {
      error(this.#failure.message);
    } else {
      log(`${this.#command} exited`);
    }
    this.emit("exit", this.#failure);
    settle(this.#failure);
  }
}
