/**
 * Command-line parsing and the one-off commands (everything but the
 * dashboard).
 */

import {
  type LightAction,
  BrightnessSchema,
  TemperatureSchema,
  controlLight,
  fetchStatus,
  lightsUrl,
  temperatureToKelvin,
} from "./api.js";
import type { Config } from "./config.js";
import { type Device, buildDeviceUrl, formatDevice } from "./device.js";
import { discoverDevices } from "./discovery.js";
import { type LogLevelName, debug, isLogLevelName } from "./log.js";

export const BRIGHTNESS_STEP = 10;
export const TEMPERATURE_STEP = 20;

export const LIGHT_COMMANDS = [
  "status",
  "on",
  "off",
  "toggle",
  "brighter",
  "dimmer",
  "warmer",
  "cooler",
  "set",
] as const;

export type LightCommand = (typeof LIGHT_COMMANDS)[number];

export type Command = "dashboard" | "discover" | LightCommand;

export interface CliOptions {
  command: Command;
  host?: string;
  port?: number;
  device?: string;
  brightness?: number;
  temperature?: number;
  interval?: number;
  discovery?: boolean;
  config?: string;
  logLevel?: LogLevelName;
  logFile?: string;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export const USAGE = `
Key Light TUI: control network key lights from the terminal

Usage:
  keylight-tui [options]                 Dashboard with live discovery
  keylight-tui discover                  List lights found on the network
  keylight-tui <command> [options]       Control one light

Commands:
  status                  Print the light status as JSON
  on, off, toggle         Switch the light
  brighter, dimmer        Brightness +/- ${BRIGHTNESS_STEP}
  warmer, cooler          Color temperature +/- ${TEMPERATURE_STEP}
  set -b N -t N           Set brightness (0-100) and/or temperature (143-344)

Options:
  --host H, --port P      Address of the light (skips discovery)
  --device, -n NAME       Pick a discovered light by name (default: the first)
  --brightness, -b N      Brightness for "set"
  --temperature, -t N     Temperature for "set"
  --interval, -i N        Dashboard polling interval in seconds
  --no-discovery          Dashboard without continuous discovery
  --config, -c FILE       JSON config file
  --log-level, -l LEVEL   silent, error, log, debug, verbose
  --log-file, -f FILE     Append logs to FILE
  --help, -h              Show this help message
`;

function isLightCommand(value: string): value is LightCommand {
  return LIGHT_COMMANDS.some((command) => command === value);
}

function integer(option: string, value: string | undefined): number {
  const n = Number(value);
  if (value === undefined || value === "" || !Number.isInteger(n)) {
    throw new UsageError(`Invalid value for ${option}: ${value ?? "(missing)"}`);
  }
  return n;
}

function text(option: string, value: string | undefined): string {
  if (value === undefined || value.startsWith("-")) {
    throw new UsageError(`Missing value for ${option}`);
  }
  return value;
}

export function parseArgs(argv: string[]): CliOptions {
  const opts: CliOptions = { command: "dashboard", help: false };
  let commandSeen = false;

  const args = argv.slice(2);
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case "--host":
        opts.host = text(arg, args[++i]);
        break;
      case "--port": {
        const port = integer(arg, args[++i]);
        if (port < 1 || port > 0xffff) {
          throw new UsageError(`Invalid value for ${arg}: ${port}`);
        }
        opts.port = port;
        break;
      }
      case "--device":
      case "-n":
        opts.device = text(arg, args[++i]);
        break;
      case "--brightness":
      case "-b": {
        const result = BrightnessSchema.safeParse(integer(arg, args[++i]));
        if (!result.success) {
          throw new UsageError(`Brightness must be an integer from 0 to 100`);
        }
        opts.brightness = result.data;
        break;
      }
      case "--temperature":
      case "-t": {
        const result = TemperatureSchema.safeParse(integer(arg, args[++i]));
        if (!result.success) {
          throw new UsageError(`Temperature must be an integer from 143 to 344`);
        }
        opts.temperature = result.data;
        break;
      }
      case "--interval":
      case "-i": {
        const interval = integer(arg, args[++i]);
        if (interval < 1) {
          throw new UsageError(`Invalid interval: ${interval}`);
        }
        opts.interval = interval;
        break;
      }
      case "--no-discovery":
        opts.discovery = false;
        break;
      case "--config":
      case "-c":
        opts.config = text(arg, args[++i]);
        break;
      case "--log-level":
      case "-l": {
        const level = text(arg, args[++i]);
        if (!isLogLevelName(level)) {
          throw new UsageError(`Unknown log level: ${level}`);
        }
        opts.logLevel = level;
        break;
      }
      case "--log-file":
      case "-f":
        opts.logFile = text(arg, args[++i]);
        break;
      case "--help":
      case "-h":
        opts.help = true;
        break;
      default:
        if (arg.startsWith("-")) {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        if (commandSeen) {
          throw new UsageError(`Unexpected argument: ${arg}`);
        }
        if (arg !== "discover" && !isLightCommand(arg)) {
          throw new UsageError(`Unknown command: ${arg}`);
        }
        opts.command = arg;
        commandSeen = true;
    }
  }

  if (opts.command === "set" && opts.brightness === undefined && opts.temperature === undefined) {
    throw new UsageError(`"set" needs --brightness and/or --temperature`);
  }
  if ((opts.host === undefined) !== (opts.port === undefined)) {
    throw new UsageError("--host and --port go together");
  }

  return opts;
}

export function actionFor(
  command: Exclude<LightCommand, "status">,
  opts: Pick<CliOptions, "brightness" | "temperature">
): LightAction {
  switch (command) {
    case "on":
      return { type: "power", on: true };
    case "off":
      return { type: "power", on: false };
    case "toggle":
      return { type: "toggle" };
    case "brighter":
      return { type: "brightness", delta: BRIGHTNESS_STEP };
    case "dimmer":
      return { type: "brightness", delta: -BRIGHTNESS_STEP };
    case "warmer":
      return { type: "temperature", delta: TEMPERATURE_STEP };
    case "cooler":
      return { type: "temperature", delta: -TEMPERATURE_STEP };
    case "set":
      return { type: "set", brightness: opts.brightness, temperature: opts.temperature };
  }
}

export function pickDevice(devices: readonly Device[], name?: string): Device {
  if (devices.length === 0) {
    throw new Error("No key light found on the network");
  }
  if (name === undefined) {
    return devices[0];
  }
  const device = devices.find((d) => d.name === name);
  if (!device) {
    throw new Error(`No key light named "${name}" (found: ${devices.map((d) => d.name).join(", ")})`);
  }
  return device;
}

async function targetUrl(opts: CliOptions, config: Config): Promise<string> {
  if (opts.host !== undefined && opts.port !== undefined) {
    return buildDeviceUrl(opts.host, opts.port);
  }
  const devices = await discoverDevices({
    command: config.get("discovery.command"),
    service: config.get("discovery.service"),
  });
  const device = pickDevice(devices, opts.device);
  debug(`Using ${formatDevice(device)}`);
  return device.url;
}

/**
 * Runs a non-dashboard command and returns what it prints.
 */
export async function runCommand(
  opts: CliOptions & { command: Exclude<Command, "dashboard"> },
  config: Config
): Promise<string> {
  if (opts.command === "discover") {
    const devices = await discoverDevices({
      command: config.get("discovery.command"),
      service: config.get("discovery.service"),
    });
    return devices.map(formatDevice).join("\n");
  }

  const url = lightsUrl(await targetUrl(opts, config));
  const timeout = config.get("api.timeout");

  if (opts.command === "status") {
    return JSON.stringify(await fetchStatus(url, timeout), null, 2);
  }

  const status = await controlLight(url, actionFor(opts.command, opts), timeout);
  const light = status.lights[0];
  return `Key light ${light.on === 1 ? "on" : "off"}, brightness ${light.brightness}%, temperature ${temperatureToKelvin(light.temperature)}K`;
}
