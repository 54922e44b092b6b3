#!/usr/bin/env node

/**
 * Key Light TUI: control network key lights from the terminal.
 *
 * Usage:
 *   keylight-tui                          # dashboard, lights found via avahi-browse
 *   keylight-tui discover                 # list lights and exit
 *   keylight-tui toggle                   # toggle the first light found
 *   keylight-tui --host 192.168.0.92 --port 9123 set -b 40 -t 200
 */

import { type LightAction, type LightStatus, controlLight, fetchStatus, lightsUrl } from "./api.js";
import {
  type CliOptions,
  BRIGHTNESS_STEP,
  TEMPERATURE_STEP,
  USAGE,
  UsageError,
  parseArgs,
  runCommand,
} from "./cli.js";
import { type Config, loadConfig } from "./config.js";
import { type Device, buildDeviceUrl, uniqueDevices } from "./device.js";
import { DiscoveryDaemon, discoverDevices } from "./discovery.js";
import {
  LogLevel,
  closeLogger,
  error,
  log,
  parseLogLevel,
  setConsoleLevel,
  setLogFile,
  setLogSink,
} from "./log.js";
import { type LightView, Dashboard } from "./ui.js";

function configure(opts: CliOptions): Config {
  const config = loadConfig({ file: opts.config });
  if (opts.logLevel) config.set("logging.level", opts.logLevel);
  if (opts.logFile) config.set("logging.file", opts.logFile);
  if (opts.interval !== undefined) config.set("ui.interval", opts.interval);
  if (opts.discovery !== undefined) config.set("discovery.enabled", opts.discovery);

  setConsoleLevel(parseLogLevel(config.get("logging.level")));
  setLogFile(config.get("logging.file"));
  return config;
}

// --- Dashboard ---

async function runDashboard(config: Config): Promise<void> {
  const dashboard = new Dashboard();
  setLogSink((level, message) => {
    dashboard.log(message, level >= LogLevel.Error);
  });

  const timeout = config.get("api.timeout");
  const discoveryOptions = {
    command: config.get("discovery.command"),
    service: config.get("discovery.service"),
  };

  const views = new Map<string, LightView>();
  const manual: Device[] = [];
  let discovered: readonly Device[] = [];
  let selected: string | null = null;
  let daemon: DiscoveryDaemon | null = null;

  function render(): void {
    dashboard.updateLights(Array.from(views.values()), selected);
  }

  function syncDevices(): void {
    const devices = uniqueDevices([...manual, ...discovered]);
    for (const name of views.keys()) {
      if (!devices.some((d) => d.name === name)) views.delete(name);
    }
    for (const device of devices) {
      const view = views.get(device.name);
      if (!view) {
        views.set(device.name, { device, status: null, lastError: null, lastUpdate: null });
        void pollLight(device.name);
      } else if (view.device.url !== device.url) {
        view.device = device;
      }
    }
    if (selected === null || !views.has(selected)) {
      selected = views.keys().next().value ?? null;
    }
    render();
  }

  function updateView(name: string, status: LightStatus | null, failure: unknown): void {
    const view = views.get(name);
    if (!view) return;
    if (failure === undefined) {
      view.status = status;
      view.lastError = null;
      view.lastUpdate = new Date();
    } else {
      view.lastError = failure instanceof Error ? failure.message : String(failure);
    }
  }

  async function pollLight(name: string): Promise<void> {
    const view = views.get(name);
    if (!view) return;
    try {
      const status = await fetchStatus(lightsUrl(view.device.url), timeout);
      updateView(name, status.lights[0] ?? null, undefined);
    } catch (err: unknown) {
      updateView(name, null, err);
    }
    render();
  }

  async function pollAll(): Promise<void> {
    await Promise.allSettled(Array.from(views.keys()).map((name) => pollLight(name)));
  }

  async function control(action: LightAction): Promise<void> {
    if (selected === null) return;
    const name = selected;
    const view = views.get(name);
    if (!view) return;
    try {
      const status = await controlLight(lightsUrl(view.device.url), action, timeout);
      updateView(name, status.lights[0] ?? null, undefined);
    } catch (err: unknown) {
      updateView(name, view.status, err);
      error(`${name}: ${err instanceof Error ? err.message : String(err)}`);
    }
    render();
  }

  function startDiscovery(): void {
    if (!config.get("discovery.enabled")) return;
    daemon?.stop();

    log("Starting mDNS discovery...");
    const next = new DiscoveryDaemon({ ...discoveryOptions, seed: discovered });
    next.on("change", (devices: readonly Device[]) => {
      discovered = devices;
      syncDevices();
    });
    next.start();
    daemon = next;
  }

  function select(offset: number): void {
    const names = Array.from(views.keys());
    if (names.length === 0) return;
    const index = selected === null ? 0 : names.indexOf(selected);
    selected = names[(index + offset + names.length) % names.length];
    render();
  }

  function shutdown(): void {
    daemon?.stop();
    setLogSink(undefined);
    dashboard.destroy();
    void closeLogger().then(() => process.exit(0));
  }

  // Key bindings
  dashboard.onKey(["escape", "q", "C-c"], shutdown);
  dashboard.onKey(["left", "up"], () => select(-1));
  dashboard.onKey(["right", "down"], () => select(1));
  dashboard.onKey(["t", "space"], () => void control({ type: "toggle" }));
  dashboard.onKey(["+", "="], () => void control({ type: "brightness", delta: BRIGHTNESS_STEP }));
  dashboard.onKey(["-"], () => void control({ type: "brightness", delta: -BRIGHTNESS_STEP }));
  dashboard.onKey(["w"], () => void control({ type: "temperature", delta: TEMPERATURE_STEP }));
  dashboard.onKey(["c"], () => void control({ type: "temperature", delta: -TEMPERATURE_STEP }));
  dashboard.onKey(["r"], () => {
    log("Refreshing...");
    void pollAll();
  });
  dashboard.onKey(["d"], startDiscovery);
  dashboard.onKey(["a"], () => {
    dashboard.showPrompt("Enter light address (host:port):", (value) => {
      if (!value) return;
      const match = /^(.+):(\d+)$/.exec(value);
      const port = match ? Number(match[2]) : NaN;
      if (!match || port < 1 || port > 0xffff) {
        error(`Invalid address: ${value}`);
        return;
      }
      const host = match[1].replace(/^\[(.*)\]$/, "$1");
      try {
        const device = { name: value, url: buildDeviceUrl(host, port) };
        manual.push(device);
        log(`Added light: ${value}`);
        syncDevices();
      } catch (err: unknown) {
        error(err instanceof Error ? err.message : String(err));
      }
    });
  });

  render();

  try {
    discovered = await discoverDevices(discoveryOptions);
  } catch (err: unknown) {
    error(`Failed to get available devices: ${err instanceof Error ? err.message : String(err)}`);
  }
  syncDevices();
  startDiscovery();

  setInterval(() => {
    void pollAll();
  }, config.get("ui.interval") * 1000);

  process.on("SIGTERM", shutdown);
}

// --- Main ---

async function main(): Promise<void> {
  const opts = parseArgs(process.argv);
  if (opts.help) {
    console.log(USAGE);
    return;
  }

  const config = configure(opts);

  if (opts.command === "dashboard") {
    await runDashboard(config);
    return;
  }

  try {
    const output = await runCommand({ ...opts, command: opts.command }, config);
    if (output) console.log(output);
  } finally {
    await closeLogger();
  }
}

main().catch(async (err: unknown) => {
  if (err instanceof UsageError) {
    console.error(`${err.message}\n${USAGE}`);
  } else {
    console.error("Fatal error:", err instanceof Error ? err.message : err);
  }
  await closeLogger();
  process.exit(1);
});
