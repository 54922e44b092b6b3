import { fileURLToPath } from "url";
import { describe, it, expect } from "vitest";
import { defaultConfigPath, loadConfig } from "../config.js";

function fixture(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

describe("loadConfig", () => {
  it("uses the defaults", () => {
    const config = loadConfig({ file: fixture("empty.json"), env: {} });
    expect(config.getProperties()).toEqual({
      discovery: { command: "avahi-browse", service: "_elg._tcp", enabled: true },
      api: { timeout: 5000 },
      ui: { interval: 10 },
      logging: { level: "log", file: null },
    });
  });

  it("reads a JSON file over the defaults", () => {
    const config = loadConfig({ file: fixture("config.json"), env: {} });
    expect(config.get("discovery.service")).toBe("_light._tcp");
    expect(config.get("api.timeout")).toBe(2000);
    expect(config.get("logging.level")).toBe("error");
    expect(config.get("discovery.command")).toBe("avahi-browse");
  });

  it("reads the environment", () => {
    const config = loadConfig({
      file: fixture("empty.json"),
      env: {
        KEYLIGHT_DISCOVERY_COMMAND: "/opt/bin/avahi-browse",
        KEYLIGHT_DISCOVERY: "false",
        KEYLIGHT_INTERVAL: "3",
        KEYLIGHT_LOG_FILE: "/tmp/keylight.log",
      },
    });
    expect(config.get("discovery.command")).toBe("/opt/bin/avahi-browse");
    expect(config.get("discovery.enabled")).toBe(false);
    expect(config.get("ui.interval")).toBe(3);
    expect(config.get("logging.file")).toBe("/tmp/keylight.log");
  });

  it("lets the environment override the file", () => {
    const config = loadConfig({ file: fixture("config.json"), env: { KEYLIGHT_TIMEOUT: "1500" } });
    expect(config.get("api.timeout")).toBe(1500);
  });

  it("rejects an unknown log level", () => {
    expect(() =>
      loadConfig({ file: fixture("empty.json"), env: { KEYLIGHT_LOG_LEVEL: "loud" } })
    ).toThrow();
  });

  it("rejects keys outside the schema", () => {
    expect(() => loadConfig({ file: fixture("unknown-key.json"), env: {} })).toThrow(/colour/);
  });

  it("fails when the given file is missing", () => {
    expect(() => loadConfig({ file: fixture("missing.json"), env: {} })).toThrow();
  });
});

describe("defaultConfigPath", () => {
  it("lives under ~/.config/keylight-tui", () => {
    expect(defaultConfigPath()).toMatch(/[\\/]\.config[\\/]keylight-tui[\\/]config\.json$/);
  });
});
