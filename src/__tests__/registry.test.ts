import { beforeAll, describe, it, expect } from "vitest";
import { type Announcement, parseAnnouncement } from "../announcement.js";
import { DeviceUrlError } from "../device.js";
import { LogLevel, setConsoleLevel } from "../log.js";
import { DeviceRegistry } from "../registry.js";

const resolved = (name: string, ip: string, port = 9123) =>
  parseAnnouncement(`=;eth0;IPv4;${name};_elg._tcp;local;${name.toLowerCase()}.local;${ip};${port}`);
const exited = (name: string) => parseAnnouncement(`-;eth0;IPv4;${name};_elg._tcp;local`);
const announced = (name: string) => parseAnnouncement(`+;eth0;IPv4;${name};_elg._tcp;local`);

beforeAll(() => {
  setConsoleLevel(LogLevel.Silent);
});

describe("DeviceRegistry", () => {
  it("starts empty", () => {
    const registry = new DeviceRegistry();
    expect(registry.devices).toEqual([]);
    expect(registry.size).toBe(0);
  });

  it("deduplicates its seed by name", () => {
    const registry = new DeviceRegistry([
      { name: "Desk", url: "http://10.0.0.7:9123/" },
      { name: "Desk", url: "http://10.0.0.9:9123/" },
    ]);
    expect(registry.devices).toEqual([{ name: "Desk", url: "http://10.0.0.7:9123/" }]);
  });

  it("ignores new announcements", () => {
    const registry = new DeviceRegistry();
    expect(registry.apply(announced("Desk"))).toEqual({ type: "unchanged" });
    expect(registry.size).toBe(0);
  });

  it("adds a device on its first resolution", () => {
    const registry = new DeviceRegistry();
    const change = registry.apply(resolved("Desk", "10.0.0.7"));
    expect(change).toEqual({
      type: "added",
      device: { name: "Desk", url: "http://10.0.0.7:9123/" },
    });
    expect(registry.devices).toEqual([{ name: "Desk", url: "http://10.0.0.7:9123/" }]);
  });

  it("keeps one device when the same resolution arrives twice", () => {
    const registry = new DeviceRegistry();
    registry.apply(resolved("Desk", "10.0.0.7"));
    expect(registry.apply(resolved("Desk", "10.0.0.7"))).toEqual({ type: "unchanged" });
    expect(registry.devices).toHaveLength(1);
  });

  it("keeps the first address when a known name resolves elsewhere", () => {
    const registry = new DeviceRegistry();
    registry.apply(resolved("Desk", "10.0.0.7"));
    registry.apply(resolved("Desk", "10.0.0.99"));
    expect(registry.get("Desk")).toEqual({ name: "Desk", url: "http://10.0.0.7:9123/" });
  });

  it("appends devices in resolution order", () => {
    const registry = new DeviceRegistry();
    registry.apply(resolved("Shelf", "10.0.0.8"));
    registry.apply(resolved("Desk", "10.0.0.7"));
    expect(registry.devices.map((d) => d.name)).toEqual(["Shelf", "Desk"]);
  });

  it("removes exactly the device whose name matches the exit", () => {
    const registry = new DeviceRegistry();
    registry.apply(resolved("Desk", "10.0.0.7"));
    registry.apply(resolved("Shelf", "10.0.0.8"));
    registry.apply(resolved("Window", "10.0.0.9"));

    const change = registry.apply(exited("Shelf"));

    expect(change).toEqual({
      type: "removed",
      device: { name: "Shelf", url: "http://10.0.0.8:9123/" },
    });
    expect(registry.devices.map((d) => d.name)).toEqual(["Desk", "Window"]);
  });

  it("does not remove another device when the only one known exits", () => {
    const registry = new DeviceRegistry();
    registry.apply(resolved("Desk", "10.0.0.7"));
    registry.apply(resolved("Shelf", "10.0.0.8"));

    registry.apply(exited("Desk"));

    expect(registry.has("Desk")).toBe(false);
    expect(registry.has("Shelf")).toBe(true);
  });

  it("treats the exit of an unknown device as a no-op", () => {
    const registry = new DeviceRegistry();
    registry.apply(resolved("Desk", "10.0.0.7"));
    const before = registry.devices;

    expect(registry.apply(exited("Shelf"))).toEqual({ type: "unchanged" });
    expect(registry.devices).toBe(before);
  });

  it("leaves the registry untouched when a URL can't be built", () => {
    const registry = new DeviceRegistry();
    const announcement: Announcement = {
      mode: "resolved",
      base: { interfaceName: "eth0", family: "IPv6", hostname: "Desk", serviceType: "_elg._tcp", domain: "local" },
      service: {
        name: "_elg._tcp",
        hostname: "desk.local",
        address: { family: 6, address: "fe80::1%eth0" },
        port: 9123,
        txt: [],
      },
    };
    expect(() => registry.apply(announcement)).toThrow(DeviceUrlError);
    expect(registry.size).toBe(0);
  });

  it("never changes a snapshot handed out earlier", () => {
    const registry = new DeviceRegistry();
    registry.apply(resolved("Desk", "10.0.0.7"));
    const snapshot = registry.devices;

    registry.apply(resolved("Shelf", "10.0.0.8"));
    registry.apply(exited("Desk"));

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(snapshot.map((d) => d.name)).toEqual(["Desk"]);
    expect(registry.devices.map((d) => d.name)).toEqual(["Shelf"]);
  });
});
