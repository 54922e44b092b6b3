import { isIP } from "net";
import type { Announcement } from "./announcement.js";

/**
 * A light reachable over HTTP. Two devices with the same name are the same
 * light, whatever address they were last resolved on.
 */
export interface Device {
  name: string;
  url: string;
}

export class DeviceUrlError extends Error {
  constructor(host: string, port: number, options?: { cause?: unknown }) {
    super(`Couldn't build device URL for ${host}:${port}`, options);
    this.name = "DeviceUrlError";
  }
}

export function buildDeviceUrl(host: string, port: number): string {
  const authority = isIP(host) === 6 ? `[${host}]` : host;
  try {
    return new URL(`http://${authority}:${port}/`).href;
  } catch (err: unknown) {
    throw new DeviceUrlError(host, port, { cause: err });
  }
}

/** Device for a resolved announcement, null for the others. */
export function resolveDevice(announcement: Announcement): Device | null {
  if (announcement.mode !== "resolved") return null;

  const { base, service } = announcement;
  return {
    name: base.hostname,
    url: buildDeviceUrl(service.address.address, service.port),
  };
}

export function sameDevice(a: Device, b: Device): boolean {
  return a.name === b.name;
}

export function uniqueDevices(devices: Iterable<Device>): Device[] {
  const seen = new Set<string>();
  const unique: Device[] = [];
  for (const device of devices) {
    if (seen.has(device.name)) continue;
    seen.add(device.name);
    unique.push(device);
  }
  return unique;
}

export function formatDevice(device: Device): string {
  return `${device.name} => ${device.url}`;
}
