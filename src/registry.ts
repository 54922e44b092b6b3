/**
 * In-memory set of known lights, driven by decoded announcements.
 *
 * The device list is held as a frozen snapshot that every change replaces.
 * `apply` runs to completion before anything else can read, so a reader sees
 * the list either before or after a transition, never halfway through one.
 */

import type { Announcement } from "./announcement.js";
import { debug, log } from "./log.js";
import { type Device, formatDevice, resolveDevice, sameDevice, uniqueDevices } from "./device.js";

export type RegistryChange =
  | { type: "added"; device: Device }
  | { type: "removed"; device: Device }
  | { type: "unchanged" };

const UNCHANGED: RegistryChange = { type: "unchanged" };

export class DeviceRegistry {
  #devices: readonly Device[];

  constructor(seed: Iterable<Device> = []) {
    this.#devices = Object.freeze(uniqueDevices(seed));
  }

  get devices(): readonly Device[] {
    return this.#devices;
  }

  get size(): number {
    return this.#devices.length;
  }

  has(name: string): boolean {
    return this.#devices.some((device) => device.name === name);
  }

  get(name: string): Device | undefined {
    return this.#devices.find((device) => device.name === name);
  }

  /**
   * Applies one announcement. Throws `DeviceUrlError` for a resolved
   * announcement whose address can't form a URL; the registry is then left
   * as it was.
   */
  apply(announcement: Announcement): RegistryChange {
    switch (announcement.mode) {
      case "new":
        return UNCHANGED;

      case "resolved": {
        const device = resolveDevice(announcement);
        if (!device) return UNCHANGED;
        if (this.#devices.some((known) => sameDevice(known, device))) {
          debug(`Device ${formatDevice(device)} already known`);
          return UNCHANGED;
        }
        this.#devices = Object.freeze([...this.#devices, device]);
        log(`New device found: ${formatDevice(device)}`);
        return { type: "added", device };
      }

      case "exited": {
        const name = announcement.base.hostname;
        const device = this.get(name);
        if (!device) {
          debug(`Exit announced for unknown device "${name}"`);
          return UNCHANGED;
        }
        this.#devices = Object.freeze(this.#devices.filter((d) => d.name !== name));
        log(`Device left: ${formatDevice(device)}`);
        return { type: "removed", device };
      }
    }
  }
}
