/**
 * Key Light HTTP API client.
 * Reads and writes /elgato/lights on each device.
 */

import { z } from "zod";

export const KEYLIGHT_API_PATH = "elgato/lights";

export const BRIGHTNESS_RANGE = { min: 0, max: 100 } as const;
/** Color temperature in mireds (about 7000 K down to 2900 K) */
export const TEMPERATURE_RANGE = { min: 143, max: 344 } as const;

export const BrightnessSchema = z
  .number()
  .int()
  .min(BRIGHTNESS_RANGE.min)
  .max(BRIGHTNESS_RANGE.max);

export const TemperatureSchema = z
  .number()
  .int()
  .min(TEMPERATURE_RANGE.min)
  .max(TEMPERATURE_RANGE.max);

export const PowerSchema = z.union([z.literal(0), z.literal(1)]);

export const LightStatusSchema = z.object({
  on: PowerSchema,
  brightness: BrightnessSchema,
  temperature: TemperatureSchema,
});

export const DeviceStatusSchema = z.object({
  numberOfLights: z.number().int().nonnegative(),
  lights: z.array(LightStatusSchema),
});

export type Power = z.infer<typeof PowerSchema>;
export type LightStatus = z.infer<typeof LightStatusSchema>;
export type DeviceStatus = z.infer<typeof DeviceStatusSchema>;

export type LightAction =
  | { type: "power"; on: boolean }
  | { type: "toggle" }
  | { type: "brightness"; delta: number }
  | { type: "temperature"; delta: number }
  | { type: "set"; brightness?: number; temperature?: number };

export const DEFAULT_TIMEOUT = 5000;

export function lightsUrl(deviceUrl: string): string {
  return new URL(KEYLIGHT_API_PATH, deviceUrl).href;
}

export async function fetchStatus(
  url: string,
  timeoutMs: number = DEFAULT_TIMEOUT
): Promise<DeviceStatus> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const res = await fetch(url, {
      headers: { Accept: "application/json" },
      signal: controller.signal,
    });
    if (!res.ok) {
      throw new Error(`HTTP ${res.status} ${res.statusText}`);
    }
    return DeviceStatusSchema.parse(await res.json());
  } finally {
    clearTimeout(timeout);
  }
}

export async function putStatus(
  url: string,
  status: DeviceStatus,
  timeoutMs: number = DEFAULT_TIMEOUT
): Promise<void> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const res = await fetch(url, {
      method: "PUT",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(status),
      signal: controller.signal,
    });
    if (!res.ok) {
      throw new Error(`HTTP ${res.status} ${res.statusText}`);
    }
  } finally {
    clearTimeout(timeout);
  }
}

function clamp(value: number, range: { min: number; max: number }): number {
  return Math.max(range.min, Math.min(range.max, Math.round(value)));
}

export function updateLight(
  status: DeviceStatus,
  index: number,
  update: (light: LightStatus) => LightStatus
): DeviceStatus {
  const light = status.lights[index];
  if (!light) {
    throw new RangeError(`Invalid light index: ${index}`);
  }
  const lights = status.lights.slice();
  lights[index] = update(light);
  return { ...status, lights };
}

export function applyAction(light: LightStatus, action: LightAction): LightStatus {
  switch (action.type) {
    case "power":
      return { ...light, on: action.on ? 1 : 0 };
    case "toggle":
      return { ...light, on: light.on === 1 ? 0 : 1 };
    case "brightness":
      return { ...light, brightness: clamp(light.brightness + action.delta, BRIGHTNESS_RANGE) };
    case "temperature":
      return {
        ...light,
        temperature: clamp(light.temperature + action.delta, TEMPERATURE_RANGE),
      };
    case "set":
      return {
        ...light,
        brightness:
          action.brightness === undefined
            ? light.brightness
            : BrightnessSchema.parse(action.brightness),
        temperature:
          action.temperature === undefined
            ? light.temperature
            : TemperatureSchema.parse(action.temperature),
      };
  }
}

/**
 * Reads the status, applies `action` to the first light and writes the result
 * back. Resolves with the status that was written.
 */
export async function controlLight(
  url: string,
  action: LightAction,
  timeoutMs: number = DEFAULT_TIMEOUT
): Promise<DeviceStatus> {
  const current = await fetchStatus(url, timeoutMs);
  const next = updateLight(current, 0, (light) => applyAction(light, action));
  await putStatus(url, next, timeoutMs);
  return next;
}

export function temperatureToKelvin(mireds: number): number {
  return Math.round(1_000_000 / mireds);
}
