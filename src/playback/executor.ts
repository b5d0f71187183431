import { setTimeout as delay } from "node:timers/promises";
import { NotFoundError } from "../errors.js";
import type { MediaReference } from "../media/reference.js";
import type { Device, MediaService } from "../media/service.js";

const MAX_SLEEP_MS = 60_000;
const MIN_SLEEP_MS = 500;

export interface PlayRequest {
  media: MediaReference;
  device?: string;
  volume?: number;
}

/** Case-insensitive name match; without a name the active device, else the first one. */
export function selectDevice(devices: Device[], preferredName?: string): Device {
  if (!devices.length) {
    throw new NotFoundError("No available Spotify devices. Open Spotify on your target device and try again.");
  }
  if (preferredName) {
    const lower = preferredName.toLowerCase();
    const match = devices.find((d) => d.name.toLowerCase() === lower);
    if (match) return match;
    const available = devices.map((d) => d.name).join(", ");
    throw new NotFoundError(`Device named '${preferredName}' not found. Available devices: ${available}.`);
  }
  return devices.find((d) => d.isActive) ?? devices[0];
}

export async function resolveDevice(service: MediaService, preferredName?: string): Promise<Device> {
  return selectDevice(await service.listDevices(), preferredName);
}

/** Starts playback right away and returns the device it went to. */
export async function playNow(service: MediaService, request: PlayRequest, device?: Device): Promise<Device> {
  const target = device ?? (await resolveDevice(service, request.device));
  if (request.volume !== undefined) await service.setVolume(target.id, request.volume);
  await service.startPlayback(target.id, request.media);
  return target;
}

export interface WaitOptions {
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Polls until `target`: each round sleeps for the remaining time capped at a
 * minute and floored at half a second, so a clock change is picked up.
 */
export async function waitUntil(target: Date, options: WaitOptions = {}): Promise<void> {
  const now = options.now ?? Date.now;
  const sleep = options.sleep ?? ((ms: number) => delay(ms));
  for (;;) {
    const remaining = target.getTime() - now();
    if (remaining <= 0) return;
    await sleep(Math.max(Math.min(remaining, MAX_SLEEP_MS), MIN_SLEEP_MS));
  }
}
