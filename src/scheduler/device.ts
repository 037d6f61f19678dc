import net from 'node:net';
import { ConfigError } from '../errors.js';
import type { Device, DeviceMode } from '../types.js';

export const MIN_POLL_SECONDS = 1;
export const MAX_POLL_SECONDS = 3600;
export const DEFAULT_DEVICE_PORT = 5000;

export type DeviceInput = {
  id: number;
  name: string;
  ip: string;
  port?: number;
  locationId?: string | null;
  mode: string;
  pollIntervalSeconds: number;
  createdAt?: number;
};

const MODE_ALIASES: Record<string, DeviceMode> = {
  continuous: 'continuous',
  'on-demand': 'on-demand',
  'on demand': 'on-demand',
  ondemand: 'on-demand',
  on_demand: 'on-demand'
};

export function parseDeviceMode(value: string): DeviceMode | null {
  return MODE_ALIASES[value.trim().toLowerCase()] ?? null;
}

export function isValidIp(value: string): boolean {
  return net.isIP(value) !== 0;
}

/** The only way to build a {@link Device}; every field is checked. */
export function createDevice(input: DeviceInput, defaults: { port?: number; now?: number } = {}): Device {
  const issues: string[] = [];

  if (!Number.isInteger(input.id) || input.id < 1) {
    issues.push(`device.id must be a positive integer, got ${input.id}`);
  }

  const name = input.name.trim();
  if (name.length === 0) {
    issues.push('device.name must not be empty');
  }

  const ip = input.ip.trim();
  if (!isValidIp(ip)) {
    issues.push(`device.ip "${input.ip}" is not a valid IP address`);
  }

  const port = input.port ?? defaults.port ?? DEFAULT_DEVICE_PORT;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    issues.push(`device.port must be an integer within [1, 65535], got ${port}`);
  }

  const mode = parseDeviceMode(input.mode);
  if (mode === null) {
    issues.push(`device.mode must be "continuous" or "on-demand", got "${input.mode}"`);
  }

  const poll = input.pollIntervalSeconds;
  if (!Number.isInteger(poll) || poll < MIN_POLL_SECONDS || poll > MAX_POLL_SECONDS) {
    issues.push(
      `device.pollIntervalSeconds must be an integer within [${MIN_POLL_SECONDS}, ${MAX_POLL_SECONDS}], got ${poll}`
    );
  }

  const locationId = input.locationId?.trim() || null;

  if (issues.length > 0 || mode === null) {
    throw new ConfigError(issues, 'Invalid device');
  }

  return Object.freeze({
    id: input.id,
    name,
    ip,
    port,
    locationId,
    mode,
    pollIntervalSeconds: poll,
    createdAt: input.createdAt ?? defaults.now ?? Date.now()
  });
}
