import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import type { Logger } from '../logger.js';
import type { Clock, Device } from '../types.js';
import { ReadWriteLock } from '../utils/lock.js';
import { createDevice, DEFAULT_DEVICE_PORT, type DeviceInput } from './device.js';

type DeviceRow = {
  id: number;
  name: string;
  ip: string;
  port: number;
  location_id: string | null;
  mode: string;
  poll_seconds: number;
  created_at: number;
};

export type NewDevice = Omit<DeviceInput, 'id' | 'createdAt'>;
export type DevicePatch = Partial<NewDevice>;

export type DeviceRegistryOptions = {
  path: string;
  logger: Logger;
  defaultPort?: number;
  clock?: Clock;
};

/** Anything the scheduler can load devices from. */
export interface DeviceSource {
  list(): Promise<readonly Device[]>;
}

const SCHEMA = `
CREATE TABLE IF NOT EXISTS pfds_devices (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL,
  ip TEXT NOT NULL,
  port INTEGER NOT NULL,
  location_id TEXT,
  mode TEXT NOT NULL CHECK (mode IN ('continuous', 'on-demand')),
  poll_seconds INTEGER NOT NULL CHECK (poll_seconds BETWEEN 1 AND 3600),
  created_at INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_pfds_devices_ip ON pfds_devices(ip);
`;

/**
 * SQLite-backed device registry. Mutations are serialized through a write
 * lock. `list()` re-reads the table so rows written by another process (the
 * CLI) are picked up; `get` and `findByIp` serve the snapshot it leaves behind.
 * Ids are never reused once a device is removed.
 */
export class DeviceRegistry implements DeviceSource {
  private readonly db: Database.Database;
  private readonly logger: Logger;
  private readonly defaultPort: number;
  private readonly clock: Clock;
  private readonly lock = new ReadWriteLock();
  private snapshot: readonly Device[] = [];

  constructor(options: DeviceRegistryOptions) {
    this.logger = options.logger.child({ component: 'registry' });
    this.defaultPort = options.defaultPort ?? DEFAULT_DEVICE_PORT;
    this.clock = options.clock ?? Date.now;

    if (options.path !== ':memory:') {
      fs.mkdirSync(path.dirname(path.resolve(options.path)), { recursive: true });
    }
    this.db = new Database(options.path);
    this.db.pragma('journal_mode = WAL');
    this.db.exec(SCHEMA);
    this.snapshot = this.loadAll();
  }

  async list(): Promise<readonly Device[]> {
    return this.lock.read(() => {
      this.refresh();
      return this.snapshot;
    });
  }

  get(id: number): Device | null {
    return this.snapshot.find(device => device.id === id) ?? null;
  }

  findByIp(ip: string): Device[] {
    const normalized = ip.trim();
    return this.snapshot.filter(device => device.ip === normalized);
  }

  async add(input: NewDevice): Promise<Device> {
    return this.lock.write(() => {
      // validated with a placeholder id; SQLite assigns the real one
      const draft = createDevice({ ...input, id: 1 }, { port: this.defaultPort, now: this.clock() });
      const result = this.db
        .prepare<Omit<DeviceRow, 'id'>>(
          `INSERT INTO pfds_devices (name, ip, port, location_id, mode, poll_seconds, created_at)
           VALUES (@name, @ip, @port, @location_id, @mode, @poll_seconds, @created_at)`
        )
        .run(toInsertRow(draft));
      const device = createDevice({ ...draft, id: Number(result.lastInsertRowid) });
      this.refresh();
      this.logger.info({ deviceId: device.id, ip: device.ip, mode: device.mode }, 'Device added');
      return device;
    });
  }

  async update(id: number, patch: DevicePatch): Promise<Device | null> {
    return this.lock.write(() => {
      this.refresh();
      const existing = this.get(id);
      if (!existing) {
        return null;
      }
      const device = createDevice({ ...existing, ...patch, id, createdAt: existing.createdAt });
      this.db
        .prepare(
          `UPDATE pfds_devices
           SET name = @name, ip = @ip, port = @port, location_id = @location_id,
               mode = @mode, poll_seconds = @poll_seconds
           WHERE id = @id`
        )
        .run(toRow(device));
      this.refresh();
      this.logger.info({ deviceId: id }, 'Device updated');
      return device;
    });
  }

  async remove(id: number): Promise<boolean> {
    return this.lock.write(() => {
      const result = this.db.prepare('DELETE FROM pfds_devices WHERE id = ?').run(id);
      if (result.changes === 0) {
        return false;
      }
      this.refresh();
      this.logger.info({ deviceId: id }, 'Device removed');
      return true;
    });
  }

  close() {
    this.db.close();
  }

  private refresh() {
    this.snapshot = this.loadAll();
  }

  private loadAll(): readonly Device[] {
    const rows = this.db
      .prepare<[], DeviceRow>(
        'SELECT id, name, ip, port, location_id, mode, poll_seconds, created_at FROM pfds_devices ORDER BY id'
      )
      .all();

    const devices: Device[] = [];
    for (const row of rows) {
      try {
        devices.push(
          createDevice({
            id: row.id,
            name: row.name,
            ip: row.ip,
            port: row.port,
            locationId: row.location_id,
            mode: row.mode,
            pollIntervalSeconds: row.poll_seconds,
            createdAt: row.created_at
          })
        );
      } catch (error) {
        this.logger.warn({ err: error, deviceId: row.id }, 'Skipping invalid device row');
      }
    }
    return Object.freeze(devices);
  }
}

function toRow(device: Device): DeviceRow {
  return { id: device.id, ...toInsertRow(device) };
}

function toInsertRow(device: Device): Omit<DeviceRow, 'id'> {
  return {
    name: device.name,
    ip: device.ip,
    port: device.port,
    location_id: device.locationId,
    mode: device.mode,
    poll_seconds: device.pollIntervalSeconds,
    created_at: device.createdAt
  };
}
