import net from 'node:net';
import { afterEach, describe, expect, it } from 'vitest';
import type { IngestConfig } from '../src/config/index.js';
import { IngestionServer, type ParseErrorEvent } from '../src/ingest/server.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { encodeIdentity, encodeSensorSample, encodeThermalCells } from '../src/protocol/encoder.js';
import { THERMAL_CELLS, type DataRecord } from '../src/types.js';
import { createTestLogger, delay, waitFor } from './helpers/context.js';

const baseConfig: IngestConfig = {
  host: '127.0.0.1',
  port: 0,
  maxConnections: 16,
  maxLineLength: 8192,
  queueCapacity: 100,
  idleTimeoutMs: 0,
  ipLocationMap: {}
};

type Harness = {
  server: IngestionServer;
  metrics: MetricsRegistry;
  records: Array<{ locationId: string; record: DataRecord }>;
  port: number;
};

const servers: IngestionServer[] = [];
const clients: net.Socket[] = [];

async function startHarness(config: Partial<IngestConfig> = {}): Promise<Harness> {
  const metrics = new MetricsRegistry();
  const records: Harness['records'] = [];
  const server = new IngestionServer({
    config: { ...baseConfig, ...config },
    logger: createTestLogger(),
    metrics,
    sink: (locationId, record) => {
      records.push({ locationId, record });
    }
  });
  servers.push(server);
  const port = await server.start();
  return { server, metrics, records, port };
}

function connect(port: number): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.connect({ host: '127.0.0.1', port }, () => resolve(socket));
    socket.once('error', reject);
    clients.push(socket);
  });
}

const frameLine = (format: 'separate' | 'no_loc', locationId: string | null = null) =>
  encodeThermalCells(new Array<number>(THERMAL_CELLS).fill(24.5), { format, locationId });

afterEach(async () => {
  for (const client of clients.splice(0)) {
    client.destroy();
  }
  for (const server of servers.splice(0)) {
    await server.stop();
  }
});

describe('IngestionServer', () => {
  it('binds a connection through its identity lines and routes records to that location', async () => {
    const { server, metrics, records, port } = await startHarness();
    const client = await connect(port);

    client.write(`${encodeIdentity({ serial: 'SIM001' })}\n${encodeIdentity({ locationId: 'RoomA' })}\n`);
    client.write(`${frameLine('no_loc')}\n`);
    client.write(`${encodeSensorSample({ adc1: 1734, adc2: 2293, flame: true }, { format: 'no_loc' })}\n`);

    await waitFor(() => records.length === 2);
    await server.drained();

    expect(records.map(entry => [entry.locationId, entry.record.kind])).toEqual([
      ['RoomA', 'thermal'],
      ['RoomA', 'sensor']
    ]);
    const sample = records[1]?.record;
    expect(sample?.kind === 'sensor' && sample.flame).toBe(true);

    const [connection] = server.connections();
    expect(connection?.serial).toBe('SIM001');
    expect(connection?.locationId).toBe('RoomA');

    const snapshot = metrics.snapshot();
    expect(snapshot.packets.byLocation.RoomA?.received).toEqual({ identity: 1, sensor: 1, thermal: 1 });
    expect(snapshot.packets.errors).toBe(0);
    expect(snapshot.connections).toEqual({ accepted: 1, refused: 0, active: 1 });
  });

  it('handles packets split across writes and several packets in one write', async () => {
    const { records, port } = await startHarness();
    const client = await connect(port);
    const line = `${frameLine('separate', 'Lab')}\n`;

    client.write(line.slice(0, 100));
    client.write(line.slice(100) + encodeSensorSample({ adc1: 1, adc2: 2, flame: false }, { format: 'separate', locationId: 'Lab' }) + '\n');

    await waitFor(() => records.length === 2);
    expect(records.map(entry => entry.record.kind)).toEqual(['thermal', 'sensor']);
  });

  it('decodes a location id whose UTF-8 bytes arrive in separate writes', async () => {
    const { records, port } = await startHarness();
    const client = await connect(port);
    client.setNoDelay(true);
    const bytes = Buffer.from('#Sensor:K\u00fcche:ADC1=1,ADC2=2,MPY30=1!\n', 'utf8');
    const split = bytes.indexOf(0xc3) + 1;

    client.write(bytes.subarray(0, split));
    await delay(20);
    client.write(bytes.subarray(split));

    await waitFor(() => records.length === 1);
    expect(records[0]?.locationId).toBe('K\u00fcche');
  });

  it('counts malformed packets against the location and keeps the connection open', async () => {
    const { server, metrics, records, port } = await startHarness({ maxLineLength: 64 });
    const errors: ParseErrorEvent[] = [];
    server.on('parse-error', (event: ParseErrorEvent) => errors.push(event));
    const client = await connect(port);

    client.write('#locid:RoomB!\n');
    client.write('#Sensor:ADC1=1,ADC2=2!\n');
    client.write(`#frame:${'0'.repeat(100)}\n`);
    client.write('\n');
    client.write('#Sensor:ADC1=5,ADC2=6,MPY30=0!\n');

    await waitFor(() => records.length === 1);
    // overflow and decode errors from one coalesced chunk may arrive in either order
    expect(errors.map(event => [event.locationId, event.error.code]).sort()).toEqual([
      ['RoomB', 'field-count'],
      ['RoomB', 'line-too-long']
    ]);
    expect(metrics.snapshot().packets.byLocation.RoomB?.errors).toEqual({ 'field-count': 1, 'line-too-long': 1 });
    expect(records[0]?.locationId).toBe('RoomB');
  });

  it('falls back to the configured IP mapping for packets without a location', async () => {
    const { records, port } = await startHarness({ ipLocationMap: { '127.0.0.1': 'Dock' } });
    const client = await connect(port);
    client.write(`${encodeSensorSample({ adc1: 1, adc2: 2, flame: false }, { format: 'no_loc' })}\n`);
    client.write(`${encodeSensorSample({ adc1: 3, adc2: 4, flame: false }, { format: 'separate', locationId: 'Bay' })}\n`);

    await waitFor(() => records.length === 2);
    expect(records.map(entry => entry.locationId)).toEqual(['Dock', 'Bay']);
  });

  it('refuses connections beyond the limit', async () => {
    const { server, metrics, port } = await startHarness({ maxConnections: 1 });
    await connect(port);
    await waitFor(() => server.connectionCount === 1);

    const refused = await connect(port);
    await new Promise<void>(resolve => refused.once('close', () => resolve()));

    expect(metrics.snapshot().connections).toEqual({ accepted: 1, refused: 1, active: 1 });
  });

  it('closes open connections on stop', async () => {
    const { server, metrics, port } = await startHarness();
    const client = await connect(port);
    await waitFor(() => server.connectionCount === 1);
    const closed = new Promise<void>(resolve => client.once('close', () => resolve()));

    await server.stop();
    await closed;

    expect(server.listening).toBe(false);
    expect(server.port).toBeNull();
    await waitFor(() => metrics.snapshot().connections.active === 0);
  });

  it('rejects start when the port is taken', async () => {
    const { port } = await startHarness();
    const second = new IngestionServer({
      config: { ...baseConfig, port },
      logger: createTestLogger(),
      metrics: new MetricsRegistry(),
      sink: () => {}
    });
    await expect(second.start()).rejects.toThrow(/EADDRINUSE/);
  });

  it('receives every packet from ten concurrent clients sending at 20 packets per second', async () => {
    const { metrics, records, port } = await startHarness();
    const clientCount = 10;
    const packetsPerClient = 100;

    const sockets = await Promise.all(Array.from({ length: clientCount }, () => connect(port)));
    await Promise.all(
      sockets.map(
        (socket, clientIndex) =>
          new Promise<void>(resolve => {
            let sent = 0;
            const timer = setInterval(() => {
              socket.write(
                `${encodeSensorSample(
                  { adc1: sent, adc2: clientIndex, flame: false },
                  { format: 'separate', locationId: `Zone${clientIndex}` }
                )}\n`
              );
              sent += 1;
              if (sent === packetsPerClient) {
                clearInterval(timer);
                resolve();
              }
            }, 50);
          })
      )
    );

    await waitFor(() => records.length === clientCount * packetsPerClient, 5000);
    const snapshot = metrics.snapshot();
    expect(snapshot.packets.received).toBe(1000);
    expect(snapshot.packets.errors).toBe(0);
    expect(snapshot.packets.dropped).toBe(0);
    expect(snapshot.connections).toEqual({ accepted: 10, refused: 0, active: 10 });
    expect(Object.keys(snapshot.packets.byLocation)).toHaveLength(10);
    expect(snapshot.packets.byLocation.Zone3?.receivedTotal).toBe(100);
  });
});
