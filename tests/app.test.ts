import fs from 'node:fs';
import net from 'node:net';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { startService, type ServiceRuntime } from '../src/app.js';
import { DEFAULT_SIMULATOR_OPTIONS, runSimulator } from '../scripts/sensor-simulator.js';
import { createTestConfig, createTestContext, createTestLogger, waitFor } from './helpers/context.js';

function freePort(): Promise<number> {
  return new Promise((resolve, reject) => {
    const probe = net.createServer();
    probe.once('error', reject);
    probe.listen(0, '127.0.0.1', () => {
      const address = probe.address();
      probe.close(() => {
        if (address === null || typeof address === 'string') {
          reject(new Error('probe did not bind a TCP port'));
        } else {
          resolve(address.port);
        }
      });
    });
  });
}

describe('startService', () => {
  const runtimes: ServiceRuntime[] = [];
  const cleanups: Array<() => void | Promise<void>> = [];

  afterEach(async () => {
    for (const runtime of runtimes.splice(0)) {
      await runtime.stop('test');
    }
    for (const cleanup of cleanups.splice(0)) {
      await cleanup();
    }
  });

  it('raises an alarm from a simulated detector driven by the scheduler', async () => {
    const config = createTestConfig(draft => {
      draft.scheduler.tickMs = 50;
      draft.scheduler.periodOnRetryMs = 100;
      draft.scheduler.dispatchTimeoutMs = 500;
    });
    const runtime = await startService(createTestContext({ config }));
    runtimes.push(runtime);

    const commandPort = await freePort();
    await runtime.registry.add({
      name: 'Simulator',
      ip: '127.0.0.1',
      port: commandPort,
      mode: 'continuous',
      pollIntervalSeconds: 60,
      locationId: 'RoomA'
    });
    await runtime.scheduler.reload();

    const ingestPort = runtime.ingestion.port;
    if (ingestPort === null) {
      throw new Error('ingestion is not listening');
    }
    const simulation = runSimulator(
      { ...DEFAULT_SIMULATOR_OPTIONS, port: ingestPort, format: 'no_loc', fps: 20, count: 40, hotspot: 90, commandPort },
      createTestLogger()
    );

    await waitFor(() => runtime.fusion.getState('RoomA')?.alarm === true, 5000);
    expect(await simulation).toBe(0);

    const state = runtime.fusion.getState('RoomA');
    expect(state?.flame).toBe(true);
    expect(state?.maxTemperature).toBeCloseTo(90, 5);

    const snapshot = runtime.context.metrics.snapshot();
    expect(snapshot.packets.byLocation.RoomA?.received.identity).toBe(1);
    expect(snapshot.packets.byLocation.RoomA?.received.thermal).toBe(40);
    expect(snapshot.packets.errors).toBe(0);
    expect(snapshot.dispatch['1']?.PERIOD_ON?.success).toBe(1);
    expect(snapshot.streams.RoomA).toBeGreaterThanOrEqual(25);

    const httpPort = runtime.http?.port;
    const response = await fetch(`http://127.0.0.1:${httpPort}/health`);
    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      status: 'ok',
      checks: [
        { name: 'ingestion', status: 'ok' },
        { name: 'scheduler', status: 'ok' },
        { name: 'fusion', status: 'ok', details: { locations: ['RoomA'], alarms: ['RoomA'], policy: 'mean' } }
      ]
    });
  });

  it('stops every component once', async () => {
    const runtime = await startService(createTestContext());
    const { lifecycle } = runtime.context;
    expect(lifecycle.serviceStatus).toBe('running');

    await Promise.all([runtime.stop('first'), runtime.stop('second')]);

    expect(lifecycle.serviceStatus).toBe('stopped');
    expect(runtime.ingestion.listening).toBe(false);
    expect(runtime.scheduler.isRunning).toBe(false);
    expect(runtime.http?.server.listening).toBe(false);
  });

  it('fails fast when the ingestion port is taken', async () => {
    const blocker = net.createServer();
    await new Promise<void>(resolve => blocker.listen(0, '127.0.0.1', () => resolve()));
    cleanups.push(() => new Promise<void>(resolve => blocker.close(() => resolve())));
    const address = blocker.address();
    if (address === null || typeof address === 'string') {
      throw new Error('blocker did not bind a TCP port');
    }

    const context = createTestContext({
      config: createTestConfig(draft => {
        draft.ingest.port = address.port;
      })
    });

    await expect(startService(context)).rejects.toThrow(/EADDRINUSE/);
    expect(context.lifecycle.serviceStatus).toBe('stopped');
  });

  it('applies fusion and log level edits from a watched file', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pyrowatch-app-'));
    cleanups.push(() => fs.rmSync(dir, { recursive: true, force: true }));
    const filePath = path.join(dir, 'pyrowatch.json');
    const config = createTestConfig();
    fs.writeFileSync(filePath, JSON.stringify(config, null, 2));

    const runtime = await startService(createTestContext({ config }), { watchConfigFile: filePath });
    runtimes.push(runtime);

    const edited = createTestConfig(draft => {
      draft.logging.level = 'warn';
      draft.fusion.confidence.policy = 'max';
    });
    fs.writeFileSync(filePath, JSON.stringify(edited, null, 2));

    await waitFor(() => runtime.context.logger.level === 'warn', 3000);
    expect(runtime.fusion.policyName).toBe('max');
  });

  it('rejects a watched edit with an unknown log level and restores the file', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pyrowatch-app-'));
    cleanups.push(() => fs.rmSync(dir, { recursive: true, force: true }));
    const filePath = path.join(dir, 'pyrowatch.json');
    const config = createTestConfig();
    const original = JSON.stringify(config, null, 2);
    fs.writeFileSync(filePath, original);

    const runtime = await startService(createTestContext({ config }), { watchConfigFile: filePath });
    runtimes.push(runtime);

    const edited = {
      ...config,
      logging: { level: 'loud' },
      fusion: { ...config.fusion, confidence: { ...config.fusion.confidence, policy: 'max' } }
    };
    fs.writeFileSync(filePath, JSON.stringify(edited, null, 2));

    await waitFor(() => fs.readFileSync(filePath, 'utf-8') === original, 3000);
    expect(runtime.context.logger.level).toBe('silent');
    expect(runtime.fusion.policyName).toBe('mean');
  });
});
