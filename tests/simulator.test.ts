import net from 'node:net';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { decodePacket } from '../src/protocol/decoder.js';
import { THERMAL_COLS } from '../src/types.js';
import {
  buildFrameLine,
  buildSensorLine,
  buildThermalCells,
  DEFAULT_SIMULATOR_OPTIONS,
  parseSimulatorArgs,
  startCommandListener
} from '../scripts/sensor-simulator.js';
import { createTestLogger } from './helpers/context.js';

describe('sensor simulator', () => {
  it('places a 3x3 hot spot in the middle of the frame', () => {
    const cells = buildThermalCells(20, 90);
    expect(cells.filter(value => value === 90)).toHaveLength(9);
    expect(cells[12 * THERMAL_COLS + 16]).toBe(90);
    expect(cells[0]).toBe(20);
    expect(buildThermalCells(20, null).every(value => value === 20)).toBe(true);
  });

  it('emits frames the decoder accepts', () => {
    const result = decodePacket(buildFrameLine({ ...DEFAULT_SIMULATOR_OPTIONS, format: 'no_loc', hotspot: 90 }));
    if (!result.ok || result.record.kind !== 'thermal') {
      throw new Error('expected a thermal frame');
    }
    expect(result.format).toBe('no_loc');
    expect(result.record.locationId).toBeNull();
    expect(Math.max(...result.record.cells)).toBeCloseTo(90, 5);
  });

  it('embeds the location in sensor lines for continuous streams', () => {
    const line = buildSensorLine({ ...DEFAULT_SIMULATOR_OPTIONS, format: 'continuous' }, { adc1: 300, adc2: 120, flame: true });
    const result = decodePacket(line);
    if (!result.ok || result.record.kind !== 'sensor') {
      throw new Error('expected a sensor sample');
    }
    expect(result.format).toBe('embedded');
    expect(result.record).toMatchObject({ locationId: 'RoomA', adc1: 300, adc2: 120, flame: true });
  });

  it('parses command-line options', () => {
    expect(
      parseSimulatorArgs(['--format', 'continuous', '--fps', '5', '--hotspot', '80', '--location', 'Lab', '--command-port', '7001'])
    ).toEqual({
      options: { ...DEFAULT_SIMULATOR_OPTIONS, format: 'continuous', fps: 5, hotspot: 80, locationId: 'Lab', commandPort: 7001 },
      errors: []
    });
    expect(parseSimulatorArgs(['--format', 'mjpeg', '--fps', '0', '--bogus']).errors).toEqual([
      '--format must be one of separate, embedded, continuous, no_loc',
      '--fps requires a number >= 0.1',
      'Unknown option: --bogus'
    ]);
  });

  describe('command listener', () => {
    let server: net.Server | null = null;

    afterEach(async () => {
      const current = server;
      server = null;
      if (current) {
        await new Promise<void>(resolve => current.close(() => resolve()));
      }
    });

    function send(port: number, command: string): Promise<string> {
      return new Promise((resolve, reject) => {
        let reply = '';
        const socket = net.connect({ host: '127.0.0.1', port }, () => socket.write(`${command}\n`));
        socket.setEncoding('utf8');
        socket.on('data', (chunk: string) => {
          reply += chunk;
        });
        socket.once('error', reject);
        socket.once('close', () => resolve(reply));
      });
    }

    it('acknowledges known commands and refuses others', async () => {
      const onRequest = vi.fn();
      const onPeriodOn = vi.fn();
      server = await startCommandListener(0, { onRequest, onPeriodOn }, createTestLogger());
      const address = server.address();
      if (address === null || typeof address === 'string') {
        throw new Error('listener did not bind a TCP port');
      }

      expect(await send(address.port, 'REQUEST1')).toBe('OK\n');
      expect(await send(address.port, 'PERIOD_ON')).toBe('OK\n');
      expect(await send(address.port, 'EEPROM9')).toBe('ERR\n');
      expect(onRequest).toHaveBeenCalledTimes(1);
      expect(onPeriodOn).toHaveBeenCalledTimes(1);
    });
  });
});
