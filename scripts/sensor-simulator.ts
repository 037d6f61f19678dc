import net from 'node:net';
import path from 'node:path';
import process from 'node:process';
import { createLogger, type Logger } from '../src/logger.js';
import { encodeIdentity, encodeSensorSample, encodeThermalCells } from '../src/protocol/encoder.js';
import { THERMAL_CELLS, THERMAL_COLS, type PacketFormat } from '../src/types.js';

export type SimulatorOptions = {
  host: string;
  port: number;
  serial: string;
  locationId: string;
  format: PacketFormat;
  fps: number;
  /** Frames to send before disconnecting; 0 runs until interrupted. */
  count: number;
  /** Ambient temperature of the synthetic frame, in °C. */
  ambient: number;
  /** Hot-spot temperature; `null` keeps the frame uniform. */
  hotspot: number | null;
  /** Serves REQUEST1 / PERIOD_ON on this port when set. */
  commandPort: number | null;
};

export const DEFAULT_SIMULATOR_OPTIONS: SimulatorOptions = {
  host: '127.0.0.1',
  port: 9001,
  serial: 'SIM001',
  locationId: 'RoomA',
  format: 'separate',
  fps: 2,
  count: 0,
  ambient: 22,
  hotspot: null,
  commandPort: null
};

const FORMATS: readonly PacketFormat[] = ['separate', 'embedded', 'continuous', 'no_loc'];

/** A uniform frame with an optional 3×3 hot spot centred on the array. */
export function buildThermalCells(ambient: number, hotspot: number | null): number[] {
  const cells = new Array<number>(THERMAL_CELLS).fill(ambient);
  if (hotspot !== null) {
    for (let row = 11; row <= 13; row += 1) {
      for (let col = 15; col <= 17; col += 1) {
        cells[row * THERMAL_COLS + col] = hotspot;
      }
    }
  }
  return cells;
}

export function buildFrameLine(options: SimulatorOptions): string {
  return encodeThermalCells(buildThermalCells(options.ambient, options.hotspot), {
    format: options.format,
    locationId: options.format === 'no_loc' ? null : options.locationId
  });
}

export function buildSensorLine(options: SimulatorOptions, sample: { adc1: number; adc2: number; flame: boolean }): string {
  const format = options.format === 'continuous' ? 'embedded' : options.format;
  return encodeSensorSample(sample, {
    format,
    locationId: format === 'no_loc' ? null : options.locationId
  });
}

/**
 * Answers the scheduler's commands: every command is acknowledged with `OK`;
 * REQUEST1 also pushes one sensor sample upstream, PERIOD_ON enables it on
 * every frame.
 */
export function startCommandListener(
  port: number,
  handlers: { onRequest: () => void; onPeriodOn: () => void },
  logger: Logger
): Promise<net.Server> {
  const server = net.createServer(socket => {
    let buffer = '';
    socket.setEncoding('utf8');
    socket.on('data', (chunk: string) => {
      buffer += chunk;
      let newline = buffer.indexOf('\n');
      while (newline !== -1) {
        const command = buffer.slice(0, newline).trim();
        buffer = buffer.slice(newline + 1);
        newline = buffer.indexOf('\n');
        if (command === 'REQUEST1') {
          handlers.onRequest();
        } else if (command === 'PERIOD_ON') {
          handlers.onPeriodOn();
        } else {
          logger.warn({ command }, 'Unknown command');
          socket.end('ERR\n');
          return;
        }
        logger.debug({ command }, 'Command acknowledged');
        socket.end('OK\n');
      }
    });
    socket.on('error', error => {
      logger.debug({ err: error }, 'Command socket error');
    });
  });

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, () => {
      server.off('error', reject);
      resolve(server);
    });
  });
}

export async function runSimulator(options: SimulatorOptions, logger: Logger): Promise<number> {
  const socket = net.connect({ host: options.host, port: options.port });
  await new Promise<void>((resolve, reject) => {
    socket.once('connect', resolve);
    socket.once('error', reject);
  });
  logger.info({ host: options.host, port: options.port, format: options.format }, 'Connected');

  let continuous = false;
  let sent = 0;
  const sendSample = () => {
    const sample = {
      adc1: Math.round(200 + Math.random() * 100),
      adc2: Math.round(100 + Math.random() * 50),
      flame: options.hotspot !== null
    };
    socket.write(`${buildSensorLine(options, sample)}\n`);
  };

  socket.write(`${encodeIdentity({ serial: options.serial })}\n`);
  if (options.format === 'no_loc') {
    socket.write(`${encodeIdentity({ locationId: options.locationId })}\n`);
  }

  const commandServer =
    options.commandPort === null
      ? null
      : await startCommandListener(
          options.commandPort,
          {
            onRequest: sendSample,
            onPeriodOn: () => {
              continuous = true;
            }
          },
          logger
        );

  await new Promise<void>(resolve => {
    const interval = setInterval(() => {
      socket.write(`${buildFrameLine(options)}\n`);
      if (continuous) {
        sendSample();
      }
      sent += 1;
      if (options.count > 0 && sent >= options.count) {
        clearInterval(interval);
        resolve();
      }
    }, Math.max(1, Math.round(1000 / options.fps)));

    process.once('SIGINT', () => {
      clearInterval(interval);
      resolve();
    });
  });

  await new Promise<void>(resolve => socket.end(resolve));
  if (commandServer) {
    await new Promise<void>(resolve => commandServer.close(() => resolve()));
  }
  logger.info({ frames: sent }, 'Simulator finished');
  return 0;
}

export function parseSimulatorArgs(argv: string[]): { options: SimulatorOptions; errors: string[] } {
  const options: SimulatorOptions = { ...DEFAULT_SIMULATOR_OPTIONS };
  const errors: string[] = [];

  const numberValue = (name: string, value: string | undefined, min: number): number | null => {
    const parsed = Number(value);
    if (value === undefined || !Number.isFinite(parsed) || parsed < min) {
      errors.push(`--${name} requires a number >= ${min}`);
      return null;
    }
    return parsed;
  };

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    const value = argv[index + 1];
    switch (token) {
      case '--host':
        options.host = value ?? options.host;
        index += 1;
        break;
      case '--port':
        options.port = numberValue('port', value, 1) ?? options.port;
        index += 1;
        break;
      case '--serial':
        options.serial = value ?? options.serial;
        index += 1;
        break;
      case '--location':
        options.locationId = value ?? options.locationId;
        index += 1;
        break;
      case '--format': {
        const format = FORMATS.find(candidate => candidate === value);
        if (format) {
          options.format = format;
        } else {
          errors.push(`--format must be one of ${FORMATS.join(', ')}`);
        }
        index += 1;
        break;
      }
      case '--fps':
        options.fps = numberValue('fps', value, 0.1) ?? options.fps;
        index += 1;
        break;
      case '--count':
        options.count = numberValue('count', value, 0) ?? options.count;
        index += 1;
        break;
      case '--ambient':
        options.ambient = numberValue('ambient', value, -40) ?? options.ambient;
        index += 1;
        break;
      case '--hotspot':
        options.hotspot = numberValue('hotspot', value, -40);
        index += 1;
        break;
      case '--command-port':
        options.commandPort = numberValue('command-port', value, 1);
        index += 1;
        break;
      default:
        errors.push(`Unknown option: ${token ?? ''}`);
        break;
    }
  }

  return { options, errors };
}

const scriptName = path.basename(process.argv[1] ?? '');

if (scriptName === 'sensor-simulator.ts' || scriptName === 'sensor-simulator.js') {
  const { options, errors } = parseSimulatorArgs(process.argv.slice(2));
  if (errors.length > 0) {
    errors.forEach(error => process.stderr.write(`${error}\n`));
    process.exitCode = 1;
  } else {
    const logger = createLogger({ name: 'pyrowatch-simulator', level: process.env.LOG_LEVEL ?? 'info' });
    runSimulator(options, logger).then(code => {
      process.exitCode = code;
    }).catch(error => {
      logger.error({ err: error }, 'Simulator failed');
      process.exitCode = 1;
    });
  }
}
