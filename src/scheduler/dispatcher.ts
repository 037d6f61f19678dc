import net from 'node:net';
import { performance } from 'node:perf_hooks';
import { DispatchError } from '../errors.js';
import type { Clock, Device, DeviceCommand, DispatchOutcome } from '../types.js';

export interface CommandDispatcher {
  dispatch(device: Device, command: DeviceCommand): Promise<DispatchOutcome>;
}

export type TcpCommandDispatcherOptions = {
  timeoutMs: number;
  clock?: Clock;
};

/**
 * One short-lived connection per command: send `<COMMAND>\n`, wait for the
 * first reply line. Never rejects; failures come back as `ok: false`.
 */
export class TcpCommandDispatcher implements CommandDispatcher {
  private readonly timeoutMs: number;
  private readonly clock: Clock;

  constructor(options: TcpCommandDispatcherOptions) {
    this.timeoutMs = options.timeoutMs;
    this.clock = options.clock ?? Date.now;
  }

  dispatch(device: Device, command: DeviceCommand): Promise<DispatchOutcome> {
    const dispatchedAt = this.clock();
    const started = performance.now();

    return new Promise(resolve => {
      let settled = false;
      let received = '';
      const socket = net.connect({ host: device.ip, port: device.port });

      const finish = (response: string | null, error: DispatchError | null) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        socket.destroy();
        resolve({
          ok: error === null,
          deviceId: device.id,
          command,
          dispatchedAt,
          latencyMs: performance.now() - started,
          response,
          error
        });
      };

      const timer = setTimeout(() => {
        finish(
          null,
          new DispatchError(`${command} to ${device.ip}:${device.port} timed out after ${this.timeoutMs}ms`, {
            deviceId: device.id,
            command,
            isTimeout: true
          })
        );
      }, this.timeoutMs);

      socket.setNoDelay(true);
      socket.once('connect', () => {
        socket.write(`${command}\n`);
      });
      socket.on('data', (chunk: Buffer) => {
        received += chunk.toString('utf8');
        const newline = received.indexOf('\n');
        if (newline !== -1) {
          finish(received.slice(0, newline).trim(), null);
        }
      });
      socket.once('end', () => {
        const reply = received.trim();
        if (reply.length > 0) {
          finish(reply, null);
        }
      });
      socket.once('error', error => {
        finish(
          null,
          new DispatchError(`${command} to ${device.ip}:${device.port} failed: ${error.message}`, {
            deviceId: device.id,
            command,
            cause: error
          })
        );
      });
      socket.once('close', () => {
        finish(
          null,
          new DispatchError(`${device.ip}:${device.port} closed before acknowledging ${command}`, {
            deviceId: device.id,
            command
          })
        );
      });
    });
  }
}
