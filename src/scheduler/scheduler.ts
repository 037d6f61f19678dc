import { EventEmitter } from 'node:events';
import type { SchedulerConfig } from '../config/index.js';
import { DispatchError, toError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { MetricsRegistry } from '../metrics/index.js';
import type { Clock, Device, DeviceCommand, DispatchOutcome } from '../types.js';
import type { CommandDispatcher } from './dispatcher.js';
import type { DeviceSource } from './registry.js';

export type DeviceSchedulerOptions = {
  source: DeviceSource;
  dispatcher: CommandDispatcher;
  logger: Logger;
  metrics: MetricsRegistry;
  config: Pick<SchedulerConfig, 'tickMs' | 'periodOnRetryMs' | 'failureLogIntervalMs' | 'registryReloadMs'>;
  clock?: Clock;
};

type PeriodOnState = 'pending' | 'done' | 'not-required';

type DeviceState = {
  device: Device;
  lastRequestAt: number | null;
  periodOn: PeriodOnState;
  periodOnNextAttemptAt: number;
  inFlight: Promise<DispatchOutcome> | null;
  consecutiveFailures: number;
  lastFailureLogAt: number | null;
  suppressedFailures: number;
};

export type DeviceScheduleStatus = {
  deviceId: number;
  ip: string;
  mode: Device['mode'];
  lastRequestAt: number | null;
  periodOn: PeriodOnState;
  inFlight: boolean;
  consecutiveFailures: number;
};

/**
 * Polls the PFDS fleet. Continuous devices are switched on once with
 * `PERIOD_ON` (retried on its own cadence until it succeeds) and every device
 * is then asked for a reading with `REQUEST1` once per poll interval. At most
 * one command is in flight per device. Emits `dispatch` with each outcome.
 */
export class DeviceScheduler extends EventEmitter {
  private readonly source: DeviceSource;
  private readonly dispatcher: CommandDispatcher;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly config: DeviceSchedulerOptions['config'];
  private readonly clock: Clock;
  private readonly states = new Map<number, DeviceState>();
  private readonly pending = new Set<Promise<DispatchOutcome>>();
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private lastReloadAt = 0;
  private ticking: Promise<void> | null = null;

  constructor(options: DeviceSchedulerOptions) {
    super();
    this.source = options.source;
    this.dispatcher = options.dispatcher;
    this.logger = options.logger.child({ component: 'scheduler' });
    this.metrics = options.metrics;
    this.config = options.config;
    this.clock = options.clock ?? Date.now;
  }

  get isRunning(): boolean {
    return this.running;
  }

  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    this.running = true;
    const count = await this.reload();
    this.logger.info({ devices: count, tickMs: this.config.tickMs }, 'Device scheduler started');
    this.scheduleNext(0);
  }

  /** Stops ticking and waits for dispatches already in flight. */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.ticking;
    await Promise.allSettled(Array.from(this.pending));
    this.logger.info('Device scheduler stopped');
  }

  /**
   * Re-reads the device source; returns the number of scheduled devices. The
   * tick chain also calls it every `registryReloadMs` (0 disables that).
   */
  async reload(): Promise<number> {
    this.lastReloadAt = this.clock();
    const devices = await this.source.list();
    const seen = new Set<number>();
    const now = this.clock();

    for (const device of devices) {
      seen.add(device.id);
      const existing = this.states.get(device.id);
      // a different createdAt means the id now names another device
      if (!existing || existing.device.createdAt !== device.createdAt) {
        this.states.set(device.id, createState(device, now));
        continue;
      }
      if (existing.device.mode !== device.mode) {
        existing.periodOn = device.mode === 'continuous' ? 'pending' : 'not-required';
        existing.periodOnNextAttemptAt = now;
      }
      existing.device = device;
    }

    for (const id of Array.from(this.states.keys())) {
      if (!seen.has(id)) {
        this.states.delete(id);
      }
    }

    return this.states.size;
  }

  /** Runs one scheduling pass; returns the number of commands launched. */
  tick(now = this.clock()): number {
    let launched = 0;
    for (const state of this.states.values()) {
      if (state.inFlight) {
        continue;
      }
      const command = this.nextCommand(state, now);
      if (!command) {
        continue;
      }
      this.markAttempt(state, command, now);
      this.launch(state, command);
      launched += 1;
    }
    return launched;
  }

  /**
   * Re-issues the mode-appropriate command to every device at `ip`, queued
   * behind any command already in flight for that device.
   */
  async forceResend(ip: string): Promise<DispatchOutcome[]> {
    const now = this.clock();
    const launched: Array<Promise<DispatchOutcome>> = [];
    for (const state of this.states.values()) {
      if (state.device.ip !== ip) {
        continue;
      }
      const command: DeviceCommand = state.device.mode === 'continuous' ? 'PERIOD_ON' : 'REQUEST1';
      this.markAttempt(state, command, now);
      launched.push(this.launch(state, command));
    }
    if (launched.length === 0) {
      this.logger.warn({ ip }, 'No scheduled device at address');
    }
    return Promise.all(launched);
  }

  status(): DeviceScheduleStatus[] {
    return Array.from(this.states.values(), state => ({
      deviceId: state.device.id,
      ip: state.device.ip,
      mode: state.device.mode,
      lastRequestAt: state.lastRequestAt,
      periodOn: state.periodOn,
      inFlight: state.inFlight !== null,
      consecutiveFailures: state.consecutiveFailures
    }));
  }

  private scheduleNext(delayMs: number) {
    if (!this.running) {
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      this.ticking = this.runTick().finally(() => {
        this.ticking = null;
      });
    }, delayMs);
  }

  private async runTick() {
    if (!this.running) {
      return;
    }
    const reloadMs = this.config.registryReloadMs;
    if (reloadMs > 0 && this.clock() - this.lastReloadAt >= reloadMs) {
      try {
        await this.reload();
      } catch (error) {
        this.logger.error({ err: error }, 'Device reload failed');
      }
      if (!this.running) {
        return;
      }
    }
    this.tick();
    this.scheduleNext(this.config.tickMs);
  }

  private nextCommand(state: DeviceState, now: number): DeviceCommand | null {
    if (state.periodOn === 'pending') {
      return now >= state.periodOnNextAttemptAt ? 'PERIOD_ON' : null;
    }
    const intervalMs = state.device.pollIntervalSeconds * 1000;
    if (state.lastRequestAt === null || now - state.lastRequestAt >= intervalMs) {
      return 'REQUEST1';
    }
    return null;
  }

  private markAttempt(state: DeviceState, command: DeviceCommand, now: number) {
    if (command === 'REQUEST1') {
      state.lastRequestAt = now;
    } else {
      state.periodOnNextAttemptAt = now + this.config.periodOnRetryMs;
    }
  }

  private launch(state: DeviceState, command: DeviceCommand): Promise<DispatchOutcome> {
    const previous = state.inFlight;
    const run = async (): Promise<DispatchOutcome> => {
      if (previous) {
        await previous;
      }
      const outcome = await this.dispatchSafely(state.device, command);
      try {
        this.handleOutcome(state, outcome);
      } catch (error) {
        this.logger.error({ err: error, deviceId: state.device.id }, 'Dispatch outcome handler failed');
      }
      return outcome;
    };

    const promise = run();
    state.inFlight = promise;
    this.pending.add(promise);
    void promise.finally(() => {
      this.pending.delete(promise);
      if (state.inFlight === promise) {
        state.inFlight = null;
      }
    });
    return promise;
  }

  private async dispatchSafely(device: Device, command: DeviceCommand): Promise<DispatchOutcome> {
    const dispatchedAt = this.clock();
    try {
      return await this.dispatcher.dispatch(device, command);
    } catch (error) {
      const cause = toError(error);
      return {
        ok: false,
        deviceId: device.id,
        command,
        dispatchedAt,
        latencyMs: Math.max(0, this.clock() - dispatchedAt),
        response: null,
        error: new DispatchError(`${command} to ${device.ip}:${device.port} failed: ${cause.message}`, {
          deviceId: device.id,
          command,
          cause
        })
      };
    }
  }

  private handleOutcome(state: DeviceState, outcome: DispatchOutcome) {
    const { device } = state;
    this.metrics.recordDispatch(device.id, outcome.command, outcome.ok, outcome.latencyMs);

    if (outcome.command === 'PERIOD_ON') {
      if (outcome.ok) {
        state.periodOn = 'done';
        this.logger.info({ deviceId: device.id, ip: device.ip }, 'Continuous reporting enabled');
      } else {
        state.periodOn = 'pending';
        state.periodOnNextAttemptAt = Math.max(
          state.periodOnNextAttemptAt,
          outcome.dispatchedAt + this.config.periodOnRetryMs
        );
      }
    }

    if (outcome.ok) {
      if (state.consecutiveFailures > 0) {
        this.logger.info(
          {
            deviceId: device.id,
            ip: device.ip,
            failures: state.consecutiveFailures,
            suppressed: state.suppressedFailures
          },
          'Device dispatch recovered'
        );
      }
      state.consecutiveFailures = 0;
      state.suppressedFailures = 0;
      state.lastFailureLogAt = null;
    } else {
      state.consecutiveFailures += 1;
      this.logFailure(state, outcome);
    }

    this.emit('dispatch', outcome);
  }

  private logFailure(state: DeviceState, outcome: DispatchOutcome) {
    const now = this.clock();
    if (state.lastFailureLogAt !== null && now - state.lastFailureLogAt < this.config.failureLogIntervalMs) {
      state.suppressedFailures += 1;
      return;
    }
    this.logger.warn(
      {
        err: outcome.error,
        deviceId: state.device.id,
        ip: state.device.ip,
        command: outcome.command,
        consecutiveFailures: state.consecutiveFailures,
        suppressed: state.suppressedFailures
      },
      'Device dispatch failed'
    );
    state.lastFailureLogAt = now;
    state.suppressedFailures = 0;
  }
}

function createState(device: Device, now: number): DeviceState {
  return {
    device,
    lastRequestAt: null,
    periodOn: device.mode === 'continuous' ? 'pending' : 'not-required',
    periodOnNextAttemptAt: now,
    inFlight: null,
    consecutiveFailures: 0,
    lastFailureLogAt: null,
    suppressedFailures: 0
  };
}
