import type { RateConfig } from '../config/index.js';
import { ConfigError } from '../errors.js';
import type { Clock } from '../types.js';

export type AdaptiveRateOptions = RateConfig & {
  clock?: Clock;
  /** Called whenever a stream's fps changes, including its first observation. */
  onChange?: (streamId: string, fps: number) => void;
};

type StreamState = {
  fps: number;
  lastAdjustmentAt: number | null;
  lastDepth: number;
  adjustments: number;
};

export type StreamStats = {
  fps: number;
  intervalMs: number;
  lastDepth: number;
  adjustments: number;
  lastAdjustmentAt: number | null;
};

const DECREASE_FACTOR = 0.75;

export const DEFAULT_RATE_CONFIG: RateConfig = Object.freeze({
  baseFps: 25,
  minFps: 5,
  maxFps: 30,
  highWatermark: 8,
  lowWatermark: 2,
  adjustmentCooldownMs: 1000
});

export function validateRateConfig(config: RateConfig) {
  const issues: string[] = [];
  const integers: Array<keyof RateConfig> = ['baseFps', 'minFps', 'maxFps', 'highWatermark', 'lowWatermark', 'adjustmentCooldownMs'];
  for (const key of integers) {
    if (!Number.isInteger(config[key]) || config[key] < 0) {
      issues.push(`rate.${key} must be a non-negative integer`);
    }
  }
  if (config.minFps < 1) {
    issues.push('rate.minFps must be >= 1');
  }
  if (config.minFps > config.maxFps) {
    issues.push('rate.minFps must be <= rate.maxFps');
  }
  if (config.baseFps < config.minFps || config.baseFps > config.maxFps) {
    issues.push('rate.baseFps must be within [minFps, maxFps]');
  }
  if (config.lowWatermark > config.highWatermark) {
    issues.push('rate.lowWatermark must be <= rate.highWatermark');
  }
  if (issues.length > 0) {
    throw new ConfigError(issues);
  }
}

/**
 * Maps a stream's backlog depth to a capture rate: back off by a quarter above
 * the high watermark, creep up by one frame below the low watermark, and
 * adjust at most once per cooldown window.
 */
export class AdaptiveRateController {
  private readonly config: RateConfig;
  private readonly clock: Clock;
  private readonly onChange?: (streamId: string, fps: number) => void;
  private readonly streams = new Map<string, StreamState>();

  constructor(options: Partial<AdaptiveRateOptions> = {}) {
    const { clock, onChange, ...overrides } = options;
    this.config = { ...DEFAULT_RATE_CONFIG, ...overrides };
    validateRateConfig(this.config);
    this.clock = clock ?? Date.now;
    this.onChange = onChange;
  }

  update(streamId: string, depth: number, now = this.clock()): number {
    const state = this.ensureStream(streamId);
    state.lastDepth = depth;

    if (state.lastAdjustmentAt !== null && now - state.lastAdjustmentAt < this.config.adjustmentCooldownMs) {
      return state.fps;
    }

    let next = state.fps;
    if (depth > this.config.highWatermark) {
      next = Math.max(this.config.minFps, Math.floor(state.fps * DECREASE_FACTOR));
    } else if (depth < this.config.lowWatermark) {
      next = Math.min(this.config.maxFps, state.fps + 1);
    }

    if (next !== state.fps) {
      state.fps = next;
      state.lastAdjustmentAt = now;
      state.adjustments += 1;
      this.onChange?.(streamId, next);
    }
    return state.fps;
  }

  getFps(streamId: string): number {
    return this.streams.get(streamId)?.fps ?? this.config.baseFps;
  }

  getIntervalMs(streamId: string): number {
    return Math.floor(1000 / this.getFps(streamId));
  }

  reset(streamId?: string) {
    if (streamId === undefined) {
      this.streams.clear();
      return;
    }
    this.streams.delete(streamId);
  }

  stats(): Record<string, StreamStats> {
    const result: Record<string, StreamStats> = {};
    for (const [streamId, state] of this.streams) {
      result[streamId] = {
        fps: state.fps,
        intervalMs: Math.floor(1000 / state.fps),
        lastDepth: state.lastDepth,
        adjustments: state.adjustments,
        lastAdjustmentAt: state.lastAdjustmentAt
      };
    }
    return result;
  }

  private ensureStream(streamId: string): StreamState {
    let state = this.streams.get(streamId);
    if (!state) {
      state = { fps: this.config.baseFps, lastAdjustmentAt: null, lastDepth: 0, adjustments: 0 };
      this.streams.set(streamId, state);
      this.onChange?.(streamId, state.fps);
    }
    return state;
  }
}
