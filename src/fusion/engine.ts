import { EventEmitter } from 'node:events';
import { performance } from 'node:perf_hooks';
import type { FusionConfig } from '../config/index.js';
import type { Logger } from '../logger.js';
import type { MetricsRegistry } from '../metrics/index.js';
import { maxTemperature } from '../protocol/thermal.js';
import {
  FUSION_SOURCES,
  type AlarmTransition,
  type Clock,
  type DataRecord,
  type FusionInputs,
  type FusionResult,
  type FusionSource
} from '../types.js';
import {
  createConfidencePolicy,
  normalizeExceedance,
  type ConfidencePolicy,
  type SourceContribution
} from './confidence.js';
import { Mq135Sensor } from './gas.js';

/** Full scale of the 12-bit ADC channels on the field units. */
export const ADC_FULL_SCALE = 4095;

type HotCell = {
  lastExceededAt: number;
  deadline: number;
};

type FusionState = {
  locationId: string;
  hotCells: Map<number, HotCell>;
  maxTemperature: number | null;
  gasPpm: number | null;
  smokePct: number | null;
  flamePct: number | null;
  flame: boolean | null;
  adc1: number | null;
  adc2: number | null;
  visionConfidence: number | null;
  alarm: boolean;
  holdUntil: number | null;
  lastResult: FusionResult | null;
  updatedAt: number | null;
  thermalFrames: number;
  sensorSamples: number;
};

export type FusionStateSnapshot = {
  readonly locationId: string;
  readonly hotCells: number;
  readonly maxTemperature: number | null;
  readonly gasPpm: number | null;
  readonly smokePct: number | null;
  readonly flamePct: number | null;
  readonly flame: boolean | null;
  readonly adc1: number | null;
  readonly adc2: number | null;
  readonly visionConfidence: number | null;
  readonly alarm: boolean;
  readonly holdUntil: number | null;
  readonly lastResult: FusionResult | null;
  readonly updatedAt: number | null;
  readonly thermalFrames: number;
  readonly sensorSamples: number;
};

export type FusionEngineOptions = {
  config: FusionConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  clock?: Clock;
  policy?: ConfidencePolicy;
};

const INPUT_KEYS: Record<FusionSource, keyof FusionInputs> = {
  temperature: 'temperature',
  gasPpm: 'gasPpm',
  smokePct: 'smokePct',
  flamePct: 'flamePct',
  vision: 'visionConfidence'
};

/**
 * Per-location multi-source alarm fusion. Emits `alarm` with an
 * {@link AlarmTransition} whenever a location's alarm state flips.
 */
export class FusionEngine extends EventEmitter {
  private config: FusionConfig;
  private policy: ConfidencePolicy;
  private readonly customPolicy: boolean;
  private gasSensor: Mq135Sensor | null;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly clock: Clock;
  private readonly states = new Map<string, FusionState>();

  constructor(options: FusionEngineOptions) {
    super();
    this.config = options.config;
    this.customPolicy = Boolean(options.policy);
    this.policy = options.policy ?? createConfidencePolicy(options.config.confidence.policy, options.config.confidence.weights);
    this.gasSensor = options.config.gas.enabled ? new Mq135Sensor(options.config.gas) : null;
    this.logger = options.logger.child({ component: 'fusion' });
    this.metrics = options.metrics;
    this.clock = options.clock ?? Date.now;
  }

  /** Applies new thresholds and tuning; latched state is kept. */
  configure(config: FusionConfig) {
    this.config = config;
    if (!this.customPolicy) {
      this.policy = createConfidencePolicy(config.confidence.policy, config.confidence.weights);
    }
    this.gasSensor = config.gas.enabled ? new Mq135Sensor(config.gas) : null;
    this.logger.info(
      { thresholds: config.thresholds, minSources: config.minSources, policy: this.policy.name },
      'Fusion configuration updated'
    );
  }

  get policyName(): string {
    return this.policy.name;
  }

  locations(): string[] {
    return Array.from(this.states.keys()).sort();
  }

  fuse(locationId: string, inputs: Partial<FusionInputs>, now = this.clock()): FusionResult {
    const state = this.ensureState(locationId);

    if (state.holdUntil !== null && state.lastResult && now < state.holdUntil) {
      const held: FusionResult = {
        ...state.lastResult,
        contributing: new Set(state.lastResult.contributing),
        held: true,
        evaluatedAt: now
      };
      this.metrics.recordFusion(locationId, held);
      return held;
    }
    state.holdUntil = null;

    const { thresholds, ceilings, minSources, holdMs } = this.config;
    const hotCells = this.countHotCells(state, now);
    const contributions: SourceContribution[] = [];
    const contributing = new Set<FusionSource>();

    for (const source of FUSION_SOURCES) {
      const value = inputs[INPUT_KEYS[source]] ?? null;
      const threshold = thresholds[source];
      const exceeded = value !== null && value >= threshold;
      const latched = source === 'temperature' && hotCells > 0;
      if (!exceeded && !latched) {
        continue;
      }
      contributing.add(source);
      const effective = value !== null && exceeded ? value : threshold;
      contributions.push({
        source,
        value: effective,
        threshold,
        ceiling: ceilings[source],
        normalized: normalizeExceedance(effective, threshold, ceilings[source])
      });
    }

    const sourcesTriggered = contributing.size;
    const alarm = sourcesTriggered >= minSources;
    const result: FusionResult = {
      locationId,
      alarm,
      confidence: contributions.length > 0 ? this.policy.score(contributions) : 0,
      sourcesTriggered,
      contributing,
      hotCells,
      held: false,
      evaluatedAt: now
    };

    if (alarm && holdMs > 0) {
      state.holdUntil = now + holdMs;
    }
    const previous = state.alarm;
    state.alarm = alarm;
    state.lastResult = result;
    state.updatedAt = now;
    this.metrics.recordFusion(locationId, result);

    if (alarm !== previous) {
      const transition: AlarmTransition = { type: alarm ? 'raised' : 'cleared', locationId, result };
      if (alarm) {
        this.logger.warn(
          {
            locationId,
            sources: Array.from(contributing),
            confidence: result.confidence,
            hotCells
          },
          'Fire alarm raised'
        );
      } else {
        this.logger.info({ locationId }, 'Fire alarm cleared');
      }
      this.emit('alarm', transition);
    }

    return result;
  }

  /** Re-evaluates a location from its stored readings. */
  evaluate(locationId: string, now = this.clock()): FusionResult {
    const state = this.ensureState(locationId);
    return this.fuse(
      locationId,
      {
        temperature: state.maxTemperature,
        gasPpm: state.gasPpm,
        smokePct: state.smokePct,
        flamePct: state.flamePct,
        visionConfidence: state.visionConfidence
      },
      now
    );
  }

  ingest(locationId: string, record: DataRecord, now = this.clock()): FusionResult {
    const started = performance.now();
    const state = this.ensureState(locationId);
    if (record.kind === 'thermal') {
      this.recordThermal(locationId, record.cells, now);
      state.thermalFrames += 1;
    } else {
      state.adc1 = record.adc1;
      state.adc2 = record.adc2;
      state.flame = record.flame;
      state.smokePct = (record.adc1 * 100) / ADC_FULL_SCALE;
      state.flamePct = record.flame ? 100 : (record.adc2 * 100) / ADC_FULL_SCALE;
      if (this.gasSensor) {
        state.gasPpm = this.gasSensor.ppm(record.adc1);
      }
      state.sensorSamples += 1;
    }
    const result = this.evaluate(locationId, now);
    this.metrics.observeLatency('fusion', performance.now() - started);
    return result;
  }

  /**
   * Latches every cell at or above the temperature threshold until
   * `now + hotCellDecayMs`. Deadlines only ever move forward.
   */
  recordThermal(locationId: string, cells: readonly number[], now = this.clock()): number {
    const state = this.ensureState(locationId);
    const threshold = this.config.thresholds.temperature;
    const deadline = now + this.config.hotCellDecayMs;
    cells.forEach((value, index) => {
      if (value < threshold) {
        return;
      }
      const existing = state.hotCells.get(index);
      state.hotCells.set(index, {
        lastExceededAt: now,
        deadline: existing ? Math.max(existing.deadline, deadline) : deadline
      });
    });
    state.maxTemperature = maxTemperature(cells);
    return this.countHotCells(state, now);
  }

  isHot(locationId: string, cellIndex: number, now = this.clock()): boolean {
    const cell = this.states.get(locationId)?.hotCells.get(cellIndex);
    return cell !== undefined && now <= cell.deadline;
  }

  setVisionConfidence(locationId: string, confidence: number, now = this.clock()): FusionResult {
    if (!Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
      throw new RangeError(`Vision confidence must be within [0, 1], got ${confidence}`);
    }
    this.ensureState(locationId).visionConfidence = confidence;
    return this.evaluate(locationId, now);
  }

  setGasReading(locationId: string, ppm: number, now = this.clock()): FusionResult {
    if (!Number.isFinite(ppm) || ppm < 0) {
      throw new RangeError(`Gas concentration must be a non-negative number, got ${ppm}`);
    }
    this.ensureState(locationId).gasPpm = ppm;
    return this.evaluate(locationId, now);
  }

  getState(locationId: string, now = this.clock()): FusionStateSnapshot | null {
    const state = this.states.get(locationId);
    if (!state) {
      return null;
    }
    return {
      locationId: state.locationId,
      hotCells: this.countHotCells(state, now),
      maxTemperature: state.maxTemperature,
      gasPpm: state.gasPpm,
      smokePct: state.smokePct,
      flamePct: state.flamePct,
      flame: state.flame,
      adc1: state.adc1,
      adc2: state.adc2,
      visionConfidence: state.visionConfidence,
      alarm: state.alarm,
      holdUntil: state.holdUntil,
      lastResult: state.lastResult,
      updatedAt: state.updatedAt,
      thermalFrames: state.thermalFrames,
      sensorSamples: state.sensorSamples
    };
  }

  private ensureState(locationId: string): FusionState {
    if (locationId.length === 0) {
      throw new RangeError('Location id must not be empty');
    }
    let state = this.states.get(locationId);
    if (!state) {
      state = {
        locationId,
        hotCells: new Map(),
        maxTemperature: null,
        gasPpm: null,
        smokePct: null,
        flamePct: null,
        flame: null,
        adc1: null,
        adc2: null,
        visionConfidence: null,
        alarm: false,
        holdUntil: null,
        lastResult: null,
        updatedAt: null,
        thermalFrames: 0,
        sensorSamples: 0
      };
      this.states.set(locationId, state);
    }
    return state;
  }

  private countHotCells(state: FusionState, now: number): number {
    let count = 0;
    for (const [index, cell] of state.hotCells) {
      if (now > cell.deadline) {
        state.hotCells.delete(index);
      } else {
        count += 1;
      }
    }
    return count;
  }
}
