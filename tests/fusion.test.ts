import { describe, expect, it } from 'vitest';
import type { FusionConfig } from '../src/config/index.js';
import {
  createConfidencePolicy,
  createWeightedPolicy,
  maxPolicy,
  meanPolicy,
  normalizeExceedance,
  type SourceContribution
} from '../src/fusion/confidence.js';
import { FusionEngine } from '../src/fusion/engine.js';
import { Mq135Sensor } from '../src/fusion/gas.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { THERMAL_CELLS, type AlarmTransition, type FusionSource, type SensorSampleRecord } from '../src/types.js';
import { createTestConfig, createTestLogger } from './helpers/context.js';

function createEngine(mutate?: (config: FusionConfig) => void) {
  const config = createTestConfig(full => mutate?.(full.fusion)).fusion;
  const metrics = new MetricsRegistry();
  const engine = new FusionEngine({ config, logger: createTestLogger(), metrics, clock: () => 0 });
  const transitions: AlarmTransition[] = [];
  engine.on('alarm', (transition: AlarmTransition) => transitions.push(transition));
  return { engine, metrics, transitions, config };
}

function frame(hot: Record<number, number> = {}, ambient = 20): number[] {
  const cells = new Array<number>(THERMAL_CELLS).fill(ambient);
  for (const [index, value] of Object.entries(hot)) {
    cells[Number(index)] = value;
  }
  return cells;
}

const sample = (adc1: number, adc2: number, flame: boolean): SensorSampleRecord => ({
  kind: 'sensor',
  locationId: 'RoomA',
  adc1,
  adc2,
  flame,
  timestamp: 0
});

const sorted = (sources: ReadonlySet<FusionSource>) => Array.from(sources).sort();

describe('FusionEngine.fuse', () => {
  it('raises an alarm when two sources exceed their thresholds', () => {
    const { engine } = createEngine();
    const result = engine.fuse('RoomA', { temperature: 50, gasPpm: 100, smokePct: 30, flamePct: null, visionConfidence: 0.5 }, 0);

    expect(result.alarm).toBe(true);
    expect(result.sourcesTriggered).toBe(2);
    expect(sorted(result.contributing)).toEqual(['smokePct', 'temperature']);
    // mean of (50-40)/80 and (30-25)/75
    expect(result.confidence).toBeCloseTo((0.125 + 5 / 75) / 2, 9);
    expect(result.held).toBe(false);
  });

  it('counts a reading equal to its threshold as exceeding', () => {
    const { engine } = createEngine();
    const result = engine.fuse('RoomA', { temperature: 40, visionConfidence: 0.7 }, 0);
    expect(result.sourcesTriggered).toBe(2);
    expect(result.alarm).toBe(true);
    expect(result.confidence).toBe(0);
  });

  it('sets sourcesTriggered to the exact number of exceeding inputs', () => {
    const { engine } = createEngine();
    const cases: Array<[Parameters<FusionEngine['fuse']>[1], number]> = [
      [{}, 0],
      [{ temperature: 39.99 }, 0],
      [{ flamePct: 100 }, 1],
      [{ temperature: 41, gasPpm: 401, smokePct: 26, flamePct: 26, visionConfidence: 0.71 }, 5],
      [{ temperature: 41, gasPpm: 399, smokePct: 26 }, 2]
    ];
    for (const [inputs, expected] of cases) {
      const result = engine.fuse('Lab', inputs, 0);
      expect(result.sourcesTriggered).toBe(expected);
      expect(result.alarm).toBe(expected >= 2);
    }
  });

  it('honours a different minimum source count', () => {
    const { engine } = createEngine(config => {
      config.minSources = 1;
    });
    expect(engine.fuse('RoomA', { flamePct: 30 }, 0).alarm).toBe(true);
  });

  it('emits a transition only when the alarm state flips', () => {
    const { engine, transitions } = createEngine();
    engine.fuse('RoomA', { temperature: 60, smokePct: 60 }, 0);
    engine.fuse('RoomA', { temperature: 61, smokePct: 61 }, 1);
    engine.fuse('RoomA', { temperature: 20 }, 2);

    expect(transitions.map(transition => [transition.type, transition.locationId])).toEqual([
      ['raised', 'RoomA'],
      ['cleared', 'RoomA']
    ]);
    expect(transitions[0]?.result.evaluatedAt).toBe(0);
  });

  it('freezes the decision for the hold period and re-arms afterwards', () => {
    const { engine, metrics, transitions } = createEngine(config => {
      config.holdMs = 10_000;
    });

    const raised = engine.fuse('RoomA', { temperature: 50, smokePct: 30 }, 0);
    expect(raised.alarm).toBe(true);
    const held = engine.fuse('RoomA', {}, 5_000);
    expect(held.alarm).toBe(true);
    expect(held.held).toBe(true);
    expect(held.evaluatedAt).toBe(5_000);
    expect(sorted(held.contributing)).toEqual(['smokePct', 'temperature']);
    expect(held.contributing).not.toBe(raised.contributing);

    const rearmed = engine.fuse('RoomA', {}, 10_000);
    expect(rearmed.alarm).toBe(false);
    expect(rearmed.held).toBe(false);
    expect(transitions.map(transition => transition.type)).toEqual(['raised', 'cleared']);

    const location = metrics.snapshot().packets.byLocation.RoomA;
    expect(location?.fusionInvocations).toBe(3);
    expect(location?.fusionAlarms).toBe(1);
  });

  it('uses an injected confidence policy and keeps it across reconfiguration', () => {
    const config = createTestConfig().fusion;
    const engine = new FusionEngine({
      config,
      logger: createTestLogger(),
      metrics: new MetricsRegistry(),
      policy: maxPolicy
    });
    const result = engine.fuse('RoomA', { temperature: 120, smokePct: 25 }, 0);
    expect(result.confidence).toBe(1);
    engine.configure({ ...config, minSources: 3 });
    expect(engine.policyName).toBe('max');
    expect(engine.fuse('RoomA', { temperature: 120, smokePct: 25 }, 1).alarm).toBe(false);
  });

  it('switches policy when reconfigured without an injected one', () => {
    const { engine, config } = createEngine();
    expect(engine.policyName).toBe('mean');
    engine.configure({ ...config, confidence: { ...config.confidence, policy: 'weighted' } });
    expect(engine.policyName).toBe('weighted');
  });
});

describe('FusionEngine hot-cell debounce', () => {
  it('keeps a cell hot until the decay deadline', () => {
    const { engine } = createEngine();
    expect(engine.recordThermal('RoomA', frame({ 10: 45, 11: 40 }), 1_000)).toBe(2);

    expect(engine.isHot('RoomA', 10, 6_000)).toBe(true);
    expect(engine.isHot('RoomA', 10, 6_001)).toBe(false);
    expect(engine.isHot('RoomA', 12, 1_000)).toBe(false);
  });

  it('extends the deadline on a new exceedance', () => {
    const { engine } = createEngine();
    engine.recordThermal('RoomA', frame({ 10: 45 }), 1_000);
    engine.recordThermal('RoomA', frame({ 10: 41 }), 3_000);
    engine.recordThermal('RoomA', frame(), 4_000);

    expect(engine.isHot('RoomA', 10, 7_000)).toBe(true);
    expect(engine.isHot('RoomA', 10, 8_001)).toBe(false);
  });

  it('counts a latched cell as a temperature source after the reading cools', () => {
    const { engine } = createEngine();
    engine.recordThermal('RoomA', frame({ 100: 80 }), 0);

    const latched = engine.fuse('RoomA', { temperature: 20, smokePct: 30 }, 1_000);
    expect(latched.hotCells).toBe(1);
    expect(sorted(latched.contributing)).toEqual(['smokePct', 'temperature']);
    expect(latched.alarm).toBe(true);

    const expired = engine.fuse('RoomA', { temperature: 20, smokePct: 30 }, 6_000);
    expect(expired.hotCells).toBe(0);
    expect(expired.sourcesTriggered).toBe(1);
  });
});

describe('FusionEngine.ingest', () => {
  it('derives smoke and flame percentages from a sensor sample', () => {
    const { engine } = createEngine();
    const result = engine.ingest('RoomA', sample(1734, 2293, true), 0);
    const state = engine.getState('RoomA', 0);

    expect(result.alarm).toBe(true);
    expect(sorted(result.contributing)).toEqual(['flamePct', 'smokePct']);
    expect(state?.flame).toBe(true);
    expect(state?.flamePct).toBe(100);
    expect(state?.smokePct).toBeCloseTo((1734 * 100) / 4095, 9);
    expect(state?.gasPpm).toBeNull();
    expect(state?.sensorSamples).toBe(1);
  });

  it('uses ADC2 as the flame level when the flame flag is clear', () => {
    const { engine } = createEngine();
    engine.ingest('RoomA', sample(100, 819, false), 0);
    expect(engine.getState('RoomA', 0)?.flamePct).toBeCloseTo(20, 9);
  });

  it('combines thermal frames and sensor samples of one location', () => {
    const { engine } = createEngine();
    engine.ingest(
      'RoomA',
      { kind: 'thermal', locationId: 'RoomA', rows: 24, cols: 32, raw: [], cells: frame({ 5: 75 }), calibrationBlock: null },
      0
    );
    const result = engine.ingest('RoomA', sample(2000, 0, false), 500);

    expect(sorted(result.contributing)).toEqual(['smokePct', 'temperature']);
    const state = engine.getState('RoomA', 500);
    expect(state?.maxTemperature).toBe(75);
    expect(state?.thermalFrames).toBe(1);
    expect(state?.hotCells).toBe(1);
  });

  it('derives gas concentration from ADC1 when the MQ-135 model is enabled', () => {
    const { engine, config } = createEngine(fusion => {
      fusion.gas.enabled = true;
    });
    engine.ingest('RoomA', sample(1734, 0, false), 0);
    expect(engine.getState('RoomA', 0)?.gasPpm).toBeCloseTo(new Mq135Sensor(config.gas).ppm(1734), 9);
  });

  it('keeps external vision and gas readings between evaluations', () => {
    const { engine } = createEngine();
    engine.setVisionConfidence('RoomA', 0.9, 0);
    const result = engine.setGasReading('RoomA', 800, 0);
    expect(sorted(result.contributing)).toEqual(['gasPpm', 'vision']);
    expect(engine.evaluate('RoomA', 1).alarm).toBe(true);
  });

  it('rejects out-of-range collaborator inputs', () => {
    const { engine } = createEngine();
    expect(() => engine.setVisionConfidence('RoomA', 1.5)).toThrow(RangeError);
    expect(() => engine.setGasReading('RoomA', -1)).toThrow(RangeError);
    expect(() => engine.fuse('', {}, 0)).toThrow(RangeError);
  });

  it('lists locations and returns null for unknown ones', () => {
    const { engine } = createEngine();
    engine.fuse('Zeta', {}, 0);
    engine.fuse('Alpha', {}, 0);
    expect(engine.locations()).toEqual(['Alpha', 'Zeta']);
    expect(engine.getState('Nowhere')).toBeNull();
  });
});

describe('confidence policies', () => {
  const contribution = (source: FusionSource, normalized: number): SourceContribution => ({
    source,
    value: 0,
    threshold: 0,
    ceiling: 1,
    normalized
  });
  const pair = [contribution('temperature', 0.2), contribution('smokePct', 0.6)];

  it('normalizes exceedance between threshold and ceiling', () => {
    expect(normalizeExceedance(50, 40, 120)).toBe(0.125);
    expect(normalizeExceedance(200, 40, 120)).toBe(1);
    expect(normalizeExceedance(30, 40, 120)).toBe(0);
    expect(normalizeExceedance(5, 5, 5)).toBe(1);
    expect(normalizeExceedance(4, 5, 5)).toBe(0);
  });

  it('averages, maximizes or weights the contributions', () => {
    expect(meanPolicy.score(pair)).toBeCloseTo(0.4, 9);
    expect(maxPolicy.score(pair)).toBe(0.6);
    const weights = { temperature: 3, gasPpm: 0, smokePct: 1, flamePct: 0, vision: 0 };
    expect(createWeightedPolicy(weights).score(pair)).toBeCloseTo(0.3, 9);
  });

  it('scores nothing as zero', () => {
    expect(meanPolicy.score([])).toBe(0);
    expect(maxPolicy.score([])).toBe(0);
    const zero = { temperature: 0, gasPpm: 0, smokePct: 0, flamePct: 0, vision: 0 };
    expect(createWeightedPolicy(zero).score(pair)).toBe(0);
  });

  it('builds policies by name', () => {
    const weights = { temperature: 1, gasPpm: 1, smokePct: 1, flamePct: 1, vision: 1 };
    expect(createConfidencePolicy('mean', weights)).toBe(meanPolicy);
    expect(createConfidencePolicy('max', weights)).toBe(maxPolicy);
    expect(createConfidencePolicy('weighted', weights).name).toBe('weighted');
  });
});

describe('Mq135Sensor', () => {
  const settings = { r0: 76.63, rl: 10, vcc: 5, adcResolution: 4096 };

  it('computes the load-divider resistance', () => {
    const sensor = new Mq135Sensor(settings);
    expect(sensor.resistance(2048)).toBe(10);
    expect(sensor.resistance(4096)).toBe(0.1);
    expect(sensor.resistance(0)).toBe(Number.POSITIVE_INFINITY);
  });

  it('applies the gas curve to the resistance ratio', () => {
    const sensor = new Mq135Sensor(settings);
    expect(sensor.ppm(2048)).toBeCloseTo(116.6020682 * Math.pow(10 / 76.63, -2.769034857), 6);
    expect(sensor.ppm(2048, 'CO')).toBeCloseTo(605.18 * Math.pow(10 / 76.63, -3.937), 6);
    expect(sensor.ppm(0)).toBe(0);
  });

  it('calibrates R0 from a clean-air reading', () => {
    const sensor = new Mq135Sensor(settings);
    expect(sensor.calibrate(2048)).toBeCloseTo(10 / 3.6, 9);
    expect(sensor.resistanceInCleanAir).toBeCloseTo(10 / 3.6, 9);
    expect(sensor.airQuality(2048).label).toBe('Excellent');
    expect(() => sensor.calibrate(0)).toThrow(RangeError);
  });

  it('bands very high concentrations as hazardous', () => {
    const band = new Mq135Sensor(settings).airQuality(2048);
    expect(band.index).toBe(5);
    expect(band.label).toBe('Hazardous');
  });
});
