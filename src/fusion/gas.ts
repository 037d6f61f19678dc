import type { GasSensorConfig } from '../config/index.js';

export type GasType = 'CO2' | 'CO' | 'NH3' | 'Alcohol' | 'Acetone' | 'Toluene';

/** `ppm = a * (Rs / R0) ^ b` fits from the MQ-135 datasheet. */
export const MQ135_CURVES: Readonly<Record<GasType, readonly [number, number]>> = {
  CO2: [116.6020682, -2.769034857],
  CO: [605.18, -3.937],
  NH3: [102.2, -2.473],
  Alcohol: [77.255, -3.18],
  Acetone: [34.668, -3.369],
  Toluene: [44.947, -3.445]
};

export type AirQualityBand = {
  index: number;
  label: 'Excellent' | 'Good' | 'Moderate' | 'Poor' | 'Unhealthy' | 'Hazardous';
  co2Ppm: number;
};

const AIR_QUALITY_LIMITS = [400, 600, 1000, 1500, 2000];
const AIR_QUALITY_LABELS: ReadonlyArray<AirQualityBand['label']> = [
  'Excellent',
  'Good',
  'Moderate',
  'Poor',
  'Unhealthy',
  'Hazardous'
];

const MIN_RESISTANCE = 0.1;
const CLEAN_AIR_RATIO = 3.6;

export class Mq135Sensor {
  private r0: number;
  private readonly rl: number;
  private readonly vcc: number;
  private readonly adcResolution: number;

  constructor(config: Omit<GasSensorConfig, 'enabled'>) {
    this.r0 = config.r0;
    this.rl = config.rl;
    this.vcc = config.vcc;
    this.adcResolution = config.adcResolution;
  }

  get resistanceInCleanAir(): number {
    return this.r0;
  }

  /** Sensor resistance in kΩ; infinite for a zero reading. */
  resistance(adc: number): number {
    const vout = (adc / this.adcResolution) * this.vcc;
    if (vout <= 0) {
      return Number.POSITIVE_INFINITY;
    }
    return Math.max((this.vcc * this.rl) / vout - this.rl, MIN_RESISTANCE);
  }

  ppm(adc: number, gas: GasType = 'CO2'): number {
    const [a, b] = MQ135_CURVES[gas];
    const ratio = this.resistance(adc) / this.r0;
    return Math.max(a * Math.pow(ratio, b), 0);
  }

  /** Sets R0 from a reading taken in clean air and returns it. */
  calibrate(adcInCleanAir: number): number {
    const rs = this.resistance(adcInCleanAir);
    if (!Number.isFinite(rs)) {
      throw new RangeError('Cannot calibrate from a zero reading');
    }
    this.r0 = rs / CLEAN_AIR_RATIO;
    return this.r0;
  }

  airQuality(adc: number): AirQualityBand {
    const co2Ppm = this.ppm(adc, 'CO2');
    const index = AIR_QUALITY_LIMITS.findIndex(limit => co2Ppm < limit);
    const resolved = index === -1 ? AIR_QUALITY_LABELS.length - 1 : index;
    return { index: resolved, label: AIR_QUALITY_LABELS[resolved] ?? 'Hazardous', co2Ppm };
  }
}
