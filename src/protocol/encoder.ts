import { THERMAL_CELLS, type PacketFormat } from '../types.js';
import {
  CALIBRATION_BLOCK_WORDS,
  DEFAULT_THERMAL_CALIBRATION,
  celsiusToRaw,
  formatWord,
  type ThermalCalibration
} from './thermal.js';

export type IdentityInput = { serial: string } | { locationId: string };

export type ThermalEncodeOptions = {
  format: PacketFormat;
  locationId?: string | null;
  calibrationBlock?: readonly number[] | null;
};

export type SensorEncodeInput = {
  adc1: number;
  adc2: number;
  flame: boolean;
};

export type SensorEncodeOptions = {
  format: Exclude<PacketFormat, 'continuous'>;
  locationId?: string | null;
};

function assertLocation(format: PacketFormat, locationId: string | null | undefined): string {
  if (!locationId || /[:\s!#]/.test(locationId)) {
    throw new RangeError(`Format "${format}" needs a location id without ":", "!", "#" or whitespace`);
  }
  return locationId;
}

function encodeTagged(tag: string, format: Exclude<PacketFormat, 'continuous'>, locationId: string | null | undefined, payload: string) {
  switch (format) {
    case 'separate':
      return `#${tag}:${assertLocation(format, locationId)}:${payload}!`;
    case 'embedded':
      return `#${tag}${assertLocation(format, locationId)}:${payload}!`;
    case 'no_loc':
      return `#${tag}:${payload}!`;
  }
}

export function encodeIdentity(identity: IdentityInput): string {
  if ('serial' in identity) {
    return `#serialno:${identity.serial}!`;
  }
  return `#locid:${identity.locationId}!`;
}

/**
 * Encodes 768 raw 16-bit words. A `continuous` frame is unbroken hex, with the
 * location embedded after the tag when one is given.
 */
export function encodeThermalFrame(raw: readonly number[], options: ThermalEncodeOptions): string {
  if (raw.length !== THERMAL_CELLS) {
    throw new RangeError(`Thermal frame needs ${THERMAL_CELLS} cells, got ${raw.length}`);
  }
  const words = raw.map(formatWord);

  if (options.format === 'continuous') {
    const block = options.calibrationBlock ?? null;
    if (block && block.length !== CALIBRATION_BLOCK_WORDS) {
      throw new RangeError(`Calibration block needs ${CALIBRATION_BLOCK_WORDS} words, got ${block.length}`);
    }
    const hex = words.join('') + (block ? block.map(formatWord).join('') : '');
    return options.locationId ? encodeTagged('frame', 'embedded', options.locationId, hex) : `#frame:${hex}!`;
  }

  return encodeTagged('frame', options.format, options.locationId, words.join(' '));
}

export function encodeThermalCells(
  cells: readonly number[],
  options: ThermalEncodeOptions & { calibration?: ThermalCalibration }
): string {
  const calibration = options.calibration ?? DEFAULT_THERMAL_CALIBRATION;
  return encodeThermalFrame(
    cells.map(value => celsiusToRaw(value, calibration)),
    options
  );
}

export function encodeSensorSample(sample: SensorEncodeInput, options: SensorEncodeOptions): string {
  const payload = `ADC1=${sample.adc1},ADC2=${sample.adc2},MPY30=${sample.flame ? 1 : 0}`;
  return encodeTagged('Sensor', options.format, options.locationId, payload);
}
