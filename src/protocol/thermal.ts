import type { ThermalCalibrationConfig } from '../config/index.js';
import { THERMAL_CELLS } from '../types.js';

export type ThermalCalibration = ThermalCalibrationConfig;

/** Field units send `(°C - 27) / 0.01` as a signed 16-bit word. */
export const DEFAULT_THERMAL_CALIBRATION: ThermalCalibration = Object.freeze({
  signed: true,
  scale: 0.01,
  offset: 27
});

export const HEX_CHARS_PER_CELL = 4;
export const CALIBRATION_BLOCK_WORDS = 66;
export const CONTINUOUS_FRAME_LENGTH = THERMAL_CELLS * HEX_CHARS_PER_CELL;
export const CONTINUOUS_FRAME_WITH_BLOCK_LENGTH =
  CONTINUOUS_FRAME_LENGTH + CALIBRATION_BLOCK_WORDS * HEX_CHARS_PER_CELL;

const WORD_PATTERN = /^[0-9a-fA-F]{4}$/;

export function rawToCelsius(raw: number, calibration: ThermalCalibration): number {
  const word = calibration.signed && raw >= 0x8000 ? raw - 0x10000 : raw;
  return word * calibration.scale + calibration.offset;
}

/**
 * Inverse of {@link rawToCelsius}. Values outside the 16-bit range saturate.
 */
export function celsiusToRaw(value: number, calibration: ThermalCalibration): number {
  const word = Math.round((value - calibration.offset) / calibration.scale);
  if (calibration.signed) {
    const clamped = Math.min(0x7fff, Math.max(-0x8000, word));
    return clamped < 0 ? clamped + 0x10000 : clamped;
  }
  return Math.min(0xffff, Math.max(0, word));
}

export type WordParseResult =
  | { ok: true; words: number[] }
  | { ok: false; index: number; token: string };

export function parseWords(tokens: readonly string[]): WordParseResult {
  const words: number[] = [];
  for (let index = 0; index < tokens.length; index += 1) {
    const token = tokens[index] ?? '';
    if (!WORD_PATTERN.test(token)) {
      return { ok: false, index, token };
    }
    words.push(Number.parseInt(token, 16));
  }
  return { ok: true, words };
}

export function chunkHex(data: string): string[] {
  const tokens: string[] = [];
  for (let offset = 0; offset < data.length; offset += HEX_CHARS_PER_CELL) {
    tokens.push(data.slice(offset, offset + HEX_CHARS_PER_CELL));
  }
  return tokens;
}

export function formatWord(word: number): string {
  if (!Number.isInteger(word) || word < 0 || word > 0xffff) {
    throw new RangeError(`Thermal word ${word} is outside 0..0xffff`);
  }
  return word.toString(16).padStart(HEX_CHARS_PER_CELL, '0');
}

export function maxTemperature(cells: readonly number[]): number | null {
  let max: number | null = null;
  for (const value of cells) {
    if (max === null || value > max) {
      max = value;
    }
  }
  return max;
}
