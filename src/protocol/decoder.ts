import { ParseError, type ParseErrorCode } from '../errors.js';
import {
  THERMAL_CELLS,
  THERMAL_COLS,
  THERMAL_ROWS,
  type Clock,
  type DecodedRecord,
  type PacketFormat,
  type SensorSampleRecord,
  type ThermalFrameRecord
} from '../types.js';
import {
  CONTINUOUS_FRAME_LENGTH,
  CONTINUOUS_FRAME_WITH_BLOCK_LENGTH,
  DEFAULT_THERMAL_CALIBRATION,
  chunkHex,
  parseWords,
  rawToCelsius,
  type ThermalCalibration
} from './thermal.js';

export type DecodeOptions = {
  calibration?: ThermalCalibration;
  now?: Clock;
};

export type DecodeSuccess = {
  ok: true;
  record: DecodedRecord;
  format: PacketFormat;
  /** Characters of the input belonging to this packet, newline included. */
  consumed: number;
};

export type DecodeFailure = {
  ok: false;
  error: ParseError;
  consumed: number;
};

export type DecodeResult = DecodeSuccess | DecodeFailure;

type LineOutcome =
  | { ok: true; record: DecodedRecord; format: PacketFormat }
  | { ok: false; error: ParseError };

type Placement = 'separate' | 'embedded' | 'no_loc';

type DataTag = 'frame' | 'Sensor';

export const SENSOR_FIELD_COUNT = 3;

const SERIAL_PREFIX = 'serialno:';
const LOCATION_PREFIX = 'locid:';

/**
 * Decodes the first packet in `input`. Anything after the first newline is
 * left for the next call; `consumed` says where that packet ends.
 * Malformed input yields `{ ok: false }` and never throws.
 */
export function decodePacket(input: string | Buffer, options: DecodeOptions = {}): DecodeResult {
  const text = typeof input === 'string' ? input : input.toString('utf8');
  const newline = text.indexOf('\n');
  const consumed = newline === -1 ? text.length : newline + 1;
  const line = normalizeLine(newline === -1 ? text : text.slice(0, newline));
  return { ...decodeLine(line, options), consumed };
}

export function normalizeLine(line: string): string {
  return line.trim().replace(/!+$/, '').trimEnd();
}

function fail(code: ParseErrorCode, message: string, raw: string, locationId: string | null = null): LineOutcome {
  return { ok: false, error: new ParseError(code, message, raw, locationId) };
}

function decodeLine(line: string, options: DecodeOptions): LineOutcome {
  if (line.length === 0) {
    return fail('empty', 'Empty packet', line);
  }
  if (!line.startsWith('#')) {
    return fail('unknown-type', 'Packet does not start with "#"', line);
  }

  const body = line.slice(1);

  if (body.startsWith(SERIAL_PREFIX) || body.startsWith(LOCATION_PREFIX)) {
    return decodeIdentity(line, body);
  }

  let tag: DataTag;
  if (body.startsWith('frame')) {
    tag = 'frame';
  } else if (body.toLowerCase().startsWith('sensor')) {
    tag = 'Sensor';
  } else {
    const name = body.split(/[:\s]/, 1)[0] ?? '';
    return fail('unknown-type', `Unknown packet type "#${name}"`, line);
  }

  const afterTag = body.slice(tag.length);
  const colon = afterTag.indexOf(':');
  if (colon === -1) {
    return fail('missing-separator', `Missing ":" after #${tag}`, line);
  }

  const embedded = afterTag.slice(0, colon).trim();
  const data = afterTag.slice(colon + 1);
  let placement: Placement;
  let locationId: string | null;
  let payload: string;

  if (embedded.length > 0) {
    placement = 'embedded';
    locationId = embedded;
    payload = data.trim();
  } else {
    const split = splitLocationField(data, tag);
    placement = split.locationId === null ? 'no_loc' : 'separate';
    locationId = split.locationId;
    payload = split.payload;
  }

  return tag === 'frame'
    ? decodeThermalFrame(line, payload, locationId, placement, options)
    : decodeSensorSample(line, payload, locationId, placement, options);
}

function decodeIdentity(line: string, body: string): LineOutcome {
  const isSerial = body.startsWith(SERIAL_PREFIX);
  const value = body.slice(isSerial ? SERIAL_PREFIX.length : LOCATION_PREFIX.length).trim();
  if (value.length === 0) {
    return fail('field-value', `Empty ${isSerial ? 'serial number' : 'location id'}`, line);
  }
  return {
    ok: true,
    format: 'separate',
    record: Object.freeze({
      kind: 'identity',
      serial: isSerial ? value : null,
      locationId: isSerial ? null : value
    })
  };
}

/**
 * `<loc>:<payload>` vs. a bare payload. Sensor keys may carry a stray colon
 * (`ADC3:=905`), so a candidate containing `=` or `,` is not a location.
 */
function splitLocationField(data: string, tag: DataTag): { locationId: string | null; payload: string } {
  const colon = data.indexOf(':');
  if (colon === -1) {
    return { locationId: null, payload: data.trim() };
  }
  const candidate = data.slice(0, colon).trim();
  const rest = data.slice(colon + 1).trim();
  if (tag === 'Sensor' && (/[=,]/.test(candidate) || rest.startsWith('='))) {
    return { locationId: null, payload: data.trim() };
  }
  return {
    locationId: candidate.length > 0 ? candidate : null,
    payload: rest
  };
}

function decodeThermalFrame(
  line: string,
  payload: string,
  locationId: string | null,
  placement: Placement,
  options: DecodeOptions
): LineOutcome {
  const spaced = /\s/.test(payload);
  let tokens: string[];
  let format: PacketFormat;

  if (spaced) {
    tokens = payload.split(/\s+/).filter(token => token.length > 0);
    if (tokens.length !== THERMAL_CELLS) {
      return fail(
        'frame-length',
        `Expected ${THERMAL_CELLS} thermal cells, got ${tokens.length}`,
        line,
        locationId
      );
    }
    format = placement;
  } else {
    if (payload.length !== CONTINUOUS_FRAME_LENGTH && payload.length !== CONTINUOUS_FRAME_WITH_BLOCK_LENGTH) {
      return fail(
        'frame-length',
        `Expected ${CONTINUOUS_FRAME_LENGTH} or ${CONTINUOUS_FRAME_WITH_BLOCK_LENGTH} hex characters, got ${payload.length}`,
        line,
        locationId
      );
    }
    tokens = chunkHex(payload);
    format = 'continuous';
  }

  const parsed = parseWords(tokens);
  if (!parsed.ok) {
    return fail(
      'frame-hex',
      `Invalid hex word "${parsed.token}" at cell ${parsed.index}`,
      line,
      locationId
    );
  }

  const calibration = options.calibration ?? DEFAULT_THERMAL_CALIBRATION;
  const raw = parsed.words.slice(0, THERMAL_CELLS);
  const calibrationBlock = parsed.words.length > THERMAL_CELLS ? Object.freeze(parsed.words.slice(THERMAL_CELLS)) : null;
  const record: ThermalFrameRecord = Object.freeze({
    kind: 'thermal',
    locationId,
    rows: THERMAL_ROWS,
    cols: THERMAL_COLS,
    raw: Object.freeze(raw),
    cells: Object.freeze(raw.map(word => rawToCelsius(word, calibration))),
    calibrationBlock
  });
  return { ok: true, record, format };
}

function parseReading(value: string): number | null {
  if (value.length === 0) {
    return null;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : null;
}

function parseFlag(value: string): boolean | null {
  switch (value.toLowerCase()) {
    case '1':
    case 'true':
      return true;
    case '0':
    case 'false':
      return false;
    default:
      return null;
  }
}

function decodeSensorSample(
  line: string,
  payload: string,
  locationId: string | null,
  placement: Placement,
  options: DecodeOptions
): LineOutcome {
  // empty fields count, so `ADC1=1,,ADC2=2,MPY30=1` has four
  const parts = payload.split(',').map(part => part.trim());

  if (parts.length !== SENSOR_FIELD_COUNT) {
    return fail(
      'field-count',
      `Expected ${SENSOR_FIELD_COUNT} sensor fields, got ${parts.length}`,
      line,
      locationId
    );
  }

  const fields = new Map<string, string>();
  for (const part of parts) {
    const separator = part.indexOf('=');
    if (separator <= 0) {
      return fail('field-value', `Malformed sensor field "${part}"`, line, locationId);
    }
    const key = part.slice(0, separator).trim().replace(/:+$/, '').trim().toUpperCase();
    fields.set(key, part.slice(separator + 1).trim());
  }

  const adc1Text = fields.get('ADC1');
  const adc2Text = fields.get('ADC2');
  const flameText = fields.get('MPY30') ?? fields.get('FLAME');
  if (adc1Text === undefined || adc2Text === undefined || flameText === undefined) {
    const missing = [
      adc1Text === undefined ? 'ADC1' : null,
      adc2Text === undefined ? 'ADC2' : null,
      flameText === undefined ? 'MPY30' : null
    ].filter((name): name is string => name !== null);
    return fail('missing-field', `Missing sensor field(s): ${missing.join(', ')}`, line, locationId);
  }

  const adc1 = parseReading(adc1Text);
  const adc2 = parseReading(adc2Text);
  const flame = parseFlag(flameText);
  if (adc1 === null) {
    return fail('field-value', `ADC1 is not a valid reading: "${adc1Text}"`, line, locationId);
  }
  if (adc2 === null) {
    return fail('field-value', `ADC2 is not a valid reading: "${adc2Text}"`, line, locationId);
  }
  if (flame === null) {
    return fail('field-value', `Flame flag must be 0, 1, true or false: "${flameText}"`, line, locationId);
  }

  const record: SensorSampleRecord = Object.freeze({
    kind: 'sensor',
    locationId,
    adc1,
    adc2,
    flame,
    timestamp: (options.now ?? Date.now)()
  });
  return { ok: true, record, format: placement };
}
