export const THERMAL_ROWS = 24;
export const THERMAL_COLS = 32;
export const THERMAL_CELLS = THERMAL_ROWS * THERMAL_COLS;

/**
 * How a packet carried (or did not carry) its location id.
 * `continuous` marks unbroken hex thermal frames whatever their location placement.
 */
export type PacketFormat = 'separate' | 'embedded' | 'continuous' | 'no_loc';

export type RecordKind = 'identity' | 'thermal' | 'sensor';

export interface IdentityRecord {
  readonly kind: 'identity';
  readonly serial: string | null;
  readonly locationId: string | null;
}

export interface ThermalFrameRecord {
  readonly kind: 'thermal';
  readonly locationId: string | null;
  readonly rows: number;
  readonly cols: number;
  /** 16-bit words as received. */
  readonly raw: readonly number[];
  /** Calibrated temperatures in °C, row-major. */
  readonly cells: readonly number[];
  readonly calibrationBlock: readonly number[] | null;
}

export interface SensorSampleRecord {
  readonly kind: 'sensor';
  readonly locationId: string | null;
  readonly adc1: number;
  readonly adc2: number;
  readonly flame: boolean;
  readonly timestamp: number;
}

export type DataRecord = ThermalFrameRecord | SensorSampleRecord;
export type DecodedRecord = IdentityRecord | DataRecord;

export type FusionSource = 'temperature' | 'gasPpm' | 'smokePct' | 'flamePct' | 'vision';

export const FUSION_SOURCES: readonly FusionSource[] = [
  'temperature',
  'gasPpm',
  'smokePct',
  'flamePct',
  'vision'
];

export type FusionInputs = {
  temperature: number | null;
  gasPpm: number | null;
  smokePct: number | null;
  flamePct: number | null;
  visionConfidence: number | null;
};

export interface FusionResult {
  readonly locationId: string;
  readonly alarm: boolean;
  readonly confidence: number;
  readonly sourcesTriggered: number;
  readonly contributing: ReadonlySet<FusionSource>;
  readonly hotCells: number;
  readonly held: boolean;
  readonly evaluatedAt: number;
}

export type AlarmTransition = {
  type: 'raised' | 'cleared';
  locationId: string;
  result: FusionResult;
};

export type DeviceMode = 'continuous' | 'on-demand';

export interface Device {
  readonly id: number;
  readonly name: string;
  readonly ip: string;
  readonly port: number;
  readonly locationId: string | null;
  readonly mode: DeviceMode;
  readonly pollIntervalSeconds: number;
  readonly createdAt: number;
}

export type DeviceCommand = 'REQUEST1' | 'PERIOD_ON';

export interface DispatchOutcome {
  readonly ok: boolean;
  readonly deviceId: number;
  readonly command: DeviceCommand;
  readonly dispatchedAt: number;
  readonly latencyMs: number;
  readonly response: string | null;
  readonly error: Error | null;
}

export type Clock = () => number;
