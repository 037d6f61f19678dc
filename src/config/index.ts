import fs from 'node:fs';
import net from 'node:net';
import path from 'node:path';
import { EventEmitter } from 'node:events';
import nodeConfig from 'config';
import { ConfigError } from '../errors.js';
import { getAvailableLogLevels } from '../logger.js';
import { FUSION_SOURCES, type FusionSource } from '../types.js';

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type IngestConfig = {
  host: string;
  port: number;
  maxConnections: number;
  maxLineLength: number;
  queueCapacity: number;
  idleTimeoutMs: number;
  ipLocationMap: Record<string, string>;
};

export type ThermalCalibrationConfig = {
  signed: boolean;
  scale: number;
  offset: number;
};

export type ProtocolConfig = {
  thermal: ThermalCalibrationConfig;
};

export type SourceValues = Record<FusionSource, number>;

export type ConfidencePolicyName = 'mean' | 'max' | 'weighted';

export type GasSensorConfig = {
  enabled: boolean;
  r0: number;
  rl: number;
  vcc: number;
  adcResolution: number;
};

export type FusionConfig = {
  thresholds: SourceValues;
  ceilings: SourceValues;
  minSources: number;
  holdMs: number;
  hotCellDecayMs: number;
  confidence: {
    policy: ConfidencePolicyName;
    weights: SourceValues;
  };
  gas: GasSensorConfig;
};

export type RateConfig = {
  baseFps: number;
  minFps: number;
  maxFps: number;
  highWatermark: number;
  lowWatermark: number;
  adjustmentCooldownMs: number;
};

export type SchedulerConfig = {
  tickMs: number;
  dispatchTimeoutMs: number;
  periodOnRetryMs: number;
  failureLogIntervalMs: number;
  registryReloadMs: number;
  defaultDevicePort: number;
};

export type RegistryConfig = {
  path: string;
};

export type HttpConfig = {
  enabled: boolean;
  host: string;
  port: number;
};

export type PyrowatchConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  ingest: IngestConfig;
  protocol: ProtocolConfig;
  fusion: FusionConfig;
  rate: RateConfig;
  scheduler: SchedulerConfig;
  registry: RegistryConfig;
  http: HttpConfig;
};

type JsonType = 'object' | 'number' | 'integer' | 'string' | 'boolean' | 'array';

type JsonSchema = {
  type: JsonType | JsonType[];
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean | JsonSchema;
  items?: JsonSchema;
  enum?: Array<string | number>;
  minimum?: number;
  maximum?: number;
  exclusiveMinimum?: number;
};

function strictObject(properties: Record<string, JsonSchema>): JsonSchema {
  return {
    type: 'object',
    required: Object.keys(properties),
    additionalProperties: false,
    properties
  };
}

const portSchema: JsonSchema = { type: 'integer', minimum: 0, maximum: 65535 };
const sourceValuesSchema: JsonSchema = strictObject(
  Object.fromEntries(FUSION_SOURCES.map((source): [string, JsonSchema] => [source, { type: 'number', minimum: 0 }]))
);

const pyrowatchConfigSchema: JsonSchema = strictObject({
  app: strictObject({ name: { type: 'string' } }),
  logging: strictObject({ level: { type: 'string' } }),
  ingest: strictObject({
    host: { type: 'string' },
    port: portSchema,
    maxConnections: { type: 'integer', minimum: 1 },
    maxLineLength: { type: 'integer', minimum: 64 },
    queueCapacity: { type: 'integer', minimum: 1 },
    idleTimeoutMs: { type: 'integer', minimum: 0 },
    ipLocationMap: { type: 'object', additionalProperties: { type: 'string' } }
  }),
  protocol: strictObject({
    thermal: strictObject({
      signed: { type: 'boolean' },
      scale: { type: 'number', exclusiveMinimum: 0 },
      offset: { type: 'number' }
    })
  }),
  fusion: strictObject({
    thresholds: sourceValuesSchema,
    ceilings: sourceValuesSchema,
    minSources: { type: 'integer', minimum: 1, maximum: FUSION_SOURCES.length },
    holdMs: { type: 'integer', minimum: 0 },
    hotCellDecayMs: { type: 'integer', minimum: 0 },
    confidence: strictObject({
      policy: { type: 'string', enum: ['mean', 'max', 'weighted'] },
      weights: sourceValuesSchema
    }),
    gas: strictObject({
      enabled: { type: 'boolean' },
      r0: { type: 'number', exclusiveMinimum: 0 },
      rl: { type: 'number', exclusiveMinimum: 0 },
      vcc: { type: 'number', exclusiveMinimum: 0 },
      adcResolution: { type: 'integer', minimum: 2 }
    })
  }),
  rate: strictObject({
    baseFps: { type: 'integer', minimum: 1 },
    minFps: { type: 'integer', minimum: 1 },
    maxFps: { type: 'integer', minimum: 1 },
    highWatermark: { type: 'integer', minimum: 0 },
    lowWatermark: { type: 'integer', minimum: 0 },
    adjustmentCooldownMs: { type: 'integer', minimum: 0 }
  }),
  scheduler: strictObject({
    tickMs: { type: 'integer', minimum: 10 },
    dispatchTimeoutMs: { type: 'integer', minimum: 1 },
    periodOnRetryMs: { type: 'integer', minimum: 1 },
    failureLogIntervalMs: { type: 'integer', minimum: 0 },
    registryReloadMs: { type: 'integer', minimum: 0 },
    defaultDevicePort: { type: 'integer', minimum: 1, maximum: 65535 }
  }),
  registry: strictObject({ path: { type: 'string' } }),
  http: strictObject({
    enabled: { type: 'boolean' },
    host: { type: 'string' },
    port: portSchema
  })
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const types = Array.isArray(schema.type) ? schema.type : [schema.type];
  const results = types.map(type => validateAgainstSchemaForType(type, schema, value, pathLabel));

  if (results.some(errors => errors.length === 0)) {
    return [];
  }

  return results[0] ?? [];
}

function validateNumberBounds(schema: JsonSchema, value: number, pathLabel: string): string[] {
  const errors: string[] = [];
  if (typeof schema.minimum === 'number' && value < schema.minimum) {
    errors.push(`${pathLabel} must be >= ${schema.minimum}`);
  }
  if (typeof schema.exclusiveMinimum === 'number' && value <= schema.exclusiveMinimum) {
    errors.push(`${pathLabel} must be > ${schema.exclusiveMinimum}`);
  }
  if (typeof schema.maximum === 'number' && value > schema.maximum) {
    errors.push(`${pathLabel} must be <= ${schema.maximum}`);
  }
  if (schema.enum && !schema.enum.includes(value)) {
    errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
  }
  return errors;
}

function validateAgainstSchemaForType(
  type: JsonType,
  schema: JsonSchema,
  value: unknown,
  pathLabel: string
): string[] {
  const errors: string[] = [];

  if (type === 'object') {
    if (!isRecord(value)) {
      errors.push(`${pathLabel} must be an object`);
      return errors;
    }

    for (const key of schema.required ?? []) {
      if (!(key in value)) {
        errors.push(`${pathLabel}.${key} is required`);
      }
    }

    const definedProperties = new Set(Object.keys(schema.properties ?? {}));
    const additional = schema.additionalProperties;
    if (additional === false) {
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(`${pathLabel}.${key} is not allowed`);
        }
      }
    } else if (additional && typeof additional === 'object') {
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(...validateAgainstSchema(additional, value[key], `${pathLabel}.${key}`));
        }
      }
    }

    for (const [key, childSchema] of Object.entries(schema.properties ?? {})) {
      if (key in value) {
        errors.push(...validateAgainstSchema(childSchema, value[key], `${pathLabel}.${key}`));
      }
    }

    return errors;
  }

  if (type === 'array') {
    if (!Array.isArray(value)) {
      errors.push(`${pathLabel} must be an array`);
      return errors;
    }

    const items = schema.items;
    if (items) {
      value.forEach((item, index) => {
        errors.push(...validateAgainstSchema(items, item, `${pathLabel}[${index}]`));
      });
    }

    return errors;
  }

  if (type === 'number' || type === 'integer') {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      errors.push(`${pathLabel} must be a number`);
      return errors;
    }
    if (type === 'integer' && !Number.isInteger(value)) {
      errors.push(`${pathLabel} must be an integer`);
      return errors;
    }
    return validateNumberBounds(schema, value, pathLabel);
  }

  if (type === 'string') {
    if (typeof value !== 'string') {
      errors.push(`${pathLabel} must be a string`);
      return errors;
    }

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
    }

    return errors;
  }

  if (typeof value !== 'boolean') {
    errors.push(`${pathLabel} must be a boolean`);
  }
  return errors;
}

export function validateConfig(config: unknown): asserts config is PyrowatchConfig {
  const errors = validateAgainstSchema(pyrowatchConfigSchema, config, 'config');
  if (errors.length > 0) {
    throw new ConfigError(errors);
  }
  validateLogicalConfig(config as PyrowatchConfig);
}

export function parseConfig(contents: string): PyrowatchConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError([message], 'Failed to parse configuration');
  }

  validateConfig(parsed);
  return parsed;
}

export function loadConfigFromFile(filePath: string): PyrowatchConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents);
}

/**
 * Reads `config/default.json` merged with `config/<NODE_ENV>.json` (and any
 * NODE_CONFIG overrides) through the config package, then validates it.
 */
export function loadConfig(): PyrowatchConfig {
  const raw: unknown = nodeConfig.util.toObject(nodeConfig);
  validateConfig(raw);
  return raw;
}

function validateLogicalConfig(config: PyrowatchConfig) {
  const messages: string[] = [];

  if (!config.app.name.trim()) {
    messages.push('config.app.name must be a non-empty string');
  }

  const levels = getAvailableLogLevels();
  if (!levels.includes(config.logging.level.trim().toLowerCase())) {
    messages.push(`config.logging.level must be one of ${levels.join(', ')}`);
  }

  for (const [ip, locationId] of Object.entries(config.ingest.ipLocationMap)) {
    if (net.isIP(ip) === 0) {
      messages.push(`config.ingest.ipLocationMap key "${ip}" is not a valid IP address`);
    }
    if (!locationId.trim()) {
      messages.push(`config.ingest.ipLocationMap.${ip} must map to a non-empty location id`);
    }
  }

  const { thresholds, ceilings, confidence } = config.fusion;
  for (const source of FUSION_SOURCES) {
    if (ceilings[source] <= thresholds[source]) {
      messages.push(
        `config.fusion.ceilings.${source} (${ceilings[source]}) must be greater than the threshold (${thresholds[source]})`
      );
    }
  }
  if (thresholds.vision > 1 || ceilings.vision > 1) {
    messages.push('config.fusion vision threshold and ceiling must be within [0, 1]');
  }
  if (confidence.policy === 'weighted' && FUSION_SOURCES.every(source => confidence.weights[source] === 0)) {
    messages.push('config.fusion.confidence.weights must contain at least one positive weight');
  }

  const rate = config.rate;
  if (rate.minFps > rate.maxFps) {
    messages.push('config.rate.minFps must be <= config.rate.maxFps');
  }
  if (rate.baseFps < rate.minFps || rate.baseFps > rate.maxFps) {
    messages.push('config.rate.baseFps must be within [minFps, maxFps]');
  }
  if (rate.lowWatermark > rate.highWatermark) {
    messages.push('config.rate.lowWatermark must be <= config.rate.highWatermark');
  }

  if (!config.registry.path.trim()) {
    messages.push('config.registry.path must be a non-empty string');
  }

  if (messages.length > 0) {
    throw new ConfigError(messages);
  }
}

export type ConfigReloadEvent = {
  previous: PyrowatchConfig;
  next: PyrowatchConfig;
};

/**
 * Holds a configuration file in memory and reloads it when it changes on disk.
 * A bad edit is reported through `error` and the last good contents are written back.
 */
export class ConfigManager extends EventEmitter {
  private currentConfig: PyrowatchConfig;
  private readonly filePath: string;
  private watcher: fs.FSWatcher | null = null;
  private watchRefs = 0;
  private reloadTimer: NodeJS.Timeout | null = null;
  private lastGoodRaw: string;
  private restoring = false;
  private restoreTimer: NodeJS.Timeout | null = null;

  constructor(filePath: string) {
    super();
    this.filePath = path.resolve(filePath);
    const { config, raw } = this.loadFromDisk();
    this.currentConfig = config;
    this.lastGoodRaw = raw;
  }

  getConfig(): PyrowatchConfig {
    return this.currentConfig;
  }

  getPath(): string {
    return this.filePath;
  }

  /**
   * Validates the file and hands it to the `reload` listeners. The new
   * contents only become the last good version once every listener accepted
   * them; a listener that throws leaves the previous configuration current.
   */
  reload(): PyrowatchConfig {
    const { config: next, raw } = this.loadFromDisk();
    const previous = this.currentConfig;
    this.emit('reload', { previous, next } satisfies ConfigReloadEvent);
    this.currentConfig = next;
    this.lastGoodRaw = raw;
    return next;
  }

  watch(): () => void {
    if (!this.watcher) {
      this.watcher = this.createWatcher();
    }

    this.watchRefs += 1;

    return () => {
      this.watchRefs = Math.max(0, this.watchRefs - 1);
      if (this.watchRefs === 0) {
        if (this.reloadTimer) {
          clearTimeout(this.reloadTimer);
          this.reloadTimer = null;
        }
        this.closeWatcher();
      }
    };
  }

  private scheduleReload() {
    if (this.reloadTimer) {
      clearTimeout(this.reloadTimer);
    }

    this.reloadTimer = setTimeout(() => {
      this.reloadTimer = null;
      try {
        this.reload();
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        if (this.listenerCount('error') > 0) {
          this.emit('error', err);
        }
        this.restorePreviousConfig();
      }
    }, 100);
  }

  private closeWatcher() {
    if (this.watcher) {
      this.watcher.close();
      this.watcher = null;
    }
    if (this.restoreTimer) {
      clearTimeout(this.restoreTimer);
      this.restoreTimer = null;
    }
    this.restoring = false;
  }

  private createWatcher() {
    return fs.watch(this.filePath, { persistent: false }, eventType => {
      if (this.restoring) {
        return;
      }

      if (eventType === 'rename') {
        this.closeWatcher();
        this.watcher = this.createWatcher();
      }
      this.scheduleReload();
    });
  }

  private loadFromDisk(): { config: PyrowatchConfig; raw: string } {
    const contents = fs.readFileSync(this.filePath, 'utf-8');
    const config = parseConfig(contents);
    return { config, raw: contents };
  }

  private restorePreviousConfig() {
    this.restoring = true;
    try {
      fs.writeFileSync(this.filePath, this.lastGoodRaw, 'utf-8');
    } catch (error) {
      if (this.listenerCount('error') > 0) {
        this.emit('error', error instanceof Error ? error : new Error(String(error)));
      }
    } finally {
      if (this.restoreTimer) {
        clearTimeout(this.restoreTimer);
      }
      this.restoreTimer = setTimeout(() => {
        this.restoring = false;
        this.restoreTimer = null;
      }, 200);
    }
  }
}

export { pyrowatchConfigSchema };
