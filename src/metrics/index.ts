import pino from 'pino';
import type { Clock, DeviceCommand, RecordKind } from '../types.js';

type CounterMap = Record<string, number>;

type LatencyStats = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
  averageMs: number;
};

type LocationState = {
  received: Map<string, number>;
  errors: Map<string, number>;
  dropped: number;
  queueDepth: number;
  fusionInvocations: number;
  fusionAlarms: number;
};

type DispatchCounters = {
  success: number;
  failure: number;
};

export type LocationSnapshot = {
  received: CounterMap;
  receivedTotal: number;
  errors: CounterMap;
  errorsTotal: number;
  dropped: number;
  queueDepth: number;
  fusionInvocations: number;
  fusionAlarms: number;
};

export type MetricsSnapshot = {
  createdAt: string;
  uptimeSeconds: number;
  packets: {
    received: number;
    errors: number;
    dropped: number;
    byLocation: Record<string, LocationSnapshot>;
  };
  connections: {
    accepted: number;
    refused: number;
    active: number;
  };
  fusion: {
    invocations: number;
    alarms: number;
  };
  dispatch: Record<string, Partial<Record<DeviceCommand, DispatchCounters>>>;
  streams: Record<string, number>;
  latencies: Record<string, LatencyStats>;
  logs: {
    byLevel: CounterMap;
    currentLevel: string;
    levelChanges: number;
    lastErrorAt: string | null;
    lastErrorMessage: string | null;
  };
};

export type PrometheusSample = {
  value: number;
  labels?: Record<string, string>;
};

type PrometheusFamilyOptions = {
  type: 'counter' | 'gauge';
  help?: string;
  labels?: Record<string, string>;
};

export type PrometheusExportOptions = {
  prefix?: string;
  labels?: Record<string, string>;
};

const DEFAULT_PREFIX = 'pyrowatch';

class MetricsRegistry {
  private readonly clock: Clock;
  private readonly startedAt: number;
  private readonly locations = new Map<string, LocationState>();
  private readonly dispatchCounters = new Map<string, Map<DeviceCommand, DispatchCounters>>();
  private readonly streamFps = new Map<string, number>();
  private readonly latencyStats = new Map<string, { count: number; totalMs: number; minMs: number; maxMs: number }>();
  private readonly logLevelCounters = new Map<string, number>();
  private currentLogLevel = 'info';
  private logLevelChanges = 0;
  private lastErrorAt: number | null = null;
  private lastErrorMessage: string | null = null;
  private connectionsAccepted = 0;
  private connectionsRefused = 0;
  private connectionsActive = 0;

  constructor(options: { clock?: Clock } = {}) {
    this.clock = options.clock ?? Date.now;
    this.startedAt = this.clock();
  }

  private ensureLocation(locationId: string): LocationState {
    let state = this.locations.get(locationId);
    if (!state) {
      state = {
        received: new Map(),
        errors: new Map(),
        dropped: 0,
        queueDepth: 0,
        fusionInvocations: 0,
        fusionAlarms: 0
      };
      this.locations.set(locationId, state);
    }
    return state;
  }

  recordPacket(locationId: string, kind: RecordKind) {
    const state = this.ensureLocation(locationId);
    state.received.set(kind, (state.received.get(kind) ?? 0) + 1);
  }

  recordPacketError(locationId: string, code: string) {
    const state = this.ensureLocation(locationId);
    state.errors.set(code, (state.errors.get(code) ?? 0) + 1);
  }

  recordDroppedRecord(locationId: string, count = 1) {
    this.ensureLocation(locationId).dropped += count;
  }

  setQueueDepth(locationId: string, depth: number) {
    this.ensureLocation(locationId).queueDepth = depth;
  }

  recordConnectionAccepted() {
    this.connectionsAccepted += 1;
    this.connectionsActive += 1;
  }

  recordConnectionRefused() {
    this.connectionsRefused += 1;
  }

  recordConnectionClosed() {
    this.connectionsActive = Math.max(0, this.connectionsActive - 1);
  }

  recordFusion(locationId: string, result: { alarm: boolean; held: boolean }) {
    const state = this.ensureLocation(locationId);
    state.fusionInvocations += 1;
    if (result.alarm && !result.held) {
      state.fusionAlarms += 1;
    }
  }

  recordDispatch(deviceId: number, command: DeviceCommand, ok: boolean, latencyMs: number) {
    const key = String(deviceId);
    const byCommand = this.dispatchCounters.get(key) ?? new Map<DeviceCommand, DispatchCounters>();
    const counters = byCommand.get(command) ?? { success: 0, failure: 0 };
    if (ok) {
      counters.success += 1;
    } else {
      counters.failure += 1;
    }
    byCommand.set(command, counters);
    this.dispatchCounters.set(key, byCommand);
    this.observeLatency('dispatch', latencyMs);
  }

  setStreamFps(streamId: string, fps: number) {
    this.streamFps.set(streamId, fps);
  }

  observeLatency(metric: string, durationMs: number) {
    const current = this.latencyStats.get(metric) ?? {
      count: 0,
      totalMs: 0,
      minMs: Number.POSITIVE_INFINITY,
      maxMs: 0
    };

    this.latencyStats.set(metric, {
      count: current.count + 1,
      totalMs: current.totalMs + durationMs,
      minMs: Math.min(current.minMs, durationMs),
      maxMs: Math.max(current.maxMs, durationMs)
    });
  }

  incrementLogLevel(level: string, context?: { message?: string; component?: string }) {
    const normalized = level.toLowerCase();
    this.logLevelCounters.set(normalized, (this.logLevelCounters.get(normalized) ?? 0) + 1);

    if (normalized === 'error' || normalized === 'fatal') {
      this.lastErrorAt = this.clock();
      if (context?.message) {
        this.lastErrorMessage = context.component
          ? `[${context.component}] ${context.message}`
          : context.message;
      }
    }
  }

  recordLogLevelChange(level: string, previous?: string | null) {
    const normalized = level.toLowerCase();
    const previousNormalized = typeof previous === 'string' ? previous.toLowerCase() : null;
    this.currentLogLevel = normalized;
    if (previousNormalized && previousNormalized !== normalized) {
      this.logLevelChanges += 1;
    }
  }

  snapshot(): MetricsSnapshot {
    const byLocation: Record<string, LocationSnapshot> = {};
    let received = 0;
    let errors = 0;
    let dropped = 0;
    let invocations = 0;
    let alarms = 0;

    for (const [locationId, state] of sortedEntries(this.locations)) {
      const receivedTotal = sum(state.received);
      const errorsTotal = sum(state.errors);
      byLocation[locationId] = {
        received: mapFrom(state.received),
        receivedTotal,
        errors: mapFrom(state.errors),
        errorsTotal,
        dropped: state.dropped,
        queueDepth: state.queueDepth,
        fusionInvocations: state.fusionInvocations,
        fusionAlarms: state.fusionAlarms
      };
      received += receivedTotal;
      errors += errorsTotal;
      dropped += state.dropped;
      invocations += state.fusionInvocations;
      alarms += state.fusionAlarms;
    }

    const dispatch: MetricsSnapshot['dispatch'] = {};
    for (const [deviceId, byCommand] of sortedEntries(this.dispatchCounters)) {
      const entry: Partial<Record<DeviceCommand, DispatchCounters>> = {};
      for (const [command, counters] of byCommand) {
        entry[command] = { ...counters };
      }
      dispatch[deviceId] = entry;
    }

    const latencies: Record<string, LatencyStats> = {};
    for (const [metric, stats] of sortedEntries(this.latencyStats)) {
      latencies[metric] = {
        count: stats.count,
        totalMs: stats.totalMs,
        minMs: stats.count > 0 ? stats.minMs : 0,
        maxMs: stats.maxMs,
        averageMs: stats.count > 0 ? stats.totalMs / stats.count : 0
      };
    }

    const now = this.clock();
    return {
      createdAt: new Date(now).toISOString(),
      uptimeSeconds: Math.max(0, (now - this.startedAt) / 1000),
      packets: { received, errors, dropped, byLocation },
      connections: {
        accepted: this.connectionsAccepted,
        refused: this.connectionsRefused,
        active: this.connectionsActive
      },
      fusion: { invocations, alarms },
      dispatch,
      streams: mapFrom(this.streamFps),
      latencies,
      logs: {
        byLevel: mapLogLevelCounters(this.logLevelCounters),
        currentLevel: this.currentLogLevel,
        levelChanges: this.logLevelChanges,
        lastErrorAt: this.lastErrorAt ? new Date(this.lastErrorAt).toISOString() : null,
        lastErrorMessage: this.lastErrorMessage
      }
    };
  }

  exportPrometheus(options: PrometheusExportOptions = {}): string {
    const prefix = sanitizePrometheusMetricName(options.prefix ?? DEFAULT_PREFIX);
    const labels = options.labels;
    const snapshot = this.snapshot();
    const locations = Object.entries(snapshot.packets.byLocation);
    const families: string[] = [];
    const name = (suffix: string) => `${prefix}_${suffix}`;

    families.push(
      formatPrometheusFamily(
        name('packets_received_total'),
        locations.flatMap(([location, state]) =>
          Object.entries(state.received).map(([kind, value]) => ({ value, labels: { location, kind } }))
        ),
        { type: 'counter', help: 'Decoded packets by location and record kind', labels }
      ),
      formatPrometheusFamily(
        name('packet_errors_total'),
        locations.flatMap(([location, state]) =>
          Object.entries(state.errors).map(([code, value]) => ({ value, labels: { location, code } }))
        ),
        { type: 'counter', help: 'Malformed packets by location and parse error code', labels }
      ),
      formatPrometheusFamily(
        name('records_dropped_total'),
        locations.map(([location, state]) => ({ value: state.dropped, labels: { location } })),
        { type: 'counter', help: 'Records dropped from full handoff queues', labels }
      ),
      formatPrometheusFamily(
        name('queue_depth'),
        locations.map(([location, state]) => ({ value: state.queueDepth, labels: { location } })),
        { type: 'gauge', help: 'Records waiting in each location handoff queue', labels }
      ),
      formatPrometheusFamily(
        name('connections_total'),
        [
          { value: snapshot.connections.accepted, labels: { outcome: 'accepted' } },
          { value: snapshot.connections.refused, labels: { outcome: 'refused' } }
        ],
        { type: 'counter', help: 'Ingestion connections by outcome', labels }
      ),
      formatPrometheusFamily(
        name('connections_active'),
        [{ value: snapshot.connections.active }],
        { type: 'gauge', help: 'Open ingestion connections', labels }
      ),
      formatPrometheusFamily(
        name('fusion_invocations_total'),
        locations.map(([location, state]) => ({ value: state.fusionInvocations, labels: { location } })),
        { type: 'counter', help: 'Fusion evaluations per location', labels }
      ),
      formatPrometheusFamily(
        name('fusion_alarms_total'),
        locations.map(([location, state]) => ({ value: state.fusionAlarms, labels: { location } })),
        { type: 'counter', help: 'Fusion evaluations that raised an alarm', labels }
      ),
      formatPrometheusFamily(
        name('dispatch_total'),
        Object.entries(snapshot.dispatch).flatMap(([device, byCommand]) =>
          Object.entries(byCommand).flatMap(([command, counters]) => [
            { value: counters.success, labels: { device, command, outcome: 'success' } },
            { value: counters.failure, labels: { device, command, outcome: 'failure' } }
          ])
        ),
        { type: 'counter', help: 'Device command dispatches by outcome', labels }
      ),
      formatPrometheusFamily(
        name('stream_fps'),
        Object.entries(snapshot.streams).map(([stream, value]) => ({ value, labels: { stream } })),
        { type: 'gauge', help: 'Target capture rate per stream', labels }
      )
    );

    const latencyEntries = Object.entries(snapshot.latencies);
    const latencyFields: Array<[string, keyof LatencyStats]> = [
      ['latency_ms_count', 'count'],
      ['latency_ms_sum', 'totalMs'],
      ['latency_ms_min', 'minMs'],
      ['latency_ms_max', 'maxMs']
    ];
    for (const [suffix, field] of latencyFields) {
      families.push(
        formatPrometheusFamily(
          name(suffix),
          latencyEntries.map(([operation, stats]) => ({ value: stats[field], labels: { operation } })),
          { type: 'gauge', labels }
        )
      );
    }

    families.push(
      formatPrometheusFamily(
        name('log_messages_total'),
        Object.entries(snapshot.logs.byLevel).map(([level, value]) => ({ value, labels: { level } })),
        { type: 'counter', help: 'Log lines emitted by level', labels }
      ),
      formatPrometheusFamily(
        name('log_level_changes_total'),
        [{ value: snapshot.logs.levelChanges }],
        { type: 'counter', labels }
      ),
      formatPrometheusFamily(
        name('uptime_seconds'),
        [{ value: snapshot.uptimeSeconds }],
        { type: 'gauge', help: 'Seconds since the registry started', labels }
      )
    );

    return `${families.filter(Boolean).join('\n')}\n`;
  }
}

function sortedEntries<V>(map: Map<string, V>): Array<[string, V]> {
  return Array.from(map.entries()).sort(([a], [b]) => a.localeCompare(b));
}

function sum(map: Map<string, number>): number {
  let total = 0;
  for (const value of map.values()) {
    total += value;
  }
  return total;
}

function mapFrom(map: Map<string, number>): CounterMap {
  return Object.fromEntries(sortedEntries(map));
}

function mapLogLevelCounters(source: Map<string, number>): CounterMap {
  const result: CounterMap = {};
  for (const level of Object.keys(pino.levels.values)) {
    const count = source.get(level);
    if (typeof count === 'number') {
      result[level] = count;
    }
  }
  for (const [level, count] of sortedEntries(source)) {
    if (!(level in result)) {
      result[level] = count;
    }
  }
  return result;
}

function formatPrometheusFamily(
  metricName: string,
  samples: PrometheusSample[],
  options: PrometheusFamilyOptions
): string {
  const filtered = samples.filter(sample => Number.isFinite(sample.value));
  if (filtered.length === 0) {
    return '';
  }

  const sanitizedName = sanitizePrometheusMetricName(metricName);
  const baseLabels = options.labels ?? {};
  const rendered = filtered
    .map(sample => {
      const labelString = formatPrometheusLabels({ ...baseLabels, ...(sample.labels ?? {}) });
      return { labelString, value: sample.value };
    })
    .sort((a, b) => a.labelString.localeCompare(b.labelString));

  const lines: string[] = [];
  if (options.help) {
    lines.push(`# HELP ${sanitizedName} ${escapePrometheusHelp(options.help)}`);
  }
  lines.push(`# TYPE ${sanitizedName} ${options.type}`);
  for (const sample of rendered) {
    lines.push(`${sanitizedName}${sample.labelString} ${formatPrometheusValue(sample.value)}`);
  }
  return lines.join('\n');
}

function sanitizePrometheusMetricName(name: string): string {
  const sanitized = name.replace(/[^A-Za-z0-9_]/g, '_');
  const collapsed = sanitized.replace(/_{2,}/g, '_').replace(/^_+|_+$/g, '');
  const lower = collapsed.toLowerCase();
  if (!lower) {
    return `${DEFAULT_PREFIX}_metric`;
  }
  if (/^[0-9]/.test(lower)) {
    return `${DEFAULT_PREFIX}_${lower}`;
  }
  return lower;
}

function sanitizePrometheusLabelName(name: string): string {
  const sanitized = name.replace(/[^A-Za-z0-9_]/g, '_');
  const collapsed = sanitized.replace(/_{2,}/g, '_').replace(/^_+|_+$/g, '');
  const lower = collapsed.toLowerCase();
  if (!lower) {
    return 'label';
  }
  if (/^[0-9]/.test(lower)) {
    return `_${lower}`;
  }
  return lower;
}

function escapePrometheusLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');
}

function escapePrometheusHelp(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, ' ');
}

function formatPrometheusLabels(labels: Record<string, string>): string {
  const entries = Object.entries(labels);
  if (entries.length === 0) {
    return '';
  }
  const normalized = entries.map(([key, value]) => [sanitizePrometheusLabelName(key), value] as const);
  normalized.sort(([a], [b]) => a.localeCompare(b));
  const rendered = normalized.map(([key, value]) => `${key}="${escapePrometheusLabelValue(value)}"`);
  return `{${rendered.join(',')}}`;
}

function formatPrometheusValue(value: number): string {
  if (!Number.isFinite(value) || value === 0) {
    return '0';
  }
  if (Number.isInteger(value)) {
    return value.toString();
  }
  const fixed = value.toFixed(6).replace(/0+$/, '').replace(/\.$/, '');
  return fixed.length > 0 ? fixed : '0';
}

export { MetricsRegistry, formatPrometheusValue };
