import type { MetricsRegistry, MetricsSnapshot } from './metrics/index.js';
import { toError } from './errors.js';

export type HealthStatus = 'ok' | 'starting' | 'stopping' | 'degraded';

export type ServiceStatus = 'idle' | 'starting' | 'running' | 'stopping' | 'stopped';

export type HealthIndicatorContext = {
  service: {
    status: ServiceStatus;
    startedAt: number | null;
  };
  metrics: MetricsSnapshot;
};

export type HealthIndicatorResult = {
  status: HealthStatus;
  details?: Record<string, unknown>;
};

export type HealthIndicator = (context: HealthIndicatorContext) =>
  | HealthIndicatorResult
  | Promise<HealthIndicatorResult>;

export type HealthCheckResult = {
  name: string;
  status: HealthStatus;
  details?: Record<string, unknown>;
};

export type ShutdownHookContext = {
  reason: string;
  signal?: NodeJS.Signals;
};

export type ShutdownHook = (context: ShutdownHookContext) => void | Promise<void>;

export type ShutdownHookResult = {
  name: string;
  status: 'ok' | 'error';
  error?: Error;
};

export type HealthPayload = {
  status: HealthStatus;
  service: {
    status: ServiceStatus;
    startedAt: string | null;
    uptimeSeconds: number;
  };
  checks: HealthCheckResult[];
};

type Registered<T> = {
  name: string;
  value: T;
};

function upsert<T>(entries: Registered<T>[], name: string, value: T): () => void {
  const existingIndex = entries.findIndex(entry => entry.name === name);
  if (existingIndex >= 0) {
    entries[existingIndex] = { name, value };
  } else {
    entries.push({ name, value });
  }
  return () => {
    const index = entries.findIndex(entry => entry.name === name);
    if (index >= 0) {
      entries.splice(index, 1);
    }
  };
}

/**
 * Health indicators and shutdown hooks for one service instance. Hooks run
 * in reverse registration order so later components stop first.
 */
export class AppLifecycle {
  private readonly metrics: MetricsRegistry;
  private readonly healthIndicators: Registered<HealthIndicator>[] = [];
  private readonly shutdownHooks: Registered<ShutdownHook>[] = [];
  private status: ServiceStatus = 'idle';
  private startedAt: number | null = null;

  constructor(metrics: MetricsRegistry) {
    this.metrics = metrics;
  }

  get serviceStatus(): ServiceStatus {
    return this.status;
  }

  setStatus(status: ServiceStatus, now = Date.now()) {
    this.status = status;
    if (status === 'running' && this.startedAt === null) {
      this.startedAt = now;
    }
  }

  registerHealthIndicator(name: string, indicator: HealthIndicator) {
    return upsert(this.healthIndicators, name, indicator);
  }

  registerShutdownHook(name: string, hook: ShutdownHook) {
    return upsert(this.shutdownHooks, name, hook);
  }

  async collectHealthChecks(): Promise<HealthCheckResult[]> {
    const context: HealthIndicatorContext = {
      service: { status: this.status, startedAt: this.startedAt },
      metrics: this.metrics.snapshot()
    };
    const results: HealthCheckResult[] = [];
    for (const entry of this.healthIndicators) {
      try {
        const result = await entry.value(context);
        results.push({ name: entry.name, status: result.status, details: result.details });
      } catch (error) {
        results.push({ name: entry.name, status: 'degraded', details: { error: toError(error).message } });
      }
    }
    return results;
  }

  async buildHealthPayload(now = Date.now()): Promise<HealthPayload> {
    const checks = await this.collectHealthChecks();
    let status: HealthStatus = 'ok';
    if (this.status === 'starting' || this.status === 'idle') {
      status = 'starting';
    } else if (this.status === 'stopping' || this.status === 'stopped') {
      status = 'stopping';
    } else if (checks.some(check => check.status !== 'ok')) {
      status = 'degraded';
    }
    return {
      status,
      service: {
        status: this.status,
        startedAt: this.startedAt === null ? null : new Date(this.startedAt).toISOString(),
        uptimeSeconds: this.startedAt === null ? 0 : Math.max(0, (now - this.startedAt) / 1000)
      },
      checks
    };
  }

  async runShutdownHooks(context: ShutdownHookContext): Promise<ShutdownHookResult[]> {
    const results: ShutdownHookResult[] = [];
    for (const entry of [...this.shutdownHooks].reverse()) {
      try {
        await entry.value(context);
        results.push({ name: entry.name, status: 'ok' });
      } catch (error) {
        results.push({ name: entry.name, status: 'error', error: toError(error) });
      }
    }
    return results;
  }
}
