import pino from 'pino';
import type { MetricsRegistry } from './metrics/index.js';

export type Logger = pino.Logger;

export type CreateLoggerOptions = {
  name: string;
  level?: string;
  metrics?: MetricsRegistry;
  destination?: pino.DestinationStream;
};

const AVAILABLE_LOG_LEVELS = new Set(
  Object.keys(pino.levels.values)
    .map(level => level.toLowerCase())
    .concat('silent')
);

type LogContext = {
  message?: string;
  component?: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function extractContext(args: unknown[], bindings: Record<string, unknown>): LogContext {
  let message: string | undefined;
  let component = typeof bindings.component === 'string' ? bindings.component : undefined;

  for (const value of args) {
    if (typeof value === 'string' && value.length > 0 && !message) {
      message = value;
    } else if (isRecord(value)) {
      if (typeof value.component === 'string' && value.component.length > 0) {
        component = value.component;
      }
      if (typeof value.msg === 'string' && value.msg.length > 0 && !message) {
        message = value.msg;
      }
    }
  }

  return { message, component };
}

function normalizeLevel(value: string) {
  return value.trim().toLowerCase();
}

function assertLevel(level: string): asserts level is pino.LevelWithSilent {
  if (!AVAILABLE_LOG_LEVELS.has(level)) {
    const available = getAvailableLogLevels().join(', ');
    throw new Error(`Unknown log level "${level}" (available: ${available})`);
  }
}

export function getAvailableLogLevels(): string[] {
  return Array.from(AVAILABLE_LOG_LEVELS).sort();
}

export function createLogger(options: CreateLoggerOptions): Logger {
  const level = normalizeLevel(options.level ?? 'info');
  assertLevel(level);
  const metrics = options.metrics;

  const logger = pino(
    {
      name: options.name,
      level,
      hooks: {
        logMethod(inputArgs, method, logLevel) {
          if (metrics) {
            const resolvedLevel = pino.levels.labels[logLevel] ?? String(logLevel);
            metrics.incrementLogLevel(resolvedLevel, extractContext(inputArgs, this.bindings()));
          }
          return method.apply(this, inputArgs);
        }
      }
    },
    options.destination
  );

  metrics?.recordLogLevelChange(logger.level, null);
  return logger;
}

export function setLogLevel(logger: Logger, nextLevel: string, metrics?: MetricsRegistry): string {
  const normalized = normalizeLevel(nextLevel);
  assertLevel(normalized);
  const previous = logger.level;
  if (previous === normalized) {
    return previous;
  }

  logger.level = normalized;
  metrics?.recordLogLevelChange(normalized, previous);
  logger.info({ level: normalized, previous }, 'Log level updated');
  return normalized;
}
