import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadConfigFromFile, validateConfig, type PyrowatchConfig } from '../../src/config/index.js';
import { createContext, type AppContext } from '../../src/context.js';
import { createLogger, type Logger } from '../../src/logger.js';
import type { MetricsRegistry } from '../../src/metrics/index.js';
import type { Clock } from '../../src/types.js';

const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../config');

export const DEFAULT_CONFIG_PATH = path.join(CONFIG_DIR, 'default.json');

/** Defaults from config/default.json, bound to loopback on ephemeral ports. */
export function createTestConfig(mutate?: (config: PyrowatchConfig) => void): PyrowatchConfig {
  const config = loadConfigFromFile(DEFAULT_CONFIG_PATH);
  config.logging.level = 'silent';
  config.ingest.host = '127.0.0.1';
  config.ingest.port = 0;
  config.registry.path = ':memory:';
  config.http.host = '127.0.0.1';
  config.http.port = 0;
  mutate?.(config);
  validateConfig(config);
  return config;
}

export type LogEntry = {
  level: number;
  msg?: string;
  [key: string]: unknown;
};

export type LogCapture = {
  entries: LogEntry[];
  destination: { write: (line: string) => void };
  messages: () => string[];
};

export function captureLogs(): LogCapture {
  const entries: LogEntry[] = [];
  return {
    entries,
    destination: {
      write(line: string) {
        const parsed: unknown = JSON.parse(line);
        if (typeof parsed === 'object' && parsed !== null && 'level' in parsed && typeof parsed.level === 'number') {
          entries.push({ ...parsed, level: parsed.level });
        }
      }
    },
    messages: () => entries.map(entry => entry.msg ?? '')
  };
}

export function createTestLogger(options: { metrics?: MetricsRegistry; level?: string; capture?: LogCapture } = {}): Logger {
  return createLogger({
    name: 'pyrowatch-test',
    level: options.level ?? (options.capture ? 'debug' : 'silent'),
    metrics: options.metrics,
    destination: options.capture?.destination
  });
}

export function createTestContext(options: { config?: PyrowatchConfig; clock?: Clock; capture?: LogCapture } = {}): AppContext {
  const config = options.config ?? createTestConfig();
  if (options.capture) {
    config.logging.level = 'debug';
  }
  return createContext({
    config,
    clock: options.clock,
    logDestination: options.capture?.destination
  });
}

export function delay(ms: number) {
  return new Promise<void>(resolve => setTimeout(resolve, ms));
}

/** Polls `predicate` until it holds or `timeoutMs` elapses. */
export async function waitFor(predicate: () => boolean, timeoutMs = 2000, intervalMs = 5): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await delay(intervalMs);
  }
}
