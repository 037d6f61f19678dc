import type pino from 'pino';
import { loadConfig, type PyrowatchConfig } from './config/index.js';
import { AppLifecycle } from './lifecycle.js';
import { createLogger, type Logger } from './logger.js';
import { MetricsRegistry } from './metrics/index.js';
import type { Clock } from './types.js';

/** Everything process-wide, built once and handed to each component. */
export type AppContext = {
  readonly config: PyrowatchConfig;
  readonly logger: Logger;
  readonly metrics: MetricsRegistry;
  readonly lifecycle: AppLifecycle;
  readonly clock: Clock;
};

export type CreateContextOptions = {
  config?: PyrowatchConfig;
  metrics?: MetricsRegistry;
  logger?: Logger;
  logDestination?: pino.DestinationStream;
  clock?: Clock;
};

export function createContext(options: CreateContextOptions = {}): AppContext {
  const config = options.config ?? loadConfig();
  const clock = options.clock ?? Date.now;
  const metrics = options.metrics ?? new MetricsRegistry({ clock });
  const logger =
    options.logger ??
    createLogger({
      name: config.app.name,
      level: config.logging.level,
      metrics,
      destination: options.logDestination
    });
  return {
    config,
    logger,
    metrics,
    lifecycle: new AppLifecycle(metrics),
    clock
  };
}
