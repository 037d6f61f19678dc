import { ConfigManager, type ConfigReloadEvent } from './config/index.js';
import type { AppContext } from './context.js';
import { FusionEngine } from './fusion/engine.js';
import { IngestionServer, type IngestedRecordEvent } from './ingest/server.js';
import { setLogLevel } from './logger.js';
import { AdaptiveRateController } from './rate/adaptive.js';
import { DeviceRegistry } from './scheduler/registry.js';
import { TcpCommandDispatcher, type CommandDispatcher } from './scheduler/dispatcher.js';
import { DeviceScheduler } from './scheduler/scheduler.js';
import { startHttpServer, type HttpServerRuntime } from './server/http.js';

export type ServiceOptions = {
  dispatcher?: CommandDispatcher;
  /** Standalone JSON config to watch; fusion tuning and log level follow its edits. */
  watchConfigFile?: string | null;
};

export type ServiceRuntime = {
  context: AppContext;
  fusion: FusionEngine;
  rate: AdaptiveRateController;
  ingestion: IngestionServer;
  registry: DeviceRegistry;
  scheduler: DeviceScheduler;
  http: HttpServerRuntime | null;
  stop: (reason?: string, signal?: NodeJS.Signals) => Promise<void>;
};

export async function startService(context: AppContext, options: ServiceOptions = {}): Promise<ServiceRuntime> {
  const { config, logger, metrics, lifecycle, clock } = context;
  lifecycle.setStatus('starting', clock());
  logger.info({ name: config.app.name }, 'Service starting');

  const fusion = new FusionEngine({ config: config.fusion, logger, metrics, clock });
  const rate = new AdaptiveRateController({
    ...config.rate,
    clock,
    onChange: (streamId, fps) => metrics.setStreamFps(streamId, fps)
  });
  const ingestion = new IngestionServer({
    config: config.ingest,
    calibration: config.protocol.thermal,
    logger,
    metrics,
    clock,
    sink: (locationId, record) => {
      fusion.ingest(locationId, record);
    }
  });
  // thermal frames are the high-rate stream; their backlog drives the capture rate
  ingestion.on('record', ({ locationId, record }: IngestedRecordEvent) => {
    if (record.kind === 'thermal') {
      rate.update(locationId, ingestion.queueDepth(locationId));
    }
  });
  const registry = new DeviceRegistry({
    path: config.registry.path,
    logger,
    defaultPort: config.scheduler.defaultDevicePort,
    clock
  });
  const scheduler = new DeviceScheduler({
    source: registry,
    dispatcher: options.dispatcher ?? new TcpCommandDispatcher({ timeoutMs: config.scheduler.dispatchTimeoutMs, clock }),
    logger,
    metrics,
    config: config.scheduler,
    clock
  });

  lifecycle.registerShutdownHook('registry', () => registry.close());

  try {
    await ingestion.start();
  } catch (error) {
    logger.fatal({ err: error, host: config.ingest.host, port: config.ingest.port }, 'Cannot bind ingestion listener');
    await lifecycle.runShutdownHooks({ reason: 'startup-failed' });
    lifecycle.setStatus('stopped', clock());
    throw error;
  }
  lifecycle.registerShutdownHook('ingestion', () => ingestion.stop());

  await scheduler.start();
  lifecycle.registerShutdownHook('scheduler', () => scheduler.stop());

  let httpRuntime: HttpServerRuntime | null = null;
  if (config.http.enabled) {
    httpRuntime = await startHttpServer({
      host: config.http.host,
      port: config.http.port,
      metrics,
      lifecycle,
      logger
    });
    const runtime = httpRuntime;
    lifecycle.registerShutdownHook('http', () => runtime.close());
  }

  if (options.watchConfigFile) {
    const manager = new ConfigManager(options.watchConfigFile);
    manager.on('reload', ({ next }: ConfigReloadEvent) => {
      fusion.configure(next.fusion);
      setLogLevel(logger, next.logging.level, metrics);
    });
    manager.on('error', (error: Error) => {
      logger.error({ err: error, path: manager.getPath() }, 'Configuration reload rejected');
    });
    const unwatch = manager.watch();
    lifecycle.registerShutdownHook('config-watch', () => unwatch());
  }

  lifecycle.registerHealthIndicator('ingestion', () => ({
    status: ingestion.listening ? 'ok' : 'degraded',
    details: {
      port: ingestion.port,
      connections: ingestion.connectionCount,
      queues: ingestion.queueStats()
    }
  }));
  lifecycle.registerHealthIndicator('scheduler', () => ({
    status: scheduler.isRunning ? 'ok' : 'degraded',
    details: { devices: scheduler.status() }
  }));
  lifecycle.registerHealthIndicator('fusion', () => {
    const locations = fusion.locations();
    return {
      status: 'ok',
      details: {
        locations,
        alarms: locations.filter(locationId => fusion.getState(locationId)?.alarm === true),
        policy: fusion.policyName
      }
    };
  });

  lifecycle.setStatus('running', clock());
  logger.info({ ingestPort: ingestion.port, httpPort: httpRuntime?.port ?? null }, 'Service started');

  let stopping: Promise<void> | null = null;
  const stop = (reason = 'stop', signal?: NodeJS.Signals) => {
    if (!stopping) {
      stopping = (async () => {
        lifecycle.setStatus('stopping', clock());
        logger.info({ reason, signal }, 'Service stopping');
        const results = await lifecycle.runShutdownHooks({ reason, signal });
        for (const result of results) {
          if (result.status === 'error') {
            logger.error({ err: result.error, hook: result.name }, 'Shutdown hook failed');
          }
        }
        lifecycle.setStatus('stopped', clock());
        logger.info('Service stopped');
      })();
    }
    return stopping;
  };

  return {
    context,
    fusion,
    rate,
    ingestion,
    registry,
    scheduler,
    http: httpRuntime,
    stop
  };
}
