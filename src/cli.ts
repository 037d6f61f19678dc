import process from 'node:process';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { startService, type ServiceRuntime } from './app.js';
import { loadConfig, loadConfigFromFile, type PyrowatchConfig } from './config/index.js';
import { createContext, type AppContext } from './context.js';
import { ConfigError, toError } from './errors.js';
import { getAvailableLogLevels, setLogLevel } from './logger.js';
import { DeviceRegistry, type NewDevice } from './scheduler/registry.js';
import type { Device } from './types.js';

type CliIo = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
};

export type CliDependencies = {
  /** Builds the process context; receives the `--config` path when one was given. */
  createContext?: (configPath: string | null) => AppContext;
  /** Called once the service is up; tests use it to stop the daemon. */
  onStarted?: (runtime: ServiceRuntime) => void;
};

const DEFAULT_IO: CliIo = { stdout: process.stdout, stderr: process.stderr };

const USAGE = [
  'pyrowatch CLI',
  '',
  'Usage:',
  '  pyrowatch start [--config path] [--watch]   Run ingestion, fusion, scheduler and HTTP endpoints',
  '  pyrowatch devices list [--db path] [--json]',
  '  pyrowatch devices add --name <name> --ip <ip> --mode <continuous|on-demand> --interval <seconds>',
  '                        [--port <port>] [--location <id>] [--db path]',
  '  pyrowatch devices remove <id> [--db path]',
  '  pyrowatch config validate [path]            Validate a configuration file (default: config/ directory)',
  '  pyrowatch log-level [get|set <level>]       Show or change the configured log level'
].join('\n');

const LOG_LEVEL_USAGE = [
  'Usage:',
  '  pyrowatch log-level            Print the configured log level',
  '  pyrowatch log-level get        Print the configured log level',
  '  pyrowatch log-level set <lvl>  Apply a log level to this process',
  '  pyrowatch log-level <lvl>      Shorthand for "set"',
  '',
  `Levels: ${getAvailableLogLevels().join(', ')}`
].join('\n');

type ParsedOptions = {
  positionals: string[];
  values: Map<string, string>;
  flags: Set<string>;
  errors: string[];
};

function parseOptions(args: string[], valueOptions: readonly string[], flagOptions: readonly string[]): ParsedOptions {
  const parsed: ParsedOptions = { positionals: [], values: new Map(), flags: new Set(), errors: [] };
  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (token === undefined) {
      continue;
    }
    if (!token.startsWith('--')) {
      parsed.positionals.push(token);
      continue;
    }
    const [name, inline] = splitOption(token.slice(2));
    if (flagOptions.includes(name)) {
      parsed.flags.add(name);
      continue;
    }
    if (!valueOptions.includes(name)) {
      parsed.errors.push(`Unknown option: --${name}`);
      continue;
    }
    const value = inline ?? args[index + 1];
    if (value === undefined || (inline === undefined && value.startsWith('--'))) {
      parsed.errors.push(`Missing value for --${name}`);
      continue;
    }
    parsed.values.set(name, value);
    if (inline === undefined) {
      index += 1;
    }
  }
  return parsed;
}

function splitOption(option: string): [string, string | undefined] {
  const equals = option.indexOf('=');
  return equals === -1 ? [option, undefined] : [option.slice(0, equals), option.slice(equals + 1)];
}

function writeErrors(io: CliIo, errors: string[]) {
  for (const error of errors) {
    io.stderr.write(`${error}\n`);
  }
}

function defaultCreateContext(configPath: string | null): AppContext {
  return createContext({ config: configPath ? loadConfigFromFile(configPath) : loadConfig() });
}

export async function runCli(
  argv = process.argv.slice(2),
  io: CliIo = DEFAULT_IO,
  deps: CliDependencies = {}
): Promise<number> {
  const command = argv[0] ?? 'start';
  const rest = argv.slice(1);

  try {
    switch (command) {
      case 'start':
        return await startCommand(rest, io, deps);
      case 'devices':
        return await devicesCommand(rest, io, deps);
      case 'config':
        return configCommand(rest, io);
      case 'log-level':
        return logLevelCommand(rest, io, deps);
      case 'help':
      case '--help':
      case '-h':
        io.stdout.write(`${USAGE}\n`);
        return 0;
      default:
        io.stderr.write(`Unknown command: ${command}\n`);
        io.stderr.write(`${USAGE}\n`);
        return 1;
    }
  } catch (error) {
    if (error instanceof ConfigError) {
      io.stderr.write(`${error.message}\n`);
      return 1;
    }
    throw error;
  }
}

async function startCommand(args: string[], io: CliIo, deps: CliDependencies): Promise<number> {
  const parsed = parseOptions(args, ['config'], ['watch']);
  if (parsed.errors.length > 0) {
    writeErrors(io, parsed.errors);
    return 1;
  }

  const configPath = parsed.values.get('config') ?? null;
  const context = (deps.createContext ?? defaultCreateContext)(configPath);

  let runtime: ServiceRuntime;
  try {
    runtime = await startService(context, {
      watchConfigFile: parsed.flags.has('watch') ? configPath : null
    });
  } catch (error) {
    io.stderr.write(`pyrowatch failed to start: ${toError(error).message}\n`);
    return 1;
  }

  io.stdout.write(`pyrowatch listening on ${context.config.ingest.host}:${runtime.ingestion.port ?? 'unknown'}\n`);

  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
  await new Promise<void>((resolve, reject) => {
    const finish = (reason: string, signal?: NodeJS.Signals) => {
      for (const name of signals) {
        process.off(name, onSignal);
      }
      runtime.stop(reason, signal).then(resolve, reject);
    };
    const onSignal = (signal: NodeJS.Signals) => finish('signal', signal);
    for (const name of signals) {
      process.once(name, onSignal);
    }
    const originalStop = runtime.stop;
    deps.onStarted?.({
      ...runtime,
      stop: (reason = 'stop', signal) => {
        finish(reason, signal);
        return originalStop(reason, signal);
      }
    });
  });

  io.stdout.write('pyrowatch stopped\n');
  return 0;
}

async function devicesCommand(args: string[], io: CliIo, deps: CliDependencies): Promise<number> {
  const [subcommand, ...rest] = args;
  const parsed = parseOptions(
    rest,
    ['db', 'config', 'name', 'ip', 'port', 'mode', 'interval', 'location'],
    ['json']
  );
  if (parsed.errors.length > 0) {
    writeErrors(io, parsed.errors);
    return 1;
  }
  if (subcommand !== 'list' && subcommand !== 'add' && subcommand !== 'remove') {
    io.stderr.write(`Unknown devices subcommand: ${subcommand ?? '(none)'}\n`);
    io.stderr.write(`${USAGE}\n`);
    return 1;
  }

  const context = (deps.createContext ?? defaultCreateContext)(parsed.values.get('config') ?? null);
  const registry = new DeviceRegistry({
    path: parsed.values.get('db') ?? context.config.registry.path,
    logger: context.logger,
    defaultPort: context.config.scheduler.defaultDevicePort,
    clock: context.clock
  });

  try {
    if (subcommand === 'list') {
      const devices = await registry.list();
      if (parsed.flags.has('json')) {
        io.stdout.write(`${JSON.stringify(devices)}\n`);
      } else if (devices.length === 0) {
        io.stdout.write('No devices registered\n');
      } else {
        io.stdout.write(`${devices.map(formatDevice).join('\n')}\n`);
      }
      return 0;
    }

    if (subcommand === 'add') {
      const input = buildNewDevice(parsed);
      if (typeof input === 'string') {
        io.stderr.write(`${input}\n`);
        return 1;
      }
      const device = await registry.add(input);
      io.stdout.write(`Added ${formatDevice(device)}\n`);
      return 0;
    }

    const id = Number(parsed.positionals[0]);
    if (!Number.isInteger(id) || id < 1) {
      io.stderr.write('devices remove requires a numeric device id\n');
      return 1;
    }
    if (!(await registry.remove(id))) {
      io.stderr.write(`Device ${id} not found\n`);
      return 1;
    }
    io.stdout.write(`Removed device ${id}\n`);
    return 0;
  } finally {
    registry.close();
  }
}

function buildNewDevice(parsed: ParsedOptions): NewDevice | string {
  const missing = ['name', 'ip', 'mode', 'interval'].filter(name => !parsed.values.has(name));
  if (missing.length > 0) {
    return `Missing required option(s): ${missing.map(name => `--${name}`).join(', ')}`;
  }
  const port = parsed.values.get('port');
  return {
    name: parsed.values.get('name') ?? '',
    ip: parsed.values.get('ip') ?? '',
    mode: parsed.values.get('mode') ?? '',
    pollIntervalSeconds: Number(parsed.values.get('interval')),
    port: port === undefined ? undefined : Number(port),
    locationId: parsed.values.get('location') ?? null
  };
}

function formatDevice(device: Device): string {
  const location = device.locationId ?? '-';
  return `#${device.id} ${device.name} ${device.ip}:${device.port} ${device.mode} every ${device.pollIntervalSeconds}s location=${location}`;
}

function configCommand(args: string[], io: CliIo): number {
  const [subcommand, filePath] = args;
  if (subcommand !== 'validate') {
    io.stderr.write(`Unknown config subcommand: ${subcommand ?? '(none)'}\n`);
    return 1;
  }

  let config: PyrowatchConfig;
  try {
    config = filePath ? loadConfigFromFile(filePath) : loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      io.stderr.write(`${error.message}\n`);
      return 1;
    }
    const cause = toError(error);
    io.stderr.write(`Cannot read configuration: ${cause.message}\n`);
    return 1;
  }

  io.stdout.write(
    `Configuration valid: ingest ${config.ingest.host}:${config.ingest.port}, registry ${config.registry.path}\n`
  );
  return 0;
}

function logLevelCommand(args: string[], io: CliIo, deps: CliDependencies): number {
  const [first, second] = args;

  if (first === 'help' || first === '--help' || first === '-h') {
    io.stdout.write(`${LOG_LEVEL_USAGE}\n`);
    return 0;
  }

  const context = (deps.createContext ?? defaultCreateContext)(null);

  if (!first || first === 'get') {
    io.stdout.write(`${context.logger.level}\n`);
    return 0;
  }

  const requested = first === 'set' ? second : first;
  if (!requested) {
    io.stderr.write('Missing value for log level\n');
    io.stderr.write(`${LOG_LEVEL_USAGE}\n`);
    return 1;
  }

  try {
    const applied = setLogLevel(context.logger, requested, context.metrics);
    io.stdout.write(`Log level set to ${applied}\n`);
    return 0;
  } catch (error) {
    io.stderr.write(`${toError(error).message}\n`);
    return 1;
  }
}

const resolvedPath = path.resolve(process.argv[1] ?? '');
const modulePath = fileURLToPath(import.meta.url);

if (resolvedPath === modulePath) {
  runCli().then(
    code => {
      process.exit(code);
    },
    error => {
      process.stderr.write(`pyrowatch CLI failed: ${toError(error).message}\n`);
      process.exit(1);
    }
  );
}
