import path from 'node:path';
import process from 'node:process';
import type { HealthPayload, HealthStatus } from '../src/lifecycle.js';

type Writable = Pick<NodeJS.WritableStream, 'write'>;

type IoStreams = {
  stdout: Writable;
  stderr: Writable;
};

type FetchLike = (url: string, init: { signal: AbortSignal }) => Promise<{
  status: number;
  text: () => Promise<string>;
}>;

const DEFAULT_URL = 'http://127.0.0.1:9464/health';
const DEFAULT_TIMEOUT_MS = 3000;

const HEALTH_EXIT_CODES: Record<HealthStatus, number> = {
  ok: 0,
  degraded: 1,
  starting: 2,
  stopping: 3
};

function printUsage(target: Writable) {
  target.write(
    [
      'pyrowatch healthcheck helper',
      '',
      'Usage:',
      '  tsx scripts/healthcheck.ts [--url <url>] [--timeout <ms>] [--pretty]',
      '',
      'Options:',
      `  -u, --url <url>     Health endpoint (default: ${DEFAULT_URL})`,
      `  -t, --timeout <ms>  Request timeout (default: ${DEFAULT_TIMEOUT_MS})`,
      '  -p, --pretty        Pretty-print JSON output with indentation',
      '  -h, --help          Show this help message',
      '',
      'Exit codes: 0 ok, 1 degraded or unreachable, 2 starting, 3 stopping'
    ].join('\n') + '\n'
  );
}

type ParsedArgs = {
  url: string;
  timeoutMs: number;
  pretty: boolean;
  help: boolean;
  errors: string[];
};

function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = {
    url: DEFAULT_URL,
    timeoutMs: DEFAULT_TIMEOUT_MS,
    pretty: false,
    help: false,
    errors: []
  };

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (!token) {
      continue;
    }

    switch (token) {
      case '--url':
      case '-u': {
        const next = argv[index + 1];
        if (!next) {
          parsed.errors.push(`Missing value for ${token}`);
        } else {
          parsed.url = next;
          index += 1;
        }
        break;
      }
      case '--timeout':
      case '-t': {
        const raw = argv[index + 1];
        const next = Number(raw);
        if (raw === undefined || !Number.isInteger(next) || next <= 0) {
          parsed.errors.push(`${token} requires a positive integer`);
        } else {
          parsed.timeoutMs = next;
        }
        index += 1;
        break;
      }
      case '--pretty':
      case '-p':
        parsed.pretty = true;
        break;
      case '--help':
      case '-h':
        parsed.help = true;
        break;
      default:
        parsed.errors.push(`Unknown option: ${token}`);
        break;
    }
  }
  return parsed;
}

function isHealthPayload(value: unknown): value is HealthPayload {
  if (typeof value !== 'object' || value === null || !('status' in value)) {
    return false;
  }
  const status = value.status;
  return typeof status === 'string' && status in HEALTH_EXIT_CODES;
}

export function resolveHealthExitCode(status: HealthStatus): number {
  return HEALTH_EXIT_CODES[status];
}

export async function runHealthcheck(
  argv: string[],
  streams: IoStreams = { stdout: process.stdout, stderr: process.stderr },
  fetchImpl: FetchLike = fetch
): Promise<number> {
  const args = parseArgs(argv);
  if (args.errors.length > 0) {
    args.errors.forEach(error => {
      streams.stderr.write(`${error}\n`);
    });
    printUsage(streams.stdout);
    return 1;
  }
  if (args.help) {
    printUsage(streams.stdout);
    return 0;
  }

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), args.timeoutMs);
  try {
    const response = await fetchImpl(args.url, { signal: controller.signal });
    const body: unknown = JSON.parse(await response.text());
    if (!isHealthPayload(body)) {
      streams.stderr.write(`Unexpected health response (HTTP ${response.status})\n`);
      return 1;
    }
    const output = args.pretty ? JSON.stringify(body, null, 2) : JSON.stringify(body);
    streams.stdout.write(`${output}\n`);
    return resolveHealthExitCode(body.status);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    streams.stderr.write(`Healthcheck failed: ${message}\n`);
    return 1;
  } finally {
    clearTimeout(timer);
  }
}

const scriptName = path.basename(process.argv[1] ?? '');

if (scriptName === 'healthcheck.ts' || scriptName === 'healthcheck.js') {
  runHealthcheck(process.argv.slice(2)).then(code => {
    process.exitCode = code;
  }).catch(error => {
    process.stderr.write(`Healthcheck failed: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
  });
}
