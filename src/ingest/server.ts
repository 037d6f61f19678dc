import net from 'node:net';
import { EventEmitter } from 'node:events';
import { performance } from 'node:perf_hooks';
import type { IngestConfig } from '../config/index.js';
import { ConnectionError, ParseError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { MetricsRegistry } from '../metrics/index.js';
import { decodePacket } from '../protocol/decoder.js';
import { LineFramer } from '../protocol/framer.js';
import { DEFAULT_THERMAL_CALIBRATION, type ThermalCalibration } from '../protocol/thermal.js';
import type { Clock, DataRecord, IdentityRecord, PacketFormat } from '../types.js';
import { ConnectionContext } from './connection.js';
import { HandoffQueue } from './handoff.js';

export type RecordSink = (locationId: string, record: DataRecord) => void | Promise<void>;

export type IngestedRecordEvent = {
  connectionId: number;
  locationId: string;
  format: PacketFormat;
  record: DataRecord;
};

export type IdentityEvent = {
  connectionId: number;
  locationId: string;
  record: IdentityRecord;
};

export type ParseErrorEvent = {
  connectionId: number;
  locationId: string;
  error: ParseError;
};

export type IngestionServerOptions = {
  config: IngestConfig;
  sink: RecordSink;
  logger: Logger;
  metrics: MetricsRegistry;
  calibration?: ThermalCalibration;
  clock?: Clock;
};

/**
 * TCP listener for field units. Emits `connection`, `disconnect`, `identity`,
 * `record` and `parse-error`; decoded data records go through one handoff
 * queue per location into the sink.
 */
export class IngestionServer extends EventEmitter {
  private readonly config: IngestConfig;
  private readonly sink: RecordSink;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly calibration: ThermalCalibration;
  private readonly clock: Clock;
  private readonly sockets = new Map<net.Socket, ConnectionContext>();
  private readonly queues = new Map<string, HandoffQueue<DataRecord>>();
  private server: net.Server | null = null;
  private boundPort: number | null = null;
  private nextConnectionId = 1;
  private stopping = false;

  constructor(options: IngestionServerOptions) {
    super();
    this.config = options.config;
    this.sink = options.sink;
    this.logger = options.logger.child({ component: 'ingest' });
    this.metrics = options.metrics;
    this.calibration = options.calibration ?? DEFAULT_THERMAL_CALIBRATION;
    this.clock = options.clock ?? Date.now;
  }

  get port(): number | null {
    return this.boundPort;
  }

  get connectionCount(): number {
    return this.sockets.size;
  }

  get listening(): boolean {
    return this.server !== null;
  }

  connections(): ConnectionContext[] {
    return Array.from(this.sockets.values());
  }

  /** Records waiting in the handoff queue for `locationId`. */
  queueDepth(locationId: string): number {
    return this.queues.get(locationId)?.depth ?? 0;
  }

  queueStats(): Record<string, { depth: number; dropped: number; consumed: number; capacity: number }> {
    const stats: Record<string, { depth: number; dropped: number; consumed: number; capacity: number }> = {};
    for (const [locationId, queue] of this.queues) {
      stats[locationId] = queue.stats;
    }
    return stats;
  }

  async start(): Promise<number> {
    if (this.server) {
      throw new Error('Ingestion server already started');
    }

    const server = net.createServer(socket => this.handleConnection(socket));
    const { host, port } = this.config;
    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => {
        server.off('listening', onListening);
        reject(error);
      };
      const onListening = () => {
        server.off('error', onError);
        resolve();
      };
      server.once('error', onError);
      server.once('listening', onListening);
      server.listen(port, host);
    });

    server.on('error', error => {
      this.logger.error({ err: error }, 'Ingestion listener error');
    });

    const address = server.address();
    this.boundPort = typeof address === 'object' && address ? address.port : port;
    this.server = server;
    this.logger.info({ host, port: this.boundPort }, 'Ingestion server listening');
    return this.boundPort;
  }

  /**
   * Stops accepting, drops every open socket (partial lines are discarded)
   * and waits for the handoff queues to drain.
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.stopping = true;
    this.server = null;

    const closed = new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
    for (const socket of this.sockets.keys()) {
      socket.destroy();
    }

    try {
      await closed;
      await this.drained();
    } finally {
      this.stopping = false;
      this.boundPort = null;
    }
    this.logger.info('Ingestion server stopped');
  }

  async drained(): Promise<void> {
    await Promise.all(Array.from(this.queues.values(), queue => queue.drained()));
  }

  private handleConnection(socket: net.Socket) {
    const remoteAddress = socket.remoteAddress ?? 'unknown';
    if (this.stopping || this.sockets.size >= this.config.maxConnections) {
      this.metrics.recordConnectionRefused();
      this.logger.warn(
        { remoteAddress, active: this.sockets.size, maxConnections: this.config.maxConnections },
        'Refusing connection'
      );
      socket.destroy();
      return;
    }

    const context = new ConnectionContext({
      id: this.nextConnectionId++,
      remoteAddress,
      remotePort: socket.remotePort ?? 0,
      connectedAt: this.clock(),
      ipLocationMap: this.config.ipLocationMap
    });
    const framer = new LineFramer(this.config.maxLineLength);
    this.sockets.set(socket, context);
    this.metrics.recordConnectionAccepted();
    this.logger.info({ connectionId: context.id, peer: context.peer }, 'Connection accepted');

    socket.setNoDelay(true);
    if (this.config.idleTimeoutMs > 0) {
      socket.setTimeout(this.config.idleTimeoutMs);
      socket.on('timeout', () => {
        this.logger.info({ connectionId: context.id, peer: context.peer }, 'Closing idle connection');
        socket.destroy();
      });
    }

    socket.on('data', (chunk: Buffer) => {
      context.bytes += chunk.length;
      const { lines, overflows } = framer.push(chunk);
      for (let index = 0; index < overflows; index += 1) {
        this.recordParseError(
          context,
          new ParseError(
            'line-too-long',
            `Packet exceeds ${this.config.maxLineLength} bytes`,
            '',
            context.locationId
          )
        );
      }
      for (const line of lines) {
        this.handleLine(context, line);
      }
    });

    socket.on('error', error => {
      const wrapped = new ConnectionError(`Connection ${context.peer} failed`, context.peer, { cause: error });
      this.logger.warn({ err: wrapped, connectionId: context.id }, 'Connection error');
    });

    socket.on('close', () => {
      this.sockets.delete(socket);
      framer.reset();
      this.metrics.recordConnectionClosed();
      this.logger.info(
        {
          connectionId: context.id,
          peer: context.peer,
          locationId: context.locationId,
          serial: context.serial,
          packets: context.packets,
          errors: context.errors,
          bytes: context.bytes
        },
        'Connection closed'
      );
      this.emit('disconnect', context);
    });

    this.emit('connection', context);
  }

  private handleLine(context: ConnectionContext, line: string) {
    if (line.trim().length === 0) {
      return;
    }

    const started = performance.now();
    const result = decodePacket(line, { calibration: this.calibration, now: this.clock });
    this.metrics.observeLatency('decode', performance.now() - started);

    if (!result.ok) {
      this.recordParseError(context, result.error);
      return;
    }

    context.packets += 1;
    const { record } = result;

    if (record.kind === 'identity') {
      this.handleIdentity(context, record);
      return;
    }

    const resolution = context.resolve(record.locationId);
    if (resolution.conflict !== null) {
      this.logger.warn(
        { connectionId: context.id, boundLocation: resolution.locationId, received: resolution.conflict },
        'Ignoring location that conflicts with the connection binding'
      );
    }
    this.metrics.recordPacket(resolution.locationId, record.kind);
    this.ensureQueue(resolution.locationId).push(record);
    this.emit('record', {
      connectionId: context.id,
      locationId: resolution.locationId,
      format: result.format,
      record
    } satisfies IngestedRecordEvent);
  }

  private handleIdentity(context: ConnectionContext, record: IdentityRecord) {
    if (record.serial !== null) {
      if (context.serial !== null && context.serial !== record.serial) {
        this.logger.warn(
          { connectionId: context.id, serial: context.serial, received: record.serial },
          'Ignoring serial number change on an open connection'
        );
      } else {
        context.serial = record.serial;
      }
    }

    let locationId: string;
    if (record.locationId !== null) {
      const resolution = context.resolve(record.locationId);
      if (resolution.conflict !== null) {
        this.logger.warn(
          { connectionId: context.id, boundLocation: resolution.locationId, received: resolution.conflict },
          'Ignoring location that conflicts with the connection binding'
        );
      } else if (resolution.source === 'packet') {
        this.logger.info({ connectionId: context.id, locationId: resolution.locationId }, 'Connection bound to location');
      }
      locationId = resolution.locationId;
    } else {
      locationId = context.attribute(null);
    }

    this.metrics.recordPacket(locationId, 'identity');
    this.emit('identity', { connectionId: context.id, locationId, record } satisfies IdentityEvent);
  }

  private recordParseError(context: ConnectionContext, error: ParseError) {
    context.errors += 1;
    const locationId = context.attribute(error.locationId);
    this.metrics.recordPacketError(locationId, error.code);
    this.logger.debug({ err: error, connectionId: context.id, locationId }, 'Discarding malformed packet');
    this.emit('parse-error', { connectionId: context.id, locationId, error } satisfies ParseErrorEvent);
  }

  private ensureQueue(locationId: string): HandoffQueue<DataRecord> {
    let queue = this.queues.get(locationId);
    if (!queue) {
      queue = new HandoffQueue<DataRecord>({
        capacity: this.config.queueCapacity,
        consume: record => this.sink(locationId, record),
        onDrop: record => {
          this.metrics.recordDroppedRecord(locationId);
          this.logger.debug({ locationId, kind: record.kind }, 'Handoff queue full; dropped oldest record');
        },
        onDepthChange: depth => this.metrics.setQueueDepth(locationId, depth),
        onError: (error, record) => {
          this.logger.error({ err: error, locationId, kind: record.kind }, 'Record consumer failed');
        }
      });
      this.queues.set(locationId, queue);
    }
    return queue;
  }
}
