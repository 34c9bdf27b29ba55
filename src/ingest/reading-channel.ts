/**
 * Reading Channel Adapter
 *
 * TCP listener for sensor nodes:
 * - One handler per accepted connection
 * - Newline-delimited JSON frames, validated into SensorReadings
 * - Malformed frames are logged and dropped; the connection stays open
 * - Readings are handed to the per-sensor work queue; when that queue is
 *   saturated the socket is paused until it drains (TCP flow control
 *   pushes back on the sensor instead of dropping readings)
 *
 * Events emitted:
 * - 'listening': { host, port }
 * - 'connection': remoteAddress
 * - 'disconnect': (remoteAddress, sensorIds)
 * - 'parse-error': ParseError
 * - 'connection-error': ConnectionError
 */

import { EventEmitter } from 'events';
import net from 'net';
import type { AddressInfo } from 'net';
import { ConnectionError, ParseError } from '../errors';
import type { Logger } from '../logging/types';
import { LogComponents } from '../logging/types';
import { LineFramer, decodeReading } from './frame-decoder';
import type { SensorDispatcher } from './sensor-work-queue';
import type { IngestCounters, SensorReading, SensorStreamStatus } from './types';

export interface ReadingChannelOptions {
  host: string;
  port: number;
  maxFrameBytes: number;
}

/**
 * State for one accepted socket
 */
interface SensorConnection {
  socket: net.Socket;
  remoteAddress: string;
  framer: LineFramer;
  pending: SensorReading[];
  sensorIds: Set<string>;
  paused: boolean;
  waitingForDrain: boolean;
}

export class ReadingChannelAdapter extends EventEmitter {
  private server?: net.Server;
  private connections = new Set<SensorConnection>();
  private sensorStatuses = new Map<string, SensorStreamStatus>();
  private running = false;
  private counters: IngestCounters = {
    connectionsAccepted: 0,
    disconnects: 0,
    connectionErrors: 0,
    parseErrors: 0,
    readingsAccepted: 0,
    backpressurePauses: 0,
  };

  constructor(
    private readonly options: ReadingChannelOptions,
    private readonly dispatcher: SensorDispatcher,
    private readonly logger: Logger,
    private readonly clock: () => number = Date.now
  ) {
    super();
  }

  /**
   * Bind the listener
   */
  async start(): Promise<AddressInfo> {
    if (this.running && this.server) {
      return this.requireAddress();
    }

    const server = net.createServer(socket => this.accept(socket));
    this.server = server;

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
      server.listen(this.options.port, this.options.host);
    });

    server.on('error', error => {
      this.logger.error('Sensor listener error', {
        component: LogComponents.INGEST,
        error: error.message,
      });
    });

    this.running = true;
    const address = this.requireAddress();
    this.logger.info(`Listening for sensors on ${address.address}:${address.port}`, {
      component: LogComponents.INGEST,
    });
    this.emit('listening', { host: address.address, port: address.port });
    return address;
  }

  /**
   * Stop accepting connections and close every sensor stream
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!this.running || !server) {
      return;
    }
    this.running = false;

    const closed = new Promise<void>(resolve => server.close(() => resolve()));
    for (const connection of this.connections) {
      connection.socket.destroy();
    }
    await closed;
    this.server = undefined;

    this.logger.info('Sensor listener stopped', { component: LogComponents.INGEST });
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Bound address, or null when not listening
   */
  address(): AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address : null;
  }

  /**
   * Register a persistent stream for an accepted socket
   */
  accept(socket: net.Socket): void {
    const remoteAddress = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
    const connection: SensorConnection = {
      socket,
      remoteAddress,
      framer: new LineFramer(this.options.maxFrameBytes),
      pending: [],
      sensorIds: new Set(),
      paused: false,
      waitingForDrain: false,
    };

    this.connections.add(connection);
    this.counters.connectionsAccepted++;
    this.logger.info('Sensor connected', { component: LogComponents.INGEST, remoteAddress });
    this.emit('connection', remoteAddress);

    socket.setEncoding('utf8');
    socket.on('data', (chunk: string) => this.handleData(connection, chunk));

    socket.on('error', (error: NodeJS.ErrnoException) => {
      const connectionError = new ConnectionError(
        `Sensor stream failed: ${error.code ?? error.message}`,
        remoteAddress,
        Array.from(connection.sensorIds),
        { cause: error }
      );
      this.counters.connectionErrors++;
      this.logger.warn(connectionError.message, {
        component: LogComponents.INGEST,
        remoteAddress,
        sensorIds: connectionError.sensorIds,
      });
      this.emit('connection-error', connectionError);
    });

    socket.on('close', () => this.deregister(connection));
  }

  getCounters(): IngestCounters {
    return { ...this.counters };
  }

  getConnectionCount(): number {
    return this.connections.size;
  }

  getSensorStatuses(): SensorStreamStatus[] {
    return Array.from(this.sensorStatuses.values()).map(status => ({ ...status }));
  }

  getSensorStatus(sensorId: string): SensorStreamStatus | undefined {
    const status = this.sensorStatuses.get(sensorId);
    return status ? { ...status } : undefined;
  }

  private handleData(connection: SensorConnection, chunk: string): void {
    for (const item of connection.framer.push(chunk)) {
      if ('oversized' in item) {
        this.reportParseError(
          connection,
          new ParseError(`Frame exceeds ${this.options.maxFrameBytes} bytes`, item.oversized)
        );
        continue;
      }

      try {
        const reading = decodeReading(item.frame);
        this.recordReading(connection, reading);
        connection.pending.push(reading);
      } catch (error) {
        if (error instanceof ParseError) {
          this.reportParseError(connection, error);
        } else {
          throw error;
        }
      }
    }

    this.pump(connection);
  }

  /**
   * Move pending readings into their sensor queues, pausing on saturation
   */
  private pump(connection: SensorConnection): void {
    while (connection.pending.length > 0) {
      const reading = connection.pending[0];
      const queue = this.dispatcher.queueFor(reading.sensorId);

      if (!queue.offer(reading)) {
        if (!connection.paused) {
          connection.paused = true;
          connection.socket.pause();
          this.counters.backpressurePauses++;
          this.logger.debug('Sensor queue saturated, pausing stream', {
            component: LogComponents.INGEST,
            sensorId: reading.sensorId,
            remoteAddress: connection.remoteAddress,
          });
        }
        if (!connection.waitingForDrain) {
          connection.waitingForDrain = true;
          queue.once('drain', () => {
            connection.waitingForDrain = false;
            this.pump(connection);
          });
        }
        return;
      }

      connection.pending.shift();
      this.counters.readingsAccepted++;
    }

    if (connection.paused) {
      connection.paused = false;
      connection.socket.resume();
    }
  }

  private recordReading(connection: SensorConnection, reading: SensorReading): void {
    connection.sensorIds.add(reading.sensorId);
    const status = this.sensorStatuses.get(reading.sensorId);
    const now = this.clock();

    if (status) {
      status.remoteAddress = connection.remoteAddress;
      status.connected = true;
      status.lastSeen = now;
      status.lastReadingTimestamp = reading.timestamp;
      status.readingsReceived++;
    } else {
      this.sensorStatuses.set(reading.sensorId, {
        sensorId: reading.sensorId,
        remoteAddress: connection.remoteAddress,
        connected: true,
        lastSeen: now,
        lastReadingTimestamp: reading.timestamp,
        readingsReceived: 1,
        parseErrors: 0,
      });
    }
  }

  private reportParseError(connection: SensorConnection, error: ParseError): void {
    this.counters.parseErrors++;
    if (error.sensorId) {
      const status = this.sensorStatuses.get(error.sensorId);
      if (status) status.parseErrors++;
    }

    this.logger.warn('Dropping malformed frame', {
      component: LogComponents.INGEST,
      remoteAddress: connection.remoteAddress,
      sensorId: error.sensorId,
      reason: error.message,
    });
    this.emit('parse-error', error);
  }

  private deregister(connection: SensorConnection): void {
    if (!this.connections.delete(connection)) {
      return;
    }
    this.counters.disconnects++;

    const sensorIds = Array.from(connection.sensorIds);
    for (const sensorId of sensorIds) {
      const status = this.sensorStatuses.get(sensorId);
      // Another connection may have taken over this sensor id
      if (status && status.remoteAddress === connection.remoteAddress) {
        status.connected = false;
        status.remoteAddress = null;
      }
    }

    this.logger.info('Sensor disconnected', {
      component: LogComponents.INGEST,
      remoteAddress: connection.remoteAddress,
      sensorIds,
    });
    this.emit('disconnect', connection.remoteAddress, sensorIds);
  }

  private requireAddress(): AddressInfo {
    const address = this.address();
    if (!address) {
      throw new Error('Sensor listener is not bound');
    }
    return address;
  }
}
