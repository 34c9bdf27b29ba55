/**
 * Drone Gateway
 * =============
 *
 * Wires the edge pipeline together and owns its lifecycle:
 *
 *   sensor sockets -> per-sensor work queue -> rolling stats -> classifier
 *     -> outbound relay -> central server (only while the drone is ACTIVE)
 *
 * A ticker advances the battery state machine. Failures inside one sensor
 * stream or one uplink send are contained where they happen; a
 * StateInvariantViolation stops the whole gateway and emits 'fatal'.
 *
 * Events emitted:
 * - 'started': AddressInfo of the sensor listener
 * - 'transition': FlightTransition
 * - 'anomaly': AnomalyEvent
 * - 'record': AggregatedRecord
 * - 'fatal': Error
 * - 'stopped': RelayStats at shutdown
 */

import { EventEmitter } from 'events';
import type { AddressInfo } from 'net';
import { parseConfig } from './config';
import type { GatewayConfig, GatewayConfigInput } from './config';
import { StatusApiServer } from './api/server';
import type { StatusProvider } from './api/v1';
import { AnomalyClassifier } from './anomaly/classifier';
import { StateInvariantViolation } from './errors';
import { BatteryStateMachine, isUplinkPermitted } from './flight/battery-state-machine';
import type { DroneState, FlightController, FlightTransition } from './flight/types';
import type { GatewayStatus, SensorStatus } from './gateway-status';
import { ReadingChannelAdapter } from './ingest/reading-channel';
import { SensorDispatcher } from './ingest/sensor-work-queue';
import type { SensorReading } from './ingest/types';
import { createLogger, errorContext } from './logging/logger';
import type { Logger } from './logging/types';
import { LogComponents } from './logging/types';
import { EdgeProcessor } from './processing/edge-processor';
import { OutboundRelay } from './relay/outbound-relay';
import type { UplinkTransport } from './relay/types';
import { TcpUplinkClient } from './relay/uplink-client';
import { RollingStatisticsEngine } from './stats/engine';

export interface GatewayDependencies {
  logger?: Logger;
  uplink?: UplinkTransport;
  flightController?: FlightController;
  clock?: () => number;
}

export class DroneGateway extends EventEmitter implements StatusProvider {
  readonly config: GatewayConfig;

  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly flight: FlightController;
  private readonly processor: EdgeProcessor;
  private readonly dispatcher: SensorDispatcher;
  private readonly adapter: ReadingChannelAdapter;
  private readonly relay: OutboundRelay;
  private readonly statusApi: StatusApiServer;

  private ticker?: NodeJS.Timeout;
  private running = false;
  private startedAt: number | null = null;
  private fatalError: Error | null = null;
  private stopping: Promise<void> | null = null;

  constructor(config: GatewayConfigInput, deps: GatewayDependencies = {}) {
    super();
    this.config = parseConfig(config);
    this.clock = deps.clock ?? Date.now;
    this.logger = deps.logger ?? createLogger({
      level: this.config.logLevel,
      format: this.config.logFormat,
    });

    this.flight = deps.flightController ?? new BatteryStateMachine({
      lowThreshold: this.config.lowThreshold,
      highThreshold: this.config.highThreshold,
      activeDrainRate: this.config.activeDrainRate,
      returnDrainRate: this.config.returnDrainRate,
      chargeRate: this.config.chargeRate,
      returnTicks: this.config.returnTicks,
    }, this.clock);

    this.processor = new EdgeProcessor(
      new RollingStatisticsEngine(this.config.windowSize),
      new AnomalyClassifier({
        zScoreThreshold: this.config.zScoreThreshold,
        minStdDev: this.config.minStdDev,
        absoluteDeviationThreshold: this.config.absoluteDeviationThreshold,
        minSamples: this.config.minSamples,
      }),
      this.logger
    );
    this.processor.on('anomaly', event => this.emit('anomaly', event));
    this.processor.on('record', record => this.emit('record', record));

    const uplink = deps.uplink ?? new TcpUplinkClient({
      host: this.config.serverHost,
      port: this.config.serverPort,
      connectTimeoutMs: this.config.uplinkConnectTimeoutMs,
    }, this.logger);

    this.relay = new OutboundRelay(
      { capacity: this.config.queueCapacity, overflowPolicy: this.config.overflowPolicy },
      uplink,
      this.flight,
      this.logger,
      this.clock
    );

    this.dispatcher = new SensorDispatcher(
      this.config.ingestQueueCapacity,
      reading => this.handleReading(reading),
      this.logger
    );

    this.adapter = new ReadingChannelAdapter(
      {
        host: this.config.listenHost,
        port: this.config.listenPort,
        maxFrameBytes: this.config.maxFrameBytes,
      },
      this.dispatcher,
      this.logger,
      this.clock
    );

    this.statusApi = new StatusApiServer(this, this.logger);
  }

  /**
   * Bind the sensor listener, start the ticker and the optional status API
   */
  async start(): Promise<AddressInfo> {
    if (this.running) {
      const address = this.adapter.address();
      if (address) return address;
    }
    if (this.fatalError) {
      throw this.fatalError;
    }

    this.logger.info('Starting drone gateway', {
      component: LogComponents.GATEWAY,
      windowSize: this.config.windowSize,
      queueCapacity: this.config.queueCapacity,
      overflowPolicy: this.config.overflowPolicy,
      uplink: `${this.config.serverHost}:${this.config.serverPort}`,
    });

    const address = await this.adapter.start();

    if (this.config.statusApiPort > 0) {
      try {
        await this.statusApi.listen(this.config.statusApiPort, this.config.listenHost);
      } catch (error) {
        await this.adapter.stop();
        throw error;
      }
    }

    this.ticker = setInterval(() => this.tick(), this.config.tickIntervalMs);
    this.running = true;
    this.startedAt = this.clock();

    this.emit('started', address);
    return address;
  }

  /**
   * Advance simulated flight time by one tick and attempt a drain.
   * Returns the new drone state, or null once the gateway has failed.
   */
  tick(): DroneState | null {
    if (this.fatalError) {
      return null;
    }

    const before = this.flight.snapshot();
    let after: DroneState;
    try {
      after = this.flight.tick();
    } catch (error) {
      this.fail(error);
      return null;
    }

    if (after.mode !== before.mode) {
      this.onTransition({
        from: before.mode,
        to: after.mode,
        batteryLevel: after.batteryLevel,
        at: after.lastTransitionTime,
        tick: after.tick,
      });
    }

    if (isUplinkPermitted(after) && this.relay.queueLength() > 0) {
      this.relay.drain().catch(error => {
        this.logger.error('Drain failed', {
          component: LogComponents.RELAY,
          ...errorContext(error),
        });
      });
    }

    return after;
  }

  /**
   * Signal that the drone reached its base while returning
   */
  markArrivedAtBase(): boolean {
    return this.flight.markArrivedAtBase();
  }

  /**
   * Graceful shutdown: stop ingest, finish in-flight readings, flush what the
   * uplink gate allows within shutdownGraceMs, count the rest as lost
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  isRunning(): boolean {
    return this.running;
  }

  getFatalError(): Error | null {
    return this.fatalError;
  }

  address(): AddressInfo | null {
    return this.adapter.address();
  }

  droneState(): DroneState {
    return this.flight.snapshot();
  }

  getRelay(): OutboundRelay {
    return this.relay;
  }

  /**
   * Process a reading directly, bypassing the socket layer
   */
  ingest(reading: SensorReading): boolean {
    return this.dispatcher.queueFor(reading.sensorId).offer(reading);
  }

  /**
   * Resolves once every accepted reading has gone through the pipeline
   */
  whenIdle(): Promise<void> {
    return this.dispatcher.whenIdle();
  }

  getStatus(): GatewayStatus {
    const drone = this.flight.snapshot();
    const ingest = this.adapter.getCounters();
    const sensors = this.collectSensorIds().map(sensorId => this.buildSensorStatus(sensorId));

    return {
      running: this.running,
      startedAt: this.startedAt,
      drone,
      uplinkPermitted: isUplinkPermitted(drone),
      relay: this.relay.getStats(),
      activeConnections: this.adapter.getConnectionCount(),
      sensors,
      counters: {
        ...ingest,
        processingFailures: this.dispatcher.failures(),
        anomalies: this.processor.totalAnomalies(),
      },
    };
  }

  getSensorStatus(sensorId: string): SensorStatus | undefined {
    if (!this.collectSensorIds().includes(sensorId)) {
      return undefined;
    }
    return this.buildSensorStatus(sensorId);
  }

  private handleReading(reading: SensorReading): void {
    const { record } = this.processor.process(reading);
    this.relay.enqueue(record);
  }

  private onTransition(transition: FlightTransition): void {
    const context = {
      component: LogComponents.FLIGHT,
      from: transition.from,
      to: transition.to,
      batteryLevel: transition.batteryLevel,
      tick: transition.tick,
    };

    if (transition.to === 'RETURNING') {
      this.logger.warn('Battery low, returning to base; uplink suspended', {
        ...context,
        queued: this.relay.queueLength(),
      });
    } else if (transition.to === 'ACTIVE') {
      this.logger.info('Battery charged, resuming uplink', {
        ...context,
        queued: this.relay.queueLength(),
      });
    } else {
      this.logger.info(`Flight mode ${transition.from} -> ${transition.to}`, context);
    }

    this.emit('transition', transition);
  }

  private fail(error: unknown): void {
    const fatal = error instanceof Error ? error : new Error(String(error));
    this.fatalError = fatal;

    this.logger.error(
      fatal instanceof StateInvariantViolation
        ? 'Flight state invariant violated, stopping gateway'
        : 'Flight controller failed, stopping gateway',
      {
        component: LogComponents.GATEWAY,
        drone: this.flight.snapshot(),
        ...errorContext(fatal),
      }
    );

    this.emit('fatal', fatal);
    this.stop().catch(stopError => {
      this.logger.error('Error during emergency shutdown', {
        component: LogComponents.GATEWAY,
        ...errorContext(stopError),
      });
    });
  }

  private async shutdown(): Promise<void> {
    this.logger.info('Stopping drone gateway', { component: LogComponents.GATEWAY });
    const deadline = this.clock() + this.config.shutdownGraceMs;

    if (this.ticker) {
      clearInterval(this.ticker);
      this.ticker = undefined;
    }

    await this.adapter.stop();

    const idle = await settleWithin(this.dispatcher.whenIdle(), this.remaining(deadline));
    if (!idle) {
      this.logger.warn('Shutdown grace period elapsed with readings still in flight', {
        component: LogComponents.GATEWAY,
        backlog: this.dispatcher.backlog(),
      });
    }

    const left = await this.relay.flush(this.remaining(deadline));
    if (left > 0 && !isUplinkPermitted(this.flight.snapshot())) {
      this.logger.warn('Uplink not permitted at shutdown', {
        component: LogComponents.GATEWAY,
        mode: this.flight.snapshot().mode,
        queued: left,
      });
    }
    await this.relay.stop();

    await this.statusApi.close();

    this.running = false;
    const stats = this.relay.getStats();
    this.logger.info('Drone gateway stopped', {
      component: LogComponents.GATEWAY,
      sent: stats.sent,
      recordsLost: stats.recordsLost,
      lostOnShutdown: stats.lostOnShutdown,
    });
    this.emit('stopped', stats);
  }

  private remaining(deadline: number): number {
    return Math.max(0, deadline - this.clock());
  }

  private collectSensorIds(): string[] {
    const ids = new Set<string>();
    for (const status of this.adapter.getSensorStatuses()) ids.add(status.sensorId);
    for (const summary of this.processor.getSensorSummaries()) ids.add(summary.sensorId);
    for (const sensorId of this.dispatcher.sensorIds()) ids.add(sensorId);
    return Array.from(ids).sort();
  }

  private buildSensorStatus(sensorId: string): SensorStatus {
    const stream = this.adapter.getSensorStatus(sensorId);
    const summary = this.processor.getSensorSummary(sensorId);

    return {
      sensorId,
      connected: stream?.connected ?? false,
      remoteAddress: stream?.remoteAddress ?? null,
      lastSeen: stream?.lastSeen ?? null,
      lastReadingTimestamp: stream?.lastReadingTimestamp ?? summary?.lastEvent?.timestamp ?? null,
      readingsReceived: stream?.readingsReceived ?? 0,
      readingsProcessed: summary?.readingsProcessed ?? 0,
      parseErrors: stream?.parseErrors ?? 0,
      queuedReadings: this.dispatcher.queueSize(sensorId),
      windowMean: summary?.windowMean ?? 0,
      windowStdDev: summary?.windowStdDev ?? 0,
      sampleCount: summary?.sampleCount ?? 0,
      anomalyCount: summary?.anomalyCount ?? 0,
      lastEvent: summary?.lastEvent ?? null,
    };
  }
}

/**
 * Wait for a promise up to ms; true when it settled in time
 */
async function settleWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<false>(resolve => {
    timer = setTimeout(() => resolve(false), ms);
  });
  try {
    return await Promise.race([promise.then(() => true), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
