/**
 * SENSOR NODE SIMULATOR
 * =====================
 *
 * Streams synthetic readings to the gateway over one persistent TCP
 * connection, as a field sensor would. On a dropped connection it waits
 * reconnectDelayMs and dials again until stopped.
 *
 * Events emitted:
 * - 'connected'
 * - 'sent': SensorReading
 * - 'disconnected'
 */

import { EventEmitter } from 'events';
import net from 'net';
import { encodeReading } from '../ingest/frame-decoder';
import type { SensorReading } from '../ingest/types';
import type { Logger } from '../logging/types';
import { LogComponents } from '../logging/types';
import { SensorValueGenerator } from './value-generator';
import type { RandomSource, SensorNodeConfig, SensorNodeStatus } from './types';

const CLOSE_TIMEOUT_MS = 1000;

export interface SensorNodeOptions {
	random?: RandomSource;
	clock?: () => number;
}

export class SensorNode extends EventEmitter {
	private readonly generator: SensorValueGenerator;
	private readonly clock: () => number;
	private socket: net.Socket | null = null;
	private sendInterval?: NodeJS.Timeout;
	private reconnectTimer?: NodeJS.Timeout;
	private running = false;
	private connected = false;
	private readingsSent = 0;
	private reconnects = 0;
	private lastError: string | null = null;

	constructor(
		private readonly config: SensorNodeConfig,
		private readonly logger: Logger,
		options: SensorNodeOptions = {}
	) {
		super();
		this.generator = new SensorValueGenerator(config.generator, options.random);
		this.clock = options.clock ?? Date.now;
	}

	start(): void {
		if (this.running) {
			return;
		}
		this.running = true;
		this.logger.info('Starting sensor node', {
			component: LogComponents.SIMULATION,
			sensorId: this.config.sensorId,
			unit: this.config.unit,
			pattern: this.config.generator.pattern,
			target: `${this.config.host}:${this.config.port}`,
			intervalMs: this.config.intervalMs,
		});
		this.connect();
	}

	async stop(): Promise<void> {
		if (!this.running) {
			return;
		}
		this.running = false;

		if (this.reconnectTimer) {
			clearTimeout(this.reconnectTimer);
			this.reconnectTimer = undefined;
		}
		this.stopSending();

		const socket = this.socket;
		if (socket && !socket.destroyed) {
			await new Promise<void>(resolve => {
				const fallback = setTimeout(() => socket.destroy(), CLOSE_TIMEOUT_MS);
				socket.once('close', () => {
					clearTimeout(fallback);
					resolve();
				});
				if (this.connected) {
					socket.end();
				} else {
					socket.destroy();
				}
			});
		}
		this.socket = null;

		this.logger.info('Sensor node stopped', {
			component: LogComponents.SIMULATION,
			sensorId: this.config.sensorId,
			readingsSent: this.readingsSent,
		});
	}

	/**
	 * Generate and write one reading; false when not connected
	 */
	sendReading(): boolean {
		const socket = this.socket;
		if (!socket || !this.connected) {
			return false;
		}

		const reading: SensorReading = Object.freeze({
			sensorId: this.config.sensorId,
			timestamp: this.clock(),
			value: this.generator.next(),
			unit: this.config.unit,
		});
		socket.write(encodeReading(reading));
		this.readingsSent++;

		this.logger.debug('Reading sent', {
			component: LogComponents.SIMULATION,
			sensorId: reading.sensorId,
			value: reading.value,
		});
		this.emit('sent', reading);
		return true;
	}

	getStatus(): SensorNodeStatus {
		return {
			sensorId: this.config.sensorId,
			unit: this.config.unit,
			connected: this.connected,
			running: this.running,
			readingsSent: this.readingsSent,
			reconnects: this.reconnects,
			lastError: this.lastError,
		};
	}

	private connect(): void {
		const socket = net.createConnection({ host: this.config.host, port: this.config.port });
		this.socket = socket;

		socket.on('connect', () => {
			this.connected = true;
			this.lastError = null;
			this.logger.info('Connected to gateway', {
				component: LogComponents.SIMULATION,
				sensorId: this.config.sensorId,
			});
			this.emit('connected');

			this.sendReading();
			this.sendInterval = setInterval(() => this.sendReading(), this.config.intervalMs);
		});

		socket.on('error', (error: NodeJS.ErrnoException) => {
			this.lastError = error.code ?? error.message;
			this.logger.warn('Gateway connection error', {
				component: LogComponents.SIMULATION,
				sensorId: this.config.sensorId,
				error: this.lastError,
			});
		});

		socket.on('close', () => {
			const wasConnected = this.connected;
			this.connected = false;
			this.stopSending();
			if (this.socket === socket) {
				this.socket = null;
			}
			if (wasConnected) {
				this.emit('disconnected');
			}

			if (this.running) {
				this.reconnects++;
				this.logger.info(`Connection lost, retrying in ${this.config.reconnectDelayMs}ms`, {
					component: LogComponents.SIMULATION,
					sensorId: this.config.sensorId,
				});
				this.reconnectTimer = setTimeout(() => {
					this.reconnectTimer = undefined;
					if (this.running) this.connect();
				}, this.config.reconnectDelayMs);
			}
		});
	}

	private stopSending(): void {
		if (this.sendInterval) {
			clearInterval(this.sendInterval);
			this.sendInterval = undefined;
		}
	}
}
