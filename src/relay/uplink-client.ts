/**
 * TCP Uplink Client
 * =================
 *
 * Persistent connection to the central server. Records are written as
 * newline-delimited JSON; a successful write is the only acknowledgement.
 *
 * - Connects lazily on the first send
 * - A failed connect or write tears the socket down; the next send reconnects
 * - Every failure surfaces as an UplinkError
 */

import net from 'net';
import { UplinkError } from '../errors';
import type { Logger } from '../logging/types';
import { LogComponents } from '../logging/types';
import { getNetworkErrorType } from '../utils/network-errors';
import type { AggregatedRecord, UplinkTransport } from './types';

export interface UplinkClientOptions {
	host: string;
	port: number;
	connectTimeoutMs: number;
}

/**
 * Wire encoding of an aggregated record (one line)
 */
export function encodeRecord(record: AggregatedRecord): string {
	return JSON.stringify({
		sensor_id: record.sensorId,
		unit: record.unit,
		window_mean: record.windowMean,
		window_stddev: record.windowStdDev,
		classification: record.classification,
		score: record.score,
		anomaly_count: record.anomalyCount,
		sample_count: record.sampleCount,
		timestamp: new Date(record.timestamp).toISOString(),
	}) + '\n';
}

export class TcpUplinkClient implements UplinkTransport {
	private socket: net.Socket | null = null;
	private connecting: Promise<net.Socket> | null = null;
	private closed = false;

	constructor(
		private readonly options: UplinkClientOptions,
		private readonly logger: Logger
	) {}

	isConnected(): boolean {
		return this.socket !== null && !this.socket.destroyed;
	}

	async send(record: AggregatedRecord): Promise<void> {
		if (this.closed) {
			throw new UplinkError('Uplink client is closed');
		}

		const socket = await this.connect();
		const line = encodeRecord(record);

		await new Promise<void>((resolve, reject) => {
			socket.write(line, error => {
				if (error) {
					this.teardown(socket);
					reject(new UplinkError(`Write to central server failed: ${error.message}`, { cause: error }));
				} else {
					resolve();
				}
			});
		});
	}

	async close(): Promise<void> {
		this.closed = true;
		const socket = this.socket;
		this.socket = null;
		if (!socket || socket.destroyed) {
			return;
		}
		await new Promise<void>(resolve => {
			socket.once('close', () => resolve());
			socket.end();
			// Don't wait forever on a half-open peer
			setTimeout(() => socket.destroy(), this.options.connectTimeoutMs).unref();
		});
	}

	private connect(): Promise<net.Socket> {
		if (this.socket && !this.socket.destroyed) {
			return Promise.resolve(this.socket);
		}
		if (this.connecting) {
			return this.connecting;
		}

		const { host, port, connectTimeoutMs } = this.options;
		this.connecting = new Promise<net.Socket>((resolve, reject) => {
			const socket = net.createConnection({ host, port });

			const timer = setTimeout(() => {
				socket.destroy();
				reject(new UplinkError(`Connection to central server timed out after ${connectTimeoutMs}ms`));
			}, connectTimeoutMs);

			socket.once('connect', () => {
				clearTimeout(timer);
				socket.off('error', onConnectError);
				this.attach(socket);
				this.logger.info('Connected to central server', {
					component: LogComponents.UPLINK,
					host,
					port,
				});
				resolve(socket);
			});

			const onConnectError = (error: Error) => {
				clearTimeout(timer);
				socket.destroy();
				reject(new UplinkError(`Central server unreachable: ${error.message}`, { cause: error }));
			};
			socket.once('error', onConnectError);
		}).finally(() => {
			this.connecting = null;
		});

		return this.connecting;
	}

	private attach(socket: net.Socket): void {
		this.socket = socket;
		socket.setNoDelay(true);

		socket.on('error', error => {
			this.logger.warn('Central server connection error', {
				component: LogComponents.UPLINK,
				errorType: getNetworkErrorType(error),
				error: error.message,
			});
			this.teardown(socket);
		});

		socket.on('close', () => {
			if (this.socket === socket) {
				this.socket = null;
				this.logger.info('Central server connection closed', { component: LogComponents.UPLINK });
			}
		});

		// The central server does not talk back; discard anything it sends
		socket.resume();
	}

	private teardown(socket: net.Socket): void {
		if (this.socket === socket) {
			this.socket = null;
		}
		socket.destroy();
	}
}
