/**
 * Outbound Relay
 * ==============
 *
 * Buffers aggregated records and forwards them to the central server while
 * the flight state permits uplink.
 *
 * - enqueue() always returns; overflow follows the configured policy and is counted
 * - drain() sends oldest-first and stops at the first transport failure,
 *   leaving that record at the head for the next attempt
 * - Only one drain runs at a time; overlapping calls share it
 * - The record being sent stays pinned at the head, so overflow never
 *   evicts it and shutdown never counts it as lost while its send settles
 * - After stop(), enqueue() counts the record as lost instead of buffering it
 *
 * Events emitted:
 * - 'sent': AggregatedRecord
 * - 'overflow': { policy, lost: AggregatedRecord }
 * - 'uplink-error': UplinkError
 */

import { EventEmitter } from 'events';
import { UplinkError } from '../errors';
import type { OverflowPolicy } from '../config/schema';
import type { DroneStateReader } from '../flight/types';
import { isUplinkPermitted } from '../flight/battery-state-machine';
import type { Logger } from '../logging/types';
import { LogComponents } from '../logging/types';
import { getNetworkErrorType } from '../utils/network-errors';
import { OutboundQueue } from './outbound-queue';
import type {
	AggregatedRecord,
	DrainResult,
	DrainStopReason,
	EnqueueResult,
	RelayStats,
	UplinkTransport,
} from './types';

export interface OutboundRelayOptions {
	capacity: number;
	overflowPolicy: OverflowPolicy;
}

export class OutboundRelay extends EventEmitter {
	private queue: OutboundQueue<AggregatedRecord>;
	private draining: Promise<DrainResult> | null = null;
	private stopped = false;
	private clock: () => number;

	private enqueued = 0;
	private sent = 0;
	private uplinkFailures = 0;
	private lostOnShutdown = 0;
	private lastSentAt: number | null = null;
	private lastUplinkError: string | null = null;

	constructor(
		options: OutboundRelayOptions,
		private readonly transport: UplinkTransport,
		private readonly droneState: DroneStateReader,
		private readonly logger: Logger,
		clock: () => number = Date.now
	) {
		super();
		this.queue = new OutboundQueue<AggregatedRecord>(options.capacity, options.overflowPolicy);
		this.clock = clock;
	}

	/**
	 * Buffer a record; starts a drain when the uplink is open
	 */
	enqueue(record: AggregatedRecord): EnqueueResult<AggregatedRecord> {
		if (this.stopped) {
			this.lostOnShutdown++;
			this.logger.warn('Relay stopped, discarding record', {
				component: LogComponents.RELAY,
				sensorId: record.sensorId,
				timestamp: record.timestamp,
			});
			return { accepted: false, error: new UplinkError('Relay stopped, record not buffered') };
		}

		const result = this.queue.enqueue(record);

		if (result.accepted) {
			this.enqueued++;
			if (result.evicted) {
				this.logger.warn('Outbound queue full, dropped oldest record', {
					component: LogComponents.RELAY,
					capacity: this.queue.capacity,
					droppedSensorId: result.evicted.sensorId,
					droppedTimestamp: result.evicted.timestamp,
				});
				this.emit('overflow', { policy: this.queue.policy, lost: result.evicted });
			}
		} else {
			this.logger.warn('Outbound queue full, rejected new record', {
				component: LogComponents.RELAY,
				capacity: this.queue.capacity,
				sensorId: record.sensorId,
			});
			this.emit('overflow', { policy: this.queue.policy, lost: record });
		}

		if (!this.stopped && isUplinkPermitted(this.droneState.snapshot())) {
			void this.drain();
		}

		return result;
	}

	/**
	 * Send queued records oldest-first while uplink is permitted
	 */
	drain(): Promise<DrainResult> {
		if (this.draining) {
			return this.draining;
		}
		this.draining = this.runDrain().finally(() => {
			this.draining = null;
		});
		return this.draining;
	}

	/**
	 * Best-effort drain bounded by graceMs. Resolves with what is left behind.
	 */
	async flush(graceMs: number): Promise<number> {
		let timer: NodeJS.Timeout | undefined;
		const timeout = new Promise<'timeout'>(resolve => {
			timer = setTimeout(() => resolve('timeout'), graceMs);
		});

		try {
			const outcome = await Promise.race([this.drain(), timeout]);
			if (outcome === 'timeout') {
				this.logger.warn('Shutdown grace period elapsed during drain', {
					component: LogComponents.RELAY,
					graceMs,
					remaining: this.queue.size(),
				});
			}
		} finally {
			clearTimeout(timer);
		}

		return this.queue.size();
	}

	/**
	 * Stop draining, close the uplink and count what is left as lost. A record
	 * whose send is still in flight is settled by that send instead.
	 */
	async stop(): Promise<void> {
		if (this.stopped) {
			return;
		}
		this.stopped = true;

		const abandoned = this.queue.clear();
		this.lostOnShutdown += abandoned.length;
		if (abandoned.length > 0) {
			this.logger.warn('Discarding unsent records on shutdown', {
				component: LogComponents.RELAY,
				lostOnShutdown: abandoned.length,
			});
		}

		await this.transport.close();
	}

	isDraining(): boolean {
		return this.draining !== null;
	}

	queueLength(): number {
		return this.queue.size();
	}

	/**
	 * Queued records, oldest first
	 */
	pendingRecords(): AggregatedRecord[] {
		return this.queue.toArray();
	}

	getStats(): RelayStats {
		const droppedOldest = this.queue.getDroppedOldest();
		const rejectedNew = this.queue.getRejectedNew();
		return {
			queueLength: this.queue.size(),
			capacity: this.queue.capacity,
			overflowPolicy: this.queue.policy,
			enqueued: this.enqueued,
			sent: this.sent,
			droppedOldest,
			rejectedNew,
			recordsLost: droppedOldest + rejectedNew + this.lostOnShutdown,
			uplinkFailures: this.uplinkFailures,
			lostOnShutdown: this.lostOnShutdown,
			lastSentAt: this.lastSentAt,
			lastUplinkError: this.lastUplinkError,
		};
	}

	private async runDrain(): Promise<DrainResult> {
		let sentThisCycle = 0;
		let stoppedBy: DrainStopReason = 'empty';

		while (!this.queue.isEmpty()) {
			if (this.stopped) {
				stoppedBy = 'stopped';
				break;
			}
			// Re-check every record: a tick may close the uplink mid-drain
			if (!isUplinkPermitted(this.droneState.snapshot())) {
				stoppedBy = 'uplink-forbidden';
				break;
			}

			const record = this.queue.peek();
			if (record === undefined) break;

			this.queue.pinHead();
			try {
				await this.transport.send(record);
			} catch (error) {
				this.queue.unpinHead();
				const uplinkError = error instanceof UplinkError
					? error
					: new UplinkError(error instanceof Error ? error.message : String(error), { cause: error });
				this.uplinkFailures++;
				this.lastUplinkError = uplinkError.message;
				this.logger.warn('Uplink send failed, pausing drain', {
					component: LogComponents.RELAY,
					errorType: getNetworkErrorType(uplinkError),
					error: uplinkError.message,
					queueLength: this.queue.size(),
				});
				this.emit('uplink-error', uplinkError);
				if (this.stopped) {
					// No later drain will retry it
					this.queue.shift();
					this.lostOnShutdown++;
					stoppedBy = 'stopped';
				} else {
					stoppedBy = 'uplink-error';
				}
				break;
			}

			this.queue.shift();
			this.sent++;
			sentThisCycle++;
			this.lastSentAt = this.clock();
			this.emit('sent', record);
		}

		if (sentThisCycle > 0) {
			this.logger.debug('Drain cycle complete', {
				component: LogComponents.RELAY,
				sent: sentThisCycle,
				remaining: this.queue.size(),
				stoppedBy,
			});
		}

		return { sent: sentThisCycle, remaining: this.queue.size(), stoppedBy };
	}
}
