/**
 * PER-SENSOR WORK QUEUES
 * ======================
 *
 * Every sensor id gets exactly one bounded queue with a single consumer, so
 * readings for one sensor are processed serially in arrival order no matter
 * how many connections deliver them. Producers must check hasCapacity() and
 * wait for 'drain' when the queue is saturated.
 *
 * Events emitted:
 * - 'drain': queue dropped below capacity after being full
 *
 * A processor failure is logged and counted; the reading is skipped.
 */

import { EventEmitter } from 'events';
import type { SensorReading } from './types';
import type { Logger } from '../logging/types';
import { LogComponents } from '../logging/types';
import { errorContext } from '../logging/logger';

export type ReadingProcessor = (reading: SensorReading) => void | Promise<void>;

export class SensorWorkQueue extends EventEmitter {
	private items: SensorReading[] = [];
	private processing = false;
	private saturated = false;
	private idleWaiters: Array<() => void> = [];
	private processed = 0;
	private failed = 0;

	constructor(
		readonly sensorId: string,
		private readonly capacity: number,
		private readonly processor: ReadingProcessor,
		private readonly logger: Logger
	) {
		super();
	}

	/**
	 * Check whether another reading can be accepted
	 */
	hasCapacity(): boolean {
		return this.items.length < this.capacity;
	}

	/**
	 * Add a reading. Returns false (and keeps the reading out) when full.
	 */
	offer(reading: SensorReading): boolean {
		if (!this.hasCapacity()) {
			this.saturated = true;
			return false;
		}

		this.items.push(reading);
		if (this.items.length >= this.capacity) {
			this.saturated = true;
		}

		if (!this.processing) {
			this.processing = true;
			void this.run();
		}
		return true;
	}

	size(): number {
		return this.items.length;
	}

	processedCount(): number {
		return this.processed;
	}

	failedCount(): number {
		return this.failed;
	}

	/**
	 * Resolves once every accepted reading has been processed
	 */
	whenIdle(): Promise<void> {
		if (!this.processing && this.items.length === 0) {
			return Promise.resolve();
		}
		return new Promise(resolve => this.idleWaiters.push(resolve));
	}

	private async run(): Promise<void> {
		while (this.items.length > 0) {
			// Yield so sockets and the ticker interleave with processing
			await new Promise<void>(resolve => setImmediate(resolve));

			const reading = this.items.shift();
			if (reading === undefined) break;

			try {
				await this.processor(reading);
				this.processed++;
			} catch (error) {
				this.failed++;
				this.logger.error('Failed to process reading', {
					component: LogComponents.INGEST,
					sensorId: this.sensorId,
					...errorContext(error),
				});
			}

			if (this.saturated && this.items.length < this.capacity) {
				this.saturated = false;
				this.emit('drain');
			}
		}

		this.processing = false;
		const waiters = this.idleWaiters;
		this.idleWaiters = [];
		waiters.forEach(resolve => resolve());
	}
}

/**
 * Routes readings to the one work queue owned by their sensor id
 */
export class SensorDispatcher {
	private queues = new Map<string, SensorWorkQueue>();

	constructor(
		private readonly capacity: number,
		private readonly processor: ReadingProcessor,
		private readonly logger: Logger
	) {}

	queueFor(sensorId: string): SensorWorkQueue {
		let queue = this.queues.get(sensorId);
		if (!queue) {
			queue = new SensorWorkQueue(sensorId, this.capacity, this.processor, this.logger);
			this.queues.set(sensorId, queue);
		}
		return queue;
	}

	sensorIds(): string[] {
		return Array.from(this.queues.keys());
	}

	/**
	 * Readings waiting for one sensor (0 when it has no queue yet)
	 */
	queueSize(sensorId: string): number {
		return this.queues.get(sensorId)?.size() ?? 0;
	}

	/**
	 * Readings whose processing threw, across all sensors
	 */
	failures(): number {
		let total = 0;
		for (const queue of this.queues.values()) {
			total += queue.failedCount();
		}
		return total;
	}

	/**
	 * Total readings waiting across all sensors
	 */
	backlog(): number {
		let total = 0;
		for (const queue of this.queues.values()) {
			total += queue.size();
		}
		return total;
	}

	async whenIdle(): Promise<void> {
		await Promise.all(Array.from(this.queues.values()).map(queue => queue.whenIdle()));
	}
}
