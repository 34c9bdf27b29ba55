/**
 * Bounded FIFO with an explicit overflow policy
 *
 * - drop-oldest: evict the oldest unpinned item, append the new item
 * - reject-new:  keep the queue as is, refuse the new item
 *
 * The head can be pinned while it is being sent; drop-oldest then skips it.
 * With nothing evictable the new item is refused. Length never exceeds
 * capacity.
 */

import { QueueOverflowError } from '../errors';
import type { OverflowPolicy } from '../config/schema';
import type { EnqueueResult } from './types';

export class OutboundQueue<T> {
	private items: T[] = [];
	private droppedOldest = 0;
	private rejectedNew = 0;
	private headPinned = false;

	constructor(
		readonly capacity: number,
		readonly policy: OverflowPolicy
	) {
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
		}
	}

	enqueue(item: T): EnqueueResult<T> {
		if (this.items.length < this.capacity) {
			this.items.push(item);
			return { accepted: true };
		}

		const evictIndex = this.headPinned ? 1 : 0;
		if (this.policy === 'reject-new' || evictIndex >= this.items.length) {
			this.rejectedNew++;
			return { accepted: false, error: new QueueOverflowError(this.capacity, this.policy) };
		}

		const [evicted] = this.items.splice(evictIndex, 1);
		this.items.push(item);
		this.droppedOldest++;
		return { accepted: true, evicted };
	}

	/**
	 * Protect the head from eviction until it is shifted or unpinned
	 */
	pinHead(): void {
		this.headPinned = this.items.length > 0;
	}

	unpinHead(): void {
		this.headPinned = false;
	}

	isHeadPinned(): boolean {
		return this.headPinned;
	}

	/**
	 * Oldest item, left in place
	 */
	peek(): T | undefined {
		return this.items[0];
	}

	/**
	 * Remove the oldest item
	 */
	shift(): T | undefined {
		this.headPinned = false;
		return this.items.shift();
	}

	size(): number {
		return this.items.length;
	}

	isEmpty(): boolean {
		return this.items.length === 0;
	}

	/**
	 * Copy of the contents, oldest first
	 */
	toArray(): T[] {
		return [...this.items];
	}

	/**
	 * Remove everything except a pinned head and return what was removed
	 */
	clear(): T[] {
		const keep = this.headPinned ? 1 : 0;
		return this.items.splice(keep);
	}

	getDroppedOldest(): number {
		return this.droppedOldest;
	}

	getRejectedNew(): number {
		return this.rejectedNew;
	}
}
