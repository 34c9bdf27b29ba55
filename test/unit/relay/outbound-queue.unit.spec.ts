import { OutboundQueue } from '../../../src/relay/outbound-queue';
import { QueueOverflowError } from '../../../src/errors';

describe('OutboundQueue', () => {
	it('preserves FIFO order', () => {
		const queue = new OutboundQueue<number>(5, 'drop-oldest');
		[1, 2, 3].forEach(n => queue.enqueue(n));

		expect(queue.shift()).toBe(1);
		expect(queue.peek()).toBe(2);
		expect(queue.toArray()).toEqual([2, 3]);
	});

	it('drop-oldest evicts the head and keeps the length at capacity', () => {
		const queue = new OutboundQueue<number>(10, 'drop-oldest');
		for (let n = 1; n <= 10; n++) queue.enqueue(n);

		const result = queue.enqueue(11);

		expect(result).toEqual({ accepted: true, evicted: 1 });
		expect(queue.size()).toBe(10);
		expect(queue.peek()).toBe(2);
		expect(queue.toArray()[9]).toBe(11);
		expect(queue.getDroppedOldest()).toBe(1);
	});

	it('drop-oldest skips a pinned head', () => {
		const queue = new OutboundQueue<number>(3, 'drop-oldest');
		[1, 2, 3].forEach(n => queue.enqueue(n));
		queue.pinHead();

		expect(queue.enqueue(4)).toEqual({ accepted: true, evicted: 2 });
		expect(queue.toArray()).toEqual([1, 3, 4]);

		expect(queue.shift()).toBe(1);
		expect(queue.isHeadPinned()).toBe(false);
	});

	it('drop-oldest refuses the new item when only a pinned head is queued', () => {
		const queue = new OutboundQueue<number>(1, 'drop-oldest');
		queue.enqueue(1);
		queue.pinHead();

		const result = queue.enqueue(2);

		expect(result.accepted).toBe(false);
		expect(queue.toArray()).toEqual([1]);
		expect(queue.getDroppedOldest()).toBe(0);
		expect(queue.getRejectedNew()).toBe(1);
	});

	it('reject-new refuses the new item and returns an overflow error', () => {
		const queue = new OutboundQueue<number>(10, 'reject-new');
		for (let n = 1; n <= 10; n++) queue.enqueue(n);

		const result = queue.enqueue(11);

		expect(result.accepted).toBe(false);
		if (!result.accepted) {
			expect(result.error).toBeInstanceOf(QueueOverflowError);
			expect(result.error.message).toBe('Outbound queue at capacity (10), policy: reject-new');
		}
		expect(queue.toArray()).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
		expect(queue.getRejectedNew()).toBe(1);
	});

	it('never exceeds capacity under sustained overflow', () => {
		for (const policy of ['drop-oldest', 'reject-new'] as const) {
			const queue = new OutboundQueue<number>(3, policy);
			for (let n = 0; n < 100; n++) {
				queue.enqueue(n);
				expect(queue.size()).toBeLessThanOrEqual(3);
			}
			expect(queue.size()).toBe(3);
		}
	});

	it('clear() hands back everything it held', () => {
		const queue = new OutboundQueue<string>(4, 'drop-oldest');
		queue.enqueue('a');
		queue.enqueue('b');

		expect(queue.clear()).toEqual(['a', 'b']);
		expect(queue.isEmpty()).toBe(true);
	});

	it('clear() keeps a pinned head', () => {
		const queue = new OutboundQueue<string>(4, 'drop-oldest');
		['a', 'b', 'c'].forEach(item => queue.enqueue(item));
		queue.pinHead();

		expect(queue.clear()).toEqual(['b', 'c']);
		expect(queue.toArray()).toEqual(['a']);
	});

	it('rejects a non-positive capacity', () => {
		expect(() => new OutboundQueue<number>(0, 'drop-oldest')).toThrow(RangeError);
	});
});
