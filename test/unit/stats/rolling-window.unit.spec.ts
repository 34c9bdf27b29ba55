import {
	createWindow,
	getLatestTimestamp,
	getStats,
	getValues,
	pushValue,
} from '../../../src/stats/rolling-window';

describe('rolling window', () => {
	it('reports zeros for an empty window', () => {
		const window = createWindow(5);
		expect(getStats(window)).toEqual({ mean: 0, stdDev: 0, count: 0 });
		expect(getLatestTimestamp(window)).toBeNull();
	});

	it('rejects a non-positive or fractional size', () => {
		expect(() => createWindow(0)).toThrow(RangeError);
		expect(() => createWindow(2.5)).toThrow(RangeError);
	});

	it('computes mean and population std dev over a partial window', () => {
		const window = createWindow(10);
		[2, 4, 4, 4, 5, 5, 7, 9].forEach((v, i) => pushValue(window, v, i));

		const stats = getStats(window);
		expect(stats.count).toBe(8);
		expect(stats.mean).toBe(5);
		expect(stats.stdDev).toBeCloseTo(2, 10);
	});

	it('evicts the oldest value once full', () => {
		const window = createWindow(3);
		[1, 2, 3, 4, 5].forEach((v, i) => pushValue(window, v, 1000 + i));

		expect(getValues(window)).toEqual([3, 4, 5]);
		expect(window.sum).toBe(12);
		expect(window.sumSquares).toBe(50);
		expect(getStats(window).mean).toBe(4);
		expect(getLatestTimestamp(window)).toBe(1004);
	});

	it('matches the arithmetic mean of the last min(N, count) values', () => {
		const size = 4;
		const window = createWindow(size);
		const values = [3.5, -1, 8, 12.25, 0, 7, 7, -3.75, 10];

		values.forEach((value, i) => {
			pushValue(window, value, i);
			const tail = values.slice(Math.max(0, i + 1 - size), i + 1);
			const expected = tail.reduce((a, b) => a + b, 0) / tail.length;
			expect(getStats(window).mean).toBeCloseTo(expected, 10);
			expect(getStats(window).count).toBe(tail.length);
		});
	});

	it('never reports a negative variance for constant values', () => {
		const window = createWindow(10);
		for (let i = 0; i < 50; i++) pushValue(window, 0.1, i);

		const stats = getStats(window);
		expect(stats.stdDev).toBeGreaterThanOrEqual(0);
		expect(Number.isNaN(stats.stdDev)).toBe(false);
		expect(stats.mean).toBeCloseTo(0.1, 10);
	});
});
