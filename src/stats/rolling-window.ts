/**
 * SENSOR WINDOW - CIRCULAR BUFFER WITH RUNNING SUMS
 * ==================================================
 *
 * Fixed-size ring buffer per sensor. Insertion evicts the oldest value once
 * full and adjusts sum / sum-of-squares, so each update is O(1).
 * Variance is the population variance of the window contents.
 */

import type { SensorWindow, WindowStats } from './types';

/**
 * Create an empty window of size maxSize
 */
export function createWindow(maxSize: number): SensorWindow {
	if (!Number.isInteger(maxSize) || maxSize < 1) {
		throw new RangeError(`Window size must be a positive integer, got ${maxSize}`);
	}
	return {
		values: new Array<number>(maxSize).fill(0),
		timestamps: new Array<number>(maxSize).fill(0),
		size: 0,
		maxSize,
		head: 0,
		sum: 0,
		sumSquares: 0,
	};
}

/**
 * Insert a value, evicting the oldest when the window is full
 */
export function pushValue(window: SensorWindow, value: number, timestamp: number): void {
	const index = window.head;

	if (window.size === window.maxSize) {
		// Evict before insert
		const evicted = window.values[index];
		window.sum -= evicted;
		window.sumSquares -= evicted * evicted;
	} else {
		window.size++;
	}

	window.values[index] = value;
	window.timestamps[index] = timestamp;
	window.sum += value;
	window.sumSquares += value * value;

	window.head = (window.head + 1) % window.maxSize;
}

/**
 * Mean / population standard deviation of the current contents
 */
export function getStats(window: SensorWindow): WindowStats {
	if (window.size === 0) {
		return { mean: 0, stdDev: 0, count: 0 };
	}

	const mean = window.sum / window.size;
	// Floating-point drift can push this slightly below zero
	const variance = Math.max(0, window.sumSquares / window.size - mean * mean);

	return { mean, stdDev: Math.sqrt(variance), count: window.size };
}

/**
 * Window values, oldest first
 */
export function getValues(window: SensorWindow): number[] {
	const result: number[] = [];
	const start = (window.head - window.size + window.maxSize) % window.maxSize;
	for (let i = 0; i < window.size; i++) {
		result.push(window.values[(start + i) % window.maxSize]);
	}
	return result;
}

/**
 * Timestamp of the newest value, or null for an empty window
 */
export function getLatestTimestamp(window: SensorWindow): number | null {
	if (window.size === 0) return null;
	return window.timestamps[(window.head - 1 + window.maxSize) % window.maxSize];
}
