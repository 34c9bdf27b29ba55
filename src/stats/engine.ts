/**
 * Rolling Statistics Engine
 *
 * Owns one SensorWindow per sensor id, created on first reading and kept for
 * the gateway's lifetime. Callers serialize updates per sensor id (see
 * SensorWorkQueue); the engine itself holds no locks.
 */

import type { SensorReading } from '../ingest/types';
import type { SensorWindow, WindowStats } from './types';
import { createWindow, getLatestTimestamp, getStats, getValues, pushValue } from './rolling-window';

export class RollingStatisticsEngine {
	private windows = new Map<string, SensorWindow>();

	constructor(private readonly windowSize: number) {
		if (!Number.isInteger(windowSize) || windowSize < 1) {
			throw new RangeError(`Window size must be a positive integer, got ${windowSize}`);
		}
	}

	/**
	 * Add a reading to its sensor's window and return the updated statistics
	 */
	update(sensorId: string, reading: SensorReading): WindowStats {
		let window = this.windows.get(sensorId);
		if (!window) {
			window = createWindow(this.windowSize);
			this.windows.set(sensorId, window);
		}

		pushValue(window, reading.value, reading.timestamp);
		return getStats(window);
	}

	/**
	 * Current statistics without mutating; count 0 for an unknown sensor
	 */
	peek(sensorId: string): WindowStats {
		const window = this.windows.get(sensorId);
		return window ? getStats(window) : { mean: 0, stdDev: 0, count: 0 };
	}

	/**
	 * Window contents for a sensor, oldest first
	 */
	windowValues(sensorId: string): number[] {
		const window = this.windows.get(sensorId);
		return window ? getValues(window) : [];
	}

	latestTimestamp(sensorId: string): number | null {
		const window = this.windows.get(sensorId);
		return window ? getLatestTimestamp(window) : null;
	}

	sensorIds(): string[] {
		return Array.from(this.windows.keys());
	}
}
