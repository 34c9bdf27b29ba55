/**
 * Test Fixtures
 * =============
 *
 * Factory functions for readings, records and config.
 *
 * Usage:
 *   const reading = createReading({ value: 42 });
 *   const record = createRecord({ sensorId: 'therm-2' });
 */

import type { GatewayConfigInput } from '../../src/config/schema';
import type { SensorReading } from '../../src/ingest/types';
import type { AggregatedRecord } from '../../src/relay/types';
import type { DroneState, FlightController } from '../../src/flight/types';

export const BASE_TIME = Date.UTC(2024, 0, 15, 12, 0, 0);

export function createReading(overrides: Partial<SensorReading> = {}): SensorReading {
	return Object.freeze({
		sensorId: 'therm-1',
		timestamp: BASE_TIME,
		value: 21.5,
		unit: 'TEMPERATURE' as const,
		...overrides,
	});
}

/**
 * Readings for one sensor, one second apart
 */
export function createReadings(sensorId: string, values: number[]): SensorReading[] {
	return values.map((value, i) => createReading({ sensorId, value, timestamp: BASE_TIME + i * 1000 }));
}

export function createRecord(overrides: Partial<AggregatedRecord> = {}): AggregatedRecord {
	return Object.freeze({
		sensorId: 'therm-1',
		unit: 'TEMPERATURE' as const,
		windowMean: 21.5,
		windowStdDev: 0.4,
		classification: 'NORMAL' as const,
		score: 0.5,
		anomalyCount: 0,
		sampleCount: 10,
		timestamp: BASE_TIME,
		...overrides,
	});
}

/**
 * Records numbered 1..count (timestamp carries the number)
 */
export function createNumberedRecords(count: number, sensorId = 'therm-1'): AggregatedRecord[] {
	return Array.from({ length: count }, (_, i) => createRecord({ sensorId, timestamp: i + 1 }));
}

/**
 * Wire frame as a sensor node would send it
 */
export function frame(payload: Record<string, unknown>): string {
	return JSON.stringify(payload) + '\n';
}

/**
 * Gateway config for tests: ephemeral port, loopback, quiet logs
 */
export function createTestConfig(overrides: GatewayConfigInput = {}): GatewayConfigInput {
	return {
		listenHost: '127.0.0.1',
		listenPort: 0,
		serverHost: '127.0.0.1',
		serverPort: 9,
		tickIntervalMs: 60_000,
		shutdownGraceMs: 500,
		logLevel: 'error',
		...overrides,
	};
}

/**
 * Flight controller pinned to one state, for gating tests
 */
export class FixedFlightController implements FlightController {
	constructor(public state: DroneState) {}

	snapshot(): DroneState {
		return this.state;
	}

	tick(): DroneState {
		this.state = Object.freeze({ ...this.state, tick: this.state.tick + 1 });
		return this.state;
	}

	markArrivedAtBase(): boolean {
		return false;
	}

	setMode(mode: DroneState['mode']): void {
		this.state = Object.freeze({ ...this.state, mode });
	}
}

export function droneState(overrides: Partial<DroneState> = {}): DroneState {
	return Object.freeze({
		batteryLevel: 100,
		mode: 'ACTIVE' as const,
		lastTransitionTime: BASE_TIME,
		tick: 0,
		...overrides,
	});
}
