/**
 * Sensor simulation entry points
 */

import { SENSOR_UNITS } from '../ingest/types';
import type { SensorUnit } from '../ingest/types';
import { UNIT_PROFILES } from './profiles';
import type { SensorNodeConfig, SimulationPattern } from './types';

export { SensorNode } from './sensor-node';
export type { SensorNodeOptions } from './sensor-node';
export { SensorValueGenerator } from './value-generator';
export { UNIT_PROFILES } from './profiles';
export * from './types';

export interface SensorFleetOptions {
	baseId: string;
	count: number;
	host: string;
	port: number;
	intervalMs: number;
	reconnectDelayMs: number;
	pattern: SimulationPattern;
	units?: SensorUnit[];             // Cycled across the fleet; all units by default
	spikeProbability?: number;
	spikeMagnitude?: number;
}

/**
 * Configs for `count` sensors named `${baseId}1..${baseId}N`
 */
export function buildSensorFleet(options: SensorFleetOptions): SensorNodeConfig[] {
	if (!Number.isInteger(options.count) || options.count < 1) {
		throw new RangeError(`Sensor count must be a positive integer, got ${options.count}`);
	}
	const units = options.units && options.units.length > 0 ? options.units : [...SENSOR_UNITS];

	const configs: SensorNodeConfig[] = [];
	for (let i = 1; i <= options.count; i++) {
		const unit = units[(i - 1) % units.length];
		configs.push({
			sensorId: `${options.baseId}${i}`,
			unit,
			host: options.host,
			port: options.port,
			intervalMs: options.intervalMs,
			reconnectDelayMs: options.reconnectDelayMs,
			generator: {
				...UNIT_PROFILES[unit],
				pattern: options.pattern,
				spikeProbability: options.spikeProbability ?? 0.1,
				spikeMagnitude: options.spikeMagnitude ?? 3,
			},
		});
	}
	return configs;
}
