/**
 * SENSOR SIMULATION - TYPE DEFINITIONS
 */

import type { SensorUnit } from '../ingest/types';

/**
 * Simulation pattern types
 */
export type SimulationPattern =
	| 'realistic'     // Gaussian noise around the baseline
	| 'spike'         // Occasional jumps well outside the baseline
	| 'drift'         // Gradual drift over time
	| 'cyclic'        // Sine wave
	| 'noisy';        // Wide uniform noise

export const SIMULATION_PATTERNS: readonly SimulationPattern[] = [
	'realistic',
	'spike',
	'drift',
	'cyclic',
	'noisy',
];

export interface ValueProfile {
	baseValue: number;                // Normal baseline value
	variance: number;                 // Normal variance range
	min?: number;                     // Minimum possible value
	max?: number;                     // Maximum possible value
}

export interface GeneratorConfig extends ValueProfile {
	pattern: SimulationPattern;
	spikeProbability: number;         // 0-1, used by 'spike'
	spikeMagnitude: number;           // Multiples of variance
}

export interface SensorNodeConfig {
	sensorId: string;
	unit: SensorUnit;
	host: string;
	port: number;
	intervalMs: number;               // Time between readings
	reconnectDelayMs: number;         // Wait before reconnecting after a drop
	generator: GeneratorConfig;
}

export interface SensorNodeStatus {
	sensorId: string;
	unit: SensorUnit;
	connected: boolean;
	running: boolean;
	readingsSent: number;
	reconnects: number;
	lastError: string | null;
}

/**
 * Random source in [0, 1)
 */
export type RandomSource = () => number;
