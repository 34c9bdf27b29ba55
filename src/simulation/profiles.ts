import type { SensorUnit } from '../ingest/types';
import type { ValueProfile } from './types';

/**
 * Plausible baseline per unit
 */
export const UNIT_PROFILES: Record<SensorUnit, ValueProfile> = {
	TEMPERATURE: { baseValue: 22.5, variance: 2, min: 15, max: 30 },
	HUMIDITY: { baseValue: 50, variance: 5, min: 30, max: 70 },
	PRESSURE: { baseValue: 1013, variance: 3, min: 950, max: 1050 },
	AIR_QUALITY: { baseValue: 40, variance: 8, min: 0, max: 500 },
};
