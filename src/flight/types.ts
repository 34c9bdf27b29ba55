/**
 * BATTERY & FLIGHT - TYPE DEFINITIONS
 */

export const FLIGHT_MODES = ['ACTIVE', 'RETURNING', 'DOCKED', 'CHARGING'] as const;

export type FlightMode = typeof FLIGHT_MODES[number];

/**
 * Drone state snapshot. A new frozen object is published per tick, so a
 * reader always sees a mode/level pair from the same tick.
 */
export interface DroneState {
	readonly batteryLevel: number;        // 0-100
	readonly mode: FlightMode;
	readonly lastTransitionTime: number;  // Unix timestamp (ms)
	readonly tick: number;                // Ticks applied since start
}

export interface FlightTransition {
	from: FlightMode;
	to: FlightMode;
	batteryLevel: number;
	at: number;
	tick: number;
}

export interface BatteryConfig {
	lowThreshold: number;     // ACTIVE -> RETURNING at or below
	highThreshold: number;    // CHARGING -> ACTIVE at or above
	activeDrainRate: number;  // Percent per tick in ACTIVE
	returnDrainRate: number;  // Percent per tick in RETURNING
	chargeRate: number;       // Percent per tick in CHARGING
	returnTicks: number;      // Ticks spent RETURNING before arriving at base
}

/**
 * Read-only view of the drone state used by the relay
 */
export interface DroneStateReader {
	snapshot(): DroneState;
}

/**
 * What the coordinator drives: the state reader plus the tick
 */
export interface FlightController extends DroneStateReader {
	tick(): DroneState;
	markArrivedAtBase(): boolean;
}
