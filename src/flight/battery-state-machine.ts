/**
 * BATTERY & FLIGHT STATE MACHINE
 * ==============================
 *
 *   ACTIVE --(level <= low)--> RETURNING --(level <= 0 | arrived)--> DOCKED
 *     ^                                                                |
 *     +----------(level >= high)---- CHARGING <----(next tick)---------+
 *
 * Each tick updates the level for the current mode, then evaluates at most
 * one transition. The machine is the only writer of DroneState; everything
 * else reads frozen snapshots.
 *
 * Events emitted:
 * - 'transition': FlightTransition
 * - 'halted': StateInvariantViolation
 */

import { EventEmitter } from 'events';
import { StateInvariantViolation } from '../errors';
import { FLIGHT_MODES } from './types';
import type { BatteryConfig, DroneState, FlightController, FlightMode, FlightTransition } from './types';

export const MIN_BATTERY_LEVEL = 0;
export const MAX_BATTERY_LEVEL = 100;

/**
 * Uplink to the central server is only open while flying ACTIVE
 */
export function isUplinkPermitted(state: DroneState): boolean {
	return state.mode === 'ACTIVE';
}

export class BatteryStateMachine extends EventEmitter implements FlightController {
	private state: DroneState;
	private ticksReturning = 0;
	private arrivalSignalled = false;
	private haltedBy: StateInvariantViolation | null = null;

	constructor(
		private readonly config: BatteryConfig,
		private readonly clock: () => number = Date.now
	) {
		super();
		this.validateConfig(config);
		this.state = Object.freeze({
			batteryLevel: MAX_BATTERY_LEVEL,
			mode: 'ACTIVE',
			lastTransitionTime: clock(),
			tick: 0,
		});
	}

	snapshot(): DroneState {
		return this.state;
	}

	isUplinkPermitted(): boolean {
		return isUplinkPermitted(this.state);
	}

	isHalted(): boolean {
		return this.haltedBy !== null;
	}

	/**
	 * Signal arrival at base. Takes effect on the next tick; ignored unless RETURNING.
	 */
	markArrivedAtBase(): boolean {
		if (this.state.mode !== 'RETURNING') {
			return false;
		}
		this.arrivalSignalled = true;
		return true;
	}

	/**
	 * Advance simulated time by one tick
	 * @throws StateInvariantViolation when the machine is (or becomes) halted
	 */
	tick(): DroneState {
		if (this.haltedBy) {
			throw this.haltedBy;
		}

		const previous = this.state;
		this.assertInvariants(previous);

		let level = previous.batteryLevel;
		let mode: FlightMode = previous.mode;

		switch (previous.mode) {
			case 'ACTIVE':
				level -= this.config.activeDrainRate;
				if (level <= this.config.lowThreshold) {
					mode = 'RETURNING';
				}
				break;

			case 'RETURNING':
				level -= this.config.returnDrainRate;
				this.ticksReturning++;
				if (level <= MIN_BATTERY_LEVEL
					|| this.arrivalSignalled
					|| this.ticksReturning >= this.config.returnTicks) {
					mode = 'DOCKED';
				}
				break;

			case 'DOCKED':
				level += this.config.chargeRate;
				mode = 'CHARGING';
				break;

			case 'CHARGING':
				level += this.config.chargeRate;
				if (level >= this.config.highThreshold) {
					mode = 'ACTIVE';
				}
				break;

			default:
				throw this.halt(`Undefined flight mode: ${String(previous.mode)}`);
		}

		if (!Number.isFinite(level)) {
			throw this.halt(`Battery level became non-finite in ${previous.mode}`);
		}
		// Clamp at the float boundary only
		level = Math.min(MAX_BATTERY_LEVEL, Math.max(MIN_BATTERY_LEVEL, level));

		const now = this.clock();
		const next: DroneState = Object.freeze({
			batteryLevel: level,
			mode,
			lastTransitionTime: mode === previous.mode ? previous.lastTransitionTime : now,
			tick: previous.tick + 1,
		});
		this.assertInvariants(next);

		if (mode === 'RETURNING' && previous.mode !== 'RETURNING') {
			this.ticksReturning = 0;
			this.arrivalSignalled = false;
		}

		this.state = next;

		if (mode !== previous.mode) {
			const transition: FlightTransition = {
				from: previous.mode,
				to: mode,
				batteryLevel: level,
				at: now,
				tick: next.tick,
			};
			this.emit('transition', transition);
		}

		return next;
	}

	private assertInvariants(state: DroneState): void {
		if (!Number.isFinite(state.batteryLevel)
			|| state.batteryLevel < MIN_BATTERY_LEVEL
			|| state.batteryLevel > MAX_BATTERY_LEVEL) {
			throw this.halt(`Battery level out of range: ${state.batteryLevel}`);
		}
		if (!FLIGHT_MODES.some(mode => mode === state.mode)) {
			throw this.halt(`Undefined flight mode: ${String(state.mode)}`);
		}
	}

	private halt(message: string): StateInvariantViolation {
		const violation = new StateInvariantViolation(message);
		this.haltedBy = violation;
		this.emit('halted', violation);
		return violation;
	}

	private validateConfig(config: BatteryConfig): void {
		const rates = [config.activeDrainRate, config.returnDrainRate, config.chargeRate];
		if (rates.some(rate => !Number.isFinite(rate) || rate <= 0)) {
			throw new StateInvariantViolation('Battery rates must be positive finite numbers');
		}
		if (!(config.lowThreshold >= MIN_BATTERY_LEVEL
			&& config.lowThreshold < config.highThreshold
			&& config.highThreshold <= MAX_BATTERY_LEVEL)) {
			throw new StateInvariantViolation(
				`Battery thresholds must satisfy 0 <= low < high <= 100 (low=${config.lowThreshold}, high=${config.highThreshold})`
			);
		}
		if (!Number.isInteger(config.returnTicks) || config.returnTicks < 1) {
			throw new StateInvariantViolation('returnTicks must be a positive integer');
		}
	}
}
