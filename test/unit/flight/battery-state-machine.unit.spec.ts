import { BatteryStateMachine, isUplinkPermitted } from '../../../src/flight/battery-state-machine';
import type { BatteryConfig, DroneState, FlightTransition } from '../../../src/flight/types';
import { StateInvariantViolation } from '../../../src/errors';

describe('BatteryStateMachine', () => {
	let config: BatteryConfig;
	let now: number;
	const clock = () => now;

	beforeEach(() => {
		now = 1_000;
		config = {
			lowThreshold: 20,
			highThreshold: 90,
			activeDrainRate: 1,
			returnDrainRate: 1,
			chargeRate: 10,
			returnTicks: 5,
		};
	});

	function tickUntil(machine: BatteryStateMachine, mode: DroneState['mode'], limit = 500): number {
		for (let i = 1; i <= limit; i++) {
			now += 1000;
			if (machine.tick().mode === mode) return i;
		}
		throw new Error(`Never reached ${mode}`);
	}

	it('starts ACTIVE at full battery with uplink permitted', () => {
		const machine = new BatteryStateMachine(config, clock);
		expect(machine.snapshot()).toEqual({ batteryLevel: 100, mode: 'ACTIVE', lastTransitionTime: 1_000, tick: 0 });
		expect(machine.isUplinkPermitted()).toBe(true);
	});

	it('enters RETURNING after 80 ticks with low=20 and a drain of 1', () => {
		const machine = new BatteryStateMachine(config, clock);

		for (let i = 1; i < 80; i++) {
			expect(machine.tick().mode).toBe('ACTIVE');
		}
		const state = machine.tick();

		expect(state.tick).toBe(80);
		expect(state.mode).toBe('RETURNING');
		expect(state.batteryLevel).toBe(20);
		expect(isUplinkPermitted(state)).toBe(false);
	});

	it('runs the full cycle back to ACTIVE', () => {
		const machine = new BatteryStateMachine(config, clock);
		const transitions: FlightTransition[] = [];
		machine.on('transition', (t: FlightTransition) => transitions.push(t));

		tickUntil(machine, 'RETURNING');
		tickUntil(machine, 'ACTIVE');

		expect(transitions.map(t => `${t.from}->${t.to}@${t.tick}`)).toEqual([
			'ACTIVE->RETURNING@80',
			'RETURNING->DOCKED@85',
			'DOCKED->CHARGING@86',
			'CHARGING->ACTIVE@93',
		]);
		expect(transitions.map(t => t.batteryLevel)).toEqual([20, 15, 25, 95]);
		expect(machine.snapshot().batteryLevel).toBe(95);
	});

	it('forbids uplink in every mode but ACTIVE', () => {
		const machine = new BatteryStateMachine(config, clock);
		const seen = new Map<string, boolean>();
		for (let i = 0; i < 93; i++) {
			const state = machine.tick();
			seen.set(state.mode, isUplinkPermitted(state));
		}
		expect(Object.fromEntries(seen)).toEqual({
			ACTIVE: true,
			RETURNING: false,
			DOCKED: false,
			CHARGING: false,
		});
	});

	it('drains monotonically while ACTIVE or RETURNING and charges while CHARGING', () => {
		const machine = new BatteryStateMachine(config, clock);
		let previous = machine.snapshot();
		for (let i = 0; i < 93; i++) {
			const next = machine.tick();
			if (previous.mode === 'ACTIVE' || previous.mode === 'RETURNING') {
				expect(next.batteryLevel).toBeLessThan(previous.batteryLevel);
			}
			if (previous.mode === 'CHARGING' || previous.mode === 'DOCKED') {
				expect(next.batteryLevel).toBeGreaterThan(previous.batteryLevel);
			}
			previous = next;
		}
	});

	it('docks on the tick after arrival is signalled', () => {
		const machine = new BatteryStateMachine(config, clock);
		expect(machine.markArrivedAtBase()).toBe(false);

		tickUntil(machine, 'RETURNING');
		expect(machine.markArrivedAtBase()).toBe(true);

		const state = machine.tick();
		expect(state.mode).toBe('DOCKED');
		expect(state.batteryLevel).toBe(19);
	});

	it('docks immediately when the battery runs flat while returning', () => {
		const machine = new BatteryStateMachine({ ...config, lowThreshold: 2, returnDrainRate: 5, returnTicks: 50 }, clock);
		tickUntil(machine, 'RETURNING');

		const state = machine.tick();
		expect(state.mode).toBe('DOCKED');
		expect(state.batteryLevel).toBe(0);
	});

	it('clamps charging at 100', () => {
		const machine = new BatteryStateMachine({ ...config, highThreshold: 100, chargeRate: 30 }, clock);
		tickUntil(machine, 'CHARGING');
		tickUntil(machine, 'ACTIVE');
		expect(machine.snapshot().batteryLevel).toBe(100);
	});

	it('publishes frozen snapshots and stamps transition times', () => {
		const machine = new BatteryStateMachine(config, clock);
		const ticks = tickUntil(machine, 'RETURNING');
		const state = machine.snapshot();

		expect(Object.isFrozen(state)).toBe(true);
		expect(state.lastTransitionTime).toBe(1_000 + ticks * 1000);
	});

	it('rejects inconsistent configuration', () => {
		expect(() => new BatteryStateMachine({ ...config, lowThreshold: 90, highThreshold: 90 }, clock))
			.toThrow(StateInvariantViolation);
		expect(() => new BatteryStateMachine({ ...config, chargeRate: 0 }, clock))
			.toThrow('Battery rates must be positive finite numbers');
		expect(() => new BatteryStateMachine({ ...config, returnTicks: 0 }, clock))
			.toThrow('returnTicks must be a positive integer');
	});

	it('halts on a non-finite battery level and keeps throwing', () => {
		const machine = new BatteryStateMachine(config, clock);
		const halted = jest.fn();
		machine.on('halted', halted);
		// Corrupt the rate after validation
		config.activeDrainRate = NaN;

		expect(() => machine.tick()).toThrow(StateInvariantViolation);
		expect(machine.isHalted()).toBe(true);
		expect(halted).toHaveBeenCalledTimes(1);
		expect(() => machine.tick()).toThrow('Battery level became non-finite in ACTIVE');
		expect(machine.snapshot().tick).toBe(0);
	});
});
