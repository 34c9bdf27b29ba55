/**
 * Synthetic sensor values for the configured pattern
 */

import type { GeneratorConfig, RandomSource } from './types';

export class SensorValueGenerator {
	private cyclePhase = 0;
	private driftOffset = 0;

	constructor(
		private readonly config: GeneratorConfig,
		private readonly random: RandomSource = Math.random
	) {}

	next(): number {
		const { baseValue, variance, min, max } = this.config;
		let value: number;

		switch (this.config.pattern) {
			case 'realistic':
				value = baseValue + this.randomGaussian() * variance;
				break;

			case 'spike':
				if (this.random() < this.config.spikeProbability) {
					value = baseValue + variance * this.config.spikeMagnitude;
				} else {
					value = baseValue + this.randomGaussian() * variance;
				}
				break;

			case 'drift':
				this.driftOffset += (this.random() - 0.5) * 0.1 * variance;
				value = baseValue + this.driftOffset + this.randomGaussian() * variance * 0.5;
				break;

			case 'cyclic':
				this.cyclePhase += 0.05;
				value = baseValue + Math.sin(this.cyclePhase) * variance * 2;
				break;

			case 'noisy':
				value = baseValue + (this.random() - 0.5) * variance * 4;
				break;

			default:
				value = baseValue;
		}

		if (min !== undefined) {
			value = Math.max(min, value);
		}
		if (max !== undefined) {
			value = Math.min(max, value);
		}

		return Math.round(value * 100) / 100;
	}

	/**
	 * Box-Muller transform
	 */
	private randomGaussian(): number {
		let u = 0, v = 0;
		while (u === 0) u = this.random();
		while (v === 0) v = this.random();
		return Math.sqrt(-2.0 * Math.log(u)) * Math.cos(2.0 * Math.PI * v);
	}
}
