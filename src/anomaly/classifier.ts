/**
 * ANOMALY CLASSIFIER
 * ==================
 *
 * Z-score rule with a variance floor. A pure function of its inputs: the
 * same window statistics and reading always produce the same event.
 */

import type { SensorReading } from '../ingest/types';
import type {
	AnomalyEvent,
	AnomalySeverity,
	Classification,
	ClassificationReason,
	ClassifierConfig,
} from './types';

export class AnomalyClassifier {
	constructor(private readonly config: ClassifierConfig) {}

	/**
	 * Classify a reading against window statistics.
	 *
	 * mean/stdDev describe the window before this reading was added;
	 * sampleCount is the number of values they cover, when known.
	 */
	classify(
		sensorId: string,
		reading: SensorReading,
		mean: number,
		stdDev: number,
		sampleCount?: number
	): AnomalyEvent {
		if (sampleCount === 0) {
			return this.event(sensorId, reading, 'NORMAL', 0, 'info', 'warmup');
		}

		const deviation = Math.abs(reading.value - mean);
		const belowFloor = stdDev < this.config.minStdDev
			|| (sampleCount !== undefined && sampleCount < this.config.minSamples);

		if (belowFloor) {
			const limit = this.config.absoluteDeviationThreshold;
			const classification: Classification = deviation > limit ? 'ANOMALY' : 'NORMAL';
			return this.event(
				sensorId,
				reading,
				classification,
				deviation,
				this.severity(classification, deviation, limit),
				'variance_floor'
			);
		}

		const zScore = deviation / stdDev;
		const limit = this.config.zScoreThreshold;
		const classification: Classification = zScore > limit ? 'ANOMALY' : 'NORMAL';
		return this.event(
			sensorId,
			reading,
			classification,
			zScore,
			this.severity(classification, zScore, limit),
			'zscore'
		);
	}

	/**
	 * Twice the branch limit or more is critical
	 */
	private severity(classification: Classification, score: number, limit: number): AnomalySeverity {
		if (classification === 'NORMAL') return 'info';
		return score >= limit * 2 ? 'critical' : 'warning';
	}

	private event(
		sensorId: string,
		reading: SensorReading,
		classification: Classification,
		score: number,
		severity: AnomalySeverity,
		reason: ClassificationReason
	): AnomalyEvent {
		return Object.freeze({
			sensorId,
			timestamp: reading.timestamp,
			value: reading.value,
			classification,
			score,
			severity,
			reason,
		});
	}
}
