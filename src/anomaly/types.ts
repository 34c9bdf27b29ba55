/**
 * ANOMALY CLASSIFICATION - TYPE DEFINITIONS
 */

export type Classification = 'NORMAL' | 'ANOMALY';

/**
 * Anomaly severity levels
 */
export type AnomalySeverity = 'info' | 'warning' | 'critical';

/**
 * Which rule produced the classification
 */
export type ClassificationReason =
	| 'zscore'          // |z| against window mean / stddev
	| 'variance_floor'  // window too uniform or too short, absolute deviation used
	| 'warmup';         // no history yet

/**
 * One event per processed reading. Frozen once created.
 */
export interface AnomalyEvent {
	readonly sensorId: string;
	readonly timestamp: number;
	readonly value: number;
	readonly classification: Classification;
	readonly score: number;          // |z|, or |value - mean| on the variance-floor branch
	readonly severity: AnomalySeverity;
	readonly reason: ClassificationReason;
}

export interface ClassifierConfig {
	zScoreThreshold: number;             // |z| above this is an anomaly
	minStdDev: number;                   // Variance floor (as a standard deviation)
	absoluteDeviationThreshold: number;  // Used below the floor
	minSamples: number;                  // Fewer prior samples also use the floor branch
}
