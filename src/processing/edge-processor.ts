/**
 * EDGE PROCESSOR
 * ==============
 *
 * Per-reading pipeline: rolling statistics -> classification -> aggregated
 * record. A reading is classified against the window as it stood before the
 * reading was added, then folded into the window.
 *
 * Events emitted:
 * - 'anomaly': AnomalyEvent
 * - 'record': AggregatedRecord
 */

import { EventEmitter } from 'events';
import type { SensorReading } from '../ingest/types';
import type { RollingStatisticsEngine } from '../stats/engine';
import type { AnomalyClassifier } from '../anomaly/classifier';
import type { AnomalyEvent } from '../anomaly/types';
import type { AggregatedRecord } from '../relay/types';
import type { Logger } from '../logging/types';
import { LogComponents } from '../logging/types';

export interface ProcessedReading {
	event: AnomalyEvent;
	record: AggregatedRecord;
}

export interface SensorSummary {
	sensorId: string;
	windowMean: number;
	windowStdDev: number;
	sampleCount: number;
	anomalyCount: number;
	readingsProcessed: number;
	lastEvent: AnomalyEvent | null;
}

export class EdgeProcessor extends EventEmitter {
	private anomalyCounts = new Map<string, number>();
	private processedCounts = new Map<string, number>();
	private lastEvents = new Map<string, AnomalyEvent>();

	constructor(
		private readonly engine: RollingStatisticsEngine,
		private readonly classifier: AnomalyClassifier,
		private readonly logger: Logger
	) {
		super();
	}

	process(reading: SensorReading): ProcessedReading {
		const { sensorId } = reading;

		const prior = this.engine.peek(sensorId);
		const current = this.engine.update(sensorId, reading);
		const event = this.classifier.classify(sensorId, reading, prior.mean, prior.stdDev, prior.count);

		const anomalyCount = (this.anomalyCounts.get(sensorId) ?? 0)
			+ (event.classification === 'ANOMALY' ? 1 : 0);
		this.anomalyCounts.set(sensorId, anomalyCount);
		this.processedCounts.set(sensorId, (this.processedCounts.get(sensorId) ?? 0) + 1);
		this.lastEvents.set(sensorId, event);

		if (event.classification === 'ANOMALY') {
			this.logger.warn('Anomaly detected', {
				component: LogComponents.ANOMALY,
				sensorId,
				value: reading.value,
				unit: reading.unit,
				score: event.score,
				severity: event.severity,
				reason: event.reason,
				baseline: prior.mean,
			});
			this.emit('anomaly', event);
		}

		const record: AggregatedRecord = Object.freeze({
			sensorId,
			unit: reading.unit,
			windowMean: current.mean,
			windowStdDev: current.stdDev,
			classification: event.classification,
			score: event.score,
			anomalyCount,
			sampleCount: current.count,
			timestamp: reading.timestamp,
		});
		this.emit('record', record);

		return { event, record };
	}

	getSensorSummary(sensorId: string): SensorSummary | undefined {
		const processed = this.processedCounts.get(sensorId);
		if (processed === undefined) {
			return undefined;
		}
		const stats = this.engine.peek(sensorId);
		return {
			sensorId,
			windowMean: stats.mean,
			windowStdDev: stats.stdDev,
			sampleCount: stats.count,
			anomalyCount: this.anomalyCounts.get(sensorId) ?? 0,
			readingsProcessed: processed,
			lastEvent: this.lastEvents.get(sensorId) ?? null,
		};
	}

	getSensorSummaries(): SensorSummary[] {
		const summaries: SensorSummary[] = [];
		for (const sensorId of this.engine.sensorIds()) {
			const summary = this.getSensorSummary(sensorId);
			if (summary) summaries.push(summary);
		}
		return summaries;
	}

	totalAnomalies(): number {
		let total = 0;
		for (const count of this.anomalyCounts.values()) {
			total += count;
		}
		return total;
	}
}
