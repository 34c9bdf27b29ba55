/**
 * OUTBOUND RELAY - TYPE DEFINITIONS
 */

import type { Classification } from '../anomaly/types';
import type { SensorUnit } from '../ingest/types';
import type { QueueOverflowError, UplinkError } from '../errors';

/**
 * Outbound unit sent to the central server. Frozen once created.
 */
export interface AggregatedRecord {
	readonly sensorId: string;
	readonly unit: SensorUnit;
	readonly windowMean: number;
	readonly windowStdDev: number;
	readonly classification: Classification;   // Of the latest reading
	readonly score: number;
	readonly anomalyCount: number;             // Anomalies seen for this sensor so far
	readonly sampleCount: number;              // Readings in the window
	readonly timestamp: number;                // Latest reading timestamp (ms)
}

export type EnqueueResult<T> =
	| { accepted: true; evicted?: T }
	| { accepted: false; error: QueueOverflowError | UplinkError };

/**
 * Connection to the central server
 */
export interface UplinkTransport {
	send(record: AggregatedRecord): Promise<void>;
	close(): Promise<void>;
	isConnected(): boolean;
}

export type DrainStopReason = 'empty' | 'uplink-forbidden' | 'uplink-error' | 'stopped';

export interface DrainResult {
	sent: number;
	remaining: number;
	stoppedBy: DrainStopReason;
}

export interface RelayStats {
	queueLength: number;
	capacity: number;
	overflowPolicy: 'drop-oldest' | 'reject-new';
	enqueued: number;
	sent: number;
	droppedOldest: number;
	rejectedNew: number;
	recordsLost: number;
	uplinkFailures: number;
	lostOnShutdown: number;
	lastSentAt: number | null;
	lastUplinkError: string | null;
}
