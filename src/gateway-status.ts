/**
 * Observability snapshot types
 */

import type { DroneState } from './flight/types';
import type { IngestCounters } from './ingest/types';
import type { RelayStats } from './relay/types';
import type { AnomalyEvent } from './anomaly/types';

export interface SensorStatus {
	sensorId: string;
	connected: boolean;
	remoteAddress: string | null;
	lastSeen: number | null;              // Gateway wall clock (ms)
	lastReadingTimestamp: number | null;  // Sensor clock (ms)
	readingsReceived: number;
	readingsProcessed: number;
	parseErrors: number;
	queuedReadings: number;
	windowMean: number;
	windowStdDev: number;
	sampleCount: number;
	anomalyCount: number;
	lastEvent: AnomalyEvent | null;
}

export interface GatewayCounters extends IngestCounters {
	processingFailures: number;
	anomalies: number;
}

export interface GatewayStatus {
	running: boolean;
	startedAt: number | null;
	drone: DroneState;
	uplinkPermitted: boolean;
	relay: RelayStats;
	activeConnections: number;
	sensors: SensorStatus[];
	counters: GatewayCounters;
}
