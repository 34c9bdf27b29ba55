/**
 * Drone edge gateway public API
 */

export { DroneGateway } from './gateway';
export type { GatewayDependencies } from './gateway';
export type { GatewayStatus, GatewayCounters, SensorStatus } from './gateway-status';

export * from './config';
export * from './errors';
export { createLogger, errorContext } from './logging/logger';
export type { LoggerOptions, LogFormat } from './logging/logger';
export { LogComponents } from './logging/types';
export type { Logger, LogContext } from './logging/types';

export { ReadingChannelAdapter } from './ingest/reading-channel';
export { SensorDispatcher, SensorWorkQueue } from './ingest/sensor-work-queue';
export { LineFramer, decodeReading, encodeReading } from './ingest/frame-decoder';
export { SENSOR_UNITS } from './ingest/types';
export type { SensorReading, SensorUnit, IngestCounters } from './ingest/types';

export { RollingStatisticsEngine } from './stats/engine';
export type { WindowStats } from './stats/types';
export { AnomalyClassifier } from './anomaly/classifier';
export type { AnomalyEvent, Classification, AnomalySeverity } from './anomaly/types';

export { BatteryStateMachine, isUplinkPermitted } from './flight/battery-state-machine';
export type { DroneState, FlightMode, FlightController, FlightTransition } from './flight/types';

export { EdgeProcessor } from './processing/edge-processor';
export { OutboundQueue } from './relay/outbound-queue';
export { OutboundRelay } from './relay/outbound-relay';
export { TcpUplinkClient, encodeRecord } from './relay/uplink-client';
export type { AggregatedRecord, UplinkTransport, RelayStats } from './relay/types';

export { createStatusApp, StatusApiServer } from './api/server';
