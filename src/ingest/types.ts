import { z } from 'zod';

/**
 * Unit kinds carried by a reading; processed uniformly downstream
 */
export const SENSOR_UNITS = ['TEMPERATURE', 'HUMIDITY', 'PRESSURE', 'AIR_QUALITY'] as const;

export type SensorUnit = typeof SENSOR_UNITS[number];

/**
 * Wire frame sent by a sensor node (one JSON object per line)
 */
export const SensorFrameSchema = z.object({
  sensor_id: z.string().min(1).max(128),
  timestamp: z.union([
    z.number().finite().nonnegative(),
    z.string().refine(value => !Number.isNaN(Date.parse(value)), { message: 'Invalid timestamp' }),
  ]),
  value: z.number().finite(),
  unit: z.enum(SENSOR_UNITS),
});

export type SensorFrame = z.infer<typeof SensorFrameSchema>;

/**
 * Validated sensor reading. Frozen once created.
 */
export interface SensorReading {
  readonly sensorId: string;
  readonly timestamp: number;  // Unix timestamp (ms)
  readonly value: number;
  readonly unit: SensorUnit;
}

/**
 * Per-sensor ingest status exposed for observability
 */
export interface SensorStreamStatus {
  sensorId: string;
  remoteAddress: string | null;  // null once the stream is deregistered
  connected: boolean;
  lastSeen: number;              // Gateway wall clock (ms)
  lastReadingTimestamp: number;  // Sensor clock (ms)
  readingsReceived: number;
  parseErrors: number;
}

/**
 * Ingest counters
 */
export interface IngestCounters {
  connectionsAccepted: number;
  disconnects: number;
  connectionErrors: number;
  parseErrors: number;
  readingsAccepted: number;
  backpressurePauses: number;
}
