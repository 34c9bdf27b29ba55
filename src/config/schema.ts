import { z } from 'zod';

/**
 * Gateway Configuration Schema
 *
 * Every field has a default so an empty object yields a runnable gateway.
 */
export const GatewayConfigSchema = z.object({
  // Rolling statistics
  windowSize: z.number().int().min(1).default(10),

  // Anomaly classification
  zScoreThreshold: z.number().positive().default(3.0),
  minStdDev: z.number().nonnegative().default(0.05),
  absoluteDeviationThreshold: z.number().nonnegative().default(5.0),
  minSamples: z.number().int().min(1).default(2),

  // Outbound queue
  queueCapacity: z.number().int().min(1).default(500),
  overflowPolicy: z.enum(['drop-oldest', 'reject-new']).default('drop-oldest'),

  // Battery & flight
  lowThreshold: z.number().min(0).max(100).default(15),
  highThreshold: z.number().min(0).max(100).default(100),
  activeDrainRate: z.number().positive().default(1),
  returnDrainRate: z.number().positive().default(1),
  chargeRate: z.number().positive().default(5),
  returnTicks: z.number().int().min(1).default(5),
  tickIntervalMs: z.number().int().positive().default(1000),

  // Sensor ingest
  listenHost: z.string().min(1).default('0.0.0.0'),
  listenPort: z.number().int().min(0).max(65535).default(9000),
  ingestQueueCapacity: z.number().int().min(1).default(100),
  maxFrameBytes: z.number().int().min(64).default(64 * 1024),

  // Uplink to central server
  serverHost: z.string().min(1).default('127.0.0.1'),
  serverPort: z.number().int().min(1).max(65535).default(9100),
  uplinkConnectTimeoutMs: z.number().int().positive().default(2000),

  // Lifecycle & observability
  shutdownGraceMs: z.number().int().nonnegative().default(5000),
  statusApiPort: z.number().int().min(0).max(65535).default(0),
  logLevel: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  logFormat: z.enum(['json', 'pretty']).default('json'),
}).refine(cfg => cfg.lowThreshold < cfg.highThreshold, {
  message: 'lowThreshold must be below highThreshold',
  path: ['lowThreshold'],
});

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;
export type GatewayConfigInput = z.input<typeof GatewayConfigSchema>;
export type OverflowPolicy = GatewayConfig['overflowPolicy'];
