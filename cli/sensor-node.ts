#!/usr/bin/env node
/**
 * Sensor node simulator
 *
 * Starts --count sensors named <sensor-id>1..N, each streaming readings to
 * the gateway on its own connection.
 */

import { parseArgs } from 'util';
import { z } from 'zod';
import { SENSOR_UNITS } from '../src/ingest/types';
import { createLogger, errorContext } from '../src/logging/logger';
import { LogComponents } from '../src/logging/types';
import { SensorNode, SIMULATION_PATTERNS, buildSensorFleet } from '../src/simulation';

const USAGE = `Usage: sensor-node --sensor-id <base> [--count 1] [--drone-host 127.0.0.1] [--drone-port 9000]
                   [--interval-ms 2000] [--reconnect-ms 2000] [--pattern realistic|spike|drift|cyclic|noisy]
                   [--unit TEMPERATURE|HUMIDITY|PRESSURE|AIR_QUALITY] [--log-level info] [--log-format json|pretty]`;

const SensorCliSchema = z.object({
  sensorId: z.string().min(1),
  count: z.coerce.number().int().min(1).default(1),
  droneHost: z.string().default('127.0.0.1'),
  dronePort: z.coerce.number().int().min(1).max(65535).default(9000),
  intervalMs: z.coerce.number().int().positive().default(2000),
  reconnectMs: z.coerce.number().int().positive().default(2000),
  pattern: z.enum(['realistic', 'spike', 'drift', 'cyclic', 'noisy']).default('realistic'),
  unit: z.enum(SENSOR_UNITS).optional(),
  logLevel: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  logFormat: z.enum(['json', 'pretty']).default('pretty'),
});

async function main(): Promise<number> {
  const { values } = parseArgs({
    args: process.argv.slice(2),
    options: {
      'sensor-id': { type: 'string' },
      count: { type: 'string' },
      'drone-host': { type: 'string' },
      'drone-port': { type: 'string' },
      'interval-ms': { type: 'string' },
      'reconnect-ms': { type: 'string' },
      pattern: { type: 'string' },
      unit: { type: 'string' },
      'log-level': { type: 'string' },
      'log-format': { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const parsed = SensorCliSchema.safeParse({
    sensorId: values['sensor-id'],
    count: values.count,
    droneHost: values['drone-host'],
    dronePort: values['drone-port'],
    intervalMs: values['interval-ms'],
    reconnectMs: values['reconnect-ms'],
    pattern: values.pattern,
    unit: values.unit,
    logLevel: values['log-level'],
    logFormat: values['log-format'],
  });
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      console.error(`${issue.path.join('.')}: ${issue.message}`);
    }
    console.error(`Patterns: ${SIMULATION_PATTERNS.join(', ')}`);
    console.error(USAGE);
    return 1;
  }
  const options = parsed.data;

  const logger = createLogger({
    level: options.logLevel,
    format: options.logFormat,
    service: 'sensor-node',
  });

  const nodes = buildSensorFleet({
    baseId: options.sensorId,
    count: options.count,
    host: options.droneHost,
    port: options.dronePort,
    intervalMs: options.intervalMs,
    reconnectDelayMs: options.reconnectMs,
    pattern: options.pattern,
    units: options.unit ? [options.unit] : undefined,
  }).map(config => new SensorNode(config, logger));

  for (const node of nodes) {
    node.start();
  }

  await new Promise<void>(resolve => {
    process.once('SIGINT', () => resolve());
    process.once('SIGTERM', () => resolve());
  });

  logger.info('Shutting down all sensors', { component: LogComponents.SIMULATION });
  try {
    await Promise.all(nodes.map(node => node.stop()));
  } catch (error) {
    logger.error('Failed to stop sensors', { component: LogComponents.SIMULATION, ...errorContext(error) });
    return 1;
  }
  return 0;
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    console.error('Sensor node failed:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
