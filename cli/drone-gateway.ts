#!/usr/bin/env node
/**
 * Drone gateway entry point
 *
 * Configuration comes from DRONE_* environment variables, overridden by
 * flags of the same name (`--listen-port 9000`). Exit code 1 on invalid
 * configuration or a fatal flight-state failure.
 */

import { DroneGateway } from '../src/gateway';
import { ConfigValidationError, loadConfig } from '../src/config';
import { createLogger, errorContext } from '../src/logging/logger';
import { LogComponents } from '../src/logging/types';
import type { Logger } from '../src/logging/types';

const USAGE = `Usage: drone-gateway [--listen-port 9000] [--server-host 127.0.0.1] [--server-port 9100]
                     [--window-size 10] [--queue-capacity 500] [--overflow-policy drop-oldest|reject-new]
                     [--battery-low 15] [--battery-high 100] [--tick-interval-ms 1000]
                     [--status-api-port 0] [--log-level info] [--log-format json|pretty]

Every flag can also be set through its DRONE_* environment variable.`;

async function main(): Promise<number> {
  const argv = process.argv.slice(2);
  if (argv.includes('--help') || argv.includes('-h')) {
    console.log(USAGE);
    return 0;
  }

  let gateway: DroneGateway;
  let logger: Logger;
  try {
    const config = loadConfig(argv, process.env);
    logger = createLogger({ level: config.logLevel, format: config.logFormat });
    gateway = new DroneGateway(config, { logger });
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      console.error(error.message);
      console.error(USAGE);
      return 1;
    }
    throw error;
  }

  const finished = new Promise<number>(resolve => {
    gateway.once('stopped', () => resolve(gateway.getFatalError() ? 1 : 0));
  });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`, { component: LogComponents.GATEWAY });
    gateway.stop().catch(error => {
      logger.error('Shutdown failed', { component: LogComponents.GATEWAY, ...errorContext(error) });
      process.exit(1);
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  await gateway.start();
  return finished;
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    console.error('Drone gateway failed to start:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
