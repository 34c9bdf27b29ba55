/**
 * Logging Component Names
 *
 * Standardized component names for structured logging.
 *
 * Usage:
 *   logger.info('Uplink restored', { component: LogComponents.RELAY });
 */

export const LogComponents = {
  GATEWAY: 'Gateway',
  INGEST: 'Ingest',
  STATS: 'Stats',
  ANOMALY: 'Anomaly',
  FLIGHT: 'Flight',
  RELAY: 'Relay',
  UPLINK: 'Uplink',
  STATUS_API: 'StatusAPI',
  CONFIG: 'Config',
  SIMULATION: 'Simulation',
} as const;

export type LogComponent = typeof LogComponents[keyof typeof LogComponents];

export type LogContext = Record<string, unknown>;

/**
 * Logger interface
 *
 * Satisfied by a winston logger; tests pass a jest.fn() based mock.
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}
