/**
 * CONFIGURATION LOADING
 * =====================
 *
 * Environment variables (DRONE_*) first, then CLI flags on top.
 * The merged result is validated once by GatewayConfigSchema.
 */

import { ZodError } from 'zod';
import { GatewayConfigSchema } from './schema';
import type { GatewayConfig, GatewayConfigInput } from './schema';

type ConfigKey = keyof GatewayConfigInput;
type ValueKind = 'int' | 'float' | 'string';

/**
 * Config key -> environment variable, CLI flag and value kind
 */
const FIELDS: Record<ConfigKey, { env: string; flag: string; kind: ValueKind }> = {
  windowSize: { env: 'DRONE_WINDOW_SIZE', flag: 'window-size', kind: 'int' },
  zScoreThreshold: { env: 'DRONE_ZSCORE_THRESHOLD', flag: 'zscore-threshold', kind: 'float' },
  minStdDev: { env: 'DRONE_MIN_STDDEV', flag: 'min-stddev', kind: 'float' },
  absoluteDeviationThreshold: { env: 'DRONE_ABS_DEVIATION_THRESHOLD', flag: 'abs-deviation-threshold', kind: 'float' },
  minSamples: { env: 'DRONE_MIN_SAMPLES', flag: 'min-samples', kind: 'int' },
  queueCapacity: { env: 'DRONE_QUEUE_CAPACITY', flag: 'queue-capacity', kind: 'int' },
  overflowPolicy: { env: 'DRONE_OVERFLOW_POLICY', flag: 'overflow-policy', kind: 'string' },
  lowThreshold: { env: 'DRONE_BATTERY_LOW', flag: 'battery-low', kind: 'float' },
  highThreshold: { env: 'DRONE_BATTERY_HIGH', flag: 'battery-high', kind: 'float' },
  activeDrainRate: { env: 'DRONE_ACTIVE_DRAIN_RATE', flag: 'active-drain-rate', kind: 'float' },
  returnDrainRate: { env: 'DRONE_RETURN_DRAIN_RATE', flag: 'return-drain-rate', kind: 'float' },
  chargeRate: { env: 'DRONE_CHARGE_RATE', flag: 'charge-rate', kind: 'float' },
  returnTicks: { env: 'DRONE_RETURN_TICKS', flag: 'return-ticks', kind: 'int' },
  tickIntervalMs: { env: 'DRONE_TICK_INTERVAL_MS', flag: 'tick-interval-ms', kind: 'int' },
  listenHost: { env: 'DRONE_LISTEN_HOST', flag: 'listen-host', kind: 'string' },
  listenPort: { env: 'DRONE_LISTEN_PORT', flag: 'listen-port', kind: 'int' },
  ingestQueueCapacity: { env: 'DRONE_INGEST_QUEUE_CAPACITY', flag: 'ingest-queue-capacity', kind: 'int' },
  maxFrameBytes: { env: 'DRONE_MAX_FRAME_BYTES', flag: 'max-frame-bytes', kind: 'int' },
  serverHost: { env: 'DRONE_SERVER_HOST', flag: 'server-host', kind: 'string' },
  serverPort: { env: 'DRONE_SERVER_PORT', flag: 'server-port', kind: 'int' },
  uplinkConnectTimeoutMs: { env: 'DRONE_UPLINK_TIMEOUT_MS', flag: 'uplink-timeout-ms', kind: 'int' },
  shutdownGraceMs: { env: 'DRONE_SHUTDOWN_GRACE_MS', flag: 'shutdown-grace-ms', kind: 'int' },
  statusApiPort: { env: 'DRONE_STATUS_API_PORT', flag: 'status-api-port', kind: 'int' },
  logLevel: { env: 'LOG_LEVEL', flag: 'log-level', kind: 'string' },
  logFormat: { env: 'LOG_FORMAT', flag: 'log-format', kind: 'string' },
};

export class ConfigValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid gateway configuration: ${issues.join('; ')}`);
    this.name = 'ConfigValidationError';
  }
}

function convert(raw: string, kind: ValueKind): string | number {
  if (kind === 'string') return raw;
  // Unparseable numbers become NaN and are reported by the schema
  return kind === 'int' ? parseInt(raw, 10) : parseFloat(raw);
}

/**
 * Read raw overrides from environment variables
 */
export function readEnv(env: NodeJS.ProcessEnv = process.env): Record<string, string | number> {
  const result: Record<string, string | number> = {};
  for (const [key, field] of Object.entries(FIELDS)) {
    const raw = env[field.env];
    if (raw !== undefined && raw !== '') {
      result[key] = convert(raw, field.kind);
    }
  }
  return result;
}

/**
 * Read raw overrides from CLI flags (`--listen-port 9000` or `--listen-port=9000`)
 */
export function readArgs(argv: string[]): Record<string, string | number> {
  const byFlag = new Map(Object.entries(FIELDS).map(([key, field]) => [field.flag, { key, kind: field.kind }]));
  const result: Record<string, string | number> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) continue;

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    const entry = byFlag.get(name);
    if (!entry) {
      throw new ConfigValidationError([`Unknown option: --${name}`]);
    }

    let raw: string | undefined;
    if (eq !== -1) {
      raw = arg.slice(eq + 1);
    } else {
      raw = argv[i + 1];
      i++;
    }
    if (raw === undefined) {
      throw new ConfigValidationError([`Missing value for --${name}`]);
    }
    result[entry.key] = convert(raw, entry.kind);
  }

  return result;
}

/**
 * Validate a raw configuration object
 */
export function parseConfig(raw: unknown): GatewayConfig {
  try {
    return GatewayConfigSchema.parse(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigValidationError(
        error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      );
    }
    throw error;
  }
}

/**
 * Load configuration from environment variables and CLI flags
 */
export function loadConfig(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): GatewayConfig {
  return parseConfig({ ...readEnv(env), ...readArgs(argv) });
}

/**
 * Load configuration from environment variables only
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  return parseConfig(readEnv(env));
}
