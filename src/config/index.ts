/**
 * Configuration Module
 * ====================
 *
 * Gateway configuration schema and loading utilities
 */

export { GatewayConfigSchema } from './schema';
export type { GatewayConfig, GatewayConfigInput, OverflowPolicy } from './schema';
export { loadConfig, loadConfigFromEnv, parseConfig, readArgs, readEnv, ConfigValidationError } from './loader';
