/**
 * @telemetry-guard/configuration - YAML configuration with zod validation
 */

import type { Logger } from '@telemetry-guard/logging';

import { ConfigManager } from './manager.js';
import { TelemetryGuardConfigSchema, type TelemetryGuardConfig } from './schemas.js';

export { ConfigManager, ConfigValidationError, type ConfigOptions } from './manager.js';
export { ConfigUtils, TIME, isTimeUnit, type TimeUnit } from './utils.js';
export { toRegistryOptions } from './resilience.js';
export * from './schemas.js';

/**
 * Default location of the configuration file, relative to the working directory
 */
export const DEFAULT_CONFIG_PATH = 'telemetry-guard.yaml';

/**
 * Load the telemetry-guard configuration file. A missing file yields the defaults.
 */
export function loadTelemetryGuardConfig(
  configPath: string = DEFAULT_CONFIG_PATH,
  options: { logger?: Logger | undefined; env?: NodeJS.ProcessEnv | undefined } = {}
): Promise<TelemetryGuardConfig> {
  const manager = new ConfigManager(configPath, TelemetryGuardConfigSchema, {
    ...options,
    allowMissing: true,
    enableEnvSubstitution: true,
  });
  return manager.loadConfig();
}
