import { promises as fs } from 'fs';

import { ConfigurationError } from '@telemetry-guard/errors';
import type { Logger } from '@telemetry-guard/logging';
import { load as yamlLoad } from 'js-yaml';
import type { z } from 'zod';

import { ConfigUtils } from './utils.js';

/**
 * Options for configuration management
 */
export interface ConfigOptions {
  /** Logger instance for configuration operations */
  logger?: Logger | undefined;
  /** Validate an empty document instead of failing when the file does not exist */
  allowMissing?: boolean | undefined;
  /** Whether to substitute `${VAR}` placeholders before validation */
  enableEnvSubstitution?: boolean | undefined;
  /** Environment used for substitution */
  env?: NodeJS.ProcessEnv | undefined;
}

/**
 * Configuration validation error with detailed information
 */
export class ConfigValidationError extends ConfigurationError {
  constructor(
    message: string,
    public readonly errors: z.ZodError
  ) {
    super(message, {
      code: 'CONFIG_VALIDATION_ERROR',
      data: { issues: errors.issues.length },
    });
  }

  /**
   * Get formatted error details, one `path: message` line per issue
   */
  getFormattedErrors(): string[] {
    return this.errors.issues.map(issue => {
      const path = issue.path.join('.');
      return `${path}: ${issue.message}`;
    });
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Loads a YAML configuration file and validates it against a zod schema
 */
export class ConfigManager<T> {
  private readonly logger: Logger | undefined;

  constructor(
    private readonly configPath: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    private readonly options: ConfigOptions = {}
  ) {
    this.logger = options.logger;
  }

  /**
   * Load configuration from file
   */
  async loadConfig(): Promise<T> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf8');
    } catch (error) {
      if (isMissingFile(error) && this.options.allowMissing) {
        this.logger?.info(`Configuration file not found, using defaults: ${this.configPath}`);
        return this.validateConfig({});
      }
      const cause = error instanceof Error ? error : undefined;
      throw new ConfigurationError(`Unable to read configuration file: ${this.configPath}`, {
        ...(cause && { cause }),
        context: { operation: 'load_config', metadata: { path: this.configPath } },
      });
    }

    try {
      const config = this.validateConfig(this.parse(content));
      this.logger?.info(`Configuration loaded from: ${this.configPath}`);
      return config;
    } catch (error) {
      if (error instanceof ConfigValidationError) {
        this.logger?.error(`Configuration validation failed: ${error.message}`, error, {
          issues: error.getFormattedErrors(),
        });
      } else {
        this.logger?.error(`Failed to load configuration from ${this.configPath}`, error);
      }
      throw error;
    }
  }

  /**
   * Validate configuration without loading from file
   */
  validateConfig(config: unknown): T {
    const result = this.schema.safeParse(config ?? {});

    if (!result.success) {
      throw new ConfigValidationError(
        `Configuration validation failed for ${this.configPath}`,
        result.error
      );
    }

    return result.data;
  }

  private parse(content: string): unknown {
    let document: unknown;
    try {
      document = yamlLoad(content);
    } catch (error) {
      throw new ConfigurationError(`Invalid YAML in ${this.configPath}`, {
        ...(error instanceof Error && { cause: error }),
      });
    }

    return this.options.enableEnvSubstitution
      ? ConfigUtils.processEnvVars(document, this.options.env)
      : document;
  }
}
