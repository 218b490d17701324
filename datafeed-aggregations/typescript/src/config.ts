/**
 * Configuration for the datafeed aggregation validator.
 * @module config
 */

import { z } from 'zod';
import { ConfigurationError } from './errors/categories.js';
import type { LogLevelName } from './observability/types.js';

/** Default: composites with several date sources use the first one. */
export const DEFAULT_STRICT_COMPOSITE_SOURCES = false;

/** Default: time windows are passed to the search backend unchecked. */
export const DEFAULT_VALIDATE_TIME_RANGE = false;

/** Default log level. */
export const DEFAULT_LOG_LEVEL: LogLevelName = 'info';

/**
 * Validator configuration.
 */
export interface ValidatorConfig {
  /** Reject composite aggregations declaring more than one date_histogram source. */
  strictCompositeSources: boolean;
  /** Reject time windows whose start is after their end. */
  validateTimeRange: boolean;
  /** Minimum level of log messages. */
  logLevel: LogLevelName;
  /** Emit log lines as JSON. */
  logJson: boolean;
}

/**
 * Zod schema for validator configuration.
 */
export const validatorConfigSchema = z
  .object({
    strictCompositeSources: z.boolean().default(DEFAULT_STRICT_COMPOSITE_SOURCES),
    validateTimeRange: z.boolean().default(DEFAULT_VALIDATE_TIME_RANGE),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default(DEFAULT_LOG_LEVEL),
    logJson: z.boolean().default(false),
  })
  .strict();

/**
 * Creates a default validator configuration.
 */
export function createDefaultConfig(): ValidatorConfig {
  return {
    strictCompositeSources: DEFAULT_STRICT_COMPOSITE_SOURCES,
    validateTimeRange: DEFAULT_VALIDATE_TIME_RANGE,
    logLevel: DEFAULT_LOG_LEVEL,
    logJson: false,
  };
}

/**
 * Validates a (partial) configuration and fills in defaults.
 * @param config - The configuration to validate.
 * @throws {ConfigurationError} If the configuration is invalid.
 */
export function validateConfig(config: unknown): ValidatorConfig {
  const result = validatorConfigSchema.safeParse(config);
  if (!result.success) {
    const [issue] = result.error.issues;
    throw new ConfigurationError(
      `Invalid validator configuration: ${issue?.message ?? 'unknown error'}`,
      {
        issues: result.error.issues.map((i) => ({
          path: i.path.join('.'),
          message: i.message,
        })),
      }
    );
  }
  return result.data;
}

/**
 * Loads validator configuration from environment variables.
 *
 * Supported environment variables:
 * - DATAFEED_STRICT_COMPOSITE_SOURCES: "true" or "false"
 * - DATAFEED_VALIDATE_TIME_RANGE: "true" or "false"
 * - DATAFEED_LOG_LEVEL: debug, info, warn or error
 * - DATAFEED_LOG_JSON: "true" or "false"
 *
 * @param env - Environment to read, defaults to `process.env`
 * @throws {ConfigurationError} If a variable holds an invalid value
 */
export function fromEnv(env: NodeJS.ProcessEnv = process.env): ValidatorConfig {
  return validateConfig({
    strictCompositeSources: getEnvBoolean(env, 'DATAFEED_STRICT_COMPOSITE_SOURCES'),
    validateTimeRange: getEnvBoolean(env, 'DATAFEED_VALIDATE_TIME_RANGE'),
    logLevel: getEnv(env, 'DATAFEED_LOG_LEVEL')?.toLowerCase(),
    logJson: getEnvBoolean(env, 'DATAFEED_LOG_JSON'),
  });
}

function getEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value === undefined || value === '' ? undefined : value;
}

function getEnvBoolean(env: NodeJS.ProcessEnv, key: string): boolean | undefined {
  const value = getEnv(env, key);
  if (value === undefined) {
    return undefined;
  }
  switch (value.toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw new ConfigurationError(`Invalid boolean for ${key}: ${value}`, { key, value });
  }
}

/**
 * Builder for ValidatorConfig.
 */
export class ValidatorConfigBuilder {
  private config: ValidatorConfig;

  constructor() {
    this.config = createDefaultConfig();
  }

  /**
   * Rejects composite aggregations with more than one date_histogram source.
   */
  strictCompositeSources(enabled = true): this {
    this.config.strictCompositeSources = enabled;
    return this;
  }

  /**
   * Rejects time windows whose start is after their end.
   */
  validateTimeRange(enabled = true): this {
    this.config.validateTimeRange = enabled;
    return this;
  }

  logLevel(level: LogLevelName): this {
    this.config.logLevel = level;
    return this;
  }

  logJson(enabled = true): this {
    this.config.logJson = enabled;
    return this;
  }

  /**
   * Builds and validates the configuration.
   * @throws {ConfigurationError} If the configuration is invalid.
   */
  build(): ValidatorConfig {
    return validateConfig({ ...this.config });
  }
}

/**
 * Namespace for ValidatorConfig-related utilities.
 */
export namespace ValidatorConfig {
  export function builder(): ValidatorConfigBuilder {
    return new ValidatorConfigBuilder();
  }

  export function defaultConfig(): ValidatorConfig {
    return createDefaultConfig();
  }

  export function validate(config: unknown): ValidatorConfig {
    return validateConfig(config);
  }
}
