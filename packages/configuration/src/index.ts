import { promises as fs } from 'fs';

import { ConfigurationError } from '@rebound/errors';
import type { Logger } from '@rebound/logging';
import { load as yamlLoad } from 'js-yaml';
import { z } from 'zod';

import { ConfigUtils } from './utils.js';

/**
 * Options for configuration management
 */
export interface ConfigOptions {
  /** Logger instance for configuration operations */
  logger?: Logger;
  /** Whether to substitute `${VAR:-default}` references before validation */
  enableEnvSubstitution?: boolean;
  /** Default configuration to merge under the loaded config */
  defaults?: Record<string, unknown>;
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
      issues: formatIssues(errors),
    });
  }
}

/**
 * Render zod issues as `path: message` lines
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Generic YAML configuration loader validated by a zod schema
 */
export class ConfigManager<T> {
  private config: T | null = null;
  private readonly logger: Logger | undefined;
  private readonly options: Required<Omit<ConfigOptions, 'logger'>>;

  constructor(
    private readonly configPath: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: ConfigOptions = {}
  ) {
    this.logger = options.logger;
    this.options = {
      enableEnvSubstitution: options.enableEnvSubstitution ?? false,
      defaults: options.defaults ?? {},
    };
  }

  /**
   * Load configuration from file
   */
  async loadConfig(): Promise<T> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf8');
    } catch (error) {
      this.logger?.error(`Failed to read configuration: ${this.configPath}`, error);
      throw new ConfigurationError(`Configuration file not readable: ${this.configPath}`, {
        code: 'CONFIG_NOT_FOUND',
        ...(error instanceof Error && { cause: error }),
      });
    }

    let parsed: unknown;
    try {
      parsed = yamlLoad(content);
    } catch (error) {
      this.logger?.error(`Failed to parse configuration: ${this.configPath}`, error);
      throw new ConfigurationError(`Configuration file is not valid YAML: ${this.configPath}`, {
        code: 'CONFIG_PARSE_ERROR',
        ...(error instanceof Error && { cause: error }),
      });
    }

    try {
      this.config = this.validateAndTransform(parsed);
    } catch (error) {
      if (error instanceof ConfigValidationError) {
        this.logger?.error(`Configuration validation failed: ${this.configPath}`, undefined, {
          issues: error.getFormattedIssues(),
        });
      }
      throw error;
    }

    this.logger?.info(`Configuration loaded from: ${this.configPath}`);
    return this.config;
  }

  /**
   * Validate and transform a configuration object
   */
  validateAndTransform(config: unknown): T {
    let processed: unknown = config ?? {};

    if (this.options.enableEnvSubstitution) {
      try {
        processed = ConfigUtils.processEnvVars(processed);
      } catch (error) {
        throw new ConfigurationError(
          `Environment substitution failed for ${this.configPath}: ${error instanceof Error ? error.message : String(error)}`,
          { code: 'CONFIG_ENV_ERROR', ...(error instanceof Error && { cause: error }) }
        );
      }
    }

    if (Object.keys(this.options.defaults).length > 0 && ConfigUtils.isPlainObject(processed)) {
      processed = ConfigUtils.mergeConfigs(this.options.defaults, processed);
    }

    const result = this.schema.safeParse(processed);
    if (!result.success) {
      throw new ConfigValidationError(
        `Configuration validation failed for ${this.configPath}`,
        result.error
      );
    }

    return result.data;
  }

  /**
   * Get current configuration (must be loaded first)
   */
  getConfig(): T {
    if (this.config === null) {
      throw new ConfigurationError('Configuration not loaded. Call loadConfig() first.');
    }
    return this.config;
  }

  isLoaded(): boolean {
    return this.config !== null;
  }

  getConfigPath(): string {
    return this.configPath;
  }
}

/**
 * Utility function to create a configuration manager
 */
export function createConfigManager<T>(
  configPath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options?: ConfigOptions
): ConfigManager<T> {
  return new ConfigManager(configPath, schema, options);
}

// Re-export Zod for schema creation
export { z } from 'zod';

export { ConfigUtils, TIME, type TimeUnit } from './utils.js';
