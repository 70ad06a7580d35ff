/**
 * Configuration parsing and transformation utilities
 */

import { z } from 'zod';

/**
 * Time units and their millisecond multipliers
 */
const TIME_UNITS = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
} as const;

export type TimeUnit = keyof typeof TIME_UNITS;

const isTimeUnit = (value: string): value is TimeUnit => Object.hasOwn(TIME_UNITS, value);

/**
 * Readable time constants for use in configuration defaults
 */
export const TIME = {
  MILLISECOND: TIME_UNITS.ms,
  SECOND: TIME_UNITS.s,
  MINUTE: TIME_UNITS.m,
  HOUR: TIME_UNITS.h,
  DAY: TIME_UNITS.d,
} as const;

/**
 * Configuration parsing and transformation utilities
 */
export class ConfigUtils {
  /**
   * Parse duration string to milliseconds
   * @param duration Duration like "500ms", "2s", "1m30s", or a plain number of milliseconds
   */
  static parseDuration(duration: string | number): number {
    if (typeof duration === 'number') {
      return duration;
    }

    const durationStr = duration.trim().toLowerCase();

    // Plain numbers are milliseconds
    if (/^\d+(?:\.\d+)?$/.test(durationStr)) {
      return parseFloat(durationStr);
    }

    if (!/^(?:\d+(?:\.\d+)?\s*[a-z]+\s*)+$/.test(durationStr)) {
      throw new Error(
        `Invalid duration format: ${duration}. Expected format like "500ms", "30s", "1m30s"`
      );
    }

    let totalMs = 0;
    for (const [, valueStr = '', unit = ''] of durationStr.matchAll(/(\d+(?:\.\d+)?)\s*([a-z]+)/g)) {
      if (!isTimeUnit(unit)) {
        const validUnits = Object.keys(TIME_UNITS).join(', ');
        throw new Error(`Invalid duration unit: ${unit}. Valid units: ${validUnits}`);
      }
      totalMs += parseFloat(valueStr) * TIME_UNITS[unit];
    }

    return totalMs;
  }

  /**
   * Format milliseconds to a compact duration such as "1m 30s" or "250ms"
   */
  static formatDuration(ms: number): string {
    if (!Number.isFinite(ms)) return 'forever';
    if (ms < TIME.SECOND) return `${Math.round(ms)}ms`;

    const units: [TimeUnit, number][] = [
      ['d', TIME_UNITS.d],
      ['h', TIME_UNITS.h],
      ['m', TIME_UNITS.m],
      ['s', TIME_UNITS.s],
    ];

    const parts: string[] = [];
    let remaining = ms;

    for (const [unit, value] of units) {
      if (remaining >= value) {
        const count = Math.floor(remaining / value);
        parts.push(`${count}${unit}`);
        remaining -= count * value;
      }
    }

    if (remaining >= 1) {
      parts.push(`${Math.round(remaining)}ms`);
    }

    return parts.join(' ');
  }

  /**
   * Process environment variable substitution in configuration
   */
  static processEnvVars(value: unknown): unknown {
    if (typeof value === 'string') {
      return ConfigUtils.substituteEnvVars(value);
    }

    if (Array.isArray(value)) {
      return value.map(item => ConfigUtils.processEnvVars(item));
    }

    if (ConfigUtils.isPlainObject(value)) {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = ConfigUtils.processEnvVars(entry);
      }
      return result;
    }

    return value;
  }

  /**
   * Substitute `${VAR}` and `${VAR:-default}` placeholders
   */
  static substituteEnvVars(str: string, env: NodeJS.ProcessEnv = process.env): string {
    return str.replace(/\$\{([^}]+)\}/g, (_match, varExpr: string) => {
      const [varName = '', defaultValue] = varExpr.split(':-');
      const envValue = env[varName.trim()];

      if (envValue !== undefined) {
        return envValue;
      }

      if (defaultValue !== undefined) {
        return defaultValue.trim();
      }

      throw new Error(`Required environment variable not set: ${varName}`);
    });
  }

  /**
   * Merge configuration objects with deep merging of nested plain objects
   */
  static mergeConfigs(
    target: Record<string, unknown>,
    ...sources: Record<string, unknown>[]
  ): Record<string, unknown> {
    const result: Record<string, unknown> = { ...target };

    for (const source of sources) {
      for (const [key, value] of Object.entries(source)) {
        if (value === undefined) {
          continue;
        }

        const existing = result[key];
        if (ConfigUtils.isPlainObject(value) && ConfigUtils.isPlainObject(existing)) {
          result[key] = ConfigUtils.mergeConfigs(existing, value);
        } else {
          // Direct assignment for primitives, arrays, and null values
          result[key] = value;
        }
      }
    }

    return result;
  }

  static isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  }

  /**
   * Create a Zod transformer for duration values
   * @returns Zod schema that parses duration strings to milliseconds
   */
  static durationTransformer() {
    return z.union([z.string(), z.number()]).transform((value, ctx) => {
      try {
        return ConfigUtils.parseDuration(value);
      } catch (error) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: error instanceof Error ? error.message : String(error),
        });
        return z.NEVER;
      }
    });
  }
}
