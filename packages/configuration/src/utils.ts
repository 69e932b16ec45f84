/**
 * Configuration utilities for parsing and transformation
 */

import { toError } from '@telemetry-guard/errors';
import { MAX_TIMER_DELAY_MS } from '@telemetry-guard/resilience';
import cron from 'node-cron';
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

const DURATION_PATTERN = /^(?:\d+(?:\.\d+)?\s*[a-z]+\s*)+$/;
const DURATION_PART = /(\d+(?:\.\d+)?)\s*([a-z]+)/g;

export const isTimeUnit = (value: string): value is TimeUnit =>
  Object.keys(TIME_UNITS).includes(value);

/**
 * Configuration parsing and transformation utilities
 */
export class ConfigUtils {
  /**
   * Parse duration string to milliseconds
   * @param duration Duration like "500ms", "30s", "1m30s", or a plain number of milliseconds
   */
  static parseDuration(duration: string | number): number {
    if (typeof duration === 'number') {
      if (!Number.isFinite(duration) || duration < 0) {
        throw new Error(`Invalid duration value: ${duration}`);
      }
      return duration;
    }

    const durationStr = duration.trim().toLowerCase();

    // Bare digits are milliseconds
    if (/^\d+$/.test(durationStr)) {
      return parseInt(durationStr, 10);
    }

    if (!DURATION_PATTERN.test(durationStr)) {
      throw new Error(
        `Invalid duration format: ${duration}. Expected format like "500ms", "30s", "1m30s"`
      );
    }

    let totalMs = 0;
    for (const [, valueStr = '', unit = ''] of durationStr.matchAll(DURATION_PART)) {
      if (!isTimeUnit(unit)) {
        const validUnits = Object.keys(TIME_UNITS).join(', ');
        throw new Error(`Invalid duration unit: ${unit}. Valid units: ${validUnits}`);
      }
      totalMs += parseFloat(valueStr) * TIME_UNITS[unit];
    }

    return Math.floor(totalMs);
  }

  /**
   * Substitute `${VAR}` and `${VAR:-default}` placeholders in every string of a parsed document
   */
  static processEnvVars(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
    if (typeof value === 'string') {
      return ConfigUtils.substituteEnvVars(value, env);
    }

    if (Array.isArray(value)) {
      return value.map(item => ConfigUtils.processEnvVars(item, env));
    }

    if (value && typeof value === 'object') {
      return Object.fromEntries(
        Object.entries(value).map(([key, item]) => [key, ConfigUtils.processEnvVars(item, env)])
      );
    }

    return value;
  }

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

      throw new Error(`Required environment variable not set: ${varName.trim()}`);
    });
  }

  /**
   * Zod transformer that accepts a duration string or milliseconds. Every duration ends up
   * in a timer, so anything past the longest timer delay is rejected.
   */
  static durationTransformer() {
    return z.union([z.string(), z.number()]).transform((value, ctx) => {
      let ms: number;
      try {
        ms = ConfigUtils.parseDuration(value);
      } catch (error) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: toError(error).message });
        return z.NEVER;
      }

      if (ms > MAX_TIMER_DELAY_MS) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duration must not exceed ${MAX_TIMER_DELAY_MS}ms`,
        });
        return z.NEVER;
      }
      return ms;
    });
  }

  /**
   * Zod validator for cron expressions, checked by node-cron itself
   */
  static cronValidator() {
    return z.string().refine(expression => cron.validate(expression), {
      message: 'Invalid cron expression',
    });
  }
}
