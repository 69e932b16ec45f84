/**
 * Configuration schemas for the telemetry-guard configuration file
 */

import { LOG_FORMATS, LOG_LEVELS } from '@telemetry-guard/logging';
import { z } from 'zod';

import { ConfigUtils, TIME } from './utils.js';

/**
 * Logging configuration schema
 */
export const LoggingConfigSchema = z.object({
  /** Log level, overridden by TELEMETRY_GUARD_LOG_LEVEL */
  level: z.enum(LOG_LEVELS).default('INFO'),
  /** Log format */
  format: z.enum(LOG_FORMATS).default('text'),
});

const failureThreshold = z.number().int().positive();
const recoveryTimeout = ConfigUtils.durationTransformer();
const maxAttempts = z.number().int().min(1);
const delay = ConfigUtils.durationTransformer().refine(ms => ms > 0, {
  message: 'Delay must be positive',
});
const backoffMultiplier = z.number().min(1);

export const CircuitBreakerSettingsSchema = z.object({
  failure_threshold: failureThreshold.default(5),
  recovery_timeout: recoveryTimeout.default(60 * TIME.SECOND),
});

export const RetrySettingsSchema = z
  .object({
    max_attempts: maxAttempts.default(3),
    base_delay: delay.default(1 * TIME.SECOND),
    max_delay: delay.default(60 * TIME.SECOND),
    backoff_multiplier: backoffMultiplier.default(2),
    jitter: z.boolean().default(true),
  })
  .refine(retry => retry.max_delay >= retry.base_delay, {
    message: 'max_delay must be greater than or equal to base_delay',
    path: ['max_delay'],
  });

/**
 * Per-service overrides. Only the fields given replace the resilience defaults.
 */
export const ServiceOverrideSchema = z.object({
  circuit_breaker: z
    .object({
      failure_threshold: failureThreshold.optional(),
      recovery_timeout: recoveryTimeout.optional(),
    })
    .optional(),
  retry: z
    .object({
      max_attempts: maxAttempts.optional(),
      base_delay: delay.optional(),
      max_delay: delay.optional(),
      backoff_multiplier: backoffMultiplier.optional(),
      jitter: z.boolean().optional(),
    })
    .optional(),
});

/**
 * Overrides are checked against the defaults they are layered over, so a service can't end
 * up with a max_delay below its effective base_delay.
 */
export const ResilienceConfigSchema = z
  .object({
    circuit_breaker: CircuitBreakerSettingsSchema.default({}),
    retry: RetrySettingsSchema.default({}),
    /** End the retry loop on the first breaker rejection */
    fail_fast_on_open: z.boolean().default(false),
    services: z.record(z.string().min(1), ServiceOverrideSchema).default({}),
  })
  .superRefine((resilience, ctx) => {
    for (const [name, override] of Object.entries(resilience.services)) {
      const baseDelay = override.retry?.base_delay ?? resilience.retry.base_delay;
      const maxDelay = override.retry?.max_delay ?? resilience.retry.max_delay;
      if (maxDelay < baseDelay) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message:
            `max_delay (${maxDelay}ms) must be greater than or equal to ` +
            `base_delay (${baseDelay}ms)`,
          path: ['services', name, 'retry', 'max_delay'],
        });
      }
    }
  });

const backendSchema = (endpoint: string) =>
  z.object({
    endpoint: z.string().url().default(endpoint),
    timeout: ConfigUtils.durationTransformer().default(5 * TIME.SECOND),
    /** Probed through `<name>_fallback` when the primary endpoint fails */
    fallback_endpoint: z.string().url().optional(),
    enabled: z.boolean().default(true),
  });

export const BACKEND_NAMES = ['elastic', 'loki', 'influxdb', 'grafana'] as const;
export type BackendName = (typeof BACKEND_NAMES)[number];

export const BackendsConfigSchema = z.object({
  elastic: backendSchema('http://localhost:8200').default({}),
  loki: backendSchema('http://localhost:3100').default({}),
  influxdb: backendSchema('http://localhost:8086').default({}),
  grafana: backendSchema('http://localhost:3000').default({}),
});

export const MonitorConfigSchema = z.object({
  schedule: ConfigUtils.cronValidator().default('*/5 * * * *'),
});

export const TelemetryGuardConfigSchema = z.object({
  logging: LoggingConfigSchema.default({}),
  resilience: ResilienceConfigSchema.default({}),
  backends: BackendsConfigSchema.default({}),
  monitor: MonitorConfigSchema.default({}),
});

export type LoggingConfig = z.output<typeof LoggingConfigSchema>;
export type ResilienceConfig = z.output<typeof ResilienceConfigSchema>;
export type ServiceOverrideConfig = z.output<typeof ServiceOverrideSchema>;
export type BackendConfig = z.output<ReturnType<typeof backendSchema>>;
export type BackendsConfig = z.output<typeof BackendsConfigSchema>;
export type MonitorConfig = z.output<typeof MonitorConfigSchema>;
export type TelemetryGuardConfig = z.output<typeof TelemetryGuardConfigSchema>;
