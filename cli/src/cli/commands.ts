import type { TelemetryGuardConfig } from '@telemetry-guard/configuration';
import { ConfigurationError } from '@telemetry-guard/errors';
import { BackendStatus, ExporterHealthChecker } from '@telemetry-guard/health';
import type { Logger } from '@telemetry-guard/logging';
import type { ResilienceRegistry } from '@telemetry-guard/resilience';
import type { AxiosInstance } from 'axios';
import chalk, { type ChalkInstance } from 'chalk';
import cron from 'node-cron';

import { formatHealthReport, formatStatusTable } from './format.js';

/**
 * Starts `task` on a cron expression and returns a handle to stop it
 */
export type Scheduler = (expression: string, task: () => void) => { stop(): void };

export const cronScheduler: Scheduler = (expression, task) => cron.schedule(expression, task);

export interface CommandContext {
  config: TelemetryGuardConfig;
  /** One registry per process; breaker state lives as long as the process */
  registry: ResilienceRegistry;
  logger: Logger;
  write: (line: string) => void;
  http?: AxiosInstance | undefined;
  paint?: ChalkInstance | undefined;
}

export interface MonitorOptions {
  schedule?: string | undefined;
  /** Stops the monitor; in-flight checks are cancelled through it too */
  signal: AbortSignal;
  scheduler?: Scheduler | undefined;
}

export class CLICommands {
  private readonly checker: ExporterHealthChecker;
  private readonly paint: ChalkInstance;

  constructor(private readonly context: CommandContext) {
    this.paint = context.paint ?? chalk;
    this.checker = new ExporterHealthChecker({
      backends: context.config.backends,
      registry: context.registry,
      http: context.http,
      logger: context.logger.child('health'),
    });
  }

  /**
   * Probe every backend once. Returns the process exit code: 1 when any backend is not healthy.
   */
  async check(options: { signal?: AbortSignal | undefined } = {}): Promise<number> {
    this.print(this.paint.bold('🏥 Checking all backend services...'), '');

    const report = await this.checker.checkAll(options.signal ? { signal: options.signal } : {});

    this.print(...formatHealthReport(report, this.paint), '');
    this.print(...formatStatusTable(this.context.registry.getAllStatuses(), this.paint));

    const allHealthy = Object.values(report.results).every(
      result => result?.status === BackendStatus.HEALTHY
    );
    return allHealthy ? 0 : 1;
  }

  status(): number {
    this.print(this.paint.bold('🛡️ Checking resilience status...'), '');
    this.print(...formatStatusTable(this.context.registry.getAllStatuses(), this.paint));
    return 0;
  }

  /**
   * Reset one breaker. An unknown name is only a notice, so the exit code stays 0.
   */
  reset(service: string): number {
    this.print(`🔄 Resetting circuit breaker for ${service}...`);

    if (this.context.registry.reset(service) === 'ok') {
      this.print(`✅ Reset circuit breaker for ${service}`);
    } else {
      this.print(`ℹ️  No circuit breaker found for ${service}`);
    }
    return 0;
  }

  /**
   * Run `check` on a cron schedule until the signal fires. Breaker state accumulates across
   * runs because they share the context's registry. A tick that arrives while the previous
   * check is still running is skipped.
   */
  async monitor(options: MonitorOptions): Promise<void> {
    const { signal } = options;
    const schedule = options.schedule ?? this.context.config.monitor.schedule;
    const logger = this.context.logger;

    if (!cron.validate(schedule)) {
      throw new ConfigurationError(`Invalid cron expression: ${schedule}`, {
        context: { operation: 'monitor' },
      });
    }

    let running: Promise<void> | undefined;
    const runCheck = (): void => {
      if (running) {
        logger.warn('Previous check still running, skipping this run', { schedule });
        return;
      }

      running = this.check({ signal })
        .then(
          () => undefined,
          (error: unknown) => logger.error('Scheduled check failed', error)
        )
        .finally(() => {
          running = undefined;
        });
    };

    const task = (options.scheduler ?? cronScheduler)(schedule, runCheck);
    logger.info(`Monitoring backends on schedule "${schedule}"`);
    this.print(`👀 Monitoring backends on schedule "${schedule}" (Ctrl+C to stop)`);

    await new Promise<void>(resolve => {
      if (signal.aborted) {
        resolve();
        return;
      }
      signal.addEventListener('abort', () => resolve(), { once: true });
    });

    task.stop();
    await running;
    logger.info('Monitor stopped');
  }

  private print(...lines: string[]): void {
    for (const line of lines) {
      this.context.write(line);
    }
  }
}
