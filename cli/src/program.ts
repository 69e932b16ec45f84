import {
  DEFAULT_CONFIG_PATH,
  loadTelemetryGuardConfig,
  toRegistryOptions,
} from '@telemetry-guard/configuration';
import { LoggerFactory, type Logger } from '@telemetry-guard/logging';
import { ResilienceRegistry } from '@telemetry-guard/resilience';
import type { AxiosInstance } from 'axios';
import type { ChalkInstance } from 'chalk';
import { Command } from 'commander';

import { CLICommands, type Scheduler } from './cli/commands.js';

export const VERSION = '0.1.0';

export interface ProgramOptions {
  write?: ((line: string) => void) | undefined;
  setExitCode?: ((code: number) => void) | undefined;
  env?: NodeJS.ProcessEnv | undefined;
  http?: AxiosInstance | undefined;
  paint?: ChalkInstance | undefined;
  /** Custom logger instead of the one described by the configuration file */
  logger?: Logger | undefined;
  scheduler?: Scheduler | undefined;
  /** Signal that stops `monitor`; defaults to SIGINT or SIGTERM */
  stopSignal?: AbortSignal | undefined;
}

interface ConfigFlag {
  config: string;
}

function signalOnTermination(): AbortSignal {
  const controller = new AbortController();
  const stop = () => controller.abort();
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);
  return controller.signal;
}

/**
 * Build the command-line program. Every command loads the configuration and gets a fresh
 * registry, so breaker state only outlives a single command inside `monitor`.
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const write = options.write ?? ((line: string) => console.log(line));
  const setExitCode =
    options.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });

  const createCommands = async (configPath: string): Promise<CLICommands> => {
    const bootLogger = options.logger ?? LoggerFactory.createConsoleLogger('telemetry-guard');
    const config = await loadTelemetryGuardConfig(configPath, {
      logger: bootLogger.child('configuration'),
      env: options.env,
    });
    const logger =
      options.logger ?? LoggerFactory.fromConfig('telemetry-guard', config.logging, options.env);

    return new CLICommands({
      config,
      registry: new ResilienceRegistry({
        ...toRegistryOptions(config.resilience),
        logger: logger.child('resilience'),
      }),
      logger,
      write,
      http: options.http,
      paint: options.paint,
    });
  };

  const program = new Command();

  program
    .name('telemetry-guard')
    .description('Check telemetry backends through circuit breakers and retries')
    .version(VERSION);

  program
    .command('check')
    .description('Probe every telemetry backend once')
    .option('-c, --config <path>', 'Path to configuration file', DEFAULT_CONFIG_PATH)
    .action(async (flags: ConfigFlag) => {
      const commands = await createCommands(flags.config);
      setExitCode(await commands.check());
    });

  program
    .command('status')
    .description('Show circuit breaker status for monitored services')
    .option('-c, --config <path>', 'Path to configuration file', DEFAULT_CONFIG_PATH)
    .action(async (flags: ConfigFlag) => {
      const commands = await createCommands(flags.config);
      setExitCode(commands.status());
    });

  program
    .command('reset <service>')
    .description('Reset the circuit breaker for a service')
    .option('-c, --config <path>', 'Path to configuration file', DEFAULT_CONFIG_PATH)
    .action(async (service: string, flags: ConfigFlag) => {
      const commands = await createCommands(flags.config);
      setExitCode(commands.reset(service));
    });

  program
    .command('monitor')
    .description('Check backends on a cron schedule until interrupted')
    .option('-c, --config <path>', 'Path to configuration file', DEFAULT_CONFIG_PATH)
    .option('-s, --schedule <cron>', 'Cron expression overriding monitor.schedule')
    .action(async (flags: ConfigFlag & { schedule?: string }) => {
      const commands = await createCommands(flags.config);
      await commands.monitor({
        schedule: flags.schedule,
        signal: options.stopSignal ?? signalOnTermination(),
        scheduler: options.scheduler,
      });
    });

  return program;
}
