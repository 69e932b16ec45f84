/**
 * @telemetry-guard/cli - Command-line surface over the health checker and resilience registry
 */

export { createProgram, VERSION, type ProgramOptions } from './program.js';
export {
  CLICommands,
  cronScheduler,
  type CommandContext,
  type MonitorOptions,
  type Scheduler,
} from './cli/commands.js';
export { formatHealthReport, formatStatusTable, backendIcon, NO_SERVICES } from './cli/format.js';
