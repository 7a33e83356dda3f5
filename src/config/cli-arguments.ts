import { Command, CommanderError } from 'commander';
import { ServiceConfig, createServiceConfig } from './service-config';

interface CliOptions {
  resetSchema: boolean;
}

/**
 * Build the command-line definition.
 *
 * Usage:
 *   measurement-service power flow
 *   measurement-service --reset-schema temperature,pressure
 */
export function createProgram(): Command {
  return new Command()
    .name('measurement-service')
    .description('Ingest and query measurement readings for the enabled kinds')
    .argument('<kinds...>', 'measurement kinds to enable, e.g. "power flow"')
    .option(
      '--reset-schema',
      'drop and recreate the measurement tables on startup',
      false,
    )
    .exitOverride();
}

/**
 * Parse process arguments into a ServiceConfig.
 *
 * @param argv - Full argv including the node binary and script path
 * @throws CommanderError on usage errors (missing kinds, unknown options)
 */
export function parseServiceArguments(argv: readonly string[]): ServiceConfig {
  const program = createProgram();
  program.parse([...argv], { from: 'node' });

  const config = createServiceConfig(program.args, {
    resetSchema: program.opts<CliOptions>().resetSchema,
  });

  // "power, ," parses to no kinds at all; commander only checks for presence
  if (config.enabledKinds.length === 0) {
    throw new CommanderError(
      1,
      'measurement-service.missingKinds',
      'error: at least one measurement kind must be enabled',
    );
  }

  return config;
}
