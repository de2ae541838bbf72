/**
 * Config Command
 *
 * Shows the configuration a run would use.
 *
 * @module cli/commands/config
 */

import { Command } from 'commander';
import { ConfigError } from '../../config/index.js';
import { loadTriageConfig, resolveRunConfig } from '../../storage/config.js';
import type { RunConfig, TriageConfig } from '../../schemas/index.js';
import { BaseCommand, EXIT_CODES, getBaseCommand } from '../base-command.js';
import { configPathFor, type RunDependencies } from './run.js';

/**
 * Options for the config:show command.
 */
export interface ShowConfigOptions {
  config?: string;
}

/**
 * What `config show` prints.
 */
export interface ConfigReport {
  configPath: string;
  schedule: TriageConfig['schedule'];
  run: RunConfig;
}

/**
 * Load and resolve the configuration without running anything.
 */
export async function buildConfigReport(
  options: ShowConfigOptions,
  base: BaseCommand,
  deps: Pick<RunDependencies, 'cwd' | 'env'> = {}
): Promise<ConfigReport> {
  const configPath = configPathFor(options, deps);
  const document = await loadTriageConfig(configPath, base.logger);

  return {
    configPath,
    schedule: document.schedule,
    run: resolveRunConfig(document, {}, deps.cwd),
  };
}

/**
 * Register the config command group.
 *
 * @param program - Commander program instance
 */
export function registerConfigCommand(program: Command): void {
  const config = program.command('config').description('Inspect configuration');

  config
    .command('show')
    .description('Print the resolved configuration as JSON')
    .option('-c, --config <path>', 'Configuration file (default: triage.config.json)')
    .action(async (options: ShowConfigOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);

      try {
        base.json(await buildConfigReport(options, base));
      } catch (error) {
        if (error instanceof ConfigError) {
          base.error(error.message, EXIT_CODES.USAGE_ERROR);
        }
        if (error instanceof Error) {
          base.error(error.message, error);
        }
        throw error;
      }
    });
}
