/**
 * Config Command
 *
 * Validate the configuration file and display its parameters.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { ConfigLoader, resolveConfigPath } from '../../config/ConfigLoader.js';
import { formatParameters } from '../output.js';

interface ConfigOptions {
  config?: string;
}

export const configCommand = new Command('config')
  .description('Validate and display the configuration')
  .option('-c, --config <path>', 'Path to config file (default: config.toml)')
  .action((options: ConfigOptions) => {
    const loader = new ConfigLoader();

    try {
      const config = loader.load(resolveConfigPath(options.config));
      for (const line of formatParameters(loader.describe(config))) console.log(line);
    } catch (error) {
      console.error(chalk.red(`CONFIG ERROR: ${error instanceof Error ? error.message : String(error)}`));
      process.exit(1);
    }
  });
