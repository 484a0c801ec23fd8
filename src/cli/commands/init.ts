/**
 * Init Command
 *
 * Write a sample configuration file.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { ConfigLoader, resolveConfigPath } from '../../config/ConfigLoader.js';

interface InitOptions {
  config?: string;
  force: boolean;
}

export const initCommand = new Command('init')
  .description('Create a sample config file')
  .option('-c, --config <path>', 'Path to config file (default: config.toml)')
  .option('-f, --force', 'Overwrite an existing config file', false)
  .action((options: InitOptions) => {
    const spinner = ora('Writing sample configuration...').start();

    try {
      const configPath = resolveConfigPath(options.config);
      if (!new ConfigLoader().createSample(configPath, options.force)) {
        spinner.warn(`${configPath} already exists. Use --force to overwrite.`);
        return;
      }

      spinner.succeed(chalk.green(`Created sample config file: ${configPath}`));
      console.log();
      console.log(chalk.cyan('Next steps:'));
      console.log('  depgraph config');
      console.log('  depgraph analyze');
    } catch (error) {
      spinner.fail(chalk.red('Could not write sample configuration'));
      console.error(error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
