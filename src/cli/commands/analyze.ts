/**
 * Analyze Command
 *
 * Load the configuration and print the dependency analysis for its package.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { DependencyAnalyzer } from '../../analysis/DependencyAnalyzer.js';
import { ConfigLoader, resolveConfigPath } from '../../config/ConfigLoader.js';
import { CircularDependencyError, ConfigError, GraphExportError } from '../../core/errors.js';
import { createLogger, silentLogger } from '../../core/logger.js';
import { formatParameters, formatReport, reportToJson } from '../output.js';

interface AnalyzeOptions {
  config?: string;
  package?: string;
  reverse?: boolean;
  export?: boolean;
  json?: boolean;
  verbose?: boolean;
}

export const analyzeCommand = new Command('analyze')
  .description('Analyze the dependencies of the configured package')
  .option('-c, --config <path>', 'Path to config file (default: config.toml)')
  .option('-p, --package <name>', 'Override package_name from the config')
  .option('-r, --reverse', 'Show reverse dependencies')
  .option('-e, --export', 'Write a Graphviz .dot file')
  .option('--json', 'Print the report as JSON')
  .option('-v, --verbose', 'Log analyzer progress')
  .action((options: AnalyzeOptions) => {
    const spinner = ora('Loading configuration...').start();
    const loader = new ConfigLoader();

    try {
      const configPath = resolveConfigPath(options.config);
      const config = loader.load(configPath);
      spinner.succeed(`Loaded ${configPath}`);

      const request = loader.toRequest(config);
      if (options.package) request.packageName = options.package;
      if (options.reverse) request.reverseMode = true;
      if (options.export) request.graphExportEnabled = true;

      const analyzer = new DependencyAnalyzer({
        logger: options.verbose ? createLogger('Analyzer', Boolean(options.json)) : silentLogger
      });
      const report = analyzer.analyze(request);

      if (options.json) {
        console.log(JSON.stringify(reportToJson(report), null, 2));
        return;
      }

      console.log();
      for (const line of formatParameters(loader.describe(config))) console.log(line);
      console.log();
      for (const line of formatReport(report)) console.log(line);
    } catch (error) {
      if (spinner.isSpinning) {
        spinner.fail(chalk.red('Analysis failed'));
      }

      if (error instanceof ConfigError) {
        console.error(chalk.red(`CONFIG ERROR: ${error.message}`));
        console.error(chalk.dim('Tip: run `depgraph init` to create a sample config'));
      } else if (error instanceof CircularDependencyError) {
        console.error(chalk.red(`ERROR: ${error.message}`));
      } else if (error instanceof GraphExportError) {
        console.error(chalk.red(`EXPORT ERROR: ${error.message}`));
      } else {
        console.error(chalk.red(`UNKNOWN ERROR: ${error instanceof Error ? error.message : String(error)}`));
      }
      process.exit(1);
    }
  });
