#!/usr/bin/env node
/**
 * depgraph CLI
 *
 * Command-line interface for the dependency analyzer.
 */

import { config as loadDotenv } from 'dotenv';
import { Command } from 'commander';
import { analyzeCommand } from './commands/analyze.js';
import { configCommand } from './commands/config.js';
import { initCommand } from './commands/init.js';

loadDotenv();

const program = new Command();

program
  .name('depgraph')
  .description('Package dependency graph visualizer')
  .version('0.1.0');

program.addCommand(analyzeCommand, { isDefault: true });
program.addCommand(initCommand);
program.addCommand(configCommand);

program.parse();
