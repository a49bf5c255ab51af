/**
 * Config command - Manage runtime configuration.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { ConfigService, defaultConfigPath } from '@mcpipe/runtime';
import { parseConfigValue } from '../lib/args.js';

function configPathOf(command: Command): string {
  const { config } = command.optsWithGlobals<{ config?: string }>();
  return config ?? defaultConfigPath();
}

export const configCommand = new Command('config').description('Manage runtime configuration');

// Show a config value
configCommand
  .command('get')
  .description('Show a configuration value')
  .argument('<key>', 'Dot-notation key, e.g. request.timeoutMs')
  .action((key: string, _opts: unknown, command: Command) => {
    try {
      const value = new ConfigService(configPathOf(command)).get<unknown>(key);
      if (value === undefined) {
        console.error(chalk.yellow(`${key} is not set`));
        process.exit(1);
      }
      console.log(typeof value === 'string' ? value : JSON.stringify(value));
    } catch (error) {
      console.error(chalk.red(`Error: ${error instanceof Error ? error.message : 'Unknown error'}`));
      process.exit(1);
    }
  });

// Set config value
configCommand
  .command('set')
  .description('Set a configuration value')
  .argument('<key>', 'Dot-notation key, e.g. request.timeoutMs')
  .argument('<value>', 'Value; parsed as JSON when possible')
  .action((key: string, raw: string, _opts: unknown, command: Command) => {
    try {
      const config = new ConfigService(configPathOf(command));
      config.set(key, parseConfigValue(raw));
      console.log(chalk.green(`✓ Set ${key} = ${raw}`));
    } catch (error) {
      console.error(chalk.red(`Error: ${error instanceof Error ? error.message : 'Unknown error'}`));
      process.exit(1);
    }
  });

// Show config path
configCommand
  .command('path')
  .description('Show configuration file path')
  .action((_opts: unknown, command: Command) => {
    console.log(configPathOf(command));
  });
