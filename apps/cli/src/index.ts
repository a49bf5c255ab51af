#!/usr/bin/env tsx
/**
 * mcpipe CLI
 * Command-line client for MCP peers spoken to over stdio.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { inspectCommand } from './commands/inspect.js';
import { callCommand } from './commands/call.js';
import { readCommand } from './commands/read.js';
import { pingCommand } from './commands/ping.js';
import { configCommand } from './commands/config.js';

const program = new Command();

program
  .name('mcpipe')
  .description('Talk to an MCP peer over stdio: mcpipe <command> [options] -- <peer command...>')
  .version('0.1.0')
  .enablePositionalOptions()
  .option('-c, --config <path>', 'Config file (default: $MCPIPE_CONFIG or ~/.mcpipe/config.json)')
  .option('--log-level <level>', 'Runtime log level: debug, info, warn, error', 'warn')
  .option('-v, --verbose', 'Shorthand for --log-level debug')
  .option('--show-stderr', "Echo the peer's stderr")
  .option('--timeout <ms>', 'Per-request timeout in milliseconds (0 waits indefinitely)');

// Register commands
program.addCommand(inspectCommand);
program.addCommand(callCommand);
program.addCommand(readCommand);
program.addCommand(pingCommand);
program.addCommand(configCommand);

// Handle errors
program.exitOverride((err) => {
  if (err.code === 'commander.help' || err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  console.error(chalk.red(`Error: ${err.message}`));
  process.exit(1);
});

// Parse arguments
await program.parseAsync();
