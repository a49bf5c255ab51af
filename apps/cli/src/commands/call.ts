/**
 * Call command - Execute a tool on a peer.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { parseToolArgs } from '../lib/args.js';
import { runOptions, withClient } from '../lib/connect.js';
import { describeError, formatOutput, renderContent } from '../lib/output.js';

export const callCommand = new Command('call')
  .description('Execute a tool on a peer')
  .argument('<tool>', 'Tool name to execute')
  .argument('<peer...>', 'Peer command and its arguments, after --')
  .option('-a, --args <json>', 'Tool arguments as JSON string', '{}')
  .option('-f, --format <format>', 'Output format: json, pretty', 'pretty')
  .passThroughOptions()
  .action(async (tool: string, peer: string[], callOpts: { args: string }, command: Command) => {
    const spinner = ora(`Calling tool: ${tool}...`).start();

    try {
      const options = runOptions(command);
      const args = parseToolArgs(callOpts.args);

      const startTime = Date.now();
      const result = await withClient(peer, options, (client, callOptions) =>
        client.callTool(tool, args, callOptions)
      );
      const duration = Date.now() - startTime;

      spinner.succeed(`Tool executed in ${duration}ms`);

      if (options.format === 'json') {
        console.log(formatOutput(result, 'json'));
      } else {
        console.log(chalk.green('\n✓ Result:'));
        for (const block of renderContent(result.content)) {
          console.log(block);
        }

        if (result.isError) {
          console.log(chalk.red('\n⚠ Tool returned an error'));
          process.exitCode = 1;
        }
      }
    } catch (error) {
      spinner.fail('Tool execution failed');
      console.error(chalk.red(`\nError: ${describeError(error)}`));
      process.exit(1);
    }
  });
