/**
 * Inspect command - Show what a peer offers.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { Resource, Tool } from '@mcpipe/runtime';
import { runOptions, withClient } from '../lib/connect.js';
import { describeError, formatOutput, resourcesTable, toolsTable } from '../lib/output.js';

export const inspectCommand = new Command('inspect')
  .description('Initialize a peer and list its tools and resources')
  .argument('<peer...>', 'Peer command and its arguments, after --')
  .option('-f, --format <format>', 'Output format: json, pretty', 'pretty')
  .passThroughOptions()
  .action(async (peer: string[], _opts: unknown, command: Command) => {
    const spinner = ora('Connecting to peer...').start();

    try {
      const options = runOptions(command);

      const report = await withClient(peer, options, async (client, callOptions) => {
        const info = client.serverInfo;
        // Only ask for what the peer advertises
        const tools: Tool[] =
          info?.capabilities.tools !== undefined ? await client.listAllTools(callOptions) : [];
        const resources: Resource[] =
          info?.capabilities.resources !== undefined ? await client.listAllResources(callOptions) : [];
        return { info, tools, resources };
      });

      spinner.succeed('Peer initialized');

      if (options.format === 'json') {
        console.log(
          formatOutput(
            {
              serverInfo: report.info?.serverInfo,
              protocolVersion: report.info?.protocolVersion,
              capabilities: report.info?.capabilities,
              instructions: report.info?.instructions,
              tools: report.tools,
              resources: report.resources,
            },
            'json'
          )
        );
        return;
      }

      const { info, tools, resources } = report;
      console.log(chalk.cyan('\nServer:'));
      console.log(chalk.gray(`  Name:     ${info?.serverInfo.name ?? 'unknown'}`));
      console.log(chalk.gray(`  Version:  ${info?.serverInfo.version ?? 'unknown'}`));
      console.log(chalk.gray(`  Protocol: ${info?.protocolVersion ?? 'unknown'}`));
      if (info?.instructions) {
        console.log(chalk.cyan('\nInstructions:'));
        console.log(info.instructions);
      }

      console.log(chalk.cyan(`\nTools (${tools.length}):`));
      console.log(tools.length > 0 ? toolsTable(tools) : chalk.gray('  none'));

      console.log(chalk.cyan(`\nResources (${resources.length}):`));
      console.log(resources.length > 0 ? resourcesTable(resources) : chalk.gray('  none'));
    } catch (error) {
      spinner.fail('Inspection failed');
      console.error(chalk.red(`\nError: ${describeError(error)}`));
      process.exit(1);
    }
  });
