/**
 * Read command - Fetch the contents of a resource.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { runOptions, withClient } from '../lib/connect.js';
import { describeError, formatOutput, renderResourceContents } from '../lib/output.js';

export const readCommand = new Command('read')
  .description('Read a resource from a peer')
  .argument('<uri>', 'Resource URI')
  .argument('<peer...>', 'Peer command and its arguments, after --')
  .option('-f, --format <format>', 'Output format: json, pretty', 'pretty')
  .passThroughOptions()
  .action(async (uri: string, peer: string[], _opts: unknown, command: Command) => {
    const spinner = ora(`Reading ${uri}...`).start();

    try {
      const options = runOptions(command);
      const contents = await withClient(peer, options, (client, callOptions) =>
        client.readResource(uri, callOptions)
      );

      spinner.succeed(`Read ${contents.length} item(s)`);

      if (options.format === 'json') {
        console.log(formatOutput(contents, 'json'));
        return;
      }
      for (const [index, block] of renderResourceContents(contents).entries()) {
        const item = contents[index];
        if (contents.length > 1 && item) {
          console.log(chalk.cyan(`\n# ${item.uri}`));
        }
        console.log(block);
      }
    } catch (error) {
      spinner.fail('Read failed');
      console.error(chalk.red(`\nError: ${describeError(error)}`));
      process.exit(1);
    }
  });
