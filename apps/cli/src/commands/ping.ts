/**
 * Ping command - Check that a peer answers.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { runOptions, withClient } from '../lib/connect.js';
import { describeError } from '../lib/output.js';

export const pingCommand = new Command('ping')
  .description('Initialize a peer and ping it')
  .argument('<peer...>', 'Peer command and its arguments, after --')
  .option('-n, --count <n>', 'Number of pings', '1')
  .passThroughOptions()
  .action(async (peer: string[], pingOpts: { count: string }, command: Command) => {
    const spinner = ora('Connecting...').start();

    try {
      const options = runOptions(command);
      const count = Math.max(1, parseInt(pingOpts.count, 10) || 1);

      const timings = await withClient(peer, options, async (client, callOptions) => {
        spinner.text = `Pinging ${client.serverInfo?.serverInfo.name ?? 'peer'}...`;
        const results: number[] = [];
        for (let i = 0; i < count; i++) {
          const start = performance.now();
          await client.ping(callOptions);
          results.push(performance.now() - start);
        }
        return results;
      });

      spinner.succeed('Peer is responding');
      for (const [i, ms] of timings.entries()) {
        console.log(chalk.gray(`  seq=${i + 1} time=${ms.toFixed(1)}ms`));
      }
    } catch (error) {
      spinner.fail('Ping failed');
      console.error(chalk.red(`\nError: ${describeError(error)}`));
      process.exit(1);
    }
  });
