import type { Command } from 'commander';
import chalk from 'chalk';
import { buildPrompt } from '../modules/prompts/builder.js';
import { InvalidArgumentError } from '../utils/errors.js';

export function registerPromptCommand(program: Command): void {
  program
    .command('prompt')
    .description('Build a dad joke prompt locally, without a server')
    .argument('<topic>', 'Topic for the joke')
    .option('--style <style>', 'Joke style (see `styles`)')
    .option('--json', 'Output the full result as JSON')
    .action((topic: string, opts: { style?: string; json?: boolean }) => {
      try {
        const result = buildPrompt(topic, opts.style);

        if (opts.json) {
          console.log(JSON.stringify(result, null, 2));
          return;
        }

        if (result.metadata.fellBack) {
          console.log(
            chalk.dim(`Unknown style "${result.metadata.requestedStyle}", using "${result.metadata.resolvedStyle}"\n`),
          );
        }
        console.log(result.text);
      } catch (err) {
        if (err instanceof InvalidArgumentError) {
          console.error(chalk.red(err.message));
          process.exitCode = 1;
          return;
        }
        throw err;
      }
    });
}
