import type { Command } from 'commander';
import chalk from 'chalk';
import { listAvailableStyles } from '../modules/prompts/builder.js';
import { DEFAULT_STYLE_ID } from '../modules/styles/catalog.js';

export function registerStylesCommand(program: Command): void {
  program
    .command('styles')
    .description('List the supported joke styles')
    .option('--json', 'Output as JSON')
    .action((opts: { json?: boolean }) => {
      const styles = listAvailableStyles();

      if (opts.json) {
        console.log(JSON.stringify(styles, null, 2));
        return;
      }

      console.log(chalk.bold('\nJoke styles'));
      console.log(chalk.dim('━'.repeat(50)));
      const width = Math.max(...styles.map((s) => s.id.length));
      for (const style of styles) {
        const marker = style.id === DEFAULT_STYLE_ID ? chalk.green(' (default)') : '';
        console.log(`  ${chalk.cyan(style.id.padEnd(width))}  ${style.description}${marker}`);
      }
      console.log();
    });
}
