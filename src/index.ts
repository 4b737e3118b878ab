#!/usr/bin/env node
import chalk from 'chalk';
import { createProgram, formatStartupError } from './cli.js';

export async function run(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv);
}

run().catch((err: unknown) => {
  console.error(chalk.red(formatStartupError(err)));
  process.exit(1);
});
