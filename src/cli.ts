import { Command } from 'commander';
import { registerServeCommand } from './commands/serve.js';
import { registerPromptCommand } from './commands/prompt.js';
import { registerStylesCommand } from './commands/styles.js';
import { AppError, errorMessage } from './utils/errors.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('dad-joke-mcp')
    .description('MCP server that builds dad joke prompts for a calling agent')
    .version('1.0.0');

  registerServeCommand(program);
  registerPromptCommand(program);
  registerStylesCommand(program);

  return program;
}

/** One-line report for a failure that stops the CLI before or during startup. */
export function formatStartupError(err: unknown): string {
  if (err instanceof AppError) return `${err.code}: ${err.message}`;
  if (err instanceof Error) return err.stack ?? err.message;
  return errorMessage(err);
}
