import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { Logger } from 'pino';
import { createPromptBuilder, type PromptBuilder } from '../prompts/builder.js';
import { DEFAULT_STYLE_ID } from '../styles/catalog.js';
import { InvalidArgumentError } from '../../utils/errors.js';
import { createHandlers, type JokePromptArgs } from './handlers.js';

export const SERVER_NAME = 'dad-joke-mcp-server';
export const SERVER_VERSION = '1.0.0';

export const PROMPT_NAME = 'dad_joke';
export const BUILD_TOOL_NAME = 'build_dad_joke_prompt';
export const LIST_TOOL_NAME = 'list_joke_styles';

export interface McpServerDeps {
  logger: Logger;
  builder?: PromptBuilder;
  logRequests?: boolean;
  logResponses?: boolean;
  newRequestId?: () => string;
}

/** Drop an absent style so the builder sees `undefined`, not an empty key. */
function toPromptArgs(args: { topic: string; style?: string }): JokePromptArgs {
  return args.style === undefined ? { topic: args.topic } : { topic: args.topic, style: args.style };
}

/**
 * A fresh server per connection: an McpServer binds to exactly one transport.
 * The builder and its catalog are shared and immutable.
 */
export function createMcpServer(deps: McpServerDeps): McpServer {
  const builder = deps.builder ?? createPromptBuilder();
  const handlers = createHandlers({
    builder,
    logger: deps.logger,
    logRequests: deps.logRequests ?? true,
    logResponses: deps.logResponses ?? true,
    newRequestId: deps.newRequestId,
  });

  const styleIds = builder.listAvailableStyles().map((s) => s.id);
  const styleHelp = `The style of dad joke. Options: ${styleIds.join(', ')}. Default: ${DEFAULT_STYLE_ID}`;

  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  server.registerTool(
    LIST_TOOL_NAME,
    {
      title: 'List joke styles',
      description: 'List the supported dad joke styles, in presentation order.',
      inputSchema: {},
    },
    async () => {
      const styles = handlers.listStyles();
      return {
        content: [{ type: 'text', text: JSON.stringify(styles, null, 2) }],
        structuredContent: { styles },
      };
    },
  );

  server.registerTool(
    BUILD_TOOL_NAME,
    {
      title: 'Build dad joke prompt',
      description:
        'Build the instruction text for writing one dad joke about a topic. Unknown styles fall back to the default; check resolvedStyle.',
      inputSchema: {
        topic: z.string().describe('The topic or subject for the dad joke'),
        style: z.string().optional().describe(styleHelp),
      },
    },
    async (args) => {
      try {
        const result = handlers.buildPrompt(toPromptArgs(args));
        return {
          content: [{ type: 'text', text: result.text }],
          structuredContent: { requestId: result.requestId, prompt: result.text, ...result.metadata },
        };
      } catch (err) {
        if (err instanceof InvalidArgumentError) {
          return { content: [{ type: 'text', text: err.message }], isError: true };
        }
        throw err;
      }
    },
  );

  server.registerPrompt(
    PROMPT_NAME,
    {
      title: 'Dad joke',
      description: 'Generate a dad joke prompt about any topic. Supports multiple joke styles.',
      argsSchema: {
        topic: z.string().describe('The topic or subject for the dad joke'),
        style: z.string().optional().describe(styleHelp),
      },
    },
    (args) => {
      try {
        const result = handlers.getPrompt(toPromptArgs(args));
        return {
          description: result.description,
          messages: [{ role: 'user', content: { type: 'text', text: result.text } }],
        };
      } catch (err) {
        if (err instanceof InvalidArgumentError) {
          throw new McpError(ErrorCode.InvalidParams, err.message);
        }
        throw err;
      }
    },
  );

  return server;
}
