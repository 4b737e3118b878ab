import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { PromptBuilder, PromptResult, StyleSummary } from '../prompts/builder.js';
import { errorMessage } from '../../utils/errors.js';

export interface HandlerDeps {
  builder: PromptBuilder;
  logger: Logger;
  logRequests: boolean;
  logResponses: boolean;
  newRequestId?: () => string;
}

export interface JokePromptArgs {
  topic: string;
  style?: string;
}

export type RequestType = 'list_styles' | 'build_prompt' | 'get_prompt';

export interface HandledPrompt extends PromptResult {
  requestId: string;
  /** Short human-readable summary, used as the MCP prompt description. */
  description: string;
}

export interface McpHandlers {
  listStyles(): StyleSummary[];
  buildPrompt(args: JokePromptArgs): HandledPrompt;
  getPrompt(args: JokePromptArgs): HandledPrompt;
}

/**
 * Per-call wrappers around the prompt builder. Each call gets a request id and
 * the request/response/summary log records; errors are logged then rethrown.
 */
export function createHandlers(deps: HandlerDeps): McpHandlers {
  const { builder, logger: log } = deps;
  const newRequestId = deps.newRequestId ?? randomUUID;

  const logRequest = (requestId: string, requestType: RequestType, data: unknown): void => {
    if (deps.logRequests) {
      log.info({ requestId, requestType, requestData: data }, 'Incoming MCP request');
    }
  };

  const logResponse = (requestId: string, requestType: RequestType, data: unknown): void => {
    if (deps.logResponses) {
      log.info({ requestId, requestType, responseData: data }, 'Outgoing MCP response');
    }
  };

  const handlePrompt = (requestType: RequestType, args: JokePromptArgs): HandledPrompt => {
    const requestId = newRequestId();
    logRequest(requestId, requestType, args);

    let result: PromptResult;
    try {
      result = builder.buildPrompt(args.topic, args.style);
    } catch (err) {
      log.error({ requestId, requestType, arguments: args, err }, errorMessage(err));
      throw err;
    }

    const { metadata } = result;
    if (metadata.fellBack) {
      log.warn(
        {
          requestId,
          requestedStyle: metadata.requestedStyle,
          availableStyles: builder.listAvailableStyles().map((s) => s.id),
        },
        `Unknown joke style '${metadata.requestedStyle}', falling back to '${metadata.resolvedStyle}'`,
      );
    }

    const handled: HandledPrompt = {
      requestId,
      description: `Dad joke prompt about ${metadata.topic} in ${metadata.resolvedStyle} style`,
      ...result,
    };

    logResponse(requestId, requestType, handled);
    log.info(
      {
        requestId,
        requestType,
        topic: metadata.topic,
        style: metadata.resolvedStyle,
        promptLength: metadata.length,
      },
      'Generated dad joke prompt',
    );

    return handled;
  };

  return {
    listStyles(): StyleSummary[] {
      const requestId = newRequestId();
      logRequest(requestId, 'list_styles', {});

      const styles = builder.listAvailableStyles();

      logResponse(requestId, 'list_styles', styles);
      log.info(
        { requestId, requestType: 'list_styles', styleCount: styles.length, styles: styles.map((s) => s.id) },
        'Listed available styles',
      );
      return styles;
    },

    buildPrompt: (args) => handlePrompt('build_prompt', args),
    getPrompt: (args) => handlePrompt('get_prompt', args),
  };
}
