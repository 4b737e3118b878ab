import { createServer, type Server, type ServerResponse } from 'node:http';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { createMcpServer, type McpServerDeps } from './server.js';
import { errorMessage } from '../../utils/errors.js';

export const MESSAGES_PATH = '/messages';

export interface SseServerOptions extends McpServerDeps {
  host: string;
  port: number;
}

const CORS_HEADERS = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type',
};

function json(res: ServerResponse, data: unknown, status = 200): void {
  res.writeHead(status, { 'Content-Type': 'application/json', ...CORS_HEADERS });
  res.end(JSON.stringify(data));
}

export async function startStdioServer(deps: McpServerDeps): Promise<McpServer> {
  const server = createMcpServer(deps);
  await server.connect(new StdioServerTransport());
  deps.logger.info({ transport: 'stdio' }, 'Server started successfully');
  return server;
}

/**
 * SSE transport: clients open `GET /messages` for the event stream and send
 * requests to `POST /messages?sessionId=<id>` using the endpoint announced on it.
 */
export function startSseServer(options: SseServerOptions): { server: Server; stop: () => Promise<void> } {
  const log = options.logger;
  const sessions = new Map<string, { transport: SSEServerTransport; mcp: McpServer }>();

  const server = createServer((req, res) => {
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? '127.0.0.1'}`);
    const pathname = url.pathname;

    if (req.method === 'OPTIONS') {
      res.writeHead(204, CORS_HEADERS);
      res.end();
      return;
    }

    if (req.method === 'GET' && pathname === '/health') {
      json(res, { ok: true, sessions: sessions.size });
      return;
    }

    if (req.method === 'GET' && pathname === MESSAGES_PATH) {
      const transport = new SSEServerTransport(MESSAGES_PATH, res);
      const mcp = createMcpServer(options);
      const sessionId = transport.sessionId;
      sessions.set(sessionId, { transport, mcp });
      log.debug({ sessionId }, 'SSE session opened');

      res.on('close', () => {
        sessions.delete(sessionId);
        log.debug({ sessionId }, 'SSE session closed');
      });

      mcp.connect(transport).catch((err: unknown) => {
        sessions.delete(sessionId);
        log.error({ sessionId, err }, `Failed to start SSE session: ${errorMessage(err)}`);
      });
      return;
    }

    if (req.method === 'POST' && pathname === MESSAGES_PATH) {
      const sessionId = url.searchParams.get('sessionId') ?? '';
      const session = sessions.get(sessionId);
      if (!session) {
        json(res, { error: `Unknown session: ${sessionId || '(none)'}` }, sessionId ? 404 : 400);
        return;
      }

      session.transport.handlePostMessage(req, res).catch((err: unknown) => {
        log.error({ sessionId, err }, `Failed to handle message: ${errorMessage(err)}`);
        if (!res.headersSent) json(res, { error: errorMessage(err) }, 500);
      });
      return;
    }

    json(res, { error: 'Not found' }, 404);
  });

  server.listen(options.port, options.host, () => {
    log.info(
      { endpoint: `http://${options.host}:${options.port}${MESSAGES_PATH}`, status: 'ready' },
      'Server started successfully',
    );
  });

  return {
    server,
    stop: async () => {
      const open = [...sessions.values()];
      sessions.clear();
      await Promise.all(open.map(({ mcp }) => mcp.close()));
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
    },
  };
}
