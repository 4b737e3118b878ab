import type { Command } from 'commander';
import { loadConfig, parsePort, type Config } from '../config.js';
import { createLogger } from '../utils/logger.js';
import { listAvailableStyles } from '../modules/prompts/builder.js';
import { startSseServer, startStdioServer } from '../modules/mcp/transport.js';

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Run the MCP server (SSE over HTTP by default)')
    .option('--stdio', 'Serve over stdin/stdout instead of HTTP')
    .option('--host <host>', 'Host to bind the HTTP server to')
    .option('--port <port>', 'Port for the HTTP server', parsePort)
    .action(async (opts: { stdio?: boolean; host?: string; port?: number }) => {
      const overrides: Partial<Config> = {};
      if (opts.stdio) overrides.transport = 'stdio';
      if (opts.host) overrides.host = opts.host;
      if (opts.port !== undefined) overrides.port = opts.port;

      const config = loadConfig(overrides);
      const log = createLogger({
        level: config.logLevel,
        format: config.logFormat,
        file: config.logToFile ? config.logFile : undefined,
      });

      log.info(
        {
          version: '1.0.0',
          transport: config.transport,
          host: config.host,
          port: config.port,
          logLevel: config.logLevel,
          logFormat: config.logFormat,
          availableStyles: listAvailableStyles().map((s) => s.id),
        },
        'Starting Dad Joke MCP Server',
      );

      const deps = {
        logger: log,
        logRequests: config.logRequests,
        logResponses: config.logResponses,
      };

      if (config.transport === 'stdio') {
        const server = await startStdioServer(deps);
        const shutdown = (signal: string) => {
          log.info({ signal }, 'Server shutdown requested');
          server
            .close()
            .then(() => log.info('Server shutdown complete'))
            .catch((err: unknown) => log.error({ err }, 'Error during shutdown'))
            .finally(() => process.exit(0));
        };
        process.once('SIGINT', () => shutdown('SIGINT'));
        process.once('SIGTERM', () => shutdown('SIGTERM'));
        return;
      }

      const { server, stop } = startSseServer({ ...deps, host: config.host, port: config.port });
      server.on('error', (err) => {
        log.fatal({ err }, 'Server error');
        process.exit(1);
      });

      const shutdown = (signal: string) => {
        log.info({ signal }, 'Server shutdown requested');
        stop()
          .then(() => log.info('Server shutdown complete'))
          .catch((err: unknown) => log.error({ err }, 'Error during shutdown'))
          .finally(() => process.exit(0));
      };
      process.once('SIGINT', () => shutdown('SIGINT'));
      process.once('SIGTERM', () => shutdown('SIGTERM'));
    });
}
