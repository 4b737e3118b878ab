import pino from 'pino';
import type { LogFormat } from '../config.js';

export interface LoggerOptions {
  level?: string;
  format?: LogFormat;
  /** Also append records to this file when set. */
  file?: string;
}

let logger: pino.Logger | undefined;

// stdout belongs to the stdio transport, so everything goes to stderr
const STDERR = 2;

export function buildTransportTargets(options: LoggerOptions): pino.TransportTargetOptions[] {
  const level = options.level ?? 'info';
  const targets: pino.TransportTargetOptions[] = [
    options.format === 'text'
      ? {
          target: 'pino-pretty',
          level,
          options: {
            destination: STDERR,
            colorize: true,
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname',
          },
        }
      : { target: 'pino/file', level, options: { destination: STDERR } },
  ];

  if (options.file) {
    targets.push({ target: 'pino/file', level, options: { destination: options.file, mkdir: true } });
  }

  return targets;
}

export function createLogger(options: LoggerOptions = {}): pino.Logger {
  if (logger) return logger;

  logger = pino(
    {
      level: options.level ?? 'info',
      base: { service: 'dad-joke-mcp' },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.transport({ targets: buildTransportTargets(options) }),
  );

  return logger;
}

export function getLogger(): pino.Logger {
  if (!logger) return createLogger();
  return logger;
}
