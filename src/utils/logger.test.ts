import { describe, expect, it } from 'vitest';
import { buildTransportTargets } from './logger.js';

describe('buildTransportTargets', () => {
  it('writes raw JSON to stderr by default', () => {
    expect(buildTransportTargets({})).toEqual([
      { target: 'pino/file', level: 'info', options: { destination: 2 } },
    ]);
  });

  it('pretty-prints to stderr for the text format', () => {
    expect(buildTransportTargets({ level: 'debug', format: 'text' })).toEqual([
      {
        target: 'pino-pretty',
        level: 'debug',
        options: { destination: 2, colorize: true, translateTime: 'HH:MM:ss', ignore: 'pid,hostname' },
      },
    ]);
  });

  it('adds a file target when a file is given', () => {
    const targets = buildTransportTargets({ level: 'warn', format: 'json', file: '/tmp/dad-joke.log' });
    expect(targets).toHaveLength(2);
    expect(targets[1]).toEqual({
      target: 'pino/file',
      level: 'warn',
      options: { destination: '/tmp/dad-joke.log', mkdir: true },
    });
  });
});
