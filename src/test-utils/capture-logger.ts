import pino from 'pino';

export type LogRecord = Record<string, unknown> & { level: number; msg: string };

/** A debug-level pino logger that parses every line into `records`. */
export function captureLogger(): { logger: pino.Logger; records: LogRecord[] } {
  const records: LogRecord[] = [];
  const logger = pino(
    { level: 'debug' },
    {
      write(line: string) {
        records.push(JSON.parse(line));
      },
    },
  );
  return { logger, records };
}
