import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigError } from './utils/errors.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// Project root is one level up from both src/ (tsx/vitest) and dist/ (compiled)
const PROJECT_ROOT = path.resolve(__dirname, '..');

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'fatal'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const LOG_FORMATS = ['json', 'text'] as const;
export type LogFormat = (typeof LOG_FORMATS)[number];

export const TRANSPORTS = ['sse', 'stdio'] as const;
export type TransportKind = (typeof TRANSPORTS)[number];

export interface Config {
  // Server
  host: string;
  port: number;
  transport: TransportKind;

  // Logging
  logLevel: LogLevel;
  logFormat: LogFormat;
  logFile: string;
  logToFile: boolean;
  logRequests: boolean;
  logResponses: boolean;
}

type Env = Record<string, string | undefined>;

// Aliases for level names pino does not use
const LEVEL_ALIASES: Record<string, LogLevel> = {
  warning: 'warn',
  critical: 'fatal',
};

const logLevelSchema = z
  .string()
  .trim()
  .toLowerCase()
  .transform((value) => LEVEL_ALIASES[value] ?? value)
  .pipe(z.enum(LOG_LEVELS));

const logFormatSchema = z.string().trim().toLowerCase().pipe(z.enum(LOG_FORMATS));
const transportSchema = z.string().trim().toLowerCase().pipe(z.enum(TRANSPORTS));
const portSchema = z.string().trim().pipe(z.coerce.number().int().min(0).max(65535));

export function loadEnvFile(env: Env, envPath = path.resolve(PROJECT_ROOT, '.env')): void {
  let envText: string;
  try {
    envText = fs.readFileSync(envPath, 'utf-8');
  } catch {
    // .env is optional
    return;
  }

  for (const line of envText.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const eq = trimmed.indexOf('=');
    if (eq > 0) {
      const key = trimmed.slice(0, eq).trim();
      const val = trimmed.slice(eq + 1).trim().replace(/^(['"])(.*)\1$/, '$2');
      if (!env[key]) env[key] = val;
    }
  }
}

export function parseBool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  const v = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(v)) return true;
  if (['0', 'false', 'no', 'off'].includes(v)) return false;
  return fallback;
}

function parseField<T>(name: string, schema: z.ZodType<T, z.ZodTypeDef, string>, raw: string): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0]?.message ?? 'invalid value';
    throw new ConfigError(`Invalid ${name}: ${raw} (${issue})`, result.error);
  }
  return result.data;
}

/** Parse a port given on the command line the same way `PORT` is parsed. */
export function parsePort(raw: string): number {
  return parseField('port', portSchema, raw);
}

export function loadConfig(overrides: Partial<Config> = {}, env: Env = process.env): Config {
  // Only the real process environment is backfilled from .env
  if (env === process.env) loadEnvFile(env);

  const str = (key: string, fallback: string): string => {
    const value = env[key];
    return value === undefined || value.trim() === '' ? fallback : value.trim();
  };

  return {
    host: overrides.host ?? str('HOST', '0.0.0.0'),
    port: overrides.port ?? parseField('PORT', portSchema, str('PORT', '8000')),
    transport: overrides.transport ?? parseField('MCP_TRANSPORT', transportSchema, str('MCP_TRANSPORT', 'sse')),

    logLevel: overrides.logLevel ?? parseField('LOG_LEVEL', logLevelSchema, str('LOG_LEVEL', 'info')),
    logFormat: overrides.logFormat ?? parseField('LOG_FORMAT', logFormatSchema, str('LOG_FORMAT', 'json')),
    logFile: path.resolve(PROJECT_ROOT, overrides.logFile ?? str('LOG_FILE', 'logs/dad-joke-mcp.log')),
    logToFile: overrides.logToFile ?? parseBool(env.LOG_TO_FILE, false),
    logRequests: overrides.logRequests ?? parseBool(env.LOG_REQUESTS, true),
    logResponses: overrides.logResponses ?? parseBool(env.LOG_RESPONSES, true),
  };
}
