// src/config/config.ts
// Settings of the HTTP service, read from the environment.

import { ConfigError } from '../errors/errors.ts';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export interface ServerConfig {
  port: number;
  host: string;
  /** Most tokens a single compiled query may have. */
  maxTokens: number;
  /** Wall-clock budget of one translation, in milliseconds. */
  timeoutMs: number;
  /** Structural attribute used for anchors; anchors are not rendered without it. */
  span: string | undefined;
  logLevel: LogLevel;
}

export type Environment = Readonly<Record<string, string | undefined>>;

export const DEFAULT_CONFIG: Readonly<ServerConfig> = {
  port: 3000,
  host: '0.0.0.0',
  maxTokens: 5,
  timeoutMs: 2000,
  span: undefined,
  logLevel: 'info',
};

function integer(env: Environment, variable: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  const raw = env[variable];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigError(`${variable} must be an integer between ${min} and ${max} (got "${raw}")`, variable);
  }
  return value;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function logLevel(env: Environment): LogLevel {
  const raw = env['LOG_LEVEL'];
  if (raw === undefined || raw === '') return DEFAULT_CONFIG.logLevel;
  const value = raw.toLowerCase();
  if (!isLogLevel(value)) {
    throw new ConfigError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')} (got "${raw}")`, 'LOG_LEVEL');
  }
  return value;
}

export function loadServerConfig(env: Environment = process.env): ServerConfig {
  const span = env['TREECQP_SPAN']?.trim();
  return {
    port: integer(env, 'PORT', DEFAULT_CONFIG.port, 0, 65535),
    host: env['HOST']?.trim() || DEFAULT_CONFIG.host,
    maxTokens: integer(env, 'TREECQP_MAX_TOKENS', DEFAULT_CONFIG.maxTokens, 1),
    timeoutMs: integer(env, 'TREECQP_TIMEOUT_MS', DEFAULT_CONFIG.timeoutMs, 1),
    span: span ? span : undefined,
    logLevel: logLevel(env),
  };
}
