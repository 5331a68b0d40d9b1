/**
 * Centralized configuration: resolves the Redmine endpoint, credentials, transport and paths
 * from the environment.
 *
 * Priority for each setting:
 *   1. Explicit CLI flag (applied by the caller on top of the loaded config)
 *   2. REDMINE_MCP_* variable
 *   3. Legacy unprefixed variable (REDMINE_TIMEOUT, LOG_LEVEL)
 *   4. Built-in default
 *
 * `.env` files are merged into process.env by the CLI before loadConfig() runs.
 */

import path from 'path';
import os from 'os';
import type { LogLevel, RedmineConfig, Transport } from '../shared/types.js';

// ─── Defaults ───────────────────────────────────────────────────────────────

export const DEFAULT_TIMEOUT_SECONDS = 30;
export const DEFAULT_HOST = '0.0.0.0';
export const DEFAULT_PORT = 8000;
export const DEFAULT_CACHE_DIR = path.join(os.homedir(), '.redmine_mcp');

const TRANSPORTS: readonly Transport[] = ['stdio', 'http'];
const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

type Env = Record<string, string | undefined>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ─── Helpers ────────────────────────────────────────────────────────────────

function required(env: Env, key: string): string {
  const value = env[key]?.trim();
  if (!value) throw new ConfigError(`Required environment variable ${key} is not set`);
  return value;
}

function firstSet(env: Env, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = env[key]?.trim();
    if (value) return value;
  }
  return undefined;
}

function parseInteger(raw: string, key: string): number {
  if (!/^-?\d+$/.test(raw)) throw new ConfigError(`${key} must be an integer (got "${raw}")`);
  return parseInt(raw, 10);
}

function isTransport(value: string): value is Transport {
  return TRANSPORTS.some(t => t === value);
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(l => l === value);
}

/** Also accepts WARNING and CRITICAL. */
function normalizeLogLevel(raw: string): string {
  const lower = raw.toLowerCase();
  if (lower === 'warning') return 'warn';
  if (lower === 'critical') return 'error';
  return lower;
}

export function normalizeDomain(raw: string): string {
  if (!/^https?:\/\//.test(raw)) {
    throw new ConfigError('REDMINE_DOMAIN must start with http:// or https://');
  }
  return raw.replace(/\/+$/, '');
}

// ─── Loading ────────────────────────────────────────────────────────────────

export function loadConfig(env: Env = process.env): RedmineConfig {
  const domain = normalizeDomain(required(env, 'REDMINE_DOMAIN'));
  const apiKey = required(env, 'REDMINE_API_KEY');

  const timeoutRaw = firstSet(env, 'REDMINE_MCP_TIMEOUT', 'REDMINE_TIMEOUT');
  const timeoutSeconds = timeoutRaw ? parseInteger(timeoutRaw, 'REDMINE_MCP_TIMEOUT') : DEFAULT_TIMEOUT_SECONDS;
  if (timeoutSeconds <= 0) throw new ConfigError('REDMINE_MCP_TIMEOUT must be greater than 0');

  const transport = (firstSet(env, 'REDMINE_MCP_TRANSPORT') || 'stdio').toLowerCase();
  if (!isTransport(transport)) {
    throw new ConfigError(`REDMINE_MCP_TRANSPORT must be one of: ${TRANSPORTS.join(', ')} (got "${transport}")`);
  }

  const portRaw = firstSet(env, 'REDMINE_MCP_PORT');
  const port = portRaw ? parseInteger(portRaw, 'REDMINE_MCP_PORT') : DEFAULT_PORT;
  if (port <= 0 || port > 65535) throw new ConfigError(`REDMINE_MCP_PORT must be between 1 and 65535 (got ${port})`);

  const logLevel = normalizeLogLevel(firstSet(env, 'REDMINE_MCP_LOG_LEVEL', 'LOG_LEVEL') || 'info');
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`Log level must be one of: ${LOG_LEVELS.join(', ')} (got "${logLevel}")`);
  }

  const cacheDirRaw = firstSet(env, 'REDMINE_MCP_CACHE_DIR');

  return {
    domain,
    apiKey,
    timeoutSeconds,
    transport,
    host: firstSet(env, 'REDMINE_MCP_HOST') || DEFAULT_HOST,
    port,
    logLevel,
    cacheDir: cacheDirRaw ? path.resolve(cacheDirRaw) : DEFAULT_CACHE_DIR,
  };
}

export function apiHeaders(config: Pick<RedmineConfig, 'apiKey'>): Record<string, string> {
  return {
    'X-Redmine-API-Key': config.apiKey,
    'Content-Type': 'application/json',
    Accept: 'application/json',
  };
}

/** Debug rendering that never includes the API key. */
export function describeConfig(config: RedmineConfig): string {
  return `RedmineConfig(domain='${config.domain}', timeout=${config.timeoutSeconds}s, transport='${config.transport}', host='${config.host}', port=${config.port}, log_level='${config.logLevel}', cache_dir='${config.cacheDir}')`;
}
