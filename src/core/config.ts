import { ConfigurationError } from './errors';
import { ClientOptions } from './types';

export const DEFAULT_REDIS_URL = 'redis://localhost:6379/0';
export const DEFAULT_QUEUE_NAME = 'default';
export const DEFAULT_JOB_TIMEOUT_MS = 60 * 60 * 1000;
export const DEFAULT_CONNECT_TIMEOUT_MS = 5000;
// Largest delay a Node timer can hold (about 24.8 days)
export const MAX_JOB_TIMEOUT_MS = 2_147_483_647;

export type Env = Record<string, string | undefined>;

export interface ResolvedClientConfig {
  url: string;
  queueName: string;
  defaultTimeoutMs: number;
  connectTimeoutMs: number;
}

export interface BackendAddress {
  host: string;
  port: number;
  db: number;
  username?: string;
  password?: string;
  tls: boolean;
}

function present(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Explicit address, then REDIS_URL, then the local default.
 */
export function resolveBackendUrl(override?: string, env: Env = process.env): string {
  return present(override) ?? present(env.REDIS_URL) ?? DEFAULT_REDIS_URL;
}

export function parseBackendUrl(url: string): BackendAddress {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ConfigurationError(`Invalid backend URL: ${url}`);
  }

  if (parsed.protocol !== 'redis:' && parsed.protocol !== 'rediss:') {
    throw new ConfigurationError(`Unsupported backend scheme "${parsed.protocol}" (expected redis: or rediss:)`);
  }
  if (!parsed.hostname) {
    throw new ConfigurationError(`Backend URL has no host: ${url}`);
  }

  const port = parsed.port ? Number(parsed.port) : 6379;

  const dbPart = parsed.pathname.replace(/^\//, '');
  const db = dbPart === '' ? 0 : Number(dbPart);
  if (!Number.isInteger(db) || db < 0) {
    throw new ConfigurationError(`Invalid database index "${dbPart}" in backend URL`);
  }

  return {
    host: parsed.hostname,
    port,
    db,
    username: parsed.username ? decodeURIComponent(parsed.username) : undefined,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
    tls: parsed.protocol === 'rediss:',
  };
}

function positiveInt(raw: string | undefined, name: string): number | undefined {
  const value = present(raw);
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

export function resolveClientConfig(options: ClientOptions = {}, env: Env = process.env): ResolvedClientConfig {
  const defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_JOB_TIMEOUT_MS;
  if (!Number.isInteger(defaultTimeoutMs) || defaultTimeoutMs <= 0) {
    throw new ConfigurationError(`defaultTimeoutMs must be a positive integer, got ${defaultTimeoutMs}`);
  }
  if (defaultTimeoutMs > MAX_JOB_TIMEOUT_MS) {
    throw new ConfigurationError(`defaultTimeoutMs must not exceed ${MAX_JOB_TIMEOUT_MS} ms, got ${defaultTimeoutMs}`);
  }

  return {
    url: resolveBackendUrl(options.url, env),
    queueName: present(options.queueName) ?? present(env.JOB_QUEUE_NAME) ?? DEFAULT_QUEUE_NAME,
    defaultTimeoutMs,
    connectTimeoutMs:
      options.connectTimeoutMs ??
      positiveInt(env.JOB_QUEUE_CONNECT_TIMEOUT_MS, 'JOB_QUEUE_CONNECT_TIMEOUT_MS') ??
      DEFAULT_CONNECT_TIMEOUT_MS,
  };
}
