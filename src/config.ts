/**
 * Configuration loading: `.env` (via dotenv) then process environment.
 */
import dotenv from 'dotenv';
import { ConfigError } from './errors.js';
import type { Config, LogLevel } from './types.js';
import { getLogger } from './utils/logger.js';

const log = getLogger('config');

type Env = Record<string, string | undefined>;

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'silent'];

function str(env: Env, key: string): string | undefined {
  const v = env[key];
  if (v === undefined) return undefined;
  const t = v.trim();
  return t.length > 0 ? t : undefined;
}

function int(env: Env, key: string, def: number, min = 0): number {
  const raw = str(env, key);
  if (raw === undefined) return def;
  if (!/^\d+$/.test(raw)) throw new ConfigError(key, raw, `an integer >= ${min}`);
  const n = Number(raw);
  if (!Number.isSafeInteger(n) || n < min) throw new ConfigError(key, raw, `an integer >= ${min}`);
  return n;
}

function ratio(env: Env, key: string, def: number): number {
  const raw = str(env, key);
  if (raw === undefined) return def;
  const n = Number(raw);
  if (!Number.isFinite(n) || n < 0 || n > 1) throw new ConfigError(key, raw, 'a number in [0, 1]');
  return n;
}

function bool(env: Env, key: string, def: boolean): boolean {
  const raw = str(env, key);
  if (raw === undefined) return def;
  const v = raw.toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(v)) return true;
  if (['0', 'false', 'no', 'off'].includes(v)) return false;
  throw new ConfigError(key, raw, 'a boolean');
}

function url(env: Env, key: string): string | undefined {
  const raw = str(env, key);
  if (raw === undefined) return undefined;
  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch {
    throw new ConfigError(key, raw, 'an http(s) URL');
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigError(key, raw, 'an http(s) URL');
  }
  return raw.replace(/\/+$/, '');
}

function logLevel(env: Env): LogLevel {
  const raw = str(env, 'LOG_LEVEL');
  if (raw === undefined) return 'info';
  const hit = LOG_LEVELS.find((l) => l === raw.toLowerCase());
  if (!hit) throw new ConfigError('LOG_LEVEL', raw, LOG_LEVELS.join('|'));
  return hit;
}

function identifier(env: Env, key: string, def: string): string {
  const raw = str(env, key);
  if (raw === undefined) return def;
  if (!/^[a-z_][a-z0-9_]{0,62}$/.test(raw)) throw new ConfigError(key, raw, 'a lowercase SQL identifier');
  return raw;
}

/**
 * Builds a {@link Config} from an environment map. Pure: tests pass their own map.
 */
export function resolveConfig(env: Env): Config {
  return {
    rpcUrl: url(env, 'RPC_URL') ?? 'http://127.0.0.1:26657',
    timeoutMs: int(env, 'RPC_TIMEOUT_MS', 15_000, 1),
    retries: int(env, 'RPC_RETRIES', 2),
    backoffMs: int(env, 'RPC_BACKOFF_MS', 250),
    backoffJitter: ratio(env, 'RPC_BACKOFF_JITTER', 0.2),
    startHeight: int(env, 'START_HEIGHT', 1, 1),
    tickIntervalMs: int(env, 'TICK_INTERVAL_MS', 1_000, 1),
    catchUpDelayMs: int(env, 'CATCH_UP_DELAY_MS', 100),
    includeFinalizeEvents: bool(env, 'INCLUDE_FINALIZE_EVENTS', false),
    logLevel: logLevel(env),
    pg: {
      connectionString: str(env, 'PG_CONNECTION_STRING'),
      host: str(env, 'PG_HOST'),
      port: int(env, 'PG_PORT', 5432, 1),
      user: str(env, 'PG_USER'),
      password: str(env, 'PG_PASSWORD'),
      database: str(env, 'PG_DB'),
      ssl: bool(env, 'PG_SSL', false),
      poolSize: int(env, 'PG_POOL_SIZE', 5, 1),
      schema: identifier(env, 'PG_SCHEMA', 'hac'),
      progressId: str(env, 'PROGRESS_ID') ?? 'default',
    },
    agent: {
      url: url(env, 'AGENT_URL') ?? null,
      timeoutMs: int(env, 'AGENT_TIMEOUT_MS', 30_000, 1),
    },
  };
}

let cached: Config | null = null;

export function getConfig(): Config {
  if (!cached) {
    dotenv.config();
    cached = resolveConfig(process.env);
  }
  return cached;
}

export function printConfig(cfg: Config): void {
  const pg = { ...cfg.pg, password: cfg.pg.password ? '***' : undefined };
  const connectionString = pg.connectionString?.replace(/\/\/([^:/@]+):[^@]*@/, '//$1:***@');
  log.info({ ...cfg, pg: { ...pg, connectionString } }, '[config] resolved');
}
