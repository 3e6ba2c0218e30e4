// src/types.ts
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Application configuration resolved from environment variables (and `.env`) with defaults.
 */
export type Config = {
  /** CometBFT RPC endpoint URL (http/https). */
  rpcUrl: string;
  /** HTTP request timeout in milliseconds. */
  timeoutMs: number;
  /** Retry attempts for transient network failures. */
  retries: number;
  /** Initial backoff (ms) for retries. */
  backoffMs: number;
  /** Jitter factor [0..1] applied to backoff. */
  backoffJitter: number;
  /** First height to index when no progress is persisted yet. */
  startHeight: number;
  /** Delay between ticks of the follow loop. */
  tickIntervalMs: number;
  /** Delay between consecutive heights while catching up. */
  catchUpDelayMs: number;
  /** Also dispatch block-level `finalize_block_events`, not only tx events. */
  includeFinalizeEvents: boolean;
  logLevel: LogLevel;
  pg: PgConfig;
  agent: {
    /** Base URL of the advisory agent service; when absent the no-op agent is used. */
    url: string | null;
    timeoutMs: number;
  };
};

export type PgConfig = {
  connectionString?: string;
  host?: string;
  port?: number;
  user?: string;
  password?: string;
  database?: string;
  ssl?: boolean;
  poolSize: number;
  /** Schema holding every table of the index. */
  schema: string;
  /** Key of the IndexProgress row. */
  progressId: string;
};
