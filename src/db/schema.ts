/**
 * Idempotent schema creation, run once at startup.
 */
import type { SqlExecutor } from './pg.js';
import { getLogger } from '../utils/logger.js';

const log = getLogger('db/schema');

// Unique lock id ('hacs') so two indexers starting together do not race on DDL.
const SCHEMA_LOCK_ID = 0x68616373;

export function schemaStatements(schema: string): string[] {
  const s = `"${schema}"`;
  return [
    `CREATE SCHEMA IF NOT EXISTS ${s}`,
    `CREATE TABLE IF NOT EXISTS ${s}.index_progress (
      id TEXT PRIMARY KEY,
      height BIGINT NOT NULL,
      updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
    )`,
    `CREATE TABLE IF NOT EXISTS ${s}.validators (
      id BIGINT PRIMARY KEY,
      address TEXT NOT NULL,
      agent_url TEXT NOT NULL DEFAULT '',
      stake BIGINT NOT NULL DEFAULT 0
    )`,
    `CREATE TABLE IF NOT EXISTS ${s}.proposals (
      id BIGINT PRIMARY KEY,
      proposer_index BIGINT NOT NULL,
      proposer_address TEXT NOT NULL,
      data BYTEA NOT NULL,
      new_height BIGINT NOT NULL,
      settle_height BIGINT NOT NULL DEFAULT 0,
      status BIGINT NOT NULL DEFAULT 0
    )`,
    `CREATE INDEX IF NOT EXISTS proposals_new_height_idx ON ${s}.proposals (new_height)`,
    `CREATE INDEX IF NOT EXISTS proposals_settle_height_idx ON ${s}.proposals (settle_height)`,
    `CREATE INDEX IF NOT EXISTS proposals_proposer_address_idx ON ${s}.proposals (proposer_address)`,
    `CREATE TABLE IF NOT EXISTS ${s}.grants (
      id BIGINT PRIMARY KEY,
      address TEXT NOT NULL,
      height BIGINT NOT NULL,
      stake BIGINT NOT NULL DEFAULT 0,
      proposer BIGINT NOT NULL,
      proposer_address TEXT NOT NULL,
      "grant" BOOLEAN NOT NULL
    )`,
    `CREATE INDEX IF NOT EXISTS grants_height_idx ON ${s}.grants (height)`,
    `CREATE TABLE IF NOT EXISTS ${s}.discussions (
      id BIGSERIAL PRIMARY KEY,
      proposal BIGINT NOT NULL,
      speaker_index BIGINT NOT NULL,
      speaker_address TEXT NOT NULL,
      data BYTEA NOT NULL,
      height BIGINT NOT NULL,
      event_index INTEGER NOT NULL
    )`,
    `CREATE INDEX IF NOT EXISTS discussions_proposal_idx ON ${s}.discussions (proposal)`,
    `CREATE UNIQUE INDEX IF NOT EXISTS discussions_height_event_idx ON ${s}.discussions (height, event_index)`,
    `CREATE TABLE IF NOT EXISTS ${s}.proposal_votes (
      id BIGSERIAL PRIMARY KEY,
      proposal BIGINT NOT NULL,
      voter_index BIGINT NOT NULL,
      voter_address TEXT NOT NULL,
      height BIGINT NOT NULL,
      vote BIGINT NOT NULL
    )`,
    `CREATE INDEX IF NOT EXISTS proposal_votes_height_voter_idx ON ${s}.proposal_votes (height, voter_index)`,
    `CREATE INDEX IF NOT EXISTS proposal_votes_proposal_idx ON ${s}.proposal_votes (proposal)`,
    `CREATE INDEX IF NOT EXISTS proposal_votes_voter_address_idx ON ${s}.proposal_votes (voter_address)`,
    `CREATE TABLE IF NOT EXISTS ${s}.grant_votes (
      id BIGSERIAL PRIMARY KEY,
      proposer_index BIGINT NOT NULL,
      proposer_address TEXT NOT NULL,
      account_index BIGINT NOT NULL,
      account_addr TEXT NOT NULL,
      voter_index BIGINT NOT NULL,
      voter_address TEXT NOT NULL,
      height BIGINT NOT NULL,
      vote BIGINT NOT NULL
    )`,
    `CREATE INDEX IF NOT EXISTS grant_votes_height_voter_idx ON ${s}.grant_votes (height, voter_index)`,
    `CREATE INDEX IF NOT EXISTS grant_votes_account_idx ON ${s}.grant_votes (account_index)`,
    `CREATE INDEX IF NOT EXISTS grant_votes_voter_address_idx ON ${s}.grant_votes (voter_address)`,
  ];
}

/**
 * Sends the DDL as one multi-statement query: Postgres runs it as a single implicit
 * transaction on one connection, and the transaction-scoped advisory lock is
 * released when it commits or rolls back.
 */
export async function ensureSchema(db: SqlExecutor, schema: string): Promise<void> {
  const script = [
    `SELECT pg_advisory_xact_lock(${SCHEMA_LOCK_ID})`,
    ...schemaStatements(schema),
  ].join(';\n');
  await db.run(script);
  log.info(`[schema] ensured schema "${schema}"`);
}
