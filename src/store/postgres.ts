/**
 * PostgreSQL implementation of the record store.
 *
 * Single writer: the follow loop. Reads for the query surface share the same pool.
 */
import { Buffer } from 'node:buffer';
import type { DbRow, SqlExecutor, SqlValue } from '../db/pg.js';
import { getProgress, upsertProgress } from '../db/progress.js';
import { ensureSchema } from '../db/schema.js';
import { StoreWriteError } from '../errors.js';
import { excludedSet, makeMultiInsert } from './sql.js';
import type {
  DiscussionRow,
  GrantRow,
  GrantVoteFilter,
  GrantVoteRow,
  NewRow,
  Page,
  PageQuery,
  ProposalRow,
  ProposalVoteRow,
  RecordStore,
  ValidatorRow,
  VoteFilter,
} from './types.js';

const VALIDATOR_COLS = ['id', 'address', 'agent_url', 'stake'] as const;
const PROPOSAL_COLS = ['id', 'proposer_index', 'proposer_address', 'data', 'new_height', 'settle_height', 'status'] as const;
const GRANT_COLS = ['id', 'address', 'height', 'stake', 'proposer', 'proposer_address', 'grant'] as const;
const DISCUSSION_COLS = ['proposal', 'speaker_index', 'speaker_address', 'data', 'height', 'event_index'] as const;
const PROPOSAL_VOTE_COLS = ['proposal', 'voter_index', 'voter_address', 'height', 'vote'] as const;
const GRANT_VOTE_COLS = [
  'proposer_index',
  'proposer_address',
  'account_index',
  'account_addr',
  'voter_index',
  'voter_address',
  'height',
  'vote',
] as const;

function int(row: DbRow, key: string): number {
  const n = Number(row[key]);
  if (!Number.isSafeInteger(n)) throw new Error(`column ${key} is not an integer: ${String(row[key])}`);
  return n;
}

function text(row: DbRow, key: string): string {
  const v = row[key];
  return typeof v === 'string' ? v : v == null ? '' : String(v);
}

function bytes(row: DbRow, key: string): Uint8Array {
  const v = row[key];
  if (v instanceof Uint8Array) return new Uint8Array(v);
  if (typeof v === 'string' && v.startsWith('\\x')) return new Uint8Array(Buffer.from(v.slice(2), 'hex'));
  return new Uint8Array();
}

function toValidator(r: DbRow): ValidatorRow {
  return { id: int(r, 'id'), address: text(r, 'address'), agent_url: text(r, 'agent_url'), stake: int(r, 'stake') };
}

function toProposal(r: DbRow): ProposalRow {
  return {
    id: int(r, 'id'),
    proposer_index: int(r, 'proposer_index'),
    proposer_address: text(r, 'proposer_address'),
    data: bytes(r, 'data'),
    new_height: int(r, 'new_height'),
    settle_height: int(r, 'settle_height'),
    status: int(r, 'status'),
  };
}

function toGrant(r: DbRow): GrantRow {
  return {
    id: int(r, 'id'),
    address: text(r, 'address'),
    height: int(r, 'height'),
    stake: int(r, 'stake'),
    proposer: int(r, 'proposer'),
    proposer_address: text(r, 'proposer_address'),
    grant: r.grant === true,
  };
}

function toDiscussion(r: DbRow): DiscussionRow {
  return {
    id: int(r, 'id'),
    proposal: int(r, 'proposal'),
    speaker_index: int(r, 'speaker_index'),
    speaker_address: text(r, 'speaker_address'),
    data: bytes(r, 'data'),
    height: int(r, 'height'),
    event_index: int(r, 'event_index'),
  };
}

function toProposalVote(r: DbRow): ProposalVoteRow {
  return {
    id: int(r, 'id'),
    proposal: int(r, 'proposal'),
    voter_index: int(r, 'voter_index'),
    voter_address: text(r, 'voter_address'),
    height: int(r, 'height'),
    vote: int(r, 'vote'),
  };
}

function toGrantVote(r: DbRow): GrantVoteRow {
  return {
    id: int(r, 'id'),
    proposer_index: int(r, 'proposer_index'),
    proposer_address: text(r, 'proposer_address'),
    account_index: int(r, 'account_index'),
    account_addr: text(r, 'account_addr'),
    voter_index: int(r, 'voter_index'),
    voter_address: text(r, 'voter_address'),
    height: int(r, 'height'),
    vote: int(r, 'vote'),
  };
}

function bin(data: Uint8Array): Buffer {
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}

export type PgRecordStoreOptions = {
  schema: string;
  /** Called by close(); the pool is owned by whoever created it. */
  onClose?: () => Promise<void>;
};

export class PgRecordStore implements RecordStore {
  private readonly s: string;

  constructor(
    private readonly db: SqlExecutor,
    private readonly opts: PgRecordStoreOptions,
  ) {
    this.s = `"${opts.schema}"`;
  }

  async init(): Promise<void> {
    await ensureSchema(this.db, this.opts.schema);
  }

  async close(): Promise<void> {
    await this.opts.onClose?.();
  }

  // --- progress ---

  getProgress(progressId: string): Promise<number | null> {
    return getProgress(this.db, this.opts.schema, progressId);
  }

  async saveProgress(progressId: string, height: number): Promise<void> {
    await this.write('saveProgress', { height }, () => upsertProgress(this.db, this.opts.schema, progressId, height));
  }

  // --- validators ---

  async upsertValidator(row: ValidatorRow): Promise<void> {
    await this.upsert('validators', VALIDATOR_COLS, { ...row });
  }

  async getValidator(id: number): Promise<ValidatorRow | null> {
    return this.one(`SELECT * FROM ${this.s}.validators WHERE id = $1`, [id], toValidator);
  }

  // --- proposals ---

  async upsertProposal(row: ProposalRow): Promise<void> {
    await this.upsert('proposals', PROPOSAL_COLS, { ...row, data: bin(row.data) });
  }

  getProposal(id: number): Promise<ProposalRow | null> {
    return this.one(`SELECT * FROM ${this.s}.proposals WHERE id = $1`, [id], toProposal);
  }

  findProposalByNewHeight(height: number): Promise<ProposalRow | null> {
    return this.one(
      `SELECT * FROM ${this.s}.proposals WHERE new_height = $1 ORDER BY id ASC LIMIT 1`,
      [height],
      toProposal,
    );
  }

  findProposalBySettleHeight(height: number): Promise<ProposalRow | null> {
    return this.one(
      `SELECT * FROM ${this.s}.proposals WHERE settle_height = $1 ORDER BY id ASC LIMIT 1`,
      [height],
      toProposal,
    );
  }

  listProposals(page: PageQuery, proposerAddress?: string): Promise<Page<ProposalRow>> {
    return proposerAddress === undefined
      ? this.page('proposals', '', [], page, toProposal)
      : this.page('proposals', 'proposer_address = $1', [proposerAddress], page, toProposal);
  }

  // --- grants ---

  async upsertGrant(row: GrantRow): Promise<void> {
    await this.upsert('grants', GRANT_COLS, { ...row });
  }

  getGrant(id: number): Promise<GrantRow | null> {
    return this.one(`SELECT * FROM ${this.s}.grants WHERE id = $1`, [id], toGrant);
  }

  findGrantByHeight(height: number): Promise<GrantRow | null> {
    return this.one(`SELECT * FROM ${this.s}.grants WHERE height = $1 ORDER BY id ASC LIMIT 1`, [height], toGrant);
  }

  listGrants(page: PageQuery): Promise<Page<GrantRow>> {
    return this.page('grants', '', [], page, toGrant);
  }

  // --- discussions ---

  findDiscussion(height: number, eventIndex: number): Promise<number | null> {
    return this.one(
      `SELECT id FROM ${this.s}.discussions WHERE height = $1 AND event_index = $2`,
      [height, eventIndex],
      (r) => int(r, 'id'),
    );
  }

  insertDiscussion(row: NewRow<DiscussionRow>): Promise<number> {
    return this.insertReturningId('discussions', DISCUSSION_COLS, { ...row, data: bin(row.data) });
  }

  listDiscussions(proposal: number, page: PageQuery): Promise<Page<DiscussionRow>> {
    return this.page('discussions', 'proposal = $1', [proposal], page, toDiscussion);
  }

  // --- votes ---

  async hasProposalVote(height: number, voterIndex: number): Promise<boolean> {
    const res = await this.db.run(
      `SELECT 1 FROM ${this.s}.proposal_votes WHERE height = $1 AND voter_index = $2 LIMIT 1`,
      [height, voterIndex],
    );
    return res.rows.length > 0;
  }

  insertProposalVote(row: NewRow<ProposalVoteRow>): Promise<number> {
    return this.insertReturningId('proposal_votes', PROPOSAL_VOTE_COLS, { ...row });
  }

  listProposalVotes(filter: VoteFilter, page: PageQuery): Promise<Page<ProposalVoteRow>> {
    return 'proposal' in filter
      ? this.page('proposal_votes', 'proposal = $1', [filter.proposal], page, toProposalVote)
      : this.page('proposal_votes', 'voter_address = $1', [filter.voter], page, toProposalVote);
  }

  async hasGrantVote(height: number, voterIndex: number): Promise<boolean> {
    const res = await this.db.run(
      `SELECT 1 FROM ${this.s}.grant_votes WHERE height = $1 AND voter_index = $2 LIMIT 1`,
      [height, voterIndex],
    );
    return res.rows.length > 0;
  }

  insertGrantVote(row: NewRow<GrantVoteRow>): Promise<number> {
    return this.insertReturningId('grant_votes', GRANT_VOTE_COLS, { ...row });
  }

  listGrantVotes(filter: GrantVoteFilter, page: PageQuery): Promise<Page<GrantVoteRow>> {
    return 'grant' in filter
      ? this.page('grant_votes', 'account_index = $1', [filter.grant], page, toGrantVote)
      : this.page('grant_votes', 'voter_address = $1', [filter.voter], page, toGrantVote);
  }

  // --- helpers ---

  private async write<T>(operation: string, context: Record<string, unknown>, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new StoreWriteError(operation, err, context);
    }
  }

  private async upsert(table: string, cols: readonly string[], row: Record<string, SqlValue>): Promise<void> {
    const { text: sql, values } = makeMultiInsert(
      `${this.s}.${table}`,
      cols,
      [row],
      `ON CONFLICT (id) DO UPDATE SET ${excludedSet(cols)}`,
    );
    await this.write(`upsert ${table}`, { id: row.id }, () => this.db.run(sql, values));
  }

  private async insertReturningId(table: string, cols: readonly string[], row: Record<string, SqlValue>): Promise<number> {
    const { text: sql, values } = makeMultiInsert(`${this.s}.${table}`, cols, [row], 'RETURNING id');
    const res = await this.write(`insert ${table}`, {}, () => this.db.run(sql, values));
    const first = res.rows[0];
    if (!first) throw new StoreWriteError(`insert ${table}`, 'no id returned');
    return int(first, 'id');
  }

  private async one<T>(sql: string, values: SqlValue[], map: (r: DbRow) => T): Promise<T | null> {
    const res = await this.db.run(sql, values);
    const row = res.rows[0];
    return row ? map(row) : null;
  }

  private async page<T>(
    table: string,
    where: string,
    values: SqlValue[],
    page: PageQuery,
    map: (r: DbRow) => T,
  ): Promise<Page<T>> {
    const filter = where ? ` WHERE ${where}` : '';
    const n = values.length;
    const rows = await this.db.run(
      `SELECT * FROM ${this.s}.${table}${filter} ORDER BY id DESC OFFSET $${n + 1} LIMIT $${n + 2}`,
      [...values, page.offset, page.limit],
    );
    const count = await this.db.run(`SELECT count(*) AS total FROM ${this.s}.${table}${filter}`, values);
    const total = count.rows[0] ? int(count.rows[0], 'total') : 0;
    return { rows: rows.rows.map(map), total };
  }
}
