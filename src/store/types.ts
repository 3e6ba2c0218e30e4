// src/store/types.ts
export type ValidatorRow = {
  id: number;
  address: string;
  agent_url: string;
  stake: number;
};

export type ProposalRow = {
  id: number;
  proposer_index: number;
  proposer_address: string;
  data: Uint8Array;
  new_height: number;
  /** 0 until the proposal is settled. */
  settle_height: number;
  status: number;
};

export type GrantRow = {
  /** Index of the validator the grant is about; one grant per validator. */
  id: number;
  address: string;
  height: number;
  stake: number;
  proposer: number;
  proposer_address: string;
  grant: boolean;
};

export type ProposalVoteRow = {
  id: number;
  proposal: number;
  voter_index: number;
  voter_address: string;
  height: number;
  vote: number;
};

export type GrantVoteRow = {
  id: number;
  proposer_index: number;
  proposer_address: string;
  account_index: number;
  account_addr: string;
  voter_index: number;
  voter_address: string;
  height: number;
  vote: number;
};

export type DiscussionRow = {
  id: number;
  proposal: number;
  speaker_index: number;
  speaker_address: string;
  data: Uint8Array;
  height: number;
  /** Ordinal of the event among those dispatched at `height`. */
  event_index: number;
};

/** Rows with a serial id are inserted without one. */
export type NewRow<T extends { id: number }> = Omit<T, 'id'>;

export type PageQuery = { offset: number; limit: number };

export type Page<T> = { rows: T[]; total: number };

export type VoteFilter = { proposal: number } | { voter: string };
export type GrantVoteFilter = { grant: number } | { voter: string };

/**
 * Persistence boundary of the indexer. All list operations order by descending id.
 */
export interface RecordStore {
  /** Creates schema and tables when missing. */
  init(): Promise<void>;
  close(): Promise<void>;

  getProgress(progressId: string): Promise<number | null>;
  /** Never lowers the stored height. */
  saveProgress(progressId: string, height: number): Promise<void>;

  upsertValidator(row: ValidatorRow): Promise<void>;
  getValidator(id: number): Promise<ValidatorRow | null>;

  upsertProposal(row: ProposalRow): Promise<void>;
  getProposal(id: number): Promise<ProposalRow | null>;
  findProposalByNewHeight(height: number): Promise<ProposalRow | null>;
  findProposalBySettleHeight(height: number): Promise<ProposalRow | null>;
  listProposals(page: PageQuery, proposerAddress?: string): Promise<Page<ProposalRow>>;

  upsertGrant(row: GrantRow): Promise<void>;
  getGrant(id: number): Promise<GrantRow | null>;
  findGrantByHeight(height: number): Promise<GrantRow | null>;
  listGrants(page: PageQuery): Promise<Page<GrantRow>>;

  /** Id of the discussion stored for the event at (height, eventIndex), if any. */
  findDiscussion(height: number, eventIndex: number): Promise<number | null>;
  insertDiscussion(row: NewRow<DiscussionRow>): Promise<number>;
  listDiscussions(proposal: number, page: PageQuery): Promise<Page<DiscussionRow>>;

  hasProposalVote(height: number, voterIndex: number): Promise<boolean>;
  insertProposalVote(row: NewRow<ProposalVoteRow>): Promise<number>;
  listProposalVotes(filter: VoteFilter, page: PageQuery): Promise<Page<ProposalVoteRow>>;

  hasGrantVote(height: number, voterIndex: number): Promise<boolean>;
  insertGrantVote(row: NewRow<GrantVoteRow>): Promise<number>;
  listGrantVotes(filter: GrantVoteFilter, page: PageQuery): Promise<Page<GrantVoteRow>>;
}
