/**
 * Read-side queries for governance consumers. Pages are numbered from 0 and
 * ordered newest first (descending id).
 */
import type {
  DiscussionRow,
  GrantRow,
  GrantVoteFilter,
  GrantVoteRow,
  Page,
  PageQuery,
  ProposalRow,
  ProposalVoteRow,
  RecordStore,
  ValidatorRow,
  VoteFilter,
} from '../store/types.js';

export const MAX_PAGE_SIZE = 100;

export type Paged<T> = Page<T> & { page: number; pageSize: number };

/** Clamps page to >= 0 and size to 1..100; non-integers are truncated. */
export function pageQuery(page: number, size: number): { page: number; pageSize: number } & PageQuery {
  const p = Number.isFinite(page) ? Math.max(0, Math.trunc(page)) : 0;
  const s = Number.isFinite(size) ? Math.min(MAX_PAGE_SIZE, Math.max(1, Math.trunc(size))) : MAX_PAGE_SIZE;
  return { page: p, pageSize: s, offset: p * s, limit: s };
}

export class ReadApi {
  constructor(
    private readonly store: RecordStore,
    private readonly progressId: string,
  ) {}

  listProposals(page: number, size: number, proposer?: string): Promise<Paged<ProposalRow>> {
    return this.paged(page, size, (q) => this.store.listProposals(q, proposer));
  }

  getProposal(id: number): Promise<ProposalRow | null> {
    return this.store.getProposal(id);
  }

  listDiscussions(proposal: number, page: number, size: number): Promise<Paged<DiscussionRow>> {
    return this.paged(page, size, (q) => this.store.listDiscussions(proposal, q));
  }

  listGrants(page: number, size: number): Promise<Paged<GrantRow>> {
    return this.paged(page, size, (q) => this.store.listGrants(q));
  }

  getGrant(id: number): Promise<GrantRow | null> {
    return this.store.getGrant(id);
  }

  listProposalVotes(filter: VoteFilter, page: number, size: number): Promise<Paged<ProposalVoteRow>> {
    return this.paged(page, size, (q) => this.store.listProposalVotes(filter, q));
  }

  listGrantVotes(filter: GrantVoteFilter, page: number, size: number): Promise<Paged<GrantVoteRow>> {
    return this.paged(page, size, (q) => this.store.listGrantVotes(filter, q));
  }

  getValidator(id: number): Promise<ValidatorRow | null> {
    return this.store.getValidator(id);
  }

  /** Last fully indexed height, or null before the first one. */
  getProgress(): Promise<number | null> {
    return this.store.getProgress(this.progressId);
  }

  private async paged<T>(page: number, size: number, load: (q: PageQuery) => Promise<Page<T>>): Promise<Paged<T>> {
    const q = pageQuery(page, size);
    const res = await load({ offset: q.offset, limit: q.limit });
    return { ...res, page: q.page, pageSize: q.pageSize };
  }
}
