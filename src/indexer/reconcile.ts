/**
 * Turns the commit signatures of a height into vote rows for whatever
 * governance record was decided at that height.
 */
import type { RecordStore } from '../store/types.js';
import type { ChainConnection } from '../rpc/connection.js';
import type { CommitSignature } from '../rpc/client.js';
import { getLogger } from '../utils/logger.js';
import type { Account, AccountLookup } from './accounts.js';

const log = getLogger('indexer/reconcile');

export type ReconcileKind = 'proposal_new' | 'proposal_settle' | 'grant' | 'none';

export type ReconcileResult = {
  kind: ReconcileKind;
  /** Proposal or grant id the votes were recorded against; null when nothing matched. */
  id: number | null;
  inserted: number;
  /** Signatures that produced no row: absent validators and votes already recorded. */
  skipped: number;
};

type Signer = { account: Account; vote: number };

type Target =
  | { kind: 'proposal_new' | 'proposal_settle'; id: number; proposerIndex: number; proposerAddress: string }
  | { kind: 'grant'; id: number; address: string; proposerIndex: number; proposerAddress: string };

export class VoteReconciler {
  constructor(
    private readonly store: RecordStore,
    private readonly conn: ChainConnection,
    private readonly accounts: AccountLookup,
  ) {}

  /**
   * Idempotent: votes already stored for (height, voter) are left alone, so
   * running a height twice inserts nothing the second time. Throws when a
   * signer cannot be resolved; nothing is inserted for the height then.
   */
  async reconcile(height: number): Promise<ReconcileResult> {
    const target = await this.findTarget(height);
    if (!target) return { kind: 'none', id: null, inserted: 0, skipped: 0 };

    const commit = await this.conn.call((rpc) => rpc.fetchCommit(height));
    const present = commit.signatures.filter((s) => s.validatorAddress.length > 0);
    const signers = await this.resolveSigners(present);

    let inserted = 0;
    for (const { account, vote } of signers) {
      if (await this.recordVote(target, height, account, vote)) inserted++;
    }
    const skipped = commit.signatures.length - inserted;
    log.info(`[votes] height=${height} ${target.kind} #${target.id} inserted=${inserted} skipped=${skipped}`);
    return { kind: target.kind, id: target.id, inserted, skipped };
  }

  /** Creation, then settlement, then grant: only the first match gets votes. */
  private async findTarget(height: number): Promise<Target | null> {
    const created = await this.store.findProposalByNewHeight(height);
    if (created) {
      return {
        kind: 'proposal_new',
        id: created.id,
        proposerIndex: created.proposer_index,
        proposerAddress: created.proposer_address,
      };
    }
    const settled = await this.store.findProposalBySettleHeight(height);
    if (settled) {
      return {
        kind: 'proposal_settle',
        id: settled.id,
        proposerIndex: settled.proposer_index,
        proposerAddress: settled.proposer_address,
      };
    }
    const grant = await this.store.findGrantByHeight(height);
    if (grant) {
      return {
        kind: 'grant',
        id: grant.id,
        address: grant.address,
        proposerIndex: grant.proposer,
        proposerAddress: grant.proposer_address,
      };
    }
    return null;
  }

  private async resolveSigners(signatures: CommitSignature[]): Promise<Signer[]> {
    const out: Signer[] = [];
    for (const sig of signatures) {
      out.push({ account: await this.accounts.resolve(sig.validatorAddress), vote: sig.blockIdFlag });
    }
    return out;
  }

  private async recordVote(target: Target, height: number, voter: Account, vote: number): Promise<boolean> {
    if (target.kind === 'grant') {
      if (await this.store.hasGrantVote(height, voter.index)) return false;
      await this.store.insertGrantVote({
        proposer_index: target.proposerIndex,
        proposer_address: target.proposerAddress,
        account_index: target.id,
        account_addr: target.address,
        voter_index: voter.index,
        voter_address: voter.address,
        height,
        vote,
      });
      return true;
    }
    if (await this.store.hasProposalVote(height, voter.index)) return false;
    await this.store.insertProposalVote({
      proposal: target.id,
      voter_index: voter.index,
      voter_address: voter.address,
      height,
      vote,
    });
    return true;
  }
}
