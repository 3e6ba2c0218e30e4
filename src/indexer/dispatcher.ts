/**
 * Routes decoded governance events to their handlers. One handler per event
 * tag; the map is built once and never changes.
 */
import type { AdvisoryAgent } from '../agent/client.js';
import {
  decodeDiscussionEvent,
  decodeGrantEvent,
  decodeProposalEvent,
  decodeSettleProposalEvent,
  EVENT_DISCUSSION,
  EVENT_GRANT,
  EVENT_PROPOSAL,
  EVENT_SETTLE_PROPOSAL,
  type EventTag,
} from '../decode/events.js';
import { IndexerError, StateInconsistencyError } from '../errors.js';
import type { AbciEvent } from '../rpc/client.js';
import type { RecordStore } from '../store/types.js';
import { bytesToUtf8 } from '../utils/bytes.js';
import { errMsg, getLogger } from '../utils/logger.js';

const log = getLogger('indexer/dispatcher');

/**
 * - `handled`: the handler ran to completion
 * - `ignored`: no handler for the tag
 * - `skipped`: the event did not decode
 * - `failed`: the handler threw; the error was logged
 */
export type DispatchOutcome = 'handled' | 'ignored' | 'skipped' | 'failed';

type Handler = (event: AbciEvent, height: number, eventIndex: number) => Promise<Exclude<DispatchOutcome, 'ignored' | 'failed'>>;

export class EventDispatcher {
  private readonly handlers: ReadonlyMap<string, Handler>;

  constructor(
    private readonly store: RecordStore,
    private readonly agent: AdvisoryAgent,
  ) {
    this.handlers = new Map<string, Handler>([
      [EVENT_GRANT, (e, h) => this.onGrant(e, h)],
      [EVENT_DISCUSSION, (e, h, i) => this.onDiscussion(e, h, i)],
      [EVENT_PROPOSAL, (e, h) => this.onProposal(e, h)],
      [EVENT_SETTLE_PROPOSAL, (e, h) => this.onSettleProposal(e, h)],
    ]);
  }

  /**
   * Runs the handler registered for `tag`. Never throws: handler failures are
   * logged so that sibling events at the same height still get processed.
   * `eventIndex` is the event's ordinal among those dispatched at `height`.
   */
  async dispatch(tag: string, event: AbciEvent, height: number, eventIndex: number): Promise<DispatchOutcome> {
    const handler = this.handlers.get(tag);
    if (!handler) return 'ignored';
    try {
      return await handler(event, height, eventIndex);
    } catch (err) {
      const context = err instanceof IndexerError ? err.context : {};
      log.error({ ...context, height, tag }, `[dispatch] ${tag} handler failed: ${errMsg(err)}`);
      return 'failed';
    }
  }

  private async onGrant(raw: AbciEvent, height: number): Promise<'handled' | 'skipped'> {
    const ev = decodeGrantEvent(raw);
    if (!ev) return this.skip(EVENT_GRANT, height);

    await this.store.upsertGrant({
      id: ev.validator,
      address: ev.address,
      height,
      stake: ev.amount,
      proposer: ev.proposerIndex,
      proposer_address: ev.proposerAddress,
      grant: ev.grant,
    });
    await this.store.upsertValidator({
      id: ev.validator,
      address: ev.address,
      agent_url: ev.agentUrl,
      stake: ev.amount,
    });
    log.info(`[grant] validator=${ev.validator} grant=${ev.grant} proposer=${ev.proposerIndex} height=${height}`);
    return 'handled';
  }

  private async onDiscussion(raw: AbciEvent, height: number, eventIndex: number): Promise<'handled' | 'skipped'> {
    const ev = decodeDiscussionEvent(raw);
    if (!ev) return this.skip(EVENT_DISCUSSION, height);

    // A height replayed after a crash carries the same events at the same ordinals.
    const existing = await this.store.findDiscussion(height, eventIndex);
    if (existing !== null) {
      log.debug(`[discussion] #${existing} already stored, height=${height} event=${eventIndex}`);
      return 'handled';
    }
    const id = await this.store.insertDiscussion({
      proposal: ev.proposal,
      speaker_index: ev.speaker,
      speaker_address: ev.speakerAddress,
      data: ev.data,
      height,
      event_index: eventIndex,
    });
    log.info(`[discussion] #${id} proposal=${ev.proposal} speaker=${ev.speaker} height=${height}`);

    await this.advise('submitDiscussion', () =>
      this.agent.submitDiscussion(ev.proposal, ev.speakerAddress, bytesToUtf8(ev.data)),
    );
    return 'handled';
  }

  private async onProposal(raw: AbciEvent, height: number): Promise<'handled' | 'skipped'> {
    const ev = decodeProposalEvent(raw);
    if (!ev) return this.skip(EVENT_PROPOSAL, height);

    const stored = await this.store.getProposal(ev.proposalIndex);
    if (stored && stored.settle_height !== 0) {
      throw new StateInconsistencyError(`proposal #${ev.proposalIndex} already settled at ${stored.settle_height}`, {
        proposal: ev.proposalIndex,
        settleHeight: stored.settle_height,
      });
    }

    await this.store.upsertProposal({
      id: ev.proposalIndex,
      proposer_index: ev.proposer,
      proposer_address: ev.proposerAddress,
      data: ev.data,
      new_height: height,
      settle_height: 0,
      status: ev.status,
    });
    log.info(`[proposal] #${ev.proposalIndex} proposer=${ev.proposer} status=${ev.status} height=${height}`);

    await this.advise('submitProposal', () =>
      this.agent.submitProposal(ev.proposalIndex, ev.proposerAddress, bytesToUtf8(ev.data)),
    );
    const comment = await this.advise('requestComment', () =>
      this.agent.requestComment(ev.proposalIndex, ev.proposerAddress),
    );
    if (comment) log.info(`[agent] comment on proposal #${ev.proposalIndex}: ${comment}`);
    return 'handled';
  }

  private async onSettleProposal(raw: AbciEvent, height: number): Promise<'handled' | 'skipped'> {
    const ev = decodeSettleProposalEvent(raw);
    if (!ev) return this.skip(EVENT_SETTLE_PROPOSAL, height);

    const proposal = await this.store.getProposal(ev.proposal);
    if (!proposal) {
      throw new StateInconsistencyError(`settlement for unknown proposal #${ev.proposal}`, {
        proposal: ev.proposal,
      });
    }
    if (proposal.settle_height !== 0 && proposal.settle_height !== height) {
      throw new StateInconsistencyError(`proposal #${ev.proposal} already settled at ${proposal.settle_height}`, {
        proposal: ev.proposal,
        settleHeight: proposal.settle_height,
      });
    }

    await this.store.upsertProposal({ ...proposal, status: ev.state, settle_height: height });
    log.info(`[proposal] #${ev.proposal} settled state=${ev.state} height=${height}`);
    return 'handled';
  }

  private skip(tag: EventTag, height: number): 'skipped' {
    log.warn({ height, tag }, `[dispatch] malformed ${tag} event skipped`);
    return 'skipped';
  }

  /** Agent calls are advisory: a failure is logged and the handler carries on. */
  private async advise<T>(operation: string, fn: () => Promise<T>): Promise<T | null> {
    try {
      return await fn();
    } catch (err) {
      log.warn(`[agent] ${operation} failed: ${errMsg(err)}`);
      return null;
    }
  }
}
