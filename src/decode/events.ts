/**
 * Decoding of the governance events emitted by the chain application.
 *
 * Each decoder is total over its attribute schema: either every required
 * attribute is present and well-formed and a typed event comes back, or the
 * event is rejected as a whole.
 */
import { DecodeError } from '../errors.js';
import type { AbciEvent } from '../rpc/client.js';
import { base64ToBytes, bytesToUtf8, isBase64 } from '../utils/bytes.js';

export const EVENT_GRANT = 'grant';
export const EVENT_DISCUSSION = 'discussion';
export const EVENT_PROPOSAL = 'proposal';
export const EVENT_SETTLE_PROPOSAL = 'settle_proposal';

export type EventTag =
  | typeof EVENT_GRANT
  | typeof EVENT_DISCUSSION
  | typeof EVENT_PROPOSAL
  | typeof EVENT_SETTLE_PROPOSAL;

export type GrantEvent = {
  kind: typeof EVENT_GRANT;
  /** Index of the validator the grant is about. */
  validator: number;
  address: string;
  amount: number;
  proposerIndex: number;
  proposerAddress: string;
  /** true admits the validator, false removes it. */
  grant: boolean;
  agentUrl: string;
};

export type DiscussionEvent = {
  kind: typeof EVENT_DISCUSSION;
  proposal: number;
  speaker: number;
  speakerAddress: string;
  data: Uint8Array;
};

export type ProposalEvent = {
  kind: typeof EVENT_PROPOSAL;
  proposalIndex: number;
  proposer: number;
  proposerAddress: string;
  data: Uint8Array;
  status: number;
};

export type SettleProposalEvent = {
  kind: typeof EVENT_SETTLE_PROPOSAL;
  proposal: number;
  state: number;
};

export type ChainEvent = GrantEvent | DiscussionEvent | ProposalEvent | SettleProposalEvent;

const KEY_RE = /^[a-z_][a-z0-9_]*$/;

/**
 * Attribute map for an event. Plain keys win; base64-encoded pairs (nodes before
 * CometBFT 0.38) only fill keys that are still missing.
 */
export function attributeMap(event: AbciEvent): Map<string, string> {
  const out = new Map<string, string>();
  for (const a of event.attributes) {
    if (!out.has(a.key)) out.set(a.key, a.value);
  }
  for (const a of event.attributes) {
    if (!a.key || !isBase64(a.key)) continue;
    const key = bytesToUtf8(base64ToBytes(a.key));
    if (!KEY_RE.test(key) || out.has(key)) continue;
    out.set(key, isBase64(a.value) ? bytesToUtf8(base64ToBytes(a.value)) : a.value);
  }
  return out;
}

class AttrReader {
  private readonly attrs: Map<string, string>;

  constructor(private readonly event: AbciEvent) {
    this.attrs = attributeMap(event);
  }

  private raw(key: string): string {
    const v = this.attrs.get(key);
    if (v === undefined) throw new DecodeError(this.event.type, `missing attribute "${key}"`);
    return v;
  }

  uint(key: string): number {
    const v = this.raw(key).trim();
    const n = Number(v);
    if (!/^\d+$/.test(v) || !Number.isSafeInteger(n)) {
      throw new DecodeError(this.event.type, `attribute "${key}" is not an unsigned integer`, { value: v });
    }
    return n;
  }

  text(key: string): string {
    const v = this.raw(key).trim();
    if (v.length === 0) throw new DecodeError(this.event.type, `attribute "${key}" is empty`);
    return v;
  }

  optionalText(key: string): string {
    return (this.attrs.get(key) ?? '').trim();
  }

  bool(key: string): boolean {
    const v = this.raw(key).trim();
    if (v === 'true') return true;
    if (v === 'false') return false;
    throw new DecodeError(this.event.type, `attribute "${key}" is not a boolean`, { value: v });
  }

  bytes(key: string): Uint8Array {
    const v = this.raw(key).trim();
    if (!isBase64(v)) throw new DecodeError(this.event.type, `attribute "${key}" is not base64`);
    return base64ToBytes(v);
  }
}

function expectType(event: AbciEvent, tag: EventTag): AttrReader {
  if (event.type !== tag) throw new DecodeError(event.type, `expected event type "${tag}"`);
  return new AttrReader(event);
}

export function parseGrantEvent(event: AbciEvent): GrantEvent {
  const r = expectType(event, EVENT_GRANT);
  return {
    kind: EVENT_GRANT,
    validator: r.uint('validator'),
    address: r.text('address'),
    amount: r.uint('amount'),
    proposerIndex: r.uint('proposer_index'),
    proposerAddress: r.text('proposer_address'),
    grant: r.bool('grant'),
    agentUrl: r.optionalText('agent_url'),
  };
}

export function parseDiscussionEvent(event: AbciEvent): DiscussionEvent {
  const r = expectType(event, EVENT_DISCUSSION);
  return {
    kind: EVENT_DISCUSSION,
    proposal: r.uint('proposal'),
    speaker: r.uint('speaker'),
    speakerAddress: r.text('speaker_address'),
    data: r.bytes('data'),
  };
}

export function parseProposalEvent(event: AbciEvent): ProposalEvent {
  const r = expectType(event, EVENT_PROPOSAL);
  return {
    kind: EVENT_PROPOSAL,
    proposalIndex: r.uint('proposal_index'),
    proposer: r.uint('proposer'),
    proposerAddress: r.text('proposer_address'),
    data: r.bytes('data'),
    status: r.uint('status'),
  };
}

export function parseSettleProposalEvent(event: AbciEvent): SettleProposalEvent {
  const r = expectType(event, EVENT_SETTLE_PROPOSAL);
  return {
    kind: EVENT_SETTLE_PROPOSAL,
    proposal: r.uint('proposal'),
    state: r.uint('state'),
  };
}

const PARSERS: Record<EventTag, (event: AbciEvent) => ChainEvent> = {
  [EVENT_GRANT]: parseGrantEvent,
  [EVENT_DISCUSSION]: parseDiscussionEvent,
  [EVENT_PROPOSAL]: parseProposalEvent,
  [EVENT_SETTLE_PROPOSAL]: parseSettleProposalEvent,
};

export function isEventTag(type: string): type is EventTag {
  return Object.prototype.hasOwnProperty.call(PARSERS, type);
}

function orNull<T>(parse: (event: AbciEvent) => T): (event: AbciEvent) => T | null {
  return (event) => {
    try {
      return parse(event);
    } catch (err) {
      if (err instanceof DecodeError) return null;
      throw err;
    }
  };
}

export const decodeGrantEvent = orNull(parseGrantEvent);
export const decodeDiscussionEvent = orNull(parseDiscussionEvent);
export const decodeProposalEvent = orNull(parseProposalEvent);
export const decodeSettleProposalEvent = orNull(parseSettleProposalEvent);

/**
 * Decodes any recognized governance event. Returns `null` for unknown types and
 * for malformed events of known types.
 */
export function decodeChainEvent(event: AbciEvent): ChainEvent | null {
  if (!isEventTag(event.type)) return null;
  return orNull(PARSERS[event.type])(event);
}
