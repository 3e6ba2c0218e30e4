import { describe, expect, test } from 'vitest';
import {
  attributeMap,
  decodeChainEvent,
  decodeDiscussionEvent,
  decodeGrantEvent,
  decodeProposalEvent,
  decodeSettleProposalEvent,
  parseProposalEvent,
} from '../decode/events.js';
import { DecodeError } from '../errors.js';
import { b64, event } from './fakes.js';

const grantAttrs = {
  validator: '4',
  address: 'AABBCC',
  amount: '1000',
  proposer_index: '1',
  proposer_address: 'DDEEFF',
  grant: 'true',
};

describe('event decoder', () => {
  test('decodes a grant event', () => {
    expect(decodeGrantEvent(event('grant', { ...grantAttrs, agent_url: 'http://agent.local' }))).toEqual({
      kind: 'grant',
      validator: 4,
      address: 'AABBCC',
      amount: 1000,
      proposerIndex: 1,
      proposerAddress: 'DDEEFF',
      grant: true,
      agentUrl: 'http://agent.local',
    });
  });

  test('agent_url is optional on grants', () => {
    expect(decodeGrantEvent(event('grant', grantAttrs))?.agentUrl).toBe('');
  });

  test('decodes a proposal event with a base64 payload', () => {
    const ev = decodeProposalEvent(
      event('proposal', {
        proposal_index: '7',
        proposer: '3',
        proposer_address: 'ABCDEF',
        data: b64('raise the limit'),
        status: '1',
      }),
    );
    expect(ev?.proposalIndex).toBe(7);
    expect(ev?.proposer).toBe(3);
    expect(ev?.status).toBe(1);
    expect(Buffer.from(ev?.data ?? new Uint8Array()).toString('utf8')).toBe('raise the limit');
  });

  test('decodes discussion and settlement events', () => {
    expect(
      decodeDiscussionEvent(
        event('discussion', { proposal: '7', speaker: '2', speaker_address: 'A1B2', data: b64('hi') }),
      ),
    ).toEqual({
      kind: 'discussion',
      proposal: 7,
      speaker: 2,
      speakerAddress: 'A1B2',
      data: new Uint8Array(Buffer.from('hi')),
    });
    expect(decodeSettleProposalEvent(event('settle_proposal', { proposal: '7', state: '2' }))).toEqual({
      kind: 'settle_proposal',
      proposal: 7,
      state: 2,
    });
  });

  describe('rejects malformed events as a whole', () => {
    test('missing attribute', () => {
      expect(decodeSettleProposalEvent(event('settle_proposal', { proposal: '7' }))).toBeNull();
    });

    test('non-numeric integer', () => {
      expect(decodeSettleProposalEvent(event('settle_proposal', { proposal: 'seven', state: '2' }))).toBeNull();
    });

    test('negative integer', () => {
      expect(decodeSettleProposalEvent(event('settle_proposal', { proposal: '-1', state: '2' }))).toBeNull();
    });

    test('integer beyond the safe range', () => {
      expect(
        decodeSettleProposalEvent(event('settle_proposal', { proposal: '9007199254740993', state: '2' })),
      ).toBeNull();
    });

    test('boolean that is not true/false', () => {
      expect(decodeGrantEvent(event('grant', { ...grantAttrs, grant: 'yes' }))).toBeNull();
    });

    test('payload that is not base64', () => {
      expect(
        decodeDiscussionEvent(
          event('discussion', { proposal: '7', speaker: '2', speaker_address: 'A1B2', data: 'not base64!' }),
        ),
      ).toBeNull();
    });

    test('wrong event type for the decoder', () => {
      expect(decodeGrantEvent(event('proposal', grantAttrs))).toBeNull();
    });
  });

  test('parse functions report the reason', () => {
    expect(() => parseProposalEvent(event('proposal', { proposal_index: '7' }))).toThrow(DecodeError);
    expect(() => parseProposalEvent(event('proposal', { proposal_index: '7' }))).toThrow(
      'cannot decode proposal event: missing attribute "proposer"',
    );
  });

  test('accepts base64-encoded attribute pairs from older nodes', () => {
    const ev = event('settle_proposal', {});
    ev.attributes = [
      { key: b64('proposal'), value: b64('9') },
      { key: b64('state'), value: b64('3') },
    ];
    expect(decodeSettleProposalEvent(ev)).toEqual({ kind: 'settle_proposal', proposal: 9, state: 3 });
  });

  test('plain keys win over base64-encoded ones', () => {
    const ev = event('settle_proposal', { proposal: '5', state: '1' });
    ev.attributes.push({ key: b64('proposal'), value: b64('6') });
    expect(attributeMap(ev).get('proposal')).toBe('5');
  });

  test('decodeChainEvent dispatches on the type tag', () => {
    expect(decodeChainEvent(event('settle_proposal', { proposal: '1', state: '2' }))?.kind).toBe('settle_proposal');
    expect(decodeChainEvent(event('transfer', { amount: '1' }))).toBeNull();
  });
});
