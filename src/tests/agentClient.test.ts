import { describe, expect, test } from 'vitest';
import { HttpAdvisoryAgent, NoopAdvisoryAgent, parseVoteRecommendation } from '../agent/client.js';
import { AgentError } from '../errors.js';

type Sent = { url: string; method: string; body: unknown };

function stubAgent(replies: Array<() => Response>) {
  const sent: Sent[] = [];
  const impl: typeof fetch = async (input, init) => {
    const raw = init?.body;
    sent.push({
      url: String(input),
      method: init?.method ?? 'GET',
      body: typeof raw === 'string' ? JSON.parse(raw) : null,
    });
    const next = replies.shift();
    if (!next) throw new TypeError('fetch failed');
    return next();
  };
  return { impl, sent };
}

const json = (body: unknown, status = 200) => () => new Response(JSON.stringify(body), { status });
const agents = json({ agents: [{ id: 'agent-1', name: 'first' }, { id: 'agent-2', name: 'second' }] });

async function connected(replies: Array<() => Response>) {
  const stub = stubAgent([agents, ...replies]);
  const agent = await HttpAdvisoryAgent.connect({ url: 'http://agent.test/', timeoutMs: 1000, fetchImpl: stub.impl });
  return { agent, sent: stub.sent };
}

describe('HttpAdvisoryAgent', () => {
  test('discovers the first agent id', async () => {
    const { agent, sent } = await connected([]);
    expect(agent.agentId).toBe('agent-1');
    expect(sent).toEqual([{ url: 'http://agent.test/agents', method: 'GET', body: null }]);
  });

  test('no agent ids is a startup error', async () => {
    const stub = stubAgent([json({ agents: [] })]);
    const err = await HttpAdvisoryAgent.connect({ url: 'http://agent.test', timeoutMs: 1000, fetchImpl: stub.impl }).catch(
      (e: unknown) => e,
    );
    expect(err).toBeInstanceOf(AgentError);
    expect(err instanceof Error && err.message).toBe('agent connect failed: no agent id');
  });

  test('submits proposals and discussions', async () => {
    const { agent, sent } = await connected([json({ ok: true }), json({ ok: true })]);
    await agent.submitProposal(7, 'AA03', 'fund the relayers');
    await agent.submitDiscussion(7, 'AA02', 'agreed');
    expect(sent.slice(1)).toEqual([
      {
        url: 'http://agent.test/agent-1/proposal',
        method: 'POST',
        body: { proposalId: '7', validatorAddress: 'AA03', text: 'fund the relayers' },
      },
      {
        url: 'http://agent.test/agent-1/discussion',
        method: 'POST',
        body: { proposalId: '7', validatorAddress: 'AA02', text: 'agreed' },
      },
    ]);
  });

  test('requestComment returns the comment text', async () => {
    const { agent, sent } = await connected([json({ text: 'needs a budget' }), () => new Response('plain words')]);
    await expect(agent.requestComment(7, 'AA03')).resolves.toBe('needs a budget');
    await expect(agent.requestComment(7, 'AA03')).resolves.toBe('plain words');
    expect(sent[1]).toEqual({
      url: 'http://agent.test/agent-1/newdiscussion',
      method: 'POST',
      body: { proposalId: '7', validatorAddress: 'AA03', text: 'comment' },
    });
  });

  test('proposal vote recommendation', async () => {
    const { agent, sent } = await connected([json({ vote: 'yes', reason: 'in scope' }), json({ vote: 'no', reason: 'too costly' })]);
    await expect(agent.recommendProposalVote(7, 'AA01')).resolves.toEqual({ approve: true, reason: 'in scope' });
    await expect(agent.recommendProposalVote(7, 'AA01')).resolves.toEqual({ approve: false, reason: 'too costly' });
    expect(sent[1]).toEqual({
      url: 'http://agent.test/agent-1/voteproposal',
      method: 'POST',
      body: { proposalId: '7', validatorAddress: 'AA01', text: 'analyze proposal' },
    });
  });

  test('grant vote recommendation', async () => {
    const { agent, sent } = await connected([json({ vote: 'yes', reason: '' })]);
    await expect(agent.recommendGrantVote(4, 'AA02', 500, 'reliable operator')).resolves.toEqual({
      approve: true,
      reason: '',
    });
    expect(sent[1]).toEqual({
      url: 'http://agent.test/agent-1/votegrant',
      method: 'POST',
      body: { grantId: '4', validatorAddress: 'AA02', amount: '500', text: 'reliable operator' },
    });
  });

  test('HTTP errors become AgentError', async () => {
    const { agent } = await connected([() => new Response('boom', { status: 500 })]);
    await expect(agent.submitProposal(7, 'AA03', 'x')).rejects.toThrow('agent submitProposal failed: HTTP 500');
  });

  test('network errors become AgentError', async () => {
    const { agent } = await connected([]);
    await expect(agent.submitDiscussion(7, 'AA02', 'x')).rejects.toThrow(AgentError);
  });
});

describe('parseVoteRecommendation', () => {
  test('only "yes" approves', () => {
    expect(parseVoteRecommendation({ vote: ' YES ' })).toEqual({ approve: true, reason: '' });
    expect(parseVoteRecommendation({ vote: 'abstain', reason: 'unclear' })).toEqual({ approve: false, reason: 'unclear' });
    expect(parseVoteRecommendation('yes')).toEqual({ approve: false, reason: '' });
  });
});

describe('NoopAdvisoryAgent', () => {
  test('approves everything and comments nothing', async () => {
    const agent = new NoopAdvisoryAgent();
    await expect(agent.submitProposal()).resolves.toBeUndefined();
    await expect(agent.requestComment()).resolves.toBe('');
    await expect(agent.recommendProposalVote()).resolves.toEqual({ approve: true, reason: '' });
    await expect(agent.recommendGrantVote()).resolves.toEqual({ approve: true, reason: '' });
  });
});
