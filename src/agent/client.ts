/**
 * Advisory agent: an external decision-support service that receives new
 * proposals and discussions and answers with comments and vote recommendations.
 */
import { AgentError } from '../errors.js';
import { asArray, asRecord, asString, isRecord } from '../utils/json.js';
import { getLogger } from '../utils/logger.js';

const log = getLogger('agent/client');

export type VoteRecommendation = { approve: boolean; reason: string };

export interface AdvisoryAgent {
  submitProposal(proposal: number, proposerAddress: string, text: string): Promise<void>;
  submitDiscussion(proposal: number, speakerAddress: string, text: string): Promise<void>;
  /** Asks the agent to comment on a proposal; resolves to the comment text. */
  requestComment(proposal: number, speakerAddress: string): Promise<string>;
  recommendProposalVote(proposal: number, voterAddress: string): Promise<VoteRecommendation>;
  recommendGrantVote(
    validator: number,
    proposerAddress: string,
    amount: number,
    statement: string,
  ): Promise<VoteRecommendation>;
}

/**
 * Stand-in used when no agent endpoint is configured: accepts everything,
 * approves everything, comments nothing.
 */
export class NoopAdvisoryAgent implements AdvisoryAgent {
  async submitProposal(): Promise<void> {}

  async submitDiscussion(): Promise<void> {}

  async requestComment(): Promise<string> {
    return '';
  }

  async recommendProposalVote(): Promise<VoteRecommendation> {
    return { approve: true, reason: '' };
  }

  async recommendGrantVote(): Promise<VoteRecommendation> {
    return { approve: true, reason: '' };
  }
}

export type HttpAdvisoryAgentOptions = {
  url: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
};

export function parseVoteRecommendation(body: unknown): VoteRecommendation {
  const r = asRecord(body);
  const vote = (asString(r.vote) ?? '').trim().toLowerCase();
  return { approve: vote === 'yes', reason: asString(r.reason) ?? '' };
}

export class HttpAdvisoryAgent implements AdvisoryAgent {
  private readonly base: string;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;

  private constructor(
    opts: HttpAdvisoryAgentOptions,
    readonly agentId: string,
  ) {
    this.base = opts.url.replace(/\/+$/, '');
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.timeoutMs = opts.timeoutMs;
  }

  /**
   * Discovers the agent id (first entry of `GET /agents`) and returns a client bound to it.
   */
  static async connect(opts: HttpAdvisoryAgentOptions): Promise<HttpAdvisoryAgent> {
    const probe = new HttpAdvisoryAgent(opts, '');
    const ids = await probe.listAgentIds();
    const first = ids[0];
    if (first === undefined) throw new AgentError('connect', 'no agent id', { url: opts.url });
    log.info(`[agent] using agent ${first} at ${opts.url}`);
    return new HttpAdvisoryAgent(opts, first);
  }

  async listAgentIds(): Promise<string[]> {
    const body = await this.request('listAgents', 'GET', `${this.base}/agents`);
    const agents = asArray(asRecord(body).agents);
    return agents
      .filter(isRecord)
      .map((a) => asString(a.id))
      .filter((id): id is string => id !== null && id.length > 0);
  }

  async submitProposal(proposal: number, proposerAddress: string, text: string): Promise<void> {
    await this.post('submitProposal', 'proposal', { proposalId: String(proposal), validatorAddress: proposerAddress, text });
    log.debug(`[agent] submitted proposal ${proposal}`);
  }

  async submitDiscussion(proposal: number, speakerAddress: string, text: string): Promise<void> {
    await this.post('submitDiscussion', 'discussion', {
      proposalId: String(proposal),
      validatorAddress: speakerAddress,
      text,
    });
    log.debug(`[agent] submitted discussion on proposal ${proposal}`);
  }

  async requestComment(proposal: number, speakerAddress: string): Promise<string> {
    const body = await this.post('requestComment', 'newdiscussion', {
      proposalId: String(proposal),
      validatorAddress: speakerAddress,
      text: 'comment',
    });
    if (typeof body === 'string') return body;
    const r = asRecord(body);
    return asString(r.text) ?? asString(r.comment) ?? JSON.stringify(body);
  }

  async recommendProposalVote(proposal: number, voterAddress: string): Promise<VoteRecommendation> {
    const body = await this.post('recommendProposalVote', 'voteproposal', {
      proposalId: String(proposal),
      validatorAddress: voterAddress,
      text: 'analyze proposal',
    });
    const rec = parseVoteRecommendation(body);
    log.info(`[agent] proposal ${proposal} voter=${voterAddress} approve=${rec.approve} reason=${rec.reason}`);
    return rec;
  }

  async recommendGrantVote(
    validator: number,
    proposerAddress: string,
    amount: number,
    statement: string,
  ): Promise<VoteRecommendation> {
    const body = await this.post('recommendGrantVote', 'votegrant', {
      grantId: String(validator),
      validatorAddress: proposerAddress,
      amount: String(amount),
      text: statement,
    });
    const rec = parseVoteRecommendation(body);
    log.info(`[agent] grant ${validator} proposer=${proposerAddress} approve=${rec.approve} reason=${rec.reason}`);
    return rec;
  }

  private post(operation: string, route: string, payload: Record<string, string>): Promise<unknown> {
    return this.request(operation, 'POST', `${this.base}/${this.agentId}/${route}`, payload);
  }

  /** Returns the parsed JSON body, or the raw text when the body is not JSON. */
  private async request(
    operation: string,
    method: 'GET' | 'POST',
    url: string,
    payload?: Record<string, string>,
  ): Promise<unknown> {
    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method,
        headers: payload ? { 'content-type': 'application/json' } : undefined,
        body: payload ? JSON.stringify(payload) : undefined,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new AgentError(operation, err, { url });
    }
    const raw = await res.text();
    if (!res.ok) throw new AgentError(operation, `HTTP ${res.status}`, { url, body: raw.slice(0, 200) });
    try {
      return JSON.parse(raw);
    } catch {
      return raw;
    }
  }
}
