/**
 * CometBFT JSON-RPC client over HTTP (URI style: `GET /method?param=...`).
 */
import { RpcResponseError, RpcTransportError } from '../errors.js';
import { asArray, asRecord, asString, asUint, isRecord, type JsonRecord } from '../utils/json.js';
import { getLogger } from '../utils/logger.js';
import { backoffDelay, sleep } from '../utils/time.js';

const log = getLogger('rpc/client');

export type AbciEventAttribute = { key: string; value: string };
export type AbciEvent = { type: string; attributes: AbciEventAttribute[] };

export type TxResult = { code: number; events: AbciEvent[] };

export type BlockResults = {
  height: number;
  txsResults: TxResult[];
  /** `finalize_block_events` (0.38+) or begin/end block events of older nodes. */
  blockEvents: AbciEvent[];
};

/** `block_id_flag` of a commit signature: 1 absent, 2 commit, 3 nil. */
export type BlockIdFlag = number;

export type CommitSignature = {
  blockIdFlag: BlockIdFlag;
  /** Upper-case hex; empty for absent validators. */
  validatorAddress: string;
  timestamp: string | null;
};

export type Commit = { height: number; signatures: CommitSignature[] };

export type ChainStatus = { latestHeight: number; earliestHeight: number; catchingUp: boolean };

export type AbciQueryResponse = {
  code: number;
  log: string;
  /** Base64 payload, `null` when the node returned none. */
  value: string | null;
  height: number;
};

/**
 * The operations the indexer consumes from the chain service.
 */
export interface ChainRpc {
  fetchStatus(): Promise<ChainStatus>;
  fetchBlockResults(height: number): Promise<BlockResults>;
  fetchCommit(height: number): Promise<Commit>;
  queryAbci(path: string, dataHex: string, height?: number): Promise<AbciQueryResponse>;
  /** False once a transport failure was seen; the owner should rebuild the client. */
  isHealthy(): boolean;
  close(): void;
}

export type RpcClientOptions = {
  rpcUrl: string;
  timeoutMs: number;
  retries: number;
  backoffMs: number;
  backoffJitter: number;
  fetchImpl?: typeof fetch;
};

type QueryParams = Record<string, string | number | boolean | undefined>;

function parseEvents(raw: unknown): AbciEvent[] {
  return asArray(raw).filter(isRecord).map((ev) => ({
    type: asString(ev.type) ?? 'unknown',
    attributes: asArray(ev.attributes)
      .filter(isRecord)
      .map((a) => ({ key: asString(a.key) ?? '', value: asString(a.value) ?? '' })),
  }));
}

export function parseBlockResults(result: JsonRecord, requested: number): BlockResults {
  const txsResults = asArray(result.txs_results)
    .filter(isRecord)
    .map((tx) => ({ code: asUint(tx.code) ?? 0, events: parseEvents(tx.events) }));
  const blockEvents = Array.isArray(result.finalize_block_events)
    ? parseEvents(result.finalize_block_events)
    : [...parseEvents(result.begin_block_events), ...parseEvents(result.end_block_events)];
  return { height: asUint(result.height) ?? requested, txsResults, blockEvents };
}

export function parseCommit(result: JsonRecord, requested: number): Commit {
  const commit = asRecord(asRecord(result.signed_header).commit);
  const signatures = asArray(commit.signatures)
    .filter(isRecord)
    .map((s) => ({
      blockIdFlag: asUint(s.block_id_flag) ?? 0,
      validatorAddress: (asString(s.validator_address) ?? '').toUpperCase(),
      timestamp: asString(s.timestamp),
    }));
  return { height: asUint(commit.height) ?? requested, signatures };
}

export function parseStatus(result: JsonRecord): ChainStatus {
  const sync = asRecord(result.sync_info);
  return {
    latestHeight: asUint(sync.latest_block_height) ?? 0,
    earliestHeight: asUint(sync.earliest_block_height) ?? 0,
    catchingUp: sync.catching_up === true,
  };
}

export function parseAbciQuery(result: JsonRecord): AbciQueryResponse {
  const r = asRecord(result.response);
  const value = asString(r.value);
  return {
    code: asUint(r.code) ?? 0,
    log: asString(r.log) ?? '',
    value: value && value.length > 0 ? value : null,
    height: asUint(r.height) ?? 0,
  };
}

export class HttpRpcClient implements ChainRpc {
  private readonly base: string;
  private readonly fetchImpl: typeof fetch;
  private readonly lifetime = new AbortController();
  private healthy = true;

  constructor(private readonly opts: RpcClientOptions) {
    this.base = opts.rpcUrl.replace(/\/+$/, '');
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  isHealthy(): boolean {
    return this.healthy && !this.lifetime.signal.aborted;
  }

  /** Aborts in-flight requests; every later call fails with a transport error. */
  close(): void {
    this.healthy = false;
    this.lifetime.abort();
  }

  async fetchStatus(): Promise<ChainStatus> {
    return parseStatus(await this.getJson('status'));
  }

  async fetchBlockResults(height: number): Promise<BlockResults> {
    return parseBlockResults(await this.getJson('block_results', { height }), height);
  }

  async fetchCommit(height: number): Promise<Commit> {
    return parseCommit(await this.getJson('commit', { height }), height);
  }

  async queryAbci(path: string, dataHex: string, height?: number): Promise<AbciQueryResponse> {
    const data = dataHex.startsWith('0x') ? dataHex : `0x${dataHex}`;
    return parseAbciQuery(await this.getJson('abci_query', { path: `"${path}"`, data, height }));
  }

  /**
   * Issues one JSON-RPC call, retrying transport failures with backoff.
   * Returns the `result` object of the envelope.
   */
  async getJson(method: string, params: QueryParams = {}): Promise<JsonRecord> {
    const url = new URL(`${this.base}/${method}`);
    for (const [k, v] of Object.entries(params)) {
      if (v !== undefined) url.searchParams.set(k, String(v));
    }

    let lastErr: unknown = null;
    for (let attempt = 0; attempt <= this.opts.retries; attempt++) {
      if (this.lifetime.signal.aborted) break;
      if (attempt > 0) {
        const delay = backoffDelay(this.opts.backoffMs, attempt - 1, this.opts.backoffJitter);
        log.debug(`[rpc] retry ${attempt}/${this.opts.retries} ${method} in ${delay}ms`);
        await sleep(delay, this.lifetime.signal);
      }
      try {
        const body = await this.request(url);
        return this.unwrap(method, body);
      } catch (err) {
        if (err instanceof RpcResponseError) throw err;
        lastErr = err;
      }
    }

    this.healthy = false;
    throw new RpcTransportError(method, lastErr ?? 'client closed', { url: url.toString() });
  }

  private async request(url: URL): Promise<unknown> {
    const ctl = new AbortController();
    const onClose = () => ctl.abort();
    this.lifetime.signal.addEventListener('abort', onClose, { once: true });
    const timer = setTimeout(() => ctl.abort(), this.opts.timeoutMs);
    try {
      const res = await this.fetchImpl(url, { method: 'GET', signal: ctl.signal, headers: { accept: 'application/json' } });
      const text = await res.text();
      let body: unknown = null;
      try {
        body = JSON.parse(text);
      } catch {
        body = null;
      }
      // CometBFT answers JSON-RPC errors with HTTP 500 and an error envelope; those are not transport failures.
      if (isRecord(body) && (isRecord(body.error) || isRecord(body.result))) return body;
      throw new Error(`HTTP ${res.status}: unexpected body`);
    } finally {
      clearTimeout(timer);
      this.lifetime.signal.removeEventListener('abort', onClose);
    }
  }

  private unwrap(method: string, body: unknown): JsonRecord {
    const env = asRecord(body);
    if (isRecord(env.error)) {
      const code = typeof env.error.code === 'number' ? env.error.code : -1;
      const detail = [asString(env.error.message), asString(env.error.data)].filter(Boolean).join(': ');
      throw new RpcResponseError(method, code, detail || 'unknown error');
    }
    if (!isRecord(env.result)) {
      throw new RpcResponseError(method, -1, 'response carries no result');
    }
    return env.result;
  }
}

export function createRpcClientFromConfig(cfg: RpcClientOptions): HttpRpcClient {
  return new HttpRpcClient(cfg);
}
