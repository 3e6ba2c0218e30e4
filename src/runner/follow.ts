/**
 * Follow loop: polls the chain head and indexes every height below it, one at a
 * time, persisting progress only after a height is fully processed.
 */
import { IndexerError } from '../errors.js';
import type { EventDispatcher } from '../indexer/dispatcher.js';
import type { VoteReconciler } from '../indexer/reconcile.js';
import type { ChainConnection } from '../rpc/connection.js';
import type { AbciEvent } from '../rpc/client.js';
import type { RecordStore } from '../store/types.js';
import { errMsg, getLogger } from '../utils/logger.js';
import { sleep } from '../utils/time.js';

const log = getLogger('runner/follow');

export type SyncState = 'idle' | 'fetching_head' | 'catching_up' | 'synced' | 'stopped';

export type TickSummary = {
  /** Heights fully processed and persisted during this tick. */
  processed: number;
  /** Chain head seen by this tick; null when it could not be fetched. */
  head: number | null;
  /** Next height to process. */
  height: number;
  error?: string;
  /** Set when the error cannot clear by retrying; {@link SyncLoop.start} halts on it. */
  permanent?: true;
};

export type SyncLoopOptions = {
  progressId: string;
  startHeight: number;
  tickIntervalMs: number;
  catchUpDelayMs: number;
  includeFinalizeEvents: boolean;
};

export type SyncLoopDeps = {
  store: RecordStore;
  conn: ChainConnection;
  dispatcher: EventDispatcher;
  reconciler: VoteReconciler;
};

export class SyncLoop {
  private current: SyncState = 'idle';
  private next: number | null = null;
  private readonly stopper = new AbortController();
  private haltedBy: IndexerError | null = null;

  constructor(
    private readonly deps: SyncLoopDeps,
    private readonly opts: SyncLoopOptions,
  ) {}

  get state(): SyncState {
    return this.current;
  }

  /** Next height to process; null until {@link resume} ran. */
  get nextHeight(): number | null {
    return this.next;
  }

  /** Reads the persisted progress and positions the loop right after it. */
  async resume(): Promise<number> {
    const last = await this.deps.store.getProgress(this.opts.progressId);
    this.next = last === null ? this.opts.startHeight : last + 1;
    log.info(`[resume] last_height=${last ?? 'null'} → start from ${this.next}`);
    return this.next;
  }

  /**
   * Runs ticks every `tickIntervalMs` until `signal` aborts or {@link stop} is
   * called. The height in flight is finished before the loop exits. Rejects
   * with the error of a tick that failed permanently.
   */
  async start(signal?: AbortSignal): Promise<void> {
    const onAbort = () => this.stop();
    if (signal?.aborted) this.stop();
    signal?.addEventListener('abort', onAbort, { once: true });
    try {
      while (!this.stopper.signal.aborted) {
        await this.tick();
        if (this.haltedBy !== null) throw this.haltedBy;
        await sleep(this.opts.tickIntervalMs, this.stopper.signal);
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
      this.current = 'stopped';
      log.info(`[follow] stopped at height ${this.next ?? 'n/a'}`);
    }
  }

  stop(): void {
    this.stopper.abort();
  }

  /**
   * One polling round. Never throws: a failure stops the round at the height
   * that failed, and the next tick retries it.
   */
  async tick(): Promise<TickSummary> {
    const stopped = this.stopper.signal;
    if (this.next === null) {
      try {
        await this.resume();
      } catch (err) {
        return this.fail(0, null, this.opts.startHeight, err);
      }
    }
    let height = this.next ?? this.opts.startHeight;
    if (stopped.aborted) return { processed: 0, head: null, height };

    this.current = 'fetching_head';
    if (!this.deps.conn.ensureConnected()) {
      return this.fail(0, null, height, 'chain connection unavailable');
    }
    let head: number;
    try {
      head = (await this.deps.conn.call((rpc) => rpc.fetchStatus())).latestHeight;
    } catch (err) {
      return this.fail(0, null, height, err);
    }

    let processed = 0;
    while (height < head && !stopped.aborted) {
      this.current = 'catching_up';
      await sleep(this.opts.catchUpDelayMs, stopped);
      if (stopped.aborted) break;
      try {
        await this.processHeight(height);
      } catch (err) {
        return this.fail(processed, head, height, err);
      }
      height++;
      this.next = height;
      processed++;
    }

    this.current = height >= head ? 'synced' : 'idle';
    return { processed, head, height };
  }

  private async processHeight(height: number): Promise<void> {
    const { conn, dispatcher, reconciler, store } = this.deps;
    const results = await conn.call((rpc) => rpc.fetchBlockResults(height));

    const events: AbciEvent[] = results.txsResults.flatMap((tx) => tx.events);
    if (this.opts.includeFinalizeEvents) events.push(...results.blockEvents);
    let handled = 0;
    for (const [i, ev] of events.entries()) {
      if ((await dispatcher.dispatch(ev.type, ev, height, i)) === 'handled') handled++;
    }

    const votes = await reconciler.reconcile(height);
    await store.saveProgress(this.opts.progressId, height);

    if (handled > 0 || votes.inserted > 0) {
      log.info(`[follow] height=${height} events=${handled} votes=${votes.inserted} (${votes.kind})`);
    } else {
      log.debug(`[follow] height=${height} empty`);
    }
  }

  private fail(processed: number, head: number | null, height: number, err: unknown): TickSummary {
    this.current = 'idle';
    const error = errMsg(err);
    if (err instanceof IndexerError && !err.retryable) {
      log.error({ ...err.context, height }, `[follow] height ${height} failed permanently: ${error}`);
      this.haltedBy = err;
      return { processed, head, height, error, permanent: true };
    }
    log.error({ height }, `[follow] height ${height} failed: ${error}`);
    return { processed, head, height, error };
  }
}
