import { beforeEach, describe, expect, test, vi } from 'vitest';
import { ConfigError } from '../errors.js';
import { AccountLookup } from '../indexer/accounts.js';
import { EventDispatcher } from '../indexer/dispatcher.js';
import { VoteReconciler } from '../indexer/reconcile.js';
import { ChainConnection } from '../rpc/connection.js';
import { SyncLoop, type SyncLoopOptions } from '../runner/follow.js';
import { b64, event, FakeChain, MemoryRecordStore, RecordingAgent, sig } from './fakes.js';

let chain: FakeChain;
let store: MemoryRecordStore;
let agent: RecordingAgent;

function makeLoop(overrides: Partial<SyncLoopOptions> = {}) {
  const conn = new ChainConnection(() => chain.connect());
  return new SyncLoop(
    {
      store,
      conn,
      dispatcher: new EventDispatcher(store, agent),
      reconciler: new VoteReconciler(store, conn, new AccountLookup(conn)),
    },
    {
      progressId: 'default',
      startHeight: 1,
      tickIntervalMs: 5,
      catchUpDelayMs: 0,
      includeFinalizeEvents: false,
      ...overrides,
    },
  );
}

const proposal7 = event('proposal', {
  proposal_index: '7',
  proposer: '3',
  proposer_address: 'AA03',
  data: b64('fund the relayers'),
  status: '1',
});

const grant4 = event('grant', {
  validator: '4',
  address: 'CC44',
  amount: '500',
  proposer_index: '1',
  proposer_address: 'AA02',
  grant: 'true',
});

beforeEach(() => {
  chain = new FakeChain();
  chain.accounts.set('AA01', 0);
  chain.accounts.set('AA02', 1);
  chain.accounts.set('AA03', 2);
  store = new MemoryRecordStore();
  agent = new RecordingAgent();
});

describe('SyncLoop', () => {
  test('indexes every height below the head and persists each one', async () => {
    chain.head = 4;
    const loop = makeLoop();
    await expect(loop.tick()).resolves.toEqual({ processed: 3, head: 4, height: 4 });
    expect(store.progress.get('default')).toBe(3);
    expect(loop.state).toBe('synced');
    expect(chain.calls.filter((c) => c.startsWith('block_results'))).toEqual([
      'block_results:1',
      'block_results:2',
      'block_results:3',
    ]);
  });

  test('resumes right after the persisted height', async () => {
    store.progress.set('default', 10);
    chain.head = 12;
    const loop = makeLoop({ startHeight: 1 });
    await expect(loop.resume()).resolves.toBe(11);
    await expect(loop.tick()).resolves.toEqual({ processed: 1, head: 12, height: 12 });
    expect(chain.calls).not.toContain('block_results:10');
  });

  test('starts at the configured height when nothing is persisted', async () => {
    chain.head = 52;
    const loop = makeLoop({ startHeight: 50 });
    await expect(loop.tick()).resolves.toEqual({ processed: 2, head: 52, height: 52 });
    expect(store.progress.get('default')).toBe(51);
  });

  test('proposal created at 100 and settled at 150', async () => {
    store.progress.set('default', 99);
    chain.head = 151;
    chain.addTxEvents(100, [proposal7]);
    chain.addTxEvents(150, [event('settle_proposal', { proposal: '7', state: '2' })]);

    await expect(makeLoop().tick()).resolves.toEqual({ processed: 51, head: 151, height: 151 });
    const p = store.proposals.get(7);
    expect(p?.status).toBe(2);
    expect(p?.settle_height).toBe(150);
    expect(p?.new_height).toBe(100);
    expect(p?.proposer_index).toBe(3);
  });

  test('commit signatures at the creation height become votes, once', async () => {
    store.progress.set('default', 99);
    chain.head = 101;
    chain.addTxEvents(100, [proposal7]);
    chain.commits.set(100, [sig('AA01'), sig('AA02'), sig('AA03')]);

    await makeLoop().tick();
    expect(store.proposalVotes.map((v) => [v.proposal, v.height, v.voter_index])).toEqual([
      [7, 100, 0],
      [7, 100, 1],
      [7, 100, 2],
    ]);

    // A second indexer instance replaying the height adds nothing.
    store.progress.clear();
    await makeLoop({ startHeight: 100 }).tick();
    expect(store.proposalVotes).toHaveLength(3);
  });

  test('an unknown signer holds the height until the validator is known', async () => {
    store.progress.set('default', 100);
    chain.head = 103;
    chain.addTxEvents(101, [proposal7]);
    chain.commits.set(101, [sig('AA01'), sig('AA09')]);
    const loop = makeLoop();

    await expect(loop.tick()).resolves.toEqual({ processed: 0, head: 103, height: 101, error: 'unknown account AA09' });
    expect(store.progress.get('default')).toBe(100);
    expect(loop.state).toBe('idle');

    chain.accounts.set('AA09', 9);
    await expect(loop.tick()).resolves.toEqual({ processed: 2, head: 103, height: 103 });
    expect(store.progress.get('default')).toBe(102);
    expect(store.proposalVotes.map((v) => v.voter_index)).toEqual([0, 9]);
  });

  test('a crash before the progress write replays the height to the same state', async () => {
    store.progress.set('default', 99);
    chain.addTxEvents(100, [
      proposal7,
      event('discussion', { proposal: '7', speaker: '1', speaker_address: 'AA02', data: b64('agreed') }),
    ]);
    chain.commits.set(100, [sig('AA01'), sig('AA02')]);
    chain.head = 101;

    store.failWrites.add('saveProgress');
    const first = await makeLoop().tick();
    expect(first.error).toBe('saveProgress refused by test');
    expect(store.progress.get('default')).toBe(99);
    const snapshot = {
      proposals: structuredClone([...store.proposals.values()]),
      discussions: structuredClone(store.discussions),
      votes: structuredClone(store.proposalVotes),
    };

    const restarted = makeLoop();
    await expect(restarted.tick()).resolves.toEqual({ processed: 1, head: 101, height: 101 });
    expect(store.progress.get('default')).toBe(100);
    expect([...store.proposals.values()]).toEqual(snapshot.proposals);
    expect(store.discussions).toEqual(snapshot.discussions);
    expect(store.proposalVotes).toEqual(snapshot.votes);
  });

  test('identical discussions in one block are each stored once across a replay', async () => {
    store.progress.set('default', 119);
    const again = event('discussion', { proposal: '7', speaker: '1', speaker_address: 'AA02', data: b64('+1') });
    chain.addTxEvents(120, [again, again]);
    chain.head = 121;

    store.failWrites.add('saveProgress');
    await makeLoop().tick();
    await expect(makeLoop().tick()).resolves.toEqual({ processed: 1, head: 121, height: 121 });
    expect(store.discussions.map((d) => [d.height, d.event_index])).toEqual([
      [120, 0],
      [120, 1],
    ]);
  });

  test('persisted progress never goes back, failing ticks included', async () => {
    const loop = makeLoop();
    const seen: number[] = [];
    const record = () => seen.push(store.progress.get('default') ?? 0);

    chain.head = 4;
    await loop.tick();
    record();
    chain.failures.set('fetchStatus', 1);
    const failed = await loop.tick();
    expect(failed.error).toBe('rpc fetchStatus failed: connection reset');
    record();
    chain.head = 7;
    chain.failures.set('fetchBlockResults', 1);
    await loop.tick();
    record();
    await loop.tick();
    record();
    await store.saveProgress('default', 2);
    record();

    expect(seen).toEqual([3, 3, 3, 6, 6]);
    for (let i = 1; i < seen.length; i++) expect(seen[i]).toBeGreaterThanOrEqual(seen[i - 1] ?? 0);
  });

  test('the connection is rebuilt after a transport failure', async () => {
    chain.head = 3;
    chain.failures.set('fetchBlockResults', 1);
    const loop = makeLoop();
    const failed = await loop.tick();
    expect(failed).toEqual({
      processed: 0,
      head: 3,
      height: 1,
      error: 'rpc fetchBlockResults failed: connection reset',
    });
    await expect(loop.tick()).resolves.toEqual({ processed: 2, head: 3, height: 3 });
    expect(chain.clientsBuilt).toBe(2);
  });

  test('malformed events are dropped, their siblings still indexed', async () => {
    chain.head = 2;
    chain.addTxEvents(1, [
      event('proposal', { proposal_index: 'nope' }),
      grant4,
      event('transfer', { amount: '5' }),
    ]);
    await expect(makeLoop().tick()).resolves.toEqual({ processed: 1, head: 2, height: 2 });
    expect(store.proposals.size).toBe(0);
    expect(store.grants.get(4)?.height).toBe(1);
    expect(store.progress.get('default')).toBe(1);
  });

  test('block-level events are dispatched only when enabled', async () => {
    chain.head = 2;
    chain.addBlockEvents(1, [grant4]);

    await makeLoop().tick();
    expect(store.grants.size).toBe(0);

    store.progress.clear();
    await makeLoop({ includeFinalizeEvents: true }).tick();
    expect(store.grants.get(4)?.stake).toBe(500);
  });

  test('start() runs until the signal aborts', async () => {
    chain.head = 3;
    const loop = makeLoop();
    const ctl = new AbortController();
    const run = loop.start(ctl.signal);
    await vi.waitFor(() => expect(store.progress.get('default')).toBe(2));
    ctl.abort();
    await run;
    expect(loop.state).toBe('stopped');
    expect(loop.nextHeight).toBe(3);
  });

  test('a failure retrying cannot clear halts start()', async () => {
    chain.head = 3;
    vi.spyOn(store, 'getProgress').mockRejectedValue(new ConfigError('PROGRESS_ID', 'x', 'a known id'));

    await expect(makeLoop().tick()).resolves.toEqual({
      processed: 0,
      head: null,
      height: 1,
      error: 'invalid PROGRESS_ID="x": expected a known id',
      permanent: true,
    });

    const loop = makeLoop();
    await expect(loop.start()).rejects.toBeInstanceOf(ConfigError);
    expect(loop.state).toBe('stopped');
    expect(chain.calls).toEqual([]);
  });

  test('start() with an aborted signal does not tick', async () => {
    chain.head = 3;
    const loop = makeLoop();
    const ctl = new AbortController();
    ctl.abort();
    await loop.start(ctl.signal);
    expect(loop.state).toBe('stopped');
    expect(chain.calls).toEqual([]);
  });
});
