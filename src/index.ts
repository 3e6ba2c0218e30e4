/**
 * Entry point for the governance indexer.
 */
import { HttpAdvisoryAgent, NoopAdvisoryAgent, type AdvisoryAgent } from './agent/client.js';
import { getConfig, printConfig } from './config.js';
import { closePgPool, createPgPool, poolExecutor } from './db/pg.js';
import { AccountLookup } from './indexer/accounts.js';
import { EventDispatcher } from './indexer/dispatcher.js';
import { VoteReconciler } from './indexer/reconcile.js';
import { createRpcClientFromConfig } from './rpc/client.js';
import { ChainConnection } from './rpc/connection.js';
import { SyncLoop } from './runner/follow.js';
import { PgRecordStore } from './store/postgres.js';
import type { Config } from './types.js';
import { errMsg, getLogger, setLogLevel } from './utils/logger.js';

const log = getLogger('index');

async function createAgent(cfg: Config): Promise<AdvisoryAgent> {
  if (!cfg.agent.url) {
    log.info('[agent] AGENT_URL not set, advisory agent disabled');
    return new NoopAdvisoryAgent();
  }
  return HttpAdvisoryAgent.connect({ url: cfg.agent.url, timeoutMs: cfg.agent.timeoutMs });
}

async function main(): Promise<void> {
  const cfg = getConfig();
  setLogLevel(cfg.logLevel);
  log.info('[start] governance indexer starting...');
  printConfig(cfg);

  const shutdown = new AbortController();
  const onSignal = (sig: NodeJS.Signals) => {
    log.info(`${sig} received. Finishing current height...`);
    shutdown.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  const pool = createPgPool({ ...cfg.pg, applicationName: 'hac-indexer' });
  const store = new PgRecordStore(poolExecutor(pool), { schema: cfg.pg.schema, onClose: closePgPool });
  const conn = new ChainConnection(() => createRpcClientFromConfig(cfg));

  try {
    await store.init();
    const agent = await createAgent(cfg);
    const loop = new SyncLoop(
      {
        store,
        conn,
        dispatcher: new EventDispatcher(store, agent),
        reconciler: new VoteReconciler(store, conn, new AccountLookup(conn)),
      },
      {
        progressId: cfg.pg.progressId,
        startHeight: cfg.startHeight,
        tickIntervalMs: cfg.tickIntervalMs,
        catchUpDelayMs: cfg.catchUpDelayMs,
        includeFinalizeEvents: cfg.includeFinalizeEvents,
      },
    );
    await loop.start(shutdown.signal);
  } catch (e) {
    log.error(e instanceof Error ? (e.stack ?? e.message) : String(e));
    process.exitCode = 1;
  } finally {
    await cleanup(conn, store);
  }
}

async function cleanup(conn: ChainConnection, store: PgRecordStore): Promise<void> {
  log.info('Shutdown initiated…');
  try {
    conn.close();
    await store.close();
    log.info('Shutdown complete.');
  } catch (err) {
    log.error(`Shutdown error: ${errMsg(err)}`);
  }
}

main().catch((err: unknown) => {
  log.error(`[start] fatal: ${errMsg(err)}`);
  process.exitCode = 1;
});
