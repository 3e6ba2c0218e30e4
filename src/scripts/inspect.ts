/**
 * Operator CLI over the read API and the advisory agent.
 *
 *   npx tsx src/scripts/inspect.ts <command> [args...]
 */
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { HttpAdvisoryAgent, NoopAdvisoryAgent, type AdvisoryAgent } from '../agent/client.js';
import { getConfig } from '../config.js';
import { closePgPool, createPgPool, poolExecutor } from '../db/pg.js';
import { ReadApi } from '../query/readApi.js';
import { PgRecordStore } from '../store/postgres.js';
import { bytesToBase64 } from '../utils/bytes.js';
import { errMsg, getLogger } from '../utils/logger.js';

const log = getLogger('scripts/inspect');

export const USAGE = `usage: inspect <command> [args]
  progress
  proposals [page] [size] [proposer]
  proposal <id>
  discussions <proposal> [page] [size]
  grants [page] [size]
  grant <validator>
  proposal-votes <proposal> [page] [size]
  grant-votes <validator> [page] [size]
  validator <id>
  advise-proposal <proposal> <voterAddress>
  advise-grant <validator> [statement]`;

export class UsageError extends Error {}

function num(raw: string | undefined, name: string, def?: number): number {
  if (raw === undefined) {
    if (def === undefined) throw new UsageError(`missing <${name}>`);
    return def;
  }
  if (!/^\d+$/.test(raw)) throw new UsageError(`<${name}> must be an unsigned integer, got "${raw}"`);
  return Number(raw);
}

/** Runs one command and returns what should be printed. */
export async function runCommand(args: string[], api: ReadApi, agent: AdvisoryAgent): Promise<unknown> {
  const [cmd, a, b, c] = args;
  switch (cmd) {
    case 'progress':
      return { height: await api.getProgress() };
    case 'proposals':
      return api.listProposals(num(a, 'page', 0), num(b, 'size', 20), c);
    case 'proposal':
      return api.getProposal(num(a, 'id'));
    case 'discussions':
      return api.listDiscussions(num(a, 'proposal'), num(b, 'page', 0), num(c, 'size', 20));
    case 'grants':
      return api.listGrants(num(a, 'page', 0), num(b, 'size', 20));
    case 'grant':
      return api.getGrant(num(a, 'validator'));
    case 'proposal-votes':
      return api.listProposalVotes({ proposal: num(a, 'proposal') }, num(b, 'page', 0), num(c, 'size', 20));
    case 'grant-votes':
      return api.listGrantVotes({ grant: num(a, 'validator') }, num(b, 'page', 0), num(c, 'size', 20));
    case 'validator':
      return api.getValidator(num(a, 'id'));
    case 'advise-proposal': {
      const id = num(a, 'proposal');
      if (!b) throw new UsageError('missing <voterAddress>');
      return agent.recommendProposalVote(id, b);
    }
    case 'advise-grant': {
      const grant = await api.getGrant(num(a, 'validator'));
      if (!grant) return null;
      return agent.recommendGrantVote(grant.id, grant.proposer_address, grant.stake, b ?? '');
    }
    default:
      throw new UsageError(cmd ? `unknown command "${cmd}"` : 'missing command');
  }
}

/** JSON with byte payloads rendered as base64. */
export function toJson(value: unknown): string {
  return JSON.stringify(value, (_k, v: unknown) => (v instanceof Uint8Array ? bytesToBase64(v) : v), 2);
}

async function main(): Promise<void> {
  const cfg = getConfig();
  const pool = createPgPool(cfg.pg);
  const store = new PgRecordStore(poolExecutor(pool), { schema: cfg.pg.schema });
  const agent: AdvisoryAgent = cfg.agent.url
    ? await HttpAdvisoryAgent.connect({ url: cfg.agent.url, timeoutMs: cfg.agent.timeoutMs })
    : new NoopAdvisoryAgent();
  try {
    const out = await runCommand(process.argv.slice(2), new ReadApi(store, cfg.pg.progressId), agent);
    console.log(toJson(out));
  } finally {
    await closePgPool();
  }
}

const isEntry = () => {
  try {
    const entry = process.argv[1];
    return entry !== undefined && fs.realpathSync(entry) === fs.realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
};

if (isEntry()) {
  main().catch((err: unknown) => {
    if (err instanceof UsageError) {
      console.error(`${err.message}\n${USAGE}`);
    } else {
      log.error(`[inspect] ${errMsg(err)}`);
    }
    process.exitCode = 1;
  });
}
