/**
 * Module-scoped loggers on top of a single pino root.
 */
import pino, { type Logger, type LevelWithSilent } from 'pino';

const LEVELS: readonly LevelWithSilent[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function resolveLevel(raw: string | undefined): LevelWithSilent {
  const v = (raw ?? '').trim().toLowerCase();
  const hit = LEVELS.find((l) => l === v);
  return hit ?? 'info';
}

let root: Logger | null = null;
const children = new Map<string, Logger>();

function getRoot(): Logger {
  if (!root) {
    root = pino({
      level: resolveLevel(process.env.LOG_LEVEL),
      base: { app: 'hac-indexer' },
      timestamp: pino.stdTimeFunctions.isoTime,
    });
  }
  return root;
}

/**
 * Returns a child logger bound to `{ module: name }`. Loggers are cached per name.
 */
export function getLogger(name: string): Logger {
  let l = children.get(name);
  if (!l) {
    l = getRoot().child({ module: name });
    children.set(name, l);
  }
  return l;
}

/** Changes the level of the root logger and every child handed out so far. */
export function setLogLevel(level: string): void {
  const lvl = resolveLevel(level);
  getRoot().level = lvl;
  for (const l of children.values()) l.level = lvl;
}

export function errMsg(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
