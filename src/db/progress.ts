/**
 * IndexProgress: last fully processed height per progress id.
 */
import type { SqlExecutor } from './pg.js';

export async function getProgress(db: SqlExecutor, schema: string, progressId: string): Promise<number | null> {
  const res = await db.run(`SELECT height FROM "${schema}".index_progress WHERE id = $1`, [progressId]);
  const row = res.rows[0];
  if (!row) return null;
  const h = Number(row.height);
  return Number.isSafeInteger(h) && h >= 0 ? h : null;
}

/**
 * Stores `height` as the last indexed height. GREATEST keeps the value
 * monotonic even if a stale writer replays an older height.
 */
export async function upsertProgress(
  db: SqlExecutor,
  schema: string,
  progressId: string,
  height: number,
): Promise<void> {
  await db.run(
    `INSERT INTO "${schema}".index_progress (id, height, updated_at)
     VALUES ($1, $2, now())
     ON CONFLICT (id) DO UPDATE SET
       height = GREATEST("${schema}".index_progress.height, EXCLUDED.height),
       updated_at = now()`,
    [progressId, height],
  );
}
