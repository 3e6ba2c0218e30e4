// src/store/sql.ts
import type { SqlValue } from '../db/pg.js';

/**
 * Builds a parameterized multi-row INSERT.
 *
 * @param table - Fully qualified table name (already quoted where needed).
 * @param cols - Column names, in placeholder order.
 * @param rows - Row objects keyed by column name; missing keys bind NULL.
 * @param tail - Trailing clause such as `ON CONFLICT ...` or `RETURNING id`.
 */
export function makeMultiInsert(
  table: string,
  cols: readonly string[],
  rows: ReadonlyArray<Record<string, SqlValue>>,
  tail = '',
): { text: string; values: SqlValue[] } {
  if (!rows.length) throw new Error(`makeMultiInsert(${table}): no rows`);
  const values: SqlValue[] = [];
  const tuples = rows.map((row) => {
    const ph = cols.map((c) => {
      values.push(row[c] ?? null);
      return `$${values.length}`;
    });
    return `(${ph.join(', ')})`;
  });
  const colList = cols.map((c) => `"${c}"`).join(', ');
  const text = `INSERT INTO ${table} (${colList}) VALUES ${tuples.join(', ')}${tail ? ` ${tail}` : ''}`;
  return { text, values };
}

/** `SET col = EXCLUDED.col` list for an upsert on every non-key column. */
export function excludedSet(cols: readonly string[], key = 'id'): string {
  return cols
    .filter((c) => c !== key)
    .map((c) => `"${c}" = EXCLUDED."${c}"`)
    .join(', ');
}
