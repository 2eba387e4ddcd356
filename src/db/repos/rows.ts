import type { PoolClient, QueryResult, QueryResultRow } from "pg";

export type Db = PoolClient;

export function firstRow<T extends QueryResultRow>(q: QueryResult<T>, what: string): T {
  const row = q.rows[0];
  if (!row) throw new Error(`${what}: no row returned`);
  return row;
}

/**
 * Builds `SET a = $2, b = $3` from a patch object; `$1` is left for the id.
 * Keys come from typed patch objects, never from user input.
 */
export function setClause(patch: Record<string, unknown>): { sql: string; values: unknown[] } {
  const keys = Object.keys(patch).filter((k) => patch[k] !== undefined);
  if (!keys.length) throw new Error("empty patch");
  return {
    sql: keys.map((k, i) => `${k} = $${i + 2}`).join(", "),
    values: keys.map((k) => patch[k])
  };
}
