import type { EscortPatch, EscortsRepo } from "../store.js";
import type { EscortRow } from "../types.js";
import { type Db, firstRow, setClause } from "./rows.js";

export async function findById(db: Db, id: number): Promise<EscortRow | null> {
  const q = await db.query<EscortRow>("SELECT * FROM escorts WHERE id = $1 LIMIT 1", [id]);
  return q.rows[0] ?? null;
}

export async function findByUserId(db: Db, userId: number): Promise<EscortRow | null> {
  const q = await db.query<EscortRow>("SELECT * FROM escorts WHERE user_id = $1 LIMIT 1", [userId]);
  return q.rows[0] ?? null;
}

export async function lock(db: Db, id: number): Promise<EscortRow | null> {
  const q = await db.query<EscortRow>("SELECT * FROM escorts WHERE id = $1 FOR UPDATE", [id]);
  return q.rows[0] ?? null;
}

export async function create(db: Db, args: { userId: number; now: Date }): Promise<EscortRow> {
  const q = await db.query<EscortRow>(
    "INSERT INTO escorts (user_id, created_at) VALUES ($1, $2) RETURNING *",
    [args.userId, args.now]
  );
  return firstRow(q, "escorts.create");
}

export async function update(db: Db, id: number, patch: EscortPatch): Promise<EscortRow> {
  const set = setClause(patch);
  const q = await db.query<EscortRow>(`UPDATE escorts SET ${set.sql} WHERE id = $1 RETURNING *`, [
    id,
    ...set.values
  ]);
  return firstRow(q, "escorts.update");
}

export async function listBySquad(db: Db, squadId: number): Promise<EscortRow[]> {
  const q = await db.query<EscortRow>("SELECT * FROM escorts WHERE squad_id = $1 ORDER BY id ASC", [squadId]);
  return q.rows;
}

export async function clearSquad(db: Db, squadId: number): Promise<number> {
  const q = await db.query("UPDATE escorts SET squad_id = NULL WHERE squad_id = $1", [squadId]);
  return q.rowCount ?? 0;
}

export function bind(db: Db): EscortsRepo {
  return {
    findById: (id) => findById(db, id),
    findByUserId: (userId) => findByUserId(db, userId),
    lock: (id) => lock(db, id),
    create: (args) => create(db, args),
    update: (id, patch) => update(db, id, patch),
    listBySquad: (squadId) => listBySquad(db, squadId),
    clearSquad: (squadId) => clearSquad(db, squadId)
  };
}
