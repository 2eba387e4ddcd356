import type { SquadPatch, SquadsRepo } from "../store.js";
import type { SquadRow } from "../types.js";
import { type Db, firstRow, setClause } from "./rows.js";

export async function findById(db: Db, id: number): Promise<SquadRow | null> {
  const q = await db.query<SquadRow>("SELECT * FROM squads WHERE id = $1 LIMIT 1", [id]);
  return q.rows[0] ?? null;
}

export async function findByName(db: Db, name: string): Promise<SquadRow | null> {
  const q = await db.query<SquadRow>("SELECT * FROM squads WHERE name = $1 LIMIT 1", [name]);
  return q.rows[0] ?? null;
}

export async function lock(db: Db, id: number): Promise<SquadRow | null> {
  const q = await db.query<SquadRow>("SELECT * FROM squads WHERE id = $1 FOR UPDATE", [id]);
  return q.rows[0] ?? null;
}

export async function create(db: Db, args: { name: string; now: Date }): Promise<SquadRow> {
  const q = await db.query<SquadRow>("INSERT INTO squads (name, created_at) VALUES ($1, $2) RETURNING *", [
    args.name,
    args.now
  ]);
  return firstRow(q, "squads.create");
}

export async function update(db: Db, id: number, patch: SquadPatch): Promise<SquadRow> {
  const set = setClause(patch);
  const q = await db.query<SquadRow>(`UPDATE squads SET ${set.sql} WHERE id = $1 RETURNING *`, [id, ...set.values]);
  return firstRow(q, "squads.update");
}

export async function remove(db: Db, id: number): Promise<void> {
  await db.query("DELETE FROM squads WHERE id = $1", [id]);
}

export async function listAll(db: Db): Promise<SquadRow[]> {
  const q = await db.query<SquadRow>("SELECT * FROM squads ORDER BY name ASC");
  return q.rows;
}

export function bind(db: Db): SquadsRepo {
  return {
    findById: (id) => findById(db, id),
    findByName: (name) => findByName(db, name),
    lock: (id) => lock(db, id),
    create: (args) => create(db, args),
    update: (id, patch) => update(db, id, patch),
    delete: (id) => remove(db, id),
    listAll: () => listAll(db)
  };
}
