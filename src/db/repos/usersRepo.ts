import type { UsersRepo } from "../store.js";
import type { UserRow } from "../types.js";
import { type Db, firstRow } from "./rows.js";

export async function findById(db: Db, id: number): Promise<UserRow | null> {
  const q = await db.query<UserRow>("SELECT * FROM users WHERE id = $1 LIMIT 1", [id]);
  return q.rows[0] ?? null;
}

export async function findByTelegramId(db: Db, telegramId: number): Promise<UserRow | null> {
  const q = await db.query<UserRow>("SELECT * FROM users WHERE telegram_id = $1 LIMIT 1", [telegramId]);
  return q.rows[0] ?? null;
}

export async function lock(db: Db, id: number): Promise<UserRow | null> {
  const q = await db.query<UserRow>("SELECT * FROM users WHERE id = $1 FOR UPDATE", [id]);
  return q.rows[0] ?? null;
}

export async function create(
  db: Db,
  args: { telegramId: number; username: string | null; now: Date }
): Promise<UserRow> {
  const q = await db.query<UserRow>(
    "INSERT INTO users (telegram_id, username, created_at) VALUES ($1, $2, $3) RETURNING *",
    [args.telegramId, args.username, args.now]
  );
  return firstRow(q, "users.create");
}

export async function setBalance(db: Db, id: number, balance: number): Promise<UserRow> {
  const q = await db.query<UserRow>("UPDATE users SET balance = $2 WHERE id = $1 RETURNING *", [id, balance]);
  return firstRow(q, "users.setBalance");
}

export async function setWorker(db: Db, id: number, isWorker: boolean): Promise<UserRow> {
  const q = await db.query<UserRow>("UPDATE users SET is_worker = $2 WHERE id = $1 RETURNING *", [id, isWorker]);
  return firstRow(q, "users.setWorker");
}

export async function listAll(db: Db): Promise<UserRow[]> {
  const q = await db.query<UserRow>("SELECT * FROM users ORDER BY id ASC");
  return q.rows;
}

export function bind(db: Db): UsersRepo {
  return {
    findById: (id) => findById(db, id),
    findByTelegramId: (telegramId) => findByTelegramId(db, telegramId),
    lock: (id) => lock(db, id),
    create: (args) => create(db, args),
    setBalance: (id, balance) => setBalance(db, id, balance),
    setWorker: (id, isWorker) => setWorker(db, id, isWorker),
    listAll: () => listAll(db)
  };
}
