import type { ActionsRepo, ComplaintsRepo } from "../store.js";
import type { ActionLogRow, ComplaintRow } from "../types.js";
import { type Db, firstRow } from "./rows.js";

export async function appendAction(db: Db, entry: Omit<ActionLogRow, "id">): Promise<ActionLogRow> {
  const q = await db.query<ActionLogRow>(
    `
    INSERT INTO action_log
      (action_type, actor_id, subject_user_id, order_id, prior_status, new_status, description, created_at)
    VALUES ($1,$2,$3,$4,$5,$6,$7,$8)
    RETURNING *
    `,
    [
      entry.action_type,
      entry.actor_id,
      entry.subject_user_id,
      entry.order_id,
      entry.prior_status,
      entry.new_status,
      entry.description,
      entry.created_at
    ]
  );
  return firstRow(q, "action_log.append");
}

export async function listActionsByOrder(db: Db, orderId: number, limit = 200): Promise<ActionLogRow[]> {
  const q = await db.query<ActionLogRow>(
    "SELECT * FROM action_log WHERE order_id = $1 ORDER BY created_at ASC, id ASC LIMIT $2",
    [orderId, limit]
  );
  return q.rows;
}

export async function listActionsByUser(db: Db, userId: number, limit = 200): Promise<ActionLogRow[]> {
  const q = await db.query<ActionLogRow>(
    `
    SELECT * FROM action_log
    WHERE actor_id = $1 OR subject_user_id = $1
    ORDER BY created_at ASC, id ASC
    LIMIT $2
    `,
    [userId, limit]
  );
  return q.rows;
}

export async function createComplaint(
  db: Db,
  args: { userId: number; orderId: number | null; text: string; now: Date }
): Promise<ComplaintRow> {
  const q = await db.query<ComplaintRow>(
    "INSERT INTO complaints (user_id, order_id, text, created_at) VALUES ($1,$2,$3,$4) RETURNING *",
    [args.userId, args.orderId, args.text, args.now]
  );
  return firstRow(q, "complaints.create");
}

export async function listComplaintsByOrder(db: Db, orderId: number): Promise<ComplaintRow[]> {
  const q = await db.query<ComplaintRow>("SELECT * FROM complaints WHERE order_id = $1 ORDER BY id ASC", [orderId]);
  return q.rows;
}

export function bindActions(db: Db): ActionsRepo {
  return {
    append: (entry) => appendAction(db, entry),
    listByOrder: (orderId, limit) => listActionsByOrder(db, orderId, limit),
    listByUser: (userId, limit) => listActionsByUser(db, userId, limit)
  };
}

export function bindComplaints(db: Db): ComplaintsRepo {
  return {
    create: (args) => createComplaint(db, args),
    listByOrder: (orderId) => listComplaintsByOrder(db, orderId)
  };
}
