import type { ApplicationsRepo, AssignmentsRepo } from "../store.js";
import type { ApplicationRow, AssignmentRow } from "../types.js";
import { type Db, firstRow } from "./rows.js";

export async function findApplication(db: Db, orderId: number, escortId: number): Promise<ApplicationRow | null> {
  const q = await db.query<ApplicationRow>(
    "SELECT * FROM order_applications WHERE order_id = $1 AND escort_id = $2 LIMIT 1",
    [orderId, escortId]
  );
  return q.rows[0] ?? null;
}

export async function listApplications(db: Db, orderId: number): Promise<ApplicationRow[]> {
  const q = await db.query<ApplicationRow>(
    "SELECT * FROM order_applications WHERE order_id = $1 ORDER BY created_at ASC, id ASC",
    [orderId]
  );
  return q.rows;
}

export async function createApplication(
  db: Db,
  args: { orderId: number; escortId: number; squadId: number | null; gameAccountId: string | null; now: Date }
): Promise<ApplicationRow> {
  const q = await db.query<ApplicationRow>(
    `
    INSERT INTO order_applications (order_id, escort_id, squad_id, game_account_id, created_at)
    VALUES ($1,$2,$3,$4,$5)
    RETURNING *
    `,
    [args.orderId, args.escortId, args.squadId, args.gameAccountId, args.now]
  );
  return firstRow(q, "applications.create");
}

export async function listActiveAssignments(db: Db, orderId: number): Promise<AssignmentRow[]> {
  const q = await db.query<AssignmentRow>(
    "SELECT * FROM order_escorts WHERE order_id = $1 AND released_at IS NULL ORDER BY assigned_at ASC, id ASC",
    [orderId]
  );
  return q.rows;
}

export async function createAssignment(
  db: Db,
  args: { orderId: number; escortId: number; gameAccountId: string | null; now: Date }
): Promise<AssignmentRow> {
  const q = await db.query<AssignmentRow>(
    `
    INSERT INTO order_escorts (order_id, escort_id, game_account_id, assigned_at)
    VALUES ($1,$2,$3,$4)
    RETURNING *
    `,
    [args.orderId, args.escortId, args.gameAccountId, args.now]
  );
  return firstRow(q, "assignments.create");
}

export async function releaseAssignments(db: Db, orderId: number, now: Date): Promise<number> {
  const q = await db.query(
    "UPDATE order_escorts SET released_at = $2 WHERE order_id = $1 AND released_at IS NULL",
    [orderId, now]
  );
  return q.rowCount ?? 0;
}

export async function countCompletedForEscort(db: Db, escortId: number): Promise<number> {
  const q = await db.query<{ count: number }>(
    `
    SELECT count(*) AS count
    FROM order_escorts oe
    JOIN orders o ON o.id = oe.order_id
    WHERE oe.escort_id = $1 AND oe.released_at IS NULL AND o.status = 'completed'
    `,
    [escortId]
  );
  return firstRow(q, "assignments.countCompleted").count;
}

export function bindApplications(db: Db): ApplicationsRepo {
  return {
    find: (orderId, escortId) => findApplication(db, orderId, escortId),
    listByOrder: (orderId) => listApplications(db, orderId),
    create: (args) => createApplication(db, args)
  };
}

export function bindAssignments(db: Db): AssignmentsRepo {
  return {
    listActiveByOrder: (orderId) => listActiveAssignments(db, orderId),
    create: (args) => createAssignment(db, args),
    releaseByOrder: (orderId, now) => releaseAssignments(db, orderId, now),
    countCompletedForEscort: (escortId) => countCompletedForEscort(db, escortId)
  };
}
