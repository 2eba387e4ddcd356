import type { OrderPatch, OrdersRepo } from "../store.js";
import type { OrderRow, OrderStatus } from "../types.js";
import { type Db, firstRow, setClause } from "./rows.js";

export async function createOrder(
  db: Db,
  args: {
    memoOrderId: string;
    customerId: number | null;
    customerInfo: string;
    amount: number; // minor units
    now: Date;
  }
): Promise<OrderRow> {
  const q = await db.query<OrderRow>(
    `
    INSERT INTO orders (memo_order_id, customer_id, customer_info, amount, status, created_at)
    VALUES ($1,$2,$3,$4,'open',$5)
    RETURNING *
    `,
    [args.memoOrderId, args.customerId, args.customerInfo, args.amount, args.now]
  );
  return firstRow(q, "orders.create");
}

export async function getOrderById(db: Db, orderId: number): Promise<OrderRow | null> {
  const q = await db.query<OrderRow>("SELECT * FROM orders WHERE id = $1 LIMIT 1", [orderId]);
  return q.rows[0] ?? null;
}

export async function getOrderByMemoId(db: Db, memoOrderId: string): Promise<OrderRow | null> {
  const q = await db.query<OrderRow>("SELECT * FROM orders WHERE memo_order_id = $1 LIMIT 1", [memoOrderId]);
  return q.rows[0] ?? null;
}

/**
 * Row lock on the order; every status change goes through it, so concurrent
 * assign/cancel/complete calls on one order run one after another.
 */
export async function lockOrder(db: Db, orderId: number): Promise<OrderRow | null> {
  const q = await db.query<OrderRow>("SELECT * FROM orders WHERE id = $1 FOR UPDATE", [orderId]);
  return q.rows[0] ?? null;
}

export async function updateOrder(db: Db, orderId: number, patch: OrderPatch): Promise<OrderRow> {
  const set = setClause(patch);
  const q = await db.query<OrderRow>(`UPDATE orders SET ${set.sql} WHERE id = $1 RETURNING *`, [
    orderId,
    ...set.values
  ]);
  return firstRow(q, "orders.update");
}

export async function getOrdersByStatus(db: Db, status: OrderStatus, limit = 100): Promise<OrderRow[]> {
  const q = await db.query<OrderRow>(
    "SELECT * FROM orders WHERE status = $1 ORDER BY created_at ASC, id ASC LIMIT $2",
    [status, limit]
  );
  return q.rows;
}

export async function getOrdersStartedBefore(
  db: Db,
  status: OrderStatus,
  before: Date,
  limit = 200,
  notRemindedSince: Date | null = null
): Promise<OrderRow[]> {
  const q = await db.query<OrderRow>(
    `
    SELECT * FROM orders o
    WHERE o.status = $1
      AND COALESCE(o.started_at, o.assigned_at, o.created_at) < $2
      AND (
        $4::timestamptz IS NULL
        OR NOT EXISTS (
          SELECT 1 FROM action_log a
          WHERE a.order_id = o.id AND a.action_type = 'reminder_sent' AND a.created_at >= $4
        )
      )
    ORDER BY o.created_at ASC, o.id ASC
    LIMIT $3
    `,
    [status, before, limit, notRemindedSince]
  );
  return q.rows;
}

export async function getSquadTotals(db: Db, squadId: number): Promise<{ orders: number; earned: number }> {
  const q = await db.query<{ orders: number; earned: number }>(
    `
    SELECT
      count(DISTINCT o.id) AS orders,
      COALESCE(sum(p.amount), 0)::bigint AS earned
    FROM orders o
    LEFT JOIN payouts p ON p.order_id = o.id
    WHERE o.squad_id = $1 AND o.status = 'completed'
    `,
    [squadId]
  );
  const row = firstRow(q, "orders.squadTotals");
  return { orders: row.orders, earned: row.earned };
}

export function bind(db: Db): OrdersRepo {
  return {
    findById: (id) => getOrderById(db, id),
    findByMemoId: (memoOrderId) => getOrderByMemoId(db, memoOrderId),
    lock: (id) => lockOrder(db, id),
    create: (args) => createOrder(db, args),
    update: (id, patch) => updateOrder(db, id, patch),
    listByStatus: (status, limit) => getOrdersByStatus(db, status, limit),
    listStartedBefore: (status, before, limit, notRemindedSince) =>
      getOrdersStartedBefore(db, status, before, limit, notRemindedSince ?? null),
    squadTotals: (squadId) => getSquadTotals(db, squadId)
  };
}
