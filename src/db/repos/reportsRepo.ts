import type { ReportsRepo } from "../store.js";
import type { MonthlySummary, OrderExportRow, UserProfit, WorkerListingRow } from "../types.js";
import { type Db, firstRow } from "./rows.js";

export async function getMonthlySummary(db: Db, from: Date, to: Date): Promise<MonthlySummary> {
  const q = await db.query<MonthlySummary>(
    `
    SELECT
      count(*) AS order_count,
      COALESCE(sum(amount), 0)::bigint AS total_amount,
      COALESCE(sum(commission_amount), 0)::bigint AS total_commission
    FROM orders
    WHERE status = 'completed' AND finished_at >= $1 AND finished_at < $2
    `,
    [from, to]
  );
  return firstRow(q, "reports.monthlySummary");
}

export async function getUserProfit(db: Db, userId: number): Promise<UserProfit> {
  const q = await db.query<UserProfit>(
    `
    SELECT count(*) AS payout_count, COALESCE(sum(amount), 0)::bigint AS total_paid
    FROM payouts
    WHERE user_id = $1
    `,
    [userId]
  );
  return firstRow(q, "reports.userProfit");
}

export async function getOrdersForExport(db: Db): Promise<OrderExportRow[]> {
  const q = await db.query<OrderExportRow>(
    `
    SELECT
      o.memo_order_id, o.customer_info, o.amount, o.commission_amount, o.status,
      o.created_at, o.finished_at,
      s.name AS squad_name,
      COALESCE(sum(p.amount), 0)::bigint AS payout_total,
      max(p.created_at) AS last_payout_at
    FROM orders o
    LEFT JOIN squads s ON s.id = o.squad_id
    LEFT JOIN payouts p ON p.order_id = o.id
    GROUP BY o.id, s.name
    ORDER BY o.created_at ASC, o.id ASC
    `
  );
  return q.rows;
}

export async function getWorkerRoster(db: Db): Promise<WorkerListingRow[]> {
  const q = await db.query<WorkerListingRow>(
    `
    SELECT
      u.id AS user_id, u.telegram_id, u.username, u.balance,
      e.id AS escort_id, e.squad_id, s.name AS squad_name,
      e.reputation, e.completed_orders, e.rating, e.rating_count,
      e.is_banned, e.ban_until, e.restrict_until
    FROM escorts e
    JOIN users u ON u.id = e.user_id
    LEFT JOIN squads s ON s.id = e.squad_id
    ORDER BY u.telegram_id ASC
    `
  );
  return q.rows;
}

export function bind(db: Db): ReportsRepo {
  return {
    monthlySummary: (from, to) => getMonthlySummary(db, from, to),
    userProfit: (userId) => getUserProfit(db, userId),
    exportOrders: () => getOrdersForExport(db),
    workerRoster: () => getWorkerRoster(db)
  };
}
