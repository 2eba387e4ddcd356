import type { PayoutsRepo, TransactionsRepo, WithdrawalsRepo } from "../store.js";
import type { PayoutRow, TransactionRow, TransactionType, WithdrawalRow } from "../types.js";
import { type Db, firstRow } from "./rows.js";

export async function listPayoutsByOrder(db: Db, orderId: number): Promise<PayoutRow[]> {
  const q = await db.query<PayoutRow>("SELECT * FROM payouts WHERE order_id = $1 ORDER BY id ASC", [orderId]);
  return q.rows;
}

export async function createPayout(
  db: Db,
  args: { orderId: number; escortId: number; userId: number; amount: number; commissionAmount: number; now: Date }
): Promise<PayoutRow> {
  const q = await db.query<PayoutRow>(
    `
    INSERT INTO payouts (order_id, escort_id, user_id, amount, commission_amount, created_at)
    VALUES ($1,$2,$3,$4,$5,$6)
    RETURNING *
    `,
    [args.orderId, args.escortId, args.userId, args.amount, args.commissionAmount, args.now]
  );
  return firstRow(q, "payouts.create");
}

export async function getWithdrawalById(db: Db, id: number): Promise<WithdrawalRow | null> {
  const q = await db.query<WithdrawalRow>("SELECT * FROM withdrawals WHERE id = $1 LIMIT 1", [id]);
  return q.rows[0] ?? null;
}

export async function lockWithdrawal(db: Db, id: number): Promise<WithdrawalRow | null> {
  const q = await db.query<WithdrawalRow>("SELECT * FROM withdrawals WHERE id = $1 FOR UPDATE", [id]);
  return q.rows[0] ?? null;
}

export async function createWithdrawal(
  db: Db,
  args: { userId: number; amount: number; now: Date }
): Promise<WithdrawalRow> {
  const q = await db.query<WithdrawalRow>(
    "INSERT INTO withdrawals (user_id, amount, status, created_at) VALUES ($1,$2,'pending',$3) RETURNING *",
    [args.userId, args.amount, args.now]
  );
  return firstRow(q, "withdrawals.create");
}

export async function resolveWithdrawal(
  db: Db,
  id: number,
  args: { status: "approved" | "rejected"; processedBy: number | null; now: Date }
): Promise<WithdrawalRow> {
  const q = await db.query<WithdrawalRow>(
    `
    UPDATE withdrawals
    SET status = $2, processed_by = $3, processed_at = $4
    WHERE id = $1 AND status = 'pending'
    RETURNING *
    `,
    [id, args.status, args.processedBy, args.now]
  );
  return firstRow(q, "withdrawals.resolve");
}

export async function listPendingWithdrawals(db: Db, limit = 100): Promise<WithdrawalRow[]> {
  const q = await db.query<WithdrawalRow>(
    "SELECT * FROM withdrawals WHERE status = 'pending' ORDER BY created_at ASC, id ASC LIMIT $1",
    [limit]
  );
  return q.rows;
}

export async function appendTransaction(
  db: Db,
  args: {
    userId: number;
    amount: number;
    type: TransactionType;
    orderId: number | null;
    withdrawalId: number | null;
    now: Date;
  }
): Promise<TransactionRow> {
  const q = await db.query<TransactionRow>(
    `
    INSERT INTO transactions (user_id, amount, type, order_id, withdrawal_id, created_at)
    VALUES ($1,$2,$3,$4,$5,$6)
    RETURNING *
    `,
    [args.userId, args.amount, args.type, args.orderId, args.withdrawalId, args.now]
  );
  return firstRow(q, "transactions.append");
}

export async function listTransactionsByUser(db: Db, userId: number, limit = 100): Promise<TransactionRow[]> {
  const q = await db.query<TransactionRow>(
    "SELECT * FROM transactions WHERE user_id = $1 ORDER BY created_at DESC, id DESC LIMIT $2",
    [userId, limit]
  );
  return q.rows;
}

export async function sumTransactionsPerUser(db: Db): Promise<Map<number, number>> {
  const q = await db.query<{ user_id: number; total: number }>(
    "SELECT user_id, sum(amount)::bigint AS total FROM transactions GROUP BY user_id"
  );
  return new Map(q.rows.map((r) => [r.user_id, r.total]));
}

export function bindPayouts(db: Db): PayoutsRepo {
  return {
    listByOrder: (orderId) => listPayoutsByOrder(db, orderId),
    create: (args) => createPayout(db, args)
  };
}

export function bindWithdrawals(db: Db): WithdrawalsRepo {
  return {
    findById: (id) => getWithdrawalById(db, id),
    lock: (id) => lockWithdrawal(db, id),
    create: (args) => createWithdrawal(db, args),
    resolve: (id, args) => resolveWithdrawal(db, id, args),
    listPending: (limit) => listPendingWithdrawals(db, limit)
  };
}

export function bindTransactions(db: Db): TransactionsRepo {
  return {
    append: (args) => appendTransaction(db, args),
    listByUser: (userId, limit) => listTransactionsByUser(db, userId, limit),
    sumsByUser: () => sumTransactionsPerUser(db)
  };
}
