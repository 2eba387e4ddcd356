import {
  InsufficientBalanceError,
  InvalidTransitionError,
  NotFoundError,
  ValidationError
} from "../core/errors.js";
import { assertPositiveAmount } from "../core/validation.js";
import { recordAction } from "../audit/actionLog.js";
import type { StoreTx } from "../db/store.js";
import type { OrderRow, PayoutRow, TransactionRow, TransactionType, UserRow, WithdrawalRow } from "../db/types.js";
import type { MarketContext } from "../market/settings.js";
import { commissionFor, splitEvenly } from "./commission.js";

export type LedgerRef = {
  orderId?: number | null;
  withdrawalId?: number | null;
};

export type BalanceChange = {
  user: UserRow;
  transaction: TransactionRow;
};

export type Settlement = {
  order: OrderRow;
  payouts: PayoutRow[];
  commission: number;
  /** false when the order had been settled before and nothing was credited */
  created: boolean;
};

export type BalanceMismatch = {
  userId: number;
  balance: number;
  expected: number;
};

async function lockUser(tx: StoreTx, userId: number): Promise<UserRow> {
  const user = await tx.users.lock(userId);
  if (!user) throw new NotFoundError("user", userId);
  return user;
}

async function post(
  tx: StoreTx,
  ctx: MarketContext,
  user: UserRow,
  delta: number,
  type: TransactionType,
  ref: LedgerRef
): Promise<BalanceChange> {
  const transaction = await tx.transactions.append({
    userId: user.id,
    amount: delta,
    type,
    orderId: ref.orderId ?? null,
    withdrawalId: ref.withdrawalId ?? null,
    now: ctx.now()
  });
  const updated = await tx.users.setBalance(user.id, user.balance + delta);
  return { user: updated, transaction };
}

export async function credit(
  tx: StoreTx,
  ctx: MarketContext,
  args: { userId: number; amount: number; type: TransactionType } & LedgerRef
): Promise<BalanceChange> {
  assertPositiveAmount(args.amount);
  const user = await lockUser(tx, args.userId);
  return post(tx, ctx, user, args.amount, args.type, args);
}

export async function debit(
  tx: StoreTx,
  ctx: MarketContext,
  args: { userId: number; amount: number; type: TransactionType } & LedgerRef
): Promise<BalanceChange> {
  assertPositiveAmount(args.amount);
  const user = await lockUser(tx, args.userId);
  if (user.balance < args.amount) throw new InsufficientBalanceError(user.id, user.balance, args.amount);
  return post(tx, ctx, user, -args.amount, args.type, args);
}

/** Admin top-up; logged as a credit action. */
export async function adjustBalance(
  tx: StoreTx,
  ctx: MarketContext,
  args: { userId: number; amount: number; actorId?: number | null; reason?: string }
): Promise<BalanceChange> {
  const change = await credit(tx, ctx, { userId: args.userId, amount: args.amount, type: "manual_credit" });
  await recordAction(tx, ctx, {
    type: "credit",
    actorId: args.actorId,
    subjectUserId: args.userId,
    description: args.reason ?? `manual credit ${args.amount}`
  });
  return change;
}

/** Debits the whole balance; returns null when it is already zero. */
export async function zeroBalance(
  tx: StoreTx,
  ctx: MarketContext,
  args: { userId: number; actorId?: number | null }
): Promise<BalanceChange | null> {
  const user = await lockUser(tx, args.userId);
  if (user.balance === 0) return null;
  const change = await post(tx, ctx, user, -user.balance, "manual_debit", {});
  await recordAction(tx, ctx, {
    type: "debit",
    actorId: args.actorId,
    subjectUserId: user.id,
    description: `balance zeroed (was ${user.balance})`
  });
  return change;
}

/**
 * Pays the active assignees of a completed order. The caller holds the order
 * row lock. Returns the existing payouts when the order was settled before.
 */
export async function settleLocked(tx: StoreTx, ctx: MarketContext, order: OrderRow): Promise<Settlement> {
  const existing = await tx.payouts.listByOrder(order.id);
  if (existing.length) {
    return { order, payouts: existing, commission: order.commission_amount, created: false };
  }

  const assignments = await tx.assignments.listActiveByOrder(order.id);
  if (!assignments.length) {
    throw new InvalidTransitionError(`order ${order.id} has no active assignees to pay`, { orderId: order.id });
  }

  const commission = commissionFor(ctx.settings.commission, order.amount);
  const nets = splitEvenly(order.amount - commission, assignments.length);
  const cuts = splitEvenly(commission, assignments.length);
  const now = ctx.now();

  const payouts: PayoutRow[] = [];
  for (const [i, assignment] of assignments.entries()) {
    const escort = await tx.escorts.findById(assignment.escort_id);
    if (!escort) throw new NotFoundError("escort", assignment.escort_id);
    const amount = nets[i] ?? 0;
    const commissionAmount = cuts[i] ?? 0;

    payouts.push(
      await tx.payouts.create({
        orderId: order.id,
        escortId: escort.id,
        userId: escort.user_id,
        amount,
        commissionAmount,
        now
      })
    );
    // A zero net share (commission at 100%) still gets its payout row but no transaction.
    if (amount > 0) await credit(tx, ctx, { userId: escort.user_id, amount, type: "payout", orderId: order.id });
  }

  const updated = await tx.orders.update(order.id, { commission_amount: commission });
  return { order: updated, payouts, commission, created: true };
}

export function describeSettlement(s: Settlement): string {
  const paid = s.payouts.reduce((sum, p) => sum + p.amount, 0);
  return `paid ${paid} to ${s.payouts.length} escort(s), commission ${s.commission}`;
}

export async function settleOrder(tx: StoreTx, ctx: MarketContext, args: { orderId: number }): Promise<Settlement> {
  const order = await tx.orders.lock(args.orderId);
  if (!order) throw new NotFoundError("order", args.orderId);
  if (order.status !== "completed") {
    throw new InvalidTransitionError(`order ${order.id} must be completed to settle (status=${order.status})`, {
      orderId: order.id,
      status: order.status
    });
  }
  const settlement = await settleLocked(tx, ctx, order);
  if (settlement.created) {
    await recordAction(tx, ctx, { type: "settle_order", orderId: order.id, description: describeSettlement(settlement) });
  }
  return settlement;
}

/** Holds the amount right away: the balance drops while the withdrawal is pending. */
export async function requestWithdrawal(
  tx: StoreTx,
  ctx: MarketContext,
  args: { userId: number; amount: number }
): Promise<WithdrawalRow> {
  assertPositiveAmount(args.amount);
  if (args.amount < ctx.settings.minWithdrawal) {
    throw new ValidationError(`minimum withdrawal is ${ctx.settings.minWithdrawal}`, {
      amount: args.amount,
      min: ctx.settings.minWithdrawal
    });
  }

  const user = await lockUser(tx, args.userId);
  if (user.balance < args.amount) throw new InsufficientBalanceError(user.id, user.balance, args.amount);

  const withdrawal = await tx.withdrawals.create({ userId: user.id, amount: args.amount, now: ctx.now() });
  await post(tx, ctx, user, -args.amount, "withdrawal_hold", { withdrawalId: withdrawal.id });

  await recordAction(tx, ctx, {
    type: "request_withdrawal",
    actorId: user.id,
    subjectUserId: user.id,
    next: withdrawal.status,
    description: `withdrawal ${withdrawal.id} of ${args.amount}`
  });
  return withdrawal;
}

export async function resolveWithdrawal(
  tx: StoreTx,
  ctx: MarketContext,
  args: { withdrawalId: number; approve: boolean; actorId?: number | null }
): Promise<WithdrawalRow> {
  const withdrawal = await tx.withdrawals.lock(args.withdrawalId);
  if (!withdrawal) throw new NotFoundError("withdrawal", args.withdrawalId);
  if (withdrawal.status !== "pending") {
    throw new InvalidTransitionError(`withdrawal ${withdrawal.id} is already ${withdrawal.status}`, {
      withdrawalId: withdrawal.id,
      status: withdrawal.status
    });
  }

  const resolved = await tx.withdrawals.resolve(withdrawal.id, {
    status: args.approve ? "approved" : "rejected",
    processedBy: args.actorId ?? null,
    now: ctx.now()
  });
  if (!args.approve) {
    await credit(tx, ctx, {
      userId: withdrawal.user_id,
      amount: withdrawal.amount,
      type: "withdrawal_refund",
      withdrawalId: withdrawal.id
    });
  }

  await recordAction(tx, ctx, {
    type: args.approve ? "approve_withdrawal" : "reject_withdrawal",
    actorId: args.actorId,
    subjectUserId: withdrawal.user_id,
    prior: withdrawal.status,
    next: resolved.status,
    description: `withdrawal ${withdrawal.id} of ${withdrawal.amount}`
  });
  return resolved;
}

/** Users whose cached balance differs from the sum of their transactions. */
export async function reconcileBalances(tx: StoreTx): Promise<BalanceMismatch[]> {
  const sums = await tx.transactions.sumsByUser();
  const users = await tx.users.listAll();
  return users
    .map((u) => ({ userId: u.id, balance: u.balance, expected: sums.get(u.id) ?? 0 }))
    .filter((m) => m.balance !== m.expected);
}
