import {
  AlreadyAssignedError,
  DuplicateOrderError,
  InvalidTransitionError,
  NotFoundError,
  ValidationError
} from "../core/errors.js";
import { hoursBefore } from "../core/clock.js";
import { assertPositiveAmount, assertRatingScore, isMemoOrderId } from "../core/validation.js";
import { recordAction } from "../audit/actionLog.js";
import { describeSettlement, type Settlement, settleLocked } from "../ledger/engine.js";
import { rateEscort, rateSquad } from "../reputation/tracker.js";
import type { StoreTx } from "../db/store.js";
import type { ActionLogRow, EscortRow, OrderRow, OrderStatus, UserRow } from "../db/types.js";
import type { MarketContext } from "../market/settings.js";
import { nextStatus } from "./transitions.js";

export type CreateOrderInput = {
  memoOrderId: string;
  customerId?: number | null;
  amount: number;
  customerInfo?: string;
  actorId?: number | null;
};

export type CompletedOrder = {
  order: OrderRow;
  settlement: Settlement;
};

async function lockOrder(tx: StoreTx, orderId: number): Promise<OrderRow> {
  const order = await tx.orders.lock(orderId);
  if (!order) throw new NotFoundError("order", orderId);
  return order;
}

function sameOrder(order: OrderRow, input: CreateOrderInput, customerInfo: string): boolean {
  return (
    order.amount === input.amount &&
    order.customer_id === (input.customerId ?? null) &&
    order.customer_info === customerInfo
  );
}

/**
 * Creates an open order keyed by its memo id. Replaying the same submission
 * returns the stored order; reusing the memo id for anything else fails.
 */
export async function createOrder(
  tx: StoreTx,
  ctx: MarketContext,
  input: CreateOrderInput
): Promise<{ order: OrderRow; created: boolean }> {
  if (!isMemoOrderId(input.memoOrderId)) {
    throw new ValidationError("memo order id must be 1-64 letters, digits, '-' or '_'", { memoOrderId: input.memoOrderId });
  }
  assertPositiveAmount(input.amount);
  const customerInfo = (input.customerInfo ?? "").trim();

  const existing = await tx.orders.findByMemoId(input.memoOrderId);
  if (existing) {
    if (sameOrder(existing, input, customerInfo)) return { order: existing, created: false };
    throw new DuplicateOrderError(input.memoOrderId);
  }

  const customerId = input.customerId ?? null;
  if (customerId !== null && !(await tx.users.findById(customerId))) throw new NotFoundError("user", customerId);

  const order = await tx.orders.create({
    memoOrderId: input.memoOrderId,
    customerId,
    customerInfo,
    amount: input.amount,
    now: ctx.now()
  });
  await recordAction(tx, ctx, {
    type: "create_order",
    actorId: input.actorId ?? customerId,
    subjectUserId: customerId,
    orderId: order.id,
    next: order.status,
    description: `order ${order.memo_order_id} for ${order.amount}`
  });
  return { order, created: true };
}

export async function startOrder(
  tx: StoreTx,
  ctx: MarketContext,
  args: { orderId: number; actorId?: number | null }
): Promise<OrderRow> {
  const order = await lockOrder(tx, args.orderId);
  const status = nextStatus(order, "start");
  const updated = await tx.orders.update(order.id, { status, started_at: ctx.now() });
  await recordAction(tx, ctx, {
    type: "start_order",
    actorId: args.actorId,
    orderId: order.id,
    prior: order.status,
    next: status
  });
  return updated;
}

// One score per order: each assignee once, each of their squads once.
async function applyOrderRating(tx: StoreTx, orderId: number, score: number): Promise<void> {
  const squads = new Set<number>();
  for (const a of await tx.assignments.listActiveByOrder(orderId)) {
    const escort = await rateEscort(tx, a.escort_id, score);
    if (escort.squad_id !== null) squads.add(escort.squad_id);
  }
  for (const squadId of squads) await rateSquad(tx, squadId, score);
}

async function refreshCounters(tx: StoreTx, order: OrderRow): Promise<void> {
  for (const a of await tx.assignments.listActiveByOrder(order.id)) {
    const completed = await tx.assignments.countCompletedForEscort(a.escort_id);
    await tx.escorts.update(a.escort_id, { completed_orders: completed });
  }
  if (order.squad_id !== null) {
    const squad = await tx.squads.lock(order.squad_id);
    if (squad) {
      const totals = await tx.orders.squadTotals(squad.id);
      await tx.squads.update(squad.id, { total_orders: totals.orders, total_earned: totals.earned });
    }
  }
}

/**
 * Settles, completes and (optionally) rates an order in one step. Escort and
 * squad counters are recomputed from completed orders and payouts.
 */
export async function completeOrder(
  tx: StoreTx,
  ctx: MarketContext,
  args: { orderId: number; rating?: number | null; actorId?: number | null }
): Promise<CompletedOrder> {
  const rating = args.rating ?? null;
  if (rating !== null) assertRatingScore(rating);

  const order = await lockOrder(tx, args.orderId);
  const status = nextStatus(order, "complete");

  const settlement = await settleLocked(tx, ctx, order);
  const completed = await tx.orders.update(order.id, {
    status,
    finished_at: ctx.now(),
    ...(rating !== null ? { rating } : {})
  });

  await refreshCounters(tx, completed);
  if (rating !== null) await applyOrderRating(tx, order.id, rating);

  await recordAction(tx, ctx, {
    type: "complete_order",
    actorId: args.actorId,
    orderId: order.id,
    prior: order.status,
    next: status,
    description: [describeSettlement(settlement), rating !== null ? `rated ${rating}` : null]
      .filter((part): part is string => part !== null)
      .join("; ")
  });
  return { order: completed, settlement: { ...settlement, order: completed } };
}

export type CancelOrderInput = {
  orderId: number;
  actorId?: number | null;
  reason?: string;
  /** Status the caller last saw; the cancel fails if the order has moved on. */
  expectedStatus?: OrderStatus;
};

export async function cancelOrder(tx: StoreTx, ctx: MarketContext, args: CancelOrderInput): Promise<OrderRow> {
  const order = await lockOrder(tx, args.orderId);
  if (args.expectedStatus !== undefined && order.status !== args.expectedStatus) {
    if (order.status === "assigned" || order.status === "in_progress") throw new AlreadyAssignedError(order.id);
    throw new InvalidTransitionError(`order ${order.id} is ${order.status}, expected ${args.expectedStatus}`, {
      orderId: order.id,
      status: order.status,
      expected: args.expectedStatus
    });
  }
  const status = nextStatus(order, "cancel");
  const now = ctx.now();

  const released = await tx.assignments.releaseByOrder(order.id, now);
  const updated = await tx.orders.update(order.id, { status, finished_at: now });
  await recordAction(tx, ctx, {
    type: "cancel_order",
    actorId: args.actorId,
    orderId: order.id,
    prior: order.status,
    next: status,
    description: args.reason ?? (released ? `released ${released} assignment(s)` : undefined)
  });
  return updated;
}

/** Rates a completed order once, after the fact. */
export async function rateOrder(
  tx: StoreTx,
  ctx: MarketContext,
  args: { orderId: number; score: number; actorId?: number | null }
): Promise<OrderRow> {
  assertRatingScore(args.score);
  const order = await lockOrder(tx, args.orderId);
  if (order.status !== "completed") {
    throw new InvalidTransitionError(`order ${order.id} is not completed (status=${order.status})`, {
      orderId: order.id,
      status: order.status
    });
  }
  if (order.rating !== null) {
    throw new InvalidTransitionError(`order ${order.id} is already rated`, { orderId: order.id, rating: order.rating });
  }

  await applyOrderRating(tx, order.id, args.score);
  const updated = await tx.orders.update(order.id, { rating: args.score });
  await recordAction(tx, ctx, {
    type: "rate_order",
    actorId: args.actorId,
    orderId: order.id,
    description: `rated ${args.score}`
  });
  return updated;
}

export type StaleOrderQuery = {
  olderThanHours: number;
  /** Skip orders that already got a reminder within this many hours. */
  notRemindedWithinHours?: number;
  limit?: number;
};

export async function findStaleOrders(
  tx: StoreTx,
  ctx: MarketContext,
  args: StaleOrderQuery
): Promise<OrderRow[]> {
  if (!(args.olderThanHours > 0)) throw new ValidationError("olderThanHours must be positive");
  if (args.notRemindedWithinHours !== undefined && !(args.notRemindedWithinHours > 0)) {
    throw new ValidationError("notRemindedWithinHours must be positive");
  }
  const now = ctx.now();
  const remindedSince =
    args.notRemindedWithinHours === undefined ? null : hoursBefore(now, args.notRemindedWithinHours);
  return tx.orders.listStartedBefore("in_progress", hoursBefore(now, args.olderThanHours), args.limit ?? 100, remindedSince);
}

export type Assignee = {
  escort: EscortRow;
  user: UserRow;
};

/** Active assignees of an order with their owning users (for notifications). */
export async function listAssignees(tx: StoreTx, args: { orderId: number }): Promise<Assignee[]> {
  const out: Assignee[] = [];
  for (const a of await tx.assignments.listActiveByOrder(args.orderId)) {
    const escort = await tx.escorts.findById(a.escort_id);
    if (!escort) throw new NotFoundError("escort", a.escort_id);
    const user = await tx.users.findById(escort.user_id);
    if (!user) throw new NotFoundError("user", escort.user_id);
    out.push({ escort, user });
  }
  return out;
}

export async function recordReminder(
  tx: StoreTx,
  ctx: MarketContext,
  args: { orderId: number; escortIds: readonly number[] }
): Promise<ActionLogRow> {
  const order = await tx.orders.findById(args.orderId);
  if (!order) throw new NotFoundError("order", args.orderId);
  return recordAction(tx, ctx, {
    type: "reminder_sent",
    orderId: order.id,
    description: `reminded escort(s) ${args.escortIds.join(", ")}`
  });
}
