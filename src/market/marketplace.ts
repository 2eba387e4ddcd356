import { withConflictRetry } from "../core/async.js";
import { type Clock, systemClock } from "../core/clock.js";
import { errorMessage, isMarketError, NotFoundError } from "../core/errors.js";
import { logger } from "../core/logger.js";
import { recordAction } from "../audit/actionLog.js";
import { fileComplaint } from "../audit/complaints.js";
import { apply, assign, type AssignResult, autoAssign } from "../assignment/engine.js";
import * as ledger from "../ledger/engine.js";
import * as lifecycle from "../orders/lifecycle.js";
import * as reputation from "../reputation/tracker.js";
import * as squads from "../registry/squads.js";
import * as users from "../registry/users.js";
import { generateOrdersCsv } from "../reports/csv.js";
import { monthlyReport, type MonthlyReport, userProfit } from "../reports/monthly.js";
import { type BalanceListing, listBalances, listWorkers } from "../reports/roster.js";
import type { Store, StoreTx } from "../db/store.js";
import type {
  ActionLogRow,
  ApplicationRow,
  ComplaintRow,
  EscortRow,
  OrderRow,
  OrderStatus,
  SquadRow,
  TransactionRow,
  UserProfit,
  UserRow,
  WithdrawalRow,
  WorkerListingRow
} from "../db/types.js";
import { DEFAULT_SETTINGS, type MarketContext, type MarketSettings, validateSettings } from "./settings.js";

export type MarketplaceOptions = {
  store: Store;
  settings?: Partial<MarketSettings>;
  clock?: Clock;
};

type Actor = { actorId?: number | null };

/**
 * Command/query surface of the marketplace. Each call is one store
 * transaction; lock conflicts are retried with backoff, everything else
 * reaches the caller unchanged.
 */
export class Marketplace {
  readonly settings: MarketSettings;
  private readonly store: Store;
  private readonly ctx: MarketContext;

  constructor(opts: MarketplaceOptions) {
    this.store = opts.store;
    this.settings = validateSettings({ ...DEFAULT_SETTINGS, ...opts.settings });
    this.ctx = { settings: this.settings, now: opts.clock ?? systemClock };
  }

  private async run<T>(op: string, fn: (tx: StoreTx, ctx: MarketContext) => Promise<T>): Promise<T> {
    try {
      return await withConflictRetry(() => this.store.transaction((tx) => fn(tx, this.ctx)), {
        retries: this.settings.conflictRetries,
        backoffMs: this.settings.conflictBackoffMs,
        onRetry: (attempt, e) => logger.warn(`${op}: conflict, retry #${attempt}`, e.details)
      });
    } catch (e) {
      if (isMarketError(e)) logger.warn(`${op} rejected: ${e.code} ${e.message}`);
      else logger.error(`${op} failed: ${errorMessage(e)}`, e);
      throw e;
    }
  }

  // --- orders

  async createOrder(input: lifecycle.CreateOrderInput): Promise<OrderRow> {
    const { order, created } = await this.run("createOrder", (tx, ctx) => lifecycle.createOrder(tx, ctx, input));
    if (created) logger.info(`order ${order.id} created (memo=${order.memo_order_id}, amount=${order.amount})`);
    return order;
  }

  applyToOrder(args: { orderId: number; escortId: number }): Promise<ApplicationRow> {
    return this.run("applyToOrder", (tx, ctx) => apply(tx, ctx, args));
  }

  async assignOrder(args: { orderId: number; escortIds: number | readonly number[] } & Actor): Promise<AssignResult> {
    const res = await this.run("assignOrder", (tx, ctx) => assign(tx, ctx, args));
    logger.info(`order ${res.order.id} assigned to ${res.assignments.map((a) => a.escort_id).join(", ")}`);
    return res;
  }

  async autoAssignOrder(args: { orderId: number } & Actor): Promise<AssignResult> {
    const res = await this.run("autoAssignOrder", (tx, ctx) => autoAssign(tx, ctx, args));
    logger.info(`order ${res.order.id} auto-assigned to ${res.assignments.map((a) => a.escort_id).join(", ")}`);
    return res;
  }

  startOrder(args: { orderId: number } & Actor): Promise<OrderRow> {
    return this.run("startOrder", (tx, ctx) => lifecycle.startOrder(tx, ctx, args));
  }

  async completeOrder(args: { orderId: number; rating?: number | null } & Actor): Promise<lifecycle.CompletedOrder> {
    const res = await this.run("completeOrder", (tx, ctx) => lifecycle.completeOrder(tx, ctx, args));
    logger.info(`order ${res.order.id} completed: ${res.settlement.payouts.length} payout(s), commission ${res.settlement.commission}`);
    return res;
  }

  async cancelOrder(args: lifecycle.CancelOrderInput): Promise<OrderRow> {
    const order = await this.run("cancelOrder", (tx, ctx) => lifecycle.cancelOrder(tx, ctx, args));
    logger.info(`order ${order.id} cancelled`);
    return order;
  }

  settleOrder(args: { orderId: number }): Promise<ledger.Settlement> {
    return this.run("settleOrder", (tx, ctx) => ledger.settleOrder(tx, ctx, args));
  }

  rateOrder(args: { orderId: number; score: number } & Actor): Promise<OrderRow> {
    return this.run("rateOrder", (tx, ctx) => lifecycle.rateOrder(tx, ctx, args));
  }

  recordReminder(args: { orderId: number; escortIds: readonly number[] }): Promise<ActionLogRow> {
    return this.run("recordReminder", (tx, ctx) => lifecycle.recordReminder(tx, ctx, args));
  }

  // --- ledger

  credit(
    args: { userId: number; amount: number; type?: "manual_credit" | "payout" | "withdrawal_refund" } & Actor
  ): Promise<ledger.BalanceChange> {
    return this.run("credit", async (tx, ctx) => {
      const change = await ledger.credit(tx, ctx, { ...args, type: args.type ?? "manual_credit" });
      await recordAction(tx, ctx, {
        type: "credit",
        actorId: args.actorId,
        subjectUserId: args.userId,
        description: `${change.transaction.type} ${args.amount}`
      });
      return change;
    });
  }

  debit(args: { userId: number; amount: number; type?: "manual_debit" } & Actor): Promise<ledger.BalanceChange> {
    return this.run("debit", async (tx, ctx) => {
      const change = await ledger.debit(tx, ctx, { ...args, type: args.type ?? "manual_debit" });
      await recordAction(tx, ctx, {
        type: "debit",
        actorId: args.actorId,
        subjectUserId: args.userId,
        description: `${change.transaction.type} ${args.amount}`
      });
      return change;
    });
  }

  adjustBalance(args: { userId: number; amount: number; reason?: string } & Actor): Promise<ledger.BalanceChange> {
    return this.run("adjustBalance", (tx, ctx) => ledger.adjustBalance(tx, ctx, args));
  }

  zeroBalance(args: { userId: number } & Actor): Promise<ledger.BalanceChange | null> {
    return this.run("zeroBalance", (tx, ctx) => ledger.zeroBalance(tx, ctx, args));
  }

  async requestWithdrawal(args: { userId: number; amount: number }): Promise<WithdrawalRow> {
    const w = await this.run("requestWithdrawal", (tx, ctx) => ledger.requestWithdrawal(tx, ctx, args));
    logger.info(`withdrawal ${w.id} requested by user ${w.user_id}: ${w.amount}`);
    return w;
  }

  async resolveWithdrawal(args: { withdrawalId: number; approve: boolean } & Actor): Promise<WithdrawalRow> {
    const w = await this.run("resolveWithdrawal", (tx, ctx) => ledger.resolveWithdrawal(tx, ctx, args));
    logger.info(`withdrawal ${w.id} ${w.status}`);
    return w;
  }

  // --- reputation

  recordRating(args: { escortId: number; score: number } & Actor): Promise<EscortRow> {
    return this.run("recordRating", (tx, ctx) => reputation.recordRating(tx, ctx, args));
  }

  banWorker(args: { escortId: number; until: Date | null } & Actor): Promise<EscortRow> {
    return this.run("banWorker", (tx, ctx) => reputation.ban(tx, ctx, args));
  }

  banWorkerPermanently(args: { escortId: number } & Actor): Promise<EscortRow> {
    return this.run("banWorkerPermanently", (tx, ctx) => reputation.banPermanently(tx, ctx, args));
  }

  restrictWorker(args: { escortId: number; until: Date | null } & Actor): Promise<EscortRow> {
    return this.run("restrictWorker", (tx, ctx) => reputation.restrict(tx, ctx, args));
  }

  unbanWorker(args: { escortId: number } & Actor): Promise<EscortRow> {
    return this.run("unbanWorker", (tx, ctx) => reputation.unban(tx, ctx, args));
  }

  fileComplaint(args: { userId: number; orderId?: number | null; text: string }): Promise<ComplaintRow> {
    return this.run("fileComplaint", (tx, ctx) => fileComplaint(tx, ctx, args));
  }

  // --- registry

  async registerUser(args: { telegramId: number; username?: string | null }): Promise<UserRow> {
    const { user } = await this.run("registerUser", (tx, ctx) => users.registerUser(tx, ctx, args));
    return user;
  }

  enrollWorker(args: { userId: number } & Actor): Promise<EscortRow> {
    return this.run("enrollWorker", (tx, ctx) => users.enrollWorker(tx, ctx, args));
  }

  acceptRules(args: { escortId: number }): Promise<EscortRow> {
    return this.run("acceptRules", (tx, ctx) => users.acceptRules(tx, ctx, args));
  }

  setGameAccount(args: { escortId: number; gameAccountId: string }): Promise<EscortRow> {
    return this.run("setGameAccount", (tx, ctx) => users.setGameAccount(tx, ctx, args));
  }

  createSquad(args: { name: string } & Actor): Promise<SquadRow> {
    return this.run("createSquad", (tx, ctx) => squads.createSquad(tx, ctx, args));
  }

  disbandSquad(args: { squadId: number } & Actor): Promise<{ squad: SquadRow; released: number }> {
    return this.run("disbandSquad", (tx, ctx) => squads.disbandSquad(tx, ctx, args));
  }

  addToSquad(args: { squadId: number; escortId: number } & Actor): Promise<EscortRow> {
    return this.run("addToSquad", (tx, ctx) => squads.addToSquad(tx, ctx, args));
  }

  removeFromSquad(args: { escortId: number } & Actor): Promise<EscortRow> {
    return this.run("removeFromSquad", (tx, ctx) => squads.removeFromSquad(tx, ctx, args));
  }

  // --- queries

  getOrder(orderId: number): Promise<OrderRow | null> {
    return this.run("getOrder", (tx) => tx.orders.findById(orderId));
  }

  getOrderByMemoId(memoOrderId: string): Promise<OrderRow | null> {
    return this.run("getOrderByMemoId", (tx) => tx.orders.findByMemoId(memoOrderId));
  }

  listOrdersByStatus(status: OrderStatus, limit = 100): Promise<OrderRow[]> {
    return this.run("listOrdersByStatus", (tx) => tx.orders.listByStatus(status, limit));
  }

  listAssignees(orderId: number): Promise<lifecycle.Assignee[]> {
    return this.run("listAssignees", (tx) => lifecycle.listAssignees(tx, { orderId }));
  }

  getEscortByTelegramId(telegramId: number): Promise<EscortRow | null> {
    return this.run("getEscortByTelegramId", async (tx) => {
      const user = await tx.users.findByTelegramId(telegramId);
      return user ? tx.escorts.findByUserId(user.id) : null;
    });
  }

  getSquadByName(name: string): Promise<SquadRow | null> {
    return this.run("getSquadByName", (tx) => tx.squads.findByName(name.trim()));
  }

  listSquads(): Promise<SquadRow[]> {
    return this.run("listSquads", (tx) => tx.squads.listAll());
  }

  getBalance(userId: number): Promise<number> {
    return this.run("getBalance", async (tx) => {
      const user = await tx.users.findById(userId);
      if (!user) throw new NotFoundError("user", userId);
      return user.balance;
    });
  }

  listTransactions(userId: number, limit = 50): Promise<TransactionRow[]> {
    return this.run("listTransactions", (tx) => tx.transactions.listByUser(userId, limit));
  }

  listPendingWithdrawals(limit = 50): Promise<WithdrawalRow[]> {
    return this.run("listPendingWithdrawals", (tx) => tx.withdrawals.listPending(limit));
  }

  actionsForOrder(orderId: number, limit = 100): Promise<ActionLogRow[]> {
    return this.run("actionsForOrder", (tx) => tx.actions.listByOrder(orderId, limit));
  }

  actionsForUser(userId: number, limit = 100): Promise<ActionLogRow[]> {
    return this.run("actionsForUser", (tx) => tx.actions.listByUser(userId, limit));
  }

  complaintsForOrder(orderId: number): Promise<ComplaintRow[]> {
    return this.run("complaintsForOrder", (tx) => tx.complaints.listByOrder(orderId));
  }

  findStaleOrders(args: lifecycle.StaleOrderQuery): Promise<OrderRow[]> {
    return this.run("findStaleOrders", (tx, ctx) => lifecycle.findStaleOrders(tx, ctx, args));
  }

  monthlyReport(year: number, month: number): Promise<MonthlyReport> {
    return this.run("monthlyReport", (tx) => monthlyReport(tx, { year, month }));
  }

  userProfit(userId: number): Promise<UserProfit> {
    return this.run("userProfit", (tx) => userProfit(tx, { userId }));
  }

  listWorkers(): Promise<WorkerListingRow[]> {
    return this.run("listWorkers", (tx) => listWorkers(tx));
  }

  listBalances(args: { positiveOnly?: boolean } = {}): Promise<BalanceListing> {
    return this.run("listBalances", (tx) => listBalances(tx, args));
  }

  async exportOrdersCsv(): Promise<string> {
    const rows = await this.run("exportOrdersCsv", (tx) => tx.reports.exportOrders());
    return generateOrdersCsv(rows);
  }

  reconcileBalances(): Promise<ledger.BalanceMismatch[]> {
    return this.run("reconcileBalances", (tx) => ledger.reconcileBalances(tx));
  }
}

export function createMarketplace(opts: MarketplaceOptions): Marketplace {
  return new Marketplace(opts);
}
