import { ConflictError } from "../core/errors.js";
import type { Store, StoreTx } from "./store.js";
import type {
  ActionLogRow,
  ApplicationRow,
  AssignmentRow,
  ComplaintRow,
  EscortRow,
  OrderRow,
  PayoutRow,
  SquadRow,
  TransactionRow,
  UserRow,
  WithdrawalRow
} from "./types.js";

/*
 * In-process Store for tests and local runs. Transactions run one at a time
 * (a FIFO lock with a bounded wait) against a structured clone of the tables;
 * the clone replaces the live tables only when the callback resolves.
 */

type Tables = {
  nextId: number;
  users: UserRow[];
  escorts: EscortRow[];
  squads: SquadRow[];
  orders: OrderRow[];
  applications: ApplicationRow[];
  assignments: AssignmentRow[];
  payouts: PayoutRow[];
  withdrawals: WithdrawalRow[];
  transactions: TransactionRow[];
  complaints: ComplaintRow[];
  actions: ActionLogRow[];
};

function emptyTables(): Tables {
  return {
    nextId: 1,
    users: [],
    escorts: [],
    squads: [],
    orders: [],
    applications: [],
    assignments: [],
    payouts: [],
    withdrawals: [],
    transactions: [],
    complaints: [],
    actions: []
  };
}

class TxLock {
  private held = false;
  private waiters: Array<() => void> = [];

  acquire(timeoutMs: number): Promise<void> {
    if (!this.held) {
      this.held = true;
      return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      const grant = () => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        const i = this.waiters.indexOf(grant);
        if (i >= 0) this.waiters.splice(i, 1);
        reject(new ConflictError(`lock wait exceeded ${timeoutMs}ms`, { timeoutMs }));
      }, timeoutMs);
      this.waiters.push(grant);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) next();
    else this.held = false;
  }
}

function copy<T extends object>(row: T): T {
  return { ...row };
}

function applyPatch<T extends object>(row: T, patch: Partial<T>): void {
  for (const [k, v] of Object.entries(patch)) {
    if (v !== undefined) Object.assign(row, { [k]: v });
  }
}

function byCreated<T extends { id: number; created_at: Date }>(a: T, b: T): number {
  return a.created_at.getTime() - b.created_at.getTime() || a.id - b.id;
}

function uniqueViolation(what: string): ConflictError {
  return new ConflictError(`transaction aborted: unique_violation (${what})`, { code: "23505" });
}

function mustFind<T extends { id: number }>(rows: T[], id: number, what: string): T {
  const row = rows.find((r) => r.id === id);
  if (!row) throw new Error(`${what}: no row with id ${id}`);
  return row;
}

function bindTx(t: Tables): StoreTx {
  const nextId = () => t.nextId++;

  return {
    users: {
      findById: async (id) => {
        const u = t.users.find((r) => r.id === id);
        return u ? copy(u) : null;
      },
      findByTelegramId: async (telegramId) => {
        const u = t.users.find((r) => r.telegram_id === telegramId);
        return u ? copy(u) : null;
      },
      lock: async (id) => {
        const u = t.users.find((r) => r.id === id);
        return u ? copy(u) : null;
      },
      create: async (args) => {
        if (t.users.some((r) => r.telegram_id === args.telegramId)) throw uniqueViolation("users.telegram_id");
        const row: UserRow = {
          id: nextId(),
          telegram_id: args.telegramId,
          username: args.username,
          balance: 0,
          is_worker: false,
          created_at: args.now
        };
        t.users.push(row);
        return copy(row);
      },
      setBalance: async (id, balance) => {
        if (balance < 0) throw new Error(`users.setBalance: negative balance for ${id}`);
        const row = mustFind(t.users, id, "users.setBalance");
        row.balance = balance;
        return copy(row);
      },
      setWorker: async (id, isWorker) => {
        const row = mustFind(t.users, id, "users.setWorker");
        row.is_worker = isWorker;
        return copy(row);
      },
      listAll: async () => [...t.users].sort((a, b) => a.id - b.id).map(copy)
    },

    escorts: {
      findById: async (id) => {
        const e = t.escorts.find((r) => r.id === id);
        return e ? copy(e) : null;
      },
      findByUserId: async (userId) => {
        const e = t.escorts.find((r) => r.user_id === userId);
        return e ? copy(e) : null;
      },
      lock: async (id) => {
        const e = t.escorts.find((r) => r.id === id);
        return e ? copy(e) : null;
      },
      create: async (args) => {
        if (t.escorts.some((r) => r.user_id === args.userId)) throw uniqueViolation("escorts.user_id");
        const row: EscortRow = {
          id: nextId(),
          user_id: args.userId,
          game_account_id: null,
          squad_id: null,
          rating: 0,
          rating_count: 0,
          reputation: 0,
          completed_orders: 0,
          is_banned: false,
          ban_until: null,
          restrict_until: null,
          rules_accepted: false,
          created_at: args.now
        };
        t.escorts.push(row);
        return copy(row);
      },
      update: async (id, patch) => {
        const row = mustFind(t.escorts, id, "escorts.update");
        applyPatch(row, patch);
        return copy(row);
      },
      listBySquad: async (squadId) =>
        t.escorts.filter((r) => r.squad_id === squadId).sort((a, b) => a.id - b.id).map(copy),
      clearSquad: async (squadId) => {
        let n = 0;
        for (const row of t.escorts) {
          if (row.squad_id === squadId) {
            row.squad_id = null;
            n += 1;
          }
        }
        return n;
      }
    },

    squads: {
      findById: async (id) => {
        const s = t.squads.find((r) => r.id === id);
        return s ? copy(s) : null;
      },
      findByName: async (name) => {
        const s = t.squads.find((r) => r.name === name);
        return s ? copy(s) : null;
      },
      lock: async (id) => {
        const s = t.squads.find((r) => r.id === id);
        return s ? copy(s) : null;
      },
      create: async (args) => {
        if (t.squads.some((r) => r.name === args.name)) throw uniqueViolation("squads.name");
        const row: SquadRow = {
          id: nextId(),
          name: args.name,
          rating: 0,
          rating_count: 0,
          total_orders: 0,
          total_earned: 0,
          created_at: args.now
        };
        t.squads.push(row);
        return copy(row);
      },
      update: async (id, patch) => {
        const row = mustFind(t.squads, id, "squads.update");
        applyPatch(row, patch);
        return copy(row);
      },
      delete: async (id) => {
        t.squads = t.squads.filter((r) => r.id !== id);
        // ON DELETE SET NULL
        for (const o of t.orders) if (o.squad_id === id) o.squad_id = null;
        for (const a of t.applications) if (a.squad_id === id) a.squad_id = null;
      },
      listAll: async () => [...t.squads].sort((a, b) => a.name.localeCompare(b.name)).map(copy)
    },

    orders: {
      findById: async (id) => {
        const o = t.orders.find((r) => r.id === id);
        return o ? copy(o) : null;
      },
      findByMemoId: async (memoOrderId) => {
        const o = t.orders.find((r) => r.memo_order_id === memoOrderId);
        return o ? copy(o) : null;
      },
      lock: async (id) => {
        const o = t.orders.find((r) => r.id === id);
        return o ? copy(o) : null;
      },
      create: async (args) => {
        if (t.orders.some((r) => r.memo_order_id === args.memoOrderId)) throw uniqueViolation("orders.memo_order_id");
        const row: OrderRow = {
          id: nextId(),
          memo_order_id: args.memoOrderId,
          customer_id: args.customerId,
          customer_info: args.customerInfo,
          amount: args.amount,
          status: "open",
          squad_id: null,
          commission_amount: 0,
          rating: null,
          created_at: args.now,
          assigned_at: null,
          started_at: null,
          finished_at: null
        };
        t.orders.push(row);
        return copy(row);
      },
      update: async (id, patch) => {
        const row = mustFind(t.orders, id, "orders.update");
        applyPatch(row, patch);
        return copy(row);
      },
      listByStatus: async (status, limit) =>
        t.orders.filter((r) => r.status === status).sort(byCreated).slice(0, limit).map(copy),
      listStartedBefore: async (status, before, limit, notRemindedSince) =>
        t.orders
          .filter((r) => {
            const since = r.started_at ?? r.assigned_at ?? r.created_at;
            if (r.status !== status || since.getTime() >= before.getTime()) return false;
            if (!notRemindedSince) return true;
            const cutoff = notRemindedSince.getTime();
            return !t.actions.some(
              (a) => a.order_id === r.id && a.action_type === "reminder_sent" && a.created_at.getTime() >= cutoff
            );
          })
          .sort(byCreated)
          .slice(0, limit)
          .map(copy),
      squadTotals: async (squadId) => {
        const completed = t.orders.filter((o) => o.squad_id === squadId && o.status === "completed");
        const ids = new Set(completed.map((o) => o.id));
        const earned = t.payouts.filter((p) => ids.has(p.order_id)).reduce((sum, p) => sum + p.amount, 0);
        return { orders: completed.length, earned };
      }
    },

    applications: {
      find: async (orderId, escortId) => {
        const a = t.applications.find((r) => r.order_id === orderId && r.escort_id === escortId);
        return a ? copy(a) : null;
      },
      listByOrder: async (orderId) => t.applications.filter((r) => r.order_id === orderId).sort(byCreated).map(copy),
      create: async (args) => {
        if (t.applications.some((r) => r.order_id === args.orderId && r.escort_id === args.escortId)) {
          throw uniqueViolation("order_applications(order_id, escort_id)");
        }
        const row: ApplicationRow = {
          id: nextId(),
          order_id: args.orderId,
          escort_id: args.escortId,
          squad_id: args.squadId,
          game_account_id: args.gameAccountId,
          created_at: args.now
        };
        t.applications.push(row);
        return copy(row);
      }
    },

    assignments: {
      listActiveByOrder: async (orderId) =>
        t.assignments
          .filter((r) => r.order_id === orderId && r.released_at === null)
          .sort((a, b) => a.assigned_at.getTime() - b.assigned_at.getTime() || a.id - b.id)
          .map(copy),
      create: async (args) => {
        if (t.assignments.some((r) => r.order_id === args.orderId && r.escort_id === args.escortId)) {
          throw uniqueViolation("order_escorts(order_id, escort_id)");
        }
        const row: AssignmentRow = {
          id: nextId(),
          order_id: args.orderId,
          escort_id: args.escortId,
          game_account_id: args.gameAccountId,
          assigned_at: args.now,
          released_at: null
        };
        t.assignments.push(row);
        return copy(row);
      },
      releaseByOrder: async (orderId, now) => {
        let n = 0;
        for (const row of t.assignments) {
          if (row.order_id === orderId && row.released_at === null) {
            row.released_at = now;
            n += 1;
          }
        }
        return n;
      },
      countCompletedForEscort: async (escortId) =>
        t.assignments.filter((a) => {
          if (a.escort_id !== escortId || a.released_at !== null) return false;
          return t.orders.some((o) => o.id === a.order_id && o.status === "completed");
        }).length
    },

    payouts: {
      listByOrder: async (orderId) => t.payouts.filter((r) => r.order_id === orderId).sort((a, b) => a.id - b.id).map(copy),
      create: async (args) => {
        if (t.payouts.some((r) => r.order_id === args.orderId && r.escort_id === args.escortId)) {
          throw uniqueViolation("payouts(order_id, escort_id)");
        }
        const row: PayoutRow = {
          id: nextId(),
          order_id: args.orderId,
          escort_id: args.escortId,
          user_id: args.userId,
          amount: args.amount,
          commission_amount: args.commissionAmount,
          created_at: args.now
        };
        t.payouts.push(row);
        return copy(row);
      }
    },

    withdrawals: {
      findById: async (id) => {
        const w = t.withdrawals.find((r) => r.id === id);
        return w ? copy(w) : null;
      },
      lock: async (id) => {
        const w = t.withdrawals.find((r) => r.id === id);
        return w ? copy(w) : null;
      },
      create: async (args) => {
        const row: WithdrawalRow = {
          id: nextId(),
          user_id: args.userId,
          amount: args.amount,
          status: "pending",
          created_at: args.now,
          processed_at: null,
          processed_by: null
        };
        t.withdrawals.push(row);
        return copy(row);
      },
      resolve: async (id, args) => {
        const row = mustFind(t.withdrawals, id, "withdrawals.resolve");
        if (row.status !== "pending") throw new Error(`withdrawals.resolve: ${id} is ${row.status}`);
        row.status = args.status;
        row.processed_by = args.processedBy;
        row.processed_at = args.now;
        return copy(row);
      },
      listPending: async (limit) => t.withdrawals.filter((r) => r.status === "pending").sort(byCreated).slice(0, limit).map(copy)
    },

    transactions: {
      append: async (args) => {
        const row: TransactionRow = {
          id: nextId(),
          user_id: args.userId,
          amount: args.amount,
          type: args.type,
          order_id: args.orderId,
          withdrawal_id: args.withdrawalId,
          created_at: args.now
        };
        t.transactions.push(row);
        return copy(row);
      },
      listByUser: async (userId, limit) =>
        t.transactions
          .filter((r) => r.user_id === userId)
          .sort((a, b) => byCreated(b, a))
          .slice(0, limit)
          .map(copy),
      sumsByUser: async () => {
        const sums = new Map<number, number>();
        for (const r of t.transactions) sums.set(r.user_id, (sums.get(r.user_id) ?? 0) + r.amount);
        return sums;
      }
    },

    complaints: {
      create: async (args) => {
        const row: ComplaintRow = {
          id: nextId(),
          user_id: args.userId,
          order_id: args.orderId,
          text: args.text,
          created_at: args.now
        };
        t.complaints.push(row);
        return copy(row);
      },
      listByOrder: async (orderId) => t.complaints.filter((r) => r.order_id === orderId).sort((a, b) => a.id - b.id).map(copy)
    },

    actions: {
      append: async (entry) => {
        const row: ActionLogRow = { id: nextId(), ...entry };
        t.actions.push(row);
        return copy(row);
      },
      listByOrder: async (orderId, limit) => t.actions.filter((r) => r.order_id === orderId).sort(byCreated).slice(0, limit).map(copy),
      listByUser: async (userId, limit) =>
        t.actions
          .filter((r) => r.actor_id === userId || r.subject_user_id === userId)
          .sort(byCreated)
          .slice(0, limit)
          .map(copy)
    },

    reports: {
      monthlySummary: async (from, to) => {
        const rows = t.orders.filter(
          (o) =>
            o.status === "completed" &&
            o.finished_at !== null &&
            o.finished_at.getTime() >= from.getTime() &&
            o.finished_at.getTime() < to.getTime()
        );
        return {
          order_count: rows.length,
          total_amount: rows.reduce((s, o) => s + o.amount, 0),
          total_commission: rows.reduce((s, o) => s + o.commission_amount, 0)
        };
      },
      userProfit: async (userId) => {
        const rows = t.payouts.filter((p) => p.user_id === userId);
        return { payout_count: rows.length, total_paid: rows.reduce((s, p) => s + p.amount, 0) };
      },
      exportOrders: async () =>
        [...t.orders].sort(byCreated).map((o) => {
          const payouts = t.payouts.filter((p) => p.order_id === o.id);
          const last = payouts.reduce<Date | null>(
            (max, p) => (max === null || p.created_at.getTime() > max.getTime() ? p.created_at : max),
            null
          );
          return {
            memo_order_id: o.memo_order_id,
            customer_info: o.customer_info,
            amount: o.amount,
            commission_amount: o.commission_amount,
            status: o.status,
            created_at: o.created_at,
            finished_at: o.finished_at,
            squad_name: t.squads.find((s) => s.id === o.squad_id)?.name ?? null,
            payout_total: payouts.reduce((s, p) => s + p.amount, 0),
            last_payout_at: last
          };
        }),
      workerRoster: async () =>
        t.escorts
          .flatMap((e) => {
            const user = t.users.find((u) => u.id === e.user_id);
            if (!user) return [];
            return [
              {
                user_id: user.id,
                telegram_id: user.telegram_id,
                username: user.username,
                balance: user.balance,
                escort_id: e.id,
                squad_id: e.squad_id,
                squad_name: t.squads.find((s) => s.id === e.squad_id)?.name ?? null,
                reputation: e.reputation,
                completed_orders: e.completed_orders,
                rating: e.rating,
                rating_count: e.rating_count,
                is_banned: e.is_banned,
                ban_until: e.ban_until,
                restrict_until: e.restrict_until
              }
            ];
          })
          .sort((a, b) => a.telegram_id - b.telegram_id)
    }
  };
}

export class MemoryStore implements Store {
  private tables: Tables = emptyTables();
  private readonly lock = new TxLock();
  private readonly lockTimeoutMs: number;

  constructor(opts: { lockTimeoutMs?: number } = {}) {
    this.lockTimeoutMs = opts.lockTimeoutMs ?? 2000;
  }

  async transaction<T>(fn: (tx: StoreTx) => Promise<T>): Promise<T> {
    await this.lock.acquire(this.lockTimeoutMs);
    try {
      const working = structuredClone(this.tables);
      const result = await fn(bindTx(working));
      this.tables = working;
      return result;
    } finally {
      this.lock.release();
    }
  }

  async close(): Promise<void> {
    this.tables = emptyTables();
  }
}
