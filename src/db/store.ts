import type {
  ActionLogRow,
  ApplicationRow,
  AssignmentRow,
  ComplaintRow,
  EscortRow,
  MonthlySummary,
  OrderExportRow,
  OrderRow,
  OrderStatus,
  PayoutRow,
  SquadRow,
  TransactionRow,
  UserProfit,
  UserRow,
  WithdrawalRow,
  WorkerListingRow
} from "./types.js";

/*
 * Repositories available inside a store transaction. `lock*` reads the row for
 * update: it stays exclusive to the transaction until commit or rollback.
 */

export type EscortPatch = Partial<
  Pick<
    EscortRow,
    | "game_account_id"
    | "squad_id"
    | "rating"
    | "rating_count"
    | "reputation"
    | "completed_orders"
    | "is_banned"
    | "ban_until"
    | "restrict_until"
    | "rules_accepted"
  >
>;

export type SquadPatch = Partial<Pick<SquadRow, "rating" | "rating_count" | "total_orders" | "total_earned">>;

export type OrderPatch = Partial<
  Pick<
    OrderRow,
    "status" | "squad_id" | "commission_amount" | "rating" | "assigned_at" | "started_at" | "finished_at"
  >
>;

export interface UsersRepo {
  findById(id: number): Promise<UserRow | null>;
  findByTelegramId(telegramId: number): Promise<UserRow | null>;
  lock(id: number): Promise<UserRow | null>;
  create(args: { telegramId: number; username: string | null; now: Date }): Promise<UserRow>;
  setBalance(id: number, balance: number): Promise<UserRow>;
  setWorker(id: number, isWorker: boolean): Promise<UserRow>;
  listAll(): Promise<UserRow[]>;
}

export interface EscortsRepo {
  findById(id: number): Promise<EscortRow | null>;
  findByUserId(userId: number): Promise<EscortRow | null>;
  lock(id: number): Promise<EscortRow | null>;
  create(args: { userId: number; now: Date }): Promise<EscortRow>;
  update(id: number, patch: EscortPatch): Promise<EscortRow>;
  listBySquad(squadId: number): Promise<EscortRow[]>;
  clearSquad(squadId: number): Promise<number>;
}

export interface SquadsRepo {
  findById(id: number): Promise<SquadRow | null>;
  findByName(name: string): Promise<SquadRow | null>;
  lock(id: number): Promise<SquadRow | null>;
  create(args: { name: string; now: Date }): Promise<SquadRow>;
  update(id: number, patch: SquadPatch): Promise<SquadRow>;
  delete(id: number): Promise<void>;
  listAll(): Promise<SquadRow[]>;
}

export interface OrdersRepo {
  findById(id: number): Promise<OrderRow | null>;
  findByMemoId(memoOrderId: string): Promise<OrderRow | null>;
  lock(id: number): Promise<OrderRow | null>;
  create(args: {
    memoOrderId: string;
    customerId: number | null;
    customerInfo: string;
    amount: number;
    now: Date;
  }): Promise<OrderRow>;
  update(id: number, patch: OrderPatch): Promise<OrderRow>;
  listByStatus(status: OrderStatus, limit: number): Promise<OrderRow[]>;
  /**
   * Orders in `status` since before `before` (started, else assigned, else
   * created). With `notRemindedSince`, orders that got a reminder at or after
   * that instant are left out.
   */
  listStartedBefore(status: OrderStatus, before: Date, limit: number, notRemindedSince?: Date | null): Promise<OrderRow[]>;
  /** Completed orders of a squad and the payouts made for them. */
  squadTotals(squadId: number): Promise<{ orders: number; earned: number }>;
}

export interface ApplicationsRepo {
  find(orderId: number, escortId: number): Promise<ApplicationRow | null>;
  listByOrder(orderId: number): Promise<ApplicationRow[]>;
  create(args: {
    orderId: number;
    escortId: number;
    squadId: number | null;
    gameAccountId: string | null;
    now: Date;
  }): Promise<ApplicationRow>;
}

export interface AssignmentsRepo {
  listActiveByOrder(orderId: number): Promise<AssignmentRow[]>;
  create(args: { orderId: number; escortId: number; gameAccountId: string | null; now: Date }): Promise<AssignmentRow>;
  releaseByOrder(orderId: number, now: Date): Promise<number>;
  /** Completed orders the escort was an active assignee of. */
  countCompletedForEscort(escortId: number): Promise<number>;
}

export interface PayoutsRepo {
  listByOrder(orderId: number): Promise<PayoutRow[]>;
  create(args: {
    orderId: number;
    escortId: number;
    userId: number;
    amount: number;
    commissionAmount: number;
    now: Date;
  }): Promise<PayoutRow>;
}

export interface WithdrawalsRepo {
  findById(id: number): Promise<WithdrawalRow | null>;
  lock(id: number): Promise<WithdrawalRow | null>;
  create(args: { userId: number; amount: number; now: Date }): Promise<WithdrawalRow>;
  resolve(id: number, args: { status: "approved" | "rejected"; processedBy: number | null; now: Date }): Promise<WithdrawalRow>;
  listPending(limit: number): Promise<WithdrawalRow[]>;
}

export interface TransactionsRepo {
  append(args: {
    userId: number;
    amount: number;
    type: TransactionRow["type"];
    orderId: number | null;
    withdrawalId: number | null;
    now: Date;
  }): Promise<TransactionRow>;
  listByUser(userId: number, limit: number): Promise<TransactionRow[]>;
  /** Sum of transactions per user, for reconciliation. */
  sumsByUser(): Promise<Map<number, number>>;
}

export interface ComplaintsRepo {
  create(args: { userId: number; orderId: number | null; text: string; now: Date }): Promise<ComplaintRow>;
  listByOrder(orderId: number): Promise<ComplaintRow[]>;
}

export interface ActionsRepo {
  append(entry: Omit<ActionLogRow, "id">): Promise<ActionLogRow>;
  listByOrder(orderId: number, limit: number): Promise<ActionLogRow[]>;
  /** Entries the user performed or was the subject of. */
  listByUser(userId: number, limit: number): Promise<ActionLogRow[]>;
}

export interface ReportsRepo {
  monthlySummary(from: Date, to: Date): Promise<MonthlySummary>;
  userProfit(userId: number): Promise<UserProfit>;
  exportOrders(): Promise<OrderExportRow[]>;
  /** Every worker profile with its user and squad, by telegram id. */
  workerRoster(): Promise<WorkerListingRow[]>;
}

export interface StoreTx {
  users: UsersRepo;
  escorts: EscortsRepo;
  squads: SquadsRepo;
  orders: OrdersRepo;
  applications: ApplicationsRepo;
  assignments: AssignmentsRepo;
  payouts: PayoutsRepo;
  withdrawals: WithdrawalsRepo;
  transactions: TransactionsRepo;
  complaints: ComplaintsRepo;
  actions: ActionsRepo;
  reports: ReportsRepo;
}

export interface Store {
  /**
   * Runs `fn` as one unit of work. Everything it writes commits when the
   * returned promise resolves and is discarded when it rejects.
   */
  transaction<T>(fn: (tx: StoreTx) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}
