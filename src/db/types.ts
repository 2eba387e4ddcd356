export type OrderStatus = "open" | "assigned" | "in_progress" | "completed" | "cancelled";

export type WithdrawalStatus = "pending" | "approved" | "rejected";

export type TransactionType =
  | "payout"
  | "withdrawal_hold"
  | "withdrawal_refund"
  | "manual_credit"
  | "manual_debit";

export type UserRow = {
  id: number;
  telegram_id: number;
  username: string | null;
  balance: number; // minor units; projection of transactions
  is_worker: boolean;
  created_at: Date;
};

export type EscortRow = {
  id: number;
  user_id: number;
  game_account_id: string | null;
  squad_id: number | null;
  rating: number;
  rating_count: number;
  reputation: number;
  completed_orders: number;
  is_banned: boolean; // permanent ban
  ban_until: Date | null;
  restrict_until: Date | null;
  rules_accepted: boolean;
  created_at: Date;
};

export type SquadRow = {
  id: number;
  name: string;
  rating: number;
  rating_count: number;
  total_orders: number;
  total_earned: number;
  created_at: Date;
};

export type OrderRow = {
  id: number;
  memo_order_id: string;
  customer_id: number | null;
  customer_info: string;
  amount: number;
  status: OrderStatus;
  squad_id: number | null;
  commission_amount: number;
  rating: number | null;
  created_at: Date;
  assigned_at: Date | null;
  started_at: Date | null;
  finished_at: Date | null;
};

export type ApplicationRow = {
  id: number;
  order_id: number;
  escort_id: number;
  squad_id: number | null;
  game_account_id: string | null;
  created_at: Date;
};

export type AssignmentRow = {
  id: number;
  order_id: number;
  escort_id: number;
  game_account_id: string | null;
  assigned_at: Date;
  released_at: Date | null;
};

export type PayoutRow = {
  id: number;
  order_id: number;
  escort_id: number;
  user_id: number;
  amount: number;
  commission_amount: number;
  created_at: Date;
};

export type WithdrawalRow = {
  id: number;
  user_id: number;
  amount: number;
  status: WithdrawalStatus;
  created_at: Date;
  processed_at: Date | null;
  processed_by: number | null;
};

export type TransactionRow = {
  id: number;
  user_id: number;
  amount: number; // signed
  type: TransactionType;
  order_id: number | null;
  withdrawal_id: number | null;
  created_at: Date;
};

export type ComplaintRow = {
  id: number;
  user_id: number;
  order_id: number | null;
  text: string;
  created_at: Date;
};

export type ActionType =
  | "register_user"
  | "enroll_worker"
  | "accept_rules"
  | "set_game_account"
  | "create_order"
  | "apply_order"
  | "assign_order"
  | "start_order"
  | "complete_order"
  | "cancel_order"
  | "rate_order"
  | "settle_order"
  | "credit"
  | "debit"
  | "request_withdrawal"
  | "approve_withdrawal"
  | "reject_withdrawal"
  | "record_rating"
  | "ban_temporary"
  | "ban_permanent"
  | "restrict_user"
  | "unban_user"
  | "file_complaint"
  | "add_squad"
  | "delete_squad"
  | "add_escort_to_squad"
  | "remove_escort_from_squad"
  | "reminder_sent";

export type ActionLogRow = {
  id: number;
  action_type: ActionType;
  actor_id: number | null;
  subject_user_id: number | null;
  order_id: number | null;
  prior_status: string | null;
  new_status: string | null;
  description: string | null;
  created_at: Date;
};

export type MonthlySummary = {
  order_count: number;
  total_amount: number;
  total_commission: number;
};

export type UserProfit = {
  payout_count: number;
  total_paid: number;
};

/** A worker profile joined with its user and squad, for admin listings. */
export type WorkerListingRow = {
  user_id: number;
  telegram_id: number;
  username: string | null;
  balance: number;
  escort_id: number;
  squad_id: number | null;
  squad_name: string | null;
  reputation: number;
  completed_orders: number;
  rating: number;
  rating_count: number;
  is_banned: boolean;
  ban_until: Date | null;
  restrict_until: Date | null;
};

export type OrderExportRow = {
  memo_order_id: string;
  customer_info: string;
  amount: number;
  commission_amount: number;
  status: OrderStatus;
  created_at: Date;
  finished_at: Date | null;
  squad_name: string | null;
  payout_total: number;
  last_payout_at: Date | null;
};
