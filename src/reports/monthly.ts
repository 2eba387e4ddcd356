import { NotFoundError, ValidationError } from "../core/errors.js";
import type { StoreTx } from "../db/store.js";
import type { MonthlySummary, UserProfit } from "../db/types.js";

export type MonthlyReport = MonthlySummary & {
  year: number;
  month: number; // 1-12
  from: Date;
  to: Date; // exclusive
};

export function monthRange(year: number, month: number): { from: Date; to: Date } {
  if (!Number.isInteger(year) || year < 2000 || year > 9999) throw new ValidationError("invalid year", { year });
  if (!Number.isInteger(month) || month < 1 || month > 12) throw new ValidationError("month must be 1-12", { month });
  return {
    from: new Date(Date.UTC(year, month - 1, 1)),
    to: new Date(Date.UTC(year, month, 1))
  };
}

/** Completed orders finished within the calendar month (UTC). */
export async function monthlyReport(tx: StoreTx, args: { year: number; month: number }): Promise<MonthlyReport> {
  const { from, to } = monthRange(args.year, args.month);
  const summary = await tx.reports.monthlySummary(from, to);
  return { ...summary, year: args.year, month: args.month, from, to };
}

export async function userProfit(tx: StoreTx, args: { userId: number }): Promise<UserProfit> {
  const user = await tx.users.findById(args.userId);
  if (!user) throw new NotFoundError("user", args.userId);
  return tx.reports.userProfit(user.id);
}
