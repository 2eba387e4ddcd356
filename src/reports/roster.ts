import type { StoreTx } from "../db/store.js";
import type { WorkerListingRow } from "../db/types.js";

export type BalanceListing = {
  workers: WorkerListingRow[];
  total: number;
};

export async function listWorkers(tx: StoreTx): Promise<WorkerListingRow[]> {
  return tx.reports.workerRoster();
}

/** Worker balances with their sum; `positiveOnly` leaves out empty wallets. */
export async function listBalances(tx: StoreTx, args: { positiveOnly?: boolean } = {}): Promise<BalanceListing> {
  const roster = await tx.reports.workerRoster();
  const workers = args.positiveOnly ? roster.filter((w) => w.balance > 0) : roster;
  return { workers, total: workers.reduce((sum, w) => sum + w.balance, 0) };
}
