import type { Pool, PoolClient } from "pg";
import { ConflictError } from "../core/errors.js";
import { logger } from "../core/logger.js";
import type { Store, StoreTx } from "./store.js";
import * as usersRepo from "./repos/usersRepo.js";
import * as escortsRepo from "./repos/escortsRepo.js";
import * as squadsRepo from "./repos/squadsRepo.js";
import * as ordersRepo from "./repos/ordersRepo.js";
import * as reportsRepo from "./repos/reportsRepo.js";
import { bindApplications, bindAssignments } from "./repos/applicationsRepo.js";
import { bindPayouts, bindTransactions, bindWithdrawals } from "./repos/ledgerRepo.js";
import { bindActions, bindComplaints } from "./repos/auditRepo.js";

// SQLSTATEs that mean "another transaction got there first": safe to retry.
const CONFLICT_CODES: Record<string, string> = {
  "55P03": "lock_not_available",
  "40P01": "deadlock_detected",
  "40001": "serialization_failure",
  "23505": "unique_violation"
};

function pgErrorCode(e: unknown): string | null {
  if (e && typeof e === "object" && "code" in e && typeof e.code === "string") return e.code;
  return null;
}

function bindTx(client: PoolClient): StoreTx {
  return {
    users: usersRepo.bind(client),
    escorts: escortsRepo.bind(client),
    squads: squadsRepo.bind(client),
    orders: ordersRepo.bind(client),
    applications: bindApplications(client),
    assignments: bindAssignments(client),
    payouts: bindPayouts(client),
    withdrawals: bindWithdrawals(client),
    transactions: bindTransactions(client),
    complaints: bindComplaints(client),
    actions: bindActions(client),
    reports: reportsRepo.bind(client)
  };
}

export class PgStore implements Store {
  private readonly lockTimeoutMs: number;

  constructor(
    private readonly pool: Pool,
    opts: { lockTimeoutMs: number }
  ) {
    if (!Number.isSafeInteger(opts.lockTimeoutMs) || opts.lockTimeoutMs <= 0) {
      throw new Error(`lockTimeoutMs must be a positive integer, got ${opts.lockTimeoutMs}`);
    }
    this.lockTimeoutMs = opts.lockTimeoutMs;
  }

  async transaction<T>(fn: (tx: StoreTx) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      // SET does not take bind parameters; the value is a validated integer.
      await client.query(`SET LOCAL lock_timeout = '${this.lockTimeoutMs}ms'`);
      const result = await fn(bindTx(client));
      await client.query("COMMIT");
      return result;
    } catch (e) {
      await client.query("ROLLBACK").catch((rollbackErr: unknown) => {
        logger.error("PgStore: rollback failed", rollbackErr);
      });
      const code = pgErrorCode(e);
      const reason = code ? CONFLICT_CODES[code] : undefined;
      if (reason) {
        throw new ConflictError(`transaction aborted: ${reason}`, { code });
      }
      throw e;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
