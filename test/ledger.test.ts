import { describe, expect, it } from "vitest";
import {
  InsufficientBalanceError,
  InvalidTransitionError,
  NotFoundError,
  ValidationError
} from "../src/core/errors.js";
import { seedOrder, seedWorker, setup } from "./helpers.js";

describe("balances", () => {
  it("credits and debits through transactions", async () => {
    const { market } = setup();
    const user = await market.registerUser({ telegramId: 600 });

    await market.credit({ userId: user.id, amount: 300 });
    const change = await market.debit({ userId: user.id, amount: 120 });

    expect(change.user.balance).toBe(180);
    expect(change.transaction.amount).toBe(-120);
    expect(change.transaction.type).toBe("manual_debit");
    expect(await market.getBalance(user.id)).toBe(180);
  });

  it("never lets a debit overdraw", async () => {
    const { market } = setup();
    const user = await market.registerUser({ telegramId: 601 });
    await market.credit({ userId: user.id, amount: 100 });

    await expect(market.debit({ userId: user.id, amount: 101 })).rejects.toBeInstanceOf(InsufficientBalanceError);
    expect(await market.getBalance(user.id)).toBe(100);
    expect(await market.listTransactions(user.id)).toHaveLength(1);
  });

  it("rejects non-positive and fractional amounts", async () => {
    const { market } = setup();
    const user = await market.registerUser({ telegramId: 602 });
    await expect(market.credit({ userId: user.id, amount: 0 })).rejects.toBeInstanceOf(ValidationError);
    await expect(market.credit({ userId: user.id, amount: -5 })).rejects.toBeInstanceOf(ValidationError);
    await expect(market.debit({ userId: user.id, amount: 1.5 })).rejects.toBeInstanceOf(ValidationError);
  });

  it("reports unknown users", async () => {
    const { market } = setup();
    await expect(market.credit({ userId: 999, amount: 10 })).rejects.toBeInstanceOf(NotFoundError);
    await expect(market.getBalance(999)).rejects.toBeInstanceOf(NotFoundError);
  });

  it("zeroes a balance once", async () => {
    const { market } = setup();
    const user = await market.registerUser({ telegramId: 603 });
    await market.adjustBalance({ userId: user.id, amount: 250, reason: "bonus" });

    const change = await market.zeroBalance({ userId: user.id });
    expect(change?.transaction.amount).toBe(-250);
    expect(await market.getBalance(user.id)).toBe(0);
    expect(await market.zeroBalance({ userId: user.id })).toBeNull();
  });
});

describe("withdrawals", () => {
  it("lets only one of two racing withdrawals spend a balance", async () => {
    const { market } = setup();
    const user = await market.registerUser({ telegramId: 609 });
    await market.adjustBalance({ userId: user.id, amount: 100 });

    const results = await Promise.allSettled([
      market.debit({ userId: user.id, amount: 80 }),
      market.requestWithdrawal({ userId: user.id, amount: 80 })
    ]);

    expect(results.map((r) => r.status)).toEqual(["fulfilled", "rejected"]);
    const lost = results.flatMap((r) => (r.status === "rejected" ? [r.reason] : []));
    expect(lost[0]).toBeInstanceOf(InsufficientBalanceError);
    expect(await market.getBalance(user.id)).toBe(20);
    expect(await market.listPendingWithdrawals()).toEqual([]);
    expect(await market.reconcileBalances()).toEqual([]);
  });

  it("allows withdrawing exactly the balance and no more", async () => {
    const { market } = setup();
    const user = await market.registerUser({ telegramId: 610 });
    await market.adjustBalance({ userId: user.id, amount: 500 });

    await expect(market.requestWithdrawal({ userId: user.id, amount: 501 })).rejects.toBeInstanceOf(
      InsufficientBalanceError
    );
    const w = await market.requestWithdrawal({ userId: user.id, amount: 500 });

    expect(w.status).toBe("pending");
    expect(await market.getBalance(user.id)).toBe(0);
    expect((await market.listPendingWithdrawals()).map((x) => x.id)).toEqual([w.id]);
  });

  it("restores the balance when a withdrawal is rejected", async () => {
    const { market } = setup();
    const user = await market.registerUser({ telegramId: 611 });
    await market.adjustBalance({ userId: user.id, amount: 500 });
    const w = await market.requestWithdrawal({ userId: user.id, amount: 500 });

    const rejected = await market.resolveWithdrawal({ withdrawalId: w.id, approve: false, actorId: user.id });
    expect(rejected.status).toBe("rejected");
    expect(await market.getBalance(user.id)).toBe(500);

    const types = (await market.listTransactions(user.id)).map((t) => [t.type, t.amount]);
    expect(types).toHaveLength(3);
    expect(types).toEqual(
      expect.arrayContaining([
        ["manual_credit", 500],
        ["withdrawal_hold", -500],
        ["withdrawal_refund", 500]
      ])
    );

    await expect(market.resolveWithdrawal({ withdrawalId: w.id, approve: true })).rejects.toBeInstanceOf(
      InvalidTransitionError
    );
  });

  it("keeps the hold when a withdrawal is approved", async () => {
    const { market } = setup();
    const user = await market.registerUser({ telegramId: 612 });
    await market.adjustBalance({ userId: user.id, amount: 300 });
    const w = await market.requestWithdrawal({ userId: user.id, amount: 200 });

    const approved = await market.resolveWithdrawal({ withdrawalId: w.id, approve: true });
    expect(approved.status).toBe("approved");
    expect(approved.processed_at).not.toBeNull();
    expect(await market.getBalance(user.id)).toBe(100);
    expect(await market.listPendingWithdrawals()).toEqual([]);
  });

  it("enforces the minimum withdrawal", async () => {
    const { market } = setup({ minWithdrawal: 100 });
    const user = await market.registerUser({ telegramId: 613 });
    await market.adjustBalance({ userId: user.id, amount: 500 });
    await expect(market.requestWithdrawal({ userId: user.id, amount: 99 })).rejects.toBeInstanceOf(ValidationError);
  });
});

describe("settlement", () => {
  async function completedOrder() {
    const ctx = setup({ commission: { kind: "fixed", rateBps: 1000 } });
    const order = await seedOrder(ctx.market, "ST-1", 1000);
    const w = await seedWorker(ctx.market, 620);
    await ctx.market.applyToOrder({ orderId: order.id, escortId: w.escort.id });
    await ctx.market.assignOrder({ orderId: order.id, escortIds: w.escort.id });
    await ctx.market.completeOrder({ orderId: order.id });
    return { ...ctx, order, w };
  }

  it("is idempotent", async () => {
    const { market, order, w } = await completedOrder();

    const first = await market.settleOrder({ orderId: order.id });
    const second = await market.settleOrder({ orderId: order.id });

    expect(first.created).toBe(false);
    expect(second.created).toBe(false);
    expect(second.payouts).toEqual(first.payouts);
    expect(second.payouts).toHaveLength(1);
    expect(await market.getBalance(w.user.id)).toBe(900);
    expect((await market.listTransactions(w.user.id)).filter((t) => t.type === "payout")).toHaveLength(1);
    expect(await market.userProfit(w.user.id)).toEqual({ payout_count: 1, total_paid: 900 });
  });

  it("refuses an order that is not completed", async () => {
    const { market } = setup();
    const order = await seedOrder(market, "ST-2", 1000);
    await expect(market.settleOrder({ orderId: order.id })).rejects.toBeInstanceOf(InvalidTransitionError);
  });

  it("keeps every balance equal to its transaction sum", async () => {
    const { market, w } = await completedOrder();
    const w2 = await market.requestWithdrawal({ userId: w.user.id, amount: 400 });
    await market.resolveWithdrawal({ withdrawalId: w2.id, approve: false });
    await market.requestWithdrawal({ userId: w.user.id, amount: 300 });
    await market.zeroBalance({ userId: w.user.id });

    expect(await market.reconcileBalances()).toEqual([]);
    expect(await market.getBalance(w.user.id)).toBe(0);
  });
});
