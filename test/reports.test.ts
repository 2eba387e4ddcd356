import { describe, expect, it } from "vitest";
import { ValidationError } from "../src/core/errors.js";
import { csvEscape } from "../src/reports/csv.js";
import { formatMinorUnits } from "../src/reports/format.js";
import { monthRange } from "../src/reports/monthly.js";
import { HOUR, seedWorker, setup } from "./helpers.js";

describe("formatting", () => {
  it("renders minor units", () => {
    expect(formatMinorUnits(1000)).toBe("10");
    expect(formatMinorUnits(90050)).toBe("900.5");
    expect(formatMinorUnits(7)).toBe("0.07");
    expect(formatMinorUnits(-5)).toBe("-0.05");
    expect(formatMinorUnits(1234n, 0)).toBe("1234");
  });

  it("escapes CSV fields", () => {
    expect(csvEscape("plain")).toBe("plain");
    expect(csvEscape("a,b")).toBe('"a,b"');
    expect(csvEscape('say "hi"')).toBe('"say ""hi"""');
    expect(csvEscape("two\nlines")).toBe('"two\nlines"');
  });

  it("computes UTC month bounds", () => {
    expect(monthRange(2024, 12)).toEqual({
      from: new Date("2024-12-01T00:00:00.000Z"),
      to: new Date("2025-01-01T00:00:00.000Z")
    });
    expect(() => monthRange(2024, 13)).toThrow(ValidationError);
  });
});

describe("reports", () => {
  async function completedOrder() {
    const ctx = setup({ commission: { kind: "fixed", rateBps: 1000 } });
    const order = await ctx.market.createOrder({ memoOrderId: "R-1", amount: 1000, customerInfo: "Duo, ranked push" });
    const w = await seedWorker(ctx.market, 960);
    await ctx.market.applyToOrder({ orderId: order.id, escortId: w.escort.id });
    await ctx.market.assignOrder({ orderId: order.id, escortIds: w.escort.id });
    ctx.time.advance(HOUR);
    await ctx.market.completeOrder({ orderId: order.id });
    return { ...ctx, order, w };
  }

  it("summarises completed orders by month", async () => {
    const { market } = await completedOrder();
    await market.createOrder({ memoOrderId: "R-2", amount: 700 });

    const may = await market.monthlyReport(2024, 5);
    expect(may.order_count).toBe(1);
    expect(may.total_amount).toBe(1000);
    expect(may.total_commission).toBe(100);
    expect((await market.monthlyReport(2024, 6)).order_count).toBe(0);
  });

  it("exports one CSV row per order", async () => {
    const { market } = await completedOrder();
    const csv = await market.exportOrdersCsv();
    expect(csv.split("\n")).toEqual([
      "memo_order_id,customer_info,amount,commission,status,created_at,finished_at,squad,paid_out,last_payout_at",
      'R-1,"Duo, ranked push",10,1,completed,2024-05-01T10:00:00.000Z,2024-05-01T11:00:00.000Z,,9,2024-05-01T11:00:00.000Z',
      ""
    ]);
  });
});

describe("worker listings", () => {
  async function roster() {
    const { market } = setup();
    await market.registerUser({ telegramId: 980, username: "customer" });
    const squad = await market.createSquad({ name: "Alpha" });
    const a = await seedWorker(market, 981, squad.id);
    const b = await seedWorker(market, 982);
    await market.adjustBalance({ userId: a.user.id, amount: 500 });
    return { market, a, b };
  }

  it("lists every worker with squad and reputation", async () => {
    const { market, a, b } = await roster();
    const workers = await market.listWorkers();

    expect(workers.map((w) => w.telegram_id)).toEqual([981, 982]);
    expect(workers[0]).toMatchObject({
      user_id: a.user.id,
      escort_id: a.escort.id,
      username: "worker981",
      squad_name: "Alpha",
      balance: 500,
      is_banned: false
    });
    expect(workers[1]).toMatchObject({ escort_id: b.escort.id, squad_id: null, squad_name: null, balance: 0 });
  });

  it("totals balances, optionally only the positive ones", async () => {
    const { market } = await roster();

    const all = await market.listBalances();
    expect(all.workers).toHaveLength(2);
    expect(all.total).toBe(500);

    const positive = await market.listBalances({ positiveOnly: true });
    expect(positive.workers.map((w) => w.telegram_id)).toEqual([981]);
    expect(positive.total).toBe(500);
  });
});
