import { describe, expect, it } from "vitest";
import {
  AlreadyAssignedError,
  DuplicateOrderError,
  InvalidTransitionError,
  NotFoundError,
  OrderNotOpenError,
  ValidationError
} from "../src/core/errors.js";
import { HOUR, seedOrder, seedWorker, setup } from "./helpers.js";

describe("order lifecycle", () => {
  it("pays the executor net of commission on completion", async () => {
    const { market } = setup({ commission: { kind: "fixed", rateBps: 1000 } });
    const customer = await market.registerUser({ telegramId: 100 });
    const order = await market.createOrder({ memoOrderId: "A-1", customerId: customer.id, amount: 1000 });
    const w = await seedWorker(market, 201);

    await market.applyToOrder({ orderId: order.id, escortId: w.escort.id });
    await market.assignOrder({ orderId: order.id, escortIds: w.escort.id });
    const { order: done, settlement } = await market.completeOrder({ orderId: order.id });

    expect(done.status).toBe("completed");
    expect(done.commission_amount).toBe(100);
    expect(settlement.payouts).toHaveLength(1);
    expect(settlement.payouts[0]?.amount).toBe(900);
    expect(settlement.payouts[0]?.commission_amount).toBe(100);
    expect(await market.getBalance(w.user.id)).toBe(900);

    const actions = await market.actionsForOrder(order.id);
    expect(actions.map((a) => a.action_type)).toEqual([
      "create_order",
      "apply_order",
      "assign_order",
      "complete_order"
    ]);
    expect(actions[1]?.actor_id).toBe(w.user.id);
    expect(actions[3]).toMatchObject({
      prior_status: "assigned",
      new_status: "completed",
      description: "paid 900 to 1 escort(s), commission 100"
    });
  });

  it("returns the stored order when the same submission is replayed", async () => {
    const { market } = setup();
    const first = await seedOrder(market, "memo-7", 500);
    const again = await seedOrder(market, "memo-7", 500);

    expect(again.id).toBe(first.id);
    expect(await market.listOrdersByStatus("open")).toHaveLength(1);
    expect((await market.actionsForOrder(first.id)).map((a) => a.action_type)).toEqual(["create_order"]);
  });

  it("rejects a memo id reused with different attributes", async () => {
    const { market } = setup();
    await seedOrder(market, "memo-7", 500);
    await expect(seedOrder(market, "memo-7", 600)).rejects.toBeInstanceOf(DuplicateOrderError);
  });

  it("validates memo id and amount", async () => {
    const { market } = setup();
    await expect(seedOrder(market, "bad memo", 500)).rejects.toBeInstanceOf(ValidationError);
    await expect(seedOrder(market, "ok-memo", 0)).rejects.toBeInstanceOf(ValidationError);
    await expect(seedOrder(market, "ok-memo", 10.5)).rejects.toBeInstanceOf(ValidationError);
  });

  it("walks open -> assigned -> in_progress -> completed", async () => {
    const { market, time } = setup();
    const order = await seedOrder(market, "B-1", 1000);
    const w = await seedWorker(market, 202);
    await market.applyToOrder({ orderId: order.id, escortId: w.escort.id });
    await market.assignOrder({ orderId: order.id, escortIds: [w.escort.id] });

    time.advance(HOUR);
    const started = await market.startOrder({ orderId: order.id });
    expect(started.status).toBe("in_progress");
    expect(started.started_at?.toISOString()).toBe("2024-05-01T11:00:00.000Z");

    time.advance(HOUR);
    const { order: done } = await market.completeOrder({ orderId: order.id });
    expect(done.finished_at?.toISOString()).toBe("2024-05-01T12:00:00.000Z");
    // default 20% commission
    expect(await market.getBalance(w.user.id)).toBe(800);
  });

  it("refuses transitions outside the state machine", async () => {
    const { market } = setup();
    const order = await seedOrder(market, "C-1", 1000);
    await expect(market.completeOrder({ orderId: order.id })).rejects.toBeInstanceOf(InvalidTransitionError);
    await expect(market.startOrder({ orderId: order.id })).rejects.toBeInstanceOf(InvalidTransitionError);

    const w = await seedWorker(market, 203);
    await market.applyToOrder({ orderId: order.id, escortId: w.escort.id });
    await market.assignOrder({ orderId: order.id, escortIds: w.escort.id });
    await market.startOrder({ orderId: order.id });
    await expect(market.cancelOrder({ orderId: order.id })).rejects.toBeInstanceOf(InvalidTransitionError);

    await market.completeOrder({ orderId: order.id });
    await expect(market.completeOrder({ orderId: order.id })).rejects.toBeInstanceOf(InvalidTransitionError);
    await expect(market.cancelOrder({ orderId: order.id })).rejects.toBeInstanceOf(InvalidTransitionError);
  });

  it("cancels an assigned order, releasing its assignees without ledger effect", async () => {
    const { market } = setup();
    const order = await seedOrder(market, "D-1", 1000);
    const w = await seedWorker(market, 204);
    await market.applyToOrder({ orderId: order.id, escortId: w.escort.id });
    await market.assignOrder({ orderId: order.id, escortIds: w.escort.id });

    const cancelled = await market.cancelOrder({ orderId: order.id });
    expect(cancelled.status).toBe("cancelled");
    expect(await market.listAssignees(order.id)).toEqual([]);
    expect(await market.getBalance(w.user.id)).toBe(0);
    expect(await market.listTransactions(w.user.id)).toEqual([]);

    const other = await seedWorker(market, 205);
    await expect(market.applyToOrder({ orderId: order.id, escortId: other.escort.id })).rejects.toBeInstanceOf(
      OrderNotOpenError
    );
  });

  it("fails a cancel that raced an assign", async () => {
    const { market } = setup();
    const order = await seedOrder(market, "D-2", 1000);
    const w = await seedWorker(market, 206);
    await market.applyToOrder({ orderId: order.id, escortId: w.escort.id });

    const [assigned, cancelled] = await Promise.allSettled([
      market.assignOrder({ orderId: order.id, escortIds: w.escort.id }),
      market.cancelOrder({ orderId: order.id, expectedStatus: "open" })
    ]);

    expect(assigned.status).toBe("fulfilled");
    expect(cancelled.status === "rejected" && cancelled.reason).toBeInstanceOf(AlreadyAssignedError);
    expect((await market.getOrder(order.id))?.status).toBe("assigned");
    expect(await market.listAssignees(order.id)).toHaveLength(1);
  });

  it("fails an assign that raced a cancel", async () => {
    const { market } = setup();
    const order = await seedOrder(market, "D-3", 1000);
    const w = await seedWorker(market, 207);
    await market.applyToOrder({ orderId: order.id, escortId: w.escort.id });

    const [cancelled, assigned] = await Promise.allSettled([
      market.cancelOrder({ orderId: order.id, expectedStatus: "open" }),
      market.assignOrder({ orderId: order.id, escortIds: w.escort.id })
    ]);

    expect(cancelled.status).toBe("fulfilled");
    expect(assigned.status === "rejected" && assigned.reason).toBeInstanceOf(OrderNotOpenError);
    expect((await market.getOrder(order.id))?.status).toBe("cancelled");
    expect(await market.listAssignees(order.id)).toEqual([]);
  });

  it("rejects a cancel of an order that already finished", async () => {
    const { market } = setup();
    const order = await seedOrder(market, "D-4", 1000);
    await market.cancelOrder({ orderId: order.id });
    await expect(market.cancelOrder({ orderId: order.id, expectedStatus: "open" })).rejects.toBeInstanceOf(
      InvalidTransitionError
    );
  });

  it("applies a completion rating to the assignee and counts the order", async () => {
    const { market } = setup();
    const order = await seedOrder(market, "E-1", 1000);
    const w = await seedWorker(market, 206);
    await market.applyToOrder({ orderId: order.id, escortId: w.escort.id });
    await market.assignOrder({ orderId: order.id, escortIds: w.escort.id });
    const { order: done } = await market.completeOrder({ orderId: order.id, rating: 5 });

    expect(done.rating).toBe(5);
    const escort = await market.getEscortByTelegramId(206);
    expect(escort?.rating).toBe(5);
    expect(escort?.rating_count).toBe(1);
    expect(escort?.reputation).toBe(5);
    expect(escort?.completed_orders).toBe(1);

    await expect(market.rateOrder({ orderId: order.id, score: 4 })).rejects.toBeInstanceOf(InvalidTransitionError);
  });

  it("rates a completed order once after the fact", async () => {
    const { market } = setup();
    const order = await seedOrder(market, "E-2", 1000);
    const w = await seedWorker(market, 207);
    await market.applyToOrder({ orderId: order.id, escortId: w.escort.id });
    await market.assignOrder({ orderId: order.id, escortIds: w.escort.id });
    await market.completeOrder({ orderId: order.id });

    const rated = await market.rateOrder({ orderId: order.id, score: 3 });
    expect(rated.rating).toBe(3);
    expect((await market.getEscortByTelegramId(207))?.rating).toBe(3);
    await expect(market.rateOrder({ orderId: order.id, score: 3 })).rejects.toBeInstanceOf(InvalidTransitionError);
  });

  it("splits a squad order and recomputes squad totals", async () => {
    const { market } = setup();
    const squad = await market.createSquad({ name: "Alpha" });
    const a = await seedWorker(market, 301, squad.id);
    const b = await seedWorker(market, 302, squad.id);
    const order = await seedOrder(market, "S-1", 1001);

    await market.applyToOrder({ orderId: order.id, escortId: a.escort.id });
    await market.applyToOrder({ orderId: order.id, escortId: b.escort.id });
    const { order: assigned } = await market.assignOrder({ orderId: order.id, escortIds: [a.escort.id, b.escort.id] });
    expect(assigned.squad_id).toBe(squad.id);

    const { settlement } = await market.completeOrder({ orderId: order.id });
    // 20% of 1001 rounds down to 200; net 801 splits 401 / 400
    expect(settlement.commission).toBe(200);
    expect(settlement.payouts.map((p) => [p.escort_id, p.amount, p.commission_amount])).toEqual([
      [a.escort.id, 401, 100],
      [b.escort.id, 400, 100]
    ]);
    expect(await market.getBalance(a.user.id)).toBe(401);
    expect(await market.getBalance(b.user.id)).toBe(400);

    const after = await market.getSquadByName("Alpha");
    expect(after?.total_orders).toBe(1);
    expect(after?.total_earned).toBe(801);
  });

  it("finds in-progress orders older than the cut-off", async () => {
    const { market, time } = setup();
    const order = await seedOrder(market, "F-1", 1000);
    const w = await seedWorker(market, 208);
    await market.applyToOrder({ orderId: order.id, escortId: w.escort.id });
    await market.assignOrder({ orderId: order.id, escortIds: w.escort.id });
    await market.startOrder({ orderId: order.id });

    time.advance(11 * HOUR);
    expect(await market.findStaleOrders({ olderThanHours: 12 })).toEqual([]);
    time.advance(2 * HOUR);
    expect((await market.findStaleOrders({ olderThanHours: 12 })).map((o) => o.id)).toEqual([order.id]);
  });
});

describe("complaints", () => {
  it("files a complaint against an order", async () => {
    const { market } = setup();
    const order = await seedOrder(market, "C-1", 1000);
    const user = await market.registerUser({ telegramId: 230 });

    const complaint = await market.fileComplaint({ userId: user.id, orderId: order.id, text: "  no-show  " });

    expect(complaint).toMatchObject({ user_id: user.id, order_id: order.id, text: "no-show" });
    expect(await market.complaintsForOrder(order.id)).toEqual([complaint]);
    const last = (await market.actionsForOrder(order.id)).at(-1);
    expect(last).toMatchObject({ action_type: "file_complaint", actor_id: user.id });
  });

  it("rejects empty text and unknown orders", async () => {
    const { market } = setup();
    const user = await market.registerUser({ telegramId: 231 });

    await expect(market.fileComplaint({ userId: user.id, text: "   " })).rejects.toBeInstanceOf(ValidationError);
    await expect(market.fileComplaint({ userId: user.id, orderId: 999, text: "late" })).rejects.toMatchObject({
      code: "NOT_FOUND"
    });
    await expect(market.fileComplaint({ userId: 999, text: "late" })).rejects.toBeInstanceOf(NotFoundError);
  });
});
