import { describe, expect, it } from "vitest";
import {
  AlreadyAssignedError,
  DuplicateApplicationError,
  NoSuchApplicationError,
  NotEnoughApplicantsError,
  OrderFullError,
  OrderNotOpenError,
  ValidationError,
  WorkerNotEligibleError,
  WorkerRestrictedError
} from "../src/core/errors.js";
import { HOUR, T0, seedOrder, seedWorker, setup } from "./helpers.js";

describe("applications", () => {
  it("snapshots the worker's squad and game account", async () => {
    const { market } = setup();
    const squad = await market.createSquad({ name: "Bravo" });
    const w = await seedWorker(market, 401, squad.id);
    const order = await seedOrder(market, "AP-1", 1000);

    const app = await market.applyToOrder({ orderId: order.id, escortId: w.escort.id });
    expect(app.squad_id).toBe(squad.id);
    expect(app.game_account_id).toBe("10000401");
    expect(app.created_at.toISOString()).toBe(T0);
  });

  it("rejects a repeated application", async () => {
    const { market } = setup();
    const w = await seedWorker(market, 402);
    const order = await seedOrder(market, "AP-2", 1000);
    await market.applyToOrder({ orderId: order.id, escortId: w.escort.id });
    await expect(market.applyToOrder({ orderId: order.id, escortId: w.escort.id })).rejects.toBeInstanceOf(
      DuplicateApplicationError
    );
  });

  it("caps applications per order", async () => {
    const { market } = setup({ maxApplicants: 2 });
    const order = await seedOrder(market, "AP-3", 1000);
    for (const tg of [403, 404]) {
      const w = await seedWorker(market, tg);
      await market.applyToOrder({ orderId: order.id, escortId: w.escort.id });
    }
    const late = await seedWorker(market, 405);
    await expect(market.applyToOrder({ orderId: order.id, escortId: late.escort.id })).rejects.toBeInstanceOf(
      OrderFullError
    );
  });

  it("requires accepted rules and a game account", async () => {
    const { market } = setup();
    const order = await seedOrder(market, "AP-4", 1000);
    const user = await market.registerUser({ telegramId: 406 });
    const escort = await market.enrollWorker({ userId: user.id });

    const first = market.applyToOrder({ orderId: order.id, escortId: escort.id });
    await expect(first).rejects.toBeInstanceOf(WorkerNotEligibleError);
    await expect(first).rejects.toMatchObject({ reason: "rules_not_accepted" });

    await market.acceptRules({ escortId: escort.id });
    await expect(market.applyToOrder({ orderId: order.id, escortId: escort.id })).rejects.toMatchObject({
      reason: "missing_game_account"
    });
  });

  it("requires squad membership when configured", async () => {
    const { market } = setup({ requireSquad: true });
    const order = await seedOrder(market, "AP-5", 1000);
    const w = await seedWorker(market, 407);
    await expect(market.applyToOrder({ orderId: order.id, escortId: w.escort.id })).rejects.toMatchObject({
      reason: "not_in_squad"
    });
  });

  it("turns away a banned worker until the ban expires", async () => {
    const { market, time } = setup();
    const order = await seedOrder(market, "AP-6", 1000);
    const w = await seedWorker(market, 408);
    await market.banWorker({ escortId: w.escort.id, until: new Date(Date.parse(T0) + HOUR) });

    await expect(market.applyToOrder({ orderId: order.id, escortId: w.escort.id })).rejects.toBeInstanceOf(
      WorkerRestrictedError
    );

    time.advance(2 * HOUR);
    const app = await market.applyToOrder({ orderId: order.id, escortId: w.escort.id });
    expect(app.escort_id).toBe(w.escort.id);
  });

  it("turns away restricted and permanently banned workers", async () => {
    const { market } = setup();
    const order = await seedOrder(market, "AP-7", 1000);
    const r = await seedWorker(market, 409);
    const p = await seedWorker(market, 410);
    await market.restrictWorker({ escortId: r.escort.id, until: new Date(Date.parse(T0) + HOUR) });
    await market.banWorkerPermanently({ escortId: p.escort.id });

    await expect(market.applyToOrder({ orderId: order.id, escortId: r.escort.id })).rejects.toBeInstanceOf(
      WorkerRestrictedError
    );
    await expect(market.applyToOrder({ orderId: order.id, escortId: p.escort.id })).rejects.toMatchObject({
      code: "WORKER_RESTRICTED",
      details: { escortId: p.escort.id, until: null }
    });

    await market.unbanWorker({ escortId: p.escort.id });
    await expect(market.applyToOrder({ orderId: order.id, escortId: p.escort.id })).resolves.toMatchObject({
      escort_id: p.escort.id
    });
  });

  it("rejects applications to an assigned order", async () => {
    const { market } = setup();
    const order = await seedOrder(market, "AP-8", 1000);
    const a = await seedWorker(market, 411);
    const b = await seedWorker(market, 412);
    await market.applyToOrder({ orderId: order.id, escortId: a.escort.id });
    await market.assignOrder({ orderId: order.id, escortIds: a.escort.id });
    await expect(market.applyToOrder({ orderId: order.id, escortId: b.escort.id })).rejects.toBeInstanceOf(
      OrderNotOpenError
    );
  });
});

describe("assignment", () => {
  it("lets exactly one of two racing assigns win", async () => {
    const { market } = setup();
    const order = await seedOrder(market, "AS-1", 1000);
    const a = await seedWorker(market, 501);
    const b = await seedWorker(market, 502);
    await market.applyToOrder({ orderId: order.id, escortId: a.escort.id });
    await market.applyToOrder({ orderId: order.id, escortId: b.escort.id });

    const results = await Promise.allSettled([
      market.assignOrder({ orderId: order.id, escortIds: a.escort.id }),
      market.assignOrder({ orderId: order.id, escortIds: b.escort.id })
    ]);

    const won = results.filter((r) => r.status === "fulfilled");
    const lost = results.flatMap((r) => (r.status === "rejected" ? [r.reason] : []));
    expect(won).toHaveLength(1);
    expect(lost).toHaveLength(1);
    expect(lost[0]).toBeInstanceOf(AlreadyAssignedError);
    expect(await market.listAssignees(order.id)).toHaveLength(1);
  });

  it("requires an application from every assignee", async () => {
    const { market } = setup();
    const order = await seedOrder(market, "AS-2", 1000);
    const a = await seedWorker(market, 503);
    const b = await seedWorker(market, 504);
    await market.applyToOrder({ orderId: order.id, escortId: a.escort.id });

    await expect(
      market.assignOrder({ orderId: order.id, escortIds: [a.escort.id, b.escort.id] })
    ).rejects.toBeInstanceOf(NoSuchApplicationError);
    // nothing from the failed attempt was kept
    expect(await market.listAssignees(order.id)).toEqual([]);
    expect((await market.getOrder(order.id))?.status).toBe("open");
  });

  it("caps the number of assignees", async () => {
    const { market } = setup({ maxAssignees: 1, minSquadAssignees: 1 });
    const order = await seedOrder(market, "AS-3", 1000);
    const a = await seedWorker(market, 505);
    const b = await seedWorker(market, 506);
    await market.applyToOrder({ orderId: order.id, escortId: a.escort.id });
    await market.applyToOrder({ orderId: order.id, escortId: b.escort.id });
    await expect(
      market.assignOrder({ orderId: order.id, escortIds: [a.escort.id, b.escort.id] })
    ).rejects.toBeInstanceOf(ValidationError);
  });

  it("refuses a worker banned after applying", async () => {
    const { market } = setup();
    const order = await seedOrder(market, "AS-4", 1000);
    const a = await seedWorker(market, 507);
    await market.applyToOrder({ orderId: order.id, escortId: a.escort.id });
    await market.banWorker({ escortId: a.escort.id, until: new Date(Date.parse(T0) + HOUR) });
    await expect(market.assignOrder({ orderId: order.id, escortIds: a.escort.id })).rejects.toBeInstanceOf(
      WorkerRestrictedError
    );
  });

  it("reports a terminal order as not open", async () => {
    const { market } = setup();
    const order = await seedOrder(market, "AS-5", 1000);
    const a = await seedWorker(market, 508);
    await market.applyToOrder({ orderId: order.id, escortId: a.escort.id });
    await market.cancelOrder({ orderId: order.id });
    await expect(market.assignOrder({ orderId: order.id, escortIds: a.escort.id })).rejects.toBeInstanceOf(
      OrderNotOpenError
    );
  });

  it("auto-assigns the earliest eligible applicant", async () => {
    const { market, time } = setup();
    const order = await seedOrder(market, "AS-6", 1000);
    const a = await seedWorker(market, 509);
    const b = await seedWorker(market, 510);
    await market.applyToOrder({ orderId: order.id, escortId: a.escort.id });
    time.advance(1000);
    await market.applyToOrder({ orderId: order.id, escortId: b.escort.id });
    await market.banWorker({ escortId: a.escort.id, until: new Date(Date.parse(T0) + HOUR) });

    const { assignments } = await market.autoAssignOrder({ orderId: order.id });
    expect(assignments.map((x) => x.escort_id)).toEqual([b.escort.id]);
  });

  it("fails auto-assignment without eligible applicants", async () => {
    const { market } = setup();
    const order = await seedOrder(market, "AS-7", 1000);
    await expect(market.autoAssignOrder({ orderId: order.id })).rejects.toMatchObject({
      code: "NOT_ENOUGH_APPLICANTS",
      details: { orderId: order.id, required: 1, available: 0 }
    });
  });

  it("auto-assigns the squad of the earliest squad applicant", async () => {
    const { market } = setup({ assignmentPolicy: "squad" });
    const squad = await market.createSquad({ name: "Charlie" });
    const solo = await seedWorker(market, 511);
    const s1 = await seedWorker(market, 512, squad.id);
    const s2 = await seedWorker(market, 513, squad.id);
    const order = await seedOrder(market, "AS-8", 1000);
    for (const w of [solo, s1, s2]) await market.applyToOrder({ orderId: order.id, escortId: w.escort.id });

    const { order: assigned, assignments } = await market.autoAssignOrder({ orderId: order.id });
    expect(assignments.map((x) => x.escort_id)).toEqual([s1.escort.id, s2.escort.id]);
    expect(assigned.squad_id).toBe(squad.id);
  });

  it("groups squad applicants by the squad they applied from", async () => {
    const { market } = setup({ assignmentPolicy: "squad" });
    const squad = await market.createSquad({ name: "Echo" });
    const s1 = await seedWorker(market, 515, squad.id);
    const s2 = await seedWorker(market, 516, squad.id);
    const order = await seedOrder(market, "AS-10", 1000);
    for (const w of [s1, s2]) await market.applyToOrder({ orderId: order.id, escortId: w.escort.id });
    await market.removeFromSquad({ escortId: s1.escort.id });

    const { assignments } = await market.autoAssignOrder({ orderId: order.id });
    expect(assignments.map((x) => x.escort_id)).toEqual([s1.escort.id, s2.escort.id]);
  });

  it("needs enough squad members for the squad policy", async () => {
    const { market } = setup({ assignmentPolicy: "squad" });
    const squad = await market.createSquad({ name: "Delta" });
    const s1 = await seedWorker(market, 514, squad.id);
    const order = await seedOrder(market, "AS-9", 1000);
    await market.applyToOrder({ orderId: order.id, escortId: s1.escort.id });
    await expect(market.autoAssignOrder({ orderId: order.id })).rejects.toBeInstanceOf(NotEnoughApplicantsError);
  });
});
