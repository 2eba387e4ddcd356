import {
  AlreadyAssignedError,
  DuplicateApplicationError,
  NoSuchApplicationError,
  NotEnoughApplicantsError,
  NotFoundError,
  OrderFullError,
  OrderNotOpenError,
  ValidationError,
  WorkerNotEligibleError,
  WorkerRestrictedError
} from "../core/errors.js";
import { recordAction } from "../audit/actionLog.js";
import { activeRestriction } from "../reputation/tracker.js";
import type { StoreTx } from "../db/store.js";
import type { ApplicationRow, AssignmentRow, EscortRow, OrderRow } from "../db/types.js";
import type { MarketContext } from "../market/settings.js";
import { type Candidate, POLICIES } from "./policy.js";

export type AssignResult = {
  order: OrderRow;
  assignments: AssignmentRow[];
};

function assertNotRestricted(escort: EscortRow, now: Date): void {
  const r = activeRestriction(escort, now);
  if (r) throw new WorkerRestrictedError(escort.id, r.until);
}

function assertEligible(escort: EscortRow, ctx: MarketContext): void {
  assertNotRestricted(escort, ctx.now());
  if (!escort.rules_accepted) throw new WorkerNotEligibleError(escort.id, "rules_not_accepted");
  if (ctx.settings.requireGameAccount && !escort.game_account_id) {
    throw new WorkerNotEligibleError(escort.id, "missing_game_account");
  }
  if (ctx.settings.requireSquad && escort.squad_id === null) {
    throw new WorkerNotEligibleError(escort.id, "not_in_squad");
  }
}

async function lockOrder(tx: StoreTx, orderId: number): Promise<OrderRow> {
  const order = await tx.orders.lock(orderId);
  if (!order) throw new NotFoundError("order", orderId);
  return order;
}

function assertAssignable(order: OrderRow): void {
  if (order.status === "assigned" || order.status === "in_progress") throw new AlreadyAssignedError(order.id);
  if (order.status !== "open") throw new OrderNotOpenError(order.id, order.status);
}

export async function apply(
  tx: StoreTx,
  ctx: MarketContext,
  args: { orderId: number; escortId: number }
): Promise<ApplicationRow> {
  const order = await lockOrder(tx, args.orderId);
  if (order.status !== "open") throw new OrderNotOpenError(order.id, order.status);

  const escort = await tx.escorts.findById(args.escortId);
  if (!escort) throw new NotFoundError("escort", args.escortId);
  assertEligible(escort, ctx);

  if (await tx.applications.find(order.id, escort.id)) throw new DuplicateApplicationError(order.id, escort.id);
  const existing = await tx.applications.listByOrder(order.id);
  if (existing.length >= ctx.settings.maxApplicants) throw new OrderFullError(order.id, ctx.settings.maxApplicants);

  const application = await tx.applications.create({
    orderId: order.id,
    escortId: escort.id,
    squadId: escort.squad_id,
    gameAccountId: escort.game_account_id,
    now: ctx.now()
  });

  await recordAction(tx, ctx, {
    type: "apply_order",
    actorId: escort.user_id,
    subjectUserId: escort.user_id,
    orderId: order.id,
    description: `escort ${escort.id} applied`
  });
  return application;
}

/**
 * Binds the order to the given applicants. The order row is locked first, so
 * of two racing calls the second sees the order already assigned.
 */
export async function assign(
  tx: StoreTx,
  ctx: MarketContext,
  args: { orderId: number; escortIds: number | readonly number[]; actorId?: number | null }
): Promise<AssignResult> {
  const order = await lockOrder(tx, args.orderId);
  assertAssignable(order);

  const ids = [...new Set(typeof args.escortIds === "number" ? [args.escortIds] : args.escortIds)];
  if (!ids.length) throw new ValidationError("at least one escort is required");
  if (ids.length > ctx.settings.maxAssignees) {
    throw new ValidationError(`at most ${ctx.settings.maxAssignees} escort(s) per order`, { count: ids.length });
  }

  const now = ctx.now();
  const chosen: Array<{ escort: EscortRow; application: ApplicationRow }> = [];
  for (const escortId of ids) {
    const application = await tx.applications.find(order.id, escortId);
    if (!application) throw new NoSuchApplicationError(order.id, escortId);
    const escort = await tx.escorts.lock(escortId);
    if (!escort) throw new NotFoundError("escort", escortId);
    assertNotRestricted(escort, now);
    chosen.push({ escort, application });
  }

  const assignments: AssignmentRow[] = [];
  for (const { escort, application } of chosen) {
    assignments.push(
      await tx.assignments.create({
        orderId: order.id,
        escortId: escort.id,
        gameAccountId: escort.game_account_id ?? application.game_account_id,
        now
      })
    );
  }

  const squads = new Set(chosen.map((c) => c.escort.squad_id));
  const [only] = squads;
  const squadId = squads.size === 1 && only !== undefined ? only : null;

  const updated = await tx.orders.update(order.id, { status: "assigned", assigned_at: now, squad_id: squadId });

  await recordAction(tx, ctx, {
    type: "assign_order",
    actorId: args.actorId,
    orderId: order.id,
    prior: order.status,
    next: updated.status,
    description: `assigned escort(s) ${ids.join(", ")}`
  });
  return { order: updated, assignments };
}

/** Lets the configured policy choose among the eligible applicants, then assigns. */
export async function autoAssign(
  tx: StoreTx,
  ctx: MarketContext,
  args: { orderId: number; actorId?: number | null }
): Promise<AssignResult> {
  const order = await lockOrder(tx, args.orderId);
  assertAssignable(order);

  const now = ctx.now();
  const candidates: Candidate[] = [];
  for (const application of await tx.applications.listByOrder(order.id)) {
    const escort = await tx.escorts.findById(application.escort_id);
    if (!escort || activeRestriction(escort, now)) continue;
    candidates.push({ application, escort });
  }

  const { assignmentPolicy, maxAssignees, minSquadAssignees } = ctx.settings;
  const picked = POLICIES[assignmentPolicy](candidates, { maxAssignees, minSquadAssignees });
  if (!picked) {
    const required = assignmentPolicy === "squad" ? minSquadAssignees : 1;
    throw new NotEnoughApplicantsError(order.id, required, candidates.length);
  }
  return assign(tx, ctx, { orderId: order.id, escortIds: picked, actorId: args.actorId });
}
