import { NotFoundError, ValidationError } from "../core/errors.js";
import { assertRatingScore } from "../core/validation.js";
import { recordAction } from "../audit/actionLog.js";
import type { StoreTx } from "../db/store.js";
import type { EscortRow, SquadRow } from "../db/types.js";
import type { MarketContext } from "../market/settings.js";

export type Restriction = {
  kind: "banned" | "restricted";
  until: Date | null; // null = permanent ban
};

/**
 * Active restriction of an escort at `now`, or null. Enforcement lives in the
 * assignment engine; this only reads the windows.
 */
export function activeRestriction(escort: EscortRow, now: Date): Restriction | null {
  if (escort.is_banned) return { kind: "banned", until: null };
  const t = now.getTime();
  if (escort.ban_until && escort.ban_until.getTime() > t) return { kind: "banned", until: escort.ban_until };
  if (escort.restrict_until && escort.restrict_until.getTime() > t) {
    return { kind: "restricted", until: escort.restrict_until };
  }
  return null;
}

export function isRestricted(escort: EscortRow, now: Date): boolean {
  return activeRestriction(escort, now) !== null;
}

export function nextAverage(avg: number, count: number, score: number): { rating: number; count: number } {
  return { rating: (avg * count + score) / (count + 1), count: count + 1 };
}

export async function rateEscort(tx: StoreTx, escortId: number, score: number): Promise<EscortRow> {
  const escort = await tx.escorts.lock(escortId);
  if (!escort) throw new NotFoundError("escort", escortId);
  const next = nextAverage(escort.rating, escort.rating_count, score);
  return tx.escorts.update(escort.id, {
    rating: next.rating,
    rating_count: next.count,
    reputation: escort.reputation + score
  });
}

export async function rateSquad(tx: StoreTx, squadId: number, score: number): Promise<SquadRow> {
  const squad = await tx.squads.lock(squadId);
  if (!squad) throw new NotFoundError("squad", squadId);
  const next = nextAverage(squad.rating, squad.rating_count, score);
  return tx.squads.update(squad.id, { rating: next.rating, rating_count: next.count });
}

/** Rates one escort; the escort's squad, if any, receives the same score. */
export async function recordRating(
  tx: StoreTx,
  ctx: MarketContext,
  args: { escortId: number; score: number; actorId?: number | null }
): Promise<EscortRow> {
  assertRatingScore(args.score);
  const escort = await rateEscort(tx, args.escortId, args.score);
  if (escort.squad_id !== null) await rateSquad(tx, escort.squad_id, args.score);

  await recordAction(tx, ctx, {
    type: "record_rating",
    actorId: args.actorId,
    subjectUserId: escort.user_id,
    description: `rating ${args.score} for escort ${escort.id}`
  });
  return escort;
}

async function lockEscort(tx: StoreTx, escortId: number): Promise<EscortRow> {
  const escort = await tx.escorts.lock(escortId);
  if (!escort) throw new NotFoundError("escort", escortId);
  return escort;
}

/** Timed ban; `until` null (or in the past) lifts it. */
export async function ban(
  tx: StoreTx,
  ctx: MarketContext,
  args: { escortId: number; until: Date | null; actorId?: number | null }
): Promise<EscortRow> {
  const escort = await lockEscort(tx, args.escortId);
  const updated = await tx.escorts.update(escort.id, { ban_until: args.until, is_banned: false });
  await recordAction(tx, ctx, {
    type: args.until ? "ban_temporary" : "unban_user",
    actorId: args.actorId,
    subjectUserId: escort.user_id,
    description: args.until ? `banned until ${args.until.toISOString()}` : "ban lifted"
  });
  return updated;
}

export async function restrict(
  tx: StoreTx,
  ctx: MarketContext,
  args: { escortId: number; until: Date | null; actorId?: number | null }
): Promise<EscortRow> {
  const escort = await lockEscort(tx, args.escortId);
  const updated = await tx.escorts.update(escort.id, { restrict_until: args.until });
  await recordAction(tx, ctx, {
    type: args.until ? "restrict_user" : "unban_user",
    actorId: args.actorId,
    subjectUserId: escort.user_id,
    description: args.until ? `restricted until ${args.until.toISOString()}` : "restriction lifted"
  });
  return updated;
}

export async function banPermanently(
  tx: StoreTx,
  ctx: MarketContext,
  args: { escortId: number; actorId?: number | null }
): Promise<EscortRow> {
  const escort = await lockEscort(tx, args.escortId);
  const updated = await tx.escorts.update(escort.id, { is_banned: true, ban_until: null });
  await recordAction(tx, ctx, {
    type: "ban_permanent",
    actorId: args.actorId,
    subjectUserId: escort.user_id,
    description: "banned permanently"
  });
  return updated;
}

export async function unban(
  tx: StoreTx,
  ctx: MarketContext,
  args: { escortId: number; actorId?: number | null }
): Promise<EscortRow> {
  const escort = await lockEscort(tx, args.escortId);
  if (!escort.is_banned && !escort.ban_until && !escort.restrict_until) {
    throw new ValidationError(`escort ${escort.id} has no ban or restriction`);
  }
  const updated = await tx.escorts.update(escort.id, { is_banned: false, ban_until: null, restrict_until: null });
  await recordAction(tx, ctx, {
    type: "unban_user",
    actorId: args.actorId,
    subjectUserId: escort.user_id,
    description: "all bans and restrictions lifted"
  });
  return updated;
}
