import { NotFoundError, ValidationError } from "../core/errors.js";
import { isGameAccountId } from "../core/validation.js";
import { recordAction } from "../audit/actionLog.js";
import type { StoreTx } from "../db/store.js";
import type { EscortRow, UserRow } from "../db/types.js";
import type { MarketContext } from "../market/settings.js";

/** Get-or-create on first contact. */
export async function registerUser(
  tx: StoreTx,
  ctx: MarketContext,
  args: { telegramId: number; username?: string | null }
): Promise<{ user: UserRow; created: boolean }> {
  if (!Number.isSafeInteger(args.telegramId) || args.telegramId <= 0) {
    throw new ValidationError("telegram id must be a positive integer", { telegramId: args.telegramId });
  }
  const existing = await tx.users.findByTelegramId(args.telegramId);
  if (existing) return { user: existing, created: false };

  const user = await tx.users.create({
    telegramId: args.telegramId,
    username: args.username?.trim() || null,
    now: ctx.now()
  });
  await recordAction(tx, ctx, {
    type: "register_user",
    actorId: user.id,
    subjectUserId: user.id,
    description: user.username ? `@${user.username}` : undefined
  });
  return { user, created: true };
}

/** Gives the user a worker profile; calling it again returns the same profile. */
export async function enrollWorker(
  tx: StoreTx,
  ctx: MarketContext,
  args: { userId: number; actorId?: number | null }
): Promise<EscortRow> {
  const user = await tx.users.lock(args.userId);
  if (!user) throw new NotFoundError("user", args.userId);

  const existing = await tx.escorts.findByUserId(user.id);
  if (existing) return existing;

  const escort = await tx.escorts.create({ userId: user.id, now: ctx.now() });
  if (!user.is_worker) await tx.users.setWorker(user.id, true);
  await recordAction(tx, ctx, {
    type: "enroll_worker",
    actorId: args.actorId ?? user.id,
    subjectUserId: user.id,
    description: `escort ${escort.id}`
  });
  return escort;
}

async function lockEscort(tx: StoreTx, escortId: number): Promise<EscortRow> {
  const escort = await tx.escorts.lock(escortId);
  if (!escort) throw new NotFoundError("escort", escortId);
  return escort;
}

export async function acceptRules(tx: StoreTx, ctx: MarketContext, args: { escortId: number }): Promise<EscortRow> {
  const escort = await lockEscort(tx, args.escortId);
  if (escort.rules_accepted) return escort;
  const updated = await tx.escorts.update(escort.id, { rules_accepted: true });
  await recordAction(tx, ctx, { type: "accept_rules", actorId: escort.user_id, subjectUserId: escort.user_id });
  return updated;
}

export async function setGameAccount(
  tx: StoreTx,
  ctx: MarketContext,
  args: { escortId: number; gameAccountId: string }
): Promise<EscortRow> {
  const id = args.gameAccountId.trim();
  if (!isGameAccountId(id)) throw new ValidationError("game account id must be 5-12 digits", { gameAccountId: id });

  const escort = await lockEscort(tx, args.escortId);
  const updated = await tx.escorts.update(escort.id, { game_account_id: id });
  await recordAction(tx, ctx, {
    type: "set_game_account",
    actorId: escort.user_id,
    subjectUserId: escort.user_id,
    description: id
  });
  return updated;
}
