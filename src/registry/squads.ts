import { DuplicateSquadError, NotFoundError, SquadFullError, ValidationError } from "../core/errors.js";
import { isSquadName } from "../core/validation.js";
import { recordAction } from "../audit/actionLog.js";
import type { StoreTx } from "../db/store.js";
import type { EscortRow, SquadRow } from "../db/types.js";
import type { MarketContext } from "../market/settings.js";

async function lockSquad(tx: StoreTx, squadId: number): Promise<SquadRow> {
  const squad = await tx.squads.lock(squadId);
  if (!squad) throw new NotFoundError("squad", squadId);
  return squad;
}

async function lockEscort(tx: StoreTx, escortId: number): Promise<EscortRow> {
  const escort = await tx.escorts.lock(escortId);
  if (!escort) throw new NotFoundError("escort", escortId);
  return escort;
}

export async function createSquad(
  tx: StoreTx,
  ctx: MarketContext,
  args: { name: string; actorId?: number | null }
): Promise<SquadRow> {
  if (!isSquadName(args.name)) throw new ValidationError("squad name must be 1-64 characters", { name: args.name });
  const name = args.name.trim();
  if (await tx.squads.findByName(name)) throw new DuplicateSquadError(name);

  const squad = await tx.squads.create({ name, now: ctx.now() });
  await recordAction(tx, ctx, { type: "add_squad", actorId: args.actorId, description: name });
  return squad;
}

/** Deletes the squad; its members stay workers without a squad. */
export async function disbandSquad(
  tx: StoreTx,
  ctx: MarketContext,
  args: { squadId: number; actorId?: number | null }
): Promise<{ squad: SquadRow; released: number }> {
  const squad = await lockSquad(tx, args.squadId);
  const released = await tx.escorts.clearSquad(squad.id);
  await tx.squads.delete(squad.id);
  await recordAction(tx, ctx, {
    type: "delete_squad",
    actorId: args.actorId,
    description: `${squad.name} (${released} member(s) released)`
  });
  return { squad, released };
}

export async function addToSquad(
  tx: StoreTx,
  ctx: MarketContext,
  args: { squadId: number; escortId: number; actorId?: number | null }
): Promise<EscortRow> {
  const squad = await lockSquad(tx, args.squadId);
  const escort = await lockEscort(tx, args.escortId);
  if (escort.squad_id !== null) {
    throw new ValidationError(`escort ${escort.id} is already in squad ${escort.squad_id}`, {
      escortId: escort.id,
      squadId: escort.squad_id
    });
  }

  const members = await tx.escorts.listBySquad(squad.id);
  if (members.length >= ctx.settings.maxSquadMembers) throw new SquadFullError(squad.id, ctx.settings.maxSquadMembers);

  const updated = await tx.escorts.update(escort.id, { squad_id: squad.id });
  await recordAction(tx, ctx, {
    type: "add_escort_to_squad",
    actorId: args.actorId,
    subjectUserId: escort.user_id,
    description: squad.name
  });
  return updated;
}

export async function removeFromSquad(
  tx: StoreTx,
  ctx: MarketContext,
  args: { escortId: number; actorId?: number | null }
): Promise<EscortRow> {
  const escort = await lockEscort(tx, args.escortId);
  if (escort.squad_id === null) throw new ValidationError(`escort ${escort.id} is not in a squad`);

  const updated = await tx.escorts.update(escort.id, { squad_id: null });
  await recordAction(tx, ctx, {
    type: "remove_escort_from_squad",
    actorId: args.actorId,
    subjectUserId: escort.user_id,
    description: `left squad ${escort.squad_id}`
  });
  return updated;
}
