import type { StoreTx } from "../db/store.js";
import type { ActionLogRow, ActionType } from "../db/types.js";
import type { MarketContext } from "../market/settings.js";

export type ActionEntry = {
  type: ActionType;
  actorId?: number | null;
  subjectUserId?: number | null;
  orderId?: number | null;
  prior?: string | null;
  next?: string | null;
  description?: string;
};

/** Appends one immutable entry; call it inside the transaction it describes. */
export async function recordAction(tx: StoreTx, ctx: MarketContext, entry: ActionEntry): Promise<ActionLogRow> {
  return tx.actions.append({
    action_type: entry.type,
    actor_id: entry.actorId ?? null,
    subject_user_id: entry.subjectUserId ?? null,
    order_id: entry.orderId ?? null,
    prior_status: entry.prior ?? null,
    new_status: entry.next ?? null,
    description: entry.description ?? null,
    created_at: ctx.now()
  });
}
