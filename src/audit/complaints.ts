import { NotFoundError, ValidationError } from "../core/errors.js";
import type { StoreTx } from "../db/store.js";
import type { ComplaintRow } from "../db/types.js";
import type { MarketContext } from "../market/settings.js";
import { recordAction } from "./actionLog.js";

export async function fileComplaint(
  tx: StoreTx,
  ctx: MarketContext,
  args: { userId: number; orderId?: number | null; text: string }
): Promise<ComplaintRow> {
  const text = args.text.trim();
  if (!text) throw new ValidationError("complaint text is required");
  if (text.length > 4000) throw new ValidationError("complaint text is too long", { length: text.length });

  const user = await tx.users.findById(args.userId);
  if (!user) throw new NotFoundError("user", args.userId);
  const orderId = args.orderId ?? null;
  if (orderId !== null && !(await tx.orders.findById(orderId))) throw new NotFoundError("order", orderId);

  const complaint = await tx.complaints.create({ userId: user.id, orderId, text, now: ctx.now() });
  await recordAction(tx, ctx, {
    type: "file_complaint",
    actorId: user.id,
    subjectUserId: user.id,
    orderId,
    description: `complaint #${complaint.id}`
  });
  return complaint;
}
