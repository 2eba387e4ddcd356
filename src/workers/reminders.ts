import { asyncPool } from "../core/async.js";
import { errorMessage } from "../core/errors.js";
import { logger } from "../core/logger.js";
import type { Notifier } from "../bot/telegramApi.js";
import type { Marketplace } from "../market/marketplace.js";

export type ReminderRunResult = {
  orders: number;
  sent: number;
  failed: number;
};

function reminderText(memoOrderId: string, since: Date): string {
  return [
    `Order ${memoOrderId} has been in progress since ${since.toISOString()}.`,
    "Please finish it or contact an administrator."
  ].join("\n");
}

/**
 * Messages the assignees of every in-progress order older than
 * `olderThanHours` and logs one reminder action per order reached. An order
 * is reminded again only after `repeatAfterHours` (default: `olderThanHours`).
 */
export async function sendReminders(
  market: Marketplace,
  notifier: Notifier,
  opts: { olderThanHours: number; repeatAfterHours?: number; limit?: number; concurrency?: number }
): Promise<ReminderRunResult> {
  const stale = await market.findStaleOrders({
    olderThanHours: opts.olderThanHours,
    notRemindedWithinHours: opts.repeatAfterHours ?? opts.olderThanHours,
    limit: opts.limit
  });
  const result: ReminderRunResult = { orders: stale.length, sent: 0, failed: 0 };

  for (const order of stale) {
    const assignees = await market.listAssignees(order.id);
    const since = order.started_at ?? order.assigned_at ?? order.created_at;
    const text = reminderText(order.memo_order_id, since);

    const delivered = await asyncPool(opts.concurrency ?? 4, assignees, async ({ escort, user }) => {
      try {
        await notifier.sendMessage(user.telegram_id, text);
        return escort.id;
      } catch (e) {
        logger.warn(`reminders: order ${order.id}, escort ${escort.id}: ${errorMessage(e)}`);
        return null;
      }
    });
    const reached = delivered.filter((id): id is number => id !== null);
    result.sent += reached.length;
    result.failed += assignees.length - reached.length;

    if (reached.length) await market.recordReminder({ orderId: order.id, escortIds: reached });
  }
  return result;
}
