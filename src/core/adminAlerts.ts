import { config } from "./config.js";
import { logger } from "./logger.js";
import type { Notifier } from "../bot/telegramApi.js";

/** Sends an alert to every id in ADMIN_TELEGRAM_IDS; returns how many went out. */
export async function notifyAdmins(
  notifier: Notifier,
  text: string,
  adminIds: readonly number[] = config.adminTelegramIds
): Promise<number> {
  let sent = 0;
  for (const adminId of adminIds) {
    try {
      await notifier.sendMessage(adminId, `[ADMIN ALERT]\n${text}`);
      sent += 1;
    } catch (e) {
      logger.error(`Failed to notify admin ${adminId}`, e);
    }
  }
  return sent;
}
