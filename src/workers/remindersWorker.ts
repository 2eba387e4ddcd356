import { config } from "../core/config.js";
import { errorMessage } from "../core/errors.js";
import { logger } from "../core/logger.js";
import { notifyAdmins } from "../core/adminAlerts.js";
import { telegramNotifier } from "../bot/telegramApi.js";
import { PgStore } from "../db/pgStore.js";
import { pool } from "../db/pool.js";
import { createMarketplace } from "../market/marketplace.js";
import { marketSettingsFromConfig } from "../market/settings.js";
import { sendReminders } from "./reminders.js";

logger.info("reminders-worker started");

const notifier = telegramNotifier();
const market = createMarketplace({
  store: new PgStore(pool, { lockTimeoutMs: config.lockTimeoutMs }),
  settings: marketSettingsFromConfig(config)
});

let running = false;

async function tick() {
  if (running) return;
  running = true;
  try {
    const res = await sendReminders(market, notifier, { olderThanHours: config.reminderAfterHours, limit: 200 });
    if (res.orders) {
      logger.info(`reminders-worker: ${res.orders} stale order(s), ${res.sent} sent, ${res.failed} failed`);
    }
  } finally {
    running = false;
  }
}

setInterval(() => {
  tick().catch((e) => {
    logger.error("reminders-worker tick failed", e);
    void notifyAdmins(notifier, `reminders-worker tick failed: ${errorMessage(e)}`);
  });
}, config.reminderIntervalMinutes * 60 * 1000);

await tick().catch((e) => {
  logger.error("reminders-worker initial tick failed", e);
  void notifyAdmins(notifier, `reminders-worker initial tick failed: ${errorMessage(e)}`);
});

process.on("SIGINT", async () => {
  logger.info("reminders-worker stopping...");
  await pool.end().catch((e: unknown) => logger.error("pool shutdown failed", e));
  process.exit(0);
});
