import { join } from "node:path";
import { config } from "../core/config.js";
import { writeFileEnsured } from "../core/fs.js";
import { logger } from "../core/logger.js";
import { PgStore } from "../db/pgStore.js";
import { pool } from "../db/pool.js";
import { createMarketplace } from "../market/marketplace.js";
import { marketSettingsFromConfig } from "../market/settings.js";

const market = createMarketplace({
  store: new PgStore(pool, { lockTimeoutMs: config.lockTimeoutMs }),
  settings: marketSettingsFromConfig(config)
});

async function run() {
  const csv = await market.exportOrdersCsv();
  const stamp = new Date().toISOString().replace(/[:.]/g, "-");
  const path = join(config.exportsPath, `orders-${stamp}.csv`);
  await writeFileEnsured(path, csv);
  logger.info(`orders exported to ${path}`);
}

await run()
  .catch((e) => {
    logger.error("orders export failed", e);
    process.exitCode = 1;
  })
  .finally(async () => {
    await pool.end();
  });
