import { readdir, readFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { pool } from "./pool.js";
import { logger } from "../core/logger.js";

const migrationsDir = join(dirname(fileURLToPath(import.meta.url)), "migrations");

async function run() {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id SERIAL PRIMARY KEY,
      filename TEXT UNIQUE NOT NULL,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
    );
  `);

  const files = (await readdir(migrationsDir))
    .filter((f) => f.endsWith(".sql"))
    .sort((a, b) => a.localeCompare(b));

  let applied = 0;
  for (const filename of files) {
    const already = await pool.query<{ filename: string }>(
      "SELECT filename FROM schema_migrations WHERE filename = $1",
      [filename]
    );
    if (already.rows[0]) continue;

    const sql = await readFile(join(migrationsDir, filename), "utf8");
    logger.info(`Running migration ${filename}...`);

    const client = await pool.connect();
    try {
      await client.query("BEGIN");
      await client.query(sql);
      await client.query("INSERT INTO schema_migrations (filename) VALUES ($1)", [filename]);
      await client.query("COMMIT");
    } catch (e) {
      await client.query("ROLLBACK");
      throw e;
    } finally {
      client.release();
    }
    applied += 1;
    logger.info(`Migration OK: ${filename}`);
  }
  logger.info(`Migrations done: ${applied} applied, ${files.length - applied} already present`);
}

await run()
  .catch((e) => {
    logger.error("Migration failed", e);
    process.exitCode = 1;
  })
  .finally(async () => {
    await pool.end();
  });
