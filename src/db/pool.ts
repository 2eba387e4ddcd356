import pg from "pg";
import { config } from "../core/config.js";

const { Pool, types } = pg;

// BIGINT columns (ids, telegram ids, money in minor units, counts) stay within
// Number.MAX_SAFE_INTEGER; parse them as numbers instead of strings.
const INT8_OID = 20;
types.setTypeParser(INT8_OID, (v: string) => {
  const n = Number(v);
  if (!Number.isSafeInteger(n)) throw new Error(`int8 value out of safe range: ${v}`);
  return n;
});

if (!config.databaseUrl) {
  throw new Error("DATABASE_URL is required for database connection.");
}

export const pool = new Pool({
  connectionString: config.databaseUrl
});
