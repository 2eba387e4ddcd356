import "dotenv/config";

function mustGetEnv(key: string): string {
  const v = process.env[key];
  if (!v) throw new Error(`Missing required env var: ${key}`);
  return v;
}

function getEnv(key: string): string | undefined;
function getEnv(key: string, defaultValue: string): string;
function getEnv(key: string, defaultValue?: string): string | undefined {
  const v = process.env[key];
  return v ?? defaultValue;
}

function getIntEnv(key: string, defaultValue: number): number {
  const raw = getEnv(key);
  if (raw === undefined || raw.trim() === "") return defaultValue;
  const n = Number(raw);
  if (!Number.isSafeInteger(n)) throw new Error(`Env var ${key} must be an integer, got "${raw}"`);
  return n;
}

function getBoolEnv(key: string, defaultValue: boolean): boolean {
  const raw = getEnv(key);
  if (raw === undefined || raw.trim() === "") return defaultValue;
  return ["1", "true", "yes", "on"].includes(raw.toLowerCase().trim());
}

function getIdListEnv(key: string): number[] {
  return (getEnv(key, ""))
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean)
    .map(Number)
    .filter((n) => Number.isSafeInteger(n) && n > 0);
}

export const config = {
  databaseUrl: getEnv("DATABASE_URL"),
  botToken: getEnv("BOT_TOKEN"),
  adminTelegramIds: getIdListEnv("ADMIN_TELEGRAM_IDS"),

  // Commission: COMMISSION_TIERS (JSON) wins over the flat rate when set.
  commissionRateBps: getIntEnv("COMMISSION_RATE_BPS", 2000),
  commissionTiers: getEnv("COMMISSION_TIERS"),

  assignmentPolicy: getEnv("ASSIGNMENT_POLICY", "earliest"),
  maxApplicants: getIntEnv("MAX_APPLICANTS", 4),
  maxAssignees: getIntEnv("MAX_ASSIGNEES", 4),
  minSquadAssignees: getIntEnv("MIN_SQUAD_ASSIGNEES", 2),
  maxSquadMembers: getIntEnv("MAX_SQUAD_MEMBERS", 6),
  requireGameAccount: getBoolEnv("REQUIRE_GAME_ACCOUNT", true),
  requireSquad: getBoolEnv("REQUIRE_SQUAD", false),
  minWithdrawal: getIntEnv("MIN_WITHDRAWAL", 1),

  lockTimeoutMs: getIntEnv("LOCK_TIMEOUT_MS", 2000),
  conflictRetries: getIntEnv("CONFLICT_RETRIES", 3),
  conflictBackoffMs: getIntEnv("CONFLICT_BACKOFF_MS", 25),

  reminderAfterHours: getIntEnv("REMINDER_AFTER_HOURS", 12),
  reminderIntervalMinutes: getIntEnv("REMINDER_INTERVAL_MINUTES", 30),
  exportsPath: getEnv("EXPORTS_PATH", "./data/exports"),

  // Helpers for parts that must fail fast:
  mustGetEnv
};
