import "dotenv/config";

function getEnv(key: string): string | undefined;
function getEnv(key: string, defaultValue: string): string;
function getEnv(key: string, defaultValue?: string): string | undefined {
  const v = process.env[key];
  return v ?? defaultValue;
}

function getNumberEnv(key: string, defaultValue: number): number {
  const raw = getEnv(key);
  if (raw === undefined || raw.trim() === "") return defaultValue;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new Error(`Env var ${key} must be a number, got "${raw}"`);
  return n;
}

export function parseIdList(raw: string): number[] {
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean)
    .map(Number)
    .filter((n) => Number.isSafeInteger(n) && n > 0);
}

export const config = {
  botToken: getEnv("BOT_TOKEN"),
  adminTelegramIds: parseIdList(getEnv("ADMIN_TELEGRAM_IDS", "")),
  databaseUrl: getEnv("DATABASE_URL"),
  dbPoolSize: getNumberEnv("DB_POOL_SIZE", 10),

  // The ledger itself only rejects non-positive amounts; the threshold is a product rule.
  minPayoutAmount: getNumberEnv("MIN_PAYOUT_AMOUNT", 500),
  sessionIdleMinutes: getNumberEnv("SESSION_IDLE_MINUTES", 60)
};

export type AppConfig = typeof config;
