import pg from "pg";
import { config } from "../core/config.js";
import { logger } from "../core/logger.js";

const { Pool } = pg;

if (!config.databaseUrl) {
  throw new Error("DATABASE_URL is required for database connection.");
}

export const pool = new Pool({
  connectionString: config.databaseUrl,
  max: config.dbPoolSize,
  application_name: "agency-referral-bot"
});

pool.on("error", (err) => {
  logger.error("Idle Postgres client error", err);
});
