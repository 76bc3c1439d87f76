import { readdir, readFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import type { PoolClient } from "pg";
import { pool } from "./pool.js";
import { withTransaction } from "./tx.js";
import { logger } from "../core/logger.js";
import { config } from "../core/config.js";

const log = logger.child("migrate");

async function run() {
  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL is required to run migrations.");
  }

  const migrationsDir = join(dirname(fileURLToPath(import.meta.url)), "migrations");

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
    log.info(`Running migration ${filename}...`);
    await withTransaction<PoolClient, void>(pool, async (client) => {
      await client.query(sql);
      await client.query("INSERT INTO schema_migrations (filename) VALUES ($1)", [filename]);
    });
    applied++;
    log.info(`Migration OK: ${filename}`);
  }
  log.info(`${applied} migration(s) applied, ${files.length - applied} already present`);
}

await run()
  .catch((e: unknown) => {
    log.error("Migration failed", e);
    process.exitCode = 1;
  })
  .finally(async () => {
    await pool.end();
  });
