import { logger } from "../core/logger.js";

// serialization_failure, deadlock_detected
const RETRYABLE_CODES = new Set(["40001", "40P01"]);
const MAX_ATTEMPTS = 3;

function pgCode(e: unknown): string | undefined {
  if (typeof e !== "object" || e === null || !("code" in e)) return undefined;
  return typeof e.code === "string" ? e.code : undefined;
}

export function isRetryableTxError(e: unknown): boolean {
  const code = pgCode(e);
  return code !== undefined && RETRYABLE_CODES.has(code);
}

/** The part of a pooled client a transaction needs; pg's PoolClient satisfies it. */
export type TxClient = {
  query(text: string, values?: unknown[]): Promise<unknown>;
  release(err?: Error | boolean): void;
};

/**
 * BEGIN / COMMIT around `fn` on one pooled client, ROLLBACK on any throw.
 * Deadlocks and serialization failures are retried from the start. A client
 * whose ROLLBACK failed is released with the error so the pool discards it.
 */
export async function withTransaction<C extends TxClient, T>(
  pool: { connect(): Promise<C> },
  fn: (client: C) => Promise<T>
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    const client = await pool.connect();
    let broken: Error | undefined;
    try {
      await client.query("BEGIN");
      const result = await fn(client);
      await client.query("COMMIT");
      return result;
    } catch (e) {
      await client.query("ROLLBACK").catch((rollbackError: unknown) => {
        logger.error("ROLLBACK failed", rollbackError);
        broken = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
      });
      if (attempt < MAX_ATTEMPTS && isRetryableTxError(e)) {
        logger.warn(`transaction retry ${attempt}/${MAX_ATTEMPTS - 1} after ${pgCode(e)}`);
        continue;
      }
      throw e;
    } finally {
      client.release(broken);
    }
  }
}

export function forUpdate(opts?: { forUpdate?: boolean }): string {
  return opts?.forUpdate ? " FOR UPDATE" : "";
}
