import { LedgerError, PersistenceError } from "../core/errors.js";
import type { LedgerResult } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import type { LedgerEvent, LedgerEventSink } from "./events.js";
import type { LedgerStore, LedgerTx } from "./store.js";

export type Emit = (event: LedgerEvent) => void;

/**
 * Shared plumbing of the ledger services: one transaction per operation,
 * expected refusals mapped to results, events published only after commit.
 */
export class LedgerRuntime {
  constructor(
    private readonly store: LedgerStore,
    private readonly sink: LedgerEventSink,
    private readonly log: Logger
  ) {}

  async execute<T>(operation: string, fn: (tx: LedgerTx, emit: Emit) => Promise<T>): Promise<LedgerResult<T>> {
    let events: LedgerEvent[] = [];
    let value: T;
    try {
      value = await this.store.transaction((tx) => {
        // A retried transaction starts over, so do its events.
        events = [];
        return fn(tx, (event) => events.push(event));
      });
    } catch (e) {
      if (e instanceof LedgerError) {
        this.log.info(`${operation} refused: ${e.reason} (${e.message})`);
        return { ok: false, reason: e.reason, message: e.message };
      }
      this.log.error(`${operation} failed, rolled back`, e);
      throw new PersistenceError(`${operation} did not take effect`, { cause: e });
    }

    for (const event of events) {
      try {
        await this.sink.publish(event);
      } catch (e) {
        this.log.error(`publishing ${event.type} after ${operation} failed`, e);
      }
    }
    return { ok: true, value };
  }

  /** Operations that never refuse; store failures still surface as PersistenceError. */
  async run<T>(operation: string, fn: (tx: LedgerTx) => Promise<T>): Promise<T> {
    try {
      return await this.store.transaction(fn);
    } catch (e) {
      this.log.error(`${operation} failed`, e);
      throw new PersistenceError(`${operation} failed`, { cause: e });
    }
  }
}
