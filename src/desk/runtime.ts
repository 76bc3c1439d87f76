import { PersistenceError } from "../core/errors.js";
import type { LedgerFailureReason, LedgerResult } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import type { DeskEvent, DeskEventSink } from "./events.js";
import type { DeskStore } from "./store.js";

/**
 * Shared plumbing of the desk services: store failures become
 * PersistenceError, refusals become failed results, and events are published
 * once the write has happened.
 */
export class DeskRuntime {
  constructor(
    private readonly store: DeskStore,
    private readonly sink: DeskEventSink,
    private readonly log: Logger
  ) {}

  async call<T>(operation: string, fn: (store: DeskStore) => Promise<T>): Promise<T> {
    try {
      return await fn(this.store);
    } catch (e) {
      this.log.error(`${operation} failed`, e);
      throw new PersistenceError(`${operation} failed`, { cause: e });
    }
  }

  refuse(operation: string, reason: LedgerFailureReason, message: string): LedgerResult<never> {
    this.log.info(`${operation} refused: ${reason} (${message})`);
    return { ok: false, reason, message };
  }

  async publish(event: DeskEvent): Promise<void> {
    try {
      await this.sink.publish(event);
    } catch (e) {
      this.log.error(`publishing ${event.type} failed`, e);
    }
  }
}
