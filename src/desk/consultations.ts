import type { LedgerResult } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import type { DeskRuntime } from "./runtime.js";
import type { ConsultationRequest, ConsultationStatus } from "./types.js";

const DEFAULT_LIMIT = 50;
const OPEN: readonly ConsultationStatus[] = ["new", "answered"];

/**
 * new → answered → completed. An answered request can be answered again
 * until it is completed.
 */
export class Consultations {
  constructor(
    private readonly runtime: DeskRuntime,
    private readonly log: Logger
  ) {}

  async ask(userId: number, username: string | null, question: string): Promise<ConsultationRequest> {
    const request = await this.runtime.call("askConsultation", (s) => s.consultations.insert(userId, username, question));
    this.log.info(`consultation ${request.id} from ${userId}`);
    await this.runtime.publish({ type: "consultation.created", request });
    return request;
  }

  async get(requestId: number): Promise<ConsultationRequest | null> {
    return this.runtime.call("getConsultation", (s) => s.consultations.find(requestId));
  }

  /** New and answered requests, oldest first. */
  async listOpen(limit = DEFAULT_LIMIT): Promise<ConsultationRequest[]> {
    return this.runtime.call("listConsultations", (s) => s.consultations.list({ statuses: [...OPEN], limit }));
  }

  async answer(requestId: number, answer: string): Promise<LedgerResult<ConsultationRequest>> {
    const answered = await this.runtime.call("answerConsultation", (s) =>
      s.consultations.update(requestId, OPEN, { status: "answered", answer })
    );
    if (!answered) return this.refuseClosed("answerConsultation", requestId);
    this.log.info(`consultation ${requestId} answered`);
    await this.runtime.publish({ type: "consultation.answered", request: answered });
    return { ok: true, value: answered };
  }

  async complete(requestId: number): Promise<LedgerResult<ConsultationRequest>> {
    const completed = await this.runtime.call("completeConsultation", (s) =>
      s.consultations.update(requestId, OPEN, { status: "completed" })
    );
    if (!completed) return this.refuseClosed("completeConsultation", requestId);
    this.log.info(`consultation ${requestId} completed`);
    return { ok: true, value: completed };
  }

  private async refuseClosed(operation: string, requestId: number): Promise<LedgerResult<never>> {
    const current = await this.get(requestId);
    return current
      ? this.runtime.refuse(operation, "INVALID_TRANSITION", `consultation ${requestId} is ${current.status}`)
      : this.runtime.refuse(operation, "NOT_FOUND", `consultation ${requestId} not found`);
  }
}
