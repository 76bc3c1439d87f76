import type { LedgerResult } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import type { DeskRuntime } from "./runtime.js";
import type { TeamApplication, TeamApplicationFields, TeamApplicationStatus } from "./types.js";

const DEFAULT_LIMIT = 50;

/** new → accepted | rejected. A decided application can only be deleted. */
export class TeamApplications {
  constructor(
    private readonly runtime: DeskRuntime,
    private readonly log: Logger
  ) {}

  async submit(userId: number, fields: TeamApplicationFields): Promise<TeamApplication> {
    const application = await this.runtime.call("submitTeamApplication", (s) =>
      s.teamApplications.insert(userId, fields)
    );
    this.log.info(`team application ${application.id} from ${userId} (${application.role})`);
    await this.runtime.publish({ type: "team.applied", application });
    return application;
  }

  async get(applicationId: number): Promise<TeamApplication | null> {
    return this.runtime.call("getTeamApplication", (s) => s.teamApplications.find(applicationId));
  }

  async list(status?: TeamApplicationStatus, limit = DEFAULT_LIMIT): Promise<TeamApplication[]> {
    return this.runtime.call("listTeamApplications", (s) => s.teamApplications.list({ status, limit }));
  }

  async accept(applicationId: number): Promise<LedgerResult<TeamApplication>> {
    return this.decide(applicationId, "accepted");
  }

  async reject(applicationId: number): Promise<LedgerResult<TeamApplication>> {
    return this.decide(applicationId, "rejected");
  }

  async delete(applicationId: number): Promise<LedgerResult<number>> {
    const removed = await this.runtime.call("deleteTeamApplication", (s) => s.teamApplications.remove(applicationId));
    if (!removed) {
      return this.runtime.refuse("deleteTeamApplication", "NOT_FOUND", `team application ${applicationId} not found`);
    }
    this.log.info(`team application ${applicationId} deleted`);
    return { ok: true, value: applicationId };
  }

  private async decide(applicationId: number, status: TeamApplicationStatus): Promise<LedgerResult<TeamApplication>> {
    const operation = status === "accepted" ? "acceptTeamApplication" : "rejectTeamApplication";
    const decided = await this.runtime.call(operation, (s) =>
      s.teamApplications.transition(applicationId, ["new"], status)
    );
    if (!decided) {
      const current = await this.get(applicationId);
      return current
        ? this.runtime.refuse(operation, "INVALID_TRANSITION", `team application ${applicationId} is ${current.status}`)
        : this.runtime.refuse(operation, "NOT_FOUND", `team application ${applicationId} not found`);
    }
    this.log.info(`team application ${applicationId} ${status}`);
    await this.runtime.publish({ type: "team.decided", application: decided });
    return { ok: true, value: decided };
  }
}
