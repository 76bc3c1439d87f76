import type { LedgerResult } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import type { DeskRuntime } from "./runtime.js";
import type { PortfolioFields, PortfolioProject } from "./types.js";

const DEFAULT_LIMIT = 50;

export class Portfolio {
  constructor(
    private readonly runtime: DeskRuntime,
    private readonly log: Logger
  ) {}

  async add(fields: PortfolioFields): Promise<PortfolioProject> {
    const project = await this.runtime.call("addPortfolioProject", (s) => s.portfolio.insert(fields));
    this.log.info(`portfolio project ${project.id} added: ${project.title}`);
    return project;
  }

  async get(projectId: number): Promise<PortfolioProject | null> {
    return this.runtime.call("getPortfolioProject", (s) => s.portfolio.find(projectId));
  }

  async list(limit = DEFAULT_LIMIT): Promise<PortfolioProject[]> {
    return this.runtime.call("listPortfolio", (s) => s.portfolio.list(limit));
  }

  async delete(projectId: number): Promise<LedgerResult<number>> {
    const removed = await this.runtime.call("deletePortfolioProject", (s) => s.portfolio.remove(projectId));
    if (!removed) {
      return this.runtime.refuse("deletePortfolioProject", "NOT_FOUND", `portfolio project ${projectId} not found`);
    }
    this.log.info(`portfolio project ${projectId} deleted`);
    return { ok: true, value: projectId };
  }
}
