import type { Pool } from "pg";
import type { DeskStore } from "../desk/store.js";
import * as consultationsRepo from "./repos/consultationsRepo.js";
import * as portfolioRepo from "./repos/portfolioRepo.js";
import * as teamApplicationsRepo from "./repos/teamApplicationsRepo.js";

/** Desk tables over the pool; each call is its own statement. */
export class PgDeskStore implements DeskStore {
  readonly teamApplications: DeskStore["teamApplications"];
  readonly consultations: DeskStore["consultations"];
  readonly portfolio: DeskStore["portfolio"];

  constructor(pool: Pool) {
    this.teamApplications = {
      insert: (userId, fields) => teamApplicationsRepo.insertTeamApplication(pool, userId, fields),
      find: (id) => teamApplicationsRepo.getTeamApplication(pool, id),
      list: (filter) => teamApplicationsRepo.listTeamApplications(pool, filter),
      transition: (id, from, status) => teamApplicationsRepo.transitionTeamApplication(pool, id, from, status),
      remove: (id) => teamApplicationsRepo.deleteTeamApplication(pool, id)
    };
    this.consultations = {
      insert: (userId, username, question) =>
        consultationsRepo.insertConsultationRequest(pool, userId, username, question),
      find: (id) => consultationsRepo.getConsultationRequest(pool, id),
      list: (filter) => consultationsRepo.listConsultationRequests(pool, filter),
      update: (id, from, patch) => consultationsRepo.updateConsultationRequest(pool, id, from, patch)
    };
    this.portfolio = {
      insert: (fields) => portfolioRepo.insertPortfolioProject(pool, fields),
      find: (id) => portfolioRepo.getPortfolioProject(pool, id),
      list: (limit) => portfolioRepo.listPortfolioProjects(pool, limit),
      remove: (id) => portfolioRepo.deletePortfolioProject(pool, id)
    };
  }
}
