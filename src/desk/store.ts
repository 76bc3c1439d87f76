import type {
  ConsultationRequest,
  ConsultationStatus,
  PortfolioFields,
  PortfolioProject,
  TeamApplication,
  TeamApplicationFields,
  TeamApplicationStatus
} from "./types.js";

export type TeamApplicationFilter = { status?: TeamApplicationStatus; limit: number };
export type ConsultationFilter = { statuses?: ConsultationStatus[]; limit: number };

export type ConsultationPatch = { status: ConsultationStatus; answer?: string };

export interface TeamApplicationsRepository {
  insert(userId: number, fields: TeamApplicationFields): Promise<TeamApplication>;
  find(applicationId: number): Promise<TeamApplication | null>;
  list(filter: TeamApplicationFilter): Promise<TeamApplication[]>;
  /** Sets `status` only while the row is in one of `from`; null otherwise. */
  transition(
    applicationId: number,
    from: readonly TeamApplicationStatus[],
    status: TeamApplicationStatus
  ): Promise<TeamApplication | null>;
  remove(applicationId: number): Promise<boolean>;
}

export interface ConsultationsRepository {
  insert(userId: number, username: string | null, question: string): Promise<ConsultationRequest>;
  find(requestId: number): Promise<ConsultationRequest | null>;
  list(filter: ConsultationFilter): Promise<ConsultationRequest[]>;
  /** Applies the patch only while the row is in one of `from`; null otherwise. */
  update(
    requestId: number,
    from: readonly ConsultationStatus[],
    patch: ConsultationPatch
  ): Promise<ConsultationRequest | null>;
}

export interface PortfolioRepository {
  insert(fields: PortfolioFields): Promise<PortfolioProject>;
  find(projectId: number): Promise<PortfolioProject | null>;
  /** Oldest first. */
  list(limit: number): Promise<PortfolioProject[]>;
  remove(projectId: number): Promise<boolean>;
}

/**
 * Storage of the requests that never touch money. Every call is a single
 * statement, so there is no transaction boundary here.
 */
export interface DeskStore {
  teamApplications: TeamApplicationsRepository;
  consultations: ConsultationsRepository;
  portfolio: PortfolioRepository;
}
