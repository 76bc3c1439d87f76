import { logger } from "../core/logger.js";
import { Consultations } from "./consultations.js";
import { noopDeskSink } from "./events.js";
import type { DeskEventSink } from "./events.js";
import { Portfolio } from "./portfolio.js";
import { DeskRuntime } from "./runtime.js";
import type { DeskStore } from "./store.js";
import { TeamApplications } from "./teamApplications.js";

/** Team applications, consultations and the portfolio: the requests that carry no money. */
export type Desk = {
  team: TeamApplications;
  consultations: Consultations;
  portfolio: Portfolio;
};

export function createDesk(args: { store: DeskStore; events?: DeskEventSink }): Desk {
  const log = logger.child("desk");
  const runtime = new DeskRuntime(args.store, args.events ?? noopDeskSink, log);
  return {
    team: new TeamApplications(runtime, log.child("team")),
    consultations: new Consultations(runtime, log.child("consultations")),
    portfolio: new Portfolio(runtime, log.child("portfolio"))
  };
}

export * from "./types.js";
export * from "./events.js";
export type { DeskStore } from "./store.js";
