import type { ConsultationRequest, TeamApplication } from "./types.js";

export type DeskEvent =
  | { type: "team.applied"; application: TeamApplication }
  | { type: "team.decided"; application: TeamApplication }
  | { type: "consultation.created"; request: ConsultationRequest }
  | { type: "consultation.answered"; request: ConsultationRequest };

export interface DeskEventSink {
  publish(event: DeskEvent): Promise<void>;
}

export const noopDeskSink: DeskEventSink = {
  publish: async () => undefined
};
