import type { OrderType } from "../ledger/types.js";
import type { FormDraft } from "./forms.js";

export type OrderStep = "projectName" | "functionality" | "deadlines" | "budget" | "confirm";

export type OrderDraft = {
  orderType?: OrderType;
  projectName?: string;
  functionality?: string;
  deadlines?: string;
  budget?: string;
};

export type TeamStep = "fullName" | "age" | "experience" | "stack" | "about" | "motivation" | "role";

export type PortfolioStep =
  | "title"
  | "description"
  | "details"
  | "cost"
  | "technologies"
  | "duration"
  | "videoUrl"
  | "botUrl";

export type SessionMode =
  | "IDLE"
  | "ORDER_FORM"
  | "PAYOUT_DETAILS"
  | "PAYOUT_FULL_NAME"
  | "TEAM_FORM"
  | "CONSULTATION_QUESTION"
  | "ADMIN_PRICE"
  | "ADMIN_PRICE_NOTES"
  | "ADMIN_PAYOUT_REJECT"
  | "ADMIN_CONSULTATION_ANSWER"
  | "ADMIN_PORTFOLIO_FORM";

export type UserSession = {
  mode: SessionMode;
  lastActivity: number;
  orderStep?: OrderStep;
  orderDraft?: OrderDraft;
  payoutMethod?: "card" | "sbp";
  cardNumber?: string;
  phoneNumber?: string;
  targetOrderId?: number;
  pendingPrice?: number;
  targetPayoutId?: number;
  teamStep?: TeamStep;
  teamDraft?: FormDraft<TeamStep>;
  targetConsultationId?: number;
  portfolioStep?: PortfolioStep;
  portfolioDraft?: FormDraft<PortfolioStep>;
};

/**
 * Conversational state per chat. Owned by whoever builds the bot and passed
 * to the handlers; idle entries are dropped by `sweep`.
 */
export class SessionStore {
  private readonly sessions = new Map<number, UserSession>();

  constructor(private readonly now: () => number = Date.now) {}

  get(chatId: number): UserSession {
    const s = this.sessions.get(chatId) ?? { mode: "IDLE", lastActivity: this.now() };
    s.lastActivity = this.now();
    this.sessions.set(chatId, s);
    return s;
  }

  reset(chatId: number): UserSession {
    const s: UserSession = { mode: "IDLE", lastActivity: this.now() };
    this.sessions.set(chatId, s);
    return s;
  }

  /** Drops sessions idle for longer than `maxIdleMs`; returns how many. */
  sweep(maxIdleMs: number): number {
    const cutoff = this.now() - maxIdleMs;
    let dropped = 0;
    for (const [chatId, s] of this.sessions) {
      if (s.lastActivity < cutoff) {
        this.sessions.delete(chatId);
        dropped++;
      }
    }
    return dropped;
  }

  get size(): number {
    return this.sessions.size;
  }
}
