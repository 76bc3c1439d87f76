import type { ClientOrder, ReferralEarning, ReferralPayout, ReferralUser } from "./types.js";

export type LedgerEvent =
  | { type: "order.created"; order: ClientOrder }
  | { type: "order.accepted"; order: ClientOrder; repriced: boolean }
  | { type: "order.rejected"; order: ClientOrder; reason: string | null }
  | { type: "order.paid"; order: ClientOrder; earning: ReferralEarning | null }
  | { type: "order.completed"; order: ClientOrder }
  | { type: "referral.linked"; user: ReferralUser; referrer: ReferralUser }
  | { type: "payout.requested"; payout: ReferralPayout; referrer: ReferralUser }
  | { type: "payout.approved"; payout: ReferralPayout }
  | { type: "payout.rejected"; payout: ReferralPayout; reason: string }
  | { type: "payout.completed"; payout: ReferralPayout; settledEarnings: number };

export type LedgerEventType = LedgerEvent["type"];

/** Receives events after the transaction that produced them has committed. */
export interface LedgerEventSink {
  publish(event: LedgerEvent): Promise<void>;
}

export const noopEventSink: LedgerEventSink = {
  publish: async () => undefined
};
