import { LedgerError } from "../core/errors.js";
import type { LedgerResult } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import { isValidAmount, roundMoney } from "../core/money.js";
import type { LedgerRuntime } from "./runtime.js";
import type { LedgerTx, PayoutFilter } from "./store.js";
import type { PayoutMethod, PayoutSettlement, ReferralPayout, ReferralUser } from "./types.js";

export type PayoutRequest = {
  /** Defaults to the whole balance at the moment of the request. */
  amount?: number;
  method?: PayoutMethod;
  recipientInfo?: string;
};

export type PayoutCompletion = {
  payout: ReferralPayout;
  settlements: PayoutSettlement[];
};

export function describeRecipient(user: ReferralUser): string | null {
  const name = user.fullName ?? "";
  if (user.payoutMethod === "card" && user.cardNumber) return `Карта: ${user.cardNumber}, ${name}`.trim();
  if (user.payoutMethod === "sbp" && user.phoneNumber) return `СБП: ${user.phoneNumber}, ${name}`.trim();
  return user.fullName;
}

async function lockPayout(tx: LedgerTx, payoutId: number): Promise<ReferralPayout> {
  const payout = await tx.payouts.find(payoutId, { forUpdate: true });
  if (!payout) throw new LedgerError("NOT_FOUND", `payout ${payoutId} not found`);
  return payout;
}

/**
 * Withdrawals are debited from the balance when requested, so overlapping
 * requests can never add up to more than the balance. A rejected payout
 * credits the amount back; a completed one moves it into total_paid.
 *
 *   requested → processing → completed
 *   requested | processing → failed
 *   requested → completed
 */
export class PayoutLedger {
  constructor(
    private readonly runtime: LedgerRuntime,
    private readonly log: Logger
  ) {}

  async request(referrerId: number, req: PayoutRequest = {}): Promise<LedgerResult<ReferralPayout>> {
    return this.runtime.execute("requestPayout", async (tx, emit) => {
      const referrer = await tx.users.find(referrerId, { forUpdate: true });
      if (!referrer) throw new LedgerError("NOT_FOUND", `referral user ${referrerId} not found`);

      const amount = req.amount ?? referrer.balance;
      if (!isValidAmount(amount)) throw new LedgerError("INVALID_AMOUNT", `payout amount ${amount} is not valid`);
      if (amount > referrer.balance) {
        throw new LedgerError("INSUFFICIENT_BALANCE", `payout ${amount} exceeds balance ${referrer.balance}`);
      }

      const payout = await tx.payouts.insert({
        referrerId,
        amount,
        method: req.method ?? referrer.payoutMethod,
        recipientInfo: req.recipientInfo ?? describeRecipient(referrer)
      });
      const debited = await tx.users.adjustTotals(referrerId, { balance: -amount });

      this.log.info(`payout ${payout.id} requested by ${referrerId}: ${amount}, balance now ${debited.balance}`);
      emit({ type: "payout.requested", payout, referrer: debited });
      return payout;
    });
  }

  async approve(payoutId: number): Promise<LedgerResult<ReferralPayout>> {
    return this.runtime.execute("approvePayout", async (tx, emit) => {
      const payout = await lockPayout(tx, payoutId);
      if (payout.status !== "requested") {
        throw new LedgerError("INVALID_TRANSITION", `payout ${payoutId} is ${payout.status}, not requested`);
      }
      const approved = await tx.payouts.update(payoutId, { status: "processing" });
      emit({ type: "payout.approved", payout: approved });
      return approved;
    });
  }

  async reject(payoutId: number, reason: string): Promise<LedgerResult<ReferralPayout>> {
    return this.runtime.execute("rejectPayout", async (tx, emit) => {
      const payout = await lockPayout(tx, payoutId);
      if (payout.status !== "requested" && payout.status !== "processing") {
        throw new LedgerError("INVALID_TRANSITION", `payout ${payoutId} is ${payout.status}, cannot be rejected`);
      }

      const referrer = await tx.users.find(payout.referrerId, { forUpdate: true });
      if (!referrer) throw new LedgerError("NOT_FOUND", `referrer ${payout.referrerId} not found`);

      const failed = await tx.payouts.update(payoutId, { status: "failed", adminNotes: reason });
      const credited = await tx.users.adjustTotals(referrer.userId, { balance: payout.amount });

      this.log.info(`payout ${payoutId} rejected, ${payout.amount} returned, balance now ${credited.balance}`);
      emit({ type: "payout.rejected", payout: failed, reason });
      return failed;
    });
  }

  /**
   * Marks the transfer done. The balance was debited at request time, so only
   * total_paid moves here. Confirmed earnings are settled oldest first.
   */
  async complete(payoutId: number, transactionDetails?: string): Promise<LedgerResult<PayoutCompletion>> {
    return this.runtime.execute("completePayout", async (tx, emit) => {
      const payout = await lockPayout(tx, payoutId);
      if (payout.status !== "requested" && payout.status !== "processing") {
        throw new LedgerError("INVALID_TRANSITION", `payout ${payoutId} is ${payout.status}, cannot be completed`);
      }

      const referrer = await tx.users.find(payout.referrerId, { forUpdate: true });
      if (!referrer) throw new LedgerError("NOT_FOUND", `referrer ${payout.referrerId} not found`);

      const completed = await tx.payouts.update(payoutId, {
        status: "completed",
        ...(transactionDetails !== undefined ? { transactionDetails } : {})
      });
      await tx.users.adjustTotals(referrer.userId, { paid: payout.amount });
      const settlements = await this.settle(tx, completed);

      const settledEarnings = settlements.length;
      emit({ type: "payout.completed", payout: completed, settledEarnings });
      return { payout: completed, settlements };
    });
  }

  async get(payoutId: number): Promise<ReferralPayout | null> {
    return this.runtime.run("getPayout", (tx) => tx.payouts.find(payoutId));
  }

  async list(filter: PayoutFilter): Promise<ReferralPayout[]> {
    return this.runtime.run("listPayouts", (tx) => tx.payouts.list(filter));
  }

  async listOpen(limit = 50): Promise<ReferralPayout[]> {
    return this.list({ statuses: ["requested", "processing"], limit });
  }

  async settlements(payoutId: number): Promise<PayoutSettlement[]> {
    return this.runtime.run("listSettlements", (tx) => tx.payouts.listSettlements(payoutId));
  }

  private async settle(tx: LedgerTx, payout: ReferralPayout): Promise<PayoutSettlement[]> {
    const settlements: PayoutSettlement[] = [];
    let left = payout.amount;

    for (const earning of await tx.earnings.listUnsettled(payout.referrerId)) {
      if (left <= 0) break;
      const open = roundMoney(earning.earnedAmount - earning.settledAmount);
      if (open <= 0) continue;

      const portion = Math.min(open, left);
      const settlement = { payoutId: payout.id, earningId: earning.id, amount: portion };
      await tx.payouts.addSettlement(settlement);
      settlements.push(settlement);
      left = roundMoney(left - portion);

      if (portion === open) await tx.earnings.markPaid(earning.id);
    }

    if (left > 0) {
      this.log.warn(`payout ${payout.id}: ${left} not covered by confirmed earnings of ${payout.referrerId}`);
    }
    return settlements;
  }
}
