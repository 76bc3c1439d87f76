import { LedgerError } from "../core/errors.js";
import type { LedgerResult } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import { COMMISSION_RATE, commissionFor, isValidAmount } from "../core/money.js";
import type { LedgerRuntime } from "./runtime.js";
import type { LedgerTx } from "./store.js";
import type { EarningStatus, ReferralEarning } from "./types.js";

export type AccrualArgs = {
  referredUserId: number;
  orderId: number;
  orderAmount: number;
};

export class EarningLedger {
  constructor(
    private readonly runtime: LedgerRuntime,
    private readonly log: Logger
  ) {}

  /**
   * Accrual for an already paid order whose commission was never booked.
   * Payment confirmation accrues by itself; this path exists for repairs.
   * The referred user and the amount must match the locked order.
   */
  async accrue(args: AccrualArgs): Promise<LedgerResult<ReferralEarning | null>> {
    return this.runtime.execute("accrue", async (tx) => {
      const order = await tx.orders.find(args.orderId, { forUpdate: true });
      if (!order) throw new LedgerError("NOT_FOUND", `order ${args.orderId} not found`);
      if (order.status !== "paid" && order.status !== "completed") {
        throw new LedgerError("INVALID_TRANSITION", `order ${args.orderId} is ${order.status}, not paid`);
      }
      if (order.userId !== args.referredUserId) {
        throw new LedgerError("NOT_FOUND", `order ${args.orderId} was not placed by user ${args.referredUserId}`);
      }
      if (order.finalPrice === null || order.finalPrice !== args.orderAmount) {
        throw new LedgerError(
          "INVALID_AMOUNT",
          `amount ${args.orderAmount} does not match the price ${order.finalPrice ?? "-"} of order ${args.orderId}`
        );
      }
      return this.accrueWithin(tx, { referredUserId: order.userId, orderId: order.id, orderAmount: order.finalPrice });
    });
  }

  /**
   * Inserts the earning and credits the referrer inside the caller's
   * transaction. Returns null when the user has no referrer, and the
   * existing earning when the order was already accrued.
   */
  async accrueWithin(tx: LedgerTx, args: AccrualArgs): Promise<ReferralEarning | null> {
    if (!isValidAmount(args.orderAmount)) {
      throw new LedgerError("INVALID_AMOUNT", `order amount ${args.orderAmount} is not a valid amount`);
    }

    const referred = await tx.users.find(args.referredUserId);
    if (!referred || referred.referredBy === null) return null;

    const referrer = await tx.users.find(referred.referredBy, { forUpdate: true });
    if (!referrer) {
      this.log.warn(`referrer ${referred.referredBy} of user ${referred.userId} is missing, no accrual`);
      return null;
    }

    const earnedAmount = commissionFor(args.orderAmount);
    const earning = await tx.earnings.insert({
      referrerId: referrer.userId,
      referredUserId: referred.userId,
      orderId: args.orderId,
      orderAmount: args.orderAmount,
      commissionRate: COMMISSION_RATE,
      earnedAmount
    });

    if (!earning) {
      const existing = await tx.earnings.findByOrderId(args.orderId);
      if (!existing) throw new Error(`earning for order ${args.orderId} conflicted but is not visible`);
      this.log.warn(`duplicate accrual for order ${args.orderId} ignored, earning ${existing.id} kept`);
      return existing;
    }

    await tx.users.adjustTotals(referrer.userId, { earned: earnedAmount, balance: earnedAmount });
    this.log.info(
      `accrued ${earnedAmount} to ${referrer.userId} for order ${args.orderId} (amount ${args.orderAmount})`
    );
    return earning;
  }

  /** Newest first. */
  async listForReferrer(referrerId: number, status?: EarningStatus, limit = 100): Promise<ReferralEarning[]> {
    return this.runtime.run("listEarnings", (tx) => tx.earnings.list({ referrerId, status, limit }));
  }
}
