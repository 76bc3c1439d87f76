import { LedgerError } from "../core/errors.js";
import type { LedgerResult } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import { isValidAmount } from "../core/money.js";
import type { EarningLedger } from "./earnings.js";
import type { LedgerRuntime } from "./runtime.js";
import type { ClientOrderPatch, LedgerTx, OrderFilter } from "./store.js";
import type { ClientOrder, OrderFields, ReferralEarning } from "./types.js";

export type OrderDetailsPatch = Pick<ClientOrderPatch, "projectName" | "functionality" | "deadlines" | "budget">;

export type PaymentConfirmation = {
  order: ClientOrder;
  earning: ReferralEarning | null;
};

async function lockOrder(tx: LedgerTx, orderId: number): Promise<ClientOrder> {
  const order = await tx.orders.find(orderId, { forUpdate: true });
  if (!order) throw new LedgerError("NOT_FOUND", `order ${orderId} not found`);
  return order;
}

/**
 * Order lifecycle:
 *   new → accepted → paid → completed
 *   new → rejected
 * Only accepted → paid accrues a commission.
 */
export class OrderLedger {
  constructor(
    private readonly runtime: LedgerRuntime,
    private readonly earnings: EarningLedger,
    private readonly log: Logger
  ) {}

  async createOrder(userId: number, fields: OrderFields): Promise<ClientOrder> {
    const result = await this.runtime.execute("createOrder", async (tx, emit) => {
      const order = await tx.orders.insert(userId, fields);
      this.log.info(`order ${order.id} created by ${userId}`);
      emit({ type: "order.created", order });
      return order;
    });
    if (!result.ok) throw new Error(`createOrder refused: ${result.message}`);
    return result.value;
  }

  /** Allowed while new or accepted; re-pricing keeps the order accepted and accrues nothing. */
  async setFinalPrice(orderId: number, price: number, notes?: string): Promise<LedgerResult<ClientOrder>> {
    return this.runtime.execute("setFinalPrice", async (tx, emit) => {
      if (!isValidAmount(price)) throw new LedgerError("INVALID_AMOUNT", `price ${price} is not a valid amount`);

      const order = await lockOrder(tx, orderId);
      if (order.status !== "new" && order.status !== "accepted") {
        throw new LedgerError("INVALID_TRANSITION", `order ${orderId} is ${order.status}, cannot be priced`);
      }

      const patch: ClientOrderPatch = { finalPrice: price, status: "accepted" };
      if (notes !== undefined) patch.adminNotes = notes;
      const updated = await tx.orders.update(orderId, patch);

      emit({ type: "order.accepted", order: updated, repriced: order.status === "accepted" });
      return updated;
    });
  }

  /**
   * accepted → paid, accruing the referrer's commission in the same
   * transaction. A paid order refuses a second confirmation.
   */
  async confirmPayment(orderId: number): Promise<LedgerResult<PaymentConfirmation>> {
    return this.runtime.execute("confirmPayment", async (tx, emit) => {
      const order = await lockOrder(tx, orderId);
      if (order.status !== "accepted") {
        throw new LedgerError("INVALID_TRANSITION", `order ${orderId} is ${order.status}, not accepted`);
      }
      if (order.finalPrice === null) {
        throw new LedgerError("INVALID_TRANSITION", `order ${orderId} has no final price`);
      }

      const paid = await tx.orders.update(orderId, { status: "paid" });
      const earning = await this.earnings.accrueWithin(tx, {
        referredUserId: paid.userId,
        orderId: paid.id,
        orderAmount: order.finalPrice
      });

      this.log.info(`order ${orderId} paid (${order.finalPrice}), earning=${earning?.id ?? "none"}`);
      emit({ type: "order.paid", order: paid, earning });
      return { order: paid, earning };
    });
  }

  async reject(orderId: number, reason: string | null = null): Promise<LedgerResult<ClientOrder>> {
    return this.runtime.execute("rejectOrder", async (tx, emit) => {
      const order = await lockOrder(tx, orderId);
      if (order.status !== "new") {
        throw new LedgerError("INVALID_TRANSITION", `order ${orderId} is ${order.status}, only new orders are rejected`);
      }
      const patch: ClientOrderPatch = { status: "rejected" };
      if (reason !== null) patch.adminNotes = reason;
      const rejected = await tx.orders.update(orderId, patch);
      emit({ type: "order.rejected", order: rejected, reason });
      return rejected;
    });
  }

  async markCompleted(orderId: number): Promise<LedgerResult<ClientOrder>> {
    return this.runtime.execute("completeOrder", async (tx, emit) => {
      const order = await lockOrder(tx, orderId);
      if (order.status !== "paid") {
        throw new LedgerError("INVALID_TRANSITION", `order ${orderId} is ${order.status}, not paid`);
      }
      const completed = await tx.orders.update(orderId, { status: "completed" });
      emit({ type: "order.completed", order: completed });
      return completed;
    });
  }

  /** Paid and completed orders carry money history and are never deleted. */
  async delete(orderId: number): Promise<LedgerResult<ClientOrder>> {
    return this.runtime.execute("deleteOrder", async (tx) => {
      const order = await lockOrder(tx, orderId);
      if (order.status === "paid" || order.status === "completed") {
        throw new LedgerError("INVALID_TRANSITION", `order ${orderId} is ${order.status}, cannot be deleted`);
      }
      await tx.orders.remove(orderId);
      this.log.info(`order ${orderId} deleted (was ${order.status})`);
      return order;
    });
  }

  async updateDetails(orderId: number, patch: OrderDetailsPatch): Promise<LedgerResult<ClientOrder>> {
    return this.runtime.execute("updateOrderDetails", async (tx) => {
      const order = await lockOrder(tx, orderId);
      if (order.status !== "new" && order.status !== "accepted") {
        throw new LedgerError("INVALID_TRANSITION", `order ${orderId} is ${order.status}, details are frozen`);
      }
      // Copy field by field so nothing outside the allow-list reaches the store.
      const allowed: ClientOrderPatch = {};
      if (patch.projectName !== undefined) allowed.projectName = patch.projectName;
      if (patch.functionality !== undefined) allowed.functionality = patch.functionality;
      if (patch.deadlines !== undefined) allowed.deadlines = patch.deadlines;
      if (patch.budget !== undefined) allowed.budget = patch.budget;
      return tx.orders.update(orderId, allowed);
    });
  }

  async get(orderId: number): Promise<ClientOrder | null> {
    return this.runtime.run("getOrder", (tx) => tx.orders.find(orderId));
  }

  async list(filter: OrderFilter): Promise<ClientOrder[]> {
    return this.runtime.run("listOrders", (tx) => tx.orders.list(filter));
  }
}
