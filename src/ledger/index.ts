import { logger } from "../core/logger.js";
import { EarningLedger } from "./earnings.js";
import { noopEventSink } from "./events.js";
import type { LedgerEventSink } from "./events.js";
import { ReferralIdentity } from "./identity.js";
import { OrderLedger } from "./orders.js";
import { PayoutLedger } from "./payouts.js";
import type { CodeGenerator } from "./referralCodes.js";
import { LedgerRuntime } from "./runtime.js";
import type { LedgerStore } from "./store.js";

export type Ledger = {
  identity: ReferralIdentity;
  orders: OrderLedger;
  earnings: EarningLedger;
  payouts: PayoutLedger;
};

export function createLedger(args: {
  store: LedgerStore;
  events?: LedgerEventSink;
  nextReferralCode?: CodeGenerator;
}): Ledger {
  const log = logger.child("ledger");
  const runtime = new LedgerRuntime(args.store, args.events ?? noopEventSink, log);
  const earnings = new EarningLedger(runtime, log.child("earnings"));
  return {
    identity: new ReferralIdentity(runtime, log.child("identity"), args.nextReferralCode),
    orders: new OrderLedger(runtime, earnings, log.child("orders")),
    earnings,
    payouts: new PayoutLedger(runtime, log.child("payouts"))
  };
}

export * from "./types.js";
export * from "./events.js";
export type { LedgerStore, LedgerTx } from "./store.js";
export type { PayoutRequest, PayoutCompletion } from "./payouts.js";
export type { PaymentConfirmation, OrderDetailsPatch } from "./orders.js";
