import { expect } from "vitest";
import type { LedgerResult } from "../core/errors.js";
import { roundMoney } from "../core/money.js";
import { createLedger } from "../ledger/index.js";
import type { Ledger, LedgerEvent, OrderFields } from "../ledger/index.js";
import { REFERRAL_CODE_ALPHABET, generateReferralCode } from "../ledger/referralCodes.js";
import { MemoryLedgerStore } from "./memoryLedgerStore.js";

export const REFERRER = 100;
export const CLIENT = 200;

/**
 * Codes come out as ABCDEFGH, JKMNPQRS, TUVWXYZ2, ... so that tests can
 * refer to them by value.
 */
export function sequentialCodes(): () => string {
  let i = 0;
  return () => generateReferralCode(() => i++ % REFERRAL_CODE_ALPHABET.length);
}

export function setup(nextReferralCode: () => string = sequentialCodes()) {
  const store = new MemoryLedgerStore();
  const events: LedgerEvent[] = [];
  const ledger = createLedger({
    store,
    events: {
      publish: async (event) => {
        events.push(event);
      }
    },
    nextReferralCode
  });
  return { store, ledger, events };
}

export function unwrap<T>(result: LedgerResult<T>): T {
  if (!result.ok) throw new Error(`expected success, got ${result.reason}: ${result.message}`);
  return result.value;
}

export function orderFields(overrides: Partial<OrderFields> = {}): OrderFields {
  return {
    username: "client",
    orderType: "bot",
    projectName: "Flower shop bot",
    functionality: "Catalogue, cart and delivery booking",
    deadlines: "2 weeks",
    budget: "50000",
    ...overrides
  };
}

/** REFERRER registered, CLIENT linked to REFERRER through the code ABCDEFGH. */
export async function referredClient(ledger: Ledger) {
  const referrer = await ledger.identity.register(REFERRER, "partner");
  const client = unwrap(await ledger.identity.linkReferral(CLIENT, referrer.referralCode, "client"));
  return { referrer, client };
}

/** Creates, prices and pays an order of `userId`. */
export async function paidOrder(ledger: Ledger, userId: number, price: number) {
  const order = await ledger.orders.createOrder(userId, orderFields());
  unwrap(await ledger.orders.setFinalPrice(order.id, price));
  return unwrap(await ledger.orders.confirmPayment(order.id));
}

/** balance + total_paid + in-flight payouts == total_earned */
export function expectConserved(store: MemoryLedgerStore, userId: number) {
  const user = store.user(userId);
  expect(user).not.toBeNull();
  if (!user) return;
  const accounted = roundMoney(user.balance + user.totalPaid + store.inFlightPayouts(userId));
  expect(accounted).toBe(user.totalEarned);
  expect(user.balance).toBeGreaterThanOrEqual(0);
}
