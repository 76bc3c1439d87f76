import { describe, it, expect } from "vitest";
import { CLIENT, REFERRER, expectConserved, paidOrder, referredClient, setup, unwrap } from "./helpers.js";

describe("referral money flow", () => {
  it("credits 25% of a 40000 order to the referrer", async () => {
    const { ledger, store } = setup();
    await referredClient(ledger);

    const { earning } = await paidOrder(ledger, CLIENT, 40000);

    expect(earning?.earnedAmount).toBe(10000);
    expect(store.user(REFERRER)?.balance).toBe(10000);
    expectConserved(store, REFERRER);
  });

  it("moves a completed 5000 payout from balance to total paid", async () => {
    const { ledger, store } = setup();
    await referredClient(ledger);
    await paidOrder(ledger, CLIENT, 40000);

    const payout = unwrap(await ledger.payouts.request(REFERRER, { amount: 5000 }));
    expect(payout.status).toBe("requested");
    expect(store.user(REFERRER)?.balance).toBe(5000);
    expectConserved(store, REFERRER);

    unwrap(await ledger.payouts.complete(payout.id));
    expect(store.user(REFERRER)).toMatchObject({ totalPaid: 5000, balance: 5000 });
    expectConserved(store, REFERRER);
  });

  it("refuses a 20000 payout against a 10000 balance", async () => {
    const { ledger, store } = setup();
    await referredClient(ledger);
    await paidOrder(ledger, CLIENT, 40000);

    const result = await ledger.payouts.request(REFERRER, { amount: 20000 });

    expect(result).toMatchObject({ ok: false, reason: "INSUFFICIENT_BALANCE" });
    expect(store.user(REFERRER)).toMatchObject({ balance: 10000, totalPaid: 0 });
    expect(await ledger.payouts.list({ limit: 10 })).toEqual([]);
  });

  it("conserves money across a mixed sequence", async () => {
    const { ledger, store } = setup();
    await referredClient(ledger);

    await paidOrder(ledger, CLIENT, 40000);
    expectConserved(store, REFERRER);
    const a = unwrap(await ledger.payouts.request(REFERRER, { amount: 3000.5 }));
    expectConserved(store, REFERRER);
    await paidOrder(ledger, CLIENT, 1234.56);
    expectConserved(store, REFERRER);
    const b = unwrap(await ledger.payouts.request(REFERRER, { amount: 2000 }));
    unwrap(await ledger.payouts.approve(b.id));
    expectConserved(store, REFERRER);
    unwrap(await ledger.payouts.reject(a.id, "wrong card"));
    expectConserved(store, REFERRER);
    unwrap(await ledger.payouts.complete(b.id));
    expectConserved(store, REFERRER);

    expect(store.user(REFERRER)).toMatchObject({ totalEarned: 10308.64, totalPaid: 2000, balance: 8308.64 });
  });
});
