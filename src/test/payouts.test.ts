import { describe, it, expect } from "vitest";
import { describeRecipient } from "../ledger/payouts.js";
import type { ReferralUser } from "../ledger/types.js";
import { CLIENT, REFERRER, expectConserved, paidOrder, referredClient, setup, unwrap } from "./helpers.js";

async function referrerWithBalance(...prices: number[]) {
  const env = setup();
  await referredClient(env.ledger);
  for (const price of prices) await paidOrder(env.ledger, CLIENT, price);
  return env;
}

describe("PayoutLedger.request", () => {
  it("withdraws the whole balance by default and debits it at once", async () => {
    const { ledger, store, events } = await referrerWithBalance(40000);
    unwrap(
      await ledger.identity.updatePayoutProfile(REFERRER, {
        payoutMethod: "card",
        cardNumber: "1234 **** **** 3456",
        phoneNumber: null,
        fullName: "Ivanov Ivan"
      })
    );

    const payout = unwrap(await ledger.payouts.request(REFERRER));

    expect(payout).toMatchObject({
      status: "requested",
      amount: 10000,
      method: "card",
      recipientInfo: "Карта: 1234 **** **** 3456, Ivanov Ivan"
    });
    expect(store.user(REFERRER)).toMatchObject({ balance: 0, totalPaid: 0, totalEarned: 10000 });
    expect(events.at(-1)).toMatchObject({ type: "payout.requested", referrer: { balance: 0 } });
    expectConserved(store, REFERRER);
  });

  it("refuses amounts that are not positive", async () => {
    const { ledger, store } = await referrerWithBalance(40000);

    expect(await ledger.payouts.request(REFERRER, { amount: 0 })).toMatchObject({ ok: false, reason: "INVALID_AMOUNT" });
    expect(await ledger.payouts.request(REFERRER, { amount: -5 })).toMatchObject({ ok: false, reason: "INVALID_AMOUNT" });
    expect(store.user(REFERRER)?.balance).toBe(10000);
  });

  it("refuses a default request on an empty balance", async () => {
    const { ledger } = setup();
    await ledger.identity.register(REFERRER, "partner");

    expect(await ledger.payouts.request(REFERRER)).toMatchObject({ ok: false, reason: "INVALID_AMOUNT" });
  });

  it("refuses unknown referrers", async () => {
    const { ledger } = setup();
    expect(await ledger.payouts.request(REFERRER, { amount: 100 })).toMatchObject({ ok: false, reason: "NOT_FOUND" });
  });

  it("keeps overlapping requests within the balance", async () => {
    const { ledger, store } = await referrerWithBalance(40000);

    unwrap(await ledger.payouts.request(REFERRER, { amount: 6000 }));
    const second = await ledger.payouts.request(REFERRER, { amount: 6000 });

    expect(second).toMatchObject({ ok: false, reason: "INSUFFICIENT_BALANCE" });
    expect(store.user(REFERRER)?.balance).toBe(4000);
    expectConserved(store, REFERRER);
  });
});

describe("PayoutLedger transitions", () => {
  it("returns a rejected amount to the balance exactly", async () => {
    const { ledger, store, events } = await referrerWithBalance(40000);
    const payout = unwrap(await ledger.payouts.request(REFERRER, { amount: 1000 }));
    expect(store.user(REFERRER)?.balance).toBe(9000);

    const failed = unwrap(await ledger.payouts.reject(payout.id, "Card is blocked"));

    expect(failed).toMatchObject({ status: "failed", adminNotes: "Card is blocked" });
    expect(store.user(REFERRER)).toMatchObject({ balance: 10000, totalPaid: 0 });
    expect(events.at(-1)).toMatchObject({ type: "payout.rejected", reason: "Card is blocked" });
    expect(await ledger.payouts.reject(payout.id, "again")).toMatchObject({ ok: false, reason: "INVALID_TRANSITION" });
    expect(store.user(REFERRER)?.balance).toBe(10000);
    expectConserved(store, REFERRER);
  });

  it("approves requested payouts only", async () => {
    const { ledger } = await referrerWithBalance(40000);
    const payout = unwrap(await ledger.payouts.request(REFERRER, { amount: 1000 }));

    const processing = unwrap(await ledger.payouts.approve(payout.id));

    expect(processing.status).toBe("processing");
    expect(processing.processedAt).toBeInstanceOf(Date);
    expect(await ledger.payouts.approve(payout.id)).toMatchObject({ ok: false, reason: "INVALID_TRANSITION" });
    expect(await ledger.payouts.approve(99)).toMatchObject({ ok: false, reason: "NOT_FOUND" });
  });

  it("completes a processing payout without debiting twice", async () => {
    const { ledger, store } = await referrerWithBalance(40000);
    const payout = unwrap(await ledger.payouts.request(REFERRER, { amount: 4000 }));
    unwrap(await ledger.payouts.approve(payout.id));

    const { payout: completed } = unwrap(await ledger.payouts.complete(payout.id, "transfer 42"));

    expect(completed).toMatchObject({ status: "completed", transactionDetails: "transfer 42" });
    expect(store.user(REFERRER)).toMatchObject({ balance: 6000, totalPaid: 4000, totalEarned: 10000 });
    expectConserved(store, REFERRER);
  });

  it("refuses to touch a completed payout", async () => {
    const { ledger, store } = await referrerWithBalance(40000);
    const payout = unwrap(await ledger.payouts.request(REFERRER, { amount: 4000 }));
    unwrap(await ledger.payouts.complete(payout.id));

    expect(await ledger.payouts.complete(payout.id)).toMatchObject({ ok: false, reason: "INVALID_TRANSITION" });
    expect(await ledger.payouts.reject(payout.id, "late")).toMatchObject({ ok: false, reason: "INVALID_TRANSITION" });
    expect(store.user(REFERRER)).toMatchObject({ balance: 6000, totalPaid: 4000 });
  });

  it("lists open payouts oldest first", async () => {
    const { ledger } = await referrerWithBalance(40000);
    const first = unwrap(await ledger.payouts.request(REFERRER, { amount: 1000 }));
    const second = unwrap(await ledger.payouts.request(REFERRER, { amount: 2000 }));
    const third = unwrap(await ledger.payouts.request(REFERRER, { amount: 3000 }));
    unwrap(await ledger.payouts.approve(second.id));
    unwrap(await ledger.payouts.complete(third.id));

    expect((await ledger.payouts.listOpen()).map((p) => p.id)).toEqual([first.id, second.id]);
    expect((await ledger.payouts.list({ referrerId: REFERRER, limit: 10 })).map((p) => p.id)).toEqual([
      first.id,
      second.id,
      third.id
    ]);
    expect((await ledger.payouts.get(third.id))?.status).toBe("completed");
  });
});

describe("PayoutLedger settlement", () => {
  it("settles earnings oldest first and marks fully settled ones paid", async () => {
    const { ledger, store } = await referrerWithBalance(40000, 10000);
    const payout = unwrap(await ledger.payouts.request(REFERRER));

    const { settlements } = unwrap(await ledger.payouts.complete(payout.id));

    expect(settlements).toEqual([
      { payoutId: payout.id, earningId: 1, amount: 10000 },
      { payoutId: payout.id, earningId: 2, amount: 2500 }
    ]);
    expect(store.earningRows().map((e) => e.status)).toEqual(["paid", "paid"]);
    expect(await ledger.payouts.settlements(payout.id)).toEqual(settlements);
  });

  it("carries a partly settled earning over to the next payout", async () => {
    const { ledger, store, events } = await referrerWithBalance(40000);
    const first = unwrap(await ledger.payouts.request(REFERRER, { amount: 4000 }));
    unwrap(await ledger.payouts.complete(first.id));
    expect(store.earningRows()[0].status).toBe("confirmed");

    const second = unwrap(await ledger.payouts.request(REFERRER, { amount: 6000 }));
    const { settlements } = unwrap(await ledger.payouts.complete(second.id));

    expect(settlements).toEqual([{ payoutId: second.id, earningId: 1, amount: 6000 }]);
    expect(store.earningRows()[0].status).toBe("paid");
    expect(store.earningRows()[0].paidAt).toBeInstanceOf(Date);
    expect(events.at(-1)).toMatchObject({ type: "payout.completed", settledEarnings: 1 });
    expect(store.user(REFERRER)).toMatchObject({ balance: 0, totalPaid: 10000, totalEarned: 10000 });
  });
});

describe("describeRecipient", () => {
  const base: ReferralUser = {
    userId: REFERRER,
    username: "partner",
    referralCode: "ABCDEFGH",
    referredBy: null,
    payoutMethod: "card",
    cardNumber: null,
    phoneNumber: null,
    fullName: null,
    totalReferrals: 0,
    totalEarned: 0,
    totalPaid: 0,
    balance: 0,
    createdAt: new Date(0),
    updatedAt: null
  };

  it("describes card and SBP recipients", () => {
    expect(describeRecipient({ ...base, cardNumber: "1234 **** **** 3456", fullName: "Ivanov Ivan" })).toBe(
      "Карта: 1234 **** **** 3456, Ivanov Ivan"
    );
    expect(
      describeRecipient({ ...base, payoutMethod: "sbp", phoneNumber: "+79123456789", fullName: "Ivanov Ivan" })
    ).toBe("СБП: +79123456789, Ivanov Ivan");
  });

  it("falls back to the name", () => {
    expect(describeRecipient({ ...base, payoutMethod: "manual", fullName: "Ivanov Ivan" })).toBe("Ivanov Ivan");
    expect(describeRecipient(base)).toBeNull();
  });
});
