import type { Pool, PoolClient } from "pg";
import type { LedgerStore, LedgerTx } from "../ledger/store.js";
import * as earningsRepo from "./repos/earningsRepo.js";
import * as ordersRepo from "./repos/ordersRepo.js";
import * as payoutsRepo from "./repos/payoutsRepo.js";
import * as referralUsersRepo from "./repos/referralUsersRepo.js";
import { withTransaction } from "./tx.js";

function bindTx(db: PoolClient): LedgerTx {
  return {
    users: {
      find: (userId, opts) => referralUsersRepo.findReferralUser(db, userId, opts),
      findByCode: (code) => referralUsersRepo.findReferralUserByCode(db, code),
      insert: (args) => referralUsersRepo.insertReferralUser(db, args),
      setReferredBy: (userId, referrerId) => referralUsersRepo.setReferredBy(db, userId, referrerId),
      countReferrals: (referrerId) => referralUsersRepo.countReferrals(db, referrerId),
      setTotalReferrals: (userId, total) => referralUsersRepo.setTotalReferrals(db, userId, total),
      updatePayoutProfile: (userId, profile) => referralUsersRepo.updatePayoutProfile(db, userId, profile),
      adjustTotals: (userId, delta) => referralUsersRepo.adjustTotals(db, userId, delta)
    },
    orders: {
      insert: (userId, fields) => ordersRepo.createOrder(db, userId, fields),
      find: (orderId, opts) => ordersRepo.getOrderById(db, orderId, opts),
      update: (orderId, patch) => ordersRepo.updateOrder(db, orderId, patch),
      remove: (orderId) => ordersRepo.deleteOrder(db, orderId),
      list: (filter) => ordersRepo.listOrders(db, filter)
    },
    earnings: {
      insert: (args) => earningsRepo.insertEarning(db, args),
      findByOrderId: (orderId) => earningsRepo.getEarningByOrderId(db, orderId),
      list: (filter) => earningsRepo.listEarnings(db, filter),
      listUnsettled: (referrerId) => earningsRepo.listUnsettledEarnings(db, referrerId),
      markPaid: (earningId) => earningsRepo.markEarningPaid(db, earningId)
    },
    payouts: {
      insert: (args) => payoutsRepo.createPayout(db, args),
      find: (payoutId, opts) => payoutsRepo.getPayoutById(db, payoutId, opts),
      update: (payoutId, patch) => payoutsRepo.updatePayout(db, payoutId, patch),
      list: (filter) => payoutsRepo.listPayouts(db, filter),
      addSettlement: (s) => payoutsRepo.addSettlement(db, s),
      listSettlements: (payoutId) => payoutsRepo.listSettlements(db, payoutId)
    }
  };
}

export class PgLedgerStore implements LedgerStore {
  constructor(private readonly pool: Pool) {}

  transaction<T>(fn: (tx: LedgerTx) => Promise<T>): Promise<T> {
    return withTransaction<PoolClient, T>(this.pool, (client) => fn(bindTx(client)));
  }
}
