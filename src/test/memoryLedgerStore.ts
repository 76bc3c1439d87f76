import { roundMoney } from "../core/money.js";
import type { LedgerStore, LedgerTx, LockOptions } from "../ledger/store.js";
import type {
  ClientOrder,
  PayoutSettlement,
  ReferralEarning,
  ReferralPayout,
  ReferralUser
} from "../ledger/types.js";

type Tables = {
  users: Map<number, ReferralUser>;
  orders: Map<number, ClientOrder>;
  earnings: Map<number, ReferralEarning>;
  payouts: Map<number, ReferralPayout>;
  settlements: PayoutSettlement[];
  seq: { order: number; earning: number; payout: number };
};

function emptyTables(): Tables {
  return {
    users: new Map(),
    orders: new Map(),
    earnings: new Map(),
    payouts: new Map(),
    settlements: [],
    seq: { order: 0, earning: 0, payout: 0 }
  };
}

function byIdAsc<T extends { id: number }>(a: T, b: T): number {
  return a.id - b.id;
}

/** Rows leave the store as copies, like rows read back from the database. */
function copy<T>(row: T): T {
  return structuredClone(row);
}

function copyOrNull<T>(row: T | undefined): T | null {
  return row === undefined ? null : structuredClone(row);
}

function mustGet<K, V>(map: Map<K, V>, key: K, what: string): V {
  const v = map.get(key);
  if (v === undefined) throw new Error(`${what} ${String(key)} not found`);
  return v;
}

/**
 * In-process stand-in for the Postgres store. Transactions run one at a time
 * (the strongest form of row locking) and roll back to a snapshot on throw.
 * The constraints the ledger relies on are enforced the way the schema does:
 * unique user ids, codes and earning order ids, and a non-negative balance.
 */
export class MemoryLedgerStore implements LedgerStore {
  private state: Tables = emptyTables();
  private queue: Promise<unknown> = Promise.resolve();
  private clock = Date.UTC(2024, 0, 1);
  /** Rows read FOR UPDATE, in order, as `table:id`. */
  readonly locks: string[] = [];

  async transaction<T>(fn: (tx: LedgerTx) => Promise<T>): Promise<T> {
    const run = this.queue.then(async () => {
      const snapshot = structuredClone(this.state);
      try {
        return await fn(this.bind());
      } catch (e) {
        this.state = snapshot;
        throw e;
      }
    });
    // The chain must survive a rolled-back transaction.
    this.queue = run.catch(() => undefined);
    return run;
  }

  /** Direct read access for assertions, outside any transaction. */
  user(userId: number): ReferralUser | null {
    return copyOrNull(this.state.users.get(userId));
  }

  earningRows(): ReferralEarning[] {
    return [...this.state.earnings.values()].sort(byIdAsc).map(copy);
  }

  inFlightPayouts(referrerId: number): number {
    return [...this.state.payouts.values()]
      .filter((p) => p.referrerId === referrerId && (p.status === "requested" || p.status === "processing"))
      .reduce((sum, p) => roundMoney(sum + p.amount), 0);
  }

  private tick(): Date {
    this.clock += 1000;
    return new Date(this.clock);
  }

  private bind(): LedgerTx {
    const t = this.state;
    const now = () => this.tick();
    const lock = (table: string, id: number, opts?: LockOptions) => {
      if (opts?.forUpdate) this.locks.push(`${table}:${id}`);
    };

    return {
      users: {
        find: async (userId, opts) => {
          lock("users", userId, opts);
          return copyOrNull(t.users.get(userId));
        },
        findByCode: async (code) => copyOrNull([...t.users.values()].find((u) => u.referralCode === code)),
        insert: async (args) => {
          if (t.users.has(args.userId)) return null;
          if ([...t.users.values()].some((u) => u.referralCode === args.referralCode)) return null;
          const user: ReferralUser = {
            ...args,
            payoutMethod: "card",
            cardNumber: null,
            phoneNumber: null,
            fullName: null,
            totalReferrals: 0,
            totalEarned: 0,
            totalPaid: 0,
            balance: 0,
            createdAt: now(),
            updatedAt: null
          };
          t.users.set(user.userId, user);
          return copy(user);
        },
        setReferredBy: async (userId, referrerId) => {
          const user = t.users.get(userId);
          if (!user || user.referredBy !== null) return null;
          user.referredBy = referrerId;
          user.updatedAt = now();
          return copy(user);
        },
        countReferrals: async (referrerId) => [...t.users.values()].filter((u) => u.referredBy === referrerId).length,
        setTotalReferrals: async (userId, total) => {
          mustGet(t.users, userId, "user").totalReferrals = total;
        },
        updatePayoutProfile: async (userId, profile) => {
          const user = t.users.get(userId);
          if (!user) return null;
          Object.assign(user, profile, { updatedAt: now() });
          return copy(user);
        },
        adjustTotals: async (userId, delta) => {
          const user = mustGet(t.users, userId, "user");
          const balance = roundMoney(user.balance + (delta.balance ?? 0));
          if (balance < 0) throw new Error(`check constraint: balance of ${userId} would be ${balance}`);
          user.balance = balance;
          user.totalEarned = roundMoney(user.totalEarned + (delta.earned ?? 0));
          user.totalPaid = roundMoney(user.totalPaid + (delta.paid ?? 0));
          user.updatedAt = now();
          return copy(user);
        }
      },

      orders: {
        insert: async (userId, fields) => {
          const order: ClientOrder = {
            ...fields,
            id: ++t.seq.order,
            userId,
            status: "new",
            finalPrice: null,
            adminNotes: null,
            createdAt: now(),
            updatedAt: null
          };
          t.orders.set(order.id, order);
          return copy(order);
        },
        find: async (orderId, opts) => {
          lock("orders", orderId, opts);
          return copyOrNull(t.orders.get(orderId));
        },
        update: async (orderId, patch) => {
          const order = mustGet(t.orders, orderId, "order");
          Object.assign(order, patch, { updatedAt: now() });
          return copy(order);
        },
        remove: async (orderId) => t.orders.delete(orderId),
        list: async ({ status, userId, limit }) =>
          [...t.orders.values()]
            .filter((o) => (status === undefined || o.status === status) && (userId === undefined || o.userId === userId))
            .sort(byIdAsc)
            .slice(0, limit)
            .map(copy)
      },

      earnings: {
        insert: async (args) => {
          if ([...t.earnings.values()].some((e) => e.orderId === args.orderId)) return null;
          const createdAt = now();
          const earning: ReferralEarning = {
            ...args,
            id: ++t.seq.earning,
            status: "confirmed",
            createdAt,
            confirmedAt: createdAt,
            paidAt: null
          };
          t.earnings.set(earning.id, earning);
          return copy(earning);
        },
        findByOrderId: async (orderId) => copyOrNull([...t.earnings.values()].find((e) => e.orderId === orderId)),
        list: async ({ referrerId, status, limit }) =>
          [...t.earnings.values()]
            .filter(
              (e) => (referrerId === undefined || e.referrerId === referrerId) && (status === undefined || e.status === status)
            )
            .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id)
            .slice(0, limit)
            .map(copy),
        listUnsettled: async (referrerId) =>
          [...t.earnings.values()]
            .filter((e) => e.referrerId === referrerId && e.status === "confirmed")
            .sort(byIdAsc)
            .map((e) => ({
              ...copy(e),
              settledAmount: t.settlements
                .filter((s) => s.earningId === e.id)
                .reduce((sum, s) => roundMoney(sum + s.amount), 0)
            })),
        markPaid: async (earningId) => {
          const earning = mustGet(t.earnings, earningId, "earning");
          earning.status = "paid";
          earning.paidAt = now();
          return copy(earning);
        }
      },

      payouts: {
        insert: async (args) => {
          const payout: ReferralPayout = {
            ...args,
            id: ++t.seq.payout,
            status: "requested",
            adminNotes: null,
            transactionDetails: null,
            createdAt: now(),
            processedAt: null,
            completedAt: null
          };
          t.payouts.set(payout.id, payout);
          return copy(payout);
        },
        find: async (payoutId, opts) => {
          lock("payouts", payoutId, opts);
          return copyOrNull(t.payouts.get(payoutId));
        },
        update: async (payoutId, patch) => {
          const payout = mustGet(t.payouts, payoutId, "payout");
          payout.status = patch.status;
          if (patch.adminNotes !== undefined) payout.adminNotes = patch.adminNotes;
          if (patch.transactionDetails !== undefined) payout.transactionDetails = patch.transactionDetails;
          if (patch.status === "processing") payout.processedAt = now();
          if (patch.status === "completed") payout.completedAt = now();
          return copy(payout);
        },
        list: async ({ referrerId, statuses, limit }) =>
          [...t.payouts.values()]
            .filter(
              (p) => (referrerId === undefined || p.referrerId === referrerId) && (!statuses || statuses.includes(p.status))
            )
            .sort(byIdAsc)
            .slice(0, limit)
            .map(copy),
        addSettlement: async (settlement) => {
          t.settlements.push({ ...settlement });
        },
        listSettlements: async (payoutId) => t.settlements.filter((s) => s.payoutId === payoutId).map((s) => ({ ...s }))
      }
    };
  }
}
