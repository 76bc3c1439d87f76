import type {
  ClientOrder,
  EarningStatus,
  OrderFields,
  OrderStatus,
  PayoutMethod,
  PayoutProfile,
  PayoutSettlement,
  PayoutStatus,
  ReferralEarning,
  ReferralPayout,
  ReferralUser,
  UnsettledEarning
} from "./types.js";

export type LockOptions = { forUpdate?: boolean };

export type NewReferralUser = {
  userId: number;
  username: string | null;
  referralCode: string;
  referredBy: number | null;
};

/** Signed increments applied in a single UPDATE. */
export type TotalsDelta = {
  earned?: number;
  paid?: number;
  balance?: number;
};

export type ClientOrderPatch = {
  status?: OrderStatus;
  finalPrice?: number;
  adminNotes?: string | null;
  projectName?: string;
  functionality?: string;
  deadlines?: string;
  budget?: string;
};

export type OrderFilter = { status?: OrderStatus; userId?: number; limit: number };

export type NewReferralEarning = {
  referrerId: number;
  referredUserId: number;
  orderId: number;
  orderAmount: number;
  commissionRate: number;
  earnedAmount: number;
};

export type EarningFilter = { referrerId?: number; status?: EarningStatus; limit: number };

export type NewReferralPayout = {
  referrerId: number;
  amount: number;
  method: PayoutMethod;
  recipientInfo: string | null;
};

export type PayoutPatch = {
  status: PayoutStatus;
  adminNotes?: string;
  transactionDetails?: string;
};

export type PayoutFilter = { referrerId?: number; statuses?: PayoutStatus[]; limit: number };

export interface ReferralUsersRepository {
  find(userId: number, opts?: LockOptions): Promise<ReferralUser | null>;
  findByCode(referralCode: string): Promise<ReferralUser | null>;
  /** Returns null when the user id or the code is already taken. */
  insert(args: NewReferralUser): Promise<ReferralUser | null>;
  /** Sets referred_by only while it is still empty. */
  setReferredBy(userId: number, referrerId: number): Promise<ReferralUser | null>;
  countReferrals(referrerId: number): Promise<number>;
  setTotalReferrals(userId: number, total: number): Promise<void>;
  updatePayoutProfile(userId: number, profile: PayoutProfile): Promise<ReferralUser | null>;
  adjustTotals(userId: number, delta: TotalsDelta): Promise<ReferralUser>;
}

export interface OrdersRepository {
  insert(userId: number, fields: OrderFields): Promise<ClientOrder>;
  find(orderId: number, opts?: LockOptions): Promise<ClientOrder | null>;
  update(orderId: number, patch: ClientOrderPatch): Promise<ClientOrder>;
  remove(orderId: number): Promise<boolean>;
  list(filter: OrderFilter): Promise<ClientOrder[]>;
}

export interface EarningsRepository {
  /** Inserts a confirmed earning; null when one for the order already exists. */
  insert(args: NewReferralEarning): Promise<ReferralEarning | null>;
  findByOrderId(orderId: number): Promise<ReferralEarning | null>;
  list(filter: EarningFilter): Promise<ReferralEarning[]>;
  /** Confirmed earnings of a referrer, oldest first, locked for update. */
  listUnsettled(referrerId: number): Promise<UnsettledEarning[]>;
  markPaid(earningId: number): Promise<ReferralEarning>;
}

export interface PayoutsRepository {
  insert(args: NewReferralPayout): Promise<ReferralPayout>;
  find(payoutId: number, opts?: LockOptions): Promise<ReferralPayout | null>;
  update(payoutId: number, patch: PayoutPatch): Promise<ReferralPayout>;
  list(filter: PayoutFilter): Promise<ReferralPayout[]>;
  addSettlement(settlement: PayoutSettlement): Promise<void>;
  listSettlements(payoutId: number): Promise<PayoutSettlement[]>;
}

export interface LedgerTx {
  users: ReferralUsersRepository;
  orders: OrdersRepository;
  earnings: EarningsRepository;
  payouts: PayoutsRepository;
}

export interface LedgerStore {
  /** Runs `fn` in one transaction: commit on resolve, rollback on throw. */
  transaction<T>(fn: (tx: LedgerTx) => Promise<T>): Promise<T>;
}
