import type { PoolClient } from "pg";
import { fromNumeric } from "../../core/money.js";
import type { LockOptions, NewReferralUser, TotalsDelta } from "../../ledger/store.js";
import type { PayoutProfile, ReferralUser } from "../../ledger/types.js";
import { forUpdate } from "../tx.js";
import type { ReferralUserRow } from "../types.js";

export function toReferralUser(r: ReferralUserRow): ReferralUser {
  return {
    userId: Number(r.user_id),
    username: r.username,
    referralCode: r.referral_code,
    referredBy: r.referred_by === null ? null : Number(r.referred_by),
    payoutMethod: r.payout_method,
    cardNumber: r.card_number,
    phoneNumber: r.phone_number,
    fullName: r.full_name,
    totalReferrals: r.total_referrals,
    totalEarned: fromNumeric(r.total_earned),
    totalPaid: fromNumeric(r.total_paid),
    balance: fromNumeric(r.balance),
    createdAt: r.created_at,
    updatedAt: r.updated_at
  };
}

export async function findReferralUser(
  db: PoolClient,
  userId: number,
  opts?: LockOptions
): Promise<ReferralUser | null> {
  const q = await db.query<ReferralUserRow>(
    `SELECT * FROM referral_users WHERE user_id = $1${forUpdate(opts)}`,
    [userId]
  );
  return q.rows[0] ? toReferralUser(q.rows[0]) : null;
}

export async function findReferralUserByCode(db: PoolClient, referralCode: string): Promise<ReferralUser | null> {
  const q = await db.query<ReferralUserRow>("SELECT * FROM referral_users WHERE referral_code = $1 LIMIT 1", [
    referralCode
  ]);
  return q.rows[0] ? toReferralUser(q.rows[0]) : null;
}

export async function insertReferralUser(db: PoolClient, args: NewReferralUser): Promise<ReferralUser | null> {
  // No conflict target: a taken user_id and a taken referral_code both yield no row.
  const q = await db.query<ReferralUserRow>(
    `
    INSERT INTO referral_users (user_id, username, referral_code, referred_by)
    VALUES ($1,$2,$3,$4)
    ON CONFLICT DO NOTHING
    RETURNING *
    `,
    [args.userId, args.username, args.referralCode, args.referredBy]
  );
  return q.rows[0] ? toReferralUser(q.rows[0]) : null;
}

export async function setReferredBy(db: PoolClient, userId: number, referrerId: number): Promise<ReferralUser | null> {
  const q = await db.query<ReferralUserRow>(
    `
    UPDATE referral_users
    SET referred_by = $2, updated_at = now()
    WHERE user_id = $1 AND referred_by IS NULL
    RETURNING *
    `,
    [userId, referrerId]
  );
  return q.rows[0] ? toReferralUser(q.rows[0]) : null;
}

export async function countReferrals(db: PoolClient, referrerId: number): Promise<number> {
  const q = await db.query<{ count: string }>(
    "SELECT count(*)::text AS count FROM referral_users WHERE referred_by = $1",
    [referrerId]
  );
  return Number(q.rows[0]?.count ?? 0);
}

export async function setTotalReferrals(db: PoolClient, userId: number, total: number): Promise<void> {
  await db.query("UPDATE referral_users SET total_referrals = $2, updated_at = now() WHERE user_id = $1", [
    userId,
    total
  ]);
}

export async function updatePayoutProfile(
  db: PoolClient,
  userId: number,
  profile: PayoutProfile
): Promise<ReferralUser | null> {
  const q = await db.query<ReferralUserRow>(
    `
    UPDATE referral_users
    SET payout_method = $2,
        card_number = $3,
        phone_number = $4,
        full_name = $5,
        updated_at = now()
    WHERE user_id = $1
    RETURNING *
    `,
    [userId, profile.payoutMethod, profile.cardNumber, profile.phoneNumber, profile.fullName]
  );
  return q.rows[0] ? toReferralUser(q.rows[0]) : null;
}

/**
 * Applies signed increments in one statement. The balance >= 0 check
 * constraint rejects an overdraft even if a caller skipped its own check.
 */
export async function adjustTotals(db: PoolClient, userId: number, delta: TotalsDelta): Promise<ReferralUser> {
  const q = await db.query<ReferralUserRow>(
    `
    UPDATE referral_users
    SET total_earned = total_earned + $2,
        total_paid = total_paid + $3,
        balance = balance + $4,
        updated_at = now()
    WHERE user_id = $1
    RETURNING *
    `,
    [userId, delta.earned ?? 0, delta.paid ?? 0, delta.balance ?? 0]
  );
  if (!q.rows[0]) throw new Error(`referral user ${userId} vanished during adjustTotals`);
  return toReferralUser(q.rows[0]);
}
