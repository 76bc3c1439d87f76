import type { PoolClient } from "pg";
import { fromNumeric } from "../../core/money.js";
import type { EarningFilter, NewReferralEarning } from "../../ledger/store.js";
import type { ReferralEarning, UnsettledEarning } from "../../ledger/types.js";
import type { ReferralEarningRow } from "../types.js";

export function toEarning(r: ReferralEarningRow): ReferralEarning {
  return {
    id: r.id,
    referrerId: Number(r.referrer_id),
    referredUserId: Number(r.referred_user_id),
    orderId: r.order_id,
    orderAmount: fromNumeric(r.order_amount),
    commissionRate: Number(r.commission_rate),
    earnedAmount: fromNumeric(r.earned_amount),
    status: r.status,
    createdAt: r.created_at,
    confirmedAt: r.confirmed_at,
    paidAt: r.paid_at
  };
}

/**
 * order_id is UNIQUE: when two confirmations race, the loser waits for the
 * winner's commit and then inserts nothing.
 */
export async function insertEarning(db: PoolClient, args: NewReferralEarning): Promise<ReferralEarning | null> {
  const q = await db.query<ReferralEarningRow>(
    `
    INSERT INTO referral_earnings
      (referrer_id, referred_user_id, order_id, order_amount, commission_rate, earned_amount, status, confirmed_at)
    VALUES ($1,$2,$3,$4,$5,$6,'confirmed', now())
    ON CONFLICT (order_id) DO NOTHING
    RETURNING *
    `,
    [
      args.referrerId,
      args.referredUserId,
      args.orderId,
      args.orderAmount,
      args.commissionRate,
      args.earnedAmount
    ]
  );
  return q.rows[0] ? toEarning(q.rows[0]) : null;
}

export async function getEarningByOrderId(db: PoolClient, orderId: number): Promise<ReferralEarning | null> {
  const q = await db.query<ReferralEarningRow>("SELECT * FROM referral_earnings WHERE order_id = $1 LIMIT 1", [
    orderId
  ]);
  return q.rows[0] ? toEarning(q.rows[0]) : null;
}

export async function listEarnings(db: PoolClient, filter: EarningFilter): Promise<ReferralEarning[]> {
  const q = await db.query<ReferralEarningRow>(
    `
    SELECT * FROM referral_earnings
    WHERE ($1::bigint IS NULL OR referrer_id = $1)
      AND ($2::text IS NULL OR status = $2)
    ORDER BY created_at DESC, id DESC
    LIMIT $3
    `,
    [filter.referrerId ?? null, filter.status ?? null, filter.limit]
  );
  return q.rows.map(toEarning);
}

export async function listUnsettledEarnings(db: PoolClient, referrerId: number): Promise<UnsettledEarning[]> {
  // FOR UPDATE cannot be combined with GROUP BY, hence the correlated subquery.
  const q = await db.query<ReferralEarningRow & { settled_amount: string }>(
    `
    SELECT e.*,
           COALESCE((SELECT sum(s.amount) FROM referral_payout_settlements s WHERE s.earning_id = e.id), 0)::text
             AS settled_amount
    FROM referral_earnings e
    WHERE e.referrer_id = $1 AND e.status = 'confirmed'
    ORDER BY e.created_at ASC, e.id ASC
    FOR UPDATE
    `,
    [referrerId]
  );
  return q.rows.map((r) => ({ ...toEarning(r), settledAmount: fromNumeric(r.settled_amount) }));
}

export async function markEarningPaid(db: PoolClient, earningId: number): Promise<ReferralEarning> {
  const q = await db.query<ReferralEarningRow>(
    "UPDATE referral_earnings SET status = 'paid', paid_at = now() WHERE id = $1 RETURNING *",
    [earningId]
  );
  if (!q.rows[0]) throw new Error(`Earning not found: ${earningId}`);
  return toEarning(q.rows[0]);
}
