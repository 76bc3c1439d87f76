import type { PoolClient } from "pg";
import { fromNumeric } from "../../core/money.js";
import type { LockOptions, NewReferralPayout, PayoutFilter, PayoutPatch } from "../../ledger/store.js";
import type { PayoutSettlement, ReferralPayout } from "../../ledger/types.js";
import { forUpdate } from "../tx.js";
import type { PayoutSettlementRow, ReferralPayoutRow } from "../types.js";

export function toPayout(r: ReferralPayoutRow): ReferralPayout {
  return {
    id: r.id,
    referrerId: Number(r.referrer_id),
    amount: fromNumeric(r.amount),
    method: r.method,
    recipientInfo: r.recipient_info,
    status: r.status,
    adminNotes: r.admin_notes,
    transactionDetails: r.transaction_details,
    createdAt: r.created_at,
    processedAt: r.processed_at,
    completedAt: r.completed_at
  };
}

export async function createPayout(db: PoolClient, args: NewReferralPayout): Promise<ReferralPayout> {
  const q = await db.query<ReferralPayoutRow>(
    `
    INSERT INTO referral_payouts (referrer_id, amount, method, recipient_info, status)
    VALUES ($1,$2,$3,$4,'requested')
    RETURNING *
    `,
    [args.referrerId, args.amount, args.method, args.recipientInfo]
  );
  const row = q.rows[0];
  if (!row) throw new Error("INSERT into referral_payouts returned no row");
  return toPayout(row);
}

export async function getPayoutById(db: PoolClient, payoutId: number, opts?: LockOptions): Promise<ReferralPayout | null> {
  const q = await db.query<ReferralPayoutRow>(
    `SELECT * FROM referral_payouts WHERE id = $1${forUpdate(opts)}`,
    [payoutId]
  );
  return q.rows[0] ? toPayout(q.rows[0]) : null;
}

export async function updatePayout(db: PoolClient, payoutId: number, patch: PayoutPatch): Promise<ReferralPayout> {
  const q = await db.query<ReferralPayoutRow>(
    `
    UPDATE referral_payouts
    SET status = $2,
        admin_notes = COALESCE($3, admin_notes),
        transaction_details = COALESCE($4, transaction_details),
        processed_at = CASE WHEN $2 = 'processing' THEN now() ELSE processed_at END,
        completed_at = CASE WHEN $2 = 'completed' THEN now() ELSE completed_at END
    WHERE id = $1
    RETURNING *
    `,
    [payoutId, patch.status, patch.adminNotes ?? null, patch.transactionDetails ?? null]
  );
  if (!q.rows[0]) throw new Error(`Payout not found: ${payoutId}`);
  return toPayout(q.rows[0]);
}

export async function listPayouts(db: PoolClient, filter: PayoutFilter): Promise<ReferralPayout[]> {
  const q = await db.query<ReferralPayoutRow>(
    `
    SELECT * FROM referral_payouts
    WHERE ($1::bigint IS NULL OR referrer_id = $1)
      AND ($2::text[] IS NULL OR status = ANY($2))
    ORDER BY created_at ASC, id ASC
    LIMIT $3
    `,
    [filter.referrerId ?? null, filter.statuses ?? null, filter.limit]
  );
  return q.rows.map(toPayout);
}

export async function addSettlement(db: PoolClient, s: PayoutSettlement): Promise<void> {
  await db.query(
    "INSERT INTO referral_payout_settlements (payout_id, earning_id, amount) VALUES ($1,$2,$3)",
    [s.payoutId, s.earningId, s.amount]
  );
}

export async function listSettlements(db: PoolClient, payoutId: number): Promise<PayoutSettlement[]> {
  const q = await db.query<PayoutSettlementRow>(
    "SELECT * FROM referral_payout_settlements WHERE payout_id = $1 ORDER BY earning_id ASC",
    [payoutId]
  );
  return q.rows.map((r) => ({ payoutId: r.payout_id, earningId: r.earning_id, amount: fromNumeric(r.amount) }));
}
