import type { Pool } from "pg";
import type { ConsultationFilter, ConsultationPatch } from "../../desk/store.js";
import type { ConsultationRequest, ConsultationStatus } from "../../desk/types.js";
import type { ConsultationRequestRow } from "../types.js";

export function toConsultationRequest(r: ConsultationRequestRow): ConsultationRequest {
  return {
    id: r.id,
    userId: Number(r.user_id),
    username: r.username,
    question: r.question,
    answer: r.answer,
    status: r.status,
    createdAt: r.created_at,
    updatedAt: r.updated_at
  };
}

export async function insertConsultationRequest(
  db: Pool,
  userId: number,
  username: string | null,
  question: string
): Promise<ConsultationRequest> {
  const q = await db.query<ConsultationRequestRow>(
    "INSERT INTO consultation_requests (user_id, username, question) VALUES ($1,$2,$3) RETURNING *",
    [userId, username, question]
  );
  const row = q.rows[0];
  if (!row) throw new Error("INSERT into consultation_requests returned no row");
  return toConsultationRequest(row);
}

export async function getConsultationRequest(db: Pool, requestId: number): Promise<ConsultationRequest | null> {
  const q = await db.query<ConsultationRequestRow>("SELECT * FROM consultation_requests WHERE id = $1", [requestId]);
  return q.rows[0] ? toConsultationRequest(q.rows[0]) : null;
}

export async function listConsultationRequests(db: Pool, filter: ConsultationFilter): Promise<ConsultationRequest[]> {
  const q = await db.query<ConsultationRequestRow>(
    `
    SELECT * FROM consultation_requests
    WHERE ($1::text[] IS NULL OR status = ANY($1))
    ORDER BY created_at ASC, id ASC
    LIMIT $2
    `,
    [filter.statuses ?? null, filter.limit]
  );
  return q.rows.map(toConsultationRequest);
}

export async function updateConsultationRequest(
  db: Pool,
  requestId: number,
  from: readonly ConsultationStatus[],
  patch: ConsultationPatch
): Promise<ConsultationRequest | null> {
  const q = await db.query<ConsultationRequestRow>(
    `
    UPDATE consultation_requests
    SET status = $3, answer = COALESCE($4, answer), updated_at = now()
    WHERE id = $1 AND status = ANY($2::text[])
    RETURNING *
    `,
    [requestId, [...from], patch.status, patch.answer ?? null]
  );
  return q.rows[0] ? toConsultationRequest(q.rows[0]) : null;
}
