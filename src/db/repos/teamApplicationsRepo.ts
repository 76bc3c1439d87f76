import type { Pool } from "pg";
import type { TeamApplicationFilter } from "../../desk/store.js";
import type { TeamApplication, TeamApplicationFields, TeamApplicationStatus } from "../../desk/types.js";
import type { TeamApplicationRow } from "../types.js";

export function toTeamApplication(r: TeamApplicationRow): TeamApplication {
  return {
    id: r.id,
    userId: Number(r.user_id),
    username: r.username,
    fullName: r.full_name,
    age: r.age,
    experience: r.experience,
    stack: r.stack,
    about: r.about,
    motivation: r.motivation,
    role: r.role,
    status: r.status,
    createdAt: r.created_at,
    updatedAt: r.updated_at
  };
}

export async function insertTeamApplication(
  db: Pool,
  userId: number,
  fields: TeamApplicationFields
): Promise<TeamApplication> {
  const q = await db.query<TeamApplicationRow>(
    `
    INSERT INTO team_applications (user_id, username, full_name, age, experience, stack, about, motivation, role)
    VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9)
    RETURNING *
    `,
    [
      userId,
      fields.username,
      fields.fullName,
      fields.age,
      fields.experience,
      fields.stack,
      fields.about,
      fields.motivation,
      fields.role
    ]
  );
  const row = q.rows[0];
  if (!row) throw new Error("INSERT into team_applications returned no row");
  return toTeamApplication(row);
}

export async function getTeamApplication(db: Pool, applicationId: number): Promise<TeamApplication | null> {
  const q = await db.query<TeamApplicationRow>("SELECT * FROM team_applications WHERE id = $1", [applicationId]);
  return q.rows[0] ? toTeamApplication(q.rows[0]) : null;
}

export async function listTeamApplications(db: Pool, filter: TeamApplicationFilter): Promise<TeamApplication[]> {
  const q = await db.query<TeamApplicationRow>(
    `
    SELECT * FROM team_applications
    WHERE ($1::text IS NULL OR status = $1)
    ORDER BY created_at ASC, id ASC
    LIMIT $2
    `,
    [filter.status ?? null, filter.limit]
  );
  return q.rows.map(toTeamApplication);
}

export async function transitionTeamApplication(
  db: Pool,
  applicationId: number,
  from: readonly TeamApplicationStatus[],
  status: TeamApplicationStatus
): Promise<TeamApplication | null> {
  const q = await db.query<TeamApplicationRow>(
    `
    UPDATE team_applications
    SET status = $3, updated_at = now()
    WHERE id = $1 AND status = ANY($2::text[])
    RETURNING *
    `,
    [applicationId, [...from], status]
  );
  return q.rows[0] ? toTeamApplication(q.rows[0]) : null;
}

export async function deleteTeamApplication(db: Pool, applicationId: number): Promise<boolean> {
  const q = await db.query("DELETE FROM team_applications WHERE id = $1", [applicationId]);
  return (q.rowCount ?? 0) > 0;
}
