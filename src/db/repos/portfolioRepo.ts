import type { Pool } from "pg";
import type { PortfolioFields, PortfolioProject } from "../../desk/types.js";
import type { PortfolioProjectRow } from "../types.js";

export function toPortfolioProject(r: PortfolioProjectRow): PortfolioProject {
  return {
    id: r.id,
    title: r.title,
    description: r.description,
    details: r.details,
    cost: r.cost,
    technologies: r.technologies,
    duration: r.duration,
    videoUrl: r.video_url,
    botUrl: r.bot_url,
    createdAt: r.created_at,
    updatedAt: r.updated_at
  };
}

export async function insertPortfolioProject(db: Pool, fields: PortfolioFields): Promise<PortfolioProject> {
  const q = await db.query<PortfolioProjectRow>(
    `
    INSERT INTO portfolio_projects (title, description, details, cost, technologies, duration, video_url, bot_url)
    VALUES ($1,$2,$3,$4,$5,$6,$7,$8)
    RETURNING *
    `,
    [
      fields.title,
      fields.description,
      fields.details,
      fields.cost,
      fields.technologies,
      fields.duration,
      fields.videoUrl,
      fields.botUrl
    ]
  );
  const row = q.rows[0];
  if (!row) throw new Error("INSERT into portfolio_projects returned no row");
  return toPortfolioProject(row);
}

export async function getPortfolioProject(db: Pool, projectId: number): Promise<PortfolioProject | null> {
  const q = await db.query<PortfolioProjectRow>("SELECT * FROM portfolio_projects WHERE id = $1", [projectId]);
  return q.rows[0] ? toPortfolioProject(q.rows[0]) : null;
}

export async function listPortfolioProjects(db: Pool, limit: number): Promise<PortfolioProject[]> {
  const q = await db.query<PortfolioProjectRow>(
    "SELECT * FROM portfolio_projects ORDER BY created_at ASC, id ASC LIMIT $1",
    [limit]
  );
  return q.rows.map(toPortfolioProject);
}

export async function deletePortfolioProject(db: Pool, projectId: number): Promise<boolean> {
  const q = await db.query("DELETE FROM portfolio_projects WHERE id = $1", [projectId]);
  return (q.rowCount ?? 0) > 0;
}
