import type { PoolClient } from "pg";
import { fromNumeric } from "../../core/money.js";
import type { ClientOrderPatch, LockOptions, OrderFilter } from "../../ledger/store.js";
import type { ClientOrder, OrderFields } from "../../ledger/types.js";
import { forUpdate } from "../tx.js";
import type { ClientOrderRow } from "../types.js";

// The only columns an update may touch.
const PATCH_COLUMNS: ReadonlyArray<readonly [keyof ClientOrderPatch, string]> = [
  ["status", "status"],
  ["finalPrice", "final_price"],
  ["adminNotes", "admin_notes"],
  ["projectName", "project_name"],
  ["functionality", "functionality"],
  ["deadlines", "deadlines"],
  ["budget", "budget"]
];

export function toClientOrder(r: ClientOrderRow): ClientOrder {
  return {
    id: r.id,
    userId: Number(r.user_id),
    username: r.username,
    orderType: r.order_type,
    projectName: r.project_name,
    functionality: r.functionality,
    deadlines: r.deadlines,
    budget: r.budget,
    status: r.status,
    finalPrice: r.final_price === null ? null : fromNumeric(r.final_price),
    adminNotes: r.admin_notes,
    createdAt: r.created_at,
    updatedAt: r.updated_at
  };
}

export async function createOrder(db: PoolClient, userId: number, fields: OrderFields): Promise<ClientOrder> {
  const q = await db.query<ClientOrderRow>(
    `
    INSERT INTO client_orders (user_id, username, order_type, project_name, functionality, deadlines, budget)
    VALUES ($1,$2,$3,$4,$5,$6,$7)
    RETURNING *
    `,
    [
      userId,
      fields.username,
      fields.orderType,
      fields.projectName,
      fields.functionality,
      fields.deadlines,
      fields.budget
    ]
  );
  const row = q.rows[0];
  if (!row) throw new Error("INSERT into client_orders returned no row");
  return toClientOrder(row);
}

export async function getOrderById(db: PoolClient, orderId: number, opts?: LockOptions): Promise<ClientOrder | null> {
  const q = await db.query<ClientOrderRow>(`SELECT * FROM client_orders WHERE id = $1${forUpdate(opts)}`, [orderId]);
  return q.rows[0] ? toClientOrder(q.rows[0]) : null;
}

/** UPDATE statement for the patch; keys outside PATCH_COLUMNS never reach the SQL. */
export function buildOrderUpdate(orderId: number, patch: ClientOrderPatch): { sql: string; values: unknown[] } {
  const sets: string[] = [];
  const values: unknown[] = [orderId];
  for (const [key, column] of PATCH_COLUMNS) {
    const value = patch[key];
    if (value === undefined) continue;
    values.push(value);
    sets.push(`${column} = $${values.length}`);
  }
  sets.push("updated_at = now()");
  return { sql: `UPDATE client_orders SET ${sets.join(", ")} WHERE id = $1 RETURNING *`, values };
}

export async function updateOrder(db: PoolClient, orderId: number, patch: ClientOrderPatch): Promise<ClientOrder> {
  const { sql, values } = buildOrderUpdate(orderId, patch);
  const q = await db.query<ClientOrderRow>(sql, values);
  if (!q.rows[0]) throw new Error(`Order not found: ${orderId}`);
  return toClientOrder(q.rows[0]);
}

export async function deleteOrder(db: PoolClient, orderId: number): Promise<boolean> {
  const q = await db.query("DELETE FROM client_orders WHERE id = $1", [orderId]);
  return (q.rowCount ?? 0) > 0;
}

export async function listOrders(db: PoolClient, filter: OrderFilter): Promise<ClientOrder[]> {
  const q = await db.query<ClientOrderRow>(
    `
    SELECT * FROM client_orders
    WHERE ($1::text IS NULL OR status = $1)
      AND ($2::bigint IS NULL OR user_id = $2)
    ORDER BY created_at ASC, id ASC
    LIMIT $3
    `,
    [filter.status ?? null, filter.userId ?? null, filter.limit]
  );
  return q.rows.map(toClientOrder);
}
