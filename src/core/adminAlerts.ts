import { asyncPoolSettled } from "./async.js";
import { logger } from "./logger.js";

export interface MessageSender {
  sendMessage(chatId: number, text: string, other?: { parse_mode?: "HTML" }): Promise<unknown>;
}

/** Sends `text` to every admin; returns how many deliveries succeeded. */
export async function notifyAdmins(
  api: MessageSender,
  adminIds: readonly number[],
  text: string,
  opts: { html?: boolean } = {}
): Promise<number> {
  if (!adminIds.length) return 0;
  const body = opts.html ? text : `[ADMIN ALERT]\n${text}`;
  const results = await asyncPoolSettled(3, adminIds, (adminId) =>
    api.sendMessage(adminId, body.slice(0, 4000), opts.html ? { parse_mode: "HTML" } : undefined)
  );
  let delivered = 0;
  results.forEach((r, i) => {
    if (r.ok) delivered++;
    else logger.error(`Failed to notify admin ${adminIds[i]}`, r.error);
  });
  return delivered;
}
