import type { Context } from "grammy";
import { logger } from "../../core/logger.js";
import { parseReferralPayload } from "../../ledger/referralCodes.js";
import type { BotDeps } from "../deps.js";
import { mainKeyboard } from "../ui/keyboards.js";
import { TEXTS, failureText } from "../ui/texts.js";

const log = logger.child("start");

export async function handleStart(ctx: Context, deps: BotDeps, payload: string) {
  const from = ctx.from;
  if (!from) return;
  deps.sessions.reset(from.id);

  const code = parseReferralPayload(payload);
  if (code) {
    const linked = await deps.ledger.identity.linkReferral(from.id, code, from.username ?? null);
    if (linked.ok) {
      await ctx.reply(TEXTS.referralLinked);
    } else {
      log.info(`referral link ${code} for ${from.id} not applied: ${linked.reason}`);
      // A stale or mistyped link stays silent.
      if (linked.reason !== "UNKNOWN_CODE") await ctx.reply(failureText(linked.reason));
    }
  }

  await ctx.reply(TEXTS.start, { reply_markup: mainKeyboard() });
}
