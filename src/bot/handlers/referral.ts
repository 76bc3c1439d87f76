import type { Context } from "grammy";
import { formatMoney } from "../../core/money.js";
import { isFullName, maskCardNumber, normalizeCardNumber, normalizeSbpPhone } from "../../core/validation.js";
import { referralLink } from "../../ledger/referralCodes.js";
import type { PayoutProfile, ReferralStats } from "../../ledger/types.js";
import type { BotDeps } from "../deps.js";
import type { UserSession } from "../state.js";
import { formatEarnings, formatStats } from "../ui/format.js";
import { payoutMethodInlineKeyboard, referralMenuInlineKeyboard } from "../ui/keyboards.js";
import { TEXTS, belowMinimumText, failureText } from "../ui/texts.js";

export type PayoutReadiness = { ok: true } | { ok: false; text: string };

export function hasPayoutDetails(profile: PayoutProfile): boolean {
  if (!profile.fullName) return false;
  if (profile.payoutMethod === "card") return profile.cardNumber !== null;
  if (profile.payoutMethod === "sbp") return profile.phoneNumber !== null;
  return false;
}

/** Whether the bot lets the referrer withdraw the whole balance right now. */
export function payoutReadiness(stats: ReferralStats, minAmount: number): PayoutReadiness {
  if (stats.balance < minAmount) return { ok: false, text: belowMinimumText(formatMoney(minAmount)) };
  if (!hasPayoutDetails(stats)) return { ok: false, text: TEXTS.payoutDetailsMissing };
  return { ok: true };
}

export async function showReferralMenu(ctx: Context, deps: BotDeps) {
  const from = ctx.from;
  if (!from) return;
  await deps.ledger.identity.register(from.id, from.username ?? null);
  await ctx.reply(TEXTS.referralWelcome, { parse_mode: "HTML", reply_markup: referralMenuInlineKeyboard() });
}

export async function showStats(ctx: Context, deps: BotDeps) {
  const from = ctx.from;
  if (!from) return;
  const stats = await deps.ledger.identity.getStats(from.id);
  if (!stats) {
    await ctx.reply(TEXTS.noStats);
    return;
  }
  const link = referralLink(ctx.me.username, stats.referralCode);
  await ctx.reply(formatStats(stats, link), { parse_mode: "HTML" });
}

export async function showEarnings(ctx: Context, deps: BotDeps) {
  const from = ctx.from;
  if (!from) return;
  const earnings = await deps.ledger.earnings.listForReferrer(from.id);
  if (!earnings.length) {
    await ctx.reply(TEXTS.noEarnings);
    return;
  }
  await ctx.reply(formatEarnings(earnings), { parse_mode: "HTML" });
}

export async function askPayoutMethod(ctx: Context) {
  await ctx.reply(TEXTS.askPayoutMethod, { reply_markup: payoutMethodInlineKeyboard() });
}

export async function choosePayoutMethod(ctx: Context, deps: BotDeps, method: "card" | "sbp") {
  const chatId = ctx.chat?.id;
  if (!chatId) return;
  const session = deps.sessions.reset(chatId);
  session.mode = "PAYOUT_DETAILS";
  session.payoutMethod = method;
  await ctx.reply(method === "card" ? TEXTS.askCardNumber : TEXTS.askSbpPhone);
}

export async function handlePayoutDetailsInput(ctx: Context, session: UserSession, text: string) {
  if (session.payoutMethod === "card") {
    const digits = normalizeCardNumber(text);
    if (!digits) {
      await ctx.reply(TEXTS.invalidCard);
      return;
    }
    session.cardNumber = maskCardNumber(digits);
  } else {
    const phone = normalizeSbpPhone(text);
    if (!phone) {
      await ctx.reply(TEXTS.invalidPhone);
      return;
    }
    session.phoneNumber = phone;
  }
  session.mode = "PAYOUT_FULL_NAME";
  await ctx.reply(TEXTS.askFullName);
}

export async function handlePayoutFullNameInput(ctx: Context, deps: BotDeps, session: UserSession, text: string) {
  const from = ctx.from;
  const chatId = ctx.chat?.id;
  if (!from || !chatId) return;

  const fullName = text.trim().replace(/\s+/g, " ");
  if (!isFullName(fullName)) {
    await ctx.reply(TEXTS.invalidFullName);
    return;
  }

  const method = session.payoutMethod ?? "card";
  await deps.ledger.identity.register(from.id, from.username ?? null);
  const saved = await deps.ledger.identity.updatePayoutProfile(from.id, {
    payoutMethod: method,
    cardNumber: method === "card" ? session.cardNumber ?? null : null,
    phoneNumber: method === "sbp" ? session.phoneNumber ?? null : null,
    fullName
  });
  deps.sessions.reset(chatId);
  await ctx.reply(saved.ok ? TEXTS.payoutProfileSaved : failureText(saved.reason));
}

export async function requestPayout(ctx: Context, deps: BotDeps) {
  const from = ctx.from;
  if (!from) return;
  const stats = await deps.ledger.identity.getStats(from.id);
  if (!stats) {
    await ctx.reply(TEXTS.noStats);
    return;
  }

  const readiness = payoutReadiness(stats, deps.config.minPayoutAmount);
  if (!readiness.ok) {
    await ctx.reply(readiness.text);
    return;
  }

  const result = await deps.ledger.payouts.request(from.id);
  await ctx.reply(result.ok ? TEXTS.payoutRequested : failureText(result.reason));
}
