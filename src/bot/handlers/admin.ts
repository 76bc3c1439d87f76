import type { Context } from "grammy";
import type { LedgerResult } from "../../core/errors.js";
import { formatMoney } from "../../core/money.js";
import { cleanText, parsePrice } from "../../core/validation.js";
import type { OrderStatus } from "../../ledger/types.js";
import type { BotDeps } from "../deps.js";
import type { UserSession } from "../state.js";
import { formatOrderCard, formatPayoutCard } from "../ui/format.js";
import { adminMenuInlineKeyboard, adminOrderInlineKeyboard, adminPayoutInlineKeyboard } from "../ui/keyboards.js";
import { TEXTS, failureText } from "../ui/texts.js";

const LIST_LIMIT = 20;
const SKIP_NOTES = "-";
const MAX_NOTES_LENGTH = 1000;

const ORDER_ACTIONS = ["price", "reject", "delete", "paid", "complete"] as const;
const PAYOUT_ACTIONS = ["approve", "complete", "reject"] as const;

export type AdminOrderAction = (typeof ORDER_ACTIONS)[number];
export type AdminPayoutAction = (typeof PAYOUT_ACTIONS)[number];

export function isAdminOrderAction(v: string): v is AdminOrderAction {
  return ORDER_ACTIONS.some((a) => a === v);
}

export function isAdminPayoutAction(v: string): v is AdminPayoutAction {
  return PAYOUT_ACTIONS.some((a) => a === v);
}

export function isAdmin(deps: BotDeps, userId: number | undefined): boolean {
  return userId !== undefined && deps.config.adminTelegramIds.includes(userId);
}

/** Replies with the refusal for non-admins; handlers return early on false. */
export async function requireAdmin(ctx: Context, deps: BotDeps): Promise<boolean> {
  if (isAdmin(deps, ctx.from?.id)) return true;
  await ctx.reply(TEXTS.notAdmin);
  return false;
}

export async function replyResult<T>(ctx: Context, result: LedgerResult<T>, render: (value: T) => string) {
  if (!result.ok) {
    await ctx.reply(failureText(result.reason));
    return;
  }
  await ctx.reply(render(result.value), { parse_mode: "HTML" });
}

export async function showAdminMenu(ctx: Context) {
  await ctx.reply(TEXTS.adminMenu, { reply_markup: adminMenuInlineKeyboard() });
}

export async function listOrders(ctx: Context, deps: BotDeps, status: OrderStatus) {
  const orders = await deps.ledger.orders.list({ status, limit: LIST_LIMIT });
  if (!orders.length) {
    await ctx.reply(TEXTS.nothingHere);
    return;
  }
  for (const order of orders) {
    await ctx.reply(formatOrderCard(order), { parse_mode: "HTML", reply_markup: adminOrderInlineKeyboard(order) });
  }
}

export async function handleOrderAction(ctx: Context, deps: BotDeps, action: AdminOrderAction, orderId: number) {
  const { orders } = deps.ledger;
  switch (action) {
    case "price": {
      const chatId = ctx.chat?.id;
      if (!chatId) return;
      const session = deps.sessions.reset(chatId);
      session.mode = "ADMIN_PRICE";
      session.targetOrderId = orderId;
      await ctx.reply(TEXTS.askPrice);
      return;
    }
    case "reject":
      await replyResult(ctx, await orders.reject(orderId), formatOrderCard);
      return;
    case "delete":
      await replyResult(ctx, await orders.delete(orderId), (o) => `🗑 Заказ #${o.id} удалён.`);
      return;
    case "paid":
      await replyResult(ctx, await orders.confirmPayment(orderId), ({ order, earning }) =>
        earning
          ? `${formatOrderCard(order)}\n\n🤝 Партнёру ${earning.referrerId} начислено ${formatMoney(earning.earnedAmount)}`
          : formatOrderCard(order)
      );
      return;
    case "complete":
      await replyResult(ctx, await orders.markCompleted(orderId), formatOrderCard);
      return;
  }
}

export async function handlePriceInput(ctx: Context, session: UserSession, text: string) {
  const price = parsePrice(text);
  if (price === null) {
    await ctx.reply(TEXTS.invalidPrice);
    return;
  }
  session.pendingPrice = price;
  session.mode = "ADMIN_PRICE_NOTES";
  await ctx.reply(TEXTS.askPriceNotes);
}

/** `{ ok: false }` means the admin has to be asked again. */
export function parsePriceNotes(text: string): { ok: true; notes: string | undefined } | { ok: false } {
  if (text.trim() === SKIP_NOTES) return { ok: true, notes: undefined };
  const notes = cleanText(text, MAX_NOTES_LENGTH);
  return notes === null ? { ok: false } : { ok: true, notes };
}

export async function handlePriceNotesInput(ctx: Context, deps: BotDeps, session: UserSession, text: string) {
  const chatId = ctx.chat?.id;
  const { targetOrderId, pendingPrice } = session;
  if (!chatId) return;
  const parsed = parsePriceNotes(text);
  if (!parsed.ok) {
    await ctx.reply(TEXTS.invalidPriceNotes);
    return;
  }
  deps.sessions.reset(chatId);
  if (targetOrderId === undefined || pendingPrice === undefined) {
    await ctx.reply(TEXTS.genericError);
    return;
  }

  const notes = parsed.notes;
  await replyResult(ctx, await deps.ledger.orders.setFinalPrice(targetOrderId, pendingPrice, notes), formatOrderCard);
}

export async function listOpenPayouts(ctx: Context, deps: BotDeps) {
  const payouts = await deps.ledger.payouts.listOpen(LIST_LIMIT);
  if (!payouts.length) {
    await ctx.reply(TEXTS.nothingHere);
    return;
  }
  for (const payout of payouts) {
    await ctx.reply(formatPayoutCard(payout), { parse_mode: "HTML", reply_markup: adminPayoutInlineKeyboard(payout) });
  }
}

export async function handlePayoutAction(ctx: Context, deps: BotDeps, action: AdminPayoutAction, payoutId: number) {
  const { payouts } = deps.ledger;
  switch (action) {
    case "approve":
      await replyResult(ctx, await payouts.approve(payoutId), formatPayoutCard);
      return;
    case "complete":
      await replyResult(
        ctx,
        await payouts.complete(payoutId, `Подтверждено администратором ${ctx.from?.id ?? "—"}`),
        ({ payout, settlements }) => `${formatPayoutCard(payout)}\n\nЗакрыто начислений: ${settlements.length}`
      );
      return;
    case "reject": {
      const chatId = ctx.chat?.id;
      if (!chatId) return;
      const session = deps.sessions.reset(chatId);
      session.mode = "ADMIN_PAYOUT_REJECT";
      session.targetPayoutId = payoutId;
      await ctx.reply(TEXTS.askRejectReason);
      return;
    }
  }
}

export async function handlePayoutRejectInput(ctx: Context, deps: BotDeps, session: UserSession, text: string) {
  const chatId = ctx.chat?.id;
  const payoutId = session.targetPayoutId;
  if (!chatId) return;
  const reason = cleanText(text, 1000);
  if (!reason) {
    await ctx.reply(TEXTS.askRejectReason);
    return;
  }
  deps.sessions.reset(chatId);
  if (payoutId === undefined) {
    await ctx.reply(TEXTS.genericError);
    return;
  }
  await replyResult(ctx, await deps.ledger.payouts.reject(payoutId, reason), formatPayoutCard);
}
