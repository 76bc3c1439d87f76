import type { Context } from "grammy";
import { cleanText } from "../../core/validation.js";
import type { OrderFields, OrderType } from "../../ledger/types.js";
import type { BotDeps } from "../deps.js";
import type { OrderDraft, OrderStep, UserSession } from "../state.js";
import { formatOrderDraft } from "../ui/format.js";
import { orderConfirmInlineKeyboard, orderTypeInlineKeyboard } from "../ui/keyboards.js";
import { TEXTS } from "../ui/texts.js";

type InputStep = Exclude<OrderStep, "confirm">;

const NEXT_STEP: Record<InputStep, OrderStep> = {
  projectName: "functionality",
  functionality: "deadlines",
  deadlines: "budget",
  budget: "confirm"
};

const MAX_LENGTH: Record<InputStep, number> = {
  projectName: 200,
  functionality: 3000,
  deadlines: 100,
  budget: 100
};

const PROMPTS: Record<InputStep, string> = {
  projectName: TEXTS.askProjectName,
  functionality: TEXTS.askFunctionality,
  deadlines: TEXTS.askDeadlines,
  budget: TEXTS.askBudget
};

export type OrderAnswer = { ok: true; next: OrderStep } | { ok: false; error: string };

/** Stores one answer of the order form into the draft and names the next step. */
export function applyOrderAnswer(draft: OrderDraft, step: InputStep, input: string): OrderAnswer {
  const value = cleanText(input, MAX_LENGTH[step]);
  if (!value) return { ok: false, error: `Ответ должен быть непустым и не длиннее ${MAX_LENGTH[step]} символов.` };
  draft[step] = value;
  return { ok: true, next: NEXT_STEP[step] };
}

export function draftToFields(draft: OrderDraft, username: string | null): OrderFields | null {
  const { orderType, projectName, functionality, deadlines, budget } = draft;
  if (!orderType || !projectName || !functionality || !deadlines || !budget) return null;
  return { username, orderType, projectName, functionality, deadlines, budget };
}

export async function startOrder(ctx: Context, deps: BotDeps) {
  const chatId = ctx.chat?.id;
  if (!chatId) return;
  const session = deps.sessions.reset(chatId);
  session.mode = "ORDER_FORM";
  session.orderDraft = {};
  await ctx.reply(TEXTS.askOrderType, { reply_markup: orderTypeInlineKeyboard() });
}

export async function chooseOrderType(ctx: Context, deps: BotDeps, orderType: OrderType) {
  const chatId = ctx.chat?.id;
  if (!chatId) return;
  const session = deps.sessions.get(chatId);
  if (session.mode !== "ORDER_FORM" || !session.orderDraft) {
    await startOrder(ctx, deps);
    return;
  }
  session.orderDraft.orderType = orderType;
  session.orderStep = "projectName";
  await ctx.reply(PROMPTS.projectName);
}

export async function handleOrderInput(ctx: Context, session: UserSession, text: string) {
  const step = session.orderStep;
  if (!session.orderDraft || !step || step === "confirm") {
    await ctx.reply(TEXTS.askOrderType, { reply_markup: orderTypeInlineKeyboard() });
    return;
  }

  const answer = applyOrderAnswer(session.orderDraft, step, text);
  if (!answer.ok) {
    await ctx.reply(answer.error);
    return;
  }
  session.orderStep = answer.next;
  if (answer.next === "confirm") {
    await ctx.reply(formatOrderDraft(session.orderDraft), {
      parse_mode: "HTML",
      reply_markup: orderConfirmInlineKeyboard()
    });
    return;
  }
  await ctx.reply(PROMPTS[answer.next]);
}

export async function confirmOrder(ctx: Context, deps: BotDeps) {
  const from = ctx.from;
  const chatId = ctx.chat?.id;
  if (!from || !chatId) return;

  const session = deps.sessions.get(chatId);
  const fields = session.orderDraft ? draftToFields(session.orderDraft, from.username ?? null) : null;
  if (session.mode !== "ORDER_FORM" || !fields) {
    await startOrder(ctx, deps);
    return;
  }

  await deps.ledger.orders.createOrder(from.id, fields);
  deps.sessions.reset(chatId);
  await ctx.reply(TEXTS.orderCreated);
}

export async function cancelOrder(ctx: Context, deps: BotDeps) {
  const chatId = ctx.chat?.id;
  if (!chatId) return;
  deps.sessions.reset(chatId);
  await ctx.reply(TEXTS.orderCancelled);
}
