import type { Context } from "grammy";
import { cleanText } from "../../core/validation.js";
import type { BotDeps } from "../deps.js";
import { TEXTS } from "../ui/texts.js";

const MAX_QUESTION_LENGTH = 3000;

export async function startConsultation(ctx: Context, deps: BotDeps) {
  const chatId = ctx.chat?.id;
  if (!chatId) return;
  deps.sessions.reset(chatId).mode = "CONSULTATION_QUESTION";
  await ctx.reply(TEXTS.askQuestion, { parse_mode: "HTML" });
}

export async function handleQuestionInput(ctx: Context, deps: BotDeps, text: string) {
  const from = ctx.from;
  const chatId = ctx.chat?.id;
  if (!from || !chatId) return;

  const question = cleanText(text, MAX_QUESTION_LENGTH);
  if (!question) {
    await ctx.reply(TEXTS.invalidQuestion);
    return;
  }
  deps.sessions.reset(chatId);
  await deps.desk.consultations.ask(from.id, from.username ?? null, question);
  await ctx.reply(TEXTS.questionSent);
}
