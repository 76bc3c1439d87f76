import type { Context } from "grammy";
import type { BotDeps } from "../deps.js";
import { formatPortfolioCard } from "../ui/format.js";
import { portfolioNavInlineKeyboard } from "../ui/keyboards.js";
import { TEXTS } from "../ui/texts.js";

/** Shows one project; an index past either end wraps around. */
export async function showPortfolio(ctx: Context, deps: BotDeps, index = 0) {
  const projects = await deps.desk.portfolio.list();
  if (!projects.length) {
    await ctx.reply(TEXTS.noPortfolio);
    return;
  }
  const total = projects.length;
  const at = ((index % total) + total) % total;
  const project = projects[at];
  if (!project) return;

  const text = formatPortfolioCard(project, { index: at, total });
  const reply_markup = portfolioNavInlineKeyboard(at, total, project);
  if (ctx.callbackQuery?.message) {
    await ctx.editMessageText(text, { parse_mode: "HTML", reply_markup });
    return;
  }
  await ctx.reply(text, { parse_mode: "HTML", reply_markup });
}
