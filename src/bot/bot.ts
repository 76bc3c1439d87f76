import { Bot } from "grammy";
import type { Context } from "grammy";
import { notifyAdmins } from "../core/adminAlerts.js";
import { config } from "../core/config.js";
import { errorMessage } from "../core/errors.js";
import { logger } from "../core/logger.js";
import { PgDeskStore, PgLedgerStore, pool } from "../db/index.js";
import { createDesk } from "../desk/index.js";
import { createLedger } from "../ledger/index.js";
import type { BotDeps } from "./deps.js";
import {
  handleOrderAction,
  handlePayoutAction,
  handlePayoutRejectInput,
  handlePriceInput,
  handlePriceNotesInput,
  isAdmin,
  isAdminOrderAction,
  isAdminPayoutAction,
  listOpenPayouts,
  listOrders,
  requireAdmin,
  showAdminMenu
} from "./handlers/admin.js";
import {
  deletePortfolioProject,
  handleConsultationAction,
  handleConsultationAnswerInput,
  handlePortfolioInput,
  handleTeamAction,
  isAdminConsultationAction,
  isAdminTeamAction,
  listConsultations,
  listPortfolio,
  listTeamApplications,
  startPortfolioProject
} from "./handlers/adminDesk.js";
import { handleQuestionInput, startConsultation } from "./handlers/consultation.js";
import { handleHelp } from "./handlers/help.js";
import { cancelOrder, chooseOrderType, confirmOrder, handleOrderInput, startOrder } from "./handlers/order.js";
import {
  askPayoutMethod,
  choosePayoutMethod,
  handlePayoutDetailsInput,
  handlePayoutFullNameInput,
  requestPayout,
  showEarnings,
  showReferralMenu,
  showStats
} from "./handlers/referral.js";
import { showPortfolio } from "./handlers/portfolio.js";
import { handleStart } from "./handlers/start.js";
import { handleTeamInput, startTeamApplication } from "./handlers/team.js";
import { TelegramNotifier } from "./notifier.js";
import { SessionStore } from "./state.js";
import { BUTTONS, TEXTS } from "./ui/texts.js";

const SWEEP_INTERVAL_MS = 60_000;

const token = config.botToken;
if (!token) {
  throw new Error("BOT_TOKEN is required. Create .env and set BOT_TOKEN=...");
}

const bot = new Bot(token);
const notifier = new TelegramNotifier(bot.api, config.adminTelegramIds);
const deps: BotDeps = {
  ledger: createLedger({ store: new PgLedgerStore(pool), events: notifier }),
  desk: createDesk({ store: new PgDeskStore(pool), events: notifier }),
  sessions: new SessionStore(),
  config
};

// Callback buttons stop spinning before the handler runs.
bot.on("callback_query:data", async (ctx, next) => {
  await ctx.answerCallbackQuery();
  await next();
});

bot.command("start", (ctx) => handleStart(ctx, deps, ctx.match));
bot.command("help", handleHelp);
bot.command("admin", async (ctx) => {
  if (await requireAdmin(ctx, deps)) await showAdminMenu(ctx);
});

bot.hears(BUTTONS.help, handleHelp);
bot.hears(BUTTONS.order, (ctx) => startOrder(ctx, deps));
bot.hears(BUTTONS.referral, (ctx) => showReferralMenu(ctx, deps));
bot.hears(BUTTONS.portfolio, (ctx) => showPortfolio(ctx, deps));
bot.hears(BUTTONS.team, (ctx) => startTeamApplication(ctx, deps));
bot.hears(BUTTONS.consultation, (ctx) => startConsultation(ctx, deps));

bot.callbackQuery(/^portfolio:show:(\d+)$/, (ctx) => showPortfolio(ctx, deps, Number(ctx.match[1])));

bot.callbackQuery("order:type:bot", (ctx) => chooseOrderType(ctx, deps, "bot"));
bot.callbackQuery("order:type:miniapp", (ctx) => chooseOrderType(ctx, deps, "miniapp"));
bot.callbackQuery("order:confirm", (ctx) => confirmOrder(ctx, deps));
bot.callbackQuery("order:cancel", (ctx) => cancelOrder(ctx, deps));

bot.callbackQuery("ref:stats", (ctx) => showStats(ctx, deps));
bot.callbackQuery("ref:earnings", (ctx) => showEarnings(ctx, deps));
bot.callbackQuery("ref:wallet", askPayoutMethod);
bot.callbackQuery("ref:wallet:card", (ctx) => choosePayoutMethod(ctx, deps, "card"));
bot.callbackQuery("ref:wallet:sbp", (ctx) => choosePayoutMethod(ctx, deps, "sbp"));
bot.callbackQuery("ref:payout", (ctx) => requestPayout(ctx, deps));

const admin = bot.filter((ctx: Context) => isAdmin(deps, ctx.from?.id));

admin.callbackQuery("admin:orders:new", (ctx) => listOrders(ctx, deps, "new"));
admin.callbackQuery("admin:orders:accepted", (ctx) => listOrders(ctx, deps, "accepted"));
admin.callbackQuery("admin:orders:paid", (ctx) => listOrders(ctx, deps, "paid"));
admin.callbackQuery("admin:payouts", (ctx) => listOpenPayouts(ctx, deps));
admin.callbackQuery("admin:team", (ctx) => listTeamApplications(ctx, deps));
admin.callbackQuery("admin:consultations", (ctx) => listConsultations(ctx, deps));
admin.callbackQuery("admin:portfolio", (ctx) => listPortfolio(ctx, deps));
admin.callbackQuery("admin:portfolio:add", (ctx) => startPortfolioProject(ctx, deps));
admin.callbackQuery(/^admin:portfolio:delete:(\d+)$/, (ctx) => deletePortfolioProject(ctx, deps, Number(ctx.match[1])));

admin.callbackQuery(/^admin:order:([a-z]+):(\d+)$/, async (ctx) => {
  const action = ctx.match[1];
  if (!isAdminOrderAction(action)) return;
  await handleOrderAction(ctx, deps, action, Number(ctx.match[2]));
});

admin.callbackQuery(/^admin:payout:([a-z]+):(\d+)$/, async (ctx) => {
  const action = ctx.match[1];
  if (!isAdminPayoutAction(action)) return;
  await handlePayoutAction(ctx, deps, action, Number(ctx.match[2]));
});

admin.callbackQuery(/^admin:team:([a-z]+):(\d+)$/, async (ctx) => {
  const action = ctx.match[1];
  if (!isAdminTeamAction(action)) return;
  await handleTeamAction(ctx, deps, action, Number(ctx.match[2]));
});

admin.callbackQuery(/^admin:consult:([a-z]+):(\d+)$/, async (ctx) => {
  const action = ctx.match[1];
  if (!isAdminConsultationAction(action)) return;
  await handleConsultationAction(ctx, deps, action, Number(ctx.match[2]));
});

bot.on("message:text", async (ctx) => {
  const chatId = ctx.chat.id;
  const text = ctx.message.text;
  if (text.startsWith("/")) return;

  const session = deps.sessions.get(chatId);
  const asAdmin = isAdmin(deps, ctx.from?.id);
  switch (session.mode) {
    case "ORDER_FORM":
      await handleOrderInput(ctx, session, text);
      return;
    case "PAYOUT_DETAILS":
      await handlePayoutDetailsInput(ctx, session, text);
      return;
    case "PAYOUT_FULL_NAME":
      await handlePayoutFullNameInput(ctx, deps, session, text);
      return;
    case "TEAM_FORM":
      await handleTeamInput(ctx, deps, session, text);
      return;
    case "CONSULTATION_QUESTION":
      await handleQuestionInput(ctx, deps, text);
      return;
    case "ADMIN_PRICE":
      if (asAdmin) await handlePriceInput(ctx, session, text);
      return;
    case "ADMIN_PRICE_NOTES":
      if (asAdmin) await handlePriceNotesInput(ctx, deps, session, text);
      return;
    case "ADMIN_PAYOUT_REJECT":
      if (asAdmin) await handlePayoutRejectInput(ctx, deps, session, text);
      return;
    case "ADMIN_CONSULTATION_ANSWER":
      if (asAdmin) await handleConsultationAnswerInput(ctx, deps, session, text);
      return;
    case "ADMIN_PORTFOLIO_FORM":
      if (asAdmin) await handlePortfolioInput(ctx, deps, session, text);
      return;
    case "IDLE":
      return;
  }
});

bot.catch(async (err) => {
  logger.error("Bot error", err.error);
  const chatId = err.ctx.chat?.id;
  if (chatId) deps.sessions.reset(chatId);
  try {
    await err.ctx.reply(TEXTS.genericError);
  } catch (e) {
    logger.warn(`could not report the error to chat ${chatId ?? "?"}`, e);
  }
  await notifyAdmins(bot.api, config.adminTelegramIds, `bot error: ${errorMessage(err.error)}`);
});

const sweeper = setInterval(() => {
  const dropped = deps.sessions.sweep(config.sessionIdleMinutes * 60_000);
  if (dropped) logger.debug(`dropped ${dropped} idle sessions, ${deps.sessions.size} left`);
}, SWEEP_INTERVAL_MS);

async function shutdown(signal: string) {
  logger.info(`${signal} received, stopping bot...`);
  clearInterval(sweeper);
  await bot.stop();
  await pool.end();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((e) => logger.error("Shutdown failed", e));
  });
}

logger.info("Starting bot polling...");
await bot.start();
