import type { Context } from "grammy";
import { cleanText, isHttpUrl } from "../../core/validation.js";
import type { PortfolioFields } from "../../desk/types.js";
import type { BotDeps } from "../deps.js";
import { applyFormAnswer, promptFor } from "../forms.js";
import type { FormDraft, FormField } from "../forms.js";
import type { PortfolioStep, UserSession } from "../state.js";
import { formatConsultationCard, formatPortfolioCard, formatTeamApplicationCard } from "../ui/format.js";
import {
  adminConsultationInlineKeyboard,
  adminPortfolioInlineKeyboard,
  adminPortfolioMenuInlineKeyboard,
  adminTeamInlineKeyboard
} from "../ui/keyboards.js";
import { TEXTS } from "../ui/texts.js";
import { replyResult } from "./admin.js";

const LIST_LIMIT = 20;
const MAX_ANSWER_LENGTH = 3000;

const TEAM_ACTIONS = ["accept", "reject", "delete"] as const;
const CONSULTATION_ACTIONS = ["answer", "complete"] as const;

export type AdminTeamAction = (typeof TEAM_ACTIONS)[number];
export type AdminConsultationAction = (typeof CONSULTATION_ACTIONS)[number];

export function isAdminTeamAction(v: string): v is AdminTeamAction {
  return TEAM_ACTIONS.some((a) => a === v);
}

export function isAdminConsultationAction(v: string): v is AdminConsultationAction {
  return CONSULTATION_ACTIONS.some((a) => a === v);
}

const urlField = { maxLength: 500, optional: true, check: isHttpUrl, invalid: TEXTS.invalidUrl };

export const PORTFOLIO_FORM: readonly FormField<PortfolioStep>[] = [
  { key: "title", prompt: TEXTS.askProjectTitle, maxLength: 200 },
  { key: "description", prompt: TEXTS.askProjectDescription, maxLength: 2000 },
  { key: "details", prompt: TEXTS.askProjectDetails, maxLength: 3000, optional: true },
  { key: "cost", prompt: TEXTS.askProjectCost, maxLength: 100 },
  { key: "technologies", prompt: TEXTS.askProjectTechnologies, maxLength: 500, optional: true },
  { key: "duration", prompt: TEXTS.askProjectDuration, maxLength: 100, optional: true },
  { key: "videoUrl", prompt: TEXTS.askProjectVideo, ...urlField },
  { key: "botUrl", prompt: TEXTS.askProjectBotUrl, ...urlField }
];

export function portfolioDraftToFields(draft: FormDraft<PortfolioStep>): PortfolioFields | null {
  const { title, description, cost } = draft;
  if (!title || !description || !cost) return null;
  return {
    title,
    description,
    cost,
    details: draft.details ?? null,
    technologies: draft.technologies ?? null,
    duration: draft.duration ?? null,
    videoUrl: draft.videoUrl ?? null,
    botUrl: draft.botUrl ?? null
  };
}

export async function listTeamApplications(ctx: Context, deps: BotDeps) {
  const applications = await deps.desk.team.list("new", LIST_LIMIT);
  if (!applications.length) {
    await ctx.reply(TEXTS.nothingHere);
    return;
  }
  for (const application of applications) {
    await ctx.reply(formatTeamApplicationCard(application), {
      parse_mode: "HTML",
      reply_markup: adminTeamInlineKeyboard(application)
    });
  }
}

export async function handleTeamAction(ctx: Context, deps: BotDeps, action: AdminTeamAction, applicationId: number) {
  const { team } = deps.desk;
  switch (action) {
    case "accept":
      await replyResult(ctx, await team.accept(applicationId), formatTeamApplicationCard);
      return;
    case "reject":
      await replyResult(ctx, await team.reject(applicationId), formatTeamApplicationCard);
      return;
    case "delete":
      await replyResult(ctx, await team.delete(applicationId), (id) => `🗑 Заявка #${id} удалена.`);
      return;
  }
}

export async function listConsultations(ctx: Context, deps: BotDeps) {
  const requests = await deps.desk.consultations.listOpen(LIST_LIMIT);
  if (!requests.length) {
    await ctx.reply(TEXTS.nothingHere);
    return;
  }
  for (const request of requests) {
    await ctx.reply(formatConsultationCard(request), {
      parse_mode: "HTML",
      reply_markup: adminConsultationInlineKeyboard(request)
    });
  }
}

export async function handleConsultationAction(
  ctx: Context,
  deps: BotDeps,
  action: AdminConsultationAction,
  requestId: number
) {
  switch (action) {
    case "answer": {
      const chatId = ctx.chat?.id;
      if (!chatId) return;
      const session = deps.sessions.reset(chatId);
      session.mode = "ADMIN_CONSULTATION_ANSWER";
      session.targetConsultationId = requestId;
      await ctx.reply(TEXTS.askConsultationAnswer);
      return;
    }
    case "complete":
      await replyResult(ctx, await deps.desk.consultations.complete(requestId), formatConsultationCard);
      return;
  }
}

export async function handleConsultationAnswerInput(ctx: Context, deps: BotDeps, session: UserSession, text: string) {
  const chatId = ctx.chat?.id;
  const requestId = session.targetConsultationId;
  if (!chatId) return;
  const answer = cleanText(text, MAX_ANSWER_LENGTH);
  if (!answer) {
    await ctx.reply(TEXTS.invalidConsultationAnswer);
    return;
  }
  deps.sessions.reset(chatId);
  if (requestId === undefined) {
    await ctx.reply(TEXTS.genericError);
    return;
  }
  await replyResult(ctx, await deps.desk.consultations.answer(requestId, answer), () => TEXTS.consultationAnswered);
}

export async function listPortfolio(ctx: Context, deps: BotDeps) {
  const projects = await deps.desk.portfolio.list();
  for (const project of projects) {
    await ctx.reply(formatPortfolioCard(project), {
      parse_mode: "HTML",
      reply_markup: adminPortfolioInlineKeyboard(project)
    });
  }
  await ctx.reply(projects.length ? `Проектов: ${projects.length}` : TEXTS.noPortfolio, {
    reply_markup: adminPortfolioMenuInlineKeyboard()
  });
}

export async function deletePortfolioProject(ctx: Context, deps: BotDeps, projectId: number) {
  await replyResult(ctx, await deps.desk.portfolio.delete(projectId), (id) => `🗑 Проект #${id} удалён.`);
}

export async function startPortfolioProject(ctx: Context, deps: BotDeps) {
  const chatId = ctx.chat?.id;
  if (!chatId) return;
  const session = deps.sessions.reset(chatId);
  session.mode = "ADMIN_PORTFOLIO_FORM";
  session.portfolioStep = "title";
  session.portfolioDraft = {};
  await ctx.reply(TEXTS.askProjectTitle, { parse_mode: "HTML" });
}

export async function handlePortfolioInput(ctx: Context, deps: BotDeps, session: UserSession, text: string) {
  const chatId = ctx.chat?.id;
  const step = session.portfolioStep;
  if (!chatId) return;
  if (!session.portfolioDraft || !step) {
    await startPortfolioProject(ctx, deps);
    return;
  }

  const answer = applyFormAnswer(PORTFOLIO_FORM, session.portfolioDraft, step, text);
  if (!answer.ok) {
    await ctx.reply(answer.error);
    return;
  }
  if (answer.next) {
    session.portfolioStep = answer.next;
    await ctx.reply(promptFor(PORTFOLIO_FORM, answer.next));
    return;
  }

  const fields = portfolioDraftToFields(session.portfolioDraft);
  deps.sessions.reset(chatId);
  if (!fields) {
    await ctx.reply(TEXTS.genericError);
    return;
  }
  const project = await deps.desk.portfolio.add(fields);
  await ctx.reply(formatPortfolioCard(project), {
    parse_mode: "HTML",
    reply_markup: adminPortfolioInlineKeyboard(project)
  });
}
