import type { Context } from "grammy";
import type { TeamApplicationFields } from "../../desk/types.js";
import type { BotDeps } from "../deps.js";
import { applyFormAnswer, promptFor } from "../forms.js";
import type { FormDraft, FormField } from "../forms.js";
import type { TeamStep, UserSession } from "../state.js";
import { TEXTS } from "../ui/texts.js";

export const TEAM_FORM: readonly FormField<TeamStep>[] = [
  { key: "fullName", prompt: TEXTS.askTeamFullName, maxLength: 200 },
  { key: "age", prompt: TEXTS.askTeamAge, maxLength: 10 },
  { key: "experience", prompt: TEXTS.askTeamExperience, maxLength: 500 },
  { key: "stack", prompt: TEXTS.askTeamStack, maxLength: 2000 },
  { key: "about", prompt: TEXTS.askTeamAbout, maxLength: 2000 },
  { key: "motivation", prompt: TEXTS.askTeamMotivation, maxLength: 2000 },
  { key: "role", prompt: TEXTS.askTeamRole, maxLength: 200 }
];

export function teamDraftToFields(draft: FormDraft<TeamStep>, username: string | null): TeamApplicationFields | null {
  const { fullName, age, experience, stack, about, motivation, role } = draft;
  if (!fullName || !age || !experience || !stack || !about || !motivation || !role) return null;
  return { username, fullName, age, experience, stack, about, motivation, role };
}

export async function startTeamApplication(ctx: Context, deps: BotDeps) {
  const chatId = ctx.chat?.id;
  if (!chatId) return;
  const session = deps.sessions.reset(chatId);
  session.mode = "TEAM_FORM";
  session.teamStep = "fullName";
  session.teamDraft = {};
  await ctx.reply(TEXTS.askTeamFullName, { parse_mode: "HTML" });
}

export async function handleTeamInput(ctx: Context, deps: BotDeps, session: UserSession, text: string) {
  const from = ctx.from;
  const chatId = ctx.chat?.id;
  const step = session.teamStep;
  if (!from || !chatId) return;
  if (!session.teamDraft || !step) {
    await startTeamApplication(ctx, deps);
    return;
  }

  const answer = applyFormAnswer(TEAM_FORM, session.teamDraft, step, text);
  if (!answer.ok) {
    await ctx.reply(answer.error);
    return;
  }
  if (answer.next) {
    session.teamStep = answer.next;
    await ctx.reply(promptFor(TEAM_FORM, answer.next));
    return;
  }

  const fields = teamDraftToFields(session.teamDraft, from.username ?? null);
  deps.sessions.reset(chatId);
  if (!fields) {
    await ctx.reply(TEXTS.genericError);
    return;
  }
  await deps.desk.team.submit(from.id, fields);
  await ctx.reply(TEXTS.teamApplicationSent);
}
