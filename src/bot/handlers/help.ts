import type { Context } from "grammy";
import { TEXTS } from "../ui/texts.js";

export async function handleHelp(ctx: Context) {
  await ctx.reply(TEXTS.help);
}
