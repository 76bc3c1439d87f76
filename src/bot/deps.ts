import type { AppConfig } from "../core/config.js";
import type { Desk } from "../desk/index.js";
import type { Ledger } from "../ledger/index.js";
import type { SessionStore } from "./state.js";

export type BotDeps = {
  ledger: Ledger;
  desk: Desk;
  sessions: SessionStore;
  config: Pick<AppConfig, "adminTelegramIds" | "minPayoutAmount">;
};
