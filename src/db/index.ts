export { pool } from "./pool.js";
export { withTransaction } from "./tx.js";
export { PgLedgerStore } from "./pgLedgerStore.js";
export { PgDeskStore } from "./pgDeskStore.js";

export * as referralUsersRepo from "./repos/referralUsersRepo.js";
export * as ordersRepo from "./repos/ordersRepo.js";
export * as earningsRepo from "./repos/earningsRepo.js";
export * as payoutsRepo from "./repos/payoutsRepo.js";
export * as teamApplicationsRepo from "./repos/teamApplicationsRepo.js";
export * as consultationsRepo from "./repos/consultationsRepo.js";
export * as portfolioRepo from "./repos/portfolioRepo.js";

export type * from "./types.js";
