/**
 * @phasevault/node — HTTP facade over the custody contracts.
 *
 * @packageDocumentation
 */

export { CustodyService } from "./services/custody-service.js";
export type {
  CustodyServiceConfig,
  WalletSummary,
  ScheduleStatus,
  AccountBalances,
} from "./services/custody-service.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
