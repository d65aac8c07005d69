/**
 * @tallyvault/node — HTTP service for the custody core.
 *
 * Package public API. The server itself starts from main.ts.
 */

export { CustodyService } from "./services/custody-service.js";
export type {
  CustodyServiceConfig,
  OperationOutcome,
  Readiness,
} from "./services/custody-service.js";
export { SettlementJournal, SETTLEMENT_EVENTS } from "./services/settlement-journal.js";
export type { SettlementEventType, SettlementJournalOptions } from "./services/settlement-journal.js";
export { SerialExecutor } from "./services/serial-executor.js";
export { createFeeds } from "./services/feeds.js";
export type { FeedSettings } from "./services/feeds.js";
export { loadConfig, parseApiKeys, limitsFromConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp, OPERATIONS_METRIC } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./types/index.js";
