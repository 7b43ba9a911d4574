/**
 * @commitlock/node: HTTP service over the commitment ledger, ownership
 * registry and compliance engine.
 */

export { CommitlockService, LEDGER_PRINCIPAL } from "./services/commitlock-service.js";
export type {
  BatchTransferInput,
  CommitlockServiceConfig,
  ServiceLogger,
} from "./services/commitlock-service.js";
export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig, ApiKeyRole, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./types/index.js";
