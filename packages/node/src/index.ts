/**
 * @warden/node — HTTP node and service API for the Warden protocol.
 */

export { ProtocolService } from "./services/protocol-service.js";
export type { ProtocolServiceConfig } from "./services/protocol-service.js";
export { TransactionContext } from "./services/transaction.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
