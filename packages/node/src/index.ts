/**
 * @linked-token/node: HTTP service for linked-token transfers.
 *
 * Public API for embedding the service; `main.ts` is the executable.
 */

export { LinkedTokenService } from "./services/linked-token-service.js";
export type {
  LinkedTokenServiceConfig,
  BalanceView,
  CustodyView,
  ReadinessReport,
} from "./services/linked-token-service.js";
export { HttpGatewayTransport, GatewayError } from "./services/http-gateway-transport.js";
export type {
  HttpGatewayTransportOptions,
  GatewayErrorCode,
} from "./services/http-gateway-transport.js";
export { replayEvents } from "./services/replay.js";
export type { ReplayTarget, ReplaySummary } from "./services/replay.js";
export { loadConfig, parseApiKeys, parseGenesisBalances, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey, GenesisBalance } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
