/**
 * @linked-token/node: Entry point.
 *
 * Loads config, replays the event log, starts the HTTP server
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import type { GmpTransport } from "@linked-token/protocol";
import { formatSubnetId } from "@linked-token/protocol";
import type { IpcAddress } from "@linked-token/types";
import { loadConfig, parseApiKeys, parseGenesisBalances } from "./config.js";
import { createApp } from "./app.js";
import type { AuthConfig } from "./middleware/auth.js";
import type { ApiKeyRecord } from "./types/auth.js";
import { HttpGatewayTransport } from "./services/http-gateway-transport.js";
import { LinkedTokenService } from "./services/linked-token-service.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  // Auth
  let auth: AuthConfig | undefined;
  const parsedKeys = parseApiKeys(config.API_KEYS);
  if (parsedKeys.length > 0) {
    const keyMap = new Map<string, ApiKeyRecord>();
    for (const k of parsedKeys) {
      keyMap.set(k.key, k);
    }
    auth = { apiKeys: keyMap };
    logger.info({ apiKeyCount: parsedKeys.length }, "Auth configured");
  } else {
    logger.warn("No API keys configured; running in unsecured mode");
  }

  // Transport
  const self: IpcAddress = { subnetId: config.LOCAL_SUBNET, rawAddress: config.SELF_ADDRESS };
  let transport: GmpTransport | undefined;
  if (config.GATEWAY_URL !== undefined) {
    transport = new HttpGatewayTransport({
      baseUrl: config.GATEWAY_URL,
      origin: self,
      timeoutMs: config.GATEWAY_TIMEOUT_MS,
      logger: logger.child({ component: "gateway" }),
    });
  } else {
    logger.warn("No GATEWAY_URL configured; outbound calls stay queued in process");
  }

  const service = await LinkedTokenService.open({
    owner: config.OWNER_ADDRESS,
    token: {
      subnetId: config.LOCAL_SUBNET,
      address: config.TOKEN_ADDRESS,
      symbol: config.TOKEN_SYMBOL,
      decimals: config.TOKEN_DECIMALS,
    },
    self: config.SELF_ADDRESS,
    custody: config.CUSTODY_MODE,
    linkedSubnet: config.LINKED_SUBNET,
    linkedContract: config.LINKED_CONTRACT,
    genesisBalances: parseGenesisBalances(config.GENESIS_BALANCES, config.TOKEN_DECIMALS),
    eventLogPath: config.EVENT_LOG_PATH,
    transport,
    logger: logger.child({ component: "protocol" }),
  });

  const { app } = createApp({
    service,
    logger,
    auth,
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      custody: config.CUSTODY_MODE,
      localSubnet: formatSubnetId(config.LOCAL_SUBNET),
      linkedSubnet: formatSubnetId(config.LINKED_SUBNET),
      linkedContract: service.link.linkedContract ?? null,
    },
    "Linked token node started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
