/**
 * @phasevault/node — Entry point.
 *
 * Loads config, deploys the custody contracts, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { parseAmount } from "@phasevault/ledger";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";

// =============================================================================
// Bootstrap
// =============================================================================

function main(): void {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const { app, service } = createApp({
    serviceConfig: {
      owners: config.WALLET_OWNERS,
      required: config.WALLET_REQUIRED,
      token: {
        name: config.TOKEN_NAME,
        symbol: config.TOKEN_SYMBOL,
        decimals: config.TOKEN_DECIMALS,
      },
      initialSupply: parseAmount(config.TOKEN_INITIAL_SUPPLY, config.TOKEN_DECIMALS),
      deployer: config.DEPLOYER_ADDRESS,
      logger,
    },
    logger,
  });

  logger.info(
    {
      wallet: service.wallet.address,
      token: service.token.address,
      vesting: service.vesting.address,
      owners: config.WALLET_OWNERS.length,
      required: config.WALLET_REQUIRED,
    },
    "Custody contracts deployed",
  );

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info({ port: config.PORT, host: config.HOST }, "PhaseVault node started");

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    service.stop();
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

try {
  main();
} catch (err: unknown) {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
}
