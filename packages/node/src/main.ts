/**
 * Process entry point: read the environment, wire the feed backend and
 * the custody service into the HTTP app, listen, and drain queued
 * mutations on SIGTERM/SIGINT before exiting.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import type { Logger } from "pino";
import { limitsFromConfig, loadConfig, parseApiKeys } from "./config.js";
import type { AppConfig } from "./config.js";
import { createApp } from "./app.js";
import { createFeeds } from "./services/feeds.js";
import type { AuthConfig } from "./middleware/auth.js";
import { apiKeyRegistry } from "./types/auth.js";

function createLogger(config: AppConfig): Logger {
  const pretty = config.NODE_ENV === "development";
  return pino({
    level: config.LOG_LEVEL,
    ...(pretty ? { transport: { target: "pino-pretty" } } : {}),
  });
}

/** Undefined means unsecured mode: callers name themselves with X-Principal. */
function authFromConfig(config: AppConfig, logger: Logger): AuthConfig | undefined {
  const keys = parseApiKeys(config.API_KEYS);
  const jwtEnabled = config.JWT_SECRET !== undefined;
  if (keys.length === 0 && !jwtEnabled) {
    logger.warn("No API keys or JWT secret configured; X-Principal is trusted as-is");
    return undefined;
  }
  logger.info({ apiKeyCount: keys.length, jwtEnabled }, "Auth configured");
  return {
    apiKeys: apiKeyRegistry(keys),
    jwtSecret: config.JWT_SECRET,
    jwtIssuer: config.JWT_ISSUER,
  };
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config);
  const auth = authFromConfig(config, logger);

  const feeds = await createFeeds(config);
  logger.info({ mode: config.FEED_MODE, status: await feeds.getStatus() }, "Feeds ready");

  const { app, service } = createApp({
    serviceConfig: {
      admin: config.ADMIN_PRINCIPAL,
      feeds,
      limits: limitsFromConfig(config),
      maxAssets: config.MAX_ASSETS,
      commonDecimals: config.COMMON_DECIMALS,
      onSinkError: (err, event) => {
        logger.error(
          { err, eventType: event.type, correlationId: event.metadata.correlationId },
          "Custody notification not recorded",
        );
      },
    },
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.route} ${String(entry.status)}`);
    },
    idempotencyTtlMs: config.IDEMPOTENCY_TTL_MS,
    ...(auth !== undefined ? { auth } : {}),
  });

  const server = serve({ fetch: app.fetch, port: config.PORT, hostname: config.HOST });
  logger.info(
    { host: config.HOST, port: config.PORT, admin: config.ADMIN_PRINCIPAL },
    "Custody node listening",
  );

  let stopping = false;
  const stop = async (signal: NodeJS.Signals): Promise<void> => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info({ signal, pendingOperations: service.pendingOperations }, "Stopping");
    server.close();
    await service.drain();
    logger.info({ globalPosition: service.eventStore.globalPosition() }, "Stopped");
    process.exit(0);
  };

  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.on(signal, () => {
      stop(signal).catch((err: unknown) => {
        logger.fatal({ err }, "Shutdown failed");
        process.exit(1);
      });
    });
  }
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
