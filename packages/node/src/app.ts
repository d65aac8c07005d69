/**
 * Builds the Hono app around one CustodyService.
 *
 * Kept apart from main.ts so tests drive the app through
 * `app.request()` without a listening server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { CustodyService } from "./services/custody-service.js";
import type { CustodyServiceConfig } from "./services/custody-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { idempotencyMiddleware, InMemoryIdempotencyStore } from "./middleware/idempotency.js";
import { authMiddleware, headerPrincipalMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { metricsMiddleware, MetricsCollector } from "./middleware/metrics.js";
import {
  createAccountRoutes,
  createAssetRoutes,
  createEventRoutes,
  createHealthRoutes,
  createLimitRoutes,
  createMetricsRoute,
  createMovementRoutes,
  createRoleRoutes,
  createValuationRoutes,
} from "./routes/index.js";

export const OPERATIONS_METRIC = "tallyvault_operations_total";

const API_PREFIX = "/api/v1";

export interface CreateAppOptions {
  /** The app supplies onOperation itself, feeding the metrics collector. */
  readonly serviceConfig: Omit<CustodyServiceConfig, "onOperation">;
  readonly logFn?: (entry: RequestLogEntry) => void;
  readonly idempotencyTtlMs?: number;
  /** Omitted: unsecured mode, the caller is read from X-Principal. */
  readonly auth?: AuthConfig;
  /** Unsecured mode: who a request without X-Principal acts as. Default: the admin. */
  readonly defaultPrincipal?: string;
  /** Default true */
  readonly enableMetrics?: boolean;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: CustodyService;
  readonly idempotencyStore: InMemoryIdempotencyStore;
  readonly metricsCollector: MetricsCollector;
}

export function createApp(options: CreateAppOptions): AppInstance {
  const enableMetrics = options.enableMetrics !== false;
  const metricsCollector = new MetricsCollector();
  metricsCollector.describeCounter(OPERATIONS_METRIC, "Custody mutations by operation and outcome");

  const service = new CustodyService({
    ...options.serviceConfig,
    onOperation: enableMetrics
      ? (operation, outcome) => {
          metricsCollector.incrementCounter(OPERATIONS_METRIC, { operation, outcome });
        }
      : undefined,
  });
  const idempotencyStore = new InMemoryIdempotencyStore(options.idempotencyTtlMs);

  const app = new Hono<AppEnv>();
  app.onError(handleError);

  // every request
  app.use("*", requestIdMiddleware());
  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }
  if (enableMetrics) {
    app.use("*", metricsMiddleware(metricsCollector));
  }
  app.use("*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // probes, open to everyone
  app.route("/", createHealthRoutes(service));
  if (enableMetrics) {
    app.route("/", createMetricsRoute(metricsCollector, service));
  }

  // the API: identify the caller, then de-duplicate retries
  app.use(
    "/api/*",
    options.auth !== undefined
      ? authMiddleware(options.auth)
      : headerPrincipalMiddleware(options.defaultPrincipal ?? options.serviceConfig.admin),
  );
  app.use("/api/*", idempotencyMiddleware(idempotencyStore));

  const api: readonly (readonly [string, Hono<AppEnv>])[] = [
    ["/assets", createAssetRoutes()],
    ["/valuation", createValuationRoutes()],
    ["/limits", createLimitRoutes()],
    ["/roles", createRoleRoutes()],
    ["/accounts", createAccountRoutes()],
    ["/events", createEventRoutes()],
    ["", createMovementRoutes()],
  ];
  for (const [path, routes] of api) {
    app.route(`${API_PREFIX}${path}`, routes);
  }

  return { app, service, idempotencyStore, metricsCollector };
}
