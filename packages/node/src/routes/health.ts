/**
 * Probes for process supervisors.
 *
 * GET /health  always 200 while the process serves requests
 * GET /ready   200 only when the event log accepts writes, its hash
 *              chain verifies and the feed backend answers; else 503
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { CustodyService, Readiness } from "../services/custody-service.js";

type SubsystemStatus =
  | { readonly status: "ok" }
  | { readonly status: "down"; readonly detail: string };

const UP: SubsystemStatus = { status: "ok" };

function eventStoreStatus({ eventStore }: Readiness): SubsystemStatus {
  const { writable, integrity } = eventStore;
  if (writable && integrity.valid) {
    return UP;
  }
  const facts = [
    `writable=${String(writable)}`,
    `chainValid=${String(integrity.valid)}`,
    `errors=${String(integrity.errors.length)}`,
  ];
  return { status: "down", detail: facts.join(", ") };
}

function feedStatus({ feeds }: Readiness): SubsystemStatus {
  return feeds.connected ? UP : { status: "down", detail: `${feeds.source} feed not connected` };
}

export function createHealthRoutes(service: CustodyService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => c.json({ status: "ok", timestamp: new Date().toISOString() }));

  routes.get("/ready", async (c) => {
    const readiness = await service.checkReadiness();
    const body = {
      status: readiness.ready ? "ready" : "not_ready",
      subsystems: {
        eventStore: eventStoreStatus(readiness),
        feeds: feedStatus(readiness),
      },
      sinkFailures: readiness.sinkFailures,
      timestamp: new Date().toISOString(),
    };
    return c.json(body, readiness.ready ? 200 : 503);
  });

  return routes;
}
