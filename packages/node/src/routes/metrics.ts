/**
 * GET /metrics in the Prometheus text exposition format.
 *
 * Request and operation counters come from the collector; the gauges
 * below are read from the service on every scrape.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { MetricsCollector } from "../middleware/metrics.js";
import type { CustodyService } from "../services/custody-service.js";

export const PROMETHEUS_CONTENT_TYPE = "text/plain; version=0.0.4; charset=utf-8";

interface Gauge {
  readonly name: string;
  readonly help: string;
  readonly read: (service: CustodyService) => number;
}

const GAUGES: readonly Gauge[] = [
  {
    name: "tallyvault_pending_operations",
    help: "Mutations queued or running",
    read: (service) => service.pendingOperations,
  },
  {
    name: "tallyvault_event_log_position",
    help: "Global position of the last stored event",
    read: (service) => service.eventStore.globalPosition(),
  },
  {
    name: "tallyvault_sink_failures",
    help: "Custody events the event store refused",
    read: (service) => service.sinkFailures,
  },
];

function renderGauges(service: CustodyService): string {
  return GAUGES.flatMap((gauge) => [
    `# HELP ${gauge.name} ${gauge.help}`,
    `# TYPE ${gauge.name} gauge`,
    `${gauge.name} ${String(gauge.read(service))}`,
  ]).join("\n") + "\n";
}

export function createMetricsRoute(
  collector: MetricsCollector,
  service: CustodyService,
): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/metrics", (c) =>
    c.text(collector.render() + renderGauges(service), 200, {
      "Content-Type": PROMETHEUS_CONTENT_TYPE,
    }),
  );

  return routes;
}
