/**
 * Prometheus text exposition without prom-client.
 *
 * Families are rendered in the order they were first used. The HTTP
 * middleware feeds `http_requests_total` and
 * `http_request_duration_seconds`; the service adds business counters
 * such as `tallyvault_operations_total`.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

type Labels = Readonly<Record<string, string>>;

interface CounterSeries {
  readonly labels: Labels;
  value: number;
}

interface HistogramSeries {
  readonly labels: Labels;
  /** cumulative count per upper bound, aligned with the family's bounds */
  readonly counts: number[];
  sum: number;
  count: number;
}

type Family =
  | { readonly kind: "counter"; help: string; readonly series: Map<string, CounterSeries> }
  | { readonly kind: "histogram"; help: string; readonly series: Map<string, HistogramSeries> };

const HTTP_REQUESTS = "http_requests_total";
const HTTP_DURATION = "http_request_duration_seconds";
const DEFAULT_HELP = "Business metric counter";
const DEFAULT_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5];

function escapeLabel(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}

/** `a="1",b="2"` with keys sorted, so label order never splits a series. */
function seriesKey(labels: Labels): string {
  return Object.keys(labels)
    .sort()
    .map((name) => `${name}="${escapeLabel(labels[name] ?? "")}"`)
    .join(",");
}

function sample(name: string, key: string, value: number): string {
  return key.length > 0 ? `${name}{${key}} ${String(value)}` : `${name} ${String(value)}`;
}

export class MetricsCollector {
  private readonly _families = new Map<string, Family>();
  private readonly _bounds: readonly number[];

  constructor(buckets: readonly number[] = DEFAULT_BUCKETS) {
    this._bounds = [...buckets].sort((a, b) => a - b);
    this.describeCounter(HTTP_REQUESTS, "Total HTTP requests");
    this._histogram(HTTP_DURATION).help = "HTTP request duration in seconds";
  }

  recordRequest(method: string, path: string, status: number, durationMs: number): void {
    this.incrementCounter(HTTP_REQUESTS, { method, path, status: String(status) });
    this.observe(HTTP_DURATION, { method, path }, durationMs / 1000);
  }

  describeCounter(name: string, help: string): void {
    this._counter(name).help = help;
  }

  incrementCounter(name: string, labels: Labels = {}): void {
    const { series } = this._counter(name);
    const key = seriesKey(labels);
    const entry = series.get(key);
    if (entry === undefined) {
      series.set(key, { labels: { ...labels }, value: 1 });
    } else {
      entry.value++;
    }
  }

  /** 0 for a series that was never incremented. */
  counterValue(name: string, labels: Labels = {}): number {
    const family = this._families.get(name);
    if (family?.kind !== "counter") {
      return 0;
    }
    return family.series.get(seriesKey(labels))?.value ?? 0;
  }

  observe(name: string, labels: Labels, value: number): void {
    const { series } = this._histogram(name);
    const key = seriesKey(labels);
    let entry = series.get(key);
    if (entry === undefined) {
      entry = { labels: { ...labels }, counts: this._bounds.map(() => 0), sum: 0, count: 0 };
      series.set(key, entry);
    }
    entry.sum += value;
    entry.count++;
    for (const [i, bound] of this._bounds.entries()) {
      if (value <= bound) {
        entry.counts[i] = (entry.counts[i] ?? 0) + 1;
      }
    }
  }

  render(): string {
    const lines: string[] = [];
    for (const [name, family] of this._families) {
      lines.push(`# HELP ${name} ${family.help}`, `# TYPE ${name} ${family.kind}`);
      if (family.kind === "counter") {
        for (const [key, { value }] of family.series) {
          lines.push(sample(name, key, value));
        }
        continue;
      }
      for (const [key, entry] of family.series) {
        const prefix = key.length > 0 ? `${key},` : "";
        for (const [i, bound] of this._bounds.entries()) {
          lines.push(sample(`${name}_bucket`, `${prefix}le="${String(bound)}"`, entry.counts[i] ?? 0));
        }
        lines.push(sample(`${name}_bucket`, `${prefix}le="+Inf"`, entry.count));
        lines.push(sample(`${name}_sum`, key, entry.sum));
        lines.push(sample(`${name}_count`, key, entry.count));
      }
    }
    return lines.join("\n") + "\n";
  }

  /** Drop every series; families and their HELP text stay registered. */
  clear(): void {
    for (const family of this._families.values()) {
      family.series.clear();
    }
  }

  private _counter(name: string): Extract<Family, { kind: "counter" }> {
    const existing = this._families.get(name);
    if (existing?.kind === "counter") {
      return existing;
    }
    if (existing !== undefined) {
      throw new Error(`Metric ${name} is already registered as a ${existing.kind}`);
    }
    const family: Extract<Family, { kind: "counter" }> = {
      kind: "counter",
      help: DEFAULT_HELP,
      series: new Map(),
    };
    this._families.set(name, family);
    return family;
  }

  private _histogram(name: string): Extract<Family, { kind: "histogram" }> {
    const existing = this._families.get(name);
    if (existing?.kind === "histogram") {
      return existing;
    }
    if (existing !== undefined) {
      throw new Error(`Metric ${name} is already registered as a ${existing.kind}`);
    }
    const family: Extract<Family, { kind: "histogram" }> = {
      kind: "histogram",
      help: "Histogram",
      series: new Map(),
    };
    this._families.set(name, family);
    return family;
  }
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Collapse per-user path segments so label cardinality stays bounded.
 *
 * /api/v1/accounts/alice/balances/0xabc → /api/v1/accounts/:user/balances/:asset
 */
export function normalizePath(path: string): string {
  return path
    .replace(/^(\/api\/v1\/accounts)\/[^/]+/, "$1/:user")
    .replace(/^(\/api\/v1\/accounts\/:user\/balances)\/[^/]+/, "$1/:asset");
}

export function metricsMiddleware(
  collector: MetricsCollector,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();
    await next();
    const durationMs = performance.now() - start;

    collector.recordRequest(
      c.req.method,
      normalizePath(c.req.path),
      c.res.status,
      durationMs,
    );
  };
}
