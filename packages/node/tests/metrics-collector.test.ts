/**
 * Tests for MetricsCollector and path normalization.
 */

import { describe, it, expect } from "vitest";
import { MetricsCollector, normalizePath } from "../src/middleware/metrics.js";

describe("MetricsCollector", () => {
  it("renders request counters and histograms", () => {
    const collector = new MetricsCollector([0.01, 0.1]);

    collector.recordRequest("GET", "/health", 200, 5);
    collector.recordRequest("POST", "/api/v1/deposits", 201, 50);
    collector.recordRequest("GET", "/health", 200, 3);

    const lines = collector.render().split("\n");

    expect(lines).toContain('http_requests_total{method="GET",path="/health",status="200"} 2');
    expect(lines).toContain('http_requests_total{method="POST",path="/api/v1/deposits",status="201"} 1');
    expect(lines).toContain('http_request_duration_seconds_bucket{method="GET",path="/health",le="0.01"} 2');
    expect(lines).toContain('http_request_duration_seconds_bucket{method="POST",path="/api/v1/deposits",le="0.01"} 0');
    expect(lines).toContain('http_request_duration_seconds_bucket{method="POST",path="/api/v1/deposits",le="0.1"} 1');
    expect(lines).toContain('http_request_duration_seconds_count{method="GET",path="/health"} 2');
  });

  it("renders named counters with sorted labels and HELP text", () => {
    const collector = new MetricsCollector();
    collector.describeCounter("tallyvault_operations_total", "Custody mutations");

    collector.incrementCounter("tallyvault_operations_total", { outcome: "success", operation: "deposit" });
    collector.incrementCounter("tallyvault_operations_total", { operation: "deposit", outcome: "success" });
    collector.incrementCounter("tallyvault_operations_total", { operation: "withdraw", outcome: "INSUFFICIENT_BALANCE" });

    const lines = collector.render().split("\n");

    expect(lines).toContain("# HELP tallyvault_operations_total Custody mutations");
    expect(lines).toContain('tallyvault_operations_total{operation="deposit",outcome="success"} 2');
    expect(lines).toContain('tallyvault_operations_total{operation="withdraw",outcome="INSUFFICIENT_BALANCE"} 1');
    expect(collector.counterValue("tallyvault_operations_total", { operation: "deposit", outcome: "success" })).toBe(2);
  });

  it("renders a counter without labels bare", () => {
    const collector = new MetricsCollector();
    collector.incrementCounter("restarts_total");

    expect(collector.render().split("\n")).toContain("restarts_total 1");
  });

  it("escapes quotes in label values", () => {
    const collector = new MetricsCollector();
    collector.incrementCounter("x_total", { reason: 'say "hi"' });

    expect(collector.render().split("\n")).toContain('x_total{reason="say \\"hi\\""} 1');
  });

  it("clear() drops every series but keeps the families", () => {
    const collector = new MetricsCollector();
    collector.recordRequest("GET", "/health", 200, 1);
    collector.describeCounter("x_total", "Things");
    collector.incrementCounter("x_total");
    collector.clear();

    expect(collector.render()).toBe(
      [
        "# HELP http_requests_total Total HTTP requests",
        "# TYPE http_requests_total counter",
        "# HELP http_request_duration_seconds HTTP request duration in seconds",
        "# TYPE http_request_duration_seconds histogram",
        "# HELP x_total Things",
        "# TYPE x_total counter",
        "",
      ].join("\n"),
    );
    expect(collector.counterValue("x_total")).toBe(0);
  });
});

describe("MetricsCollector families", () => {
  it("renders sum and count for a custom histogram", () => {
    const collector = new MetricsCollector([1]);
    collector.observe("batch_seconds", {}, 0.5);
    collector.observe("batch_seconds", {}, 2);

    const lines = collector.render().split("\n");

    expect(lines).toContain('batch_seconds_bucket{le="1"} 1');
    expect(lines).toContain('batch_seconds_bucket{le="+Inf"} 2');
    expect(lines).toContain("batch_seconds_sum 2.5");
    expect(lines).toContain("batch_seconds_count 2");
  });

  it("refuses to reuse a counter name for a histogram", () => {
    const collector = new MetricsCollector();
    collector.incrementCounter("jobs_total");

    expect(() => collector.observe("jobs_total", {}, 1)).toThrow(
      "Metric jobs_total is already registered as a counter",
    );
  });
});

describe("normalizePath", () => {
  it("collapses account and asset segments", () => {
    expect(normalizePath("/api/v1/accounts/alice/balances")).toBe("/api/v1/accounts/:user/balances");
    expect(normalizePath("/api/v1/accounts/alice/balances/0xaa")).toBe(
      "/api/v1/accounts/:user/balances/:asset",
    );
    expect(normalizePath("/api/v1/accounts/bob/counters")).toBe("/api/v1/accounts/:user/counters");
  });

  it("leaves other paths alone", () => {
    expect(normalizePath("/api/v1/deposits")).toBe("/api/v1/deposits");
  });
});
