import { describe, it, expect } from "vitest";
import { GatewayMetrics } from "../../src/gateway/metrics.js";

describe("GatewayMetrics", () => {
  it("starts every counter at zero", () => {
    const metrics = new GatewayMetrics(0);
    expect(metrics.get("requests")).toBe(0);
    expect(metrics.get("reportsFailed")).toBe(0);
  });

  it("increments counters", () => {
    const metrics = new GatewayMetrics(0);
    metrics.inc("turns");
    metrics.inc("turns", 2);
    expect(metrics.get("turns")).toBe(3);
  });

  it("measures uptime from construction", () => {
    const metrics = new GatewayMetrics(1_000);
    expect(metrics.uptimeMs(4_500)).toBe(3_500);
  });

  it("renders counters and gauges in exposition format", () => {
    const metrics = new GatewayMetrics(0);
    metrics.inc("scamsFinalized");
    const lines = metrics.render({ activeSessions: 4, pendingReports: 2 }, 61_400).split("\n");

    expect(lines).toContain("# TYPE decoy_scams_finalized_total counter");
    expect(lines).toContain("decoy_scams_finalized_total 1");
    expect(lines).toContain("decoy_http_requests_total 0");
    expect(lines).toContain("decoy_active_sessions 4");
    expect(lines).toContain("decoy_pending_reports 2");
    expect(lines).toContain("decoy_uptime_seconds 61");
    expect(lines.at(-1)).toBe("");
  });
});
