export type CounterName =
  | "requests"
  | "turns"
  | "flaggedTurns"
  | "sessionsFinalized"
  | "scamsFinalized"
  | "reportsPushed"
  | "reportsFailed";

const COUNTER_HELP: Record<CounterName, [metric: string, help: string]> = {
  requests: ["decoy_http_requests_total", "HTTP requests received"],
  turns: ["decoy_turns_total", "Inbound turns processed"],
  flaggedTurns: ["decoy_flagged_turns_total", "Inbound turns flagged by the risk scorer"],
  sessionsFinalized: ["decoy_sessions_finalized_total", "Sessions moved to the archive"],
  scamsFinalized: ["decoy_scams_finalized_total", "Confirmed scam sessions finalized"],
  reportsPushed: ["decoy_reports_pushed_total", "Reports accepted by the external evaluator"],
  reportsFailed: ["decoy_reports_failed_total", "Report pushes that failed"],
};

const COUNTERS: readonly CounterName[] = [
  "requests",
  "turns",
  "flaggedTurns",
  "sessionsFinalized",
  "scamsFinalized",
  "reportsPushed",
  "reportsFailed",
];

/** Process-local counters rendered in Prometheus text format. */
export class GatewayMetrics {
  private readonly counters = new Map<CounterName, number>();
  private readonly startedAt: number;

  constructor(now = Date.now()) {
    this.startedAt = now;
  }

  inc(name: CounterName, by = 1): void {
    this.counters.set(name, this.get(name) + by);
  }

  get(name: CounterName): number {
    return this.counters.get(name) ?? 0;
  }

  uptimeMs(now = Date.now()): number {
    return now - this.startedAt;
  }

  render(gauges: { activeSessions: number; pendingReports: number }, now = Date.now()): string {
    const lines: string[] = [];
    for (const name of COUNTERS) {
      const [metric, help] = COUNTER_HELP[name];
      lines.push(`# HELP ${metric} ${help}`, `# TYPE ${metric} counter`, `${metric} ${this.get(name)}`);
    }
    lines.push(
      "# HELP decoy_active_sessions Sessions currently in progress",
      "# TYPE decoy_active_sessions gauge",
      `decoy_active_sessions ${gauges.activeSessions}`,
      "# HELP decoy_pending_reports Scam records not yet reported",
      "# TYPE decoy_pending_reports gauge",
      `decoy_pending_reports ${gauges.pendingReports}`,
      "# HELP decoy_uptime_seconds Gateway uptime in seconds",
      "# TYPE decoy_uptime_seconds gauge",
      `decoy_uptime_seconds ${Math.round(this.uptimeMs(now) / 1000)}`,
    );
    return lines.join("\n") + "\n";
  }
}
