import type { SessionsConfig } from "../config/types.js";
import type { GatewayMetrics } from "../gateway/metrics.js";
import { componentLogger, type Logger } from "../logging/logger.js";
import type { ReporterGateway } from "../reporting/reporter.js";
import type { ActiveSessionStore } from "./active-store.js";
import type { ArchiveStore } from "./archive-store.js";
import { StorageError } from "./errors.js";
import type { ScamIntelStore } from "./intel-store.js";

export type FinalizeResult =
  | {
      readonly status: "finalized";
      readonly sessionId: string;
      readonly isScam: boolean;
      readonly scamFlags: number;
      readonly totalMessages: number;
      /** null when no push was attempted. */
      readonly reported: boolean | null;
    }
  | { readonly status: "not_found"; readonly sessionId: string };

export type PushStats =
  | { readonly enabled: false }
  | {
      readonly enabled: true;
      readonly total: number;
      readonly success: number;
      readonly failed: number;
    };

export interface FinalizationEngineDeps {
  active: ActiveSessionStore;
  archive: ArchiveStore;
  intel: ScamIntelStore;
  reporter: ReporterGateway;
  logger: Logger;
  config: Pick<SessionsConfig, "timeoutMs">;
  metrics?: GatewayMetrics;
}

/**
 * Moves sessions out of the active store. Storage steps run synchronously
 * one after another; the optional report push happens afterwards.
 */
export class FinalizationEngine {
  private readonly active: ActiveSessionStore;
  private readonly archive: ArchiveStore;
  private readonly intel: ScamIntelStore;
  private readonly reporter: ReporterGateway;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly metrics: GatewayMetrics | undefined;

  constructor(deps: FinalizationEngineDeps) {
    this.active = deps.active;
    this.archive = deps.archive;
    this.intel = deps.intel;
    this.reporter = deps.reporter;
    this.logger = componentLogger(deps.logger, "finalizer");
    this.timeoutMs = deps.config.timeoutMs;
    this.metrics = deps.metrics;
  }

  async finalize(sessionId: string, pushExternal: boolean): Promise<FinalizeResult> {
    let result: Extract<FinalizeResult, { status: "finalized" }>;
    try {
      const session = this.active.getFullSession(sessionId);
      if (!session) return { status: "not_found", sessionId };

      // Scam snapshot first, then archive, then clear
      if (session.isConfirmedScam) {
        this.intel.upsert(sessionId, session);
      }
      this.archive.upsert(sessionId, session);
      this.active.clear(sessionId);

      result = {
        status: "finalized",
        sessionId,
        isScam: session.isConfirmedScam,
        scamFlags: session.scamFlags,
        totalMessages: session.messages.length,
        reported: null,
      };
    } catch (err) {
      this.logger.error({ err, sessionId }, "Failed to finalize session");
      throw err;
    }

    this.metrics?.inc("sessionsFinalized");
    if (result.isScam) this.metrics?.inc("scamsFinalized");
    this.logger.info(
      { sessionId, isScam: result.isScam, totalMessages: result.totalMessages },
      "Session finalized",
    );

    if (result.isScam && pushExternal && this.reporter.enabled) {
      return { ...result, reported: await this.pushOne(sessionId) };
    }
    return result;
  }

  /** Finalizes every session idle for longer than the timeout. Never pushes. */
  async finalizeTimedOut(now = Date.now()): Promise<number> {
    const idle = this.active.listIdleSince(now - this.timeoutMs);
    let count = 0;

    for (const sessionId of idle) {
      try {
        const result = await this.finalize(sessionId, false);
        if (result.status === "finalized") count++;
      } catch (err) {
        if (!(err instanceof StorageError)) throw err;
        // already logged by finalize; move on to the next session
      }
    }

    return count;
  }

  async pushPending(): Promise<PushStats> {
    if (!this.reporter.enabled) return { enabled: false };

    const pending = this.intel.listPending();
    let success = 0;
    for (const sessionId of pending) {
      if (await this.pushOne(sessionId)) success++;
    }

    const stats = {
      enabled: true,
      total: pending.length,
      success,
      failed: pending.length - success,
    } as const;
    this.logger.info(stats, "Pending reports pushed");
    return stats;
  }

  /** Push one stored record; a failure leaves it pending. */
  private async pushOne(sessionId: string): Promise<boolean> {
    const payload = this.intel.getPayload(sessionId);
    if (!payload) return false;

    const ok = await this.reporter.push(payload);
    if (!ok) {
      this.metrics?.inc("reportsFailed");
      return false;
    }

    try {
      this.intel.markPushed(sessionId);
    } catch (err) {
      this.logger.error({ err, sessionId }, "Report delivered but could not be marked pushed");
      return false;
    }
    this.metrics?.inc("reportsPushed");
    return true;
  }
}
