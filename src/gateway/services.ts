import type { DecoyConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { HttpReporter, type ReporterGateway } from "../reporting/reporter.js";
import { ActiveSessionStore } from "../sessions/active-store.js";
import { ArchiveStore } from "../sessions/archive-store.js";
import { FinalizationEngine } from "../sessions/finalizer.js";
import { ScamIntelStore } from "../sessions/intel-store.js";
import { VaultDB } from "../vault/db.js";
import { GatewayMetrics } from "./metrics.js";

export interface DecoyServices {
  vaultDb: VaultDB;
  active: ActiveSessionStore;
  archive: ArchiveStore;
  intel: ScamIntelStore;
  reporter: ReporterGateway;
  engine: FinalizationEngine;
  metrics: GatewayMetrics;
}

/** Open the stores under `stateDir` and wire the finalization engine to them. */
export function createServices(
  config: DecoyConfig,
  stateDir: string,
  logger: Logger,
  reporter: ReporterGateway = new HttpReporter(config.reporter, logger),
): DecoyServices {
  const vaultDb = new VaultDB(stateDir);
  const active = new ActiveSessionStore(vaultDb, {
    confirmThreshold: config.sessions.confirmThreshold,
    defaults: config.sessions.defaults,
  });
  const archive = new ArchiveStore(vaultDb);
  const intel = new ScamIntelStore(vaultDb);
  const metrics = new GatewayMetrics();
  const engine = new FinalizationEngine({
    active,
    archive,
    intel,
    reporter,
    logger,
    config: config.sessions,
    metrics,
  });

  return { vaultDb, active, archive, intel, reporter, engine, metrics };
}
