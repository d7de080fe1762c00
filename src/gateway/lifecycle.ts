import { loadConfig } from "../config/loader.js";
import { getStateDir, ensureDir } from "../config/paths.js";
import type { DecoyConfig } from "../config/types.js";
import { componentLogger, createLogger, type Logger } from "../logging/logger.js";
import { KeywordRiskScorer } from "../analysis/risk-scorer.js";
import { PatternResponder } from "../analysis/responder.js";
import { TimeoutSweeper } from "../sessions/sweeper.js";
import { acquireStateLock } from "../utils/file-lock.js";
import { ApiServer } from "./server.js";
import { createServices, type DecoyServices } from "./services.js";
import { TurnProcessor } from "./turn.js";

export interface GatewayContext extends DecoyServices {
  config: DecoyConfig;
  logger: Logger;
  turns: TurnProcessor;
  sweeper: TimeoutSweeper;
  server: ApiServer;
  shutdown: () => Promise<void>;
}

export async function startGateway(
  configPath?: string,
  version = "0.0.0",
): Promise<GatewayContext> {
  // 1. Load config
  const config = loadConfig(configPath);

  // 2. Create logger
  const rootLogger = createLogger(config.logging);
  const logger = componentLogger(rootLogger, "gateway");
  logger.info("Starting decoy gateway...");

  // 3. Claim the state directory
  const stateDir = ensureDir(getStateDir());
  const releaseLock = await acquireStateLock(stateDir, (err) => {
    logger.error({ err, stateDir }, "State directory lock compromised");
  });

  // 4. Stores, reporter and finalization engine
  const services = createServices(config, stateDir, rootLogger);
  logger.info(
    { stateDir, activeSessions: services.active.count(), reporter: services.reporter.enabled },
    "Session stores opened",
  );

  // 5. Turn pipeline
  const turns = new TurnProcessor({
    active: services.active,
    scorer: new KeywordRiskScorer(),
    generator: new PatternResponder(),
    logger: rootLogger,
    config: config.sessions,
    metrics: services.metrics,
  });

  // 6. HTTP surface
  const server = new ApiServer({
    ...services,
    turns,
    logger: rootLogger,
    config: config.gateway,
    version,
  });
  await server.start();
  logger.info(
    { port: config.gateway.port, hostname: config.gateway.hostname },
    "API server started",
  );

  // 7. Timeout sweeper
  const sweeper = new TimeoutSweeper({
    engine: services.engine,
    logger: rootLogger,
    intervalMs: config.sessions.sweepIntervalMs,
  });
  sweeper.start();

  // 8. Graceful shutdown (use 'once' to avoid handler accumulation)
  const SHUTDOWN_TIMEOUT_MS = 15_000;
  let shutdownInProgress = false;

  const shutdown = async () => {
    if (shutdownInProgress) return;
    shutdownInProgress = true;
    logger.info("Shutting down gracefully...");

    const forceExit = setTimeout(() => {
      logger.warn("Shutdown timeout reached, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    sweeper.stop();
    await server.stop();
    services.vaultDb.close();
    try {
      await releaseLock();
    } catch (err) {
      logger.error({ err }, "Failed to release state directory lock");
    }

    clearTimeout(forceExit);
    logger.info("Shutdown complete");
  };

  const onSignal = () => {
    shutdown()
      .then(() => process.exit(0))
      .catch((err) => {
        logger.error({ err }, "Shutdown failed");
        process.exit(1);
      });
  };
  process.once("SIGTERM", onSignal);
  process.once("SIGINT", onSignal);

  logger.info("Decoy gateway started");
  return { ...services, config, logger, turns, sweeper, server, shutdown };
}
