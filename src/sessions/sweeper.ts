import { componentLogger, type Logger } from "../logging/logger.js";
import type { FinalizationEngine } from "./finalizer.js";

export interface TimeoutSweeperDeps {
  engine: Pick<FinalizationEngine, "finalizeTimedOut">;
  logger: Logger;
  intervalMs: number;
}

export class TimeoutSweeper {
  private readonly engine: Pick<FinalizationEngine, "finalizeTimedOut">;
  private readonly logger: Logger;
  private readonly intervalMs: number;
  private timer: ReturnType<typeof setInterval> | null = null;
  private running = false;

  constructor(deps: TimeoutSweeperDeps) {
    this.engine = deps.engine;
    this.logger = componentLogger(deps.logger, "sweeper");
    this.intervalMs = deps.intervalMs;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.tick().catch((err) => {
        this.logger.error({ err }, "Timeout sweep error");
      });
    }, this.intervalMs);
    this.timer.unref();
    this.logger.info({ intervalMs: this.intervalMs }, "Timeout sweeper started");
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.logger.info("Timeout sweeper stopped");
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /** One sweep. Overlapping ticks are skipped. */
  async tick(): Promise<number> {
    if (this.running) return 0;
    this.running = true;
    try {
      const count = await this.engine.finalizeTimedOut();
      if (count > 0) {
        this.logger.info({ count }, "Timed-out sessions finalized");
      } else {
        this.logger.debug("No timed-out sessions");
      }
      return count;
    } finally {
      this.running = false;
    }
  }
}
