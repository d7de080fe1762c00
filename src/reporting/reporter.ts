import type { ReporterConfig } from "../config/types.js";
import { componentLogger, type Logger } from "../logging/logger.js";
import type { ReportPayload } from "../sessions/types.js";
import { retry } from "../utils/retry.js";

/** Outbound client for the external evaluator. `push` never rejects. */
export interface ReporterGateway {
  readonly enabled: boolean;
  push(payload: ReportPayload): Promise<boolean>;
}

export class ReporterHttpError extends Error {
  constructor(readonly status: number) {
    super(`Reporter endpoint responded with HTTP ${status}`);
    this.name = "ReporterHttpError";
  }
}

export interface HttpReporterOptions {
  /** Base delay between attempts; tests shrink it. */
  readonly baseDelayMs?: number;
}

export class HttpReporter implements ReporterGateway {
  readonly enabled: boolean;
  private readonly logger: Logger;

  constructor(
    private readonly config: ReporterConfig,
    logger: Logger,
    private readonly options: HttpReporterOptions = {},
  ) {
    this.enabled = config.enabled;
    this.logger = componentLogger(logger, "reporter");
  }

  async push(payload: ReportPayload): Promise<boolean> {
    if (!this.enabled) return false;

    try {
      await retry(
        async () => {
          const res = await fetch(this.config.endpoint, {
            method: "POST",
            headers: { "Content-Type": "application/json" },
            body: JSON.stringify(payload),
            signal: AbortSignal.timeout(this.config.timeoutMs),
          });
          if (!res.ok) throw new ReporterHttpError(res.status);
        },
        {
          maxAttempts: this.config.maxAttempts,
          baseDelayMs: this.options.baseDelayMs,
          onRetry: (attempt, err) => {
            this.logger.warn(
              { err, sessionId: payload.sessionId, attempt: attempt + 1 },
              "Report push failed, retrying",
            );
          },
        },
      );
      this.logger.info({ sessionId: payload.sessionId }, "Report pushed");
      return true;
    } catch (err) {
      this.logger.error({ err, sessionId: payload.sessionId }, "Report push failed");
      return false;
    }
  }
}
