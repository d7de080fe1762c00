import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import pino from "pino";
import { createLogger } from "../../src/logging/logger.js";
import { parseConfig } from "../../src/config/schema.js";
import type { DecoyConfig, SessionsConfig } from "../../src/config/types.js";
import { createServices, type DecoyServices } from "../../src/gateway/services.js";
import type { Logger } from "../../src/logging/logger.js";
import type { ReporterGateway } from "../../src/reporting/reporter.js";
import type { ReportPayload } from "../../src/sessions/types.js";

export function makeDecoyConfig(
  overrides: { sessions?: Partial<SessionsConfig> } & Partial<Omit<DecoyConfig, "sessions">> = {},
): DecoyConfig {
  const base = parseConfig({});
  return {
    ...base,
    ...overrides,
    sessions: { ...base.sessions, ...overrides.sessions },
  };
}

/** A real pino logger that writes nothing. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

/** Logger that keeps every record it writes, parsed, for assertions. */
export function captureLogger(): { logger: Logger; records: () => unknown[] } {
  const lines: string[] = [];
  const logger = createLogger({ level: "debug" }, { write: (line: string) => void lines.push(line) });
  return { logger, records: () => lines.map((line): unknown => JSON.parse(line)) };
}

/** Records every payload and answers from a scripted queue (default: success). */
export class FakeReporter implements ReporterGateway {
  readonly pushed: ReportPayload[] = [];
  private readonly outcomes: boolean[];

  constructor(
    public enabled = true,
    outcomes: boolean[] = [],
  ) {
    this.outcomes = [...outcomes];
  }

  async push(payload: ReportPayload): Promise<boolean> {
    this.pushed.push(payload);
    return this.outcomes.shift() ?? true;
  }
}

export interface TestServices extends DecoyServices {
  dir: string;
  config: DecoyConfig;
  logger: Logger;
  cleanup: () => void;
}

export function makeTestServices(
  options: { config?: DecoyConfig; reporter?: ReporterGateway; logger?: Logger } = {},
): TestServices {
  const dir = mkdtempSync(join(tmpdir(), "decoy-test-"));
  const config = options.config ?? makeDecoyConfig();
  const logger = options.logger ?? silentLogger();
  const services = createServices(config, dir, logger, options.reporter ?? new FakeReporter(false));
  return {
    ...services,
    dir,
    config,
    logger,
    cleanup: () => {
      services.vaultDb.close();
      rmSync(dir, { recursive: true, force: true });
    },
  };
}
