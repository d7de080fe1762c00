import { Command } from "clipanion";
import { accessSync, constants, mkdirSync } from "node:fs";
import { loadConfig } from "../../config/loader.js";
import { getConfigPath, getStateDir } from "../../config/paths.js";
import type { DecoyConfig } from "../../config/types.js";
import { isStateLocked } from "../../utils/file-lock.js";
import { VaultDB } from "../../vault/db.js";
import { errorMessage } from "../stores.js";

export class DoctorCommand extends Command {
  static override paths = [["doctor"]];

  static override usage = Command.Usage({
    description: "Run diagnostic checks on the decoy configuration and environment",
    examples: [["Run diagnostics", "decoy doctor"]],
  });

  async execute(): Promise<void> {
    this.context.stdout.write("Decoy Doctor\n");
    this.context.stdout.write("============\n\n");

    let allPassed = true;
    const fail = (line: string) => {
      this.context.stdout.write(`[FAIL] ${line}\n`);
      allPassed = false;
    };
    const pass = (line: string) => this.context.stdout.write(`[PASS] ${line}\n`);

    // Check 1: Config valid
    const configPath = getConfigPath();
    let config: DecoyConfig | null = null;
    try {
      config = loadConfig();
      pass(`Config valid (${configPath})`);
    } catch (err) {
      fail(`Config invalid (${configPath}): ${errorMessage(err)}`);
    }

    // Check 2: State dir exists and writable
    const stateDir = getStateDir();
    let writable = false;
    try {
      mkdirSync(stateDir, { recursive: true });
      accessSync(stateDir, constants.W_OK);
      writable = true;
      pass(`State dir writable (${stateDir})`);
    } catch (err) {
      fail(`State dir not writable (${stateDir}): ${errorMessage(err)}`);
    }

    // Check 3: SQLite stores open
    if (writable) {
      try {
        const vaultDb = new VaultDB(stateDir);
        vaultDb.close();
        pass("Session stores open (active.db, archive.db, intel.db)");
      } catch (err) {
        fail(`Session stores failed to open: ${errorMessage(err)}`);
      }

      const running = await isStateLocked(stateDir);
      this.context.stdout.write(
        `[INFO] Gateway ${running ? "currently owns" : "is not running on"} the state dir\n`,
      );
    }

    // Check 4: Reporter reachable
    if (config?.reporter.enabled) {
      const { endpoint, timeoutMs } = config.reporter;
      try {
        const res = await fetch(endpoint, { method: "HEAD", signal: AbortSignal.timeout(timeoutMs) });
        pass(`Reporter endpoint reachable (${endpoint}, HTTP ${res.status})`);
      } catch (err) {
        fail(`Reporter endpoint not reachable (${endpoint}): ${errorMessage(err)}`);
      }
    } else if (config) {
      this.context.stdout.write("[INFO] Reporter disabled\n");
    }

    this.context.stdout.write("\n");
    if (allPassed) {
      this.context.stdout.write("All checks passed.\n");
    } else {
      this.context.stdout.write("Some checks failed.\n");
      process.exitCode = 1;
    }
  }
}
