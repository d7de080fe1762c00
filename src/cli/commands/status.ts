import { Command } from "clipanion";
import { existsSync } from "node:fs";
import { loadConfig } from "../../config/loader.js";
import { getConfigPath, getStateDir } from "../../config/paths.js";
import { isStateLocked } from "../../utils/file-lock.js";
import { errorMessage, openStores } from "../stores.js";

export class StatusCommand extends Command {
  static override paths = [["status"]];

  static override usage = Command.Usage({
    description: "Show configuration and session store counts",
    examples: [["Show status", "decoy status"]],
  });

  async execute(): Promise<void> {
    const configPath = getConfigPath();
    const stateDir = getStateDir();

    let config;
    try {
      config = loadConfig();
    } catch (err) {
      this.context.stdout.write(`Config: INVALID (${configPath})\n`);
      this.context.stdout.write(`  Error: ${errorMessage(err)}\n`);
      process.exitCode = 1;
      return;
    }

    this.context.stdout.write(`Decoy Gateway Status\n`);
    this.context.stdout.write(`--------------------\n`);
    this.context.stdout.write(`Config path: ${configPath}\n`);
    this.context.stdout.write(`State dir:   ${stateDir}\n`);
    this.context.stdout.write(`Gateway:     ${config.gateway.hostname}:${config.gateway.port}\n`);
    this.context.stdout.write(
      `API key:     ${config.gateway.apiKey ? "required" : "not configured"}\n`,
    );
    this.context.stdout.write(
      `Sessions:    confirm at ${config.sessions.confirmThreshold} flag(s), ` +
        `timeout ${Math.round(config.sessions.timeoutMs / 1000)}s\n`,
    );
    this.context.stdout.write(
      `Reporter:    ${config.reporter.enabled ? config.reporter.endpoint : "disabled"}\n`,
    );

    if (!existsSync(stateDir)) {
      this.context.stdout.write(`Stores:      (state dir not created yet)\n`);
      return;
    }

    const running = await isStateLocked(stateDir);
    this.context.stdout.write(`Running:     ${running ? "yes" : "no"}\n`);

    const stores = await openStores({ exclusive: false });
    try {
      this.context.stdout.write(
        `Stores:      ${stores.active.count()} active, ${stores.archive.count()} archived, ` +
          `${stores.intel.listPending().length} pending report(s)\n`,
      );
    } finally {
      await stores.close();
    }
  }
}
