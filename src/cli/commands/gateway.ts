import { Command, Option } from "clipanion";
import { startGateway } from "../../gateway/lifecycle.js";
import { printBanner } from "../banner.js";
import { VERSION } from "../version.js";
import { errorMessage } from "../stores.js";

export class GatewayRunCommand extends Command {
  static override paths = [["gateway", "run"], Command.Default];

  static override usage = Command.Usage({
    description: "Start the decoy gateway (HTTP API and timeout sweeper)",
    examples: [
      ["Start with default config", "decoy gateway run"],
      ["Start with custom config", "decoy gateway run --config ./my-config.json"],
    ],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<void> {
    printBanner(VERSION);

    try {
      await startGateway(this.config, VERSION);
    } catch (err) {
      this.context.stderr.write(`Failed to start gateway: ${errorMessage(err)}\n`);
      process.exitCode = 1;
      return;
    }
    // Runs until a shutdown signal exits the process
    await new Promise<never>(() => {});
  }
}
