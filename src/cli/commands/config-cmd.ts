import { Command, Option } from "clipanion";
import { readFileSync } from "node:fs";
import { loadConfig, substituteEnv } from "../../config/loader.js";
import { getConfigPath } from "../../config/paths.js";
import { parseConfig } from "../../config/schema.js";
import { errorMessage } from "../stores.js";

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show the effective configuration (API key redacted)",
    examples: [["Show config", "decoy config show"]],
  });

  async execute(): Promise<void> {
    let config;
    try {
      config = loadConfig();
    } catch (err) {
      this.context.stdout.write(`Failed to load config: ${errorMessage(err)}\n`);
      process.exitCode = 1;
      return;
    }

    const redacted = {
      ...config,
      gateway: {
        ...config.gateway,
        ...(config.gateway.apiKey ? { apiKey: "***REDACTED***" } : {}),
      },
    };
    this.context.stdout.write(JSON.stringify(redacted, null, 2) + "\n");
  }
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "decoy config validate"],
      ["Validate specific file", "decoy config validate ./my-config.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<void> {
    const configPath = this.configFile ?? getConfigPath();

    let content: string;
    try {
      content = readFileSync(configPath, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        this.context.stdout.write(`Config file not found: ${configPath}\n`);
        process.exitCode = 1;
        return;
      }
      throw err;
    }

    try {
      const raw: unknown = JSON.parse(substituteEnv(content));
      parseConfig(raw);
      this.context.stdout.write(`Config is valid: ${configPath}\n`);
    } catch (err) {
      this.context.stdout.write(`Config is INVALID: ${configPath}\n  ${errorMessage(err)}\n`);
      process.exitCode = 1;
    }
  }
}
