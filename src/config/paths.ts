import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

export function getStateDir(): string {
  return process.env["DECOY_STATE_DIR"] ?? join(homedir(), ".decoy");
}

export function getConfigPath(): string {
  return process.env["DECOY_CONFIG_PATH"] ?? "decoy.config.json";
}

export function ensureDir(dirPath: string): string {
  mkdirSync(dirPath, { recursive: true });
  return dirPath;
}
