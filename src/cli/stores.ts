import { loadConfig } from "../config/loader.js";
import { ensureDir, getStateDir } from "../config/paths.js";
import type { DecoyConfig } from "../config/types.js";
import { createServices, type DecoyServices } from "../gateway/services.js";
import { createLogger } from "../logging/logger.js";
import { acquireStateLock, type ReleaseLock } from "../utils/file-lock.js";

export interface OpenedStores extends DecoyServices {
  config: DecoyConfig;
  stateDir: string;
  close: () => Promise<void>;
}

/**
 * Open the session stores for a one-shot command. Commands that change
 * state pass `exclusive` and fail while a gateway owns the directory.
 */
export async function openStores(options: { exclusive: boolean }): Promise<OpenedStores> {
  const config = loadConfig();
  const logger = createLogger({ ...config.logging, level: "warn", json: true });
  const stateDir = ensureDir(getStateDir());

  let release: ReleaseLock | null = null;
  if (options.exclusive) {
    release = await acquireStateLock(stateDir);
  }

  const services = createServices(config, stateDir, logger);
  return {
    ...services,
    config,
    stateDir,
    close: async () => {
      services.vaultDb.close();
      await release?.();
    },
  };
}

export function formatTime(ms: number): string {
  return new Date(ms).toISOString();
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
