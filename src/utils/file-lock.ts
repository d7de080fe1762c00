import * as lockfile from "proper-lockfile";
import { join } from "node:path";

export type ReleaseLock = () => Promise<void>;

export class StateLockedError extends Error {
  constructor(
    readonly stateDir: string,
    cause: unknown,
  ) {
    super(`State directory ${stateDir} is already owned by another gateway process`, { cause });
    this.name = "StateLockedError";
  }
}

function lockOptions(stateDir: string) {
  return { realpath: false, lockfilePath: join(stateDir, "gateway.lock") };
}

/**
 * Take exclusive ownership of the state directory for the life of the
 * process. Fails immediately when another process holds it.
 */
export async function acquireStateLock(
  stateDir: string,
  onCompromised?: (err: Error) => void,
): Promise<ReleaseLock> {
  try {
    return await lockfile.lock(stateDir, {
      ...lockOptions(stateDir),
      retries: 0,
      ...(onCompromised ? { onCompromised } : {}),
    });
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ELOCKED") {
      throw new StateLockedError(stateDir, err);
    }
    throw err;
  }
}

export async function isStateLocked(stateDir: string): Promise<boolean> {
  return lockfile.check(stateDir, lockOptions(stateDir));
}
