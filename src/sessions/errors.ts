export class StorageError extends Error {
  readonly sessionId: string | null;
  readonly operation: string;

  constructor(operation: string, sessionId: string | null, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Storage failure during ${operation}${sessionId ? ` for ${sessionId}` : ""}: ${detail}`, {
      cause,
    });
    this.name = "StorageError";
    this.operation = operation;
    this.sessionId = sessionId;
  }
}

/** Run a storage call, rethrowing anything it raises as a StorageError. */
export function guardStorage<T>(
  operation: string,
  sessionId: string | null,
  fn: () => T,
): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof StorageError) throw err;
    throw new StorageError(operation, sessionId, err);
  }
}
