export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Runs an async operation and captures its outcome as a value, so callers
 * can aggregate failures without try/catch at every site.
 */
export async function settle<T>(operation: () => Promise<T>): Promise<Result<T>> {
  try {
    return { ok: true, value: await operation() };
  } catch (error) {
    return { ok: false, error: toError(error) };
  }
}
