export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: Error };

/**
 * Runs a fallible async operation and reports how it went instead of throwing.
 * Non-Error rejections are wrapped so callers always get an Error.
 */
export async function attempt<T>(operation: () => Promise<T>): Promise<Outcome<T>> {
  try {
    return { ok: true, value: await operation() };
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err : new Error(String(err)) };
  }
}

/**
 * Unwraps an outcome, substituting `fallback(error)` when it failed.
 */
export function withFallback<T, F>(outcome: Outcome<T>, fallback: (error: Error) => F): T | F {
  return outcome.ok ? outcome.value : fallback(outcome.error);
}
