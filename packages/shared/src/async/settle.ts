export type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * Runs a best-effort side effect and reports its outcome instead of throwing.
 * The caller decides whether to log the failure; it is never rethrown.
 */
export async function settle<T>(operation: Promise<T> | (() => Promise<T>)): Promise<Settled<T>> {
  try {
    const value = await (typeof operation === 'function' ? operation() : operation);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, error };
  }
}
