/**
 * Backend results
 *
 * Optional backends (embedding model, generative model, graph store) report
 * failure as a value so the caller decides the fallback explicitly.
 *
 * @module utils/result
 */

export type BackendName = 'embedding' | 'generation' | 'graph';

export class BackendError extends Error {
  constructor(
    public readonly backend: BackendName,
    message: string,
    public readonly original?: unknown
  ) {
    super(message);
    this.name = 'BackendError';
    Error.captureStackTrace?.(this, BackendError);
  }
}

export type BackendResult<T> = { ok: true; value: T } | { ok: false; error: BackendError };

export function ok<T>(value: T): BackendResult<T> {
  return { ok: true, value };
}

export function fail<T>(backend: BackendName, error: unknown): BackendResult<T> {
  if (error instanceof BackendError) {
    return { ok: false, error };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { ok: false, error: new BackendError(backend, message, error) };
}

/**
 * Run an async call and capture any rejection as a failed result
 */
export async function attempt<T>(backend: BackendName, fn: () => Promise<T>): Promise<BackendResult<T>> {
  try {
    return ok(await fn());
  } catch (error) {
    return fail(backend, error);
  }
}

/**
 * Collapse a result produced by attempt() around a call that itself returns a result
 */
export function flatten<T>(result: BackendResult<BackendResult<T>>): BackendResult<T> {
  return result.ok ? result.value : result;
}
