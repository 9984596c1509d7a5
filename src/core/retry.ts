import pTimeout from 'p-timeout';

// ── Public types ─────────────────────────────────────────────

export interface RetryPolicy {
  /** Extra tries after the first call. */
  retries: number;
  /** Upper bound for a single call. */
  timeoutMs: number;
  retryDelayMs: number;
}

export type CallOutcome<T> =
  | { ok: true; value: T; tries: number }
  | { ok: false; error: Error; tries: number };

// ── Error ────────────────────────────────────────────────────

export class CollaboratorTimeoutError extends Error {
  constructor(label: string, timeoutMs: number) {
    super(`${label} call timed out after ${String(timeoutMs)}ms`);
    this.name = 'CollaboratorTimeoutError';
  }
}

// ── Bounded retry ────────────────────────────────────────────

/**
 * Call `fn` up to `retries + 1` times, each bounded by `timeoutMs`.
 * Each try gets its own signal, aborted when that try fails, so a timed-out
 * call is cancelled before the next one starts.
 * Never throws: the last error comes back in the outcome.
 */
export async function callWithRetry<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  policy: RetryPolicy,
  label: string,
  onRetry?: (tryNumber: number, error: Error) => void,
): Promise<CallOutcome<T>> {
  const maxTries = policy.retries + 1;
  let lastError = new Error(`${label} was never called`);

  for (let tryNumber = 1; tryNumber <= maxTries; tryNumber++) {
    const controller = new AbortController();
    try {
      const value = await pTimeout(
        fn(controller.signal),
        policy.timeoutMs,
        new CollaboratorTimeoutError(label, policy.timeoutMs),
      );
      return { ok: true, value, tries: tryNumber };
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));
      controller.abort(lastError);
      if (tryNumber < maxTries) {
        onRetry?.(tryNumber, lastError);
        if (policy.retryDelayMs > 0) await delay(policy.retryDelayMs);
      }
    }
  }

  return { ok: false, error: lastError, tries: maxTries };
}

// ── Helpers ──────────────────────────────────────────────────

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
