/**
 * Resolves after `ms`, or early (without rejecting) when `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(t);
      resolve();
    };
    const t = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/** Exponential backoff with symmetric jitter: base * 2^attempt * (1 ± jitter). */
export function backoffDelay(baseMs: number, attempt: number, jitter: number, rand: () => number = Math.random): number {
  const exp = baseMs * 2 ** attempt;
  const spread = exp * jitter * (rand() * 2 - 1);
  return Math.max(0, Math.round(exp + spread));
}
