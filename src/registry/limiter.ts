/**
 * ClaimScout - Dispatch Rate Limiter
 */

/**
 * Spaces dispatches at least `60000 / requestsPerMinute` ms apart.
 * Each caller reserves the next free slot, so concurrent callers queue up
 * behind each other instead of firing together.
 */
export class RateLimiter {
  readonly intervalMs: number;
  private nextSlot = 0;

  constructor(requestsPerMinute: number) {
    this.intervalMs = requestsPerMinute > 0 && Number.isFinite(requestsPerMinute)
      ? 60000 / requestsPerMinute
      : 0;
  }

  get enabled(): boolean {
    return this.intervalMs > 0;
  }

  /**
   * Wait for a dispatch slot. Resolves early once `signal` aborts.
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    if (!this.enabled) return;

    const now = Date.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.intervalMs;

    await delay(slot - now, signal);
  }
}

/**
 * Sleep for `ms`. Resolves (never rejects) when `signal` aborts; callers
 * check `signal.aborted` afterwards.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) return Promise.resolve();

  return new Promise(resolve => {
    const done = (): void => {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timeoutId = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}
