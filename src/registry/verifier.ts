/**
 * ClaimScout - Registry Verifier
 *
 * Checks distinct npm names against the registry under a concurrency bound
 * and a dispatch rate limit, retrying transient failures with exponential
 * backoff.
 */

import pLimit from 'p-limit';
import type { PackageRecord, Verification, VerificationRun } from '../types.js';
import { RegistryError, errorMessage } from '../errors.js';
import { RunContext } from '../context.js';
import { scoreName, type RiskOptions } from '../risk/index.js';
import { mergeVerifications } from '../aggregate/index.js';
import { RegistryClient, type FetchLike } from './client.js';
import { RateLimiter, delay } from './limiter.js';

export interface VerifierOptions {
  registryUrl?: string;
  /** Maximum in-flight lookups (default: 10) */
  concurrency?: number;
  /** Dispatch budget; <= 0 or Infinity disables throttling (default: 1000) */
  requestsPerMinute?: number;
  timeoutMs?: number;
  /** Total attempts per name, first try included (default: 3) */
  maxAttempts?: number;
  /** Base backoff delay in ms (default: 1000) */
  retryDelayMs?: number;
  backoffFactor?: number;
  risk?: RiskOptions;
  fetch?: FetchLike;
  client?: RegistryClient;
  context?: RunContext;
}

export interface VerifyOptions {
  signal?: AbortSignal;
}

export class RegistryVerifier {
  readonly context: RunContext;
  private readonly client: RegistryClient;
  private readonly concurrency: number;
  private readonly requestsPerMinute: number;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly backoffFactor: number;
  private readonly risk: RiskOptions;

  constructor(options: VerifierOptions = {}) {
    this.context = options.context ?? new RunContext();
    this.client = options.client ?? new RegistryClient({
      registryUrl: options.registryUrl,
      timeoutMs: options.timeoutMs,
      fetch: options.fetch,
    });
    this.concurrency = Math.max(1, options.concurrency ?? 10);
    this.requestsPerMinute = options.requestsPerMinute ?? 1000;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.backoffFactor = options.backoffFactor ?? 2;
    this.risk = options.risk ?? {};
  }

  async verify(records: readonly PackageRecord[], options: VerifyOptions = {}): Promise<VerificationRun> {
    const { signal } = options;
    const names = [...new Set(records.filter(r => r.ecosystem === 'npm').map(r => r.name))];
    const outcomes = new Map<string, Verification>();
    const limiter = new RateLimiter(this.requestsPerMinute);
    const limit = pLimit(this.concurrency);

    // Queued tasks still run after an abort, but return immediately
    await Promise.all(names.map(name => limit(async () => {
      if (signal?.aborted) return;
      await limiter.acquire(signal);
      if (signal?.aborted) return;

      const verification = await this.check(name, signal);
      if (verification) {
        outcomes.set(name, verification);
      }
    })));

    const skipped = names.filter(name => !outcomes.has(name));
    const cancelled = signal?.aborted === true && skipped.length > 0;
    if (cancelled) {
      this.context.emit({ type: 'verification_cancelled', completed: outcomes.size, skipped: skipped.length });
    }

    return {
      records: mergeVerifications(records, outcomes),
      outcomes,
      cancelled,
      skipped,
    };
  }

  /**
   * Look up one name with retries. Returns undefined when abandoned on abort.
   */
  async check(name: string, signal?: AbortSignal): Promise<Verification | undefined> {
    this.context.lookupStarted();
    this.context.emit({ type: 'lookup_started', name });

    try {
      let lastError = '';
      let attempts = 0;

      for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
        if (signal?.aborted) return undefined;
        attempts++;

        try {
          const result = await this.client.lookup(name, signal);
          const verification: Verification = result.found
            ? this.foundVerification(name, attempts, result.metadata)
            : { status: 'unclaimed', isSuspicious: false, riskReason: 'none', checkedAt: now(), attempts };

          this.context.emit({ type: 'lookup_finished', name, status: verification.status, attempts });
          return verification;
        } catch (error) {
          if (signal?.aborted) return undefined;
          lastError = errorMessage(error);
          if (error instanceof RegistryError && !error.transient) break;

          if (attempt < this.maxAttempts - 1) {
            const delayMs = this.retryDelayMs * this.backoffFactor ** attempt;
            this.context.counters.retries++;
            this.context.emit({ type: 'lookup_retry', name, attempt: attempts, delayMs, message: lastError });
            await delay(delayMs, signal);
          }
        }
      }

      this.context.emit({ type: 'lookup_finished', name, status: 'error', attempts });
      return {
        status: 'error',
        isSuspicious: false,
        riskReason: 'none',
        checkedAt: now(),
        attempts,
        errorDetail: lastError,
      };
    } finally {
      this.context.lookupSettled();
    }
  }

  private foundVerification(
    name: string,
    attempts: number,
    registry: Verification['registry']
  ): Verification {
    const verdict = scoreName(name, this.risk);
    return {
      status: 'found',
      isSuspicious: verdict.isSuspicious,
      riskReason: verdict.reason,
      checkedAt: now(),
      attempts,
      registry,
    };
  }
}

function now(): string {
  return new Date().toISOString();
}
