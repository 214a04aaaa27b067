/**
 * ClaimScout - Scan Pipeline
 *
 * Extraction, verification of the npm subset, then aggregation.
 */

import type { ScanOutput } from '../types.js';
import { RunContext } from '../context.js';
import { resolveSettings, type ClaimScoutConfig, type ResolvedSettings } from '../config/index.js';
import { Extractor } from '../extract/index.js';
import { RegistryVerifier } from '../registry/verifier.js';
import type { FetchLike } from '../registry/client.js';
import { summarize } from '../aggregate/index.js';
import { VERSION } from '../version.js';

export interface ScannerOptions {
  config?: ClaimScoutConfig;
  context?: RunContext;
  /** Registry transport, mainly for tests */
  fetch?: FetchLike;
}

export interface ScanOptions {
  signal?: AbortSignal;
}

export class Scanner {
  readonly context: RunContext;
  readonly settings: ResolvedSettings;
  private readonly extractor: Extractor;
  private readonly verifier: RegistryVerifier;

  constructor(options: ScannerOptions = {}) {
    this.context = options.context ?? new RunContext();
    this.settings = resolveSettings(options.config);

    this.extractor = new Extractor({
      ignorePatterns: this.settings.ignorePaths,
      concurrency: this.settings.extractionConcurrency,
      scriptReferences: this.settings.scriptReferences,
      context: this.context,
    });

    const registry = this.settings.registry;
    this.verifier = new RegistryVerifier({
      registryUrl: registry.url,
      concurrency: registry.concurrency,
      requestsPerMinute: registry.requestsPerMinute,
      timeoutMs: registry.timeoutMs,
      maxAttempts: registry.maxAttempts,
      retryDelayMs: registry.retryDelayMs,
      backoffFactor: registry.backoffFactor,
      risk: this.settings.risk,
      fetch: options.fetch,
      context: this.context,
    });
  }

  async scan(rootDir: string, options: ScanOptions = {}): Promise<ScanOutput> {
    const extraction = await this.extractor.extract(rootDir, { label: this.settings.label });

    let records = extraction.records;
    let cancelled = false;

    if (this.settings.verify) {
      const run = await this.verifier.verify(records, { signal: options.signal });
      records = run.records;
      cancelled = run.cancelled;
    }

    return {
      version: VERSION,
      timestamp: new Date().toISOString(),
      rootDir: extraction.rootDir,
      label: this.settings.label,
      cancelled,
      summary: summarize(records, extraction.stats),
      records,
    };
  }
}
