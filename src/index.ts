/**
 * ClaimScout - Manifest Extraction & Registry Verification
 *
 * @example
 * ```typescript
 * import { Scanner, Extractor, scoreName } from 'claimscout';
 *
 * // Full pipeline
 * const output = await new Scanner().scan('./repo');
 *
 * // Extraction only
 * const { records, stats } = await new Extractor().extract('./repo');
 *
 * scoreName('lodah'); // { isSuspicious: true, reason: 'name_similarity', matched: 'lodash' }
 * ```
 */

// Core
export { Scanner } from './core/scanner.js';
export type { ScannerOptions, ScanOptions } from './core/scanner.js';
export { RunContext } from './context.js';
export type { RunEvent, RunEventType, RunCounters, TimedRunEvent, RunEventListener } from './context.js';

// Ecosystems & parsers
export { detectManifest, listManifestTypes, displayPattern, isEcosystem, ECOSYSTEMS } from './ecosystems/index.js';
export * from './manifests/index.js';

// Extraction
export { Extractor, DEFAULT_IGNORE_PATTERNS } from './extract/index.js';
export type { ExtractorOptions, ExtractOptions } from './extract/index.js';

// Risk
export {
  scoreName,
  isSimilarName,
  DEFAULT_SUSPICIOUS_KEYWORDS,
  DEFAULT_POPULAR_PACKAGES,
} from './risk/index.js';
export type { RiskOptions } from './risk/index.js';

// Registry
export { RegistryClient, readMetadata, DEFAULT_REGISTRY_URL } from './registry/client.js';
export type { FetchLike, RegistryResponse, LookupResult, RegistryClientOptions } from './registry/client.js';
export { RateLimiter } from './registry/limiter.js';
export { RegistryVerifier } from './registry/verifier.js';
export type { VerifierOptions, VerifyOptions } from './registry/verifier.js';

// Aggregation
export { mergeVerifications, summarize, assessRisk, formatSummary } from './aggregate/index.js';

// Configuration
export {
  loadConfig,
  loadConfigFromFile,
  loadConfigFromPackageJson,
  mergeConfig,
  validateConfig,
  resolveSettings,
  generateSampleConfig,
  findConfigPath,
} from './config/index.js';
export type { ClaimScoutConfig, RegistryConfig, ResolvedSettings } from './config/index.js';

// Errors
export { ClaimScoutError, ManifestParseError, RegistryError, ConfigurationError } from './errors.js';

// Types
export * from './types.js';

export { VERSION } from './version.js';
