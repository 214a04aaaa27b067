/**
 * ClaimScout - Error Types
 */

import type { Ecosystem } from './types.js';

export type ErrorCode = 'PARSE_ERROR' | 'REGISTRY_ERROR' | 'CONFIGURATION_ERROR';

export class ClaimScoutError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ClaimScoutError';
    this.code = code;
  }
}

/**
 * A single manifest could not be parsed. Recovered by the extractor.
 */
export class ManifestParseError extends ClaimScoutError {
  readonly file: string;
  readonly ecosystem: Ecosystem | null;

  constructor(file: string, ecosystem: Ecosystem | null, message: string, options?: { cause?: unknown }) {
    super('PARSE_ERROR', message, options);
    this.name = 'ManifestParseError';
    this.file = file;
    this.ecosystem = ecosystem;
  }
}

/**
 * Registry request failed. `transient` errors are retried.
 */
export class RegistryError extends ClaimScoutError {
  readonly status?: number;
  readonly transient: boolean;

  constructor(message: string, options: { status?: number; transient?: boolean; cause?: unknown } = {}) {
    super('REGISTRY_ERROR', message, { cause: options.cause });
    this.name = 'RegistryError';
    this.status = options.status;
    this.transient = options.transient ?? true;
  }
}

/**
 * Unusable input or settings. Fatal to the component that raised it.
 */
export class ConfigurationError extends ClaimScoutError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIGURATION_ERROR', message, options);
    this.name = 'ConfigurationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
