/**
 * ClaimScout - npm Registry Client
 */

import type { RegistryMetadata } from '../types.js';
import { RegistryError, errorMessage } from '../errors.js';
import { isRecord } from '../manifests/base.js';

export const DEFAULT_REGISTRY_URL = 'https://registry.npmjs.org';

/**
 * The subset of a fetch Response the client reads
 */
export interface RegistryResponse {
  status: number;
  statusText: string;
  json(): Promise<unknown>;
}

export type FetchLike = (
  url: string,
  init: { signal: AbortSignal; headers: Record<string, string> }
) => Promise<RegistryResponse>;

export interface RegistryClientOptions {
  registryUrl?: string;
  timeoutMs?: number;            // Request timeout in ms (default: 10000)
  fetch?: FetchLike;
}

export type LookupResult =
  | { found: true; metadata: RegistryMetadata }
  | { found: false };

export class RegistryClient {
  readonly registryUrl: string;
  private readonly timeoutMs: number;
  private readonly fetch: FetchLike;

  constructor(options: RegistryClientOptions = {}) {
    this.registryUrl = (options.registryUrl ?? DEFAULT_REGISTRY_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.fetch = options.fetch ?? ((url, init) => fetch(url, init));
  }

  /**
   * Single GET for a package document. 404 is the only not-found signal;
   * everything else that is not 2xx throws a transient RegistryError.
   */
  async lookup(name: string, signal?: AbortSignal): Promise<LookupResult> {
    const url = `${this.registryUrl}/${encodeURIComponent(name)}`;
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    const transportError = (error: unknown): RegistryError => {
      if (timedOut) {
        return new RegistryError(`Registry timeout after ${this.timeoutMs}ms`, { cause: error });
      }
      if (signal?.aborted) {
        return new RegistryError('Lookup aborted', { transient: false, cause: error });
      }
      return new RegistryError(`Registry request failed: ${errorMessage(error)}`, { cause: error });
    };

    // The timer and the caller's signal stay armed until the body is read
    try {
      let response: RegistryResponse;
      try {
        response = await this.fetch(url, {
          signal: controller.signal,
          headers: { Accept: 'application/json' },
        });
      } catch (error) {
        throw transportError(error);
      }

      if (response.status === 404) {
        return { found: false };
      }
      if (response.status < 200 || response.status >= 300) {
        throw new RegistryError(`Registry error: ${response.status} ${response.statusText}`, {
          status: response.status,
        });
      }

      let body: unknown;
      try {
        body = await untilAborted(response.json(), controller.signal);
      } catch (error) {
        if (controller.signal.aborted) {
          throw transportError(error);
        }
        throw new RegistryError(`Invalid registry response for ${name}: ${errorMessage(error)}`, {
          status: response.status,
          cause: error,
        });
      }

      return { found: true, metadata: readMetadata(name, body) };
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

/**
 * Settle with `promise`, or reject as soon as `signal` aborts
 */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(new Error('Body read aborted'));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new Error('Body read aborted'));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Keep the display fields of a package document
 */
export function readMetadata(requestedName: string, body: unknown): RegistryMetadata {
  if (!isRecord(body)) {
    return { name: requestedName, versions: [] };
  }

  const rawTags = body['dist-tags'];
  const distTags: Record<string, unknown> = isRecord(rawTags) ? rawTags : {};
  const latest = typeof distTags.latest === 'string' ? distTags.latest : body.version;

  return {
    name: typeof body.name === 'string' && body.name ? body.name : requestedName,
    latestVersion: typeof latest === 'string' ? latest : undefined,
    description: typeof body.description === 'string' ? body.description : undefined,
    versions: isRecord(body.versions) ? Object.keys(body.versions) : [],
  };
}
