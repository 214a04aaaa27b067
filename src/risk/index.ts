/**
 * ClaimScout - Risk Scorer
 *
 * Heuristic name checks: suspicious keywords, very short names and
 * near-identity to popular packages. First matching rule wins.
 */

import type { RiskVerdict } from '../types.js';

export const DEFAULT_SUSPICIOUS_KEYWORDS: readonly string[] = [
  'test', 'demo', 'example', 'sample', 'temp', 'tmp', 'backup', 'old',
  'legacy', 'deprecated', 'unused', 'admin', 'root', 'password', 'secret',
  'key', 'token', 'debug', 'dev', 'development', 'local', 'private',
];

export const DEFAULT_POPULAR_PACKAGES: readonly string[] = [
  'lodash', 'express', 'react', 'vue', 'angular', 'jquery', 'axios',
  'moment', 'bootstrap', 'webpack', 'babel',
];

export const MIN_NAME_LENGTH = 3;

export interface RiskOptions {
  keywords?: readonly string[];
  popularPackages?: readonly string[];
}

export function scoreName(name: string, options: RiskOptions = {}): RiskVerdict {
  const lower = name.toLowerCase();

  const keyword = (options.keywords ?? DEFAULT_SUSPICIOUS_KEYWORDS).find(k => lower.includes(k.toLowerCase()));
  if (keyword !== undefined) {
    return { isSuspicious: true, reason: 'keyword_match', matched: keyword };
  }

  if (name.length < MIN_NAME_LENGTH) {
    return { isSuspicious: true, reason: 'short_name' };
  }

  const popular = (options.popularPackages ?? DEFAULT_POPULAR_PACKAGES).find(p => isSimilarName(name, p));
  if (popular !== undefined) {
    return { isSuspicious: true, reason: 'name_similarity', matched: popular };
  }

  return { isSuspicious: false, reason: 'none' };
}

/**
 * Near-identity check. Equal lengths allow one substitution; a length gap of
 * one allows one insertion (the shorter name is a subsequence of the longer).
 * Any other gap is not similar.
 */
export function isSimilarName(a: string, b: string): boolean {
  const gap = Math.abs(a.length - b.length);

  if (gap === 0) {
    return hammingDistance(a, b) <= 1;
  }
  if (gap === 1) {
    return a.length < b.length ? isSubsequence(a, b) : isSubsequence(b, a);
  }
  return false;
}

function hammingDistance(a: string, b: string): number {
  let distance = 0;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) distance++;
  }
  return distance;
}

function isSubsequence(shorter: string, longer: string): boolean {
  let i = 0;
  for (let j = 0; j < longer.length && i < shorter.length; j++) {
    if (shorter[i] === longer[j]) i++;
  }
  return i === shorter.length;
}
