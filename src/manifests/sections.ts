/**
 * ClaimScout - Bracket Section Scanner
 *
 * Line-oriented scan used for pyproject.toml and Cargo.toml. This is not a
 * TOML parser: nested tables, multi-line values and inline arrays are read
 * as plain `key = value` lines.
 */

import { splitLines } from './base.js';

export interface SectionEntry {
  key: string;
  value: string;
  line: number;
}

export interface SectionScanOptions {
  /** Header prefixes that switch the scanner into the dependency state */
  triggers: readonly string[];
  /** Strip surrounding quotes from keys as well as values */
  unquoteKeys: boolean;
}

const QUOTES = /^["']+|["']+$/g;

export function scanSections(content: string, options: SectionScanOptions): SectionEntry[] {
  const entries: SectionEntry[] = [];
  let inDependencies = false;

  splitLines(content).forEach((raw, idx) => {
    const line = raw.trim();

    if (options.triggers.some(trigger => line.startsWith(trigger))) {
      inDependencies = true;
      return;
    }
    if (line.startsWith('[') && inDependencies) {
      inDependencies = false;
      return;
    }

    if (!inDependencies || line.startsWith('#') || !line.includes('=')) {
      return;
    }

    const eq = line.indexOf('=');
    const key = line.slice(0, eq).trim();
    const value = line.slice(eq + 1).trim().replace(QUOTES, '');

    entries.push({
      key: options.unquoteKeys ? key.replace(QUOTES, '') : key,
      value,
      line: idx + 1,
    });
  });

  return entries;
}
