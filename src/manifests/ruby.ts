/**
 * ClaimScout - Gemfile / Gemfile.lock Parsers
 */

import type { PackageRecord } from '../types.js';
import { RecordCollector, splitLines } from './base.js';

const GEM_REGEX = /^gem\s+["']([^"']+)["'](?:\s*,\s*["']([^"']+)["'])?/;

/**
 * Parse `gem 'name'[, 'version']` declarations
 */
export function parseGemfile(filePath: string, content: string): PackageRecord[] {
  const out = new RecordCollector(filePath, 'ruby');

  splitLines(content).forEach((raw, idx) => {
    const line = raw.trim();
    if (!line.startsWith('gem ')) return;

    const match = GEM_REGEX.exec(line);
    if (match) {
      out.add({ name: match[1], version: match[2], category: 'gem', pointer: idx + 1 });
    }
  });

  return out.toArray();
}

const LOCK_SECTIONS = new Set(['GEM', 'GIT', 'PATH', 'PLATFORMS', 'DEPENDENCIES', 'RUBY VERSION', 'BUNDLED WITH']);
const SPEC_SECTIONS = new Set(['GEM', 'GIT', 'PATH']);

/**
 * Parse resolved gem specs (`    rails (7.0.4)`) from Gemfile.lock
 */
export function parseGemfileLock(filePath: string, content: string): PackageRecord[] {
  const out = new RecordCollector(filePath, 'ruby');
  let section = '';

  splitLines(content).forEach((line, idx) => {
    if (LOCK_SECTIONS.has(line)) {
      section = line;
      return;
    }
    if (!SPEC_SECTIONS.has(section)) return;

    // Four-space indent only; deeper lines are a gem's own dependencies
    const spec = /^\s{4}(\S+)\s+\(([^)]+)\)/.exec(line);
    if (spec) {
      out.add({ name: spec[1], version: spec[2], category: 'locked', pointer: idx + 1 });
    }
  });

  return out.toArray();
}
