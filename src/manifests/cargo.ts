/**
 * ClaimScout - Cargo.toml Parser
 */

import type { PackageRecord } from '../types.js';
import { RecordCollector } from './base.js';
import { scanSections } from './sections.js';

/**
 * Read `[dependencies]` entries. Only values are unquoted; dotted and
 * inline-table entries come through as written.
 */
export function parseCargoToml(filePath: string, content: string): PackageRecord[] {
  const out = new RecordCollector(filePath, 'cargo');

  for (const entry of scanSections(content, { triggers: ['[dependencies]'], unquoteKeys: false })) {
    out.add({ name: entry.key, version: entry.value, category: 'dependencies', pointer: entry.line });
  }

  return out.toArray();
}
