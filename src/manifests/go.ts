/**
 * ClaimScout - go.mod / go.sum Parsers
 */

import type { PackageRecord } from '../types.js';
import { RecordCollector, splitLines } from './base.js';

type Directive = 'require' | 'replace';

/**
 * Read `require` and `replace` directives, single-line or block form.
 * The module path is the first token after the directive, the version the
 * second (absent or `=>` means unknown).
 */
export function parseGoMod(filePath: string, content: string): PackageRecord[] {
  const out = new RecordCollector(filePath, 'go');
  let block: Directive | null = null;

  splitLines(content).forEach((raw, idx) => {
    const line = raw.trim();
    if (!line || line.startsWith('//')) return;

    if (block) {
      if (line === ')') {
        block = null;
        return;
      }
      addDirective(out, block, line.split(/\s+/), idx + 1);
      return;
    }

    const directive = line.startsWith('require ') ? 'require' : line.startsWith('replace ') ? 'replace' : null;
    if (!directive) return;

    const tokens = line.split(/\s+/).slice(1);
    if (tokens[0] === '(') {
      block = directive;
      return;
    }
    addDirective(out, directive, tokens, idx + 1);
  });

  return out.toArray();
}

function addDirective(out: RecordCollector, directive: Directive, tokens: string[], line: number): void {
  const [modulePath, version] = tokens;
  out.add({
    name: modulePath,
    version: version === '=>' || version?.startsWith('//') ? undefined : version,
    category: directive,
    pointer: line,
  });
}

/**
 * One record per distinct module@version listed in go.sum
 */
export function parseGoSum(filePath: string, content: string): PackageRecord[] {
  const out = new RecordCollector(filePath, 'go');
  const seen = new Set<string>();

  splitLines(content).forEach((raw, idx) => {
    const [modulePath, rawVersion] = raw.trim().split(/\s+/);
    if (!modulePath || !rawVersion) return;

    const version = rawVersion.replace(/\/go\.mod$/, '');
    const key = `${modulePath}@${version}`;
    if (seen.has(key)) return;
    seen.add(key);

    out.add({ name: modulePath, version, category: 'sum', pointer: idx + 1 });
  });

  return out.toArray();
}
