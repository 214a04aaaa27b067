/**
 * ClaimScout - Python Manifest Parsers
 *
 * requirements.txt, setup.py and pyproject.toml
 */

import type { PackageRecord } from '../types.js';
import { UNKNOWN_VERSION } from '../types.js';
import { RecordCollector, lineAt, splitLines } from './base.js';
import { scanSections } from './sections.js';

/** Checked in this order; the first operator present wins */
export const PIP_OPERATORS = ['==', '>=', '<=', '>', '<', '~=', '!='] as const;

/**
 * Split a requirement specifier into name and `operator+version`
 *
 * @example
 * parsePipSpecification('requests==2.28.0') // { name: 'requests', version: '==2.28.0' }
 * parsePipSpecification('flask')            // { name: 'flask', version: 'unknown' }
 */
export function parsePipSpecification(spec: string): { name: string; version: string } {
  const trimmed = spec.trim();

  for (const operator of PIP_OPERATORS) {
    const idx = trimmed.indexOf(operator);
    if (idx !== -1) {
      return {
        name: trimmed.slice(0, idx).trim(),
        version: `${operator}${trimmed.slice(idx + operator.length).trim()}`,
      };
    }
  }

  return { name: trimmed, version: UNKNOWN_VERSION };
}

export function parseRequirementsTxt(filePath: string, content: string): PackageRecord[] {
  const out = new RecordCollector(filePath, 'pip');

  splitLines(content).forEach((raw, idx) => {
    const line = raw.trim();
    if (!line || line.startsWith('#')) return;

    const { name, version } = parsePipSpecification(line);
    out.add({ name, version, category: 'requirements', pointer: idx + 1 });
  });

  return out.toArray();
}

export function parseSetupPy(filePath: string, content: string): PackageRecord[] {
  const out = new RecordCollector(filePath, 'pip');

  // Non-greedy: the list ends at the first `]`, extras like `pkg[x]` cut it short
  const installRequires = /install_requires\s*=\s*\[([\s\S]*?)\]/.exec(content);
  if (installRequires) {
    const body = installRequires[1];
    const bodyStart = installRequires.index + installRequires[0].indexOf('[') + 1;
    const literal = /["']([^"']+)["']/g;

    let match;
    while ((match = literal.exec(body)) !== null) {
      const { name, version } = parsePipSpecification(match[1]);
      out.add({
        name,
        version,
        category: 'install_requires',
        pointer: lineAt(content, bodyStart + match.index),
      });
    }
  }

  const nameMatch = /\bname\s*=\s*["']([^"']+)["']/.exec(content);
  const versionMatch = /\bversion\s*=\s*["']([^"']+)["']/.exec(content);
  if (nameMatch) {
    out.add({
      name: nameMatch[1],
      version: versionMatch?.[1],
      role: 'main_package',
      category: 'main',
      pointer: lineAt(content, nameMatch.index),
    });
  }

  return out.toArray();
}

export function parsePyprojectToml(filePath: string, content: string): PackageRecord[] {
  const out = new RecordCollector(filePath, 'pip');

  const entries = scanSections(content, {
    triggers: ['[tool.poetry.dependencies]', '[project.dependencies]'],
    unquoteKeys: true,
  });

  for (const entry of entries) {
    out.add({ name: entry.key, version: entry.value, category: 'dependencies', pointer: entry.line });
  }

  return out.toArray();
}
