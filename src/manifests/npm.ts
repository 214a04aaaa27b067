/**
 * ClaimScout - package.json Parser
 */

import type { PackageRecord } from '../types.js';
import { RecordCollector, isRecord, parseJsonObject } from './base.js';

export const NPM_DEPENDENCY_FIELDS = [
  'dependencies',
  'devDependencies',
  'peerDependencies',
  'optionalDependencies',
] as const;

export interface PackageJsonOptions {
  /** Scan `scripts` for install commands (default: true) */
  scriptReferences?: boolean;
}

export type ScriptTool = 'npm' | 'yarn' | 'pip' | 'composer';

export interface ScriptReference {
  name: string;
  tool: ScriptTool;
}

interface ScriptPattern {
  regex: RegExp;
  tool: ScriptTool;
}

// Leading `-x`/`--flag` tokens are skipped so `npm install -D foo` yields `foo`
const FLAGS = String.raw`(?:-{1,2}[\w-]+\s+)*`;

const SCRIPT_PATTERNS: ScriptPattern[] = [
  { regex: new RegExp(String.raw`npm\s+install\s+${FLAGS}((?:@[\w.-]+\/)?\w[\w.-]*)`, 'g'), tool: 'npm' },
  { regex: new RegExp(String.raw`yarn\s+add\s+${FLAGS}((?:@[\w.-]+\/)?\w[\w.-]*)`, 'g'), tool: 'yarn' },
  { regex: new RegExp(String.raw`pip\s+install\s+${FLAGS}([A-Za-z0-9][\w.-]*)`, 'g'), tool: 'pip' },
  { regex: new RegExp(String.raw`composer\s+require\s+${FLAGS}(\w[\w.-]*(?:\/[\w.-]+)?)`, 'g'), tool: 'composer' },
];

/**
 * Find package names installed by a shell command
 */
export function findScriptReferences(script: string): ScriptReference[] {
  const refs: ScriptReference[] = [];

  for (const { regex, tool } of SCRIPT_PATTERNS) {
    regex.lastIndex = 0;
    let match;
    while ((match = regex.exec(script)) !== null) {
      refs.push({ name: match[1], tool });
    }
  }

  return refs;
}

/**
 * Collect `{ name: spec }` maps from the given fields of a JSON manifest
 */
export function collectDependencyMaps(
  data: Record<string, unknown>,
  fields: readonly string[],
  out: RecordCollector
): void {
  for (const field of fields) {
    const deps = data[field];
    if (!isRecord(deps)) continue;

    for (const [name, spec] of Object.entries(deps)) {
      out.add({
        name,
        version: typeof spec === 'string' ? spec : undefined,
        category: field,
        pointer: `${field}/${name}`,
      });
    }
  }
}

export function parsePackageJson(
  filePath: string,
  content: string,
  options: PackageJsonOptions = {}
): PackageRecord[] {
  const pkg = parseJsonObject(content, 'package.json');
  const out = new RecordCollector(filePath, 'npm');

  out.add({
    name: pkg.name,
    version: pkg.version,
    role: 'main_package',
    category: 'main',
    pointer: 'name',
  });

  collectDependencyMaps(pkg, NPM_DEPENDENCY_FIELDS, out);

  if ((options.scriptReferences ?? true) && isRecord(pkg.scripts)) {
    for (const [scriptName, script] of Object.entries(pkg.scripts)) {
      if (typeof script !== 'string') continue;

      // Tagged npm whatever the installing tool
      for (const ref of findScriptReferences(script)) {
        out.add({
          name: ref.name,
          role: 'script_reference',
          category: 'scripts',
          pointer: `scripts/${scriptName}`,
        });
      }
    }
  }

  return out.toArray();
}
