/**
 * ClaimScout - Ecosystem Registry
 *
 * Maps manifest filenames to the ecosystem and format that handle them.
 */

import { basename } from 'node:path';
import type { Ecosystem, ManifestType } from '../types.js';

const MANIFEST_TYPES: readonly ManifestType[] = [
  { ecosystem: 'npm', format: 'package-json', pattern: 'package.json', match: 'basename' },
  { ecosystem: 'pip', format: 'requirements', pattern: 'requirements.txt', match: 'basename' },
  { ecosystem: 'pip', format: 'setup-py', pattern: 'setup.py', match: 'basename' },
  { ecosystem: 'pip', format: 'pyproject', pattern: 'pyproject.toml', match: 'basename' },
  { ecosystem: 'maven', format: 'pom', pattern: 'pom.xml', match: 'basename' },
  { ecosystem: 'gradle', format: 'gradle', pattern: 'build.gradle', match: 'basename' },
  { ecosystem: 'gradle', format: 'gradle', pattern: 'build.gradle.kts', match: 'basename' },
  { ecosystem: 'composer', format: 'composer-json', pattern: 'composer.json', match: 'basename' },
  { ecosystem: 'cargo', format: 'cargo-toml', pattern: 'cargo.toml', match: 'basename' },
  { ecosystem: 'go', format: 'go-mod', pattern: 'go.mod', match: 'basename' },
  { ecosystem: 'go', format: 'go-sum', pattern: 'go.sum', match: 'basename' },
  { ecosystem: 'ruby', format: 'gemfile', pattern: 'gemfile', match: 'basename' },
  { ecosystem: 'ruby', format: 'gemfile-lock', pattern: 'gemfile.lock', match: 'basename' },
  { ecosystem: 'nuget', format: 'packages-config', pattern: 'packages.config', match: 'basename' },
  { ecosystem: 'nuget', format: 'msbuild-project', pattern: '.csproj', match: 'suffix' },
  { ecosystem: 'nuget', format: 'msbuild-project', pattern: '.vbproj', match: 'suffix' },
];

export const ECOSYSTEMS: readonly Ecosystem[] = [
  'npm', 'pip', 'maven', 'gradle', 'composer', 'cargo', 'go', 'ruby', 'nuget',
];

/**
 * Find the manifest type for a file path (case-insensitive)
 */
export function detectManifest(filePath: string): ManifestType | null {
  const name = basename(filePath).toLowerCase();

  for (const type of MANIFEST_TYPES) {
    if (type.match === 'basename' && name === type.pattern) {
      return type;
    }
    if (type.match === 'suffix' && name.endsWith(type.pattern) && name.length > type.pattern.length) {
      return type;
    }
  }

  return null;
}

/**
 * Display form of a manifest pattern, e.g. `package.json` or `*.csproj`
 */
export function displayPattern(type: ManifestType): string {
  return type.match === 'suffix' ? `*${type.pattern}` : type.pattern;
}

export function listManifestTypes(): readonly ManifestType[] {
  return MANIFEST_TYPES;
}

export function isEcosystem(value: string): value is Ecosystem {
  return ECOSYSTEMS.some(ecosystem => ecosystem === value);
}
