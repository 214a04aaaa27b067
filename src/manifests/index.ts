/**
 * ClaimScout - Manifest Parser Dispatch
 */

import type { ManifestFormat, ManifestType, PackageRecord } from '../types.js';
import { ManifestParseError, errorMessage } from '../errors.js';
import { detectManifest } from '../ecosystems/index.js';
import { parsePackageJson } from './npm.js';
import { parseRequirementsTxt, parseSetupPy, parsePyprojectToml } from './pip.js';
import { parsePomXml } from './maven.js';
import { parseBuildGradle } from './gradle.js';
import { parseComposerJson } from './composer.js';
import { parseCargoToml } from './cargo.js';
import { parseGoMod, parseGoSum } from './go.js';
import { parseGemfile, parseGemfileLock } from './ruby.js';
import { parsePackagesConfig, parseMsbuildProject } from './nuget.js';

export type ParseResult =
  | { ok: true; records: PackageRecord[] }
  | { ok: false; error: ManifestParseError };

export interface ParseOptions {
  /** Scan package.json scripts for install commands (default: true) */
  scriptReferences?: boolean;
}

type FormatParser = (filePath: string, content: string, options: ParseOptions) => PackageRecord[];

const PARSERS: Record<ManifestFormat, FormatParser> = {
  'package-json': (file, content, options) => parsePackageJson(file, content, options),
  'requirements': parseRequirementsTxt,
  'setup-py': parseSetupPy,
  'pyproject': parsePyprojectToml,
  'pom': parsePomXml,
  'gradle': parseBuildGradle,
  'composer-json': parseComposerJson,
  'cargo-toml': parseCargoToml,
  'go-mod': parseGoMod,
  'go-sum': parseGoSum,
  'gemfile': parseGemfile,
  'gemfile-lock': parseGemfileLock,
  'packages-config': parsePackagesConfig,
  'msbuild-project': parseMsbuildProject,
};

/**
 * Parse one manifest. Never throws: unknown files and parser failures come
 * back as `{ ok: false }`.
 *
 * @param type - Skip detection when the caller already matched the file
 */
export function parseManifest(
  filePath: string,
  content: string,
  options: ParseOptions = {},
  type: ManifestType | null = detectManifest(filePath)
): ParseResult {
  if (!type) {
    return { ok: false, error: new ManifestParseError(filePath, null, `Unrecognized manifest: ${filePath}`) };
  }

  if (content.trim() === '') {
    return { ok: true, records: [] };
  }

  try {
    return { ok: true, records: PARSERS[type.format](filePath, content, options) };
  } catch (error) {
    return {
      ok: false,
      error: new ManifestParseError(
        filePath,
        type.ecosystem,
        `Failed to parse ${filePath}: ${errorMessage(error)}`,
        { cause: error }
      ),
    };
  }
}

export { parsePackageJson, findScriptReferences, NPM_DEPENDENCY_FIELDS } from './npm.js';
export type { ScriptReference, ScriptTool } from './npm.js';
export { parseRequirementsTxt, parseSetupPy, parsePyprojectToml, parsePipSpecification } from './pip.js';
export { parsePomXml } from './maven.js';
export { parseBuildGradle, splitCoordinate, GRADLE_CONFIGURATIONS } from './gradle.js';
export { parseComposerJson } from './composer.js';
export { parseCargoToml } from './cargo.js';
export { parseGoMod, parseGoSum } from './go.js';
export { parseGemfile, parseGemfileLock } from './ruby.js';
export { parsePackagesConfig, parseMsbuildProject } from './nuget.js';
