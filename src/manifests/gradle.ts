/**
 * ClaimScout - Gradle Build Script Parser
 *
 * Regex extraction over build.gradle (Groovy DSL) and build.gradle.kts.
 * Variables, version catalogs and `dependencies {}` scoping are not resolved.
 */

import type { PackageRecord } from '../types.js';
import { RecordCollector, lineAt } from './base.js';

export const GRADLE_CONFIGURATIONS = [
  'implementation',
  'api',
  'compile',
  'compileOnly',
  'runtimeOnly',
  'testImplementation',
  'testCompile',
  'testRuntimeOnly',
  'kapt',
  'annotationProcessor',
] as const;

const CONFIG = `\\b(${GRADLE_CONFIGURATIONS.join('|')})`;

// implementation 'g:a:v' / implementation("g:a:v")
const LITERAL_REGEX = new RegExp(`${CONFIG}\\s*\\(?\\s*["']([^"']+)["']`, 'g');

// implementation group: 'g', name: 'a', version: 'v'
const KEYWORD_REGEX = new RegExp(
  `${CONFIG}\\s*\\(?\\s*group:\\s*["']([^"']+)["']\\s*,\\s*name:\\s*["']([^"']+)["']\\s*(?:,\\s*version:\\s*["']([^"']+)["'])?`,
  'g'
);

/**
 * Split a `group:artifact[:version]` coordinate. Shorter literals stay whole.
 */
export function splitCoordinate(literal: string): { name: string; version?: string } {
  const parts = literal.split(':');
  if (parts.length < 2) {
    return { name: literal };
  }
  return { name: `${parts[0]}:${parts[1]}`, version: parts[2] };
}

export function parseBuildGradle(filePath: string, content: string): PackageRecord[] {
  const out = new RecordCollector(filePath, 'gradle');

  let match;
  LITERAL_REGEX.lastIndex = 0;
  while ((match = LITERAL_REGEX.exec(content)) !== null) {
    const { name, version } = splitCoordinate(match[2]);
    out.add({ name, version, category: match[1], pointer: lineAt(content, match.index) });
  }

  KEYWORD_REGEX.lastIndex = 0;
  while ((match = KEYWORD_REGEX.exec(content)) !== null) {
    out.add({
      name: `${match[2]}:${match[3]}`,
      version: match[4],
      category: match[1],
      pointer: lineAt(content, match.index),
    });
  }

  return out.toArray();
}
