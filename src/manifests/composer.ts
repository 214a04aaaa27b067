/**
 * ClaimScout - composer.json Parser
 */

import type { PackageRecord } from '../types.js';
import { RecordCollector, parseJsonObject } from './base.js';
import { collectDependencyMaps } from './npm.js';

export const COMPOSER_DEPENDENCY_FIELDS = ['require', 'require-dev'] as const;

export function parseComposerJson(filePath: string, content: string): PackageRecord[] {
  const composer = parseJsonObject(content, 'composer.json');
  const out = new RecordCollector(filePath, 'composer');

  out.add({
    name: composer.name,
    version: composer.version,
    role: 'main_package',
    category: 'main',
    pointer: 'name',
  });

  // Platform entries (php, ext-*) are kept: they are declarations like any other
  collectDependencyMaps(composer, COMPOSER_DEPENDENCY_FIELDS, out);

  return out.toArray();
}
