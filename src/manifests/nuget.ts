/**
 * ClaimScout - NuGet Project File Parsers
 *
 * packages.config and SDK-style .csproj / .vbproj
 */

import type { PackageRecord } from '../types.js';
import { RecordCollector } from './base.js';
import { childText, findAll, parseXml } from './xml.js';

/**
 * Parse legacy packages.config: `<package id="…" version="…"/>` under the root
 */
export function parsePackagesConfig(filePath: string, content: string): PackageRecord[] {
  const out = new RecordCollector(filePath, 'nuget');

  for (const root of parseXml(content)) {
    for (const pkg of root.children) {
      if (pkg.name !== 'package') continue;
      out.add({
        name: pkg.attributes.id,
        version: pkg.attributes.version,
        category: 'package',
        pointer: pkg.path,
      });
    }
  }

  return out.toArray();
}

/**
 * Parse `<PackageReference Include="…" Version="…"/>`, also accepting a
 * nested `<Version>` element
 */
export function parseMsbuildProject(filePath: string, content: string): PackageRecord[] {
  const out = new RecordCollector(filePath, 'nuget');

  for (const ref of findAll(parseXml(content), 'PackageReference')) {
    out.add({
      name: ref.attributes.Include,
      version: ref.attributes.Version ?? childText(ref, 'Version'),
      category: 'PackageReference',
      pointer: ref.path,
    });
  }

  return out.toArray();
}
