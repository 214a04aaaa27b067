/**
 * ClaimScout - pom.xml Parser
 */

import type { PackageRecord } from '../types.js';
import { RecordCollector } from './base.js';
import { childElement, childText, findAll, parseXml } from './xml.js';

const UNKNOWN_GROUP = 'unknown';

export function parsePomXml(filePath: string, content: string): PackageRecord[] {
  const roots = parseXml(content);
  const out = new RecordCollector(filePath, 'maven');

  const project = roots.find(element => element.name === 'project');
  if (project) {
    const parent = childElement(project, 'parent');
    const artifactId = childText(project, 'artifactId');
    const groupId = childText(project, 'groupId') ?? (parent && childText(parent, 'groupId'));
    const version = childText(project, 'version') ?? (parent && childText(parent, 'version'));

    if (artifactId) {
      out.add({
        name: `${groupId ?? UNKNOWN_GROUP}:${artifactId}`,
        version,
        role: 'main_package',
        category: 'main',
        pointer: project.path,
      });
    }
  }

  // Every <dependency>, including dependencyManagement and plugin dependencies
  for (const dep of findAll(roots, 'dependency')) {
    const artifactId = childText(dep, 'artifactId');
    if (!artifactId) continue;

    out.add({
      name: `${childText(dep, 'groupId') ?? UNKNOWN_GROUP}:${artifactId}`,
      version: childText(dep, 'version'),
      category: 'dependencies',
      pointer: dep.path,
    });
  }

  return out.toArray();
}
