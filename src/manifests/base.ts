/**
 * ClaimScout - Shared Manifest Parser Helpers
 */

import type { Ecosystem, PackageRecord, PackageRole } from '../types.js';
import { UNKNOWN_VERSION } from '../types.js';

export interface RecordInput {
  name: unknown;
  version?: unknown;
  role?: PackageRole;
  category: string;
  /** Line number, or a named pointer (JSON key path, XML path) */
  pointer: number | string;
}

/**
 * Collects records for one manifest file.
 * Drops entries without a usable name and fills in missing versions.
 */
export class RecordCollector {
  private readonly records: PackageRecord[] = [];

  constructor(
    readonly filePath: string,
    readonly ecosystem: Ecosystem
  ) {}

  add(input: RecordInput): void {
    if (typeof input.name !== 'string' || input.name.trim() === '') {
      return;
    }

    this.records.push({
      name: input.name,
      versionSpec: normalizeVersion(input.version),
      role: input.role ?? 'dependency',
      category: input.category,
      ecosystem: this.ecosystem,
      sourceLocator: locate(this.filePath, input.pointer),
    });
  }

  get size(): number {
    return this.records.length;
  }

  toArray(): PackageRecord[] {
    return [...this.records];
  }
}

export function normalizeVersion(version: unknown): string {
  if (typeof version === 'number') {
    return String(version);
  }
  if (typeof version !== 'string' || version.trim() === '') {
    return UNKNOWN_VERSION;
  }
  return version;
}

/**
 * Build a source locator: `file:12` for lines, `file#pointer` otherwise
 */
export function locate(filePath: string, pointer: number | string): string {
  return typeof pointer === 'number' ? `${filePath}:${pointer}` : `${filePath}#${pointer}`;
}

/**
 * 1-based line number of a character offset
 */
export function lineAt(content: string, index: number): number {
  let line = 1;
  for (let i = 0; i < index && i < content.length; i++) {
    if (content.charCodeAt(i) === 10) line++;
  }
  return line;
}

export function splitLines(content: string): string[] {
  return content.split(/\r?\n/);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a JSON manifest whose root must be an object
 */
export function parseJsonObject(content: string, what: string): Record<string, unknown> {
  const data: unknown = JSON.parse(content);
  if (!isRecord(data)) {
    throw new Error(`${what} root is not an object`);
  }
  return data;
}
