/**
 * ClaimScout - Extraction Coordinator
 *
 * Walks a source tree, parses every recognized manifest and collects the
 * records. One unreadable or malformed file never drops the others.
 */

import { glob } from 'glob';
import { readFile, stat } from 'node:fs/promises';
import * as path from 'node:path';
import pLimit from 'p-limit';
import type { ExtractionResult, ExtractionStats, ManifestType, PackageRecord } from '../types.js';
import { ConfigurationError, errorMessage } from '../errors.js';
import { RunContext } from '../context.js';
import { detectManifest } from '../ecosystems/index.js';
import { parseManifest } from '../manifests/index.js';

export const DEFAULT_IGNORE_PATTERNS = ['**/node_modules/**', '**/.git/**'];

export interface ExtractorOptions {
  /** Extra glob patterns to ignore (merged with the defaults) */
  ignorePatterns?: string[];
  /** Files read and parsed at once (default: 10) */
  concurrency?: number;
  /** Scan package.json scripts for install commands (default: true) */
  scriptReferences?: boolean;
  context?: RunContext;
}

export interface ExtractOptions {
  /** Stamped on every record, e.g. a repository name */
  label?: string;
}

type FileOutcome =
  | { file: string; records: PackageRecord[] }
  | { file: string; error: string };

export class Extractor {
  readonly context: RunContext;
  private readonly ignorePatterns: string[];
  private readonly concurrency: number;
  private readonly scriptReferences: boolean;

  constructor(options: ExtractorOptions = {}) {
    this.context = options.context ?? new RunContext();
    this.ignorePatterns = [...new Set([...DEFAULT_IGNORE_PATTERNS, ...(options.ignorePatterns ?? [])])];
    this.concurrency = Math.max(1, options.concurrency ?? 10);
    this.scriptReferences = options.scriptReferences ?? true;
  }

  async extract(rootDir: string, options: ExtractOptions = {}): Promise<ExtractionResult> {
    const root = path.resolve(rootDir);
    await assertDirectory(root);

    const files = await this.findManifests(root);
    const limit = pLimit(this.concurrency);

    const outcomes = await Promise.all(
      files.map(({ file, type }) => limit(() => this.processFile(root, file, type)))
    );

    const records: PackageRecord[] = [];
    const stats: ExtractionStats = {
      filesScanned: files.length,
      filesWithRecords: 0,
      filesFailed: 0,
      recordsByEcosystem: {},
      failures: [],
    };

    for (const outcome of outcomes) {
      if ('error' in outcome) {
        stats.filesFailed++;
        stats.failures.push({ file: outcome.file, message: outcome.error });
        continue;
      }
      if (outcome.records.length > 0) {
        stats.filesWithRecords++;
      }
      for (const record of outcome.records) {
        records.push(options.label === undefined ? record : { ...record, label: options.label });
        stats.recordsByEcosystem[record.ecosystem] = (stats.recordsByEcosystem[record.ecosystem] ?? 0) + 1;
      }
    }

    const counters = this.context.counters;
    counters.filesScanned += stats.filesScanned;
    counters.filesWithRecords += stats.filesWithRecords;
    counters.filesFailed += stats.filesFailed;
    this.context.emit({ type: 'extraction_finished', rootDir: root, files: files.length, records: records.length });

    return { rootDir: root, records, stats };
  }

  /**
   * Every recognized manifest under the root, each file once.
   * Names are matched by detectManifest so case never depends on the filesystem.
   */
  async findManifests(root: string): Promise<Array<{ file: string; type: ManifestType }>> {
    const matches = await glob('**/*', {
      cwd: root,
      absolute: true,
      nodir: true,
      dot: true,
      ignore: this.ignorePatterns,
    });

    const found: Array<{ file: string; type: ManifestType }> = [];
    for (const file of [...new Set(matches)].sort()) {
      const type = detectManifest(file);
      if (type) found.push({ file, type });
    }
    return found;
  }

  private async processFile(root: string, file: string, type: ManifestType): Promise<FileOutcome> {
    const relative = path.relative(root, file).split(path.sep).join('/');

    let content: string;
    try {
      content = await readFile(file, 'utf-8');
    } catch (error) {
      const message = `Failed to read ${relative}: ${errorMessage(error)}`;
      this.context.emit({ type: 'manifest_failed', file: relative, ecosystem: type.ecosystem, message });
      return { file: relative, error: message };
    }

    const result = parseManifest(relative, content, { scriptReferences: this.scriptReferences }, type);
    if (!result.ok) {
      this.context.emit({
        type: 'manifest_failed',
        file: relative,
        ecosystem: result.error.ecosystem,
        message: result.error.message,
      });
      return { file: relative, error: result.error.message };
    }

    this.context.emit({
      type: 'manifest_parsed',
      file: relative,
      ecosystem: type.ecosystem,
      records: result.records.length,
    });
    return { file: relative, records: result.records };
  }
}

async function assertDirectory(root: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(root)).isDirectory();
  } catch (error) {
    throw new ConfigurationError(`Cannot read source directory ${root}: ${errorMessage(error)}`, { cause: error });
  }
  if (!isDirectory) {
    throw new ConfigurationError(`Source path is not a directory: ${root}`);
  }
}
