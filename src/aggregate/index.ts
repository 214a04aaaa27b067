/**
 * ClaimScout - Result Aggregator
 */

import type {
  ExtractionStats,
  PackageRecord,
  PackageRole,
  RiskAssessment,
  ScanSummary,
  Verification,
} from '../types.js';

/**
 * Attach verification outcomes to npm records by name.
 * Returns new record objects; the inputs are left untouched.
 */
export function mergeVerifications(
  records: readonly PackageRecord[],
  outcomes: ReadonlyMap<string, Verification>
): PackageRecord[] {
  return records.map(record => {
    if (record.ecosystem !== 'npm') return record;
    const verification = outcomes.get(record.name);
    return verification ? { ...record, verification } : record;
  });
}

export function assessRisk(unclaimed: number, suspicious: number): RiskAssessment {
  const totalRisks = unclaimed + suspicious;

  if (totalRisks === 0) return { level: 'LOW', score: 0, totalRisks };
  if (totalRisks < 5) return { level: 'MEDIUM', score: 1, totalRisks };
  if (totalRisks < 20) return { level: 'HIGH', score: 2, totalRisks };
  return { level: 'CRITICAL', score: 3, totalRisks };
}

export function summarize(records: readonly PackageRecord[], stats?: ExtractionStats): ScanSummary {
  const byEcosystem: ScanSummary['byEcosystem'] = {};
  const byRole: Record<PackageRole, number> = { main_package: 0, dependency: 0, script_reference: 0 };
  let found = 0;
  let unclaimed = 0;
  let suspicious = 0;
  let errors = 0;

  for (const record of records) {
    byEcosystem[record.ecosystem] = (byEcosystem[record.ecosystem] ?? 0) + 1;
    byRole[record.role]++;

    const verification = record.verification;
    if (!verification) continue;

    if (verification.status === 'found') found++;
    else if (verification.status === 'unclaimed') unclaimed++;
    else errors++;

    if (verification.isSuspicious) suspicious++;
  }

  const checked = found + unclaimed;

  const summary: ScanSummary = {
    totalRecords: records.length,
    byEcosystem,
    byRole,
    found,
    unclaimed,
    suspicious,
    errors,
    checked,
    successRate: checked === 0 ? 0 : checked / (checked + errors),
    risk: assessRisk(unclaimed, suspicious),
  };

  if (stats) {
    summary.files = {
      filesScanned: stats.filesScanned,
      filesWithRecords: stats.filesWithRecords,
      filesFailed: stats.filesFailed,
      failures: stats.failures,
    };
  }

  return summary;
}

/**
 * Plain-text report for terminals
 */
export function formatSummary(summary: ScanSummary, records: readonly PackageRecord[]): string {
  const lines: string[] = [];

  lines.push(`Records: ${summary.totalRecords}`);
  if (summary.files) {
    lines.push(
      `Files: ${summary.files.filesScanned} scanned, ${summary.files.filesWithRecords} with records, ${summary.files.filesFailed} failed`
    );
  }

  const ecosystems = Object.entries(summary.byEcosystem)
    .map(([ecosystem, count]) => `${ecosystem}=${count}`)
    .join(' ');
  if (ecosystems) lines.push(`Ecosystems: ${ecosystems}`);

  lines.push(
    `Verified: ${summary.checked} checked (${summary.found} found, ${summary.unclaimed} unclaimed), ${summary.errors} errors, success rate ${(summary.successRate * 100).toFixed(1)}%`
  );
  lines.push(`Risk: ${summary.risk.level} (${summary.risk.totalRisks} findings)`);

  const unclaimed = uniqueNames(records, r => r.verification?.status === 'unclaimed');
  if (unclaimed.length > 0) {
    lines.push('', 'Unclaimed packages:');
    for (const record of unclaimed) {
      lines.push(`  ${record.name}  (${record.sourceLocator})`);
    }
  }

  const suspicious = uniqueNames(records, r => r.verification?.isSuspicious === true);
  if (suspicious.length > 0) {
    lines.push('', 'Suspicious packages:');
    for (const record of suspicious) {
      lines.push(`  ${record.name}  [${record.verification?.riskReason ?? 'none'}]  (${record.sourceLocator})`);
    }
  }

  const failures = summary.files?.failures ?? [];
  if (failures.length > 0) {
    lines.push('', 'Unparsed files:');
    for (const failure of failures) {
      lines.push(`  ${failure.file}: ${failure.message}`);
    }
  }

  return lines.join('\n');
}

function uniqueNames(
  records: readonly PackageRecord[],
  predicate: (record: PackageRecord) => boolean
): PackageRecord[] {
  const seen = new Set<string>();
  return records.filter(record => {
    if (!predicate(record) || seen.has(record.name)) return false;
    seen.add(record.name);
    return true;
  });
}
