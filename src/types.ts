/**
 * ClaimScout - Type Definitions
 */

// ============================================================
// Ecosystems & Manifests
// ============================================================

export type Ecosystem = 'npm' | 'pip' | 'maven' | 'gradle' | 'composer' | 'cargo' | 'go' | 'ruby' | 'nuget';

/**
 * Concrete file format handled by a manifest parser
 */
export type ManifestFormat =
  | 'package-json'
  | 'requirements'
  | 'setup-py'
  | 'pyproject'
  | 'pom'
  | 'gradle'
  | 'composer-json'
  | 'cargo-toml'
  | 'go-mod'
  | 'go-sum'
  | 'gemfile'
  | 'gemfile-lock'
  | 'packages-config'
  | 'msbuild-project';

export interface ManifestType {
  ecosystem: Ecosystem;
  format: ManifestFormat;
  /** Lower-cased basename, or suffix when `match` is 'suffix' */
  pattern: string;
  match: 'basename' | 'suffix';
}

// ============================================================
// Canonical Records
// ============================================================

export type PackageRole =
  | 'main_package'        // The manifest's own package identity
  | 'dependency'          // Declared dependency
  | 'script_reference';   // Package mentioned in a script command

export type VerificationStatus =
  | 'found'        // Name resolves in the registry
  | 'unclaimed'    // 404 - nobody owns the name
  | 'error';       // Retries exhausted

export type RiskReason = 'keyword_match' | 'short_name' | 'name_similarity' | 'none';

/**
 * Registry metadata kept for display
 */
export interface RegistryMetadata {
  name: string;
  latestVersion?: string;
  description?: string;
  versions: string[];
}

export interface Verification {
  status: VerificationStatus;
  isSuspicious: boolean;
  riskReason: RiskReason;
  checkedAt: string;
  attempts: number;
  errorDetail?: string;
  registry?: RegistryMetadata;
}

/**
 * One dependency declaration, normalized across ecosystems
 */
export interface PackageRecord {
  readonly name: string;
  readonly versionSpec: string;
  readonly role: PackageRole;
  readonly category: string;
  readonly ecosystem: Ecosystem;
  readonly sourceLocator: string;
  readonly label?: string;
  readonly verification?: Readonly<Verification>;
}

export interface RiskVerdict {
  isSuspicious: boolean;
  reason: RiskReason;
  /** Keyword or popular package name that triggered the verdict */
  matched?: string;
}

/** Version placeholder when a manifest declares none */
export const UNKNOWN_VERSION = 'unknown';

// ============================================================
// Extraction
// ============================================================

export interface FileFailure {
  file: string;
  message: string;
}

export interface ExtractionStats {
  filesScanned: number;
  filesWithRecords: number;
  filesFailed: number;
  recordsByEcosystem: Partial<Record<Ecosystem, number>>;
  failures: FileFailure[];
}

export interface ExtractionResult {
  rootDir: string;
  records: PackageRecord[];
  stats: ExtractionStats;
}

// ============================================================
// Verification
// ============================================================

export interface VerificationRun {
  records: PackageRecord[];
  outcomes: Map<string, Verification>;
  /** True when the run was aborted before every name was checked */
  cancelled: boolean;
  /** Names that never produced an outcome */
  skipped: string[];
}

// ============================================================
// Summary
// ============================================================

export type RiskLevel = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export interface RiskAssessment {
  level: RiskLevel;
  score: 0 | 1 | 2 | 3;
  totalRisks: number;
}

export interface ScanSummary {
  totalRecords: number;
  byEcosystem: Partial<Record<Ecosystem, number>>;
  byRole: Record<PackageRole, number>;
  found: number;
  unclaimed: number;
  suspicious: number;
  errors: number;
  checked: number;
  /** checked / (checked + errors), 0 when nothing was checked */
  successRate: number;
  files?: Omit<ExtractionStats, 'recordsByEcosystem'>;
  risk: RiskAssessment;
}

export interface ScanOutput {
  version: string;
  timestamp: string;
  rootDir: string;
  label?: string;
  cancelled: boolean;
  summary: ScanSummary;
  records: PackageRecord[];
}
