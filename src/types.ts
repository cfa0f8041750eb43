export type DetectionMethod = 'signature' | 'heuristic' | 'behavioral' | 'ai_model' | 'sandbox';

export type ThreatCategory =
  | 'ransomware'
  | 'trojan'
  | 'spyware'
  | 'rootkit'
  | 'cryptominer'
  | 'backdoor'
  | 'worm'
  | 'adware'
  | 'unclassified';

export type Classification = 'clean' | 'suspicious' | 'malicious';

/** Why the traversal engine left a path without a verdict. */
export type SkipReason =
  | 'symlink'
  | 'depth-limit'
  | 'extension-filter'
  | 'size-limit'
  | 'io-error'
  | 'timeout';

export type ScanStatus = 'completed' | 'cancelled';

export type PolicyName = 'quick' | 'deep' | 'custom';

/** Facts about one file, computed once by the evidence extractor. */
export interface Evidence {
  readonly path: string;
  readonly sizeBytes: number;
  readonly extension: string;
  readonly digestSHA256: string;
  readonly digestMD5?: string;
  /** Shannon entropy in bits per byte, 0.0 – 8.0 */
  readonly entropy: number;
  readonly contentSample: Buffer;
  /** Permission bits as reported by stat */
  readonly mode: number;
  readonly createdAt: Date;
}

export interface Finding {
  id: string;
  detector: DetectionMethod;
  category: ThreatCategory;
  /** Detector-local scale, integer 1 – 10 */
  severity: number;
  title: string;
  rationale: string;
}

export interface Verdict {
  path: string;
  riskScore: number;
  classification: Classification;
  /** Clean verdict that still carries low-weight findings */
  hasNotes: boolean;
  findings: Finding[];
  digest: string;
  sizeBytes: number;
}

export interface Statistics {
  filesScanned: number;
  suspiciousCount: number;
  maliciousCount: number;
  errorCount: number;
  skipped: Record<SkipReason, number>;
  startedAt: Date;
  finishedAt: Date | null;
  durationMs: number;
}

export interface ScanPolicy {
  readonly name: PolicyName;
  readonly rootPaths: readonly string[];
  readonly maxDepth: number;
  readonly targetExtensions: ReadonlySet<string> | 'all';
  readonly maxFileSizeBytes: number;
  /** Symlinked files are evaluated through their target; symlinked directories are never entered. */
  readonly followSymlinks: boolean;
  /** Compute MD5 digests so legacy signature keys can match */
  readonly useMd5Signatures: boolean;
}

export interface ScanResult {
  policy: PolicyName;
  roots: string[];
  missingRoots: string[];
  verdicts: Verdict[];
  statistics: Statistics;
  status: ScanStatus;
}

export interface ScanProgress {
  filesScanned: number;
  currentPath: string;
}

export type ProgressListener = (progress: ScanProgress) => void;

export interface DetectionContext {
  policy: ScanPolicy;
  /** Aborted when the file's deadline passes; long-running detectors must stop on it. */
  signal?: AbortSignal;
}

export interface Detector {
  readonly name: string;
  readonly method: DetectionMethod;
  readonly description: string;
  evaluate(evidence: Evidence, context: DetectionContext): Finding[] | Promise<Finding[]>;
}
