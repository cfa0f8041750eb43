import { ProgressListener, ScanPolicy, ScanResult, ScanStatus } from '../types';
import { DetectorRegistry } from '../detector-registry';
import { SignatureStore } from '../signatures/signature-store';
import { Logger, noopLogger } from '../utils/logger';
import { StatisticsAccumulator } from './statistics';
import { EvidenceExtractor, PathState, TraversalEngine } from './traversal-engine';
import { resolveRoots } from './policies';

export interface SessionOptions {
  policy: ScanPolicy;
  registry: DetectorRegistry;
  /** Store the signature detector was built with; kept for reporting. */
  signatures?: SignatureStore;
  logger?: Logger;
  concurrency?: number;
  maxQueuedFiles?: number;
  operationTimeoutMs?: number;
  progressInterval?: number;
  onProgress?: ProgressListener;
  onStateChange?: (state: PathState) => void;
  /** External cancellation, e.g. wired to SIGINT. */
  signal?: AbortSignal;
  extractor?: EvidenceExtractor;
}

/**
 * One end-to-end scan. The session owns its policy and statistics; run()
 * always resolves with a result, partial when cancelled.
 */
export class ScanSession {
  private readonly controller = new AbortController();
  private readonly logger: Logger;
  private engine: TraversalEngine | null = null;
  private started = false;

  constructor(private readonly options: SessionOptions) {
    this.logger = options.logger ?? noopLogger;
    const external = options.signal;
    if (external) {
      if (external.aborted) this.controller.abort();
      else external.addEventListener('abort', () => this.cancel(), { once: true });
    }
  }

  get policy(): ScanPolicy {
    return this.options.policy;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  /** Workers still evaluating a file; zero once run() has resolved. */
  get activeWorkers(): number {
    return this.engine?.activeWorkers ?? 0;
  }

  cancel(): void {
    if (this.controller.signal.aborted) return;
    this.logger.info('Cancellation requested; finishing files in progress');
    this.controller.abort();
  }

  async run(): Promise<ScanResult> {
    if (this.started) {
      throw new Error('ScanSession.run() may only be called once');
    }
    this.started = true;

    const { policy } = this.options;
    const stats = new StatisticsAccumulator();
    const { roots, missing } = await resolveRoots(policy.rootPaths);
    for (const root of missing) {
      this.logger.warn(`Path not found: ${root}`);
    }
    this.logger.info(`Starting ${policy.name} scan`, {
      roots: roots.length,
      maxDepth: policy.maxDepth,
      signatures: this.options.signatures?.size,
    });

    this.engine = new TraversalEngine({
      policy,
      registry: this.options.registry,
      stats,
      logger: this.logger,
      concurrency: this.options.concurrency,
      maxQueuedFiles: this.options.maxQueuedFiles,
      operationTimeoutMs: this.options.operationTimeoutMs,
      progressInterval: this.options.progressInterval,
      onProgress: this.options.onProgress,
      onStateChange: this.options.onStateChange,
      signal: this.controller.signal,
      extractor: this.options.extractor,
    });

    const verdicts = await this.engine.run(roots);
    const status: ScanStatus = this.cancelled ? 'cancelled' : 'completed';
    const statistics = stats.finish();

    this.logger.info(`Scan ${status}`, {
      filesScanned: statistics.filesScanned,
      suspicious: statistics.suspiciousCount,
      malicious: statistics.maliciousCount,
      errors: statistics.errorCount,
    });

    return {
      policy: policy.name,
      roots,
      missingRoots: missing,
      verdicts: [...verdicts].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0)),
      statistics,
      status,
    };
  }
}
