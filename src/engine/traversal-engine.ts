import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import PQueue from 'p-queue';
import { Evidence, ProgressListener, ScanPolicy, SkipReason, Verdict } from '../types';
import { IOError, SentinelError, TimeoutError, describeError, withTimeout } from '../errors';
import { DetectorRegistry } from '../detector-registry';
import { StatisticsAccumulator } from './statistics';
import { ExtractOptions, extractEvidence, fileExtension } from '../utils/evidence-extractor';
import { aggregate } from '../utils/scorer';
import { Logger, noopLogger } from '../utils/logger';

export type PathState =
  | { kind: 'pending'; path: string; depth: number }
  | { kind: 'visiting'; path: string; depth: number }
  | { kind: 'skipped'; path: string; depth: number; reason: SkipReason }
  | { kind: 'done'; path: string; depth: number; verdict?: Verdict };

export type EvidenceExtractor = (filePath: string, options: ExtractOptions) => Promise<Evidence>;

type EntryKind = 'directory' | 'file' | 'symlink' | 'other';

export const DEFAULT_OPERATION_TIMEOUT_MS = 30_000;
export const DEFAULT_PROGRESS_INTERVAL = 100;

export interface TraversalOptions {
  policy: ScanPolicy;
  registry: DetectorRegistry;
  stats: StatisticsAccumulator;
  logger?: Logger;
  /** Worker count; defaults to the number of available cores. */
  concurrency?: number;
  /** Files waiting for a worker before the walker pauses. */
  maxQueuedFiles?: number;
  operationTimeoutMs?: number;
  progressInterval?: number;
  onProgress?: ProgressListener;
  onStateChange?: (state: PathState) => void;
  signal?: AbortSignal;
  extractor?: EvidenceExtractor;
}

function kindOf(entry: fs.Dirent | fs.Stats): EntryKind {
  if (entry.isSymbolicLink()) return 'symlink';
  if (entry.isDirectory()) return 'directory';
  if (entry.isFile()) return 'file';
  return 'other';
}

/**
 * Walks root paths on a single producer and evaluates files on a bounded
 * worker pool. Each path moves pending → visiting → done, or ends skipped;
 * failures on one path never stop its siblings.
 */
export class TraversalEngine {
  private readonly policy: ScanPolicy;
  private readonly registry: DetectorRegistry;
  private readonly stats: StatisticsAccumulator;
  private readonly logger: Logger;
  private readonly queue: PQueue;
  private readonly maxQueuedFiles: number;
  private readonly timeoutMs: number;
  private readonly progressInterval: number;
  private readonly extractor: EvidenceExtractor;
  private readonly verdicts: Verdict[] = [];
  private readonly aborted: Promise<void>;

  constructor(private readonly options: TraversalOptions) {
    this.policy = options.policy;
    this.registry = options.registry;
    this.stats = options.stats;
    this.logger = options.logger ?? noopLogger;
    const concurrency = Math.max(1, options.concurrency ?? os.availableParallelism());
    this.queue = new PQueue({ concurrency });
    this.maxQueuedFiles = Math.max(1, options.maxQueuedFiles ?? concurrency * 16);
    this.timeoutMs = options.operationTimeoutMs ?? DEFAULT_OPERATION_TIMEOUT_MS;
    this.progressInterval = Math.max(1, options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL);
    this.extractor = options.extractor ?? extractEvidence;

    const signal = options.signal;
    this.aborted = new Promise<void>((resolve) => {
      if (!signal) return;
      if (signal.aborted) {
        resolve();
        return;
      }
      signal.addEventListener('abort', () => resolve(), { once: true });
    });
  }

  get cancelled(): boolean {
    return this.options.signal?.aborted ?? false;
  }

  /** Workers currently evaluating a file. */
  get activeWorkers(): number {
    return this.queue.pending;
  }

  async run(roots: readonly string[]): Promise<Verdict[]> {
    for (const root of roots) {
      if (this.cancelled) break;
      await this.visitRoot(root);
    }
    if (this.cancelled) {
      // Queued files that no worker picked up yet are dropped; in-flight ones finish
      this.queue.clear();
    }
    await this.queue.onIdle();
    return this.verdicts;
  }

  private async visitRoot(root: string): Promise<void> {
    this.transition({ kind: 'pending', path: root, depth: 0 });
    let stat: fs.Stats;
    try {
      stat = await withTimeout(() => fs.promises.lstat(root), this.timeoutMs, `lstat ${root}`);
    } catch (err) {
      this.fail(root, 0, err);
      return;
    }
    // A file named directly as a root is scanned whatever its extension
    await this.visit(root, 0, kindOf(stat), true);
  }

  private async visit(entryPath: string, depth: number, kind: EntryKind, explicit = false): Promise<void> {
    if (kind === 'symlink') {
      await this.visitSymlink(entryPath, depth);
      return;
    }
    if (depth > this.policy.maxDepth) {
      this.skip(entryPath, depth, 'depth-limit');
      return;
    }
    if (kind === 'directory') {
      await this.visitDirectory(entryPath, depth);
      return;
    }
    if (kind === 'file') {
      if (!explicit && !this.matchesExtension(entryPath)) {
        this.skip(entryPath, depth, 'extension-filter');
        return;
      }
      await this.enqueueFile(entryPath, depth);
    }
    // sockets, fifos and devices are not scan targets
  }

  private async visitSymlink(linkPath: string, depth: number): Promise<void> {
    if (!this.policy.followSymlinks) {
      this.skip(linkPath, depth, 'symlink');
      return;
    }
    let target: fs.Stats;
    try {
      target = await withTimeout(() => fs.promises.stat(linkPath), this.timeoutMs, `stat ${linkPath}`);
    } catch (err) {
      this.fail(linkPath, depth, err);
      return;
    }
    // Linked directories are never entered, following or not
    if (!target.isFile()) {
      this.skip(linkPath, depth, 'symlink');
      return;
    }
    await this.visit(linkPath, depth, 'file');
  }

  private async visitDirectory(dir: string, depth: number): Promise<void> {
    this.transition({ kind: 'visiting', path: dir, depth });
    let entries: fs.Dirent[];
    try {
      entries = await withTimeout(
        () => fs.promises.readdir(dir, { withFileTypes: true }),
        this.timeoutMs,
        `readdir ${dir}`,
      );
    } catch (err) {
      this.fail(dir, depth, err);
      return;
    }

    for (const entry of entries) {
      if (this.cancelled) return;
      const childPath = path.join(dir, entry.name);
      this.transition({ kind: 'pending', path: childPath, depth: depth + 1 });
      await this.visit(childPath, depth + 1, kindOf(entry));
    }
    this.transition({ kind: 'done', path: dir, depth });
  }

  private matchesExtension(filePath: string): boolean {
    const targets = this.policy.targetExtensions;
    return targets === 'all' || targets.has(fileExtension(filePath));
  }

  private async enqueueFile(filePath: string, depth: number): Promise<void> {
    if (this.queue.size >= this.maxQueuedFiles) {
      await Promise.race([this.queue.onEmpty(), this.aborted]);
    }
    if (this.cancelled) return;
    this.queue.add(() => this.evaluateFile(filePath, depth)).catch((err: unknown) => {
      this.logger.error(`Worker failed on ${filePath}: ${describeError(err)}`);
    });
  }

  private async evaluateFile(filePath: string, depth: number): Promise<void> {
    // Queued before cancellation but not started: leave it
    if (this.cancelled) return;

    let outcome: Verdict | 'size-limit';
    try {
      outcome = await withTimeout((signal) => this.inspect(filePath, signal), this.timeoutMs, `scan ${filePath}`);
    } catch (err) {
      this.fail(filePath, depth, err);
      return;
    }

    if (outcome === 'size-limit') {
      this.skip(filePath, depth, 'size-limit');
      return;
    }

    this.verdicts.push(outcome);
    this.stats.recordVerdict(outcome);
    this.transition({ kind: 'done', path: filePath, depth, verdict: outcome });
    if (outcome.classification !== 'clean') {
      this.logger.warn(`${outcome.classification.toUpperCase()} ${filePath}`, { riskScore: outcome.riskScore });
    }
    this.reportProgress(filePath);
  }

  private async inspect(filePath: string, signal: AbortSignal): Promise<Verdict | 'size-limit'> {
    let sizeBytes: number;
    try {
      sizeBytes = (await fs.promises.stat(filePath)).size;
    } catch (err) {
      throw new IOError(filePath, err);
    }
    // Oversized files are never opened
    if (sizeBytes > this.policy.maxFileSizeBytes) return 'size-limit';

    const evidence = await this.extractor(filePath, { computeMd5: this.policy.useMd5Signatures, signal });
    const findings = await this.registry.evaluateAll(evidence, { policy: this.policy, signal });
    return aggregate(evidence.path, evidence.digestSHA256, findings, evidence.sizeBytes);
  }

  private reportProgress(currentPath: string): void {
    const listener = this.options.onProgress;
    const filesScanned = this.stats.filesScanned;
    if (!listener || filesScanned % this.progressInterval !== 0) return;
    try {
      listener({ filesScanned, currentPath });
    } catch (err) {
      this.logger.warn(`Progress listener threw: ${describeError(err)}`);
    }
  }

  private skip(entryPath: string, depth: number, reason: SkipReason): void {
    this.stats.recordSkip(reason);
    this.transition({ kind: 'skipped', path: entryPath, depth, reason });
  }

  private fail(entryPath: string, depth: number, err: unknown): void {
    const reason: SkipReason = err instanceof TimeoutError ? 'timeout' : 'io-error';
    const error = err instanceof SentinelError ? err : new IOError(entryPath, err);
    this.logger.warn(error.message, { reason });
    this.skip(entryPath, depth, reason);
  }

  private transition(state: PathState): void {
    this.options.onStateChange?.(state);
  }
}
