import { SkipReason, Statistics, Verdict } from '../types';

const ERROR_REASONS: ReadonlySet<SkipReason> = new Set<SkipReason>(['io-error', 'timeout']);

export function emptySkipCounts(): Record<SkipReason, number> {
  return {
    'symlink': 0,
    'depth-limit': 0,
    'extension-filter': 0,
    'size-limit': 0,
    'io-error': 0,
    'timeout': 0,
  };
}

/**
 * The one place scan counters change. Workers report through it and nothing
 * else holds a mutable reference; once frozen, further updates are ignored.
 */
export class StatisticsAccumulator {
  private readonly stats: Statistics;
  private frozen = false;

  constructor(startedAt: Date = new Date()) {
    this.stats = {
      filesScanned: 0,
      suspiciousCount: 0,
      maliciousCount: 0,
      errorCount: 0,
      skipped: emptySkipCounts(),
      startedAt,
      finishedAt: null,
      durationMs: 0,
    };
  }

  recordVerdict(verdict: Verdict): void {
    if (this.frozen) return;
    this.stats.filesScanned++;
    if (verdict.classification === 'malicious') this.stats.maliciousCount++;
    else if (verdict.classification === 'suspicious') this.stats.suspiciousCount++;
  }

  recordSkip(reason: SkipReason): void {
    if (this.frozen) return;
    this.stats.skipped[reason]++;
    if (ERROR_REASONS.has(reason)) this.stats.errorCount++;
  }

  get filesScanned(): number {
    return this.stats.filesScanned;
  }

  snapshot(): Statistics {
    return { ...this.stats, skipped: { ...this.stats.skipped } };
  }

  finish(finishedAt: Date = new Date()): Readonly<Statistics> {
    if (!this.frozen) {
      this.frozen = true;
      this.stats.finishedAt = finishedAt;
      this.stats.durationMs = finishedAt.getTime() - this.stats.startedAt.getTime();
      Object.freeze(this.stats.skipped);
      Object.freeze(this.stats);
    }
    return this.stats;
  }
}
