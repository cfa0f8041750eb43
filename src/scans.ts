import * as fs from 'fs';
import * as path from 'path';
import { ProgressListener, ScanPolicy, ScanResult } from './types';
import { PathNotFoundError } from './errors';
import { DetectorRegistry, createDefaultRegistry } from './detector-registry';
import { IndicatorSource } from './detectors/behavioral-detector';
import { SignatureStore, defaultSignaturesPath, loadSignatureStore } from './signatures/signature-store';
import { ScanSession } from './engine/scan-session';
import { customPolicy, deepPolicy, expandHome, quickPolicy } from './engine/policies';
import { SentinelConfig, policyOverrides } from './utils/config-loader';
import { Logger, noopLogger } from './utils/logger';

export interface ScanOptions {
  config?: SentinelConfig;
  /** Loaded at session start when absent: config.signatures, then the bundled database. */
  signatures?: SignatureStore;
  indicators?: IndicatorSource;
  /** Replaces the default detector set entirely. */
  registry?: DetectorRegistry;
  logger?: Logger;
  onProgress?: ProgressListener;
  signal?: AbortSignal;
  /** Receives the session before it runs, e.g. to wire cancellation. */
  onSession?: (session: ScanSession) => void;
}

export function resolveSignatures(options: ScanOptions): SignatureStore {
  if (options.signatures) return options.signatures;
  const file = options.config?.signatures ?? defaultSignaturesPath();
  if (!file) {
    (options.logger ?? noopLogger).warn('No signature database found; signature detection disabled');
    return SignatureStore.empty();
  }
  return loadSignatureStore(file);
}

async function runWithPolicy(policy: ScanPolicy, options: ScanOptions): Promise<ScanResult> {
  const logger = options.logger ?? noopLogger;
  const signatures = resolveSignatures(options);
  const registry = options.registry ?? createDefaultRegistry({
    signatures,
    indicators: options.indicators,
    logger,
  });

  const session = new ScanSession({
    policy,
    registry,
    signatures,
    logger,
    concurrency: options.config?.concurrency,
    operationTimeoutMs: options.config?.operationTimeoutMs,
    progressInterval: options.config?.progressInterval,
    onProgress: options.onProgress,
    signal: options.signal,
  });
  options.onSession?.(session);
  return session.run();
}

export async function runQuickScan(options: ScanOptions = {}): Promise<ScanResult> {
  return runWithPolicy(quickPolicy(policyOverrides(options.config ?? {}, 'quick')), options);
}

export async function runDeepScan(options: ScanOptions = {}): Promise<ScanResult> {
  return runWithPolicy(deepPolicy(policyOverrides(options.config ?? {}, 'deep')), options);
}

/**
 * Scan one caller-supplied file or directory. Rejects with PathNotFoundError
 * before any traversal when the path does not exist.
 */
export async function runCustomScan(targetPath: string, options: ScanOptions = {}): Promise<ScanResult> {
  const absolute = path.resolve(expandHome(targetPath));
  if (!fs.existsSync(absolute)) {
    throw new PathNotFoundError(absolute);
  }
  return runWithPolicy(customPolicy(absolute, policyOverrides(options.config ?? {}, 'custom')), options);
}
