import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import { PolicyName, ScanProgress, ScanResult } from './types';
import { ScanOptions, runCustomScan, runDeepScan, runQuickScan } from './scans';
import { DEFAULT_CONFIG_FILE, SentinelConfig, loadConfig } from './utils/config-loader';
import { createConsoleLogger } from './utils/logger';
import { printReport, writeJsonReport } from './utils/reporter';

export interface CliOptions {
  config?: string;
  signatures?: string;
  output?: string;
  json?: boolean;
  concurrency?: number;
  timeout?: number;
  allExtensions?: boolean;
  verbose?: boolean;
}

/**
 * Merge the config file (explicit, or sentinel.config.yml in the working
 * directory) with command-line flags. Flags win.
 */
export function resolveConfig(options: CliOptions, cwd: string = process.cwd()): SentinelConfig {
  let config: SentinelConfig = {};
  if (options.config) {
    config = loadConfig(path.resolve(cwd, options.config));
  } else if (fs.existsSync(path.join(cwd, DEFAULT_CONFIG_FILE))) {
    config = loadConfig(path.join(cwd, DEFAULT_CONFIG_FILE));
  }

  return {
    ...config,
    ...(options.concurrency !== undefined ? { concurrency: options.concurrency } : {}),
    ...(options.timeout !== undefined ? { operationTimeoutMs: options.timeout } : {}),
    ...(options.allExtensions ? { extensions: 'all' as const } : {}),
    ...(options.signatures ? { signatures: path.resolve(cwd, options.signatures) } : {}),
  };
}

function progressLine(progress: ScanProgress): string {
  const maxPath = 60;
  const shown = progress.currentPath.length > maxPath
    ? '…' + progress.currentPath.slice(-(maxPath - 1))
    : progress.currentPath;
  return `\r  ${chalk.cyan(String(progress.filesScanned).padStart(7))} files · ${chalk.gray(shown.padEnd(maxPath))}`;
}

export async function runScanCommand(kind: PolicyName, target: string | undefined, options: CliOptions): Promise<ScanResult> {
  const logger = createConsoleLogger({ verbose: options.verbose });
  const config = resolveConfig(options);
  const controller = new AbortController();
  const interactive = process.stdout.isTTY === true;

  const onSigint = (): void => {
    process.stdout.write('\n');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  const scanOptions: ScanOptions = {
    config,
    logger,
    signal: controller.signal,
    onProgress: interactive ? (p) => process.stdout.write(progressLine(p)) : undefined,
  };

  console.log('');
  console.log(chalk.cyan(`  🛡️  Endpoint Sentinel ${kind} scan...`));
  if (target) console.log(chalk.gray(`  Target: ${path.resolve(target)}`));
  console.log(chalk.gray('  Press Ctrl+C to stop and keep partial results'));
  console.log('');

  const runners: Record<PolicyName, () => Promise<ScanResult>> = {
    quick: () => runQuickScan(scanOptions),
    deep: () => runDeepScan(scanOptions),
    custom: () => runCustomScan(target ?? '.', scanOptions),
  };

  let result: ScanResult;
  try {
    result = await runners[kind]();
  } finally {
    process.removeListener('SIGINT', onSigint);
    if (interactive) process.stdout.write('\n');
  }

  printReport(result);

  if (options.json || options.output) {
    const outputPath = options.output ?? path.join(process.cwd(), 'sentinel-report.json');
    writeJsonReport(result, outputPath);
  }

  return result;
}

export function exitCodeFor(result: ScanResult): number {
  if (result.statistics.maliciousCount > 0) return 2;
  if (result.statistics.suspiciousCount > 0) return 1;
  return 0;
}
