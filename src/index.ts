#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import { CliOptions, exitCodeFor, runScanCommand } from './cli';
import { PolicyName } from './types';
import { SentinelError } from './errors';

function positiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

const program = new Command();

program
  .name('sentinel')
  .description('🛡️ On-demand endpoint scanner: signature, heuristic, behavioral and model-based detection')
  .version('0.1.0');

function addScanOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', 'YAML config file (default: ./sentinel.config.yml when present)')
    .option('--signatures <file>', 'JSON signature database (digest → threat name)')
    .option('-o, --output <file>', 'Write JSON report to file')
    .option('--json', 'Always write a JSON report')
    .option('--concurrency <n>', 'Worker count (default: available cores)', positiveInt)
    .option('--timeout <ms>', 'Per-operation timeout in milliseconds', positiveInt)
    .option('--all-extensions', 'Scan every file instead of the executable/script allow-list')
    .option('-v, --verbose', 'Show debug logging');
}

async function execute(kind: PolicyName, target: string | undefined, options: CliOptions): Promise<void> {
  try {
    const result = await runScanCommand(kind, target, options);
    process.exitCode = exitCodeFor(result);
  } catch (err) {
    if (err instanceof SentinelError) {
      console.error(`Error: ${err.message}`);
    } else {
      console.error('Error:', err);
    }
    process.exitCode = 1;
  }
}

addScanOptions(
  program
    .command('quick')
    .description('Scan high-traffic user and system locations (depth 2)'),
).action((options: CliOptions) => execute('quick', undefined, options));

addScanOptions(
  program
    .command('deep')
    .description('Scan system, program and user locations (depth 5, MD5 signatures)'),
).action((options: CliOptions) => execute('deep', undefined, options));

addScanOptions(
  program
    .command('custom')
    .description('Scan one file or directory (depth 10)')
    .argument('<path>', 'File or directory to scan'),
).action((targetPath: string, options: CliOptions) => execute('custom', targetPath, options));

program.parseAsync().catch((err: unknown) => {
  console.error('Error:', err);
  process.exitCode = 1;
});
