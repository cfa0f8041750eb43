import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import { Classification, Finding, ScanResult, Verdict } from '../types';

const CLASSIFICATION_ICONS: Record<Classification, string> = {
  malicious: '🔴',
  suspicious: '🟠',
  clean: '🟢',
};

const CLASSIFICATION_COLORS: Record<Classification, (text: string) => string> = {
  malicious: chalk.red.bold,
  suspicious: chalk.hex('#FF8C00').bold,
  clean: chalk.green,
};

const POLICY_TITLES: Record<ScanResult['policy'], string> = {
  quick: 'Quick Scan',
  deep: 'Deep Scan',
  custom: 'Custom Scan',
};

const DIVIDER = chalk.cyan('  ' + '━'.repeat(54));

export function formatDuration(ms: number): string {
  const total = Math.floor(ms / 1000);
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const seconds = total % 60;
  if (hours > 0) return `${hours}h ${minutes}m ${seconds}s`;
  if (minutes > 0) return `${minutes}m ${seconds}s`;
  return `${seconds}s`;
}

/**
 * Render an ASCII risk bar colored by score.
 */
function riskBar(score: number, width = 10): string {
  const filled = Math.round((score / 100) * width);
  const color = score >= 70 ? chalk.red : score >= 40 ? chalk.yellow : chalk.green;
  return color('█'.repeat(filled)) + chalk.gray('░'.repeat(width - filled));
}

export function printReport(result: ScanResult): void {
  const s = result.statistics;
  const flagged = result.verdicts.filter(v => v.classification !== 'clean');

  console.log('');
  console.log(DIVIDER);
  console.log(chalk.bold.cyan('  🛡️  Endpoint Sentinel') + chalk.gray(`  ${POLICY_TITLES[result.policy]} Report`));
  console.log(DIVIDER);
  for (const root of result.roots) {
    console.log(chalk.gray(`  Root:      ${root}`));
  }
  for (const root of result.missingRoots) {
    console.log(chalk.gray(`  Missing:   ${root}`));
  }
  console.log(chalk.gray(`  Started:   ${s.startedAt.toISOString()}`));
  console.log(DIVIDER);
  console.log('');

  if (flagged.length === 0) {
    console.log(chalk.green.bold('  ✅ No threats found.'));
    console.log('');
  } else {
    for (const verdict of flagged) {
      printVerdict(verdict);
    }
  }

  printSummary(result);
}

function printVerdict(verdict: Verdict): void {
  const icon = CLASSIFICATION_ICONS[verdict.classification];
  const label = CLASSIFICATION_COLORS[verdict.classification](verdict.classification.toUpperCase().padEnd(10));

  console.log(`  ${icon} ${label} ${chalk.white.bold(verdict.path)}`);
  console.log(chalk.gray(`     Risk ${String(verdict.riskScore).padStart(3)}/100  ${riskBar(verdict.riskScore)}  sha256 ${verdict.digest}`));
  for (const finding of verdict.findings) {
    printFinding(finding);
  }
  console.log('');
}

function printFinding(finding: Finding): void {
  console.log(chalk.gray(`     • [${finding.detector}/${finding.category}] sev ${finding.severity}: `) + finding.title);
  console.log(chalk.gray(`       ${finding.rationale}`));
}

function printSummary(result: ScanResult): void {
  const s = result.statistics;
  const skippedTotal = Object.values(s.skipped).reduce((a, b) => a + b, 0);

  console.log(DIVIDER);
  console.log('');
  console.log(`  ${chalk.bold('Files Scanned:')}  ${s.filesScanned}`);
  console.log(`  ${chalk.bold('Suspicious:')}     ${s.suspiciousCount > 0 ? chalk.yellow(String(s.suspiciousCount)) : '0'}`);
  console.log(`  ${chalk.bold('Malicious:')}      ${s.maliciousCount > 0 ? chalk.red(String(s.maliciousCount)) : '0'}`);
  console.log(`  ${chalk.bold('Errors:')}         ${s.errorCount}`);
  if (skippedTotal > 0) {
    const parts = Object.entries(s.skipped)
      .filter(([, count]) => count > 0)
      .map(([reason, count]) => `${reason} ${count}`);
    console.log(`  ${chalk.bold('Skipped:')}        ${skippedTotal} ${chalk.gray(`(${parts.join(', ')})`)}`);
  }
  console.log('');
  console.log(chalk.gray(`  ⏱️  ${result.status === 'cancelled' ? 'Cancelled' : 'Completed'} in ${formatDuration(s.durationMs)}`));
  console.log('');

  if (result.status === 'cancelled') {
    console.log(chalk.yellow('  ⚠️  Scan interrupted; results cover the files scanned so far.'));
  }
  if (s.maliciousCount > 0) {
    console.log(chalk.red.bold('  ⚠️  Malicious files found! Isolate them before opening.'));
  } else if (s.suspiciousCount > 0) {
    console.log(chalk.hex('#FF8C00')('  ⚠️  Suspicious files require review.'));
  } else if (result.status === 'completed') {
    console.log(chalk.green('  ✨ No threats detected.'));
  }

  console.log('');
  console.log(DIVIDER);
  console.log('');
}

export function writeJsonReport(result: ScanResult, outputPath: string): void {
  const dir = path.dirname(outputPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  fs.writeFileSync(outputPath, JSON.stringify(result, null, 2), 'utf-8');
  console.log(chalk.gray(`  📄 JSON report saved to: ${outputPath}`));
  console.log('');
}
