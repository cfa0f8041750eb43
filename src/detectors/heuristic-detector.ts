import * as path from 'path';
import { Detector, Evidence, Finding, ThreatCategory } from '../types';

export interface HeuristicRule {
  id: string;
  pattern: RegExp;
  severity: number;
  category: ThreatCategory;
  description: string;
}

// Order is display order; every matching rule contributes once.
export const HEURISTIC_RULES: HeuristicRule[] = [
  // System modification
  { id: 'HR-001', pattern: /registry\.SetValue/i, severity: 3, category: 'trojan', description: 'Registry modification' },
  { id: 'HR-002', pattern: /Process\.Start/i, severity: 2, category: 'trojan', description: 'Process launch' },
  { id: 'HR-003', pattern: /File\.Delete/i, severity: 2, category: 'ransomware', description: 'File deletion' },
  // Network activity
  { id: 'HR-004', pattern: /Socket\.Connect/i, severity: 2, category: 'backdoor', description: 'Raw socket connection' },
  { id: 'HR-005', pattern: /Http(?:Client|Request)/i, severity: 2, category: 'backdoor', description: 'HTTP client usage' },
  // Encryption
  { id: 'HR-006', pattern: /Crypto(?:stream|provider)/i, severity: 3, category: 'ransomware', description: 'Crypto stream or provider' },
  { id: 'HR-007', pattern: /\b(?:Rijndael|AES|RSA)\b/i, severity: 3, category: 'ransomware', description: 'Bulk cipher reference' },
  // Process injection
  { id: 'HR-008', pattern: /WriteProcessMemory/i, severity: 4, category: 'trojan', description: 'Cross-process memory write' },
  { id: 'HR-009', pattern: /CreateRemoteThread/i, severity: 4, category: 'trojan', description: 'Remote thread creation' },
  { id: 'HR-010', pattern: /NtCreateThreadEx/i, severity: 4, category: 'rootkit', description: 'Native thread creation' },
  // Obfuscation
  { id: 'HR-011', pattern: /VirtualAllocEx/i, severity: 3, category: 'trojan', description: 'Remote memory allocation' },
  { id: 'HR-012', pattern: /VirtualProtectEx/i, severity: 3, category: 'trojan', description: 'Remote memory protection change' },
  // Persistence
  { id: 'HR-013', pattern: /\bRun\s*=/i, severity: 3, category: 'trojan', description: 'Registry Run key' },
  { id: 'HR-014', pattern: /StartupFolder/i, severity: 3, category: 'trojan', description: 'Startup folder persistence' },
  // File operations
  { id: 'HR-015', pattern: /\.(?:exe|dll|sys)\b/i, severity: 1, category: 'unclassified', description: 'Executable file reference' },
  { id: 'HR-016', pattern: /CreateFile|WriteFile/i, severity: 2, category: 'unclassified', description: 'Raw file I/O' },
];

const SMALL_EXECUTABLE_EXTENSIONS = new Set(['.exe', '.dll']);
const SMALL_EXECUTABLE_BYTES = 1024;
const WORLD_WRITABLE = 0o002;

export function decodeSample(sample: Buffer): string {
  // Invalid sequences are dropped so a stray byte cannot split a pattern
  return new TextDecoder('utf-8', { fatal: false }).decode(sample).replace(/\uFFFD/g, '');
}

export function matchContentRules(content: string, rules: HeuristicRule[] = HEURISTIC_RULES): Finding[] {
  const findings: Finding[] = [];
  for (const rule of rules) {
    const match = rule.pattern.exec(content);
    if (!match) continue;
    findings.push({
      id: rule.id,
      detector: 'heuristic',
      category: rule.category,
      severity: rule.severity,
      title: rule.description,
      rationale: `Matched pattern ${rule.pattern.source} ("${match[0].substring(0, 60)}")`,
    });
  }
  return findings;
}

export function checkAttributes(evidence: Evidence): Finding[] {
  const findings: Finding[] = [];

  if (path.basename(evidence.path).startsWith('.')) {
    findings.push({
      id: 'HA-HIDDEN',
      detector: 'heuristic',
      category: 'unclassified',
      severity: 1,
      title: 'Hidden file',
      rationale: 'File name starts with a dot',
    });
  }

  if (process.platform !== 'win32' && (evidence.mode & WORLD_WRITABLE) !== 0) {
    findings.push({
      id: 'HA-WORLD-WRITABLE',
      detector: 'heuristic',
      category: 'unclassified',
      severity: 2,
      title: 'World-writable file',
      rationale: `Permission bits ${(evidence.mode & 0o777).toString(8)} allow writes by any user`,
    });
  }

  if (SMALL_EXECUTABLE_EXTENSIONS.has(evidence.extension) && evidence.sizeBytes < SMALL_EXECUTABLE_BYTES) {
    findings.push({
      id: 'HA-SMALL-EXECUTABLE',
      detector: 'heuristic',
      category: 'unclassified',
      severity: 2,
      title: 'Unusually small executable',
      rationale: `${evidence.extension} file of ${evidence.sizeBytes} bytes`,
    });
  }

  return findings;
}

export class HeuristicDetector implements Detector {
  readonly name = 'Heuristic Analyzer';
  readonly method = 'heuristic' as const;
  readonly description = 'Content pattern rules plus file attribute checks';

  constructor(private readonly rules: HeuristicRule[] = HEURISTIC_RULES) {}

  evaluate(evidence: Evidence): Finding[] {
    return [
      ...matchContentRules(decodeSample(evidence.contentSample), this.rules),
      ...checkAttributes(evidence),
    ];
  }
}
