import { Detector, Evidence, Finding, ThreatCategory } from '../types';

export interface BehaviorPattern {
  name: string;
  category: ThreatCategory;
  indicators: string[];
  severity: number;
  description: string;
}

/**
 * Supplies runtime indicators observed for a file (process monitor, sandbox
 * run). Static scans have no such observer, hence the empty default.
 */
export interface IndicatorSource {
  indicatorsFor(filePath: string): ReadonlySet<string>;
}

export const NO_INDICATORS: IndicatorSource = {
  indicatorsFor: () => new Set<string>(),
};

export const BEHAVIOR_PATTERNS: BehaviorPattern[] = [
  {
    name: 'Ransomware_File_Encryption',
    category: 'ransomware',
    indicators: ['rapid_file_encryption', 'file_extension_change', 'ransom_note_creation'],
    severity: 9,
    description: 'File encryption behavior typical of ransomware',
  },
  {
    name: 'Trojan_Persistence',
    category: 'trojan',
    indicators: ['registry_run_key_modification', 'startup_folder_addition', 'scheduled_task_creation'],
    severity: 7,
    description: 'Persistence mechanisms used by trojans',
  },
  {
    name: 'Spyware_Data_Collection',
    category: 'spyware',
    indicators: ['screenshot_capture', 'keylogging', 'browser_history_access'],
    severity: 8,
    description: 'Data collection typical of spyware',
  },
  {
    name: 'Cryptominer_High_CPU',
    category: 'cryptominer',
    indicators: ['sustained_high_cpu_usage', 'connection_to_mining_pools', 'mining_software_detection'],
    severity: 9,
    description: 'Sustained CPU load and mining pool traffic',
  },
  {
    name: 'Rootkit_System_Hooking',
    category: 'rootkit',
    indicators: ['system_call_hooking', 'driver_manipulation', 'hidden_process'],
    severity: 8,
    description: 'System-level manipulation indicating a rootkit',
  },
  {
    name: 'Backdoor_Remote_Access',
    category: 'backdoor',
    indicators: ['remote_connection', 'unusual_port_listening', 'hidden_communication'],
    severity: 9,
    description: 'Remote access and control typical of backdoors',
  },
  {
    name: 'Worm_Self_Replication',
    category: 'worm',
    indicators: ['self_copying', 'network_propagation', 'system_resource_consumption'],
    severity: 8,
    description: 'Self-replicating and spreading behavior',
  },
  {
    name: 'Adware_Unwanted_Ads',
    category: 'adware',
    indicators: ['browser_redirection', 'unwanted_popups', 'browser_setting_modification'],
    severity: 6,
    description: 'Unwanted advertisements and browser setting changes',
  },
];

export function matchBehaviorPatterns(
  indicators: ReadonlySet<string>,
  patterns: BehaviorPattern[] = BEHAVIOR_PATTERNS,
): Finding[] {
  if (indicators.size === 0) return [];
  const findings: Finding[] = [];
  for (const pattern of patterns) {
    const hits = pattern.indicators.filter(i => indicators.has(i));
    if (hits.length === 0) continue;
    findings.push({
      id: `BH-${pattern.name}`,
      detector: 'behavioral',
      category: pattern.category,
      severity: pattern.severity,
      title: pattern.description,
      rationale: `Observed ${hits.join(', ')}`,
    });
  }
  return findings;
}

/**
 * Stand-in for live behavior analysis: matches the catalog against whatever
 * the injected indicator source reports for the file.
 */
export class BehavioralDetector implements Detector {
  readonly name = 'Behavioral Analyzer';
  readonly method = 'behavioral' as const;
  readonly description = 'Matches observed runtime indicators against known behavior patterns';

  constructor(
    private readonly source: IndicatorSource = NO_INDICATORS,
    private readonly patterns: BehaviorPattern[] = BEHAVIOR_PATTERNS,
  ) {}

  evaluate(evidence: Evidence): Finding[] {
    return matchBehaviorPatterns(this.source.indicatorsFor(evidence.path), this.patterns);
  }
}
