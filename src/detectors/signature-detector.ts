import { Detector, Evidence, Finding, ThreatCategory } from '../types';
import { SignatureStore } from '../signatures/signature-store';

const CATEGORY_PREFIXES: ReadonlyMap<string, ThreatCategory> = new Map<string, ThreatCategory>([
  ['ransomware', 'ransomware'],
  ['trojan', 'trojan'],
  ['spyware', 'spyware'],
  ['keylogger', 'spyware'],
  ['rootkit', 'rootkit'],
  ['cryptominer', 'cryptominer'],
  ['miner', 'cryptominer'],
  ['backdoor', 'backdoor'],
  ['worm', 'worm'],
  ['adware', 'adware'],
]);

/**
 * Threat names follow the `Family.Variant` convention; the family decides the
 * category. Unknown families fall back to unclassified.
 */
export function categoryFromThreatName(threatName: string): ThreatCategory {
  const family = threatName.split(/[.:/\s]/)[0].toLowerCase();
  return CATEGORY_PREFIXES.get(family) ?? 'unclassified';
}

export class SignatureDetector implements Detector {
  readonly name = 'Signature Detector';
  readonly method = 'signature' as const;
  readonly description = 'Exact digest match against the known-malware signature store';

  constructor(private readonly store: SignatureStore) {}

  evaluate(evidence: Evidence): Finding[] {
    const keys = [evidence.digestSHA256, evidence.digestMD5].filter((d): d is string => !!d);
    for (const digest of keys) {
      const threatName = this.store.lookup(digest);
      if (threatName === undefined) continue;
      return [{
        id: `SIG-${digest}`,
        detector: 'signature',
        category: categoryFromThreatName(threatName),
        severity: 10,
        title: `Known malware: ${threatName}`,
        rationale: `Digest ${digest} matches signature "${threatName}"`,
      }];
    }
    return [];
  }
}
