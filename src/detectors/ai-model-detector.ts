import * as path from 'path';
import { Detector, Evidence, Finding, ThreatCategory } from '../types';

export const SUSPICIOUS_NAME_TOKENS = ['trojan', 'hack', 'crack', 'keygen', 'patch', 'warez', 'virus'];

export const MALICIOUS_THRESHOLD = 0.75;
export const SUSPICIOUS_THRESHOLD = 0.4;

export interface ModelScore {
  /** Confidence in [0, 1] */
  score: number;
  reasons: string[];
}

// Feature weights in tenths so the sums stay exact
const HIGH_ENTROPY_WEIGHT = 3;
const SMALL_EXECUTABLE_WEIGHT = 4;
const NAME_TOKEN_WEIGHT = 5;

/**
 * Feature-weighted stand-in for a trained classifier. Anything exposing the
 * same Detector contract can replace it without touching aggregation.
 */
export function scoreEvidence(evidence: Evidence): ModelScore {
  let tenths = 0;
  const reasons: string[] = [];

  if (evidence.entropy > 7.0) {
    tenths += HIGH_ENTROPY_WEIGHT;
    reasons.push(`High entropy ${evidence.entropy.toFixed(2)} (possible packing)`);
  }

  if (evidence.extension === '.exe' && evidence.sizeBytes < 1024) {
    tenths += SMALL_EXECUTABLE_WEIGHT;
    reasons.push('Unusually small executable');
  }

  const fileName = path.basename(evidence.path).toLowerCase();
  const token = SUSPICIOUS_NAME_TOKENS.find(t => fileName.includes(t));
  if (token) {
    tenths += NAME_TOKEN_WEIGHT;
    reasons.push(`Suspicious filename pattern: ${token}`);
  }

  return { score: Math.min(tenths, 10) / 10, reasons };
}

function categoryForName(fileName: string): ThreatCategory {
  if (fileName.includes('trojan')) return 'trojan';
  if (fileName.includes('virus')) return 'worm';
  return 'unclassified';
}

export class AiModelDetector implements Detector {
  readonly name = 'AI Model (heuristic stand-in)';
  readonly method = 'ai_model' as const;
  readonly description = 'Scores entropy, size/extension and filename features into a [0,1] confidence';

  evaluate(evidence: Evidence): Finding[] {
    const { score, reasons } = scoreEvidence(evidence);
    if (score < SUSPICIOUS_THRESHOLD) return [];

    const malicious = score >= MALICIOUS_THRESHOLD;
    return [{
      id: malicious ? 'AI-MALICIOUS' : 'AI-SUSPICIOUS',
      detector: 'ai_model',
      category: categoryForName(path.basename(evidence.path).toLowerCase()),
      severity: malicious ? 10 : 5,
      title: `Model classified file as ${malicious ? 'malicious' : 'suspicious'} (score ${score.toFixed(2)})`,
      rationale: reasons.join('; '),
    }];
  }
}
