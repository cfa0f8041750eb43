import { Classification, DetectionMethod, Finding, Verdict } from '../types';

// Severity 1 – 10 is inflated ×10 and capped, so one severity-10 finding saturates
const SEVERITY_MULTIPLIER = 10;
const MAX_RISK_SCORE = 100;

export const MALICIOUS_SCORE = 70;
export const SUSPICIOUS_SCORE = 40;

const DETECTOR_ORDER: Record<DetectionMethod, number> = {
  signature: 0,
  heuristic: 1,
  behavioral: 2,
  ai_model: 3,
  sandbox: 4,
};

function compareFindings(a: Finding, b: Finding): number {
  return (
    DETECTOR_ORDER[a.detector] - DETECTOR_ORDER[b.detector] ||
    b.severity - a.severity ||
    compareStrings(a.id, b.id) ||
    compareStrings(a.title, b.title) ||
    compareStrings(a.rationale, b.rationale) ||
    compareStrings(a.category, b.category)
  );
}

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** Canonical order so any permutation of the same findings aggregates identically. */
export function sortFindings(findings: readonly Finding[]): Finding[] {
  return [...findings].sort(compareFindings);
}

export function calculateRiskScore(findings: readonly Finding[]): number {
  const total = findings.reduce((sum, f) => sum + Math.max(0, f.severity), 0);
  return Math.min(MAX_RISK_SCORE, total * SEVERITY_MULTIPLIER);
}

/** Exact known-bad match overrides whatever the heuristics concluded. */
export function hasSignatureMatch(findings: readonly Finding[]): boolean {
  return findings.some(f => f.detector === 'signature' && f.severity >= 10);
}

export function classifyScore(riskScore: number): Classification {
  if (riskScore >= MALICIOUS_SCORE) return 'malicious';
  if (riskScore >= SUSPICIOUS_SCORE) return 'suspicious';
  return 'clean';
}

export function aggregate(
  filePath: string,
  digest: string,
  findings: readonly Finding[],
  sizeBytes = 0,
): Verdict {
  const sorted = sortFindings(findings);
  const riskScore = calculateRiskScore(sorted);
  const classification = hasSignatureMatch(sorted) ? 'malicious' : classifyScore(riskScore);

  return {
    path: filePath,
    riskScore,
    classification,
    hasNotes: classification === 'clean' && sorted.length > 0,
    findings: sorted,
    digest,
    sizeBytes,
  };
}
