import { promises as fsp } from 'fs';
import * as fs from 'fs-extra';
import { DetectionMethod, Evidence, Finding } from '../../src/types';

export function makeEvidence(overrides: Partial<Evidence> = {}): Evidence {
  return {
    path: '/scan/sample.bin',
    sizeBytes: 2048,
    extension: '.bin',
    digestSHA256: 'a'.repeat(64),
    entropy: 4,
    contentSample: Buffer.from(''),
    mode: 0o100644,
    createdAt: new Date(0),
    ...overrides,
  };
}

export function makeFinding(detector: DetectionMethod, severity: number, id = `${detector}-${severity}`): Finding {
  return {
    id,
    detector,
    category: 'unclassified',
    severity,
    title: `${detector} finding`,
    rationale: 'test',
  };
}

/** Write a file with fixed permissions so the umask never adds a world-writable bit. */
export async function writeFixture(filePath: string, content: string | Buffer): Promise<void> {
  await fs.outputFile(filePath, content);
  await fsp.chmod(filePath, 0o644);
}
