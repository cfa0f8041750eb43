import * as fs from 'fs';
import * as path from 'path';
import { createHash } from 'crypto';
import { Evidence } from '../types';
import { IOError } from '../errors';

/** Read size for hashing and histogram updates. */
export const CHUNK_SIZE = 4 * 1024;

/** Bytes kept for pattern search. */
export const DEFAULT_SAMPLE_BYTES = 256 * 1024;

export interface ExtractOptions {
  computeMd5?: boolean;
  sampleBytes?: number;
  signal?: AbortSignal;
}

/**
 * Shannon entropy over a 256-bucket byte histogram: -Σ p·log2(p), bits per byte.
 */
export function entropyFromHistogram(histogram: ArrayLike<number>, length: number): number {
  if (length === 0) return 0;
  let entropy = 0;
  for (let i = 0; i < histogram.length; i++) {
    const count = histogram[i];
    if (count === 0) continue;
    const p = count / length;
    entropy -= p * Math.log2(p);
  }
  return entropy;
}

export function calculateEntropy(data: Uint8Array): number {
  const histogram = new Uint32Array(256);
  for (const byte of data) histogram[byte]++;
  return entropyFromHistogram(histogram, data.length);
}

export function fileExtension(filePath: string): string {
  return path.extname(filePath).toLowerCase();
}

/**
 * Build the evidence record for one file in a single streaming pass. Either
 * every field is filled or the promise rejects; nothing partial escapes.
 */
export async function extractEvidence(filePath: string, options: ExtractOptions = {}): Promise<Evidence> {
  const sampleLimit = options.sampleBytes ?? DEFAULT_SAMPLE_BYTES;
  const sha256 = createHash('sha256');
  const md5 = options.computeMd5 ? createHash('md5') : null;
  const histogram = new Uint32Array(256);
  const sampleChunks: Buffer[] = [];
  let sampled = 0;
  let length = 0;

  let mode = 0;
  try {
    // stat follows links so a followed symlink reports its target
    const stat = await fs.promises.stat(filePath);
    mode = stat.mode;

    const stream = fs.createReadStream(filePath, { highWaterMark: CHUNK_SIZE, signal: options.signal });
    for await (const chunk of stream) {
      const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      sha256.update(buf);
      md5?.update(buf);
      for (const byte of buf) histogram[byte]++;
      length += buf.length;

      if (sampled < sampleLimit) {
        const take = buf.subarray(0, sampleLimit - sampled);
        sampleChunks.push(take);
        sampled += take.length;
      }
    }
  } catch (err) {
    if (options.signal?.aborted) throw options.signal.reason ?? err;
    throw new IOError(filePath, err);
  }

  const evidence: Evidence = {
    path: filePath,
    sizeBytes: length,
    extension: fileExtension(filePath),
    digestSHA256: sha256.digest('hex'),
    ...(md5 ? { digestMD5: md5.digest('hex') } : {}),
    entropy: entropyFromHistogram(histogram, length),
    contentSample: Buffer.concat(sampleChunks, sampled),
    mode,
    createdAt: new Date(),
  };
  return Object.freeze(evidence);
}
