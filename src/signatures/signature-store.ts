import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError } from '../errors';

const HEX_DIGEST = /^(?:[a-f0-9]{32}|[a-f0-9]{64})$/i;

const signatureFileSchema = z.record(
  z.string().regex(HEX_DIGEST, 'expected an MD5 or SHA-256 hex digest'),
  z.string().min(1),
);

/**
 * Read-only digest → threat-name table. Keys are lower-case hex; MD5 and
 * SHA-256 keys live side by side and are told apart by length.
 */
export class SignatureStore {
  private readonly entries: ReadonlyMap<string, string>;

  private constructor(entries: Map<string, string>) {
    this.entries = entries;
  }

  static fromEntries(entries: Iterable<readonly [string, string]>): SignatureStore {
    const map = new Map<string, string>();
    for (const [digest, threatName] of entries) {
      map.set(digest.toLowerCase(), threatName);
    }
    return new SignatureStore(map);
  }

  static empty(): SignatureStore {
    return new SignatureStore(new Map());
  }

  lookup(digest: string): string | undefined {
    return this.entries.get(digest.toLowerCase());
  }

  get size(): number {
    return this.entries.size;
  }
}

export function parseSignatureFile(content: string, source = 'signature file'): SignatureStore {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new ConfigError(`Invalid JSON in ${source}`, { cause: err });
  }
  const parsed = signatureFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? ` at "${issue.path.join('.')}"` : '';
    throw new ConfigError(`Invalid ${source}${where}: ${issue.message}`);
  }
  return SignatureStore.fromEntries(Object.entries(parsed.data));
}

export function loadSignatureStore(filePath: string): SignatureStore {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read signature file ${filePath}`, { cause: err });
  }
  return parseSignatureFile(content, filePath);
}

/** Bundled database under data/, found from both the source tree and dist/. */
export function defaultSignaturesPath(): string | null {
  const candidates = [
    path.resolve(__dirname, '..', '..', 'data', 'signatures.json'),
    path.resolve(__dirname, '..', '..', '..', 'data', 'signatures.json'),
  ];
  return candidates.find(p => fs.existsSync(p)) ?? null;
}
