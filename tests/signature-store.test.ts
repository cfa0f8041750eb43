import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  SignatureStore,
  defaultSignaturesPath,
  loadSignatureStore,
  parseSignatureFile,
} from '../src/signatures/signature-store';
import { ConfigError } from '../src/errors';

describe('SignatureStore', () => {
  test('lookups ignore digest case', () => {
    const store = parseSignatureFile(JSON.stringify({ ['AB'.repeat(16)]: 'Rootkit.Hidden' }));
    expect(store.lookup('ab'.repeat(16))).toBe('Rootkit.Hidden');
    expect(store.lookup('AB'.repeat(16))).toBe('Rootkit.Hidden');
    expect(store.lookup('cd'.repeat(16))).toBeUndefined();
    expect(store.size).toBe(1);
  });

  test('holds MD5 and SHA-256 keys together', () => {
    const store = SignatureStore.fromEntries([
      ['1'.repeat(32), 'Worm.A'],
      ['2'.repeat(64), 'Worm.B'],
    ]);
    expect(store.lookup('1'.repeat(32))).toBe('Worm.A');
    expect(store.lookup('2'.repeat(64))).toBe('Worm.B');
  });

  test('rejects malformed JSON', () => {
    expect(() => parseSignatureFile('{not json', 'sigs.json')).toThrow(ConfigError);
    expect(() => parseSignatureFile('{not json', 'sigs.json')).toThrow('Invalid JSON in sigs.json');
  });

  test('rejects keys that are not hex digests', () => {
    expect(() => parseSignatureFile(JSON.stringify({ nothex: 'Trojan.X' }), 'sigs.json'))
      .toThrow(/expected an MD5 or SHA-256 hex digest/);
  });

  test('rejects empty threat names', () => {
    expect(() => parseSignatureFile(JSON.stringify({ ['e'.repeat(32)]: '' }))).toThrow(ConfigError);
  });

  test('rejects a missing file with ConfigError', () => {
    const missing = path.join(os.tmpdir(), 'sentinel-no-such-signatures.json');
    expect(() => loadSignatureStore(missing)).toThrow(`Cannot read signature file ${missing}`);
  });

  test('loads a signature file from disk', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sentinel-sigs-'));
    const file = path.join(dir, 'signatures.json');
    fs.writeFileSync(file, JSON.stringify({ ['f'.repeat(64)]: 'Spyware.Test' }));
    try {
      expect(loadSignatureStore(file).lookup('f'.repeat(64))).toBe('Spyware.Test');
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  test('finds the bundled database', () => {
    const bundled = defaultSignaturesPath();
    expect(bundled).not.toBeNull();
    expect(bundled && path.basename(bundled)).toBe('signatures.json');
    expect(bundled && loadSignatureStore(bundled).lookup('5b4f8efdd7bbe4a7dbd307f7778e5e66')).toBe('Spyware.Keylogger');
  });
});
