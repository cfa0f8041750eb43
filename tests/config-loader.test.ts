import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadConfig, normalizeExtensions, parseConfig, policyOverrides } from '../src/utils/config-loader';
import { ConfigError } from '../src/errors';

describe('parseConfig', () => {
  test('empty content is an empty config', () => {
    expect(parseConfig('')).toEqual({});
    expect(parseConfig('# only a comment\n')).toEqual({});
  });

  test('reads every section', () => {
    const config = parseConfig([
      'concurrency: 4',
      'operationTimeoutMs: 5000',
      'extensions: [exe, .PS1]',
      'followSymlinks: true',
      'quick:',
      '  roots: [/srv/downloads]',
      '  maxDepth: 1',
      'custom:',
      '  maxDepth: 3',
    ].join('\n'));

    expect(config).toEqual({
      concurrency: 4,
      operationTimeoutMs: 5000,
      extensions: ['exe', '.PS1'],
      followSymlinks: true,
      quick: { roots: ['/srv/downloads'], maxDepth: 1 },
      custom: { maxDepth: 3 },
    });
  });

  test('unknown keys are rejected', () => {
    expect(() => parseConfig('bogus: 1', 'test.yml')).toThrow(ConfigError);
    expect(() => parseConfig('bogus: 1', 'test.yml')).toThrow(/bogus/);
  });

  test('errors name the offending field', () => {
    expect(() => parseConfig('concurrency: 0', 'test.yml')).toThrow(/^Invalid test\.yml: concurrency: /);
  });

  test('custom scans take no roots', () => {
    expect(() => parseConfig('custom:\n  roots: [/tmp]')).toThrow(ConfigError);
  });

  test('invalid YAML is a ConfigError', () => {
    expect(() => parseConfig('a: [unclosed', 'test.yml')).toThrow('Invalid YAML in test.yml');
  });
});

describe('loadConfig', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sentinel-config-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  test('resolves a relative signatures path against the config file', () => {
    const file = path.join(tmpDir, 'sentinel.config.yml');
    fs.writeFileSync(file, 'signatures: db/sigs.json\n');

    expect(loadConfig(file).signatures).toBe(path.join(tmpDir, 'db', 'sigs.json'));
  });

  test('a missing file is a ConfigError', () => {
    expect(() => loadConfig(path.join(tmpDir, 'absent.yml'))).toThrow(ConfigError);
  });
});

describe('policyOverrides', () => {
  test('normalizes extensions', () => {
    expect([...normalizeExtensions(['EXE', '.Js', ' ', 'ps1'])]).toEqual(['.exe', '.js', '.ps1']);
  });

  test('picks the named profile and the shared settings', () => {
    const config = parseConfig([
      'maxFileSizeBytes: 1024',
      'extensions: all',
      'quick:',
      '  roots: [/a]',
      '  maxDepth: 1',
      'deep:',
      '  maxDepth: 7',
    ].join('\n'));

    expect(policyOverrides(config, 'quick')).toEqual({
      maxDepth: 1,
      rootPaths: ['/a'],
      maxFileSizeBytes: 1024,
      targetExtensions: 'all',
    });
    expect(policyOverrides(config, 'deep')).toEqual({
      maxDepth: 7,
      maxFileSizeBytes: 1024,
      targetExtensions: 'all',
    });
    expect(policyOverrides(config, 'custom')).toEqual({
      maxFileSizeBytes: 1024,
      targetExtensions: 'all',
    });
  });
});
