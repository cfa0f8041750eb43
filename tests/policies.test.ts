import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  DEFAULT_MAX_FILE_SIZE,
  TARGET_EXTENSIONS,
  customPolicy,
  deepPolicy,
  defaultRoots,
  expandHome,
  quickPolicy,
  resolveRoots,
} from '../src/engine/policies';

describe('scan policies', () => {
  test('quick scans go two levels deep without MD5', () => {
    const policy = quickPolicy();
    expect(policy.name).toBe('quick');
    expect(policy.maxDepth).toBe(2);
    expect(policy.useMd5Signatures).toBe(false);
    expect(policy.followSymlinks).toBe(false);
    expect(policy.maxFileSizeBytes).toBe(DEFAULT_MAX_FILE_SIZE);
  });

  test('deep scans go five levels deep with MD5', () => {
    const policy = deepPolicy();
    expect(policy.maxDepth).toBe(5);
    expect(policy.useMd5Signatures).toBe(true);
  });

  test('custom scans take one resolved root and go ten levels deep', () => {
    const policy = customPolicy('relative/dir');
    expect(policy.rootPaths).toEqual([path.resolve('relative/dir')]);
    expect(policy.maxDepth).toBe(10);
  });

  test('every policy shares the target extension list', () => {
    for (const policy of [quickPolicy(), deepPolicy(), customPolicy('/tmp')]) {
      expect(policy.targetExtensions).toEqual(new Set(TARGET_EXTENSIONS));
    }
  });

  test('policies are frozen', () => {
    expect(Object.isFrozen(quickPolicy())).toBe(true);
  });

  test('overrides replace defaults', () => {
    const policy = quickPolicy({ rootPaths: ['/srv'], maxDepth: 0, followSymlinks: true });
    expect(policy.rootPaths).toEqual(['/srv']);
    expect(policy.maxDepth).toBe(0);
    expect(policy.followSymlinks).toBe(true);
  });
});

describe('defaultRoots', () => {
  test('quick roots on Windows come from the environment', () => {
    const roots = defaultRoots('quick', 'win32', {
      SYSTEMROOT: 'C:\\Windows',
      USERPROFILE: 'C:\\Users\\test',
      TEMP: 'C:\\Temp',
    });
    expect(roots).toEqual([
      'C:\\Windows\\System32',
      'C:\\Windows\\SysWOW64',
      'C:\\Temp',
      'C:\\Users\\test\\Downloads',
      'C:\\Users\\test\\Desktop',
    ]);
  });

  test('deep roots on POSIX include the home directory', () => {
    const roots = defaultRoots('deep', 'linux', {});
    expect(roots).toContain('/usr/bin');
    expect(roots[roots.length - 1]).toBe('~');
  });
});

describe('expandHome', () => {
  test('expands a leading tilde only', () => {
    expect(expandHome('~')).toBe(os.homedir());
    expect(expandHome('~/Downloads')).toBe(path.join(os.homedir(), 'Downloads'));
    expect(expandHome('/opt/~x')).toBe('/opt/~x');
  });
});

describe('resolveRoots', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sentinel-roots-'));
    fs.writeFileSync(path.join(tmpDir, 'b.exe'), '');
    fs.writeFileSync(path.join(tmpDir, 'a.exe'), '');
    fs.writeFileSync(path.join(tmpDir, 'c.txt'), '');
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  test('expands glob patterns in sorted order', async () => {
    const { roots, missing } = await resolveRoots([path.join(tmpDir, '*.exe')]);
    expect(roots).toEqual([path.join(tmpDir, 'a.exe'), path.join(tmpDir, 'b.exe')]);
    expect(missing).toEqual([]);
  });

  test('reports patterns and paths that match nothing', async () => {
    const noMatch = path.join(tmpDir, '*.dll');
    const absent = path.join(tmpDir, 'absent');

    const { roots, missing } = await resolveRoots([tmpDir, noMatch, absent]);

    expect(roots).toEqual([tmpDir]);
    expect(missing).toEqual([noMatch, absent]);
  });

  test('drops duplicate roots', async () => {
    const { roots } = await resolveRoots([tmpDir, tmpDir]);
    expect(roots).toEqual([tmpDir]);
  });
});
