import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { glob, hasMagic } from 'glob';
import { PolicyName, ScanPolicy } from '../types';

/** Executables, scripts, Java archives, macro-capable documents. */
export const TARGET_EXTENSIONS: readonly string[] = [
  // Executables
  '.exe', '.dll', '.sys', '.drv', '.ocx', '.cpl',
  // Scripts
  '.bat', '.cmd', '.ps1', '.vbs', '.js', '.jse', '.wsf', '.wsh', '.hta',
  // Java
  '.jar', '.class',
  // Office macros
  '.doc', '.docm', '.xls', '.xlsm', '.ppt', '.pptm',
  // Other
  '.scr', '.pif', '.msi', '.com',
];

/** Files above 100 MB are skipped without being opened. */
export const DEFAULT_MAX_FILE_SIZE = 100 * 1024 * 1024;

export const POLICY_DEPTHS: Record<PolicyName, number> = {
  quick: 2,
  deep: 5,
  custom: 10,
};

type Env = Record<string, string | undefined>;

function windowsRoots(name: 'quick' | 'deep', env: Env): string[] {
  const systemRoot = env.SYSTEMROOT ?? 'C:\\Windows';
  const profile = env.USERPROFILE ?? os.homedir();
  if (name === 'quick') {
    return [
      path.win32.join(systemRoot, 'System32'),
      path.win32.join(systemRoot, 'SysWOW64'),
      ...(env.APPDATA ? [path.win32.join(env.APPDATA, 'Microsoft', 'Windows', 'Start Menu', 'Programs', 'Startup')] : []),
      ...(env.TEMP ? [env.TEMP] : []),
      path.win32.join(profile, 'Downloads'),
      path.win32.join(profile, 'Desktop'),
    ];
  }
  return [
    systemRoot,
    env.PROGRAMFILES ?? 'C:\\Program Files',
    env['PROGRAMFILES(X86)'] ?? 'C:\\Program Files (x86)',
    ...(env.APPDATA ? [env.APPDATA] : []),
    ...(env.LOCALAPPDATA ? [env.LOCALAPPDATA] : []),
    profile,
  ];
}

function posixRoots(name: 'quick' | 'deep'): string[] {
  if (name === 'quick') {
    return [
      '~/Downloads',
      '~/Desktop',
      '~/.config/autostart',
      '~/Library/LaunchAgents',
      os.tmpdir(),
    ];
  }
  return [
    '/usr/bin',
    '/usr/local/bin',
    '/opt',
    '/Applications',
    os.tmpdir(),
    '~',
  ];
}

/** High-traffic locations for a named policy on this platform. */
export function defaultRoots(
  name: 'quick' | 'deep',
  platform: NodeJS.Platform = process.platform,
  env: Env = process.env,
): string[] {
  return platform === 'win32' ? windowsRoots(name, env) : posixRoots(name);
}

export interface PolicyOverrides {
  rootPaths?: string[];
  maxDepth?: number;
  targetExtensions?: ReadonlySet<string> | 'all';
  maxFileSizeBytes?: number;
  followSymlinks?: boolean;
}

function build(name: PolicyName, rootPaths: string[], useMd5: boolean, overrides: PolicyOverrides): ScanPolicy {
  return Object.freeze({
    name,
    rootPaths: Object.freeze([...(overrides.rootPaths ?? rootPaths)]),
    maxDepth: overrides.maxDepth ?? POLICY_DEPTHS[name],
    targetExtensions: overrides.targetExtensions ?? new Set(TARGET_EXTENSIONS),
    maxFileSizeBytes: overrides.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE,
    followSymlinks: overrides.followSymlinks ?? false,
    useMd5Signatures: useMd5,
  });
}

export function quickPolicy(overrides: PolicyOverrides = {}): ScanPolicy {
  return build('quick', defaultRoots('quick'), false, overrides);
}

/** Deep scans also compute MD5 so legacy signature keys match. */
export function deepPolicy(overrides: PolicyOverrides = {}): ScanPolicy {
  return build('deep', defaultRoots('deep'), true, overrides);
}

export function customPolicy(rootPath: string, overrides: Omit<PolicyOverrides, 'rootPaths'> = {}): ScanPolicy {
  return build('custom', [path.resolve(expandHome(rootPath))], false, overrides);
}

export function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/') || p.startsWith('~\\')) return path.join(os.homedir(), p.slice(2));
  return p;
}

export interface ResolvedRoots {
  roots: string[];
  missing: string[];
}

/**
 * Expand `~` and glob patterns in policy roots. Patterns that match nothing
 * and literal paths that do not exist are reported as missing.
 */
export async function resolveRoots(patterns: readonly string[]): Promise<ResolvedRoots> {
  const roots: string[] = [];
  const missing: string[] = [];

  for (const pattern of patterns) {
    const expanded = expandHome(pattern);
    if (hasMagic(expanded, { windowsPathsNoEscape: true })) {
      const matches = await glob(expanded, { absolute: true, windowsPathsNoEscape: true });
      if (matches.length === 0) missing.push(pattern);
      roots.push(...matches.sort());
      continue;
    }
    const absolute = path.resolve(expanded);
    if (fs.existsSync(absolute)) {
      roots.push(absolute);
    } else {
      missing.push(pattern);
    }
  }

  return { roots: [...new Set(roots)], missing };
}
