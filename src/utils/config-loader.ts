import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { PolicyName } from '../types';
import { ConfigError } from '../errors';
import { PolicyOverrides } from '../engine/policies';

const profileSchema = z
  .object({
    roots: z.array(z.string().min(1)).min(1).optional(),
    maxDepth: z.number().int().min(0).optional(),
  })
  .strict();

export const configSchema = z
  .object({
    concurrency: z.number().int().positive().optional(),
    operationTimeoutMs: z.number().int().positive().optional(),
    progressInterval: z.number().int().positive().optional(),
    maxFileSizeBytes: z.number().int().positive().optional(),
    extensions: z.union([z.literal('all'), z.array(z.string().min(1))]).optional(),
    followSymlinks: z.boolean().optional(),
    signatures: z.string().min(1).optional(),
    quick: profileSchema.optional(),
    deep: profileSchema.optional(),
    custom: profileSchema.omit({ roots: true }).optional(),
  })
  .strict();

export type SentinelConfig = z.infer<typeof configSchema>;

export const DEFAULT_CONFIG_FILE = 'sentinel.config.yml';

export function parseConfig(content: string, source = DEFAULT_CONFIG_FILE): SentinelConfig {
  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (err) {
    throw new ConfigError(`Invalid YAML in ${source}`, { cause: err });
  }
  // An empty file is an empty config
  if (raw === undefined || raw === null) return {};

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid ${source}: ${details}`);
  }
  return parsed.data;
}

/**
 * Load a YAML config file. A relative `signatures` path is taken relative to
 * the config file, not the working directory.
 */
export function loadConfig(filePath: string): SentinelConfig {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${filePath}`, { cause: err });
  }
  const config = parseConfig(content, filePath);
  if (config.signatures && !path.isAbsolute(config.signatures)) {
    return { ...config, signatures: path.resolve(path.dirname(filePath), config.signatures) };
  }
  return config;
}

export function normalizeExtensions(extensions: readonly string[]): Set<string> {
  return new Set(
    extensions
      .map(ext => ext.trim().toLowerCase())
      .filter(ext => ext.length > 0)
      .map(ext => (ext.startsWith('.') ? ext : `.${ext}`)),
  );
}

export function policyOverrides(config: SentinelConfig, name: PolicyName): PolicyOverrides {
  const overrides: PolicyOverrides = {};
  const profile = config[name];

  if (profile?.maxDepth !== undefined) overrides.maxDepth = profile.maxDepth;
  const roots = name === 'quick' ? config.quick?.roots : name === 'deep' ? config.deep?.roots : undefined;
  if (roots) overrides.rootPaths = roots;
  if (config.maxFileSizeBytes !== undefined) overrides.maxFileSizeBytes = config.maxFileSizeBytes;
  if (config.followSymlinks !== undefined) overrides.followSymlinks = config.followSymlinks;
  if (config.extensions !== undefined) {
    overrides.targetExtensions = config.extensions === 'all' ? 'all' : normalizeExtensions(config.extensions);
  }

  return overrides;
}
