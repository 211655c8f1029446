import { promises as fs } from 'fs';
import path from 'path';
import YAML from 'yaml';
import type { ZodType, ZodTypeDef } from 'zod';
import { ConfigurationError } from '../utils/errors';
import {
  type DepthFile,
  DepthFileSchema,
  type DomainFile,
  DomainFileSchema,
  type ProfileFile,
  ProfileFileSchema,
  type ScoringFile,
  ScoringFileSchema
} from './yaml-types';

const NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

const cache = new Map<string, unknown>();

export function getConfigRoot(): string {
  return process.env.CONFIG_ROOT ?? path.resolve(process.cwd(), 'config');
}

async function readYamlFile(filePath: string): Promise<unknown> {
  let fileContents: string;
  try {
    fileContents = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigurationError(`Missing configuration file: ${filePath}`);
    }
    throw new ConfigurationError(
      `Failed to read configuration file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  try {
    const parsed: unknown = YAML.parse(fileContents, { prettyErrors: true });
    return parsed ?? {};
  } catch (error) {
    throw new ConfigurationError(
      `Invalid YAML in ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown, fileLabel: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.errors.map((err) => `${err.path.join('.') || '(root)'}: ${err.message}`);
    throw new ConfigurationError(`Invalid configuration in ${fileLabel}: ${issues.join('; ')}`);
  }
  return result.data;
}

async function loadConfigFile<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  relativePath: string,
  explicitPath?: string
): Promise<T> {
  const resolvedPath = explicitPath ?? path.resolve(getConfigRoot(), relativePath);
  const yamlValue = await loadRaw(resolvedPath);
  return validate(schema, yamlValue, resolvedPath);
}

async function loadRaw(resolvedPath: string): Promise<unknown> {
  if (cache.has(resolvedPath)) {
    return cache.get(resolvedPath);
  }
  const value = await readYamlFile(resolvedPath);
  cache.set(resolvedPath, value);
  return value;
}

function assertName(kind: string, name: string): void {
  if (!NAME_PATTERN.test(name)) {
    throw new ConfigurationError(`Invalid ${kind} name: ${name}`);
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Objects merge recursively; arrays and scalars from `override` replace `base`
 */
export function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = result[key];
    result[key] = isPlainObject(existing) && isPlainObject(value) ? deepMerge(existing, value) : value;
  }
  return result;
}

export function clearConfigCache(): void {
  cache.clear();
}

export async function loadDepthConfig(overridePath?: string): Promise<DepthFile> {
  return loadConfigFile(DepthFileSchema, 'depth.yaml', overridePath);
}

export async function loadScoringConfig(overridePath?: string): Promise<ScoringFile> {
  return loadConfigFile(ScoringFileSchema, 'scoring.yaml', overridePath);
}

export async function loadDomainConfig(domain: string): Promise<DomainFile> {
  assertName('domain', domain);
  return loadConfigFile(DomainFileSchema, path.join('domains', domain, 'domain.yaml'));
}

/**
 * Load a profile, resolving `extends` chains (child values win)
 */
export async function loadProfileConfig(domain: string, profile: string): Promise<ProfileFile> {
  assertName('domain', domain);
  const merged = await loadProfileRaw(domain, profile, []);
  return validate(ProfileFileSchema, merged, `profile ${domain}/${profile}`);
}

async function loadProfileRaw(domain: string, profile: string, chain: string[]): Promise<Record<string, unknown>> {
  assertName('profile', profile);
  if (chain.includes(profile)) {
    throw new ConfigurationError(`Profile inheritance cycle: ${[...chain, profile].join(' -> ')}`);
  }

  if (chain.length === 0) {
    const available = await listProfiles(domain);
    if (available.length > 0 && !available.includes(profile)) {
      throw new ConfigurationError(
        `Unknown profile "${profile}" for domain ${domain} (available: ${available.join(', ')})`
      );
    }
  }

  const filePath = path.resolve(getConfigRoot(), 'domains', domain, 'profiles', `${profile}.yaml`);
  const raw = await loadRaw(filePath);
  if (!isPlainObject(raw)) {
    throw new ConfigurationError(`Profile ${domain}/${profile} must be a mapping`);
  }

  const parent = raw.extends;
  if (typeof parent !== 'string') {
    return raw;
  }
  const base = await loadProfileRaw(domain, parent, [...chain, profile]);
  return deepMerge(base, raw);
}

export async function listProfiles(domain: string): Promise<string[]> {
  assertName('domain', domain);
  const dir = path.resolve(getConfigRoot(), 'domains', domain, 'profiles');
  try {
    const entries = await fs.readdir(dir);
    return entries
      .filter((entry) => entry.endsWith('.yaml'))
      .map((entry) => entry.replace(/\.yaml$/, ''))
      .sort();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }
}
