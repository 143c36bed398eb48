/**
 * Utility for loading and validating configuration files
 */

import { readFileSync } from 'fs';
import * as path from 'path';
import { ArchiverConfigFile, InstanceProfile } from '../domain/models/types';
import { ConfigError } from '../domain/models/errors';

/** Config shipped with the package */
export const DEFAULT_CONFIG_PATH = path.resolve(__dirname, '../../config/archiver.json');

/**
 * Load and parse the archiver configuration file
 * @param configPath - Path to archiver.json
 * @returns Parsed configuration
 * @throws ConfigError if file cannot be read or is invalid
 */
export function loadArchiverConfig(configPath: string = DEFAULT_CONFIG_PATH): ArchiverConfigFile {
  let content: string;
  try {
    content = readFileSync(configPath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new ConfigError(`Configuration file not found: ${configPath}`);
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in ${configPath}: ${(error as Error).message}`);
  }

  return validateArchiverConfig(parsed);
}

/**
 * Validate the raw configuration object
 * @throws ConfigError if configuration is invalid
 */
export function validateArchiverConfig(raw: unknown): ArchiverConfigFile {
  if (!isRecord(raw)) {
    throw new ConfigError('Invalid archiver config: expected an object');
  }

  const instances = raw.instances;
  if (!isRecord(instances) || !isRecord(instances.default)) {
    throw new ConfigError('Invalid archiver config: missing "instances.default" profile');
  }

  const validatedInstances: Record<string, InstanceProfile> = {};
  for (const [host, profile] of Object.entries(instances)) {
    validatedInstances[host] = validateInstanceProfile(host, profile);
  }

  const optimizerVersions = raw.optimizerVersions;
  if (!isRecord(optimizerVersions)) {
    throw new ConfigError('Invalid archiver config: missing "optimizerVersions"');
  }
  const versions: Record<string, string> = {};
  for (const [ext, version] of Object.entries(optimizerVersions)) {
    if (typeof version !== 'string') {
      throw new ConfigError(`Invalid optimizer version for ${ext}`);
    }
    versions[ext] = version;
  }

  return {
    instances: validatedInstances,
    optimizerVersions: versions,
    videoHostPatterns: stringList(raw, 'videoHostPatterns'),
    downloadableExtensions: stringList(raw, 'downloadableExtensions'),
    audioFormats: stringList(raw, 'audioFormats'),
    videoFormats: stringList(raw, 'videoFormats'),
    imageFormats: stringList(raw, 'imageFormats'),
  };
}

/**
 * Profile for an instance host, falling back to the default profile
 */
export function resolveInstanceProfile(config: ArchiverConfigFile, host: string): InstanceProfile {
  return config.instances[host] ?? config.instances.default;
}

function validateInstanceProfile(host: string, profile: unknown): InstanceProfile {
  if (!isRecord(profile)) {
    throw new ConfigError(`Invalid instance profile for ${host}`);
  }
  const { coursePrefix, coursePageName, apiBase, csrfHeader } = profile;
  if (typeof coursePrefix !== 'string' || !coursePrefix.startsWith('/')) {
    throw new ConfigError(`Invalid coursePrefix for ${host}: must start with "/"`);
  }
  if (typeof coursePageName !== 'string') {
    throw new ConfigError(`Invalid coursePageName for ${host}`);
  }
  if (typeof apiBase !== 'string') {
    throw new ConfigError(`Invalid apiBase for ${host}`);
  }
  return {
    coursePrefix,
    coursePageName,
    apiBase,
    csrfHeader: typeof csrfHeader === 'string' ? csrfHeader : undefined,
  };
}

function stringList(raw: Record<string, unknown>, key: string): string[] {
  const value = raw[key];
  if (!Array.isArray(value) || !value.every((item) => typeof item === 'string')) {
    throw new ConfigError(`Invalid archiver config: "${key}" must be a list of strings`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load environment variable with fallback
 * @param key - Environment variable key
 * @param defaultValue - Default value if not found
 * @returns Environment variable value or default
 */
export function getEnvVar(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/**
 * Load required environment variable
 * @param key - Environment variable key
 * @returns Environment variable value
 * @throws ConfigError if variable is not set
 */
export function getRequiredEnvVar(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new ConfigError(`Required environment variable not set: ${key}`);
  }
  return value;
}
