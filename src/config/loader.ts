import { readFile } from 'node:fs/promises';
import { dirname, isAbsolute, resolve } from 'node:path';
import { ConfigurationError, describeError } from '../common/errors';
import { parseLogFormat, parseLogLevel } from '../common/logger';
import { CustomPatternConfig } from '../detectors/patternDetector';
import { OVERLAP_STRATEGIES, isOverlapStrategy } from '../engine/types';
import { parseStructuredDocument } from '../policy/loader';
import { GuardConfig, LoggingConfig, PiiVeilConfig, ServerConfig } from './types';

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(section: RawRecord, key: string, where: string): string | undefined {
  const value = section[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ConfigurationError(`${where}.${key} must be a string`);
  }
  return value;
}

function optionalNumber(section: RawRecord, key: string, where: string): number | undefined {
  const value = section[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigurationError(`${where}.${key} must be a number`);
  }
  return value;
}

function optionalBoolean(section: RawRecord, key: string, where: string): boolean | undefined {
  const value = section[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new ConfigurationError(`${where}.${key} must be true or false`);
  }
  return value;
}

function parseCustomPatterns(value: unknown, where: string): CustomPatternConfig[] | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new ConfigurationError(`${where}.customPatterns must be a list`);
  }
  return value.map((entry: unknown, index): CustomPatternConfig => {
    const at = `${where}.customPatterns[${index}]`;
    if (!isRecord(entry)) {
      throw new ConfigurationError(`${at} must be a mapping`);
    }
    const entityType = optionalString(entry, 'entityType', at);
    const pattern = optionalString(entry, 'pattern', at);
    if (!entityType || !pattern) {
      throw new ConfigurationError(`${at} needs "entityType" and "pattern"`);
    }
    return {
      entityType,
      pattern,
      flags: optionalString(entry, 'flags', at),
      confidence: optionalNumber(entry, 'confidence', at),
    };
  });
}

function parseGuardSection(raw: unknown, where: string): Partial<GuardConfig> {
  if (!isRecord(raw)) {
    throw new ConfigurationError(`${where} must be a mapping`);
  }
  const guard: Partial<GuardConfig> = {};
  if (raw.detectors !== undefined) {
    if (!Array.isArray(raw.detectors) || !raw.detectors.every((entry): entry is string => typeof entry === 'string')) {
      throw new ConfigurationError(`${where}.detectors must be a list of detector ids`);
    }
    guard.detectors = raw.detectors;
  }
  guard.policy = optionalString(raw, 'policy', where);
  guard.policyPath = optionalString(raw, 'policyPath', where);
  const strategy = optionalString(raw, 'overlapStrategy', where);
  if (strategy !== undefined) {
    if (!isOverlapStrategy(strategy)) {
      throw new ConfigurationError(
        `${where}.overlapStrategy "${strategy}" is not one of ${OVERLAP_STRATEGIES.join(', ')}`,
      );
    }
    guard.overlapStrategy = strategy;
  }
  guard.validateMatches = optionalBoolean(raw, 'validateMatches', where);
  guard.customPatterns = parseCustomPatterns(raw.customPatterns, where);
  return dropUndefined(guard);
}

function parseServerSection(raw: unknown, where: string): ServerConfig | undefined {
  if (raw === undefined || raw === null) {
    return undefined;
  }
  if (!isRecord(raw)) {
    throw new ConfigurationError(`${where} must be a mapping`);
  }
  return dropUndefined({
    host: optionalString(raw, 'host', where),
    port: optionalNumber(raw, 'port', where),
    bodyLimit: optionalNumber(raw, 'bodyLimit', where),
  });
}

function parseLoggingSection(raw: unknown, where: string): LoggingConfig | undefined {
  if (raw === undefined || raw === null) {
    return undefined;
  }
  if (!isRecord(raw)) {
    throw new ConfigurationError(`${where} must be a mapping`);
  }
  try {
    return dropUndefined({
      level: parseLogLevel(optionalString(raw, 'level', where)),
      format: parseLogFormat(optionalString(raw, 'format', where)),
    });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw error;
    }
    throw new ConfigurationError(`${where}: ${describeError(error)}`, { cause: error });
  }
}

function dropUndefined<T extends object>(value: T): T {
  for (const key of Object.keys(value)) {
    if (Reflect.get(value, key) === undefined) {
      Reflect.deleteProperty(value, key);
    }
  }
  return value;
}

function parseProfile(raw: unknown, name: string): Partial<Omit<PiiVeilConfig, 'profiles'>> {
  const where = `profiles.${name}`;
  if (!isRecord(raw)) {
    throw new ConfigurationError(`${where} must be a mapping`);
  }
  const profile: Partial<Omit<PiiVeilConfig, 'profiles'>> = {};
  if (raw.guard !== undefined) {
    profile.guard = parseGuardSection(raw.guard, `${where}.guard`);
  }
  const server = parseServerSection(raw.server, `${where}.server`);
  if (server) {
    profile.server = server;
  }
  const logging = parseLoggingSection(raw.logging, `${where}.logging`);
  if (logging) {
    profile.logging = logging;
  }
  return profile;
}

export function parseConfig(raw: unknown, source: string): PiiVeilConfig {
  if (!isRecord(raw)) {
    throw new ConfigurationError(`Config ${source} must be a mapping`, { source });
  }
  if (raw.guard === undefined || raw.guard === null) {
    throw new ConfigurationError('Config must define "guard" section', { source });
  }

  const config: PiiVeilConfig = { guard: parseGuardSection(raw.guard, 'guard') };
  const server = parseServerSection(raw.server, 'server');
  if (server) {
    config.server = server;
  }
  const logging = parseLoggingSection(raw.logging, 'logging');
  if (logging) {
    config.logging = logging;
  }
  if (raw.profiles !== undefined && raw.profiles !== null) {
    if (!isRecord(raw.profiles)) {
      throw new ConfigurationError('profiles must be a mapping', { source });
    }
    config.profiles = Object.fromEntries(
      Object.entries(raw.profiles).map(([name, profile]) => [name, parseProfile(profile, name)]),
    );
  }
  return config;
}

export async function loadConfig(path: string, profile?: string): Promise<PiiVeilConfig> {
  const absolute = resolve(path);
  const baseDir = dirname(absolute);
  let contents: string;
  try {
    contents = await readFile(absolute, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Config file not found: ${absolute}`, { source: absolute, cause: error });
  }
  const parsed = parseConfig(parseStructuredDocument(contents, absolute), absolute);

  if (profile) {
    const profileConfig = parsed.profiles?.[profile];
    if (!profileConfig) {
      throw new ConfigurationError(`Profile ${profile} not found in config`, { source: absolute });
    }
    return normalizeConfigPaths(mergeConfigs(parsed, profileConfig), baseDir);
  }

  return normalizeConfigPaths(parsed, baseDir);
}

function mergeConfigs(base: PiiVeilConfig, overlay: Partial<Omit<PiiVeilConfig, 'profiles'>>): PiiVeilConfig {
  const guard: GuardConfig = {
    ...base.guard,
    ...overlay.guard,
  };
  // a profile naming a built-in policy replaces a policy file from the base
  if (overlay.guard?.policy !== undefined && overlay.guard.policyPath === undefined) {
    delete guard.policyPath;
  }
  return {
    ...base,
    guard,
    server: {
      ...base.server,
      ...overlay.server,
    },
    logging: {
      ...base.logging,
      ...overlay.logging,
    },
  };
}

function normalizeConfigPaths(config: PiiVeilConfig, baseDir: string): PiiVeilConfig {
  const policyPath = config.guard.policyPath;
  if (!policyPath || isAbsolute(policyPath)) {
    return config;
  }
  return {
    ...config,
    guard: {
      ...config.guard,
      policyPath: resolve(baseDir, policyPath),
    },
  };
}
