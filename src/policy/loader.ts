import { readdir, readFile } from 'node:fs/promises';
import { basename, extname, resolve } from 'node:path';
import yaml from 'js-yaml';
import toml from 'toml';
import { ConfigurationError, describeError } from '../common/errors';
import { COUNTER_TOKEN, defaultPlaceholderTemplate } from '../engine/anonymizer';
import {
  ANONYMIZATION_STRATEGIES,
  EntityConfig,
  HASH_ALGORITHMS,
  HashOptions,
  MaskOptions,
  Policy,
  PolicySource,
  isAnonymizationStrategy,
  isHashAlgorithm,
} from './types';

export const POLICY_CATALOG_DIR = resolve(__dirname, '..', '..', 'policies');
export const DEFAULT_POLICY_NAME = 'default_pii';

const ENTITY_TYPE_RE = /^[A-Z][A-Z0-9_]*$/;
const POLICY_NAME_RE = /^[a-z0-9][a-z0-9_-]*$/;
const CATALOG_EXTENSIONS = ['.yaml', '.yml'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseStructuredDocument(contents: string, path: string): unknown {
  const ext = extname(path).toLowerCase();
  try {
    switch (ext) {
      case '.yaml':
      case '.yml':
        return yaml.load(contents);
      case '.toml':
        return toml.parse(contents);
      case '.json':
        return JSON.parse(contents);
      default:
        break;
    }
  } catch (error) {
    throw new ConfigurationError(`Failed to parse ${path}: ${describeError(error)}`, { source: path, cause: error });
  }
  throw new ConfigurationError(`Unsupported file format for ${path}`, { source: path });
}

function countTokens(template: string): number {
  return template.split(COUNTER_TOKEN).length - 1;
}

function parseEntityConfig(entityType: string, raw: unknown, source: string): EntityConfig {
  if (raw === null || raw === undefined) {
    return { placeholder: defaultPlaceholderTemplate(entityType) };
  }
  if (!isRecord(raw)) {
    throw new ConfigurationError(`Entity ${entityType} in ${source} must be a mapping`, { source });
  }

  let placeholder = defaultPlaceholderTemplate(entityType);
  if (raw.placeholder !== undefined) {
    if (typeof raw.placeholder !== 'string') {
      throw new ConfigurationError(`Placeholder for ${entityType} in ${source} must be a string`, { source });
    }
    if (countTokens(raw.placeholder) !== 1) {
      throw new ConfigurationError(
        `Placeholder for ${entityType} in ${source} must contain exactly one ${COUNTER_TOKEN} token`,
        { source },
      );
    }
    if (raw.placeholder.replace(COUNTER_TOKEN, '').length === 0) {
      throw new ConfigurationError(`Placeholder for ${entityType} in ${source} needs text besides ${COUNTER_TOKEN}`, {
        source,
      });
    }
    placeholder = raw.placeholder;
  }

  const config: EntityConfig = { placeholder };
  if (raw.minConfidence !== undefined) {
    if (!isFiniteNumber(raw.minConfidence) || raw.minConfidence < 0 || raw.minConfidence > 1) {
      throw new ConfigurationError(`minConfidence for ${entityType} in ${source} must be a number in 0..1`, {
        source,
      });
    }
    config.minConfidence = raw.minConfidence;
  }
  if (raw.strategy !== undefined) {
    if (!isAnonymizationStrategy(raw.strategy)) {
      throw new ConfigurationError(
        `Strategy for ${entityType} in ${source} must be one of ${ANONYMIZATION_STRATEGIES.join(', ')}`,
        { source },
      );
    }
    config.strategy = raw.strategy;
  }
  if (raw.mask !== undefined) {
    config.mask = parseMaskOptions(raw.mask, `${entityType} in ${source}`, source);
  }
  if (raw.hash !== undefined) {
    config.hash = parseHashOptions(raw.hash, `${entityType} in ${source}`, source);
  }
  return Object.freeze(config);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isCount(value: unknown, minimum: number): value is number {
  return isFiniteNumber(value) && Number.isInteger(value) && value >= minimum;
}

function parseMaskOptions(raw: unknown, where: string, source: string): Readonly<MaskOptions> {
  if (!isRecord(raw)) {
    throw new ConfigurationError(`Mask options for ${where} must be a mapping`, { source });
  }
  const options: MaskOptions = {};
  if (raw.char !== undefined) {
    if (typeof raw.char !== 'string' || Array.from(raw.char).length !== 1) {
      throw new ConfigurationError(`Mask char for ${where} must be a single character`, { source });
    }
    options.char = raw.char;
  }
  for (const key of ['revealFirst', 'revealLast'] as const) {
    const value = raw[key];
    if (value === undefined) {
      continue;
    }
    if (!isCount(value, 0)) {
      throw new ConfigurationError(`Mask ${key} for ${where} must be a non-negative integer`, { source });
    }
    options[key] = value;
  }
  if (raw.preserveStructure !== undefined) {
    if (typeof raw.preserveStructure !== 'boolean') {
      throw new ConfigurationError(`Mask preserveStructure for ${where} must be a boolean`, { source });
    }
    options.preserveStructure = raw.preserveStructure;
  }
  return Object.freeze(options);
}

function parseHashOptions(raw: unknown, where: string, source: string): Readonly<HashOptions> {
  if (!isRecord(raw)) {
    throw new ConfigurationError(`Hash options for ${where} must be a mapping`, { source });
  }
  const options: HashOptions = {};
  if (raw.algorithm !== undefined) {
    if (!isHashAlgorithm(raw.algorithm)) {
      throw new ConfigurationError(`Hash algorithm for ${where} must be one of ${HASH_ALGORITHMS.join(', ')}`, {
        source,
      });
    }
    options.algorithm = raw.algorithm;
  }
  if (raw.salt !== undefined) {
    if (typeof raw.salt !== 'string') {
      throw new ConfigurationError(`Hash salt for ${where} must be a string`, { source });
    }
    options.salt = raw.salt;
  }
  if (raw.length !== undefined) {
    if (!isCount(raw.length, 1)) {
      throw new ConfigurationError(`Hash length for ${where} must be a positive integer`, { source });
    }
    options.length = raw.length;
  }
  return Object.freeze(options);
}

interface TemplateShape {
  prefix: string;
  suffix: string;
}

function shapeOf(template: string): TemplateShape {
  const at = template.indexOf(COUNTER_TOKEN);
  return { prefix: template.slice(0, at), suffix: template.slice(at + COUNTER_TOKEN.length) };
}

const isDigit = (char: string) => char >= '0' && char <= '9';

// States: 0..prefix.length walk the prefix, prefix.length expects the counter's
// first digit, and prefix.length + 1 + k means the counter is read and k suffix
// characters followed it.
function advance(shape: TemplateShape, state: number, char: string): number[] {
  const counter = shape.prefix.length;
  if (state < counter) {
    return shape.prefix[state] === char ? [state + 1] : [];
  }
  if (state === counter) {
    return isDigit(char) && char !== '0' ? [counter + 1] : [];
  }
  const consumed = state - counter - 1;
  const next: number[] = [];
  if (consumed === 0 && isDigit(char)) {
    next.push(state);
  }
  if (consumed < shape.suffix.length && shape.suffix[consumed] === char) {
    next.push(state + 1);
  }
  return next;
}

/** Whether some counter values render both templates as the same string. */
export function templatesCanCollide(left: string, right: string): boolean {
  const a = shapeOf(left);
  const b = shapeOf(right);
  const finalA = a.prefix.length + 1 + a.suffix.length;
  const finalB = b.prefix.length + 1 + b.suffix.length;
  const alphabet = new Set([...'0123456789'.split(''), ...left.split(''), ...right.split('')]);
  const seen = new Set<string>(['0:0']);
  const pending: Array<[number, number]> = [[0, 0]];
  for (let pair = pending.pop(); pair !== undefined; pair = pending.pop()) {
    const [x, y] = pair;
    if (x === finalA && y === finalB) {
      return true;
    }
    for (const char of alphabet) {
      for (const nextX of advance(a, x, char)) {
        for (const nextY of advance(b, y, char)) {
          const key = `${nextX}:${nextY}`;
          if (!seen.has(key)) {
            seen.add(key);
            pending.push([nextX, nextY]);
          }
        }
      }
    }
  }
  return false;
}

function assertDistinctPlaceholders(entities: Record<string, EntityConfig>, source: string): void {
  const reversible = Object.entries(entities).filter(([, config]) => (config.strategy ?? 'placeholder') === 'placeholder');
  reversible.forEach(([entityType, config], position) => {
    for (const [otherType, other] of reversible.slice(position + 1)) {
      if (templatesCanCollide(config.placeholder, other.placeholder)) {
        throw new ConfigurationError(
          `Placeholders for ${entityType} (${config.placeholder}) and ${otherType} (${other.placeholder}) in ${source} can render the same text`,
          { source },
        );
      }
    }
  });
}

/**
 * Validate a parsed policy document and return a frozen `Policy`.
 * `source` names the document in error messages.
 */
export function parsePolicy(raw: unknown, source: string): Policy {
  if (!isRecord(raw)) {
    throw new ConfigurationError(`Policy ${source} must be a mapping`, { source });
  }
  if (typeof raw.name !== 'string' || raw.name.trim() === '') {
    throw new ConfigurationError(`Policy ${source} must define "name"`, { source });
  }
  if (raw.description !== undefined && raw.description !== null && typeof raw.description !== 'string') {
    throw new ConfigurationError(`Policy ${source} has a non-string "description"`, { source });
  }
  if (!isRecord(raw.entities) || Object.keys(raw.entities).length === 0) {
    throw new ConfigurationError(`Policy ${source} must define a non-empty "entities" section`, { source });
  }

  const entities: Record<string, EntityConfig> = {};
  for (const [entityType, config] of Object.entries(raw.entities)) {
    if (!ENTITY_TYPE_RE.test(entityType)) {
      throw new ConfigurationError(
        `Policy ${source} has invalid entity type "${entityType}" (expected upper-case identifier)`,
        { source },
      );
    }
    entities[entityType] = parseEntityConfig(entityType, config, source);
  }
  assertDistinctPlaceholders(entities, source);

  return Object.freeze({
    name: raw.name,
    description: typeof raw.description === 'string' ? raw.description : '',
    entities: Object.freeze(entities),
  });
}

export async function loadPolicyFile(path: string): Promise<Policy> {
  const absolute = resolve(path);
  let contents: string;
  try {
    contents = await readFile(absolute, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Policy file not found: ${absolute}`, { source: absolute, cause: error });
  }
  return parsePolicy(parseStructuredDocument(contents, absolute), absolute);
}

export async function loadBuiltinPolicy(name: string, catalogDir = POLICY_CATALOG_DIR): Promise<Policy> {
  if (!POLICY_NAME_RE.test(name)) {
    throw new ConfigurationError(`Invalid policy name "${name}"`);
  }
  const available = await listPolicies(catalogDir);
  if (!available.includes(name)) {
    throw new ConfigurationError(`Unknown policy "${name}". Built-in policies: ${available.join(', ')}`);
  }
  return loadPolicyFile(resolve(catalogDir, `${name}.yaml`));
}

/** A path wins over a built-in name; with neither, the default policy loads. */
export async function loadPolicy(source: PolicySource = {}): Promise<Policy> {
  if (source.path) {
    return loadPolicyFile(source.path);
  }
  return loadBuiltinPolicy(source.name ?? DEFAULT_POLICY_NAME);
}

export async function listPolicies(catalogDir = POLICY_CATALOG_DIR): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(catalogDir);
  } catch (error) {
    throw new ConfigurationError(`Policy catalog not readable at ${catalogDir}`, { source: catalogDir, cause: error });
  }
  return entries
    .filter((entry) => CATALOG_EXTENSIONS.includes(extname(entry).toLowerCase()))
    .map((entry) => basename(entry, extname(entry)))
    .sort();
}
