export const ANONYMIZATION_STRATEGIES = ['placeholder', 'mask', 'hash'] as const;
export type AnonymizationStrategy = (typeof ANONYMIZATION_STRATEGIES)[number];

export const HASH_ALGORITHMS = ['sha256', 'sha512', 'md5'] as const;
export type HashAlgorithm = (typeof HASH_ALGORITHMS)[number];

export interface MaskOptions {
  /** Single character written over hidden characters. Defaults to `*`. */
  char?: string;
  revealFirst?: number;
  revealLast?: number;
  /** Keep separators such as `@`, `.` and `-` in place. Defaults to true. */
  preserveStructure?: boolean;
}

export interface HashOptions {
  algorithm?: HashAlgorithm;
  salt?: string;
  /** Keep only this many leading hex digits. */
  length?: number;
}

export interface EntityConfig {
  /** Template with a single `{i}` counter token, e.g. `[EMAIL_{i}]`. */
  placeholder: string;
  /** Matches with a lower confidence are left in the text. */
  minConfidence?: number;
  /**
   * `placeholder` (default) is reversible through the mapping. `mask` and
   * `hash` are one-way: their output never enters the mapping.
   */
  strategy?: AnonymizationStrategy;
  mask?: Readonly<MaskOptions>;
  hash?: Readonly<HashOptions>;
}

export interface Policy {
  name: string;
  description: string;
  entities: Readonly<Record<string, Readonly<EntityConfig>>>;
}

export interface PolicySource {
  /** Built-in policy name; ignored when `path` is given. */
  name?: string;
  path?: string;
}

export function isAnonymizationStrategy(value: unknown): value is AnonymizationStrategy {
  return ANONYMIZATION_STRATEGIES.some((strategy) => strategy === value);
}

export function isHashAlgorithm(value: unknown): value is HashAlgorithm {
  return HASH_ALGORITHMS.some((algorithm) => algorithm === value);
}
