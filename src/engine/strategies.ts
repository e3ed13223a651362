import { createHash } from 'node:crypto';
import { Match } from '../detectors/types';
import { EntityConfig, HashOptions, MaskOptions } from '../policy/types';

const STRUCTURE_CHARS = new Set(['@', '.', '-', '_', ':', '/', '(', ')', ' ']);

/**
 * Hide a value behind a mask character, optionally revealing its first and last
 * characters. When nothing would stay hidden the whole value is masked.
 */
export function maskValue(value: string, options: Readonly<MaskOptions> = {}): string {
  const char = options.char ?? '*';
  const revealFirst = options.revealFirst ?? 0;
  const revealLast = options.revealLast ?? 0;
  const keepStructure = options.preserveStructure ?? true;

  const characters = Array.from(value);
  const maskable = keepStructure ? characters.filter((c) => !STRUCTURE_CHARS.has(c)).length : characters.length;
  const hideAll = revealFirst + revealLast >= maskable;

  let seen = 0;
  return characters
    .map((c) => {
      if (keepStructure && STRUCTURE_CHARS.has(c)) {
        return c;
      }
      const position = seen;
      seen += 1;
      if (hideAll) {
        return char;
      }
      return position < revealFirst || position >= maskable - revealLast ? c : char;
    })
    .join('');
}

/** Hex digest of salt + value, cut to `length` digits when set. */
export function hashValue(value: string, options: Readonly<HashOptions> = {}): string {
  const digest = createHash(options.algorithm ?? 'sha256')
    .update(`${options.salt ?? ''}${value}`, 'utf8')
    .digest('hex');
  return options.length ? digest.slice(0, options.length) : digest;
}

/**
 * Replacement for entities configured with a one-way strategy, or `undefined`
 * when the entity takes a numbered placeholder.
 */
export function oneWayReplacement(match: Match, config: Readonly<EntityConfig> | undefined): string | undefined {
  switch (config?.strategy) {
    case 'mask':
      return maskValue(match.text, config.mask);
    case 'hash':
      return hashValue(match.text, config.hash);
    default:
      return undefined;
  }
}
