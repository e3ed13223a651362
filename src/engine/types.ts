/** Placeholder to original value, in the order placeholders were emitted. */
export type Mapping = Record<string, string>;

export interface AnonymizeResult {
  anonymized: string;
  mapping: Mapping;
}

/**
 * How overlapping matches are settled before placeholders are assigned.
 *
 * - `none`: every match gets a placeholder; overlapping matches produce adjacent
 *   placeholders (legacy behaviour, breaks the round trip on overlaps).
 * - `longest-match`: the longest span wins, then the higher confidence, then the
 *   earlier match in input order.
 * - `highest-confidence`: the highest confidence wins (missing counts as 1), then
 *   the longer span, then input order.
 * - `detector-priority`: the match that comes first in input order wins, so the
 *   first configured detector takes precedence.
 */
export type OverlapStrategy = 'none' | 'longest-match' | 'highest-confidence' | 'detector-priority';

export const OVERLAP_STRATEGIES: readonly OverlapStrategy[] = [
  'none',
  'longest-match',
  'highest-confidence',
  'detector-priority',
];

export const DEFAULT_OVERLAP_STRATEGY: OverlapStrategy = 'longest-match';

export interface AnonymizeOptions {
  overlapStrategy?: OverlapStrategy;
  /** Check every match against the text before use; throws `PreconditionError`. */
  validateMatches?: boolean;
}

export function isOverlapStrategy(value: string): value is OverlapStrategy {
  return OVERLAP_STRATEGIES.some((strategy) => strategy === value);
}
