import { PreconditionError } from '../common/errors';
import { Match } from '../detectors/types';
import { Policy } from '../policy/types';
import { resolveOverlaps } from './overlap';
import { oneWayReplacement } from './strategies';
import { AnonymizeOptions, AnonymizeResult, DEFAULT_OVERLAP_STRATEGY, Mapping } from './types';

export const COUNTER_TOKEN = '{i}';

export function defaultPlaceholderTemplate(entityType: string): string {
  return `[${entityType}_${COUNTER_TOKEN}]`;
}

/**
 * Substitute the counter into a template. Templates from the policy loader carry
 * exactly one token; hand-built ones with several have each replaced, and ones
 * without get `_<n>` appended so keys never collide.
 */
export function renderPlaceholder(template: string, index: number): string {
  if (!template.includes(COUNTER_TOKEN)) {
    return `${template}_${index}`;
  }
  return template.split(COUNTER_TOKEN).join(String(index));
}

export function assertMatches(text: string, matches: readonly Match[]): void {
  matches.forEach((match, position) => {
    const where = `match #${position} (${match.entityType} ${match.start}..${match.end})`;
    if (!Number.isInteger(match.start) || !Number.isInteger(match.end)) {
      throw new PreconditionError(`${where} has non-integer offsets`);
    }
    if (match.start < 0 || match.end > text.length || match.start > match.end) {
      throw new PreconditionError(`${where} is outside the text of length ${text.length}`);
    }
    if (text.slice(match.start, match.end) !== match.text) {
      throw new PreconditionError(`${where} text does not equal the source slice`);
    }
  });
}

function isEligible(match: Match, policy: Policy): boolean {
  if (!Object.hasOwn(policy.entities, match.entityType)) {
    return false;
  }
  const minConfidence = policy.entities[match.entityType].minConfidence;
  return minConfidence === undefined || match.confidence === undefined || match.confidence >= minConfidence;
}

/**
 * Filter, order and de-overlap matches for one text: the sequence that will
 * receive placeholders, left to right.
 */
export function selectMatches(
  text: string,
  matches: readonly Match[],
  policy: Policy,
  options: AnonymizeOptions = {},
): Match[] {
  if (options.validateMatches) {
    assertMatches(text, matches);
  }
  const eligible = matches.filter((match) => isEligible(match, policy));
  return resolveOverlaps(eligible, options.overlapStrategy ?? DEFAULT_OVERLAP_STRATEGY);
}

export function placeholderTemplate(policy: Policy, entityType: string): string {
  return policy.entities[entityType]?.placeholder || defaultPlaceholderTemplate(entityType);
}

/** Chooses the placeholder for each selected match, called once per match in order. */
export type PlaceholderAssigner = (match: Match) => string;

/** Per-type counters starting at 1, owned by the returned assigner. */
export function createCounterAssigner(policy: Policy): PlaceholderAssigner {
  const counters = new Map<string, number>();
  return (match) => {
    const index = (counters.get(match.entityType) ?? 0) + 1;
    counters.set(match.entityType, index);
    return renderPlaceholder(placeholderTemplate(policy, match.entityType), index);
  };
}

export interface AssembleOptions extends Pick<AnonymizeOptions, 'overlapStrategy'> {
  /** Entities the policy sets to `mask` or `hash` get that one-way replacement instead of a placeholder. */
  policy?: Policy;
}

/** Splice placeholders into the text for an already selected match sequence. */
export function assembleAnonymized(
  text: string,
  selected: readonly Match[],
  placeholderFor: PlaceholderAssigner,
  options: AssembleOptions = {},
): AnonymizeResult {
  const legacyCursor = (options.overlapStrategy ?? DEFAULT_OVERLAP_STRATEGY) === 'none';
  const mapping: Mapping = {};
  const parts: string[] = [];
  let lastIndex = 0;

  for (const match of selected) {
    const oneWay = options.policy ? oneWayReplacement(match, options.policy.entities[match.entityType]) : undefined;
    const replacement = oneWay ?? placeholderFor(match);
    if (match.start > lastIndex) {
      parts.push(text.slice(lastIndex, match.start));
    }
    parts.push(replacement);
    if (oneWay === undefined) {
      mapping[replacement] = match.text;
    }
    // legacy mode moves the cursor to every match end, even backwards
    lastIndex = legacyCursor ? match.end : Math.max(lastIndex, match.end);
  }
  parts.push(text.slice(lastIndex));

  return { anonymized: parts.join(''), mapping };
}

/**
 * Replace every policy-configured match with a numbered placeholder.
 *
 * Matches for entity types the policy does not list are ignored and their text
 * is kept verbatim. Entities set to `mask` or `hash` are rewritten in place and
 * take no counter. Counters start at 1 per entity type on every call, so equal
 * inputs always give equal output.
 */
export function anonymize(
  text: string,
  matches: readonly Match[],
  policy: Policy,
  options: AnonymizeOptions = {},
): AnonymizeResult {
  const selected = selectMatches(text, matches, policy, options);
  return assembleAnonymized(text, selected, createCounterAssigner(policy), {
    overlapStrategy: options.overlapStrategy,
    policy,
  });
}
