import { Match, MatchValidator, PatternDefinition } from './types';

function ensureGlobal(pattern: RegExp): RegExp {
  const flags = pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`;
  return new RegExp(pattern.source, flags);
}

/**
 * Runs one expression for one entity type. Holds its own RegExp copy so the
 * `lastIndex` cursor of a shared pattern literal is never touched.
 */
export class PatternMatcher {
  readonly id: string;
  readonly entityType: string;
  readonly confidence?: number;
  readonly priority: number;
  private readonly pattern: RegExp;
  private readonly validator?: MatchValidator;

  constructor(definition: PatternDefinition) {
    this.id = definition.id;
    this.entityType = definition.entityType;
    this.confidence = definition.confidence;
    this.priority = definition.priority ?? 0;
    this.validator = definition.validator;
    this.pattern = ensureGlobal(definition.pattern);
  }

  match(text: string): Match[] {
    const matches: Match[] = [];
    for (const found of text.matchAll(this.pattern)) {
      const value = found[0];
      // zero-width hits would otherwise produce empty placeholders
      if (value.length === 0 || found.index === undefined) {
        continue;
      }
      if (this.validator && !this.validator(value)) {
        continue;
      }
      const match: Match = {
        entityType: this.entityType,
        start: found.index,
        end: found.index + value.length,
        text: value,
      };
      if (this.confidence !== undefined) {
        match.confidence = this.confidence;
      }
      matches.push(match);
    }
    return matches;
  }
}
