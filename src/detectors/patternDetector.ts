import { ConfigurationError } from '../common/errors';
import { keepDisjoint } from '../engine/overlap';
import { PatternMatcher } from './patternMatcher';
import { Detector, Match, PatternDefinition } from './types';

export interface SpanMatcher {
  readonly id: string;
  readonly entityType: string;
  readonly priority: number;
  match(text: string): Match[];
}

export interface PatternDetectorOptions {
  /**
   * Run matchers from highest to lowest priority and drop any hit that overlaps a
   * span already claimed by an earlier matcher.
   */
  suppressOverlaps?: boolean;
}

export interface CustomPatternConfig {
  entityType: string;
  pattern: string;
  flags?: string;
  confidence?: number;
}

export class PatternDetector implements Detector {
  private readonly matchers: SpanMatcher[];

  constructor(
    readonly id: string,
    matchers: Array<SpanMatcher | PatternDefinition>,
    private readonly options: PatternDetectorOptions = {},
  ) {
    const built: SpanMatcher[] = matchers.map((matcher) => ('match' in matcher ? matcher : new PatternMatcher(matcher)));
    // Array.prototype.sort is stable, equal priorities keep declaration order
    this.matchers = options.suppressOverlaps ? built.sort((a, b) => b.priority - a.priority) : built;
  }

  entityTypes(): string[] {
    return [...new Set(this.matchers.map((matcher) => matcher.entityType))];
  }

  detect(text: string): Match[] {
    if (text.length === 0) {
      return [];
    }
    const results = this.matchers.flatMap((matcher) => matcher.match(text));
    return this.options.suppressOverlaps ? keepDisjoint(results, (match) => match) : results;
  }
}

export function createCustomPatternDetector(patterns: CustomPatternConfig[], id = 'custom'): PatternDetector {
  const definitions = patterns.map((config, index): PatternDefinition => {
    if (!/^[A-Z][A-Z0-9_]*$/.test(config.entityType ?? '')) {
      throw new ConfigurationError(
        `Custom pattern #${index + 1} has invalid entity type "${config.entityType}"`,
      );
    }
    if (typeof config.pattern !== 'string' || config.pattern.length === 0) {
      throw new ConfigurationError(`Custom pattern for ${config.entityType} is missing an expression`);
    }
    if (config.confidence !== undefined && !(config.confidence >= 0 && config.confidence <= 1)) {
      throw new ConfigurationError(`Custom pattern for ${config.entityType} has confidence outside 0..1`);
    }
    let pattern: RegExp;
    try {
      pattern = new RegExp(config.pattern, config.flags ?? '');
    } catch (error) {
      throw new ConfigurationError(`Custom pattern for ${config.entityType} does not compile`, { cause: error });
    }
    return {
      id: `${id}:${config.entityType.toLowerCase()}:${index}`,
      entityType: config.entityType,
      pattern,
      confidence: config.confidence,
    };
  });
  return new PatternDetector(id, definitions);
}
