import { performance } from 'node:perf_hooks';
import { getLogger, Logger } from '../common/logger';
import { CustomPatternConfig, createCustomPatternDetector } from '../detectors/patternDetector';
import { DetectorRegistry, detectorRegistry } from '../detectors/registry';
import { Detector, Match } from '../detectors/types';
import {
  AnonymizeOptions,
  AnonymizeResult,
  DEFAULT_OVERLAP_STRATEGY,
  Mapping,
  OverlapStrategy,
  PlaceholderAssigner,
  assembleAnonymized,
  createCounterAssigner,
  deanonymize,
  selectMatches,
} from '../engine';
import { recordAnonymizeMetrics, recordDeanonymizeMetrics } from '../observability/metrics';
import { loadPolicy } from '../policy/loader';
import { Policy } from '../policy/types';
import { GuardHooks } from './hooks';

export interface PiiGuardOptions {
  detectors: Detector[];
  policy: Policy;
  overlapStrategy?: OverlapStrategy;
  validateMatches?: boolean;
  hooks?: GuardHooks;
  logger?: Logger;
}

export interface CreateGuardOptions {
  /** Registry identifiers or ready-made detectors, run in this order. Defaults to `['regex']`. */
  detectors?: Array<string | Detector>;
  /** Built-in policy name or an already loaded policy. Defaults to `default_pii`. */
  policy?: string | Policy;
  /** Policy file; takes precedence over `policy`. */
  policyPath?: string;
  overlapStrategy?: OverlapStrategy;
  validateMatches?: boolean;
  /** Compiled into one extra detector appended after `detectors`. */
  customPatterns?: CustomPatternConfig[];
  registry?: DetectorRegistry;
  hooks?: GuardHooks;
  logger?: Logger;
}

/**
 * Owns the detectors, the policy and the overlap strategy for one deployment.
 * Logs carry entity types and counts only.
 */
export class PiiGuard {
  readonly detectors: readonly Detector[];
  readonly policy: Policy;
  readonly overlapStrategy: OverlapStrategy;
  readonly hooks: GuardHooks;
  private readonly validateMatches: boolean;
  private readonly logger: Logger;

  constructor(options: PiiGuardOptions) {
    this.detectors = [...options.detectors];
    this.policy = options.policy;
    this.overlapStrategy = options.overlapStrategy ?? DEFAULT_OVERLAP_STRATEGY;
    this.validateMatches = options.validateMatches ?? false;
    this.logger = options.logger ?? getLogger('guard');
    this.hooks = options.hooks ?? new GuardHooks(this.logger.child('hooks'));
  }

  get anonymizeOptions(): AnonymizeOptions {
    return { overlapStrategy: this.overlapStrategy, validateMatches: this.validateMatches };
  }

  detect(text: string): Match[] {
    const notify = this.hooks.count('detection') > 0;
    return this.detectors.flatMap((detector) => {
      const found = detector.detect(text);
      if (notify) {
        found.forEach((match) => this.hooks.emitDetection({ match, detector: detector.id }));
      }
      return found;
    });
  }

  anonymize(text: string): AnonymizeResult {
    return this.anonymizeWith(text, createCounterAssigner(this.policy));
  }

  /** Anonymize with caller-chosen placeholders, e.g. ones shared across conversation turns. */
  anonymizeWith(text: string, assign: PlaceholderAssigner): AnonymizeResult {
    const started = performance.now();
    const options = this.anonymizeOptions;
    let selected: Match[];
    let result: AnonymizeResult;
    try {
      const prepared = this.hooks.runPreAnonymize({ text, matches: this.detect(text) });
      selected = selectMatches(text, prepared.matches, this.policy, options);
      const assembled = assembleAnonymized(text, selected, assign, { ...options, policy: this.policy });
      result = this.hooks.runPostAnonymize({ text, matches: selected, result: assembled }).result;
    } catch (error) {
      this.hooks.emitError(error, 'anonymize');
      throw error;
    }
    const entityTypes = selected.map((match) => match.entityType);
    const durationMs = performance.now() - started;

    recordAnonymizeMetrics({
      policy: this.policy.name,
      overlapStrategy: this.overlapStrategy,
      entityTypes,
      durationMs,
    });
    this.logger.debug('Anonymized text', {
      policy: this.policy.name,
      entities: selected.length,
      types: [...new Set(entityTypes)],
      durationMs: Number(durationMs.toFixed(3)),
    });
    return result;
  }

  deanonymize(text: string, mapping: Mapping): string {
    recordDeanonymizeMetrics();
    return deanonymize(text, mapping);
  }

  batchAnonymize(texts: readonly string[]): AnonymizeResult[] {
    return texts.map((text) => this.anonymize(text));
  }

  batchDeanonymize(texts: readonly string[], mappings: readonly Mapping[]): string[] {
    if (texts.length !== mappings.length) {
      throw new RangeError(`Got ${texts.length} texts but ${mappings.length} mappings`);
    }
    return texts.map((text, index) => this.deanonymize(text, mappings[index]));
  }
}

export async function createGuard(options: CreateGuardOptions = {}): Promise<PiiGuard> {
  const registry = options.registry ?? detectorRegistry;
  const detectors = registry.resolve(options.detectors ?? ['regex']);
  if (options.customPatterns && options.customPatterns.length > 0) {
    detectors.push(createCustomPatternDetector(options.customPatterns));
  }

  let policy: Policy;
  if (options.policyPath) {
    policy = await loadPolicy({ path: options.policyPath });
  } else if (typeof options.policy === 'object') {
    policy = options.policy;
  } else {
    policy = await loadPolicy({ name: options.policy });
  }

  const logger = options.logger ?? getLogger('guard');
  logger.info('Guard ready', {
    detectors: detectors.map((detector) => detector.id),
    policy: policy.name,
    overlapStrategy: options.overlapStrategy ?? DEFAULT_OVERLAP_STRATEGY,
  });

  return new PiiGuard({
    detectors,
    policy,
    overlapStrategy: options.overlapStrategy,
    validateMatches: options.validateMatches,
    hooks: options.hooks,
    logger,
  });
}
