import { Match } from '../detectors/types';
import { AnonymizeResult, Mapping, mergeMappings, placeholderTemplate, renderPlaceholder } from '../engine';
import { PiiGuard } from './guard';

/**
 * Anonymizes the turns of one conversation with shared counters: a value seen
 * again keeps its placeholder, and a new value never reuses an earlier one. The
 * accumulated mapping restores text that mentions placeholders from any turn.
 */
export class ConversationSession {
  private readonly counters = new Map<string, number>();
  private readonly assigned = new Map<string, string>();
  private accumulated: Mapping = {};
  private turnCount = 0;

  constructor(private readonly guard: PiiGuard) {}

  get turns(): number {
    return this.turnCount;
  }

  get mapping(): Mapping {
    return { ...this.accumulated };
  }

  /** A turn that throws leaves the session as it was before the call. */
  anonymize(text: string): AnonymizeResult {
    const counters = new Map(this.counters);
    const assigned = new Map(this.assigned);
    try {
      const result = this.guard.anonymizeWith(text, (match) => this.placeholderFor(match));
      this.accumulated = mergeMappings(this.accumulated, result.mapping);
      this.turnCount += 1;
      return result;
    } catch (error) {
      this.restore(this.counters, counters);
      this.restore(this.assigned, assigned);
      throw error;
    }
  }

  deanonymize(text: string): string {
    return this.guard.deanonymize(text, this.accumulated);
  }

  private restore<K, V>(target: Map<K, V>, snapshot: ReadonlyMap<K, V>): void {
    target.clear();
    snapshot.forEach((value, key) => target.set(key, value));
  }

  private placeholderFor(match: Match): string {
    const key = `${match.entityType}\u0000${match.text}`;
    const known = this.assigned.get(key);
    if (known !== undefined) {
      return known;
    }
    const index = (this.counters.get(match.entityType) ?? 0) + 1;
    this.counters.set(match.entityType, index);
    const placeholder = renderPlaceholder(placeholderTemplate(this.guard.policy, match.entityType), index);
    this.assigned.set(key, placeholder);
    return placeholder;
  }
}
