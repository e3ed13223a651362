import { Match } from '../detectors/types';
import { OverlapStrategy } from './types';

interface Candidate {
  match: Match;
  order: number;
}

type Span = Pick<Match, 'start' | 'end'>;
type Ranker = (a: Candidate, b: Candidate) => number;

const length = (candidate: Candidate) => candidate.match.end - candidate.match.start;
const confidence = (candidate: Candidate) => candidate.match.confidence ?? 1;
const byOrder: Ranker = (a, b) => a.order - b.order;

const RANKERS: Record<Exclude<OverlapStrategy, 'none'>, Ranker> = {
  'longest-match': (a, b) => length(b) - length(a) || confidence(b) - confidence(a) || byOrder(a, b),
  'highest-confidence': (a, b) => confidence(b) - confidence(a) || length(b) - length(a) || byOrder(a, b),
  'detector-priority': byOrder,
};

export function spansOverlap(a: Span, b: Span): boolean {
  return a.start < b.end && b.start < a.end;
}

/**
 * Spans kept so far, indexed by start offset in a Fenwick tree over the sorted
 * distinct starts of every candidate. Kept spans never overlap, so ordered by
 * start their ends never decrease, and an overlap check only needs the nearest
 * kept span to the left, the ones sharing the start and a count of the ones
 * starting inside the candidate.
 */
class KeptSpans {
  private readonly slots: number;
  private readonly tree: number[];
  private readonly furthestEnd: number[];
  private readonly topStep: number;

  constructor(private readonly starts: readonly number[]) {
    this.slots = starts.length;
    this.tree = new Array<number>(this.slots + 1).fill(0);
    this.furthestEnd = new Array<number>(this.slots).fill(-Infinity);
    let step = 1;
    while (step * 2 <= this.slots) {
      step *= 2;
    }
    this.topStep = step;
  }

  overlaps(span: Span): boolean {
    const slot = this.slotOf(span.start);
    const before = this.countBefore(slot);
    if (before > 0 && this.furthestEnd[this.slotAt(before)] > span.start) {
      return true;
    }
    if (span.end > span.start && this.furthestEnd[slot] > span.start) {
      return true;
    }
    const inside = this.slotOf(span.end);
    return inside > slot + 1 && this.countBefore(inside) - this.countBefore(slot + 1) > 0;
  }

  add(span: Span): void {
    const slot = this.slotOf(span.start);
    if (this.furthestEnd[slot] === -Infinity) {
      for (let index = slot + 1; index <= this.slots; index += index & -index) {
        this.tree[index] += 1;
      }
    }
    this.furthestEnd[slot] = Math.max(this.furthestEnd[slot], span.end);
  }

  /** First slot whose start is not below `offset`. */
  private slotOf(offset: number): number {
    let low = 0;
    let high = this.slots;
    while (low < high) {
      const middle = (low + high) >>> 1;
      if (this.starts[middle] < offset) {
        low = middle + 1;
      } else {
        high = middle;
      }
    }
    return low;
  }

  /** Occupied slots among the first `slot` ones. */
  private countBefore(slot: number): number {
    let total = 0;
    for (let index = slot; index > 0; index -= index & -index) {
      total += this.tree[index];
    }
    return total;
  }

  /** Slot of the `rank`-th occupied slot, counting from 1. */
  private slotAt(rank: number): number {
    let position = 0;
    let remaining = rank;
    for (let step = this.topStep; step > 0; step >>= 1) {
      const next = position + step;
      if (next <= this.slots && this.tree[next] < remaining) {
        position = next;
        remaining -= this.tree[next];
      }
    }
    return position;
  }
}

/**
 * Walk `items` in the given order and keep each one whose span overlaps nothing
 * kept before it. Kept items come back in walk order.
 */
export function keepDisjoint<T>(items: readonly T[], spanOf: (item: T) => Span): T[] {
  const starts = [...new Set(items.map((item) => spanOf(item).start))].sort((a, b) => a - b);
  const kept = new KeptSpans(starts);
  const result: T[] = [];
  for (const item of items) {
    const span = spanOf(item);
    if (kept.overlaps(span)) {
      continue;
    }
    kept.add(span);
    result.push(item);
  }
  return result;
}

function byStart(candidates: Candidate[]): Match[] {
  return candidates
    .sort((a, b) => a.match.start - b.match.start || byOrder(a, b))
    .map((candidate) => candidate.match);
}

/**
 * Order matches by start offset and, unless the strategy is `none`, keep a set
 * of pairwise non-overlapping matches chosen greedily by the strategy's ranking.
 * Matches with equal start keep their input order.
 */
export function resolveOverlaps(matches: readonly Match[], strategy: OverlapStrategy): Match[] {
  const candidates = matches.map((match, order) => ({ match, order }));
  if (strategy === 'none') {
    return byStart(candidates);
  }
  const ranked = [...candidates].sort(RANKERS[strategy]);
  return byStart(keepDisjoint(ranked, (candidate) => candidate.match));
}
