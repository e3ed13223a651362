import stopwordList from './data/name-stopwords.json';
import { Match } from './types';

const NAME_RE = /\b[A-Z][a-z]+(?: [A-Z][a-z]+)+\b/g;
const TOKEN_RE = /[A-Z][a-z]+/g;

const DEFAULT_STOPWORDS: ReadonlySet<string> = new Set(stopwordList);

interface Token {
  value: string;
  start: number;
  end: number;
}

export interface PersonNameMatcherOptions {
  confidence?: number;
  priority?: number;
  stopwords?: Iterable<string>;
}

/**
 * Capitalised-word heuristic for simple Western names: two or more title-case
 * words joined by single spaces. Greeting and sentence words at either edge of a
 * run ("Contact John Smith") are trimmed off; the run is dropped if fewer than
 * two words remain. Over- and under-matching are expected.
 */
export class PersonNameMatcher {
  readonly id = 'person-name';
  readonly entityType = 'PERSON';
  readonly priority: number;
  private readonly confidence?: number;
  private readonly stopwords: ReadonlySet<string>;

  constructor(options: PersonNameMatcherOptions = {}) {
    this.confidence = options.confidence;
    this.priority = options.priority ?? 0;
    this.stopwords = options.stopwords ? new Set(options.stopwords) : DEFAULT_STOPWORDS;
  }

  match(text: string): Match[] {
    const matches: Match[] = [];
    for (const run of text.matchAll(NAME_RE)) {
      if (run.index === undefined) {
        continue;
      }
      const tokens = this.tokenize(run[0], run.index);
      let first = 0;
      let last = tokens.length - 1;
      while (first <= last && this.stopwords.has(tokens[first].value)) {
        first += 1;
      }
      while (last >= first && this.stopwords.has(tokens[last].value)) {
        last -= 1;
      }
      if (last - first < 1) {
        continue;
      }
      const start = tokens[first].start;
      const end = tokens[last].end;
      const match: Match = { entityType: this.entityType, start, end, text: text.slice(start, end) };
      if (this.confidence !== undefined) {
        match.confidence = this.confidence;
      }
      matches.push(match);
    }
    return matches;
  }

  private tokenize(run: string, offset: number): Token[] {
    return Array.from(run.matchAll(TOKEN_RE), (token) => {
      const start = offset + (token.index ?? 0);
      return { value: token[0], start, end: start + token[0].length };
    });
  }
}
