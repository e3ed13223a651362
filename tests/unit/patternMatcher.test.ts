import { describe, it, expect } from 'vitest';
import { PatternMatcher } from '../../src/detectors/patternMatcher';
import { PersonNameMatcher } from '../../src/detectors/personName';
import { ibanValid, ipv4OctetsValid, luhnValid } from '../../src/detectors/validators';

describe('PatternMatcher', () => {
  it('returns every hit with offsets and confidence', () => {
    const matcher = new PatternMatcher({ id: 'ticket', entityType: 'TICKET', pattern: /T-\d+/, confidence: 0.8 });
    expect(matcher.match('T-1 and T-22')).toEqual([
      { entityType: 'TICKET', start: 0, end: 3, text: 'T-1', confidence: 0.8 },
      { entityType: 'TICKET', start: 8, end: 12, text: 'T-22', confidence: 0.8 },
    ]);
  });

  it('leaves confidence out when the definition has none', () => {
    const matcher = new PatternMatcher({ id: 'ticket', entityType: 'TICKET', pattern: /T-\d+/g });
    expect(matcher.match('see T-9')[0]).not.toHaveProperty('confidence');
  });

  it('skips zero-length hits and rejected values', () => {
    const empty = new PatternMatcher({ id: 'empty', entityType: 'EMPTY', pattern: /x*/g });
    expect(empty.match('abc')).toEqual([]);

    const even = new PatternMatcher({
      id: 'even',
      entityType: 'EVEN',
      pattern: /\d+/g,
      validator: (value) => Number(value) % 2 === 0,
    });
    expect(even.match('3 4 7 10').map((match) => match.text)).toEqual(['4', '10']);
  });

  it('does not share lastIndex with the source pattern', () => {
    const shared = /\d/g;
    const matcher = new PatternMatcher({ id: 'digit', entityType: 'DIGIT', pattern: shared });
    matcher.match('1 2 3');
    expect(shared.lastIndex).toBe(0);
    expect(matcher.match('1 2 3')).toHaveLength(3);
  });
});

describe('PersonNameMatcher', () => {
  const matcher = new PersonNameMatcher({ confidence: 0.6 });

  it('trims greeting words at the edges of a capitalised run', () => {
    expect(matcher.match('Dear Mary Jane Watson, welcome')).toEqual([
      { entityType: 'PERSON', start: 5, end: 21, text: 'Mary Jane Watson', confidence: 0.6 },
    ]);
  });

  it('drops runs with fewer than two name words left', () => {
    expect(matcher.match('Hello Bob')).toEqual([]);
    expect(matcher.match('Thank You')).toEqual([]);
  });

  it('accepts a custom stop-word list', () => {
    const custom = new PersonNameMatcher({ stopwords: ['Ask'] });
    expect(custom.match('Ask Dear Abby').map((match) => match.text)).toEqual(['Dear Abby']);
  });
});

describe('validators', () => {
  it('checks Luhn sums', () => {
    expect(luhnValid('4111 1111 1111 1111')).toBe(true);
    expect(luhnValid('4111-1111-1111-1112')).toBe(false);
    expect(luhnValid('1234')).toBe(false);
  });

  it('checks IPv4 octet ranges', () => {
    expect(ipv4OctetsValid('192.168.0.255')).toBe(true);
    expect(ipv4OctetsValid('10.0.0.300')).toBe(false);
  });

  it('checks IBAN mod-97', () => {
    expect(ibanValid('GB82 WEST 1234 5698 7654 32')).toBe(true);
    expect(ibanValid('GB82 WEST 1234 5698 7654 33')).toBe(false);
  });
});
