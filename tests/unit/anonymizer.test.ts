import { describe, it, expect } from 'vitest';
import { PreconditionError } from '../../src/common/errors';
import { createCustomPatternDetector } from '../../src/detectors/patternDetector';
import { RegexDetector } from '../../src/detectors/regex';
import { Match } from '../../src/detectors/types';
import { anonymize, renderPlaceholder } from '../../src/engine/anonymizer';
import { deanonymize } from '../../src/engine/deanonymizer';
import { OverlapStrategy } from '../../src/engine/types';
import { PiiGuard } from '../../src/guard/guard';
import { policyFor, silentLogger } from './support';

const DEFAULT_TYPES = {
  EMAIL: {},
  PHONE: {},
  PERSON: {},
  IP_ADDRESS: {},
  CREDIT_CARD: {},
  SSN: {},
};

const regex = new RegexDetector();

function guardWith(entities: Parameters<typeof policyFor>[0], overlapStrategy?: OverlapStrategy, detectors = [regex]) {
  return new PiiGuard({ detectors, policy: policyFor(entities), overlapStrategy, logger: silentLogger });
}

describe('anonymize', () => {
  it('replaces contact details with numbered placeholders', () => {
    const text = 'Contact John Smith at john@example.com or call 555-123-4567';
    const result = guardWith(DEFAULT_TYPES).anonymize(text);
    expect(result.anonymized).toBe('Contact [PERSON_1] at [EMAIL_1] or call [PHONE_1]');
    expect(result.mapping).toEqual({
      '[PERSON_1]': 'John Smith',
      '[EMAIL_1]': 'john@example.com',
      '[PHONE_1]': '555-123-4567',
    });
    expect(Object.keys(result.mapping)).toEqual(['[PERSON_1]', '[EMAIL_1]', '[PHONE_1]']);
  });

  it('numbers repeated types left to right', () => {
    const result = guardWith(DEFAULT_TYPES).anonymize('a@b.com and c@d.com');
    expect(result.anonymized).toBe('[EMAIL_1] and [EMAIL_2]');
    expect(result.mapping).toEqual({ '[EMAIL_1]': 'a@b.com', '[EMAIL_2]': 'c@d.com' });
  });

  it('leaves types outside the policy untouched', () => {
    const result = guardWith({ EMAIL: {} }).anonymize('Mail admin@example.org from 10.0.0.1');
    expect(result.anonymized).toBe('Mail [EMAIL_1] from 10.0.0.1');
    expect(result.mapping).toEqual({ '[EMAIL_1]': 'admin@example.org' });
  });

  it('returns empty output for empty input', () => {
    expect(guardWith(DEFAULT_TYPES).anonymize('')).toEqual({ anonymized: '', mapping: {} });
  });

  it('settles a shared span by the overlap strategy', () => {
    const text = 'Contact John Smith today';
    const names = (confidence: number) =>
      createCustomPatternDetector([{ entityType: 'NAME', pattern: 'John Smith', confidence }]);
    const entities = { PERSON: {}, NAME: {} };

    const legacy = guardWith(entities, 'none', [regex, names(0.5)]).anonymize(text);
    expect(legacy.anonymized).toBe('Contact [PERSON_1][NAME_1] today');
    expect(legacy.mapping).toEqual({ '[PERSON_1]': 'John Smith', '[NAME_1]': 'John Smith' });

    const longest = guardWith(entities, 'longest-match', [regex, names(0.5)]).anonymize(text);
    expect(longest).toEqual({ anonymized: 'Contact [PERSON_1] today', mapping: { '[PERSON_1]': 'John Smith' } });

    const confident = guardWith(entities, 'highest-confidence', [regex, names(0.9)]).anonymize(text);
    expect(confident).toEqual({ anonymized: 'Contact [NAME_1] today', mapping: { '[NAME_1]': 'John Smith' } });

    const priority = guardWith(entities, 'detector-priority', [names(0.9), regex]).anonymize(text);
    expect(priority.anonymized).toBe('Contact [NAME_1] today');
  });

  it('prefers the more confident type on an identical span', () => {
    const guard = guardWith(DEFAULT_TYPES);
    expect(guard.anonymize('SSN 123-45-6789').anonymized).toBe('SSN [SSN_1]');
    expect(guard.anonymize('Card 4111 1111 1111 1111 on file').anonymized).toBe('Card [CREDIT_CARD_1] on file');
  });

  it('loses the text after a nested match in legacy mode', () => {
    const text = 'abcdefghij';
    const matches: Match[] = [
      { entityType: 'A', start: 0, end: 10, text },
      { entityType: 'B', start: 2, end: 5, text: 'cde' },
    ];
    const policy = policyFor({ A: {}, B: {} });
    expect(anonymize(text, matches, policy, { overlapStrategy: 'none' }).anonymized).toBe('[A_1][B_1]fghij');
    expect(anonymize(text, matches, policy).anonymized).toBe('[A_1]');
  });

  it('filters by minConfidence and keeps unscored matches', () => {
    const text = 'Ann Lee and Bob Ray';
    const matches: Match[] = [
      { entityType: 'PERSON', start: 0, end: 7, text: 'Ann Lee', confidence: 0.6 },
      { entityType: 'PERSON', start: 12, end: 19, text: 'Bob Ray' },
    ];
    const result = anonymize(text, matches, policyFor({ PERSON: { minConfidence: 0.7 } }));
    expect(result).toEqual({ anonymized: 'Ann Lee and [PERSON_1]', mapping: { '[PERSON_1]': 'Bob Ray' } });
  });

  it('ignores entity types that only exist on the object prototype', () => {
    const matches: Match[] = [{ entityType: 'toString', start: 0, end: 3, text: 'abc' }];
    expect(anonymize('abc', matches, policyFor({ EMAIL: {} })).anonymized).toBe('abc');
  });

  it('restarts counters on every call', () => {
    const guard = guardWith(DEFAULT_TYPES);
    const first = guard.anonymize('x@y.io');
    const second = guard.anonymize('x@y.io');
    expect(second).toEqual(first);
    expect(first.anonymized).toBe('[EMAIL_1]');
  });

  it('uses policy templates', () => {
    const result = guardWith({ EMAIL: { placeholder: '<<MAIL-{i}>>' } }).anonymize('a@b.com, c@d.com');
    expect(result.anonymized).toBe('<<MAIL-1>>, <<MAIL-2>>');
  });

  it('round-trips through deanonymize', () => {
    const text = 'Ping Jane Doe (jane@corp.example) at 192.168.1.20 or +44 20 7946 0000.';
    const { anonymized, mapping } = guardWith(DEFAULT_TYPES).anonymize(text);
    expect(anonymized).not.toBe(text);
    expect(deanonymize(anonymized, mapping)).toBe(text);
  });

  it('validates matches only when asked', () => {
    const bad: Match[] = [{ entityType: 'EMAIL', start: 0, end: 3, text: 'nope' }];
    const policy = policyFor({ EMAIL: {} });
    expect(anonymize('abc', bad, policy).anonymized).toBe('[EMAIL_1]');
    expect(() => anonymize('abc', bad, policy, { validateMatches: true })).toThrow(PreconditionError);
    const outOfRange: Match[] = [{ entityType: 'EMAIL', start: 2, end: 9, text: 'c' }];
    expect(() => anonymize('abc', outOfRange, policy, { validateMatches: true })).toThrow(/outside the text/);
  });
});

describe('renderPlaceholder', () => {
  it('substitutes the counter token', () => {
    expect(renderPlaceholder('[EMAIL_{i}]', 3)).toBe('[EMAIL_3]');
    expect(renderPlaceholder('{i}-{i}', 2)).toBe('2-2');
    expect(renderPlaceholder('TAG', 4)).toBe('TAG_4');
  });
});
