import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../src/common/errors';
import { EnhancedRegexDetector } from '../../src/detectors/enhanced';
import { createCustomPatternDetector } from '../../src/detectors/patternDetector';
import { RegexDetector } from '../../src/detectors/regex';
import { DetectorRegistry } from '../../src/detectors/registry';

describe('RegexDetector', () => {
  const detector = new RegexDetector();

  it('finds the core entity types with their confidences', () => {
    const matches = detector.detect('Contact John Smith at john@example.com or call 555-123-4567');
    expect(matches).toEqual([
      { entityType: 'EMAIL', start: 22, end: 38, text: 'john@example.com', confidence: 0.95 },
      { entityType: 'PHONE', start: 47, end: 59, text: '555-123-4567', confidence: 0.7 },
      { entityType: 'PERSON', start: 8, end: 18, text: 'John Smith', confidence: 0.6 },
    ]);
  });

  it('emits types in fixed order and may report one span twice', () => {
    const matches = detector.detect('SSN 123-45-6789');
    expect(matches.map((match) => [match.entityType, match.start, match.end])).toEqual([
      ['PHONE', 4, 15],
      ['SSN', 4, 15],
    ]);
  });

  it('matches IP addresses by shape only', () => {
    const matches = detector.detect('from 999.999.999.999');
    expect(matches).toEqual([
      { entityType: 'IP_ADDRESS', start: 5, end: 20, text: '999.999.999.999', confidence: 0.9 },
    ]);
  });

  it('returns nothing for empty input', () => {
    expect(detector.detect('')).toEqual([]);
  });
});

describe('EnhancedRegexDetector', () => {
  const detector = new EnhancedRegexDetector();
  const types = (text: string) => detector.detect(text).map((match) => match.entityType);

  it('validates card numbers with Luhn', () => {
    expect(types('Card 4111 1111 1111 1111')).toEqual(['CREDIT_CARD']);
    expect(types('Card 4111 1111 1111 1112')).not.toContain('CREDIT_CARD');
  });

  it('rejects out-of-range IPv4 octets', () => {
    expect(types('host 10.0.0.30')).toEqual(['IP_ADDRESS']);
    expect(types('host 10.0.0.300')).not.toContain('IP_ADDRESS');
  });

  it('finds document identifiers', () => {
    expect(detector.detect('Account GB82 WEST 1234 5698 7654 32')).toEqual([
      { entityType: 'IBAN', start: 8, end: 35, text: 'GB82 WEST 1234 5698 7654 32', confidence: 0.95 },
    ]);
    expect(detector.detect('MRN: 12345678')).toEqual([
      { entityType: 'MRN', start: 0, end: 13, text: 'MRN: 12345678', confidence: 0.95 },
    ]);
  });

  it('keeps the higher-priority pattern when spans overlap', () => {
    const matches = detector.detect('Seen by Dr. Alice Moore today');
    expect(matches).toEqual([
      { entityType: 'PERSON', start: 8, end: 23, text: 'Dr. Alice Moore', confidence: 0.95 },
    ]);
  });
});

describe('custom pattern detector', () => {
  it('compiles configured expressions', () => {
    const detector = createCustomPatternDetector([{ entityType: 'EMPLOYEE_ID', pattern: 'EMP-\\d{6}', confidence: 0.9 }]);
    expect(detector.id).toBe('custom');
    expect(detector.detect('badge EMP-004211')).toEqual([
      { entityType: 'EMPLOYEE_ID', start: 6, end: 16, text: 'EMP-004211', confidence: 0.9 },
    ]);
  });

  it('rejects invalid configuration', () => {
    expect(() => createCustomPatternDetector([{ entityType: 'employee', pattern: 'x' }])).toThrow(
      /invalid entity type "employee"/,
    );
    expect(() => createCustomPatternDetector([{ entityType: 'BROKEN', pattern: '(' }])).toThrow(ConfigurationError);
    expect(() => createCustomPatternDetector([{ entityType: 'SCORE', pattern: 'x', confidence: 1.5 }])).toThrow(
      /outside 0\.\.1/,
    );
  });
});

describe('DetectorRegistry', () => {
  it('lists built-in detectors', () => {
    const registry = new DetectorRegistry();
    expect(registry.list().map((info) => info.id)).toEqual(['regex', 'enhanced_regex']);
  });

  it('rejects unknown identifiers before building anything', () => {
    const registry = new DetectorRegistry();
    let built = 0;
    registry.register({
      id: 'counting',
      description: 'test',
      create: () => {
        built += 1;
        return { id: 'counting', detect: () => [] };
      },
    });
    expect(() => registry.resolve(['counting', 'bogus', 'worse'])).toThrow(
      'Unknown detectors "bogus", "worse". Available detectors: regex, enhanced_regex, counting',
    );
    expect(built).toBe(0);
    expect(() => registry.create('nope')).toThrow(ConfigurationError);
  });

  it('resolves identifiers and instances in order', () => {
    const registry = new DetectorRegistry();
    const inline = { id: 'inline', detect: () => [] };
    expect(registry.resolve([inline, 'regex']).map((detector) => detector.id)).toEqual(['inline', 'regex']);
    registry.unregister('regex');
    expect(registry.has('regex')).toBe(false);
  });
});
