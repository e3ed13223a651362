import { PatternDetector } from './patternDetector';
import { PersonNameMatcher } from './personName';
import { PatternDefinition } from './types';
import { ibanValid, ipv4OctetsValid, luhnValid } from './validators';

function withConfidence(definitions: Array<Omit<PatternDefinition, 'confidence'> & { priority: number }>): PatternDefinition[] {
  return definitions.map((definition) => ({ ...definition, confidence: definition.priority / 100 }));
}

const ENHANCED_PATTERNS = withConfidence([
  {
    id: 'email',
    entityType: 'EMAIL',
    pattern: /\b[a-zA-Z0-9.!#$%&'*+/=?^_`{|}~-]+@[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?(?:\.[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)+\b/g,
    priority: 100,
  },
  { id: 'url', entityType: 'URL', pattern: /\b(?:https?:\/\/|www\.)[^\s/$.?#][^\s]*[^\s.,;:!?)]/g, priority: 100 },
  { id: 'mac', entityType: 'MAC_ADDRESS', pattern: /\b(?:[0-9A-Fa-f]{2}[:-]){5}[0-9A-Fa-f]{2}\b/g, priority: 100 },
  {
    id: 'ipv6',
    entityType: 'IP_ADDRESS',
    pattern: /\b(?:[0-9a-fA-F]{1,4}:){7}[0-9a-fA-F]{1,4}\b/g,
    priority: 100,
  },
  {
    id: 'ipv4',
    entityType: 'IP_ADDRESS',
    pattern: /\b(?:\d{1,3}\.){3}\d{1,3}\b/g,
    priority: 100,
    validator: ipv4OctetsValid,
  },
  { id: 'ssn', entityType: 'SSN', pattern: /\b\d{3}[ -]?\d{2}[ -]?\d{4}\b/g, priority: 100 },
  {
    id: 'credit-card',
    entityType: 'CREDIT_CARD',
    pattern: /\b(?:\d{4}[ -]?\d{4}[ -]?\d{4}[ -]?\d{4}|3[47]\d{2}[ -]?\d{6}[ -]?\d{5})\b/g,
    priority: 95,
    validator: luhnValid,
  },
  {
    id: 'iban',
    entityType: 'IBAN',
    pattern: /\b[A-Z]{2}\d{2}(?: ?[A-Z0-9]{4}){2,7}(?: ?[A-Z0-9]{1,4})?\b/g,
    priority: 95,
    validator: ibanValid,
  },
  { id: 'mrn', entityType: 'MRN', pattern: /\bMRN[\s:-]{0,2}\d{6,10}\b/gi, priority: 95 },
  { id: 'btc', entityType: 'CRYPTO_ADDRESS', pattern: /\b[13][a-km-zA-HJ-NP-Z1-9]{25,34}\b/g, priority: 95 },
  { id: 'eth', entityType: 'CRYPTO_ADDRESS', pattern: /\b0x[a-fA-F0-9]{40}\b/g, priority: 95 },
  {
    id: 'person-title',
    entityType: 'PERSON',
    pattern: /\b(?:Mr|Mrs|Ms|Miss|Dr|Prof)\.? [A-Z][a-z]+(?: [A-Z][a-z]+)*\b/g,
    priority: 95,
  },
  { id: 'phone-e164', entityType: 'PHONE', pattern: /\+[1-9]\d{6,14}\b/g, priority: 90 },
  {
    id: 'phone-nanp',
    entityType: 'PHONE',
    pattern: /(?:\+?1[-. ]?)?\(?\b\d{3}\)?[-. ]?\d{3}[-. ]?\d{4}\b/g,
    priority: 85,
  },
  {
    id: 'dob',
    entityType: 'DOB',
    pattern: /\b(?:\d{1,2}[-/]\d{1,2}[-/]\d{2,4}|\d{4}[-/]\d{1,2}[-/]\d{1,2})\b/g,
    priority: 70,
  },
]);

/**
 * Broader detector with document and network identifiers. Checksums reject most
 * accidental digit runs, and a span claimed by a higher-priority pattern is never
 * reported again by a lower one.
 */
export class EnhancedRegexDetector extends PatternDetector {
  constructor() {
    super(
      'enhanced_regex',
      [...ENHANCED_PATTERNS, new PersonNameMatcher({ confidence: 0.8, priority: 80 })],
      { suppressOverlaps: true },
    );
  }
}
