import { PatternDetector } from './patternDetector';
import { PersonNameMatcher } from './personName';
import { PatternDefinition } from './types';

export const EMAIL_PATTERN: PatternDefinition = {
  id: 'email',
  entityType: 'EMAIL',
  pattern: /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g,
  confidence: 0.95,
};

export const PHONE_PATTERN: PatternDefinition = {
  id: 'phone',
  entityType: 'PHONE',
  pattern: /\+?\d[\d\- ]{7,}\d/g,
  confidence: 0.7,
};

// shape only: 999.999.999.999 is accepted
export const IP_ADDRESS_PATTERN: PatternDefinition = {
  id: 'ipv4',
  entityType: 'IP_ADDRESS',
  pattern: /\b(?:\d{1,3}\.){3}\d{1,3}\b/g,
  confidence: 0.9,
};

export const CREDIT_CARD_PATTERN: PatternDefinition = {
  id: 'credit-card',
  entityType: 'CREDIT_CARD',
  pattern: /\b\d{4}[ -]?\d{4}[ -]?\d{4}[ -]?\d{4}\b/g,
  confidence: 0.9,
};

export const SSN_PATTERN: PatternDefinition = {
  id: 'ssn',
  entityType: 'SSN',
  pattern: /\b\d{3}-\d{2}-\d{4}\b/g,
  confidence: 0.95,
};

export const PERSON_CONFIDENCE = 0.6;

/**
 * Default detector. Emits every hit of every pattern, in the fixed order EMAIL,
 * PHONE, PERSON, IP_ADDRESS, CREDIT_CARD, SSN; overlaps between types are left
 * for the engine to resolve.
 */
export class RegexDetector extends PatternDetector {
  constructor() {
    super('regex', [
      EMAIL_PATTERN,
      PHONE_PATTERN,
      new PersonNameMatcher({ confidence: PERSON_CONFIDENCE }),
      IP_ADDRESS_PATTERN,
      CREDIT_CARD_PATTERN,
      SSN_PATTERN,
    ]);
  }
}
