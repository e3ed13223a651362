import { ConfigurationError } from '../common/errors';
import { EnhancedRegexDetector } from './enhanced';
import { RegexDetector } from './regex';
import { Detector, DetectorFactory, DetectorInfo } from './types';

export class DetectorRegistry {
  private factories = new Map<string, DetectorFactory>();

  constructor() {
    this.register({
      id: 'regex',
      description: 'Core patterns: EMAIL, PHONE, PERSON, IP_ADDRESS, CREDIT_CARD, SSN',
      create: () => new RegexDetector(),
    });
    this.register({
      id: 'enhanced_regex',
      description: 'International and document identifiers with checksum validation',
      create: () => new EnhancedRegexDetector(),
    });
  }

  register(factory: DetectorFactory): void {
    this.factories.set(factory.id, factory);
  }

  unregister(id: string): void {
    this.factories.delete(id);
  }

  has(id: string): boolean {
    return this.factories.has(id);
  }

  create(id: string): Detector {
    const factory = this.factories.get(id);
    if (!factory) {
      throw new ConfigurationError(
        `Unknown detector "${id}". Available detectors: ${[...this.factories.keys()].join(', ')}`,
      );
    }
    return factory.create();
  }

  list(): DetectorInfo[] {
    return [...this.factories.values()].map(({ id, description }) => ({ id, description }));
  }

  /**
   * Resolve a mixed list of identifiers and ready-made detectors, keeping order.
   * Every identifier is checked before any detector is built.
   */
  resolve(entries: Array<string | Detector>): Detector[] {
    const unknown = entries.filter((entry): entry is string => typeof entry === 'string' && !this.has(entry));
    if (unknown.length > 0) {
      throw new ConfigurationError(
        `Unknown detector${unknown.length > 1 ? 's' : ''} ${unknown.map((id) => `"${id}"`).join(', ')}. ` +
          `Available detectors: ${[...this.factories.keys()].join(', ')}`,
      );
    }
    return entries.map((entry) => (typeof entry === 'string' ? this.create(entry) : entry));
  }
}

export const detectorRegistry = new DetectorRegistry();
