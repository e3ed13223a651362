import { MappingConflictError } from '../common/errors';
import { Mapping } from './types';

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Put original values back in place of placeholders.
 *
 * Placeholders are matched literally in a single left-to-right pass, longest key
 * first at any position. Restored values are inserted as-is and never searched
 * again. Text without known placeholders comes back unchanged.
 */
export function deanonymize(text: string, mapping: Mapping): string {
  const placeholders = Object.keys(mapping).filter((placeholder) => placeholder.length > 0);
  if (placeholders.length === 0 || text.length === 0) {
    return text;
  }
  placeholders.sort((a, b) => b.length - a.length);
  const pattern = new RegExp(placeholders.map(escapeRegExp).join('|'), 'g');
  return text.replace(pattern, (placeholder) => (Object.hasOwn(mapping, placeholder) ? mapping[placeholder] : placeholder));
}

/**
 * Combine mappings from several turns of one conversation. A placeholder mapped
 * to two different values cannot be restored unambiguously and is rejected.
 */
export function mergeMappings(...mappings: Mapping[]): Mapping {
  const merged: Mapping = {};
  for (const mapping of mappings) {
    for (const [placeholder, original] of Object.entries(mapping)) {
      if (Object.hasOwn(merged, placeholder) && merged[placeholder] !== original) {
        throw new MappingConflictError(placeholder);
      }
      merged[placeholder] = original;
    }
  }
  return merged;
}
