/**
 * A detected PII span. Offsets are half-open string indices into the text given
 * to `detect`, and `text` equals `source.slice(start, end)`.
 */
export interface Match {
  entityType: string;
  start: number;
  end: number;
  text: string;
  confidence?: number;
}

export interface Detector {
  readonly id: string;
  detect(text: string): Match[];
}

export type MatchValidator = (value: string) => boolean;

export interface PatternDefinition {
  id: string;
  entityType: string;
  pattern: RegExp;
  confidence?: number;
  /** Higher priorities are matched first when the detector suppresses overlaps. */
  priority?: number;
  validator?: MatchValidator;
}

export interface DetectorFactory {
  id: string;
  description: string;
  create: () => Detector;
}

export interface DetectorInfo {
  id: string;
  description: string;
}
