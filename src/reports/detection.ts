import { Match } from '../detectors/types';
import { assembleAnonymized } from '../engine/anonymizer';
import { resolveOverlaps } from '../engine/overlap';

export type RiskLevel = 'critical' | 'high' | 'medium' | 'low';

export interface DetectionReport {
  totals: {
    entities: number;
    characters: number;
    piiCharacters: number;
    coverage: number;
  };
  entities: Array<{ entityType: string; count: number; averageConfidence?: number }>;
  riskLevel: RiskLevel;
  /** Start of the text with every detected span shown as `<TYPE>`. */
  preview?: string;
}

export interface DetectionReportOptions {
  includePreview?: boolean;
}

export const PREVIEW_LENGTH = 100;

const CRITICAL_TYPES = new Set(['SSN', 'CREDIT_CARD', 'MRN', 'CRYPTO_ADDRESS']);
const MEDIUM_TYPES = new Set(['EMAIL', 'PHONE', 'PERSON', 'IP_ADDRESS', 'IBAN', 'DOB', 'MAC_ADDRESS']);

/** Number of characters covered by at least one match. */
function coveredCharacters(matches: readonly Match[]): number {
  const spans = [...matches].sort((a, b) => a.start - b.start);
  let covered = 0;
  let cursor = 0;
  for (const span of spans) {
    const start = Math.max(span.start, cursor);
    if (span.end > start) {
      covered += span.end - start;
      cursor = span.end;
    }
  }
  return covered;
}

function assessRisk(entityTypes: readonly string[], coverage: number): RiskLevel {
  if (entityTypes.some((type) => CRITICAL_TYPES.has(type))) {
    return 'critical';
  }
  const mediumCount = entityTypes.filter((type) => MEDIUM_TYPES.has(type)).length;
  if (coverage > 0.3 || mediumCount > 5) {
    return 'high';
  }
  if (mediumCount > 0 || coverage > 0.1) {
    return 'medium';
  }
  return 'low';
}

function buildPreview(text: string, matches: readonly Match[]): string {
  const masked = assembleAnonymized(
    text,
    resolveOverlaps(matches, 'longest-match'),
    (match) => `<${match.entityType}>`,
  ).anonymized;
  return masked.length > PREVIEW_LENGTH ? `${masked.slice(0, PREVIEW_LENGTH)}...` : masked;
}

export function buildDetectionReport(
  text: string,
  matches: readonly Match[],
  options: DetectionReportOptions = {},
): DetectionReport {
  const stats = new Map<string, { count: number; confidenceSum: number; confidenceCount: number }>();
  for (const match of matches) {
    const entry = stats.get(match.entityType) ?? { count: 0, confidenceSum: 0, confidenceCount: 0 };
    entry.count += 1;
    if (match.confidence !== undefined) {
      entry.confidenceSum += match.confidence;
      entry.confidenceCount += 1;
    }
    stats.set(match.entityType, entry);
  }

  const piiCharacters = coveredCharacters(matches);
  const coverage = text.length > 0 ? Number((piiCharacters / text.length).toFixed(4)) : 0;

  const report: DetectionReport = {
    totals: {
      entities: matches.length,
      characters: text.length,
      piiCharacters,
      coverage,
    },
    entities: Array.from(stats.entries())
      .map(([entityType, entry]) => ({
        entityType,
        count: entry.count,
        averageConfidence:
          entry.confidenceCount > 0 ? Number((entry.confidenceSum / entry.confidenceCount).toFixed(3)) : undefined,
      }))
      .sort((a, b) => b.count - a.count || a.entityType.localeCompare(b.entityType)),
    riskLevel: assessRisk(
      matches.map((match) => match.entityType),
      coverage,
    ),
  };

  if (options.includePreview) {
    report.preview = buildPreview(text, matches);
  }
  return report;
}
