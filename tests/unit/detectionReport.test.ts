import { describe, it, expect } from 'vitest';
import { RegexDetector } from '../../src/detectors/regex';
import { Match } from '../../src/detectors/types';
import { buildDetectionReport } from '../../src/reports/detection';
import { renderDetectionReportText } from '../../src/reports/text';

const detector = new RegexDetector();

describe('buildDetectionReport', () => {
  it('marks identifiers as critical and counts overlapping spans once', () => {
    const text = 'SSN 123-45-6789';
    const report = buildDetectionReport(text, detector.detect(text), { includePreview: true });
    expect(report).toEqual({
      totals: { entities: 2, characters: 15, piiCharacters: 11, coverage: 0.7333 },
      entities: [
        { entityType: 'PHONE', count: 1, averageConfidence: 0.7 },
        { entityType: 'SSN', count: 1, averageConfidence: 0.95 },
      ],
      riskLevel: 'critical',
      preview: 'SSN <SSN>',
    });
  });

  it('grades contact details by volume and coverage', () => {
    const sparse = 'Reach me at a@b.com any time this week or the next one.';
    const sparseReport = buildDetectionReport(sparse, detector.detect(sparse));
    expect(sparseReport.totals.coverage).toBe(0.1273);
    expect(sparseReport.riskLevel).toBe('medium');
    expect(sparseReport).not.toHaveProperty('preview');

    const crowded = 'a@b.io c@d.io e@f.io g@h.io i@j.io k@l.io';
    expect(buildDetectionReport(crowded, detector.detect(crowded)).riskLevel).toBe('high');

    expect(buildDetectionReport('nothing to see', []).riskLevel).toBe('low');
    expect(buildDetectionReport('', []).totals.coverage).toBe(0);
  });

  it('truncates the preview', () => {
    const text = `${'x'.repeat(150)} a@b.com`;
    const matches: Match[] = [{ entityType: 'EMAIL', start: 151, end: 158, text: 'a@b.com' }];
    expect(buildDetectionReport(text, matches, { includePreview: true }).preview).toBe(`${'x'.repeat(100)}...`);
  });
});

describe('renderDetectionReportText', () => {
  it('prints a summary table', () => {
    const text = 'SSN 123-45-6789';
    const rendered = renderDetectionReportText(buildDetectionReport(text, detector.detect(text), { includePreview: true }));
    expect(rendered).toBe(
      [
        'Risk level: CRITICAL',
        'Entities: 2  Coverage: 73.3% (11/15 chars)',
        '',
        'Type              Count   Avg confidence',
        'PHONE             1       0.70',
        'SSN               1       0.95',
        '',
        'Preview: SSN <SSN>',
        '',
      ].join('\n'),
    );
  });
});
