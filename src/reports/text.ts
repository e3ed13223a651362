import { DetectionReport } from './detection';

function formatRow(columns: Array<{ text: string; width: number }>): string {
  return columns.map((column) => column.text.padEnd(column.width)).join('  ').trimEnd();
}

export function renderDetectionReportText(report: DetectionReport): string {
  const lines: string[] = [];
  lines.push(`Risk level: ${report.riskLevel.toUpperCase()}`);
  lines.push(
    `Entities: ${report.totals.entities}  Coverage: ${(report.totals.coverage * 100).toFixed(1)}% ` +
      `(${report.totals.piiCharacters}/${report.totals.characters} chars)`,
  );

  if (report.entities.length > 0) {
    lines.push('');
    lines.push(formatRow([
      { text: 'Type', width: 16 },
      { text: 'Count', width: 6 },
      { text: 'Avg confidence', width: 14 },
    ]));
    for (const entry of report.entities) {
      lines.push(formatRow([
        { text: entry.entityType, width: 16 },
        { text: String(entry.count), width: 6 },
        { text: entry.averageConfidence !== undefined ? entry.averageConfidence.toFixed(2) : '-', width: 14 },
      ]));
    }
  }

  if (report.preview !== undefined) {
    lines.push('');
    lines.push(`Preview: ${report.preview}`);
  }
  return `${lines.join('\n')}\n`;
}
