import type { ValidationReport } from './validate';

export type FormatReportOptions = {
  /** Maximum entries listed per section. */
  limit?: number;
};

function section(title: string, count: number, items: readonly string[], limit: number): string[] {
  const lines = [`${title}: ${count}`];
  for (const item of items.slice(0, limit)) {
    lines.push(`  ${item}`);
  }
  if (items.length > limit) {
    lines.push(`  ... and ${items.length - limit} more`);
  }
  return lines;
}

export function formatValidationReport(report: ValidationReport, options: FormatReportOptions = {}): string {
  const limit = Math.max(0, options.limit ?? 50);
  const lines = [
    `Total rows: ${report.totalRows}`,
    `Unique timestamps: ${report.uniqueTimestamps}`,
    `Range: ${report.start ?? '-'} to ${report.end ?? '-'}`,
    `Expected timestamps: ${report.expectedCount} (step ${report.gridStepMs / 60_000} min)`,
    ...section(
      'Duplicated timestamps',
      report.duplicates.count,
      report.duplicates.entries.map(
        (entry) => `${entry.key} x${entry.occurrences} (rows ${entry.rowIndices.join(', ')})`
      ),
      limit
    ),
    ...section('Missing timestamps', report.missing.count, report.missing.keys, limit),
    ...section('Off-grid timestamps', report.extra.count, report.extra.keys, limit),
    ...section('Out-of-range timestamps', report.outOfRange.count, report.outOfRange.keys, limit),
    ...section(
      'Unparseable timestamps',
      report.invalid.count,
      report.invalid.entries.map((entry) => `row ${entry.rowIndex}: '${entry.value}'`),
      limit
    ),
    `Result: ${report.passed ? 'PASSED' : 'FAILED'}`
  ];
  return lines.join('\n');
}
