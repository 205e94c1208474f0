import { WEEKDAY_LABELS, type ProjectedValue, type ReportRow } from '@presence-histogram/core';

/**
 * Formats one report value as a table field.
 */
export function formatValue(value: ProjectedValue): string {
  switch (value.kind) {
    case 'empty':
      return '';
    case 'zero':
      return '0';
    case 'count':
    case 'ratio':
      return String(value.value);
    default: {
      const _exhaustive: never = value;
      throw new Error(`Unknown report value: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

/**
 * Renders the report as tab-separated text: a header of weekday names,
 * then one line per bucket led by its HH:MM label.
 */
export function renderReport(rows: readonly ReportRow[]): string {
  const lines = [['bucket', ...WEEKDAY_LABELS].join('\t')];
  for (const row of rows) {
    lines.push([row.label, ...row.values.map(formatValue)].join('\t'));
  }
  return lines.join('\n') + '\n';
}
