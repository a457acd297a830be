import type { MutationResult } from '../workflow/types.js';

export type TableRecord = Record<string, unknown>;

/**
 * Format records as a markdown table
 */
export function formatResultsAsTable(records: TableRecord[]): string {
  if (records.length === 0) {
    return 'No results found.';
  }

  const columns = Object.keys(records[0]);

  // Create header
  const header = '| ' + columns.join(' | ') + ' |';
  const separator = '| ' + columns.map(() => '---').join(' | ') + ' |';

  // Create rows
  const rows = records.map((record) => {
    const values = columns.map((col) => {
      const value = record[col];
      if (value === null || value === undefined) return 'NULL';
      if (value instanceof Date) return value.toISOString();
      return String(value).replace(/\|/g, '\\|');
    });
    return '| ' + values.join(' | ') + ' |';
  });

  return [header, separator, ...rows].join('\n');
}

/**
 * Truncate long text for display
 */
export function truncateText(text: string, maxLength: number = 100): string {
  if (text.length <= maxLength) return text;
  return text.substring(0, maxLength - 3) + '...';
}

/**
 * One table row per mutation result
 */
export function formatMutationResults<V>(
  results: MutationResult<V>[],
  formatValue: (value: V) => string
): string {
  const rows = results.map((result) => ({
    host: result.host,
    instance: result.instanceName,
    sql_instance: result.fullyQualifiedName,
    prior: result.priorValue === undefined ? undefined : formatValue(result.priorValue),
    new: result.newValue === undefined ? undefined : formatValue(result.newValue),
    applied: result.applied,
    cascade: result.cascadeApplied,
    status: result.status,
    errors: result.errors.length > 0
      ? result.errors.map((e) => truncateText(`[${e.category}] ${e.message}`, 200)).join('; ')
      : '',
  }));

  return formatResultsAsTable(rows);
}

/**
 * Planned changes and notes worth showing under the table
 */
export function formatMutationNotes<V>(results: MutationResult<V>[]): string {
  const lines: string[] = [];
  for (const result of results) {
    if (result.status === 'rejected' && result.plannedChange) {
      lines.push(`- ${result.fullyQualifiedName}: not confirmed, would run: ${result.plannedChange}`);
    }
    if (result.note) {
      lines.push(`- ${result.fullyQualifiedName}: ${result.note}`);
    }
  }
  return lines.join('\n');
}
