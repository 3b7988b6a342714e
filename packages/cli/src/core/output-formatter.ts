/**
 * Output Formatter - JSON and table formats
 */

import type { OutputFormat } from '../types/index.js';

/**
 * Format output as JSON
 */
export function formatJSON(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isScalar(value: unknown): boolean {
  return value === null || ['string', 'number', 'boolean', 'undefined'].includes(typeof value);
}

/**
 * Convert a value to a displayable string, handling nested objects
 */
function valueToString(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'number') {
    return Number.isInteger(value) ? String(value) : String(Number(value.toFixed(6)));
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Format rows as a simple table
 */
export function formatTable(data: readonly unknown[], columns?: string[]): string {
  if (data.length === 0) {
    return 'No data to display';
  }

  const first = data[0];
  const detectedColumns = columns ?? (isRecord(first) ? Object.keys(first) : []);
  if (detectedColumns.length === 0) {
    return formatJSON(data);
  }

  const cell = (row: unknown, col: string): string => valueToString(isRecord(row) ? row[col] : undefined);

  const widths = new Map<string, number>();
  for (const col of detectedColumns) {
    widths.set(col, Math.max(col.length, ...data.map((row) => cell(row, col).length)));
  }
  const width = (col: string): number => widths.get(col) ?? col.length;

  const lines: string[] = [];
  lines.push(detectedColumns.map((col) => col.padEnd(width(col))).join(' | '));
  lines.push(detectedColumns.map((col) => '-'.repeat(width(col))).join('-|-'));
  for (const row of data) {
    lines.push(detectedColumns.map((col) => cell(row, col).padEnd(width(col))).join(' | '));
  }

  return lines.join('\n');
}

/**
 * Scalar fields of an object as field/value rows; nested values are left to JSON output
 */
export function formatSummary(data: Record<string, unknown>): string {
  const rows = Object.entries(data)
    .filter(([, value]) => isScalar(value))
    .map(([field, value]) => ({ field, value }));
  return formatTable(rows, ['field', 'value']);
}

export function formatOutput(data: unknown, format: OutputFormat): string {
  if (format === 'json') {
    return formatJSON(data);
  }
  if (Array.isArray(data)) {
    return formatTable(data);
  }
  if (isRecord(data)) {
    return formatSummary(data);
  }
  return valueToString(data);
}
