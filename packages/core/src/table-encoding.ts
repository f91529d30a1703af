/**
 * Table Encoding
 *
 * Normalizes tabular data handed to the export shims and encodes it
 * as delimited text (CSV/TSV).
 *
 * @module @sheetbox/core/table-encoding
 */

import type { TableCell, TabularData } from './sandbox-types.js';

/** Dates built inside a vm context fail `instanceof Date` */
function isDate(value: unknown): value is Date {
  return Object.prototype.toString.call(value) === '[object Date]';
}

function isTableCell(value: unknown): value is TableCell {
  return (
    value === null ||
    value === undefined ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    isDate(value)
  );
}

function isCellRecord(value: unknown): value is Readonly<Record<string, TableCell>> {
  if (typeof value !== 'object' || value === null || Array.isArray(value) || isDate(value)) {
    return false;
  }
  return Object.values(value).every(isTableCell);
}

function isCellRow(value: unknown): value is ReadonlyArray<TableCell> {
  return Array.isArray(value) && value.every(isTableCell);
}

/**
 * Check whether a value can be exported as a table.
 * Empty arrays are not tables.
 */
export function isTabularData(value: unknown): value is TabularData {
  if (!Array.isArray(value) || value.length === 0) {
    return false;
  }
  const items: readonly unknown[] = value;
  return items.every(isCellRow) || items.every(isCellRecord);
}

/**
 * Convert tabular data to a matrix of cells.
 *
 * Rows of cells are copied as-is. Records become a header row (columns in
 * order of first appearance) followed by one row per record.
 */
export function toMatrix(data: TabularData): TableCell[][] {
  const items: readonly unknown[] = data;
  if (items.every(isCellRow)) {
    return items.map((row) => [...row]);
  }

  const records = items.filter(isCellRecord);
  const columns: string[] = [];
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (!columns.includes(key)) {
        columns.push(key);
      }
    }
  }

  return [
    columns,
    ...records.map((record) => columns.map((column) => record[column] ?? null)),
  ];
}

/**
 * Render a single cell as text.
 */
export function formatCell(cell: TableCell): string {
  if (cell === null || cell === undefined) {
    return '';
  }
  if (isDate(cell)) {
    return cell.toISOString();
  }
  return String(cell);
}

function quoteField(field: string, delimiter: string): string {
  if (field.includes(delimiter) || field.includes('"') || field.includes('\n') || field.includes('\r')) {
    return `"${field.replace(/"/g, '""')}"`;
  }
  return field;
}

/**
 * Encode tabular data as delimited text, one line per row, `\n` terminated.
 */
export function encodeDelimited(data: TabularData, delimiter: string = ','): string {
  const lines = toMatrix(data).map((row) =>
    row.map((cell) => quoteField(formatCell(cell), delimiter)).join(delimiter)
  );
  return lines.length > 0 ? lines.join('\n') + '\n' : '';
}
