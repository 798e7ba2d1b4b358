/**
 * Safe CSV Reading Utility
 *
 * Handles:
 * - Quoted commas and multiline fields (scraper exports)
 * - BOM removal
 * - Ragged rows (short rows padded with empty strings)
 * - Fatal errors naming the file for anything that cannot be read
 */

import { existsSync, readFileSync } from 'fs';
import { parse } from 'csv-parse/sync';

export interface CsvRow {
  [key: string]: string;
}

export interface CsvTable {
  filePath: string;
  headers: string[];
  rows: CsvRow[];
}

export interface CsvReadOptions {
  /** Trim whitespace from values (default true) */
  trim?: boolean;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((record) => Array.isArray(record) && record.every((field) => typeof field === 'string'))
  );
}

/**
 * Read a header-described CSV file.
 * Missing, unreadable or empty files throw; a header with no data rows does not.
 */
export function readCsvTable(filePath: string, label: string, options: CsvReadOptions = {}): CsvTable {
  if (!existsSync(filePath)) {
    throw new Error(`❌ ${label} CSV not found: ${filePath}`);
  }

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new Error(`❌ ${label} CSV could not be read: ${filePath} (${describeError(error)})`);
  }

  if (content.trim() === '') {
    throw new Error(`❌ ${label} CSV is empty: ${filePath}`);
  }

  let records: unknown;
  try {
    records = parse(content, {
      bom: true,
      skip_empty_lines: true,
      relax_quotes: true,
      relax_column_count: true,
    });
  } catch (error) {
    throw new Error(`❌ ${label} CSV could not be parsed: ${filePath} (${describeError(error)})`);
  }

  if (!isStringMatrix(records) || records.length === 0) {
    throw new Error(`❌ ${label} CSV has no header row: ${filePath}`);
  }

  const [headerRecord, ...dataRecords] = records;
  const headers = headerRecord.map((h) => h.trim());
  const trim = options.trim !== false;

  const rows = dataRecords.map((values) => {
    const row: CsvRow = {};
    headers.forEach((header, idx) => {
      // First occurrence wins when a header repeats
      if (header in row) return;
      const val = values[idx] ?? '';
      row[header] = trim ? val.trim() : val;
    });
    return row;
  });

  return { filePath, headers, rows };
}

/**
 * Throw if any of the named columns is absent from the header row
 */
export function requireColumns(table: CsvTable, label: string, columns: readonly string[]): void {
  const missing = columns.filter((column) => !table.headers.includes(column));
  if (missing.length > 0) {
    const names = missing.map((column) => `"${column}"`).join(', ');
    throw new Error(`❌ ${label} CSV is missing required column(s) ${names}: ${table.filePath}`);
  }
}

/**
 * Get a value from a row, trying each column name in turn
 */
export function getColumn(row: CsvRow, ...names: string[]): string {
  for (const name of names) {
    const value = row[name];
    if (value !== undefined && value !== '') {
      return value;
    }
  }
  return '';
}
