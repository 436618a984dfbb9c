/**
 * CSV Utilities for the ingest workflow
 *
 * Reads metadata CSVs as plain string tables (no type conversion, so
 * identifiers like "00123" or "1E5" survive untouched) and writes them back
 * with the original heading order.
 *
 * Key features:
 * - Stream-based parsing using csv-parse
 * - BOM stripped from the first heading
 * - Ragged rows padded with empty strings
 * - Serialization with papaparse
 */

import { createReadStream } from 'fs';
import { writeFile } from 'fs/promises';
import path from 'path';
import { parse, CsvError } from 'csv-parse';
import Papa from 'papaparse';
import { AppError } from './AppError';

// ============================================
// Types
// ============================================

/**
 * A CSV file held in memory as strings
 */
export interface CsvTable {
  headings: string[];
  rows: Array<Record<string, string>>;
}

// ============================================
// Reading
// ============================================

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((cell) => typeof cell === 'string');

/**
 * Streams the records of a CSV file as arrays of cell strings.
 *
 * @throws AppError (422) when the file is not valid CSV
 */
async function* readRecords(filePath: string, toLine?: number): AsyncGenerator<string[]> {
  const parser = createReadStream(filePath).pipe(
    parse({
      bom: true,
      relax_column_count: true,
      skip_empty_lines: true,
      ...(toLine !== undefined && { to_line: toLine }),
    })
  );

  try {
    for await (const raw of parser) {
      const record: unknown = raw;
      if (!isStringArray(record)) {
        throw AppError.unprocessable(`Unexpected CSV record in ${path.basename(filePath)}`);
      }
      yield record;
    }
  } catch (error) {
    if (error instanceof CsvError) {
      throw AppError.unprocessable(`Could not parse ${path.basename(filePath)}: ${error.message}`);
    }
    throw error;
  }
}

/**
 * Returns the trimmed heading row of a CSV file (empty for an empty file)
 */
export async function readCsvHeadings(filePath: string): Promise<string[]> {
  for await (const record of readRecords(filePath, 1)) {
    return record.map((heading) => heading.trim());
  }
  return [];
}

/**
 * Extracts the non-empty, whitespace-trimmed values of one column, in row order.
 * Duplicates are kept.
 *
 * @throws AppError (400) when the column does not exist
 */
export async function extractColumnValues(filePath: string, column: string): Promise<string[]> {
  const values: string[] = [];
  let columnIndex = -1;
  let isHeading = true;

  for await (const record of readRecords(filePath)) {
    if (isHeading) {
      columnIndex = record.findIndex((heading) => heading.trim() === column);
      if (columnIndex === -1) {
        throw AppError.badRequest(`Column '${column}' not found in CSV file`);
      }
      isHeading = false;
      continue;
    }

    const value = (record[columnIndex] ?? '').trim();
    if (value !== '') {
      values.push(value);
    }
  }

  if (isHeading) {
    throw AppError.badRequest(`Column '${column}' not found in CSV file`);
  }

  return values;
}

/**
 * Loads a whole CSV file keyed by heading
 */
export async function readCsvTable(filePath: string): Promise<CsvTable> {
  let headings: string[] | null = null;
  const rows: Array<Record<string, string>> = [];

  for await (const record of readRecords(filePath)) {
    if (headings === null) {
      headings = record.map((heading) => heading.trim());
      continue;
    }

    const row: Record<string, string> = {};
    headings.forEach((heading, index) => {
      row[heading] = record[index] ?? '';
    });
    rows.push(row);
  }

  return { headings: headings ?? [], rows };
}

// ============================================
// Writing
// ============================================

/**
 * Serializes a table to CSV text (headings first, LF line endings, no trailing newline)
 */
export function serializeCsvTable(table: CsvTable): string {
  return Papa.unparse(
    {
      fields: table.headings,
      data: table.rows.map((row) => table.headings.map((heading) => row[heading] ?? '')),
    },
    { newline: '\n' }
  );
}

/**
 * Overwrites `filePath` with the table
 */
export async function writeCsvTable(filePath: string, table: CsvTable): Promise<void> {
  await writeFile(filePath, `${serializeCsvTable(table)}\n`, 'utf-8');
}

export default {
  readCsvHeadings,
  extractColumnValues,
  readCsvTable,
  serializeCsvTable,
  writeCsvTable,
};
