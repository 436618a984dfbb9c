/**
 * CSV Rewrite Service
 *
 * Writes the results of staging back into the working copy of the metadata
 * CSV. Each staged entry updates the first row whose filename column
 * (trimmed) equals the entry's target string.
 *
 * Modes:
 * - filename: the filename column takes the sanitized staged name
 * - urls:     object_location / image_small / image_thumb take storage URLs
 *             built from the staged name; parent rows (empty parentid) then
 *             take the small and thumbnail URLs of their first child
 */

import path from 'path';
import { logger } from '../utils/logger';
import { readCsvTable, writeCsvTable, type CsvTable } from '../utils/csv';
import { AppError } from '../utils/AppError';
import type { StagedEntry } from './staging.service';

// ============================================
// Types
// ============================================

export type RewriteOptions =
  | { mode: 'filename' }
  | { mode: 'urls'; baseUrl: string; collection?: string };

export interface DerivativeUrls {
  object_location: string;
  image_small: string;
  image_thumb: string;
}

export interface RewriteReport {
  csvPath: string;
  updatedRows: number;
  preservedCells: number;
  missingTargets: string[];
  missingColumns: string[];
  parentRowsUpdated: number;
}

type UrlColumn = keyof DerivativeUrls;

const URL_COLUMNS: readonly UrlColumn[] = ['object_location', 'image_small', 'image_thumb'];

const INHERITED_COLUMNS: readonly UrlColumn[] = ['image_small', 'image_thumb'];

const isBlank = (value: string | undefined): boolean => {
  const trimmed = (value ?? '').trim();
  return trimmed === '' || trimmed === 'nan';
};

// ============================================
// URL building
// ============================================

/**
 * Builds the object, small and thumbnail URLs for a staged file.
 *
 * @example
 * buildDerivativeUrls('https://store.example.org', 'letter_01.tif', 'letters')
 * // {
 * //   object_location: 'https://store.example.org/objs/letters/letter_01.tif',
 * //   image_small: 'https://store.example.org/smalls/letters/letter_01_SMALL.jpg',
 * //   image_thumb: 'https://store.example.org/thumbs/letters/letter_01_TN.jpg',
 * // }
 */
export function buildDerivativeUrls(
  baseUrl: string,
  stagedName: string,
  collection?: string
): DerivativeUrls {
  const base = baseUrl.replace(/\/+$/, '');
  const stem = path.parse(stagedName).name;
  const prefix = (container: string) =>
    collection ? `${base}/${container}/${collection}` : `${base}/${container}`;

  return {
    object_location: `${prefix('objs')}/${stagedName}`,
    image_small: `${prefix('smalls')}/${stem}_SMALL.jpg`,
    image_thumb: `${prefix('thumbs')}/${stem}_TN.jpg`,
  };
}

/**
 * An existing URL is replaced only when empty or when it still refers to the
 * target, so re-running on a subset of files does not clobber other rows' URLs.
 */
export function shouldReplaceCell(existing: string | undefined, target: string): boolean {
  return isBlank(existing) || (existing ?? '').includes(target);
}

// ============================================
// Compound objects
// ============================================

/**
 * Gives each parent row (empty parentid) the non-empty image_small and
 * image_thumb of its first child (parentid equal to the parent's objectid).
 *
 * @returns the number of parent rows that received at least one value
 */
export function copyChildDerivativesToParents(table: CsvTable): number {
  const missing = ['objectid', 'parentid'].filter((name) => !table.headings.includes(name));
  if (missing.length > 0) {
    for (const name of missing) {
      logger.warn(`${name} column not found in CSV; skipping parent/child processing`);
    }
    return 0;
  }

  const columns = INHERITED_COLUMNS.filter((name) => table.headings.includes(name));
  let updatedParents = 0;

  for (const parent of table.rows) {
    const objectId = (parent.objectid ?? '').trim();
    if (!isBlank(parent.parentid) || objectId === '') continue;

    const child = table.rows.find((row) => (row.parentid ?? '').trim() === objectId);
    if (!child) continue;

    let copied = false;
    for (const name of columns) {
      const value = child[name];
      if (value !== undefined && !isBlank(value)) {
        parent[name] = value;
        copied = true;
      }
    }

    if (copied) {
      updatedParents++;
      logger.info(`Copied child derivative URLs to parent (objectid=${objectId})`);
    }
  }

  logger.info(
    updatedParents > 0
      ? `Updated ${updatedParents} parent record(s) with child derivative URLs`
      : 'No parent/child updates needed'
  );
  return updatedParents;
}

// ============================================
// Rewrite
// ============================================

/**
 * Applies staged entries to the CSV at `csvPath` and saves it in place.
 *
 * @throws AppError (400) when the filename column is missing
 */
export async function rewriteCsv(
  csvPath: string,
  column: string,
  entries: readonly StagedEntry[],
  options: RewriteOptions
): Promise<RewriteReport> {
  const table = await readCsvTable(csvPath);

  if (!table.headings.includes(column)) {
    throw AppError.badRequest(`Column '${column}' not found in CSV file`);
  }

  const missingColumns =
    options.mode === 'urls' ? URL_COLUMNS.filter((name) => !table.headings.includes(name)) : [];
  for (const name of missingColumns) {
    logger.warn(`${name} column not found in CSV; it will not be populated`);
  }

  let updatedRows = 0;
  let preservedCells = 0;
  const missingTargets: string[] = [];

  for (const entry of entries) {
    // Targets were extracted trimmed, so cells compare trimmed too
    const row = table.rows.find((candidate) => (candidate[column] ?? '').trim() === entry.target);

    if (!row) {
      logger.warn(`No CSV row found for '${entry.target}'`);
      missingTargets.push(entry.target);
      continue;
    }

    if (options.mode === 'filename') {
      row[column] = entry.stagedName;
      logger.info(`Updated CSV: '${entry.target}' -> '${entry.stagedName}'`);
    } else {
      const urls = buildDerivativeUrls(options.baseUrl, entry.stagedName, options.collection);

      for (const name of URL_COLUMNS) {
        if (missingColumns.includes(name)) continue;

        if (shouldReplaceCell(row[name], entry.target)) {
          row[name] = urls[name];
        } else {
          preservedCells++;
          logger.info(`Preserved existing ${name} for '${entry.target}': ${row[name] ?? ''}`);
        }
      }
      logger.info(`Updated storage URLs for '${entry.target}'`);
    }

    updatedRows++;
  }

  const parentRowsUpdated = options.mode === 'urls' ? copyChildDerivativesToParents(table) : 0;

  await writeCsvTable(csvPath, table);
  logger.info(`Rewrote ${csvPath}: ${updatedRows} row(s) updated`);

  return { csvPath, updatedRows, preservedCells, missingTargets, missingColumns, parentRowsUpdated };
}

export const csvRewriteService = {
  buildDerivativeUrls,
  shouldReplaceCell,
  copyChildDerivativesToParents,
  rewriteCsv,
};

export default csvRewriteService;
