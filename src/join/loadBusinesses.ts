import { basename } from 'path';
import {
  DEFAULT_COLUMNS,
  requiredDetailColumns,
  requiredListingColumns,
  type ColumnMap,
} from '../config/columns.js';
import type { BusinessRecord } from '../types/Business.js';
import type { Logger } from '../types/Logger.js';
import { readCsvTable, requireColumns } from '../utils/csvSafeRead.js';
import { buildDetailIndex, joinBusinesses } from './joinBusinesses.js';

export interface LoadBusinessesOptions {
  listingPath: string;
  detailPath: string;
  columns?: ColumnMap;
  logger?: Logger;
}

export interface LoadBusinessesResult {
  records: BusinessRecord[];
  skippedRows: number;
  imageCount: number;
}

/**
 * Read both source tables, check their columns, and join them.
 * Every failure here is fatal and happens before anything is written.
 */
export function loadBusinesses(options: LoadBusinessesOptions): LoadBusinessesResult {
  const columns = options.columns ?? DEFAULT_COLUMNS;
  const logger = options.logger ?? console;

  logger.log(`[generate] 📄 Reading ${basename(options.listingPath)}`);
  const listing = readCsvTable(options.listingPath, 'Listing');
  requireColumns(listing, 'Listing', requiredListingColumns(columns.listing));

  logger.log(`[generate] 📄 Reading ${basename(options.detailPath)}`);
  const detail = readCsvTable(options.detailPath, 'Detail');
  requireColumns(detail, 'Detail', requiredDetailColumns(columns.detail));

  if (listing.rows.length === 0) {
    logger.warn(`[generate] ⚠️  Listing CSV has a header but no rows: ${options.listingPath}`);
  }

  const detailIndex = buildDetailIndex(detail, columns.detail);
  const { records, skippedRows } = joinBusinesses(listing, detailIndex, columns.listing);
  const imageCount = records.filter((record) => record.coverImageUrl !== undefined).length;

  logger.log(
    `[generate]    ${records.length} shops (${skippedRows} blank rows skipped), ${imageCount} with cover images`
  );

  return { records, skippedRows, imageCount };
}
