/**
 * Listing ⟕ detail join
 *
 * - Detail rows are indexed once by normalized map link
 * - Listing rows with a blank name are dropped
 * - Every other listing row becomes a record, in input order, with the
 *   cover image attached only when its map link is in the index
 */

import type { DetailColumns, ListingColumns } from '../config/columns.js';
import type { BusinessRecord } from '../types/Business.js';
import { getColumn, type CsvRow, type CsvTable } from '../utils/csvSafeRead.js';
import { createSlugAllocator, type SlugAllocator } from '../utils/slug.js';

export type DetailIndex = ReadonlyMap<string, string>;

export interface JoinResult {
  records: BusinessRecord[];
  skippedRows: number;
}

export function normalizeMapLink(link: string): string {
  return link.trim();
}

export function buildDetailIndex(table: CsvTable, columns: DetailColumns): DetailIndex {
  const index = new Map<string, string>();
  for (const row of table.rows) {
    const mapLink = normalizeMapLink(getColumn(row, columns.mapLink));
    const imageUrl = getColumn(row, columns.image).trim();
    if (mapLink && imageUrl) {
      index.set(mapLink, imageUrl);
    }
  }
  return index;
}

export function parseRating(raw: string): number | undefined {
  const value = raw.trim();
  if (!value) return undefined;
  const rating = Number(value);
  return Number.isFinite(rating) ? rating : undefined;
}

/** "(1,234)" -> 1234 */
export function parseReviewCount(raw: string): number | undefined {
  const cleaned = raw.trim().replace(/^[()]+|[()]+$/g, '').replace(/,/g, '');
  return /^\d+$/.test(cleaned) ? parseInt(cleaned, 10) : undefined;
}

export function buildSearchHaystack(parts: ReadonlyArray<string | undefined>): string {
  return parts.filter(Boolean).join(' ').toLowerCase();
}

function optionalColumn(row: CsvRow, column: string): string | undefined {
  const value = getColumn(row, column).trim();
  return value || undefined;
}

export function joinBusinesses(
  listing: CsvTable,
  detailIndex: DetailIndex,
  columns: ListingColumns,
  allocateSlug: SlugAllocator = createSlugAllocator()
): JoinResult {
  const records: BusinessRecord[] = [];
  let skippedRows = 0;

  for (const row of listing.rows) {
    const name = getColumn(row, columns.name).trim();
    if (!name) {
      skippedRows++;
      continue;
    }

    const mapLink = optionalColumn(row, columns.mapLink);
    const category = optionalColumn(row, columns.category);
    const address = optionalColumn(row, columns.address);
    const status = optionalColumn(row, columns.status);
    const features = columns.features
      .map((column) => getColumn(row, column).trim())
      .filter(Boolean);

    records.push(
      Object.freeze({
        name,
        slug: allocateSlug(name),
        mapLink,
        rating: parseRating(getColumn(row, columns.rating)),
        reviewCount: parseReviewCount(getColumn(row, columns.reviews)),
        category,
        address,
        status,
        hours: optionalColumn(row, columns.hours),
        websiteUrl: optionalColumn(row, columns.website),
        phone: optionalColumn(row, columns.phone),
        features: Object.freeze(features),
        coverImageUrl: mapLink ? detailIndex.get(normalizeMapLink(mapLink)) : undefined,
        searchHaystack: buildSearchHaystack([name, category, address, status]),
      })
    );
  }

  return { records, skippedRows };
}
